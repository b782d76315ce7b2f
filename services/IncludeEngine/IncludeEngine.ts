import type { Fragment, ProcessingOrder, Result, ScanOptions, ScanResult } from '@core/types';
import { success, failure } from '@core/types';
import type { MergeError } from '@core/errors';
import { MissingDependencyError } from '@core/errors/MissingDependencyError';
import { AmbiguousRootError } from '@core/errors/AmbiguousRootError';
import { CyclicDependencyError } from '@core/errors/CyclicDependencyError';
import { engineLogger as logger } from '@core/utils/logger';
import { DirectiveScanner } from '@services/DirectiveScanner/DirectiveScanner';
import { GraphBuilder } from '@services/GraphBuilder/GraphBuilder';
import { TopologicalOrderer } from '@services/TopologicalOrderer/TopologicalOrderer';
import { SubstitutionEngine } from '@services/SubstitutionEngine/SubstitutionEngine';
import type { IIncludeEngine } from './IIncludeEngine';

export type IncludeEngineOptions = ScanOptions;

interface Plan {
  scans: Map<string, ScanResult>;
  order: ProcessingOrder;
}

function isMergeError(error: unknown): error is MergeError {
  return (
    error instanceof MissingDependencyError ||
    error instanceof AmbiguousRootError ||
    error instanceof CyclicDependencyError
  );
}

export class IncludeEngine implements IIncludeEngine {
  // Map keeps registration order; re-adding a name keeps its original slot
  private readonly fragments = new Map<string, string>();
  private readonly scanner: DirectiveScanner;
  private readonly graphBuilder = new GraphBuilder();
  private readonly orderer = new TopologicalOrderer();
  private readonly substitution = new SubstitutionEngine();

  constructor(options: IncludeEngineOptions = {}) {
    this.scanner = new DirectiveScanner(options);
  }

  add(name: string, content: string): void {
    this.fragments.set(name, content);
  }

  remove(name: string): boolean {
    return this.fragments.delete(name);
  }

  get(name: string): string | undefined {
    return this.fragments.get(name);
  }

  has(name: string): boolean {
    return this.fragments.has(name);
  }

  names(): string[] {
    return [...this.fragments.keys()];
  }

  clear(): void {
    this.fragments.clear();
  }

  merge(): string {
    const { scans, order } = this.plan();
    const content = this.substitution.substitute(order, scans);

    logger.info('Merged fragments', {
      root: order.root,
      fragments: order.order.length,
      length: content.length
    });

    return content;
  }

  build(): string {
    return this.merge();
  }

  tryMerge(): Result<string, MergeError> {
    try {
      return success(this.merge());
    } catch (error) {
      if (isMergeError(error)) {
        return failure(error);
      }
      throw error;
    }
  }

  resolveOrder(): ProcessingOrder {
    return this.plan().order;
  }

  private plan(): Plan {
    const fragments: Fragment[] = [...this.fragments].map(([name, content]) => ({ name, content }));
    logger.debug('Planning merge', { fragments: fragments.map(fragment => fragment.name) });

    const scans = new Map<string, ScanResult>();
    for (const fragment of fragments) {
      scans.set(fragment.name, this.scanner.scan(fragment.content));
    }

    const graph = this.graphBuilder.build(fragments, scans);
    const order = this.orderer.order(graph);

    return { scans, order };
  }
}

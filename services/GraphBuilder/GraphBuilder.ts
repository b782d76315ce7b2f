import type { DependencyGraph, Fragment, ScanResult } from '@core/types';
import { MissingDependencyError } from '@core/errors/MissingDependencyError';
import { graphLogger as logger } from '@core/utils/logger';

/**
 * Builds forward and reverse include edges for a fragment set.
 */
export class GraphBuilder {
  /**
   * @param fragments Registered fragments, in registration order
   * @param scans Scan result for every fragment, keyed by name
   * @throws {MissingDependencyError} On the first reference to an unregistered fragment
   */
  build(fragments: readonly Fragment[], scans: ReadonlyMap<string, ScanResult>): DependencyGraph {
    const nodes = fragments.map(fragment => fragment.name);
    const registered = new Set(nodes);
    const outEdges = new Map<string, Set<string>>();
    const inEdges = new Map<string, Set<string>>();

    for (const name of nodes) {
      const includes = scans.get(name)?.includes ?? [];

      for (const target of includes) {
        if (!registered.has(target)) {
          logger.error('Include references a missing fragment', { name: target, includedBy: name });
          throw new MissingDependencyError(target, name);
        }
      }

      outEdges.set(name, new Set(includes));
      inEdges.set(name, new Set());
    }

    for (const [from, targets] of outEdges) {
      for (const to of targets) {
        inEdges.get(to)?.add(from);
      }
    }

    const outDegree = new Map<string, number>();
    const inDegree = new Map<string, number>();
    for (const name of nodes) {
      outDegree.set(name, outEdges.get(name)?.size ?? 0);
      inDegree.set(name, inEdges.get(name)?.size ?? 0);
    }

    logger.debug('Built dependency graph', {
      nodes: nodes.length,
      edges: [...outDegree.values()].reduce((sum, degree) => sum + degree, 0)
    });

    return { nodes, outEdges, inEdges, outDegree, inDegree };
  }
}

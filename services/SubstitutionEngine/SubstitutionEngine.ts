import type { ProcessingOrder, ScanResult } from '@core/types';
import { substitutionLogger as logger } from '@core/utils/logger';

/**
 * Replaces include directives with the merged text of their targets, walking
 * fragments dependencies-first.
 */
export class SubstitutionEngine {
  /**
   * Merge every fragment of `order` and return the root's text.
   * `scans` must hold a scan for every name in the order.
   */
  substitute(order: ProcessingOrder, scans: ReadonlyMap<string, ScanResult>): string {
    const merged = new Map<string, string>();
    // Names substituted (or suppressed) anywhere during this merge
    const visited = new Set<string>();

    const includeOnce = (name: string): boolean => scans.get(name)?.includeOnce ?? false;

    for (const name of order.order) {
      const scan = scans.get(name);
      if (!scan) {
        throw new Error(`No scan result for fragment "${name}"`);
      }

      // line index -> name whose merged text goes there
      const insertions = new Map<number, string>();
      const dropped = new Set<number>();

      for (const target of scan.includes) {
        const occurrences = scan.directives
          .filter(directive => directive.kind === 'include' && directive.name === target)
          .map(directive => directive.line);

        if (includeOnce(target) && visited.has(target)) {
          logger.debug('Suppressing repeated include-once fragment', { fragment: name, include: target });
        } else {
          visited.add(target);
          insertions.set(occurrences[0], target);
        }

        occurrences.forEach(line => dropped.add(line));
      }

      for (const directive of scan.directives) {
        if (directive.kind === 'pragma-once') {
          dropped.add(directive.line);
        }
      }

      const trailing = new Map(scan.directives.map(directive => [directive.line, directive.trailing]));

      let output = '';
      scan.lines.forEach((line, index) => {
        const target = insertions.get(index);
        if (target !== undefined) {
          const text = merged.get(target) ?? '';
          output += text;
          if (text !== '' && !text.endsWith('\n')) {
            output += line.eol;
          }
        } else if (!dropped.has(index)) {
          output += line.text + line.eol;
          return;
        }

        // Text after a directive survives on its own line
        const rest = trailing.get(index) ?? '';
        if (rest !== '') {
          output += rest + line.eol;
        }
      });

      merged.set(name, output);
    }

    logger.debug('Substituted includes', { root: order.root, fragments: order.order.length });

    return merged.get(order.root) ?? '';
  }
}

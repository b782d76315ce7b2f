import type { DependencyGraph, ProcessingOrder } from '@core/types';
import { AmbiguousRootError } from '@core/errors/AmbiguousRootError';
import { CyclicDependencyError } from '@core/errors/CyclicDependencyError';
import { orderLogger as logger } from '@core/utils/logger';

/**
 * Orders fragments so every fragment comes after everything it includes.
 *
 * Kahn's algorithm runs from the root down the include edges with a FIFO
 * queue; the processing order is the reverse of the dequeue order. A
 * fragment's dependencies are enqueued last-referenced first, so of two
 * siblings sharing a dependency the earlier-referenced one is processed first.
 */
export class TopologicalOrderer {
  /**
   * @throws {AmbiguousRootError} Unless exactly one fragment has no incoming edge
   * @throws {CyclicDependencyError} When fragments stay unordered because of a cycle
   */
  order(graph: DependencyGraph): ProcessingOrder {
    const inDegree = new Map(graph.inDegree);
    const roots = graph.nodes.filter(name => inDegree.get(name) === 0);

    if (roots.length !== 1) {
      logger.error('Fragment set has no single root', { candidates: roots });
      throw new AmbiguousRootError(roots);
    }

    const [root] = roots;
    const queue: string[] = [root];
    const dequeued: string[] = [];

    for (let head = 0; head < queue.length; head++) {
      const from = queue[head];
      dequeued.push(from);

      const targets = [...(graph.outEdges.get(from) ?? [])].reverse();
      for (const to of targets) {
        const remaining = (inDegree.get(to) ?? 0) - 1;
        inDegree.set(to, remaining);
        if (remaining === 0) {
          queue.push(to);
        }
      }
    }

    const unresolved = graph.nodes.filter(name => (inDegree.get(name) ?? 0) !== 0);
    if (unresolved.length > 0) {
      logger.error('Cyclic dependency detected', { unresolved });
      throw new CyclicDependencyError(unresolved);
    }

    const order = dequeued.reverse();
    logger.debug('Resolved processing order', { root, order });

    return { root, order };
  }
}

import type { PuzzleState } from '../PuzzleState.ts';
import type { NodeHandle } from './SearchArena.ts';
import type {
  SearchObserver,
  SearchOutcome,
  Solver
} from './Solver.ts';

import { ensureNonNullable } from '../typeGuards.ts';
import { reconstructPath } from './reconstructPath.ts';
import { SearchArena } from './SearchArena.ts';
import {
  createSearchCounters,
  discoverNode
} from './Solver.ts';

/**
 * Level-by-level search. Every node at depth `d` is dequeued before any node at
 * depth `d + 1`, so the first solved state dequeued ends a shortest path.
 *
 * The whole frontier and every discovered node stay in memory until the run
 * ends.
 */
export class BreadthFirstSolver implements Solver {
  public readonly name = 'bfs';

  public search<S extends PuzzleState<S>>(initial: S, observer: SearchObserver<S> = {}): SearchOutcome<S> {
    const arena = new SearchArena<S>();
    const counters = createSearchCounters();
    const visited = new Set<string>([initial.key]);

    const root = discoverNode(arena, initial, null, observer);
    counters.peakRetained = arena.size;
    if (initial.failFast()) {
      counters.pruned++;
      return { path: null, statistics: counters };
    }

    const queue: NodeHandle[] = [root];
    let head = 0;
    while (head < queue.length) {
      const handle = ensureNonNullable(queue[head]);
      head++;
      const { state } = arena.get(handle);
      if (state.isSolved()) {
        return { path: reconstructPath(arena, handle), statistics: counters };
      }

      counters.expanded++;
      for (const extension of state.extensions()) {
        counters.generated++;
        // Marked on enqueue so a state reached again through another parent is never queued twice.
        if (visited.has(extension.key)) {
          counters.duplicates++;
          continue;
        }
        visited.add(extension.key);
        if (extension.failFast()) {
          counters.pruned++;
          continue;
        }
        queue.push(discoverNode(arena, extension, handle, observer));
      }
      counters.peakRetained = Math.max(counters.peakRetained, arena.size);
    }

    return { path: null, statistics: counters };
  }

  public solve<S extends PuzzleState<S>>(initial: S): null | S[] {
    return this.search(initial).path;
  }
}

import type { PuzzleState } from '../PuzzleState.ts';
import type { NodeHandle } from './SearchArena.ts';
import type {
  SearchCounters,
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

interface Frame<S> {
  readonly extensions: Iterator<S>;
  readonly handle: NodeHandle;
}

/**
 * Explores one branch to its end before trying its siblings and returns the
 * first solution found, which need not be the shortest.
 *
 * Only the active path is held: each frame keeps a lazy iterator over its
 * remaining extensions, and the arena is truncated whenever a branch is
 * abandoned, so the arena size always equals the stack depth.
 */
export class DepthFirstSolver implements Solver {
  public readonly name = 'dfs';

  public search<S extends PuzzleState<S>>(initial: S, observer: SearchObserver<S> = {}): SearchOutcome<S> {
    const arena = new SearchArena<S>();
    const counters = createSearchCounters();
    const visited = new Set<string>([initial.key]);

    const root = discoverNode(arena, initial, null, observer);
    counters.peakRetained = arena.size;
    if (initial.isSolved()) {
      return { path: [initial], statistics: counters };
    }
    if (initial.failFast()) {
      counters.pruned++;
      return { path: null, statistics: counters };
    }

    const stack: Frame<S>[] = [expand(initial, root, counters)];
    while (stack.length > 0) {
      const frame = ensureNonNullable(stack[stack.length - 1]);
      const next = frame.extensions.next();
      if (next.done === true) {
        stack.pop();
        arena.truncate(frame.handle);
        continue;
      }

      const extension = next.value;
      counters.generated++;
      if (visited.has(extension.key)) {
        counters.duplicates++;
        continue;
      }
      visited.add(extension.key);

      const handle = discoverNode(arena, extension, frame.handle, observer);
      counters.peakRetained = Math.max(counters.peakRetained, arena.size);
      if (extension.isSolved()) {
        return { path: reconstructPath(arena, handle), statistics: counters };
      }
      if (extension.failFast()) {
        counters.pruned++;
        arena.truncate(handle);
        continue;
      }
      stack.push(expand(extension, handle, counters));
    }

    return { path: null, statistics: counters };
  }

  public solve<S extends PuzzleState<S>>(initial: S): null | S[] {
    return this.search(initial).path;
  }
}

function expand<S extends PuzzleState<S>>(state: S, handle: NodeHandle, counters: SearchCounters): Frame<S> {
  counters.expanded++;
  return { extensions: state.extensions()[Symbol.iterator](), handle };
}

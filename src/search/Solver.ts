import type { PuzzleState } from '../PuzzleState.ts';
import type {
  NodeHandle,
  SearchArena
} from './SearchArena.ts';

export type SolverName = 'bfs' | 'dfs';

export interface SearchObserver<S> {
  onDiscover?(state: S, depth: number): void;
}

export interface SearchOutcome<S> {
  readonly path: null | S[];
  readonly statistics: SearchStatistics;
}

export interface SearchStatistics {
  /** Extensions skipped because their key was already visited. */
  readonly duplicates: number;
  /** States whose extensions were requested. */
  readonly expanded: number;
  readonly generated: number;
  /** Most search nodes held at once. */
  readonly peakRetained: number;
  readonly pruned: number;
}

export interface Solver {
  readonly name: SolverName;
  search<S extends PuzzleState<S>>(initial: S, observer?: SearchObserver<S>): SearchOutcome<S>;
  solve<S extends PuzzleState<S>>(initial: S): null | S[];
}

export type SearchCounters = { -readonly [K in keyof SearchStatistics]: number };

export function createSearchCounters(): SearchCounters {
  return {
    duplicates: 0,
    expanded: 0,
    generated: 0,
    peakRetained: 0,
    pruned: 0
  };
}

export function discoverNode<S>(arena: SearchArena<S>, state: S, parent: NodeHandle | null, observer: SearchObserver<S>): NodeHandle {
  const handle = arena.add(state, parent);
  observer.onDiscover?.(state, arena.get(handle).depth);
  return handle;
}

export function getMoveCount<S>(outcome: SearchOutcome<S>): null | number {
  return outcome.path === null ? null : outcome.path.length - 1;
}

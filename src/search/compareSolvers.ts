import type { PuzzleState } from '../PuzzleState.ts';
import type {
  SearchOutcome,
  Solver,
  SolverName
} from './Solver.ts';

import { createDefaultSolvers } from './createDefaultSolvers.ts';

export interface SolverComparison<S> {
  readonly elapsedMs: number;
  readonly outcome: SearchOutcome<S>;
  readonly solver: SolverName;
}

/**
 * Runs each solver on the same initial state, one after another. Every run
 * gets its own arena and visited set, so the results are independent.
 */
export function compareSolvers<S extends PuzzleState<S>>(
  initial: S,
  solvers: readonly Solver[] = createDefaultSolvers()
): SolverComparison<S>[] {
  return solvers.map((solver) => {
    const startedAt = performance.now();
    const outcome = solver.search(initial);
    return {
      elapsedMs: performance.now() - startedAt,
      outcome,
      solver: solver.name
    };
  });
}

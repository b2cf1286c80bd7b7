import type {
  Solver,
  SolverName
} from './Solver.ts';

import { MalformedInputError } from '../MalformedInputError.ts';
import { BreadthFirstSolver } from './BreadthFirstSolver.ts';
import { DepthFirstSolver } from './DepthFirstSolver.ts';

export const SOLVER_NAMES: readonly SolverName[] = ['bfs', 'dfs'];

export function createDefaultSolvers(): Solver[] {
  return SOLVER_NAMES.map(createSolver);
}

export function createSolver(name: string): Solver {
  switch (name) {
    case 'bfs':
      return new BreadthFirstSolver();
    case 'dfs':
      return new DepthFirstSolver();
    default:
      throw new MalformedInputError(`Unknown solver: ${name}. Expected one of: ${SOLVER_NAMES.join(', ')}`);
  }
}

export function isSolverName(value: string): value is SolverName {
  return SOLVER_NAMES.some((name) => name === value);
}

import {
  describe,
  expect,
  it
} from 'vitest';

import { MalformedInputError } from '../../src/MalformedInputError.ts';
import { BreadthFirstSolver } from '../../src/search/BreadthFirstSolver.ts';
import {
  createDefaultSolvers,
  createSolver,
  isSolverName
} from '../../src/search/createDefaultSolvers.ts';
import { DepthFirstSolver } from '../../src/search/DepthFirstSolver.ts';

describe('createDefaultSolvers', () => {
  it('creates breadth-first then depth-first solvers', () => {
    expect(createDefaultSolvers().map((solver) => solver.name)).toEqual(['bfs', 'dfs']);
  });
});

describe('createSolver', () => {
  it('creates a solver by name', () => {
    expect(createSolver('bfs')).toBeInstanceOf(BreadthFirstSolver);
    expect(createSolver('dfs')).toBeInstanceOf(DepthFirstSolver);
  });

  it('rejects unknown names', () => {
    expect(() => createSolver('astar')).toThrow(MalformedInputError);
    expect(() => createSolver('astar')).toThrow('Unknown solver: astar. Expected one of: bfs, dfs');
  });
});

describe('isSolverName', () => {
  it('recognises the solver names', () => {
    expect(isSolverName('bfs')).toBe(true);
    expect(isSolverName('dfs')).toBe(true);
    expect(isSolverName('BFS')).toBe(false);
  });
});

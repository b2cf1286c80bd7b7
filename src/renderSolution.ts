import type { PuzzleState } from './PuzzleState.ts';

export function renderSolution<S extends PuzzleState<S>>(path: null | readonly S[]): string {
  if (path === null) {
    return 'No solution';
  }
  const moves = path.length - 1;
  const header = `Solved in ${String(moves)} ${moves === 1 ? 'move' : 'moves'}`;
  return [header, ...path.map(String)].join('\n\n');
}

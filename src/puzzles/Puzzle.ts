import type { MnPuzzle } from './MnPuzzle.ts';
import type { PegSolitairePuzzle } from './PegSolitairePuzzle.ts';
import type { SudokuPuzzle } from './SudokuPuzzle.ts';
import type { WordLadderPuzzle } from './WordLadderPuzzle.ts';

export type Puzzle = MnPuzzle | PegSolitairePuzzle | SudokuPuzzle | WordLadderPuzzle;

export type PuzzleKind = Puzzle['kind'];

export const PUZZLE_KINDS: readonly PuzzleKind[] = ['mn', 'peg-solitaire', 'sudoku', 'word-ladder'];

export function isPuzzleKind(value: string): value is PuzzleKind {
  return PUZZLE_KINDS.some((kind) => kind === value);
}

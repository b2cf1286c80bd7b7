import type { Grid } from '../parsers.ts';
import type { PuzzleState } from '../PuzzleState.ts';

import { MalformedInputError } from '../MalformedInputError.ts';
import {
  formatGrid,
  parseCharGrid
} from '../parsers.ts';
import { ensureNonNullable } from '../typeGuards.ts';

export const PEG = '*';
export const HOLE = '.';
export const UNUSED = '#';
const MARKERS = `${PEG}${HOLE}${UNUSED}`;
const JUMP_LENGTH = 2;

interface Direction {
  readonly column: number;
  readonly row: number;
}

// Side the jumping peg comes from, relative to the hole it lands in.
const DIRECTIONS: readonly Direction[] = [
  { column: 0, row: -1 },
  { column: 0, row: 1 },
  { column: -1, row: 0 },
  { column: 1, row: 0 }
];

/**
 * Peg solitaire on a rectangular board: a move jumps a peg orthogonally over a
 * neighbouring peg into a hole, removing the jumped peg. Solved when one peg
 * remains.
 *
 * Boards that are mirror images or rotations of each other share a key, since
 * a symmetric board is solvable exactly when the original is.
 */
export class PegSolitairePuzzle implements PuzzleState<PegSolitairePuzzle> {
  public readonly key: string;
  public readonly kind = 'peg-solitaire';
  public readonly pegCount: number;

  private get columns(): number {
    return ensureNonNullable(this.board[0]).length;
  }

  private constructor(public readonly board: Grid<string>) {
    this.key = getCanonicalKey(board);
    this.pegCount = board.flat().filter((cell) => cell === PEG).length;
  }

  public static create(board: Grid<string>): PegSolitairePuzzle {
    const columns = board[0]?.length ?? 0;
    if (columns === 0) {
      throw new MalformedInputError('peg-solitaire: board must not be empty');
    }
    for (const [rowIndex, row] of board.entries()) {
      if (row.length !== columns) {
        throw new MalformedInputError(`peg-solitaire: row ${String(rowIndex + 1)} has ${String(row.length)} cells, expected ${String(columns)}`);
      }
      const illegal = row.find((cell) => cell.length !== 1 || !MARKERS.includes(cell));
      if (illegal !== undefined) {
        throw new MalformedInputError(`peg-solitaire: illegal marker '${illegal}' in row ${String(rowIndex + 1)}`);
      }
    }
    return new PegSolitairePuzzle(board.map((row) => [...row]));
  }

  public static parse(rows: readonly string[]): PegSolitairePuzzle {
    return PegSolitairePuzzle.create(parseCharGrid(rows, MARKERS, 'peg-solitaire'));
  }

  public equals(other: PegSolitairePuzzle): boolean {
    return this.key === other.key;
  }

  public *extensions(): Generator<PegSolitairePuzzle> {
    for (const [row, column, direction] of this.jumps()) {
      const next = this.board.map((cells) => [...cells]);
      ensureNonNullable(next[row])[column] = PEG;
      ensureNonNullable(next[row + direction.row])[column + direction.column] = HOLE;
      ensureNonNullable(next[row + JUMP_LENGTH * direction.row])[column + JUMP_LENGTH * direction.column] = HOLE;
      yield new PegSolitairePuzzle(next);
    }
  }

  /**
   * With more than one peg left, the board is stuck when no jump exists, and
   * also when pegs sit in separate playable regions: a jump never leaves its
   * region, so those pegs can never be brought together.
   */
  public failFast(): boolean {
    if (this.pegCount <= 1) {
      return false;
    }
    if (this.jumps().next().done === true) {
      return true;
    }
    return this.countRegionsWithPegs() > 1;
  }

  public isSolved(): boolean {
    return this.pegCount === 1;
  }

  public toString(): string {
    return formatGrid(this.board);
  }

  private cellAt(row: number, column: number): string | undefined {
    return this.board[row]?.[column];
  }

  private countRegionsWithPegs(): number {
    const seen = new Set<number>();
    let regions = 0;
    for (const [row, cells] of this.board.entries()) {
      for (const [column, cell] of cells.entries()) {
        if (cell !== PEG || seen.has(row * this.columns + column)) {
          continue;
        }
        regions++;
        const pending = [{ column, row }];
        seen.add(row * this.columns + column);
        for (let current = pending.pop(); current !== undefined; current = pending.pop()) {
          for (const direction of DIRECTIONS) {
            const neighbour = { column: current.column + direction.column, row: current.row + direction.row };
            const marker = this.cellAt(neighbour.row, neighbour.column);
            const index = neighbour.row * this.columns + neighbour.column;
            if ((marker === PEG || marker === HOLE) && !seen.has(index)) {
              seen.add(index);
              pending.push(neighbour);
            }
          }
        }
      }
    }
    return regions;
  }

  /**
   * Yields `[row, column, direction]` for every hole a peg can jump into, in
   * row-major hole order.
   */
  private *jumps(): Generator<[number, number, Direction]> {
    for (const [row, cells] of this.board.entries()) {
      for (const [column, cell] of cells.entries()) {
        if (cell !== HOLE) {
          continue;
        }
        for (const direction of DIRECTIONS) {
          const over = this.cellAt(row + direction.row, column + direction.column);
          const source = this.cellAt(row + JUMP_LENGTH * direction.row, column + JUMP_LENGTH * direction.column);
          if (over === PEG && source === PEG) {
            yield [row, column, direction];
          }
        }
      }
    }
  }
}

function getCanonicalKey(board: Grid<string>): string {
  let best: null | string = null;
  for (const variant of getSymmetricBoards(board)) {
    const serialized = variant.map((row) => row.join('')).join('/');
    if (best === null || serialized < best) {
      best = serialized;
    }
  }
  return ensureNonNullable(best);
}

function getSymmetricBoards(board: Grid<string>): Grid<string>[] {
  const mirrored = board.map((row) => [...row].reverse());
  const flipped = [...board].reverse();
  const rotated = [...mirrored].reverse();
  const variants: Grid<string>[] = [board, mirrored, flipped, rotated];
  const isSquare = board.length === board[0]?.length;
  if (isSquare) {
    variants.push(...variants.map(transpose));
  }
  return variants;
}

function transpose(board: Grid<string>): string[][] {
  const first = ensureNonNullable(board[0]);
  return first.map((_, column) => board.map((row) => ensureNonNullable(row[column])));
}

import type { Grid } from '../parsers.ts';
import type { PuzzleState } from '../PuzzleState.ts';

import { MalformedInputError } from '../MalformedInputError.ts';
import {
  formatGrid,
  parseTokenGrid
} from '../parsers.ts';
import { ensureNonNullable } from '../typeGuards.ts';

export const BLANK = '*';
const PARITY_MODULUS = 2;

interface Position {
  readonly column: number;
  readonly row: number;
}

// Blank slides up, down, left, right.
const BLANK_MOVES: readonly Position[] = [
  { column: 0, row: -1 },
  { column: 0, row: 1 },
  { column: -1, row: 0 },
  { column: 1, row: 0 }
];

/**
 * An M×N sliding puzzle such as the 15-puzzle: one blank cell, and a move swaps
 * the blank with an orthogonally adjacent tile. Solved when `from` matches `to`.
 */
export class MnPuzzle implements PuzzleState<MnPuzzle> {
  public get columns(): number {
    return ensureNonNullable(this.from[0]).length;
  }

  public get rows(): number {
    return this.from.length;
  }

  public readonly key: string;
  public readonly kind = 'mn';

  private constructor(
    public readonly from: Grid<string>,
    public readonly to: Grid<string>,
    private readonly blank: Position
  ) {
    this.key = `${JSON.stringify(from)}|${JSON.stringify(to)}`;
  }

  public static create(from: Grid<string>, to: Grid<string>): MnPuzzle {
    const rows = from.length;
    const columns = from[0]?.length ?? 0;
    if (rows === 0 || columns === 0) {
      throw new MalformedInputError('mn: grid must not be empty');
    }
    for (const [label, grid] of [['from', from], ['to', to]] as const) {
      if (grid.length !== rows || grid.some((row) => row.length !== columns)) {
        throw new MalformedInputError(`mn: ${label} grid must be ${String(rows)}x${String(columns)}`);
      }
    }

    const fromSymbols = from.flat();
    const toSymbols = to.flat();
    for (const [label, symbols] of [['from', fromSymbols], ['to', toSymbols]] as const) {
      const blankCount = symbols.filter((symbol) => symbol === BLANK).length;
      if (blankCount !== 1) {
        throw new MalformedInputError(`mn: ${label} grid must contain exactly one blank '${BLANK}', found ${String(blankCount)}`);
      }
    }
    if ([...fromSymbols].sort().join('\n') !== [...toSymbols].sort().join('\n')) {
      throw new MalformedInputError('mn: from and to grids must hold the same tiles');
    }

    const blankIndex = fromSymbols.indexOf(BLANK);
    return new MnPuzzle(from, to, { column: blankIndex % columns, row: Math.floor(blankIndex / columns) });
  }

  /**
   * Builds a puzzle from flat row-major tile orders where `0` is the blank.
   */
  public static fromTileOrder(rows: number, columns: number, from: readonly number[], to: readonly number[]): MnPuzzle {
    if (!Number.isInteger(rows) || !Number.isInteger(columns) || rows < 1 || columns < 1) {
      throw new MalformedInputError(`mn: invalid dimensions ${String(rows)}x${String(columns)}`);
    }
    return MnPuzzle.create(toTileGrid(rows, columns, from, 'from'), toTileGrid(rows, columns, to, 'to'));
  }

  public static parse(fromRows: readonly string[], toRows: readonly string[]): MnPuzzle {
    return MnPuzzle.create(parseTokenGrid(fromRows, 'mn from'), parseTokenGrid(toRows, 'mn to'));
  }

  public equals(other: MnPuzzle): boolean {
    return this.key === other.key;
  }

  public *extensions(): Generator<MnPuzzle> {
    for (const move of BLANK_MOVES) {
      const target = { column: this.blank.column + move.column, row: this.blank.row + move.row };
      if (target.row < 0 || target.row >= this.rows || target.column < 0 || target.column >= this.columns) {
        continue;
      }
      const next = this.from.map((row) => [...row]);
      const tile = ensureNonNullable(next[target.row])[target.column];
      ensureNonNullable(next[this.blank.row])[this.blank.column] = ensureNonNullable(tile);
      ensureNonNullable(next[target.row])[target.column] = BLANK;
      yield new MnPuzzle(next, this.to, target);
    }
  }

  /**
   * Every move swaps two cells and moves the blank by one, so the parity of the
   * permutation taking `from` to `to` always matches the parity of the blank's
   * taxicab distance to its target cell. Only checked when tiles are distinct.
   */
  public failFast(): boolean {
    const fromSymbols = this.from.flat();
    const targetIndexBySymbol = new Map<string, number>();
    for (const [index, symbol] of this.to.flat().entries()) {
      targetIndexBySymbol.set(symbol, index);
    }
    if (targetIndexBySymbol.size !== fromSymbols.length) {
      return false;
    }

    const permutation = fromSymbols.map((symbol) => ensureNonNullable(targetIndexBySymbol.get(symbol)));
    const targetBlankIndex = ensureNonNullable(targetIndexBySymbol.get(BLANK));
    const blankDistance = Math.abs(Math.floor(targetBlankIndex / this.columns) - this.blank.row)
      + Math.abs(targetBlankIndex % this.columns - this.blank.column);
    return getPermutationParity(permutation) !== blankDistance % PARITY_MODULUS;
  }

  public isSolved(): boolean {
    return JSON.stringify(this.from) === JSON.stringify(this.to);
  }

  public toString(): string {
    return `${formatGrid(this.from, ' ')}\n----->\n${formatGrid(this.to, ' ')}`;
  }
}

function getPermutationParity(permutation: readonly number[]): number {
  const seen = new Array<boolean>(permutation.length).fill(false);
  let cycles = 0;
  for (let start = 0; start < permutation.length; start++) {
    if (seen[start] === true) {
      continue;
    }
    cycles++;
    let index = start;
    while (seen[index] !== true) {
      seen[index] = true;
      index = ensureNonNullable(permutation[index]);
    }
  }
  return (permutation.length - cycles) % PARITY_MODULUS;
}

function toTileGrid(rows: number, columns: number, order: readonly number[], label: string): string[][] {
  if (order.length !== rows * columns) {
    throw new MalformedInputError(`mn: ${label} has ${String(order.length)} tiles, expected ${String(rows * columns)}`);
  }
  if (order.some((tile) => !Number.isInteger(tile) || tile < 0)) {
    throw new MalformedInputError(`mn: ${label} tiles must be non-negative integers`);
  }
  const symbols = order.map((tile) => tile === 0 ? BLANK : String(tile));
  return Array.from({ length: rows }, (_, row) => symbols.slice(row * columns, (row + 1) * columns));
}

import type { Grid } from '../parsers.ts';
import type { PuzzleState } from '../PuzzleState.ts';

import { MalformedInputError } from '../MalformedInputError.ts';
import { parseCharGrid } from '../parsers.ts';
import { ensureNonNullable } from '../typeGuards.ts';

export const EMPTY = 0;
const EMPTY_MARKERS = '.0';
const MAX_SIZE = 9;

/**
 * An n×n Sudoku where n is a perfect square (4×4 and 9×9 in practice). A move
 * fills the first empty cell, in row-major order, with a digit its row, column
 * and box do not already hold.
 */
export class SudokuPuzzle implements PuzzleState<SudokuPuzzle> {
  public readonly boxSize: number;
  public readonly key: string;
  public readonly kind = 'sudoku';
  public readonly size: number;

  private constructor(public readonly cells: Grid<number>) {
    this.size = cells.length;
    this.boxSize = Math.sqrt(this.size);
    this.key = cells.map((row) => row.join('')).join('/');
  }

  public static create(cells: Grid<number>): SudokuPuzzle {
    const size = cells.length;
    const boxSize = Math.sqrt(size);
    if (size === 0 || size > MAX_SIZE || !Number.isInteger(boxSize)) {
      throw new MalformedInputError(`sudoku: grid size must be 1, 4 or 9, got ${String(size)}`);
    }
    for (const [rowIndex, row] of cells.entries()) {
      if (row.length !== size) {
        throw new MalformedInputError(`sudoku: row ${String(rowIndex + 1)} has ${String(row.length)} cells, expected ${String(size)}`);
      }
      const invalid = row.find((value) => !Number.isInteger(value) || value < EMPTY || value > size);
      if (invalid !== undefined) {
        throw new MalformedInputError(`sudoku: value ${String(invalid)} in row ${String(rowIndex + 1)} is outside 1-${String(size)}`);
      }
    }
    return new SudokuPuzzle(cells.map((row) => [...row]));
  }

  /**
   * Parses rows of digits where `.` or `0` marks an empty cell.
   */
  public static parse(rows: readonly string[]): SudokuPuzzle {
    const grid = parseCharGrid(rows, `${EMPTY_MARKERS}123456789`, 'sudoku');
    return SudokuPuzzle.create(grid.map((row) => row.map((ch) => EMPTY_MARKERS.includes(ch) ? EMPTY : Number(ch))));
  }

  public equals(other: SudokuPuzzle): boolean {
    return this.key === other.key;
  }

  public *extensions(): Generator<SudokuPuzzle> {
    const target = this.findFirstEmpty();
    if (target === null) {
      return;
    }
    const { column, row } = target;
    for (const digit of this.getCandidates(row, column)) {
      const next = this.cells.map((cells) => [...cells]);
      ensureNonNullable(next[row])[column] = digit;
      yield new SudokuPuzzle(next);
    }
  }

  public failFast(): boolean {
    if (this.hasDuplicate()) {
      return true;
    }
    for (const [row, cells] of this.cells.entries()) {
      for (const [column, value] of cells.entries()) {
        if (value === EMPTY && this.getCandidates(row, column).length === 0) {
          return true;
        }
      }
    }
    return false;
  }

  public isSolved(): boolean {
    return this.findFirstEmpty() === null && !this.hasDuplicate();
  }

  public toString(): string {
    return this.cells.map((row) => row.map((value) => value === EMPTY ? '.' : String(value)).join('')).join('\n');
  }

  private findFirstEmpty(): null | { column: number; row: number } {
    for (const [row, cells] of this.cells.entries()) {
      const column = cells.indexOf(EMPTY);
      if (column !== -1) {
        return { column, row };
      }
    }
    return null;
  }

  private getBox(row: number, column: number): number[] {
    const top = row - row % this.boxSize;
    const left = column - column % this.boxSize;
    const values: number[] = [];
    for (let r = top; r < top + this.boxSize; r++) {
      for (let c = left; c < left + this.boxSize; c++) {
        values.push(ensureNonNullable(this.cells[r]?.[c]));
      }
    }
    return values;
  }

  private getCandidates(row: number, column: number): number[] {
    const used = new Set([
      ...ensureNonNullable(this.cells[row]),
      ...this.cells.map((cells) => ensureNonNullable(cells[column])),
      ...this.getBox(row, column)
    ]);
    const candidates: number[] = [];
    for (let digit = 1; digit <= this.size; digit++) {
      if (!used.has(digit)) {
        candidates.push(digit);
      }
    }
    return candidates;
  }

  private *getHouses(): Generator<number[]> {
    for (let index = 0; index < this.size; index++) {
      yield [...ensureNonNullable(this.cells[index])];
      yield this.cells.map((cells) => ensureNonNullable(cells[index]));
      yield this.getBox(Math.floor(index / this.boxSize) * this.boxSize, index % this.boxSize * this.boxSize);
    }
  }

  private hasDuplicate(): boolean {
    for (const house of this.getHouses()) {
      const filled = house.filter((value) => value !== EMPTY);
      if (new Set(filled).size !== filled.length) {
        return true;
      }
    }
    return false;
  }
}

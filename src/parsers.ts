import { MalformedInputError } from './MalformedInputError.ts';
import { ensureNonNullable } from './typeGuards.ts';

export type Grid<T> = readonly (readonly T[])[];

export function formatGrid<T>(grid: Grid<T>, separator = ''): string {
  return grid.map((row) => row.map(String).join(separator)).join('\n');
}

/**
 * Splits each row into single characters. Every character must be one of
 * `allowed` and every row must have the same length.
 */
export function parseCharGrid(rows: readonly string[], allowed: string, label: string): string[][] {
  const grid = rows.map((row) => Array.from(row.trim()));
  assertRectangular(grid, label);
  for (const [rowIndex, row] of grid.entries()) {
    for (const ch of row) {
      if (!allowed.includes(ch)) {
        throw new MalformedInputError(`${label}: illegal character '${ch}' in row ${String(rowIndex + 1)}`);
      }
    }
  }
  return grid;
}

/**
 * Splits each row on whitespace, for grids whose symbols may be longer than one
 * character (such as the tiles of a 15-puzzle).
 */
export function parseTokenGrid(rows: readonly string[], label: string): string[][] {
  const grid = rows.map((row) => row.trim().split(/\s+/).filter((token) => token.length > 0));
  assertRectangular(grid, label);
  return grid;
}

export function parseWordList(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0).map((word) => word.toLowerCase());
}

function assertRectangular(grid: Grid<string>, label: string): void {
  const firstRow = grid[0];
  if (firstRow === undefined || firstRow.length === 0) {
    throw new MalformedInputError(`${label}: grid must have at least one non-empty row`);
  }
  for (let rowIndex = 1; rowIndex < grid.length; rowIndex++) {
    const row = ensureNonNullable(grid[rowIndex]);
    if (row.length !== firstRow.length) {
      throw new MalformedInputError(
        `${label}: row ${String(rowIndex + 1)} has ${String(row.length)} cells, expected ${String(firstRow.length)}`
      );
    }
  }
}

import {
  describe,
  expect,
  it
} from 'vitest';

import { PegSolitairePuzzle } from '../../src/puzzles/PegSolitairePuzzle.ts';
import { BreadthFirstSolver } from '../../src/search/BreadthFirstSolver.ts';
import { DepthFirstSolver } from '../../src/search/DepthFirstSolver.ts';
import { isConnectedPath } from '../puzzleTestHelper.ts';

describe('PegSolitairePuzzle', () => {
  describe('parse', () => {
    it('renders the board it was parsed from', () => {
      const puzzle = PegSolitairePuzzle.parse(['#**#', '*.**', '#**#']);

      expect(puzzle.toString()).toBe('#**#\n*.**\n#**#');
      expect(puzzle.pegCount).toBe(7);
    });

    it('rejects unknown markers', () => {
      expect(() => PegSolitairePuzzle.parse(['*x'])).toThrow("peg-solitaire: illegal character 'x' in row 1");
    });

    it('rejects ragged boards', () => {
      expect(() => PegSolitairePuzzle.parse(['**', '*'])).toThrow('peg-solitaire: row 2 has 1 cells, expected 2');
    });

    it('rejects an empty board', () => {
      expect(() => PegSolitairePuzzle.create([])).toThrow('peg-solitaire: board must not be empty');
    });
  });

  describe('extensions', () => {
    it('jumps a peg over a neighbour into a hole', () => {
      const puzzle = PegSolitairePuzzle.parse(['**.']);

      expect([...puzzle.extensions()].map(String)).toEqual(['..*']);
    });

    it('jumps vertically', () => {
      const puzzle = PegSolitairePuzzle.parse(['*', '*', '.']);

      expect([...puzzle.extensions()].map(String)).toEqual(['.\n.\n*']);
    });

    it('lists every jump into every hole', () => {
      const puzzle = PegSolitairePuzzle.parse(['**.**']);

      expect([...puzzle.extensions()].map(String)).toEqual(['..***', '***..']);
    });

    it('never jumps over an unused cell', () => {
      expect([...PegSolitairePuzzle.parse(['*#.']).extensions()]).toEqual([]);
    });
  });

  describe('key', () => {
    it('is shared by mirror images', () => {
      const left = PegSolitairePuzzle.parse(['..***']);
      const right = PegSolitairePuzzle.parse(['***..']);

      expect(left.equals(right)).toBe(true);
    });

    it('is shared by transposed square boards', () => {
      const column = PegSolitairePuzzle.parse(['*.', '*.']);
      const row = PegSolitairePuzzle.parse(['**', '..']);

      expect(column.key).toBe(row.key);
    });

    it('differs for boards with different layouts', () => {
      expect(PegSolitairePuzzle.parse(['**.*']).equals(PegSolitairePuzzle.parse(['*.**.']))).toBe(false);
      expect(PegSolitairePuzzle.parse(['*..']).equals(PegSolitairePuzzle.parse(['.*.']))).toBe(false);
    });
  });

  describe('failFast', () => {
    it('fails when no jump is left and several pegs remain', () => {
      expect(PegSolitairePuzzle.parse(['*.*']).failFast()).toBe(true);
    });

    it('fails when pegs sit in disconnected regions', () => {
      expect(PegSolitairePuzzle.parse(['*#**.']).failFast()).toBe(true);
    });

    it('passes a board with a jump and a single region', () => {
      expect(PegSolitairePuzzle.parse(['**.*']).failFast()).toBe(false);
    });

    it('passes boards with at most one peg', () => {
      expect(PegSolitairePuzzle.parse(['...']).failFast()).toBe(false);
      expect(PegSolitairePuzzle.parse(['.*.']).failFast()).toBe(false);
    });
  });

  it('is solved with exactly one peg', () => {
    expect(PegSolitairePuzzle.parse(['.*.']).isSolved()).toBe(true);
    expect(PegSolitairePuzzle.parse(['...']).isSolved()).toBe(false);
    expect(PegSolitairePuzzle.parse(['**.']).isSolved()).toBe(false);
  });

  describe('solving', () => {
    it('clears a line of pegs breadth-first', () => {
      const path = new BreadthFirstSolver().solve(PegSolitairePuzzle.parse(['**.*']));

      expect(path?.map(String)).toEqual(['**.*', '..**', '.*..']);
    });

    it('finds a connected solution depth-first on a square board', () => {
      const initial = PegSolitairePuzzle.parse([
        '....',
        '....',
        '..**',
        '..**'
      ]);

      const path = new DepthFirstSolver().solve(initial);

      expect(path).not.toBeNull();
      expect(path?.at(-1)?.pegCount).toBe(1);
      expect(path?.length).toBe(initial.pegCount);
      expect(isConnectedPath(path ?? [])).toBe(true);
    });

    it('reports no solution for a stuck board', () => {
      const initial = PegSolitairePuzzle.parse(['***.']);

      expect(new BreadthFirstSolver().solve(initial)).toBeNull();
      expect(new DepthFirstSolver().solve(initial)).toBeNull();
    });
  });
});

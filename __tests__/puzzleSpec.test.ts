import { fileURLToPath } from 'node:url';
import {
  describe,
  expect,
  it
} from 'vitest';

import { MalformedInputError } from '../src/MalformedInputError.ts';
import {
  loadPuzzleSpec,
  parsePuzzleSpec
} from '../src/puzzleSpec.ts';

function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

describe('parsePuzzleSpec', () => {
  it('builds a word ladder from inline words', () => {
    const spec = parsePuzzleSpec({ from: 'Cat', kind: 'word-ladder', to: 'dog', words: ['cat', 'COT', 'cog', 'dog'] });

    expect(spec.puzzle.kind).toBe('word-ladder');
    expect(spec.puzzle.key).toBe('cat->dog');
    expect(spec.solvers).toEqual(['bfs', 'dfs']);
    expect(spec.title).toBe('word-ladder');
  });

  it('uses the provided name when the document has no title', () => {
    const spec = parsePuzzleSpec({ grid: ['1234', '3412', '2143', '4321'], kind: 'sudoku' }, { name: 'solved' });

    expect(spec.title).toBe('solved');
    expect(spec.puzzle.isSolved()).toBe(true);
  });

  it('accepts a single solver name', () => {
    const spec = parsePuzzleSpec({ board: ['**.'], kind: 'peg-solitaire', solvers: 'DFS' });

    expect(spec.solvers).toEqual(['dfs']);
  });

  it('builds an MN puzzle from numeric tile orders', () => {
    const spec = parsePuzzleSpec({ columns: 2, from: [1, 0, 2, 3], kind: 'mn', rows: 2, to: [0, 1, 2, 3] });

    expect(spec.puzzle.toString()).toBe('1 *\n2 3\n----->\n* 1\n2 3');
  });

  it('rejects documents that are not mappings', () => {
    expect(() => parsePuzzleSpec(['kind', 'sudoku'])).toThrow('Puzzle spec must be a mapping');
    expect(() => parsePuzzleSpec(null)).toThrow(MalformedInputError);
  });

  it('rejects unknown puzzle kinds', () => {
    expect(() => parsePuzzleSpec({ kind: 'chess' })).toThrow('kind must be one of: mn, peg-solitaire, sudoku, word-ladder');
  });

  it('rejects a missing kind', () => {
    expect(() => parsePuzzleSpec({ title: 'x' })).toThrow('kind is required');
  });

  it('rejects unknown solvers', () => {
    expect(() => parsePuzzleSpec({ board: ['**.'], kind: 'peg-solitaire', solvers: ['bfs', 'astar'] }))
      .toThrow('Unknown solver: astar. Expected one of: bfs, dfs');
  });

  it('rejects grids given as anything but a list of strings', () => {
    expect(() => parsePuzzleSpec({ grid: [1234, 3412], kind: 'sudoku' })).toThrow('grid must be a non-empty list of strings');
  });

  it('rejects numeric tile orders without dimensions', () => {
    expect(() => parsePuzzleSpec({ from: [1, 0], kind: 'mn', to: [0, 1] })).toThrow('rows must be a number');
  });

  it('rejects a words file when no reader is available', () => {
    expect(() => parsePuzzleSpec({ from: 'cat', kind: 'word-ladder', to: 'dog', wordsFile: 'words.txt' }))
      .toThrow('wordsFile is not supported here; list the words under words');
  });

  it('reads a words file through the provided reader', () => {
    const spec = parsePuzzleSpec(
      { from: 'cat', kind: 'word-ladder', to: 'dog', wordsFile: 'words.txt' },
      { readWordList: (path) => path === 'words.txt' ? ['cat', 'dog'] : [] }
    );

    expect(spec.puzzle.failFast()).toBe(false);
  });
});

describe('loadPuzzleSpec', () => {
  it('loads a word ladder with inline words', () => {
    const spec = loadPuzzleSpec(fixturePath('catToDog.yaml'));

    expect(spec.title).toBe('Cat to dog');
    expect(spec.puzzle.toString()).toBe('cat -> dog');
  });

  it('resolves a words file next to the spec', () => {
    const spec = loadPuzzleSpec(fixturePath('coldToWarm.yaml'));

    expect(spec.title).toBe('coldToWarm');
    expect(spec.solvers).toEqual(['bfs']);
    expect([...spec.puzzle.extensions()].map(String)).toEqual(['cord -> warm']);
  });

  it('loads numeric MN tile orders', () => {
    const spec = loadPuzzleSpec(fixturePath('twoByTwo.yaml'));

    expect(spec.puzzle.toString()).toBe('2 1\n3 *\n----->\n* 1\n2 3');
  });

  it('loads MN rows and the solver order', () => {
    const spec = loadPuzzleSpec(fixturePath('twoByThree.yaml'));

    expect(spec.solvers).toEqual(['dfs', 'bfs']);
    expect(spec.puzzle.toString()).toBe('* 2 3\n1 4 5\n----->\n1 2 3\n4 5 *');
  });

  it('loads peg solitaire and sudoku boards', () => {
    expect(loadPuzzleSpec(fixturePath('squarePegs.yaml')).puzzle.toString()).toBe('....\n....\n..**\n..**');
    expect(loadPuzzleSpec(fixturePath('nearlySolved.yaml')).puzzle.toString()).toBe('12.4\n34..\n2143\n.321');
  });
});

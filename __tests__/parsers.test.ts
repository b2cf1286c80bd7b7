import {
  describe,
  expect,
  it
} from 'vitest';

import { MalformedInputError } from '../src/MalformedInputError.ts';
import {
  formatGrid,
  parseCharGrid,
  parseTokenGrid,
  parseWordList
} from '../src/parsers.ts';

describe('parseCharGrid', () => {
  it('splits trimmed rows into characters', () => {
    expect(parseCharGrid([' *.# ', '.**'], '*.#', 'board')).toEqual([['*', '.', '#'], ['.', '*', '*']]);
  });

  it('rejects characters outside the allowed set', () => {
    expect(() => parseCharGrid(['*.', '*?'], '*.', 'board')).toThrow("board: illegal character '?' in row 2");
  });

  it('rejects an empty grid', () => {
    expect(() => parseCharGrid([], '*.', 'board')).toThrow('board: grid must have at least one non-empty row');
    expect(() => parseCharGrid([''], '*.', 'board')).toThrow(MalformedInputError);
  });
});

describe('parseTokenGrid', () => {
  it('splits rows on any whitespace', () => {
    expect(parseTokenGrid(['10  11 *', ' 1\t2 3'], 'tiles')).toEqual([['10', '11', '*'], ['1', '2', '3']]);
  });

  it('rejects rows of different lengths', () => {
    expect(() => parseTokenGrid(['1 2 3', '4 *'], 'tiles')).toThrow('tiles: row 2 has 2 cells, expected 3');
  });
});

describe('parseWordList', () => {
  it('splits on whitespace and lowercases', () => {
    expect(parseWordList('Cat cot\n\ncog\r\nDOG ')).toEqual(['cat', 'cot', 'cog', 'dog']);
  });

  it('returns an empty list for blank text', () => {
    expect(parseWordList(' \n ')).toEqual([]);
  });
});

describe('formatGrid', () => {
  it('joins cells with the separator and rows with newlines', () => {
    expect(formatGrid([[1, 2], [3, 4]])).toBe('12\n34');
    expect(formatGrid([['10', '*'], ['1', '2']], ' ')).toBe('10 *\n1 2');
  });
});

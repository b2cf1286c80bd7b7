import type { Puzzle } from './puzzles/Puzzle.ts';
import type { SolverName } from './search/Solver.ts';

import yaml from 'js-yaml';
import { readFileSync } from 'node:fs';
import {
  basename,
  dirname,
  extname,
  resolve
} from 'node:path';

import { MalformedInputError } from './MalformedInputError.ts';
import { parseWordList } from './parsers.ts';
import { MnPuzzle } from './puzzles/MnPuzzle.ts';
import { PegSolitairePuzzle } from './puzzles/PegSolitairePuzzle.ts';
import {
  isPuzzleKind,
  PUZZLE_KINDS
} from './puzzles/Puzzle.ts';
import { SudokuPuzzle } from './puzzles/SudokuPuzzle.ts';
import { WordLadderPuzzle } from './puzzles/WordLadderPuzzle.ts';
import {
  isSolverName,
  SOLVER_NAMES
} from './search/createDefaultSolvers.ts';
import {
  isRecord,
  isStringArray
} from './typeGuards.ts';

export interface ParsePuzzleSpecOptions {
  /** Used as the title when the document has none. */
  readonly name?: string;
  /** Resolves a `wordsFile` entry; without it `wordsFile` is rejected. */
  readonly readWordList?: (path: string) => string[];
}

export interface PuzzleSpec {
  readonly puzzle: Puzzle;
  readonly solvers: readonly SolverName[];
  readonly title: string;
}

export function loadPuzzleSpec(specPath: string): PuzzleSpec {
  const content = readFileSync(specPath, 'utf-8');
  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error: unknown) {
    throw new MalformedInputError(`${specPath}: invalid YAML`, { cause: error });
  }

  const specDir = dirname(specPath);
  return parsePuzzleSpec(document, {
    name: basename(specPath, extname(specPath)),
    readWordList: (path) => parseWordList(readFileSync(resolve(specDir, path), 'utf-8'))
  });
}

export function parsePuzzleSpec(document: unknown, options: ParsePuzzleSpecOptions = {}): PuzzleSpec {
  if (!isRecord(document)) {
    throw new MalformedInputError('Puzzle spec must be a mapping');
  }

  const kind = requireString(document, 'kind');
  if (!isPuzzleKind(kind)) {
    throw new MalformedInputError(`kind must be one of: ${PUZZLE_KINDS.join(', ')}`);
  }

  const title = optionalString(document, 'title')?.trim() ?? '';
  return {
    puzzle: buildPuzzle(document, kind, options),
    solvers: parseSolvers(document['solvers']),
    title: title || (options.name ?? kind)
  };
}

function buildMnPuzzle(document: Record<string, unknown>): MnPuzzle {
  const from = document['from'];
  const to = document['to'];
  if (isNumberArray(from) && isNumberArray(to)) {
    return MnPuzzle.fromTileOrder(requireNumber(document, 'rows'), requireNumber(document, 'columns'), from, to);
  }
  return MnPuzzle.parse(requireStringArray(document, 'from'), requireStringArray(document, 'to'));
}

function buildPuzzle(document: Record<string, unknown>, kind: Puzzle['kind'], options: ParsePuzzleSpecOptions): Puzzle {
  switch (kind) {
    case 'mn':
      return buildMnPuzzle(document);
    case 'peg-solitaire':
      return PegSolitairePuzzle.parse(requireStringArray(document, 'board'));
    case 'sudoku':
      return SudokuPuzzle.parse(requireStringArray(document, 'grid'));
    case 'word-ladder':
      return buildWordLadderPuzzle(document, options);
    default:
      throw new MalformedInputError(`Unsupported puzzle kind: ${String(kind)}`);
  }
}

function buildWordLadderPuzzle(document: Record<string, unknown>, options: ParsePuzzleSpecOptions): WordLadderPuzzle {
  const from = requireString(document, 'from').trim().toLowerCase();
  const to = requireString(document, 'to').trim().toLowerCase();

  const wordsFile = optionalString(document, 'wordsFile');
  let words: string[];
  if (wordsFile !== undefined) {
    if (options.readWordList === undefined) {
      throw new MalformedInputError('wordsFile is not supported here; list the words under words');
    }
    words = options.readWordList(wordsFile);
  } else {
    words = requireStringArray(document, 'words').map((word) => word.trim().toLowerCase());
  }
  return WordLadderPuzzle.create(from, to, words);
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'number');
}

function optionalString(document: Record<string, unknown>, field: string): string | undefined {
  const value = document[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new MalformedInputError(`${field} must be a string`);
  }
  return value;
}

function parseSolvers(value: unknown): SolverName[] {
  if (value === undefined || value === null) {
    return [...SOLVER_NAMES];
  }
  const names = typeof value === 'string' ? [value] : value;
  if (!isStringArray(names) || names.length === 0) {
    throw new MalformedInputError('solvers must be a solver name or a non-empty list of them');
  }
  return names.map((name) => {
    const normalized = name.trim().toLowerCase();
    if (!isSolverName(normalized)) {
      throw new MalformedInputError(`Unknown solver: ${name}. Expected one of: ${SOLVER_NAMES.join(', ')}`);
    }
    return normalized;
  });
}

function requireNumber(document: Record<string, unknown>, field: string): number {
  const value = document[field];
  if (typeof value !== 'number') {
    throw new MalformedInputError(`${field} must be a number`);
  }
  return value;
}

function requireString(document: Record<string, unknown>, field: string): string {
  const value = optionalString(document, field);
  if (value === undefined) {
    throw new MalformedInputError(`${field} is required`);
  }
  return value;
}

function requireStringArray(document: Record<string, unknown>, field: string): string[] {
  const value = document[field];
  if (!isStringArray(value) || value.length === 0) {
    throw new MalformedInputError(`${field} must be a non-empty list of strings`);
  }
  return value;
}

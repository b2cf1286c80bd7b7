import type { PuzzleState } from '../PuzzleState.ts';

import { MalformedInputError } from '../MalformedInputError.ts';

const ALPHABET = 'abcdefghijklmnopqrstuvwxyz';
const WORD_PATTERN = /^[a-z]+$/;

/**
 * Step from one word to another, changing a single letter per move and
 * staying inside the word set.
 *
 * All states of one ladder share the word set validated by {@link create}.
 */
export class WordLadderPuzzle implements PuzzleState<WordLadderPuzzle> {
  public readonly key: string;
  public readonly kind = 'word-ladder';

  private constructor(
    public readonly from: string,
    public readonly to: string,
    private readonly words: ReadonlySet<string>
  ) {
    this.key = `${from}->${to}`;
  }

  public static create(from: string, to: string, words: Iterable<string>): WordLadderPuzzle {
    assertWord(from, 'from');
    assertWord(to, 'to');
    const wordSet = new Set<string>();
    for (const word of words) {
      assertWord(word, 'words');
      wordSet.add(word);
    }
    return new WordLadderPuzzle(from, to, wordSet);
  }

  public equals(other: WordLadderPuzzle): boolean {
    return this.key === other.key;
  }

  public *extensions(): Generator<WordLadderPuzzle> {
    for (let i = 0; i < this.from.length; i++) {
      for (const letter of ALPHABET) {
        const candidate = this.from.slice(0, i) + letter + this.from.slice(i + 1);
        if (candidate !== this.from && this.words.has(candidate)) {
          yield new WordLadderPuzzle(candidate, this.to, this.words);
        }
      }
    }
  }

  public failFast(): boolean {
    if (this.from.length !== this.to.length) {
      return true;
    }
    return this.from !== this.to && !this.words.has(this.to);
  }

  public isSolved(): boolean {
    return this.from === this.to;
  }

  public toString(): string {
    return `${this.from} -> ${this.to}`;
  }
}

function assertWord(word: string, label: string): void {
  if (!WORD_PATTERN.test(word)) {
    throw new MalformedInputError(`${label}: expected lowercase letters a-z, got '${word}'`);
  }
}

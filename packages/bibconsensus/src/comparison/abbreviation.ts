/**
 * Abbreviation and Acronym Tests
 *
 * Both tests work on folded keys (lowercase, single-spaced, no punctuation).
 *
 *   isAbbreviation('proc acm', 'proceedings of the association for computer machinery') // true
 *   isAbbreviation('jr', 'junior')                                                      // false
 *   isAcronymOf('ieee', 'institute of electrical and electronics engineers')           // true
 */

import { STOP_WORDS, tokenize } from '../normalization/text.js';

/**
 * Whether `position` starts a word of `text`
 */
function isWordStart(text: string, position: number): boolean {
  return position === 0 || text[position - 1] === ' ';
}

/**
 * Token-subsequence abbreviation test
 *
 * The first short token starts at the beginning of the long text. Every
 * further letter of a short token either continues the current word or starts
 * a later word; every further short token starts at a later word.
 *
 * @param minLetters - minimum number of letters on the short side
 */
export function isAbbreviation(short: string, long: string, minLetters = 2): boolean {
  const tokens = tokenize(short);
  if (tokens.join('').length < minLetters || long.length === 0) return false;

  const failed = new Set<string>();

  const placeAt = (token: number, letter: number, position: number): boolean => {
    const memoKey = `${token}:${letter}:${position}`;
    if (failed.has(memoKey)) return false;
    if (long[position] !== tokens[token][letter]) {
      failed.add(memoKey);
      return false;
    }

    let placed: boolean;
    if (letter + 1 < tokens[token].length) {
      placed = placeAt(token, letter + 1, position + 1) || placeAtLaterWord(token, letter + 1, position);
    } else if (token + 1 < tokens.length) {
      placed = placeAtLaterWord(token + 1, 0, position);
    } else {
      placed = true;
    }

    if (!placed) failed.add(memoKey);
    return placed;
  };

  const placeAtLaterWord = (token: number, letter: number, after: number): boolean => {
    for (let position = after + 2; position < long.length; position++) {
      if (isWordStart(long, position) && placeAt(token, letter, position)) return true;
    }
    return false;
  };

  return placeAt(0, 0, 0);
}

function initials(tokens: readonly string[]): string {
  return tokens.map((token) => token[0]).join('');
}

/**
 * Whether the compact form of `short` equals the word-initial letters of
 * `long`, counted with and without stop words
 */
export function isAcronymOf(short: string, long: string): boolean {
  const compact = tokenize(short).join('');
  const words = tokenize(long);
  if (compact.length < 2 || words.length < 2) return false;

  const significant = words.filter((word) => !STOP_WORDS.has(word));
  return compact === initials(words) || (significant.length >= 2 && compact === initials(significant));
}

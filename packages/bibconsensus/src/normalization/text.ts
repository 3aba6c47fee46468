/**
 * Text Folding
 *
 * Canonicalizes free text for comparison: LaTeX accents and braces removed,
 * diacritics stripped, case folded, punctuation collapsed to single spaces.
 *
 * PHILOSOPHY:
 * - Deterministic (same input → same key)
 * - Folding is for comparison only; stored text keeps its accents
 */

import type { NormalizedText } from '../core/types/index.js';

/**
 * LaTeX accent commands: symbol accents (\' \" \^ ...) and single-letter
 * accents (\c \v \u \H \k \r \d \b) not followed by another letter
 */
const LATEX_ACCENT = /\\(?:[`'^"~=.]|[cvuHkrdb](?![A-Za-z]))\s*/g;

/**
 * Words ignored when building acronyms
 */
export const STOP_WORDS: ReadonlySet<string> = new Set([
  'a',
  'an',
  'and',
  'at',
  'de',
  'der',
  'des',
  'di',
  'du',
  'for',
  'in',
  'la',
  'le',
  'of',
  'on',
  'the',
  'to',
  'und',
  'von',
]);

/**
 * Replace accented characters with their base letter
 */
export function stripAccents(value: string): string {
  return value.normalize('NFD').replace(/\p{M}/gu, '');
}

/**
 * Remove LaTeX accent commands and grouping braces ("G{\"o}del" → "Godel")
 */
export function stripLatex(value: string): string {
  return value.replace(LATEX_ACCENT, '').replace(/[{}]/g, '');
}

/**
 * Trim and collapse internal whitespace
 */
export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Fold text to its comparison key
 *
 * @example
 * foldText('  Proc. of the  ACM!') // 'proc of the acm'
 */
export function foldText(value: string): string {
  return stripAccents(stripLatex(value))
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

/**
 * Split a folded key into tokens
 */
export function tokenize(folded: string): string[] {
  return folded.split(' ').filter((token) => token.length > 0);
}

export function normalizeText(raw: string): NormalizedText {
  return {
    kind: 'text',
    raw,
    display: collapseWhitespace(raw),
    key: foldText(raw),
    valid: true,
  };
}

/**
 * Author / Editor Name Lists
 *
 * Tokenizer and recursive-descent parser for BibTeX-style name lists:
 *
 *   nameList := name ("and" name)*
 *   name     := words                       (First von Last [Jr])
 *             | words "," words             (von Last, First)
 *             | words "," words "," words   (von Last, Jr, First)
 *
 * Brace groups are single words and hide their inner "and"s and commas, so
 * "{Barnes and Noble}" stays one corporate author.
 */

import type { NormalizedNames, PersonName } from '../core/types/index.js';
import { collapseWhitespace, foldText } from './text.js';

// ============================================================================
// Tokens
// ============================================================================

export type NameToken =
  | { readonly type: 'word'; readonly text: string; readonly braced: boolean }
  | { readonly type: 'comma' }
  | { readonly type: 'and' };

/**
 * Lowercase forms of name particles kept as part of the last name
 */
const PARTICLES: ReadonlySet<string> = new Set([
  'ben',
  'bin',
  'da',
  'das',
  'de',
  'del',
  'della',
  'der',
  'di',
  'dos',
  'du',
  'la',
  'le',
  'ten',
  'ter',
  'van',
  'von',
]);

const SUFFIXES: ReadonlySet<string> = new Set(['jr', 'jr.', 'junior', 'sr', 'sr.', 'ii', 'iii', 'iv']);

const NUMERIC = /^\d+$/;

/**
 * Split a name list into words, commas and "and" separators
 */
export function tokenizeNames(input: string): NameToken[] {
  const tokens: NameToken[] = [];
  let current = '';
  let braced = false;
  let depth = 0;

  const flush = (): void => {
    if (current.length === 0) return;
    if (!braced && current.toLowerCase() === 'and') {
      tokens.push({ type: 'and' });
    } else {
      tokens.push({ type: 'word', text: current, braced });
    }
    current = '';
    braced = false;
  };

  for (const char of input) {
    if (char === '{') {
      if (depth === 0 && current.length === 0) braced = true;
      depth++;
      current += char;
    } else if (char === '}') {
      depth = Math.max(0, depth - 1);
      current += char;
    } else if (depth > 0) {
      current += char;
    } else if (char === ',') {
      flush();
      tokens.push({ type: 'comma' });
    } else if (/\s/.test(char) || char === '~') {
      flush();
    } else {
      // text after a closing brace ("{Mc}Donald") makes the word unprotected
      if (braced && current.endsWith('}')) braced = false;
      current += char;
    }
  }
  flush();
  return tokens;
}

// ============================================================================
// Parser
// ============================================================================

function startsLowercase(word: string): boolean {
  const first = word.replace(/^[{\\]+/, '')[0];
  return first !== undefined && /\p{Ll}/u.test(first);
}

function startsUppercase(word: string): boolean {
  const first = word.replace(/^[{\\]+/, '')[0];
  return first !== undefined && /\p{Lu}/u.test(first);
}

/**
 * Known particles count in any case ("Van Gogh"); other lowercase words count
 * only when the name is not written entirely in lowercase
 */
function isParticle(word: string, anyCase: boolean, caseAware: boolean): boolean {
  if (PARTICLES.has(word.toLowerCase())) {
    return anyCase || startsLowercase(word);
  }
  return caseAware && startsLowercase(word);
}

function dropDisambiguation(words: string[]): string[] {
  const kept = [...words];
  while (kept.length > 1 && NUMERIC.test(kept[kept.length - 1])) {
    kept.pop();
  }
  return kept;
}

/**
 * Put a space after initials: "J.R.R." → "J. R. R."
 */
function spaceInitials(first: string): string {
  return collapseWhitespace(first.replace(/\.(?=[^\s.-])/g, '. '));
}

function joinOrNull(words: readonly string[]): string | null {
  return words.length > 0 ? spaceInitials(words.join(' ')) : null;
}

class NameParser {
  private position = 0;

  constructor(private readonly tokens: readonly NameToken[]) {}

  parseList(): PersonName[] {
    const persons: PersonName[] = [];
    while (this.position < this.tokens.length) {
      const person = this.parseName();
      if (person !== null) persons.push(person);
      if (this.peek()?.type === 'and') this.position++;
    }
    return persons;
  }

  private peek(): NameToken | undefined {
    return this.tokens[this.position];
  }

  /**
   * Read comma-separated word groups up to the next "and"
   */
  private parseName(): PersonName | null {
    const parts: string[][] = [[]];
    for (let token = this.peek(); token !== undefined && token.type !== 'and'; token = this.peek()) {
      if (token.type === 'comma') {
        parts.push([]);
      } else {
        parts[parts.length - 1].push(token.text);
      }
      this.position++;
    }

    const groups = parts.filter((part, index) => index === 0 || part.length > 0);
    if (groups[0].length === 0) {
      // ", John" or an empty segment between two "and"s
      return null;
    }
    if (groups.length === 1) {
      return this.buildFirstLast(groups[0]);
    }
    if (groups.length === 2) {
      return this.buildLastFirst(groups[0], null, groups[1]);
    }
    return this.buildLastFirst(groups[0], groups[1], groups.slice(2).flat());
  }

  /**
   * "First von Last Jr"
   */
  private buildFirstLast(input: readonly string[]): PersonName {
    let words = dropDisambiguation([...input]);
    let suffix: string | null = null;
    if (words.length > 1 && SUFFIXES.has(words[words.length - 1].toLowerCase())) {
      suffix = words[words.length - 1];
      words = dropDisambiguation(words.slice(0, -1));
    }

    const caseAware = words.some(startsUppercase);
    let start = words.length - 1;
    // a capitalized particle in front is a first name ("Van Morrison")
    while (start > 0 && isParticle(words[start - 1], start > 1, caseAware)) {
      start--;
    }
    const lastWords = words.slice(start);
    return {
      last: lastWords.join(' '),
      first: joinOrNull(words.slice(0, start)),
      suffix,
      hasParticle: lastWords.length > 1 && isParticle(lastWords[0], true, caseAware),
    };
  }

  /**
   * "von Last, First" and "von Last, Jr, First"
   */
  private buildLastFirst(
    lastPart: readonly string[],
    suffixPart: readonly string[] | null,
    firstPart: readonly string[]
  ): PersonName {
    const lastWords = dropDisambiguation([...lastPart]);
    return {
      last: lastWords.join(' '),
      first: joinOrNull(firstPart),
      suffix: suffixPart !== null && suffixPart.length > 0 ? suffixPart.join(' ') : null,
      hasParticle: lastWords.length > 1 && isParticle(lastWords[0], true, true),
    };
  }
}

// ============================================================================
// Public API
// ============================================================================

export function parseNameList(input: string): PersonName[] {
  return new NameParser(tokenizeNames(input)).parseList();
}

/**
 * Render one person as "von Last, Jr, First"
 */
export function formatPerson(person: PersonName): string {
  if (person.suffix !== null) {
    return person.first !== null
      ? `${person.last}, ${person.suffix}, ${person.first}`
      : `${person.last}, ${person.suffix}`;
  }
  return person.first !== null ? `${person.last}, ${person.first}` : person.last;
}

export function formatNameList(persons: readonly PersonName[]): string {
  return persons.map(formatPerson).join(' and ');
}

export function normalizeNames(raw: string): NormalizedNames {
  const persons = parseNameList(raw);
  if (persons.length === 0) {
    return { kind: 'names', raw, display: collapseWhitespace(raw), key: foldText(raw), persons, valid: false };
  }
  const display = formatNameList(persons);
  return { kind: 'names', raw, display, key: foldText(display), persons, valid: true };
}

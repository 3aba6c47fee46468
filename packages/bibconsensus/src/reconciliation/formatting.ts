/**
 * Output Formatting
 *
 * Transforms applied to a winning value right before it is stored. Voting
 * always sees the unformatted values.
 */

import type { FormattingOptions } from '../core/types/index.js';

/**
 * A run of letters containing at least one uppercase letter
 */
const WORD_WITH_UPPERCASE = /(\p{Ll}*\p{Lu}+[\p{Ll}\p{Lu}]*)/gu;

/**
 * Combining marks and the LaTeX accent command producing them
 */
const ACCENT_COMMANDS: ReadonlyMap<string, string> = new Map([
  ['\u0300', '`'],
  ['\u0301', "'"],
  ['\u0302', '^'],
  ['\u0303', '~'],
  ['\u0304', '='],
  ['\u0306', 'u'],
  ['\u0307', '.'],
  ['\u0308', '"'],
  ['\u030a', 'r'],
  ['\u030b', 'H'],
  ['\u030c', 'v'],
  ['\u0323', 'd'],
  ['\u0327', 'c'],
  ['\u0328', 'k'],
]);

/**
 * Characters without a decomposition
 */
const SPECIAL_CHARACTERS: ReadonlyMap<string, string> = new Map([
  ['ß', '{\\ss}'],
  ['æ', '{\\ae}'],
  ['Æ', '{\\AE}'],
  ['œ', '{\\oe}'],
  ['Œ', '{\\OE}'],
  ['ø', '{\\o}'],
  ['Ø', '{\\O}'],
  ['ł', '{\\l}'],
  ['Ł', '{\\L}'],
  ['ı', '{\\i}'],
  ['–', '--'],
  ['—', '---'],
  ['‘', '`'],
  ['’', "'"],
  ['“', '``'],
  ['”', "''"],
  ['…', '{\\ldots}'],
  ['\u00a0', '~'],
]);

/**
 * Wrap every word holding an uppercase letter in braces so BibTeX styles keep
 * its case: "Graph Neural Networks on GPUs" → "{Graph} {Neural} {Networks} on {GPUs}"
 */
export function protectUppercase(value: string): string {
  return value.replace(WORD_WITH_UPPERCASE, '{$1}');
}

function escapeCharacter(char: string): string {
  const special = SPECIAL_CHARACTERS.get(char);
  if (special !== undefined) return special;

  const [base, ...marks] = char.normalize('NFD');
  if (base === undefined || marks.length !== 1 || !/^[A-Za-z]$/.test(base)) {
    return char;
  }
  const command = ACCENT_COMMANDS.get(marks[0]);
  if (command === undefined) return char;
  // letter commands need a space before the argument
  return /^[A-Za-z]$/.test(command) ? `{\\${command} ${base}}` : `{\\${command}${base}}`;
}

/**
 * Rewrite non-ASCII characters as LaTeX commands ("Gödel" → "G{\"o}del");
 * characters without a known command are kept as they are
 */
export function escapeUnicode(value: string): string {
  let escaped = '';
  for (const char of value.normalize('NFC')) {
    escaped += char.charCodeAt(0) < 0x80 ? char : escapeCharacter(char);
  }
  return escaped;
}

/**
 * Apply the configured output transforms to a winning value
 */
export function formatValue(field: string, value: string, formatting: FormattingOptions): string {
  let formatted = value;
  if (formatting.protectUppercase.has(field)) {
    formatted = protectUppercase(formatted);
  }
  if (formatting.escapeUnicode) {
    formatted = escapeUnicode(formatted);
  }
  return formatted;
}

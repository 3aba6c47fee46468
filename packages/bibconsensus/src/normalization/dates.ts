/**
 * Month and Year Normalization
 */

import type { NormalizedNumeric } from '../core/types/index.js';
import { collapseWhitespace, foldText } from './text.js';

const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
] as const;

/**
 * "january", "jan", "1", "01" → 1
 */
const MONTHS: ReadonlyMap<string, number> = new Map<string, number>([
  ...MONTH_NAMES.flatMap((name, index): Array<[string, number]> => {
    const month = index + 1;
    return [
      [name, month],
      [name.slice(0, 3), month],
      [String(month), month],
      [String(month).padStart(2, '0'), month],
    ];
  }),
  ['sept', 9],
]);

/** Years accepted as numeric: (100, current year + 10) */
const MIN_YEAR = 100;
const FUTURE_YEARS = 10;

function literal(kind: NormalizedNumeric['kind'], raw: string): NormalizedNumeric {
  return { kind, raw, display: collapseWhitespace(raw), key: foldText(raw), numeric: null, valid: false };
}

export function normalizeMonth(raw: string): NormalizedNumeric {
  const month = MONTHS.get(foldText(raw));
  if (month === undefined) return literal('month', raw);
  const display = String(month);
  return { kind: 'month', raw, display, key: display, numeric: month, valid: true };
}

export function normalizeYear(raw: string, now: Date = new Date()): NormalizedNumeric {
  const trimmed = raw.replace(/[{}]/g, '').trim();
  if (!/^\d{3,4}$/.test(trimmed)) return literal('year', raw);

  const year = Number(trimmed);
  if (year <= MIN_YEAR || year >= now.getFullYear() + FUTURE_YEARS) return literal('year', raw);

  const display = String(year);
  return { kind: 'year', raw, display, key: display, numeric: year, valid: true };
}

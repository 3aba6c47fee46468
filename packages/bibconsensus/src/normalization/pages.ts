/**
 * Page Range Normalization
 *
 * "12-15", "12–15", "12 — 15" and "12 to 15" all become "12--15".
 */

import type { NormalizedPages } from '../core/types/index.js';
import { collapseWhitespace } from './text.js';

export const PAGES_SEPARATOR = '--';

/** Hyphen, dashes and minus sign */
const DASHES = '\\-\\u2010-\\u2015\\u2212';

const PAGE = `[^\\s,${DASHES}]+`;

const RANGE = new RegExp(`^(${PAGE})\\s*(?:[${DASHES}]+|\\bto\\b)\\s*(${PAGE})$`, 'iu');
const SINGLE = new RegExp(`^${PAGE}$`, 'u');

/**
 * Normalize one range; null when the text is not a page or page range
 */
function normalizeRange(part: string): string | null {
  const range = RANGE.exec(part);
  if (range !== null) {
    const [, start, end] = range;
    return start === end ? start : `${start}${PAGES_SEPARATOR}${end}`;
  }
  return SINGLE.test(part) ? part : null;
}

export function normalizePages(raw: string): NormalizedPages {
  const parts = raw
    .split(',')
    .map((part) => collapseWhitespace(part))
    .filter((part) => part.length > 0);
  const ranges = parts.map(normalizeRange);

  if (ranges.length === 0 || ranges.some((range) => range === null)) {
    const display = collapseWhitespace(raw);
    return { kind: 'pages', raw, display, key: display.toLowerCase(), valid: false };
  }

  const display = ranges.join(', ');
  return { kind: 'pages', raw, display, key: display.toLowerCase(), valid: true };
}

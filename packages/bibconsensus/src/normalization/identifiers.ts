/**
 * Identifier Normalization
 *
 * ISSN, ISBN, DOI and URL canonical forms with check-digit / syntax validation.
 * Invalid values keep their text, flagged `valid: false`: they still take part
 * in literal voting but never in identifier-grade matching.
 */

import type { NormalizedIdentifier } from '../core/types/index.js';
import { collapseWhitespace, foldText } from './text.js';

// ============================================================================
// Helpers
// ============================================================================

/**
 * Lowercase, drop a leading label ("ISSN", "ISBN-13") and every non-alphanumeric
 */
function compactCode(raw: string, label: string): string {
  return raw
    .toLowerCase()
    .replace(new RegExp(`^\\s*${label}(?:-1[03])?\\s*:?`), '')
    .replace(/[^0-9a-z]/g, '');
}

function digitValue(char: string): number {
  return char === 'x' ? 10 : Number(char);
}

function invalid(kind: NormalizedIdentifier['kind'], raw: string): NormalizedIdentifier {
  return { kind, raw, display: collapseWhitespace(raw), key: foldText(raw), valid: false };
}

// ============================================================================
// ISSN
// ============================================================================

/**
 * Weighted sum (weights 8..1, X = 10) must be 0 modulo 11
 */
export function isValidIssnChecksum(code: string): boolean {
  if (!/^\d{7}[\dx]$/.test(code)) return false;
  let sum = 0;
  for (let i = 0; i < 8; i++) {
    sum += (8 - i) * digitValue(code[i]);
  }
  return sum % 11 === 0;
}

export function normalizeIssn(raw: string): NormalizedIdentifier {
  const code = compactCode(raw, 'issn');
  if (!isValidIssnChecksum(code)) return invalid('issn', raw);
  const canonical = `${code.slice(0, 4)}-${code.slice(4).toUpperCase()}`;
  return { kind: 'issn', raw, display: canonical, key: canonical, valid: true };
}

// ============================================================================
// ISBN
// ============================================================================

/**
 * ISBN-13 check digit of the first twelve digits (weights 1, 3, 1, 3...)
 */
export function isbn13CheckDigit(first12: string): string {
  let sum = 0;
  for (let i = 0; i < 12; i++) {
    sum += Number(first12[i]) * (i % 2 === 0 ? 1 : 3);
  }
  const remainder = sum % 10;
  return remainder === 0 ? '0' : String(10 - remainder);
}

/**
 * Weighted sum (weights 10..1, X = 10) must be 0 modulo 11
 */
export function isValidIsbn10(code: string): boolean {
  const compact = code.toLowerCase();
  if (!/^\d{9}[\dx]$/.test(compact)) return false;
  let sum = 0;
  for (let i = 0; i < 10; i++) {
    sum += (10 - i) * digitValue(compact[i]);
  }
  return sum % 11 === 0;
}

export function isValidIsbn13(code: string): boolean {
  return /^\d{13}$/.test(code) && code[12] === isbn13CheckDigit(code.slice(0, 12));
}

/**
 * Convert a valid ISBN-10 (digits only) to its 13-digit form
 */
export function isbn10To13(isbn10: string): string {
  const first12 = `978${isbn10.slice(0, 9)}`;
  return first12 + isbn13CheckDigit(first12);
}

export function normalizeIsbn(raw: string): NormalizedIdentifier {
  const code = compactCode(raw, 'isbn');
  let isbn13: string;
  if (isValidIsbn10(code)) {
    isbn13 = isbn10To13(code);
  } else if (isValidIsbn13(code)) {
    isbn13 = code;
  } else {
    return invalid('isbn', raw);
  }
  const canonical = `${isbn13.slice(0, 3)}-${isbn13.slice(3)}`;
  return { kind: 'isbn', raw, display: canonical, key: canonical, valid: true };
}

// ============================================================================
// DOI
// ============================================================================

const DOI_RESOLVER_PREFIX = /^(?:https?:\/\/(?:dx\.)?doi\.org\/|doi:\s*)/i;

/**
 * "10." + registrant code + "/" + suffix not ending in punctuation
 */
const DOI_SYNTAX = /^10\.\d{4,9}(?:\.\d+)*\/\S*[^\s;,.]$/;

export function normalizeDoi(raw: string): NormalizedIdentifier {
  const doi = raw.trim().replace(DOI_RESOLVER_PREFIX, '').toLowerCase();
  if (!DOI_SYNTAX.test(doi)) return invalid('doi', raw);
  return { kind: 'doi', raw, display: doi, key: doi, valid: true };
}

// ============================================================================
// URL
// ============================================================================

const URL_PROTOCOLS: ReadonlySet<string> = new Set(['http:', 'https:', 'ftp:']);

function parseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

/**
 * Well-formedness only; whether the URL resolves is decided by the query layer
 */
export function normalizeUrl(raw: string): NormalizedIdentifier {
  const trimmed = raw.trim();
  const url = parseUrl(trimmed);
  if (url === null || !URL_PROTOCOLS.has(url.protocol) || url.hostname === '') {
    return invalid('url', raw);
  }
  const path = url.pathname.replace(/\/+$/, '');
  const key = `${url.host.toLowerCase()}${path}${url.search}`;
  return { kind: 'url', raw, display: trimmed, key, valid: true };
}

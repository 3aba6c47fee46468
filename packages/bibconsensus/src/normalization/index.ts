/**
 * Field Normalization Dispatcher
 *
 * `normalize(field, raw)` routes a raw value to the normalizer named by the
 * field's registry spec. Pure and total over any string input.
 */

import type { FieldInput, NormalizedValue, NormalizerKind } from '../core/types/index.js';
import { getFieldSpec } from '../registry/field-registry.js';
import { normalizeMonth, normalizeYear } from './dates.js';
import { normalizeDoi, normalizeIsbn, normalizeIssn, normalizeUrl } from './identifiers.js';
import { normalizeNames } from './names.js';
import { normalizePages } from './pages.js';
import { normalizeText } from './text.js';

export function normalizeAs(kind: NormalizerKind, raw: string): NormalizedValue {
  switch (kind) {
    case 'text':
      return normalizeText(raw);
    case 'names':
      return normalizeNames(raw);
    case 'pages':
      return normalizePages(raw);
    case 'issn':
      return normalizeIssn(raw);
    case 'isbn':
      return normalizeIsbn(raw);
    case 'doi':
      return normalizeDoi(raw);
    case 'url':
      return normalizeUrl(raw);
    case 'month':
      return normalizeMonth(raw);
    case 'year':
      return normalizeYear(raw);
  }
}

export function normalize(field: string, raw: string): NormalizedValue {
  return normalizeAs(getFieldSpec(field).normalizer, raw);
}

/**
 * Accept either a raw string or an already normalized value
 */
export function toNormalized(field: string, input: FieldInput): NormalizedValue {
  return typeof input === 'string' ? normalize(field, input) : input;
}

export { foldText, stripAccents, stripLatex, collapseWhitespace, tokenize, normalizeText, STOP_WORDS } from './text.js';
export { parseNameList, tokenizeNames, formatPerson, formatNameList, normalizeNames } from './names.js';
export type { NameToken } from './names.js';
export { normalizePages, PAGES_SEPARATOR } from './pages.js';
export {
  normalizeIssn,
  normalizeIsbn,
  normalizeDoi,
  normalizeUrl,
  isbn10To13,
  isbn13CheckDigit,
  isValidIsbn10,
  isValidIsbn13,
  isValidIssnChecksum,
} from './identifiers.js';
export { normalizeMonth, normalizeYear } from './dates.js';

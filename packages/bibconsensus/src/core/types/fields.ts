/**
 * Field Type Definitions
 *
 * Closed sets of normalizer and comparator kinds, plus the normalized value
 * shapes each normalizer produces.
 *
 * @module core/types/fields
 */

// ============================================================================
// Field Names
// ============================================================================

/**
 * Fields the registry knows about. Any other field name is still accepted and
 * handled by the default (text / exact-fold) spec.
 */
export type KnownFieldName =
  | 'address'
  | 'annote'
  | 'author'
  | 'booktitle'
  | 'chapter'
  | 'doi'
  | 'edition'
  | 'editor'
  | 'howpublished'
  | 'institution'
  | 'isbn'
  | 'issn'
  | 'journal'
  | 'month'
  | 'note'
  | 'number'
  | 'organization'
  | 'pages'
  | 'publisher'
  | 'school'
  | 'series'
  | 'title'
  | 'type'
  | 'url'
  | 'volume'
  | 'year';

export type NormalizerKind =
  | 'text'
  | 'names'
  | 'pages'
  | 'issn'
  | 'isbn'
  | 'doi'
  | 'url'
  | 'month'
  | 'year';

export type ComparatorKind = 'exact-fold' | 'abbreviation' | 'name-list' | 'identifier' | 'numeric';

/**
 * Entry-type based field filtering mode
 *
 * - no: every field may be completed
 * - required: only the entry type's required fields
 * - optional: required and optional fields
 * - all: required, optional and non-standard fields
 */
export type EntryTypeFilter = 'no' | 'required' | 'optional' | 'all';

/**
 * Static per-field descriptor
 */
export interface FieldSpec {
  readonly name: string;
  readonly normalizer: NormalizerKind;
  readonly comparator: ComparatorKind;
  /** DOI, ISSN, ISBN, URL */
  readonly identifier: boolean;
  /** Only values verified to resolve online may be voted in */
  readonly requiresVerification: boolean;
  /** Takes part in entry-type based inclusion filtering */
  readonly entryTypeFiltered: boolean;
}

/**
 * Required / optional / non-standard fields of one entry type
 */
export interface EntryTypeFields {
  readonly required: ReadonlySet<KnownFieldName>;
  readonly optional: ReadonlySet<KnownFieldName>;
  readonly nonStandard: ReadonlySet<KnownFieldName>;
}

// ============================================================================
// Normalized Values
// ============================================================================

interface NormalizedBase {
  /** Input exactly as received */
  readonly raw: string;
  /** Canonical text to store in the entry */
  readonly display: string;
  /** Comparison key */
  readonly key: string;
  /** False when the value failed format or checksum validation */
  readonly valid: boolean;
}

export interface NormalizedText extends NormalizedBase {
  readonly kind: 'text';
}

/**
 * One parsed person name
 */
export interface PersonName {
  /** Last name, particles included ("von Neumann") */
  readonly last: string;
  /** First name(s), null when absent */
  readonly first: string | null;
  /** Generational suffix ("Jr.", "III") */
  readonly suffix: string | null;
  readonly hasParticle: boolean;
}

export interface NormalizedNames extends NormalizedBase {
  readonly kind: 'names';
  readonly persons: readonly PersonName[];
}

export interface NormalizedPages extends NormalizedBase {
  readonly kind: 'pages';
}

export interface NormalizedIdentifier extends NormalizedBase {
  readonly kind: 'issn' | 'isbn' | 'doi' | 'url';
}

export interface NormalizedNumeric extends NormalizedBase {
  readonly kind: 'month' | 'year';
  /** Parsed number, null when the value is not numeric */
  readonly numeric: number | null;
}

export type NormalizedValue =
  | NormalizedText
  | NormalizedNames
  | NormalizedPages
  | NormalizedIdentifier
  | NormalizedNumeric;

/**
 * Either a raw field string or an already normalized value
 */
export type FieldInput = string | NormalizedValue;

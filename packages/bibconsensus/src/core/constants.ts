/**
 * bibconsensus Constants
 *
 * Field names, the entry-type field table, and project-wide defaults.
 */

import type { EntryTypeFields, EntryTypeFilter, KnownFieldName } from './types/index.js';

// ============================================================================
// Project
// ============================================================================

export const PROJECT_NAME = 'bibconsensus';

/** Source name under which the entry's own value votes */
export const ENTRY_SOURCE = 'input';

/** Field recording the date an entry was last completed */
export const MARKED_FIELD = 'bcqueried';

/** Prefix used for new fields when prefixing is enabled */
export const DEFAULT_FIELD_PREFIX = 'BC';

/** Per-query timeout in milliseconds (0 disables the timeout) */
export const DEFAULT_QUERY_TIMEOUT_MS = 10_000;

/** Largest delay a timer accepts; longer timeouts would fire at once */
export const MAX_QUERY_TIMEOUT_MS = 2_147_483_647;

/** Names a source cannot take: data dump keys and the entry's own vote */
export const RESERVED_SOURCE_NAMES: ReadonlySet<string> = new Set(['entry', 'new-fields', ENTRY_SOURCE]);

// ============================================================================
// Field Names
// ============================================================================

export const FIELD_NAMES: readonly KnownFieldName[] = [
  'address',
  'annote',
  'author',
  'booktitle',
  'chapter',
  'doi',
  'edition',
  'editor',
  'howpublished',
  'institution',
  'isbn',
  'issn',
  'journal',
  'month',
  'note',
  'number',
  'organization',
  'pages',
  'publisher',
  'school',
  'series',
  'title',
  'type',
  'url',
  'volume',
  'year',
];

const KNOWN_FIELDS: ReadonlySet<string> = new Set(FIELD_NAMES);

export function isKnownField(field: string): field is KnownFieldName {
  return KNOWN_FIELDS.has(field);
}

// ============================================================================
// Entry Types
// ============================================================================

export const ENTRY_TYPE_FILTERS = ['no', 'required', 'optional', 'all'] as const satisfies readonly EntryTypeFilter[];

export function isEntryTypeFilter(value: string): value is EntryTypeFilter {
  return ENTRY_TYPE_FILTERS.some((filter) => filter === value);
}

function fieldSets(
  required: readonly KnownFieldName[],
  optional: readonly KnownFieldName[],
  nonStandard: readonly KnownFieldName[]
): EntryTypeFields {
  return {
    required: new Set(required),
    optional: new Set(optional),
    nonStandard: new Set(nonStandard),
  };
}

const CONFERENCE_FIELDS = fieldSets(
  ['author', 'title', 'booktitle', 'year'],
  ['editor', 'volume', 'number', 'series', 'pages', 'address', 'month', 'organization', 'publisher', 'note'],
  ['doi', 'isbn', 'issn']
);

const THESIS_FIELDS = fieldSets(
  ['author', 'title', 'school', 'year'],
  ['type', 'address', 'month', 'note'],
  ['doi']
);

/**
 * Required / optional / non-standard fields per entry type
 * Unknown entry types fall back to `misc`.
 */
export const ENTRY_TYPES: ReadonlyMap<string, EntryTypeFields> = new Map([
  [
    'article',
    fieldSets(['author', 'title', 'journal', 'year'], ['volume', 'number', 'pages', 'month', 'note'], ['doi', 'issn']),
  ],
  [
    'book',
    fieldSets(
      ['author', 'editor', 'title', 'publisher', 'year'],
      ['volume', 'number', 'series', 'address', 'edition', 'month', 'note'],
      ['doi', 'isbn', 'issn']
    ),
  ],
  ['booklet', fieldSets(['title'], ['author', 'howpublished', 'address', 'month', 'year', 'note'], ['doi'])],
  ['conference', CONFERENCE_FIELDS],
  [
    'inbook',
    fieldSets(
      ['author', 'editor', 'title', 'chapter', 'pages', 'publisher', 'year'],
      ['volume', 'number', 'series', 'type', 'address', 'edition', 'month', 'note'],
      ['doi', 'isbn']
    ),
  ],
  [
    'incollection',
    fieldSets(
      ['author', 'title', 'booktitle', 'publisher', 'year'],
      ['editor', 'volume', 'number', 'series', 'type', 'chapter', 'pages', 'address', 'edition', 'month', 'note'],
      ['doi', 'isbn']
    ),
  ],
  ['inproceedings', CONFERENCE_FIELDS],
  [
    'manual',
    fieldSets(['title'], ['author', 'organization', 'address', 'edition', 'month', 'year', 'note'], ['doi', 'isbn']),
  ],
  ['mastersthesis', THESIS_FIELDS],
  ['misc', fieldSets([], ['author', 'title', 'howpublished', 'month', 'year', 'note'], ['doi'])],
  ['phdthesis', THESIS_FIELDS],
  [
    'techreport',
    fieldSets(['author', 'title', 'institution', 'year'], ['type', 'number', 'address', 'month', 'note'], ['doi', 'isbn']),
  ],
  ['unpublished', fieldSets(['author', 'title', 'note'], ['month', 'year'], ['doi'])],
]);

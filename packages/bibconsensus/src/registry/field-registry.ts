/**
 * Field Registry
 *
 * Static, table-driven mapping from field name to its normalizer, comparator
 * and identifier flags. Built once at module load and frozen; downstream
 * formatting code relies on it for entry-type based field filtering.
 *
 * @module registry/field-registry
 */

import { ENTRY_TYPES, FIELD_NAMES, isKnownField } from '../core/constants.js';
import type {
  ComparatorKind,
  EntryTypeFields,
  EntryTypeFilter,
  FieldSpec,
  KnownFieldName,
  NormalizerKind,
} from '../core/types/index.js';

// ============================================================================
// Registry Table
// ============================================================================

type SpecRow = readonly [NormalizerKind, ComparatorKind, { identifier?: boolean; verify?: boolean }?];

const ABBREVIATED: SpecRow = ['text', 'abbreviation'];
const PLAIN: SpecRow = ['text', 'exact-fold'];

const FIELD_TABLE: Readonly<Record<KnownFieldName, SpecRow>> = {
  address: PLAIN,
  annote: PLAIN,
  author: ['names', 'name-list'],
  booktitle: ABBREVIATED,
  chapter: PLAIN,
  doi: ['doi', 'identifier', { identifier: true, verify: true }],
  edition: PLAIN,
  editor: ['names', 'name-list'],
  howpublished: PLAIN,
  institution: ABBREVIATED,
  isbn: ['isbn', 'identifier', { identifier: true }],
  issn: ['issn', 'identifier', { identifier: true }],
  journal: ABBREVIATED,
  month: ['month', 'numeric'],
  note: PLAIN,
  number: PLAIN,
  organization: ABBREVIATED,
  pages: ['pages', 'exact-fold'],
  publisher: ABBREVIATED,
  school: ABBREVIATED,
  series: ABBREVIATED,
  title: PLAIN,
  type: PLAIN,
  url: ['url', 'identifier', { identifier: true, verify: true }],
  volume: PLAIN,
  year: ['year', 'numeric'],
};

function toSpec(name: string, [normalizer, comparator, flags]: SpecRow, entryTypeFiltered: boolean): FieldSpec {
  return Object.freeze({
    name,
    normalizer,
    comparator,
    identifier: flags?.identifier ?? false,
    requiresVerification: flags?.verify ?? false,
    entryTypeFiltered,
  });
}

const REGISTRY: ReadonlyMap<string, FieldSpec> = new Map(
  FIELD_NAMES.map((name) => [name, toSpec(name, FIELD_TABLE[name], true)])
);

// ============================================================================
// Lookups
// ============================================================================

/**
 * Spec of a field; unknown fields get plain text / exact-fold handling and are
 * never removed by entry-type filtering
 */
export function getFieldSpec(field: string): FieldSpec {
  const name = field.toLowerCase();
  return REGISTRY.get(name) ?? toSpec(name, PLAIN, false);
}

export function isRegisteredField(field: string): boolean {
  return REGISTRY.has(field.toLowerCase());
}

export function listFieldSpecs(): readonly FieldSpec[] {
  return [...REGISTRY.values()];
}

export function getEntryTypeFields(entryType: string): EntryTypeFields {
  const fields = ENTRY_TYPES.get(entryType.toLowerCase()) ?? ENTRY_TYPES.get('misc');
  if (fields === undefined) {
    throw new Error('Entry type table is missing "misc"');
  }
  return fields;
}

/**
 * Registered fields an entry of this type may receive under the filter mode
 */
export function fieldsForEntryType(entryType: string, filter: EntryTypeFilter): ReadonlySet<string> {
  const names = new Set<string>(FIELD_NAMES);
  if (filter === 'no') return names;

  const { required, optional, nonStandard } = getEntryTypeFields(entryType);
  const allowed = new Set<string>(required);
  if (filter === 'optional' || filter === 'all') {
    optional.forEach((field) => allowed.add(field));
  }
  if (filter === 'all') {
    nonStandard.forEach((field) => allowed.add(field));
  }
  return allowed;
}

/**
 * Whether a field may be completed for an entry of this type
 */
export function isFieldAllowedForEntryType(field: string, entryType: string, filter: EntryTypeFilter): boolean {
  const spec = getFieldSpec(field);
  if (filter === 'no' || !spec.entryTypeFiltered) return true;
  return fieldsForEntryType(entryType, filter).has(spec.name);
}

export type EntryTypeCategory = 'required' | 'optional' | 'non-standard';

/**
 * How an entry type lists a field; null when it does not list it
 */
export function entryTypeCategory(field: string, entryType: string): EntryTypeCategory | null {
  const name = field.toLowerCase();
  if (!isKnownField(name)) return null;
  const { required, optional, nonStandard } = getEntryTypeFields(entryType);
  if (required.has(name)) return 'required';
  if (optional.has(name)) return 'optional';
  if (nonStandard.has(name)) return 'non-standard';
  return null;
}

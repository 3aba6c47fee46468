/**
 * Diff Output
 *
 * In diff mode the written entries hold only what the run added: the key, the
 * type, the new (possibly prefixed) fields and the mark. Entries without new
 * fields are left out.
 */

import { MARKED_FIELD } from '../core/constants.js';
import type { Entry, EntryRecord } from '../core/entry.js';
import type { EntryOutcome } from './reconciliation-driver.js';

export function toDiffRecord(entry: Entry, outcome: EntryOutcome, mark: boolean): EntryRecord | null {
  if (outcome.changes.length === 0) return null;

  const fields: Record<string, string> = {};
  for (const change of outcome.changes) {
    fields[change.field] = change.value;
  }
  const marked = entry.get(MARKED_FIELD);
  if (mark && marked !== undefined) {
    fields[MARKED_FIELD] = marked;
  }
  return { key: entry.key, type: entry.type, fields };
}

/**
 * Diff records of every changed entry, in input order
 */
export function diffRecords(
  entries: readonly Entry[],
  outcomes: readonly EntryOutcome[],
  mark: boolean
): EntryRecord[] {
  const byKey = new Map(outcomes.map((outcome) => [outcome.entryKey, outcome]));
  const records: EntryRecord[] = [];
  for (const entry of entries) {
    const outcome = byKey.get(entry.key);
    const record = outcome !== undefined ? toDiffRecord(entry, outcome, mark) : null;
    if (record !== null) records.push(record);
  }
  return records;
}

/**
 * Data Dump
 *
 * Per-entry record of what every source returned, for offline inspection:
 *
 *   {
 *     "entry": "knuth1984",
 *     "new-fields": 2,
 *     "crossref": { "query-url": "...", "query-response-time": 120, "title": "..." },
 *     "dblp": null
 *   }
 *
 * A source maps to null when it found no match.
 */

import type { SourceResult } from '../core/types/index.js';

export type DumpSourceRecord = Readonly<Record<string, string | number>>;

export type DataDumpRecord = {
  readonly entry: string;
  readonly 'new-fields': number;
} & Readonly<Record<string, string | number | DumpSourceRecord | null>>;

function sourceRecord(result: SourceResult): DumpSourceRecord | null {
  if (result.status === 'no-match') return null;

  const record: Record<string, string | number> = {};
  const { query } = result;
  if (query.url !== undefined) record['query-url'] = query.url;
  if (query.responseTimeMs !== undefined) record['query-response-time'] = query.responseTimeMs;
  if (query.statusCode !== undefined) record['query-status-code'] = query.statusCode;
  if (query.error !== undefined) record['query-error'] = query.error;
  for (const [field, value] of result.fields) {
    record[field] = value;
  }
  return record;
}

export class DataDump {
  private readonly sources = new Map<string, DumpSourceRecord | null>();
  private newFields = 0;

  constructor(readonly entryKey: string) {}

  addResult(result: SourceResult): void {
    this.sources.set(result.source, sourceRecord(result));
  }

  setNewFields(count: number): void {
    this.newFields = count;
  }

  toJSON(): DataDumpRecord {
    return {
      ...Object.fromEntries(this.sources),
      entry: this.entryKey,
      'new-fields': this.newFields,
    };
  }
}

/**
 * Source Result Factories
 *
 * SourceResults are frozen on creation and keyed by lowercased field name.
 */

import type { FoundResult, NoMatchResult, QueryInfo } from './types/index.js';

export interface FoundResultInit {
  readonly source: string;
  readonly entryKey: string;
  readonly fields: Iterable<readonly [string, string]>;
  readonly verified?: Iterable<string>;
  readonly query?: QueryInfo;
}

export function createFoundResult(init: FoundResultInit): FoundResult {
  const fields = new Map<string, string>();
  for (const [field, value] of init.fields) {
    fields.set(field.toLowerCase(), value);
  }
  const verified = new Set([...(init.verified ?? [])].map((field) => field.toLowerCase()));

  const result: FoundResult = {
    status: 'found',
    source: init.source,
    entryKey: init.entryKey,
    fields,
    verified,
    query: Object.freeze({ ...init.query }),
  };
  return Object.freeze(result);
}

export function createNoMatch(source: string, entryKey: string, query: QueryInfo = {}): NoMatchResult {
  const result: NoMatchResult = { status: 'no-match', source, entryKey, query: Object.freeze({ ...query }) };
  return Object.freeze(result);
}

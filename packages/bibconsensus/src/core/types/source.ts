/**
 * Source Result Types
 *
 * What the query layer hands to the core for one (entry, source) pair.
 *
 * @module core/types/source
 */

/**
 * Metadata about the query that produced a result
 */
export interface QueryInfo {
  readonly url?: string;
  readonly responseTimeMs?: number;
  readonly statusCode?: number;
  /** Set when the query failed, timed out or was skipped */
  readonly error?: string;
}

export interface NoMatchResult {
  readonly status: 'no-match';
  readonly source: string;
  readonly entryKey: string;
  readonly query: QueryInfo;
}

export interface FoundResult {
  readonly status: 'found';
  readonly source: string;
  readonly entryKey: string;
  /** Candidate fields, keyed by lowercased field name */
  readonly fields: ReadonlyMap<string, string>;
  /** Fields whose value was checked to resolve online */
  readonly verified: ReadonlySet<string>;
  readonly query: QueryInfo;
}

export type SourceResult = NoMatchResult | FoundResult;

/**
 * Read access to a record's fields, implemented by Entry and by candidate maps
 */
export interface FieldLookup {
  get(field: string): string | undefined;
}

/**
 * Matching and Reconciliation Result Types
 *
 * @module core/types/reconcile
 */

import type { EntryTypeFilter, NormalizedValue } from './fields.js';

// ============================================================================
// Matching
// ============================================================================

export type MatchReason =
  | 'identifier'
  | 'title-author-year'
  | 'no-identifying-field'
  | 'title-mismatch'
  | 'author-mismatch'
  | 'year-mismatch';

export interface MatchDecision {
  readonly matched: boolean;
  readonly reason: MatchReason;
}

/**
 * A candidate that passed the matcher, ready for voting
 */
export interface MatchedCandidate {
  readonly source: string;
  readonly fields: ReadonlyMap<string, string>;
  readonly verified: ReadonlySet<string>;
}

// ============================================================================
// Voting
// ============================================================================

export interface FieldVote {
  readonly source: string;
  readonly normalized: NormalizedValue;
  readonly raw: string;
}

/**
 * One equivalence class of votes
 */
export interface VoteClass {
  readonly votes: readonly FieldVote[];
  /** Distinct contributing sources, in vote order */
  readonly sources: readonly string[];
}

/**
 * - added: the field was empty and received the winning value
 * - overwritten: an existing value was replaced
 * - unchanged: overwrite was allowed but the winner equals the current value
 * - kept: the entry already holds a value that may not be overwritten
 * - unverified: only unverified values were offered for a verified field
 * - error: processing the field failed
 */
export type FieldStatus = 'added' | 'overwritten' | 'unchanged' | 'kept' | 'unverified' | 'error';

export interface FieldProvenance {
  readonly field: string;
  readonly status: FieldStatus;
  /** Value stored in the entry (after formatting) */
  readonly value?: string;
  /** Value the entry held before an overwrite */
  readonly previous?: string;
  /** Sources of the winning class */
  readonly sources: readonly string[];
  /** Number of votes cast */
  readonly votes: number;
  /** Number of equivalence classes */
  readonly classes: number;
  readonly reason?: string;
}

export interface Provenance {
  readonly entryKey: string;
  readonly fields: readonly FieldProvenance[];
  readonly added: number;
  readonly overwritten: number;
}

// ============================================================================
// Options
// ============================================================================

/**
 * Output formatting applied to winning values only
 */
export interface FormattingOptions {
  readonly escapeUnicode: boolean;
  readonly protectUppercase: ReadonlySet<string>;
}

export interface ReconcileOptions {
  /** Tie-break order, highest priority first */
  readonly sourcePriority: readonly string[];
  /** Fields that may replace an existing non-empty value */
  readonly overwrite: ReadonlySet<string>;
  /** Replace every existing value */
  readonly force: boolean;
  /** Returns false for fields that must not be completed */
  readonly allowField: (field: string) => boolean;
  /** Let the entry's current value vote when a field is overwritten */
  readonly entryVotes: boolean;
  /** Source name under which the entry's own value votes */
  readonly entrySource: string;
  /** Prefix prepended to the stored field name */
  readonly fieldPrefix: string;
  readonly formatting: FormattingOptions;
  /** Restricts completion by entry type */
  readonly entryTypeFilter: EntryTypeFilter;
}

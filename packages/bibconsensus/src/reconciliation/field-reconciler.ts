/**
 * Field Reconciler
 *
 * Merges the fields of matching candidates into an entry by per-field
 * majority vote.
 *
 * PIPELINE (per field):
 * 1. Filter: field filter, entry-type filter, existing-value protection
 * 2. Collect votes (non-empty values, candidate order)
 * 3. Verification gate for fields that must resolve online
 * 4. Union-find clustering under the field's comparator
 * 5. Winner: most distinct sources, then source priority
 * 6. Representative: longest display, then most UTF-8 bytes, then priority
 * 7. Output formatting
 *
 * Pure: the input entry is never mutated, a clone carries the result.
 */

import { Entry, plainValue } from '../core/entry.js';
import { FieldProcessingError } from '../core/errors.js';
import type {
  FieldProvenance,
  FieldSpec,
  FieldVote,
  MatchedCandidate,
  Provenance,
  ReconcileOptions,
  VoteClass,
} from '../core/types/index.js';
import { compareAs } from '../comparison/comparators.js';
import { normalize } from '../normalization/index.js';
import { getFieldSpec, isFieldAllowedForEntryType } from '../registry/field-registry.js';
import { formatValue } from './formatting.js';
import { clusterValues } from './union-find.js';

// ============================================================================
// Types
// ============================================================================

export interface ReconcileResult {
  readonly entry: Entry;
  readonly provenance: Provenance;
}

/**
 * Source ranking for tie-breaks; lower is preferred
 */
export type SourceRanker = (source: string) => number;

// ============================================================================
// Ranking
// ============================================================================

/**
 * Listed sources in list order, then unlisted sources in order of first
 * appearance, then the entry's own value
 */
export function createSourceRanker(
  priority: readonly string[],
  appearance: readonly string[],
  entrySource: string
): SourceRanker {
  const ranks = new Map<string, number>();
  priority.forEach((source) => {
    if (!ranks.has(source)) ranks.set(source, ranks.size);
  });
  appearance.forEach((source) => {
    if (source !== entrySource && !ranks.has(source)) ranks.set(source, ranks.size);
  });
  return (source) => (source === entrySource ? Number.MAX_SAFE_INTEGER : (ranks.get(source) ?? ranks.size));
}

function bestRank(sources: readonly string[], rank: SourceRanker): number {
  return Math.min(...sources.map(rank));
}

function toVoteClass(votes: readonly FieldVote[]): VoteClass {
  return { votes, sources: [...new Set(votes.map((vote) => vote.source))] };
}

/**
 * Class with the most distinct sources; ties go to the best-ranked source
 */
export function pickWinner(classes: readonly VoteClass[], rank: SourceRanker): VoteClass | null {
  let winner: VoteClass | null = null;
  for (const candidate of classes) {
    if (
      winner === null ||
      candidate.sources.length > winner.sources.length ||
      (candidate.sources.length === winner.sources.length &&
        bestRank(candidate.sources, rank) < bestRank(winner.sources, rank))
    ) {
      winner = candidate;
    }
  }
  return winner;
}

/**
 * Most informative member: longest display, then most UTF-8 bytes (accents),
 * then best-ranked source
 */
export function pickRepresentative(votes: readonly FieldVote[], rank: SourceRanker): FieldVote {
  return votes.reduce((best, vote) => {
    const lengthDelta = [...vote.normalized.display].length - [...best.normalized.display].length;
    if (lengthDelta !== 0) return lengthDelta > 0 ? vote : best;

    const byteDelta = Buffer.byteLength(vote.normalized.display) - Buffer.byteLength(best.normalized.display);
    if (byteDelta !== 0) return byteDelta > 0 ? vote : best;

    return rank(vote.source) < rank(best.source) ? vote : best;
  });
}

// ============================================================================
// Reconciler
// ============================================================================

class FieldReconciler {
  private readonly result: Entry;
  private readonly rank: SourceRanker;
  private readonly provenance: FieldProvenance[] = [];

  constructor(
    private readonly entry: Entry,
    private readonly candidates: readonly MatchedCandidate[],
    private readonly options: ReconcileOptions
  ) {
    this.result = entry.clone();
    this.rank = createSourceRanker(
      options.sourcePriority,
      candidates.map((candidate) => candidate.source),
      options.entrySource
    );
  }

  run(): ReconcileResult {
    for (const field of this.candidateFields()) {
      try {
        this.reconcileField(field);
      } catch (error) {
        const failure = new FieldProcessingError(field, this.entry.key, error);
        this.provenance.push({ field, status: 'error', sources: [], votes: 0, classes: 0, reason: failure.message });
      }
    }

    return {
      entry: this.result,
      provenance: {
        entryKey: this.entry.key,
        fields: this.provenance,
        added: this.provenance.filter((field) => field.status === 'added').length,
        overwritten: this.provenance.filter((field) => field.status === 'overwritten').length,
      },
    };
  }

  /**
   * Field names of all candidates, in order of first appearance
   */
  private candidateFields(): string[] {
    const fields = new Set<string>();
    for (const candidate of this.candidates) {
      for (const field of candidate.fields.keys()) {
        fields.add(field.toLowerCase());
      }
    }
    return [...fields];
  }

  private reconcileField(field: string): void {
    const { options, entry } = this;
    if (!options.allowField(field) || !isFieldAllowedForEntryType(field, entry.type, options.entryTypeFilter)) {
      return;
    }

    const spec = getFieldSpec(field);
    const existing = entry.has(field) ? entry.get(field) : undefined;
    const mayOverwrite = options.force || options.overwrite.has(field);
    if (existing !== undefined && !mayOverwrite) {
      this.record({ field, status: 'kept', value: existing, sources: [], votes: 0, classes: 0 });
      return;
    }

    const offered = this.collectVotes(spec, existing);
    const votes = spec.requiresVerification ? this.verifiedVotes(spec, offered) : offered;
    if (offered.length === 0) return;
    if (votes.length === 0) {
      this.record({
        field,
        status: 'unverified',
        sources: [],
        votes: offered.length,
        classes: 0,
        reason: `none of ${offered.length} value(s) could be verified`,
      });
      return;
    }

    const classes = clusterValues(votes, (a, b) => compareAs(spec.comparator, a.normalized, b.normalized)).map(
      toVoteClass
    );
    const winner = pickWinner(classes, this.rank);
    if (winner === null) return;

    const representative = pickRepresentative(winner.votes, this.rank);
    const tally = { sources: winner.sources, votes: votes.length, classes: classes.length };

    const value = formatValue(field, representative.normalized.display, options.formatting);
    if (existing !== undefined && (representative.source === options.entrySource || value === existing)) {
      this.record({ field, status: 'unchanged', value: existing, ...tally });
      return;
    }

    this.result.set(`${options.fieldPrefix}${field}`, value);
    this.record(
      existing !== undefined
        ? { field, status: 'overwritten', value, previous: existing, ...tally }
        : { field, status: 'added', value, ...tally }
    );
  }

  private collectVotes(spec: FieldSpec, existing: string | undefined): FieldVote[] {
    const votes: FieldVote[] = [];
    for (const candidate of this.candidates) {
      const raw = candidate.fields.get(spec.name);
      if (raw !== undefined && plainValue(raw) !== '') {
        votes.push({ source: candidate.source, normalized: normalize(spec.name, raw), raw });
      }
    }
    if (existing !== undefined && this.options.entryVotes && votes.length > 0) {
      votes.push({ source: this.options.entrySource, normalized: normalize(spec.name, existing), raw: existing });
    }
    return votes;
  }

  private verifiedVotes(spec: FieldSpec, votes: readonly FieldVote[]): FieldVote[] {
    const verifiedBy = new Set(
      this.candidates.filter((candidate) => candidate.verified.has(spec.name)).map((candidate) => candidate.source)
    );
    return votes.filter((vote) => vote.normalized.valid && verifiedBy.has(vote.source));
  }

  private record(provenance: FieldProvenance): void {
    this.provenance.push(provenance);
  }
}

/**
 * Merge matching candidates into a copy of `entry`
 *
 * @example
 * const { entry: merged, provenance } = reconcile(entry, candidates, options);
 * provenance.fields.filter((field) => field.status === 'added');
 */
export function reconcile(
  entry: Entry,
  candidates: readonly MatchedCandidate[],
  options: ReconcileOptions
): ReconcileResult {
  return new FieldReconciler(entry, candidates, options).run();
}

/**
 * Reconciliation Driver
 *
 * Orchestrates a run: filters entries, schedules lookups, waits for each entry
 * position to be answered (or gives up on stragglers), matches candidates,
 * reconciles fields and applies the result to the entry in place.
 *
 * PHILOSOPHY:
 * - Entries are reconciled strictly in input order
 * - Missing or failed sources are absent evidence, never errors
 * - Cancellation keeps finished entries and leaves the rest untouched
 */

import { DEFAULT_QUERY_TIMEOUT_MS, FIELD_NAMES, MARKED_FIELD } from '../core/constants.js';
import type { Entry } from '../core/entry.js';
import type {
  FieldProvenance,
  MatchedCandidate,
  Provenance,
  ReconcileOptions,
  SourceResult,
} from '../core/types/index.js';
import type { Logger } from '../core/utils/logger.js';
import type { OnlyExclude } from '../core/utils/only-exclude.js';
import { isMatch, lookupOf } from '../matching/entry-matcher.js';
import { reconcile } from '../reconciliation/field-reconciler.js';
import { isFieldAllowedForEntryType } from '../registry/field-registry.js';
import { DataDump, type DataDumpRecord } from './data-dump.js';
import { LookupScheduler, type SourceLookup } from './lookup-scheduler.js';
import { WAIT_FOR_ALL, hasQuorum, shouldSkipStraggler, type StragglerPolicy } from './straggler-policy.js';

// ============================================================================
// Types
// ============================================================================

export interface DriverConfig {
  readonly reconcile: ReconcileOptions;
  /** Entries (by key) to process */
  readonly entryFilter: OnlyExclude<string>;
  /** Sources (by name) to query */
  readonly sourceFilter: OnlyExclude<string>;
  /** Record the run date in the marked field of every processed entry */
  readonly mark: boolean;
  /** Process entries even when they carry the marked field */
  readonly ignoreMark: boolean;
  /** Per-query timeout in milliseconds (0 = none) */
  readonly timeoutMs: number;
  readonly straggler: StragglerPolicy;
  /** Clock used for the mark date */
  readonly now?: () => Date;
}

/**
 * One new or replaced field, for change listings
 */
export interface FieldChange {
  readonly entryKey: string;
  /** Stored field name, prefix included, lowercased like every entry field */
  readonly field: string;
  readonly value: string;
  readonly sources: readonly string[];
  readonly overwritten: boolean;
}

export interface EntryOutcome {
  readonly entryKey: string;
  readonly provenance: Provenance;
  readonly dump: DataDumpRecord;
  readonly changes: readonly FieldChange[];
  /** Sources skipped as stragglers for this entry */
  readonly skippedSources: readonly string[];
}

export interface RunSummary {
  /** Entries given to the run */
  readonly total: number;
  /** Entries reconciled */
  readonly processed: number;
  /** Entries that received at least one field */
  readonly modified: number;
  readonly fieldsAdded: number;
  readonly fieldsOverwritten: number;
  /** Entries left out by the entry filter or the mark */
  readonly skipped: number;
  readonly cancelled: boolean;
}

export interface RunReport {
  readonly outcomes: readonly EntryOutcome[];
  readonly summary: RunSummary;
}

export interface RunOptions {
  readonly signal?: AbortSignal;
}

/**
 * Default driver settings; `reconcile` and the filters are always supplied
 */
export const DEFAULT_DRIVER_SETTINGS: Pick<DriverConfig, 'mark' | 'ignoreMark' | 'timeoutMs' | 'straggler'> = {
  mark: false,
  ignoreMark: false,
  timeoutMs: DEFAULT_QUERY_TIMEOUT_MS,
  straggler: WAIT_FOR_ALL,
};

// ============================================================================
// Helpers
// ============================================================================

function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function changesOf(entryKey: string, fields: readonly FieldProvenance[], prefix: string): FieldChange[] {
  const changes: FieldChange[] = [];
  for (const field of fields) {
    if ((field.status === 'added' || field.status === 'overwritten') && field.value !== undefined) {
      changes.push({
        entryKey,
        field: `${prefix}${field.field}`.toLowerCase(),
        value: field.value,
        sources: field.sources,
        overwritten: field.status === 'overwritten',
      });
    }
  }
  return changes;
}

/**
 * One-line run summary: "Modified 3 / 10 entries, added 7 fields"
 */
export function describeSummary(summary: RunSummary): string {
  let line = `Modified ${summary.modified} / ${summary.total} entries, added ${summary.fieldsAdded} fields`;
  if (summary.fieldsOverwritten > 0) {
    line += `, overwrote ${summary.fieldsOverwritten} fields`;
  }
  if (summary.skipped > 0) {
    line += `, skipped ${summary.skipped} entries`;
  }
  if (summary.cancelled) {
    line += ' (cancelled)';
  }
  return line;
}

// ============================================================================
// Driver
// ============================================================================

export class ReconciliationDriver {
  constructor(
    private readonly config: DriverConfig,
    private readonly logger: Logger
  ) {}

  /**
   * Fields the run would still write for an entry
   */
  fieldsToComplete(entry: Entry): ReadonlySet<string> {
    const { reconcile: options } = this.config;
    return new Set(
      FIELD_NAMES.filter(
        (field) =>
          options.allowField(field) &&
          isFieldAllowedForEntryType(field, entry.type, options.entryTypeFilter) &&
          (!entry.has(field) || options.force || options.overwrite.has(field))
      )
    );
  }

  /**
   * Whether the run processes this entry at all
   */
  isSelected(entry: Entry): boolean {
    if (!this.config.entryFilter.has(entry.key)) return false;
    return this.config.ignoreMark || !entry.has(MARKED_FIELD);
  }

  /**
   * Match and reconcile one entry against the results of its sources,
   * updating the entry in place
   */
  reconcileEntry(entry: Entry, results: ReadonlyMap<string, SourceResult>): EntryOutcome {
    const dump = new DataDump(entry.key);
    const candidates: MatchedCandidate[] = [];

    for (const result of results.values()) {
      dump.addResult(result);
      if (result.status === 'no-match') continue;

      const decision = isMatch(entry, lookupOf(result.fields));
      this.logger.debug('Match decision', {
        entry: entry.key,
        source: result.source,
        matched: decision.matched,
        reason: decision.reason,
      });
      if (decision.matched) {
        candidates.push({ source: result.source, fields: result.fields, verified: result.verified });
      }
    }

    const options = this.config.reconcile;
    const { entry: merged, provenance } = reconcile(entry, candidates, options);
    const changes = changesOf(entry.key, provenance.fields, options.fieldPrefix);
    for (const change of changes) {
      const value = merged.get(change.field);
      if (value !== undefined) entry.set(change.field, value);
    }

    for (const field of provenance.fields) {
      if (field.status === 'unverified' || field.status === 'error') {
        this.logger.warn(`Field "${field.field}" not completed`, {
          entry: entry.key,
          status: field.status,
          reason: field.reason,
        });
      }
    }

    if (this.config.mark) {
      entry.set(MARKED_FIELD, toIsoDate(this.config.now?.() ?? new Date()));
    }

    dump.setNewFields(changes.length);
    this.logger.debug(`${entry.key}: ${changes.length} new fields`);
    return { entryKey: entry.key, provenance, dump: dump.toJSON(), changes, skippedSources: [] };
  }

  /**
   * Query every selected entry on every source and reconcile in input order
   */
  async run(entries: readonly Entry[], lookups: readonly SourceLookup[], options: RunOptions = {}): Promise<RunReport> {
    const { signal } = options;
    const selected = entries.filter((entry) => this.isSelected(entry));
    this.warnUnusedEntryIds(entries);
    const queried = this.selectLookups(lookups);

    const scheduler = new LookupScheduler(queried, selected, {
      timeoutMs: this.config.timeoutMs,
      wantedFields: (entry) => this.fieldsToComplete(entry),
      logger: this.logger,
    });
    scheduler.onProgress((event) =>
      this.logger.debug('Source answered', {
        source: event.source,
        position: event.position,
        status: event.result.status,
      })
    );

    const outcomes: EntryOutcome[] = [];
    let cancelled = signal?.aborted ?? false;
    scheduler.start(signal);
    try {
      for (const [position, entry] of selected.entries()) {
        const skippedSources = await this.awaitPosition(scheduler, position, signal);
        if (skippedSources === null) {
          cancelled = true;
          break;
        }
        const outcome = this.reconcileEntry(entry, scheduler.resultsAt(position));
        outcomes.push({ ...outcome, skippedSources });
      }
    } finally {
      await scheduler.close();
    }

    const summary = this.summarize(entries.length, selected.length, outcomes, cancelled);
    this.logger.info(describeSummary(summary));
    return { outcomes, summary };
  }

  /**
   * Wait until every source answered `position` or the rest are skipped as
   * stragglers; null when the run was cancelled
   */
  private async awaitPosition(
    scheduler: LookupScheduler,
    position: number,
    signal: AbortSignal | undefined
  ): Promise<string[] | null> {
    const policy = this.config.straggler;
    let quorumReachedAt: number | null = null;

    for (;;) {
      if (signal?.aborted === true) return null;

      const answered = scheduler.answered();
      const missing = [...answered].filter(([, count]) => count <= position).map(([source]) => source);
      if (missing.length === 0) return [];

      const now = Date.now();
      if (quorumReachedAt === null && hasQuorum(policy, position, answered)) {
        quorumReachedAt = now;
      }
      if (shouldSkipStraggler(policy, { position, answered, quorumReachedAt, now })) {
        this.logger.info('Skipping slow sources', { position, sources: missing });
        return missing;
      }

      const wait =
        quorumReachedAt !== null && policy.graceMs > 0
          ? Math.max(0, quorumReachedAt + policy.graceMs - now)
          : undefined;
      await scheduler.waitForProgress(wait);
    }
  }

  /**
   * Lookups the source filter admits, warning about names no lookup carries
   */
  private selectLookups(lookups: readonly SourceLookup[]): SourceLookup[] {
    const filter = this.config.sourceFilter;
    const unused = filter.unused(lookups.map((lookup) => lookup.name));
    for (const name of unused.only) {
      this.logger.warn(`No source named "${name}" to query`);
    }
    for (const name of unused.exclude) {
      this.logger.warn(`No source named "${name}" to exclude`);
    }
    return filter.filter(lookups, (lookup) => lookup.name);
  }

  private warnUnusedEntryIds(entries: readonly Entry[]): void {
    const unused = this.config.entryFilter.unused(entries.map((entry) => entry.key));
    for (const key of unused.only) {
      this.logger.warn(`No entry with key "${key}" to complete`);
    }
    for (const key of unused.exclude) {
      this.logger.warn(`No entry with key "${key}" to exclude`);
    }
  }

  private summarize(
    total: number,
    selected: number,
    outcomes: readonly EntryOutcome[],
    cancelled: boolean
  ): RunSummary {
    return {
      total,
      processed: outcomes.length,
      modified: outcomes.filter((outcome) => outcome.changes.length > 0).length,
      fieldsAdded: outcomes.reduce((sum, outcome) => sum + outcome.provenance.added, 0),
      fieldsOverwritten: outcomes.reduce((sum, outcome) => sum + outcome.provenance.overwritten, 0),
      skipped: total - selected,
      cancelled,
    };
  }
}

/**
 * Lookup Scheduler
 *
 * Runs one sequential query stream per source, all sources in parallel, so
 * each provider sees at most one request at a time.
 *
 * DESIGN:
 * - Per-query timeout (0 disables it, at most MAX_QUERY_TIMEOUT_MS), enforced
 *   with an AbortSignal
 * - Rejections, timeouts and misattributed results become NoMatch results
 * - Answers are published in entry order; waiters are woken on every answer
 * - stop() aborts pending queries; close() waits for every stream to settle
 */

import { MAX_QUERY_TIMEOUT_MS, RESERVED_SOURCE_NAMES } from '../core/constants.js';
import type { Entry } from '../core/entry.js';
import { DuplicateSourceError, QueryTimeoutError, ReservedSourceError, describeError } from '../core/errors.js';
import { createNoMatch } from '../core/source-result.js';
import type { SourceResult } from '../core/types/index.js';
import type { Logger } from '../core/utils/logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A per-source query layer
 */
export interface SourceLookup {
  readonly name: string;
  /** Fields the source can provide; when set, queries that could not fill any wanted field are skipped */
  readonly fields?: ReadonlySet<string>;
  query(entry: Entry, signal: AbortSignal): Promise<SourceResult>;
}

export interface SchedulerOptions {
  /** Per-query timeout in milliseconds (0 = none) */
  readonly timeoutMs: number;
  /** Fields the driver would still accept for an entry */
  readonly wantedFields?: (entry: Entry) => ReadonlySet<string>;
  readonly logger?: Logger;
}

export interface LookupProgressEvent {
  readonly source: string;
  /** Index of the entry just answered */
  readonly position: number;
  readonly result: SourceResult;
}

interface SourceStream {
  readonly lookup: SourceLookup;
  readonly answers: SourceResult[];
}

// ============================================================================
// Scheduler
// ============================================================================

export class LookupScheduler {
  private readonly streams: readonly SourceStream[];
  private readonly controller = new AbortController();
  private readonly listeners: Array<(event: LookupProgressEvent) => void> = [];
  private waiters: Array<() => void> = [];
  private running: Promise<void> | null = null;
  private detachSignal: (() => void) | null = null;

  constructor(
    lookups: readonly SourceLookup[],
    private readonly entries: readonly Entry[],
    private readonly options: SchedulerOptions
  ) {
    const { timeoutMs } = options;
    if (!Number.isInteger(timeoutMs) || timeoutMs < 0 || timeoutMs > MAX_QUERY_TIMEOUT_MS) {
      throw new RangeError(
        `Query timeout must be an integer between 0 and ${MAX_QUERY_TIMEOUT_MS}ms, got ${timeoutMs}`
      );
    }
    const names = new Set<string>();
    for (const lookup of lookups) {
      if (RESERVED_SOURCE_NAMES.has(lookup.name)) throw new ReservedSourceError(lookup.name);
      if (names.has(lookup.name)) throw new DuplicateSourceError(lookup.name);
      names.add(lookup.name);
    }
    this.streams = lookups.map((lookup) => ({ lookup, answers: [] }));
  }

  get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Start every stream; aborting `signal` stops them
   */
  start(signal?: AbortSignal): void {
    if (this.running !== null) {
      throw new Error('LookupScheduler already started');
    }
    if (signal?.aborted === true) {
      this.stop();
    } else if (signal !== undefined) {
      const onAbort = (): void => this.stop();
      signal.addEventListener('abort', onAbort, { once: true });
      this.detachSignal = () => signal.removeEventListener('abort', onAbort);
    }
    this.running = Promise.all(this.streams.map((stream) => this.runStream(stream))).then(() => undefined);
  }

  stop(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
    this.notify();
  }

  /**
   * Stop and wait until every stream has settled
   */
  async close(): Promise<void> {
    this.detachSignal?.();
    this.detachSignal = null;
    this.stop();
    await this.running;
  }

  onProgress(listener: (event: LookupProgressEvent) => void): void {
    this.listeners.push(listener);
  }

  /**
   * Number of entries answered, per source
   */
  answered(): ReadonlyMap<string, number> {
    return new Map(this.streams.map((stream) => [stream.lookup.name, stream.answers.length]));
  }

  /**
   * Results available for the entry at `position`, in source order
   */
  resultsAt(position: number): ReadonlyMap<string, SourceResult> {
    const results = new Map<string, SourceResult>();
    for (const { lookup, answers } of this.streams) {
      const result = answers[position];
      if (result !== undefined) results.set(lookup.name, result);
    }
    return results;
  }

  /**
   * Resolve on the next answer, on stop, or after `timeoutMs`
   */
  waitForProgress(timeoutMs?: number): Promise<void> {
    if (this.stopped) return Promise.resolve();

    return new Promise<void>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const wake = (): void => {
        if (timer !== undefined) clearTimeout(timer);
        resolve();
      };
      this.waiters.push(wake);
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.waiters = this.waiters.filter((waiter) => waiter !== wake);
          resolve();
        }, timeoutMs);
      }
    });
  }

  private notify(): void {
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach((wake) => wake());
  }

  private async runStream(stream: SourceStream): Promise<void> {
    for (const [position, entry] of this.entries.entries()) {
      if (this.stopped) return;
      const result = await this.queryOne(stream.lookup, entry);
      if (this.stopped) return;

      stream.answers.push(result);
      const event: LookupProgressEvent = { source: stream.lookup.name, position, result };
      this.listeners.forEach((listener) => listener(event));
      this.notify();
    }
  }

  private isWanted(lookup: SourceLookup, entry: Entry): boolean {
    const wanted = this.options.wantedFields?.(entry);
    if (lookup.fields === undefined || wanted === undefined) return true;
    return [...lookup.fields].some((field) => wanted.has(field));
  }

  /**
   * Query one entry; never rejects
   */
  private async queryOne(lookup: SourceLookup, entry: Entry): Promise<SourceResult> {
    if (!this.isWanted(lookup, entry)) {
      this.options.logger?.debug('Skipping query, no field to complete', { source: lookup.name, entry: entry.key });
      return createNoMatch(lookup.name, entry.key, { error: 'skipped' });
    }

    const { timeoutMs } = this.options;
    const controller = new AbortController();
    const forwardStop = (): void => controller.abort(this.controller.signal.reason);
    this.controller.signal.addEventListener('abort', forwardStop, { once: true });
    let timer: ReturnType<typeof setTimeout> | undefined;
    const startedAt = Date.now();

    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
      if (timeoutMs > 0) {
        timer = setTimeout(() => controller.abort(new QueryTimeoutError(lookup.name, timeoutMs)), timeoutMs);
      }
    });

    try {
      const result = await Promise.race([lookup.query(entry, controller.signal), aborted]);
      if (result.source !== lookup.name || result.entryKey !== entry.key) {
        this.options.logger?.warn('Discarding misattributed result', {
          source: lookup.name,
          entry: entry.key,
          resultSource: result.source,
          resultEntry: result.entryKey,
        });
        return createNoMatch(lookup.name, entry.key, { error: 'misattributed result' });
      }
      return result;
    } catch (error) {
      const message = describeError(error);
      this.options.logger?.warn('Query failed', { source: lookup.name, entry: entry.key, error: message });
      return createNoMatch(lookup.name, entry.key, { error: message, responseTimeMs: Date.now() - startedAt });
    } finally {
      if (timer !== undefined) clearTimeout(timer);
      this.controller.signal.removeEventListener('abort', forwardStop);
    }
  }
}

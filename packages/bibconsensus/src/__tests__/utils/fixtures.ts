/**
 * Test Fixtures
 *
 * Factories for entries, source results, reconcile options and in-process
 * lookups. All data is made up.
 */

import { ENTRY_SOURCE } from '../../core/constants.js';
import { Entry } from '../../core/entry.js';
import { createFoundResult, createNoMatch } from '../../core/source-result.js';
import type { FoundResult, MatchedCandidate, ReconcileOptions, SourceResult } from '../../core/types/index.js';
import { createLogger, type LogLevel, type Logger } from '../../core/utils/logger.js';
import type { SourceLookup } from '../../driver/lookup-scheduler.js';

export function makeEntry(key: string, fields: Record<string, string>, type = 'article'): Entry {
  return new Entry(key, type, Object.entries(fields));
}

export function found(
  source: string,
  entryKey: string,
  fields: Record<string, string>,
  verified: readonly string[] = []
): FoundResult {
  return createFoundResult({ source, entryKey, fields: Object.entries(fields), verified });
}

export function candidate(
  source: string,
  fields: Record<string, string>,
  verified: readonly string[] = []
): MatchedCandidate {
  return { source, fields: new Map(Object.entries(fields)), verified: new Set(verified) };
}

export function reconcileOptions(overrides: Partial<ReconcileOptions> = {}): ReconcileOptions {
  return {
    sourcePriority: [],
    overwrite: new Set(),
    force: false,
    allowField: () => true,
    entryVotes: true,
    entrySource: ENTRY_SOURCE,
    fieldPrefix: '',
    formatting: { escapeUnicode: false, protectUppercase: new Set() },
    entryTypeFilter: 'no',
    ...overrides,
  };
}

export interface CapturedLog {
  readonly level: LogLevel;
  readonly line: string;
}

/**
 * Logger that records plain, uncoloured lines
 */
export function captureLogger(level: LogLevel = 'debug'): { logger: Logger; lines: CapturedLog[] } {
  const lines: CapturedLog[] = [];
  const logger = createLogger({
    level,
    color: false,
    sink: (entryLevel, line) => lines.push({ level: entryLevel, line }),
  });
  return { logger, lines };
}

export function silentLogger(): Logger {
  return createLogger({ level: 'error', sink: () => undefined });
}

/**
 * Lookup answering from a table keyed by entry key; unknown keys are no-match
 */
export function tableLookup(name: string, table: Record<string, Record<string, string>>): SourceLookup {
  return {
    name,
    query: async (entry: Entry): Promise<SourceResult> => {
      const fields = table[entry.key];
      return fields !== undefined ? found(name, entry.key, fields) : createNoMatch(name, entry.key);
    },
  };
}

/**
 * Promise whose resolution is controlled by the test
 */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

/**
 * Reconciliation Driver Tests
 *
 * End-to-end runs over in-process lookups: matching, reconciliation in input
 * order, marks, diff output, data dumps, stragglers and cancellation.
 */

import { describe, it, expect } from 'vitest';
import { MARKED_FIELD } from '../../../core/constants.js';
import type { SourceResult } from '../../../core/types/index.js';
import { OnlyExclude } from '../../../core/utils/only-exclude.js';
import { diffRecords } from '../../../driver/diff.js';
import type { SourceLookup } from '../../../driver/lookup-scheduler.js';
import {
  ReconciliationDriver,
  describeSummary,
  type DriverConfig,
} from '../../../driver/reconciliation-driver.js';
import { WAIT_FOR_ALL } from '../../../driver/straggler-policy.js';
import { captureLogger, makeEntry, reconcileOptions, silentLogger, tableLookup } from '../../utils/fixtures.js';

function driverConfig(overrides: Partial<DriverConfig> = {}): DriverConfig {
  return {
    reconcile: reconcileOptions(),
    entryFilter: OnlyExclude.all(),
    sourceFilter: OnlyExclude.all(),
    mark: false,
    ignoreMark: false,
    timeoutMs: 0,
    straggler: WAIT_FOR_ALL,
    ...overrides,
  };
}

function makeEntries(): ReturnType<typeof makeEntry>[] {
  return [
    makeEntry('e1', { title: 'Sparse Graph Sketches', author: 'Doe, Jane', year: '2001' }),
    makeEntry('e2', { title: 'Dense Graph Sketches' }),
  ];
}

function makeLookups(): SourceLookup[] {
  return [
    tableLookup('alpha', {
      e1: { title: 'Sparse Graph Sketches', author: 'Jane Doe', year: '2001', publisher: 'ACM', pages: '1-10' },
      e2: { title: 'Something Else', publisher: 'Elsewhere Press' },
    }),
    tableLookup('beta', {
      e1: { title: 'sparse graph sketches', publisher: 'Association for Computer Machinery', pages: '1 to 10' },
    }),
  ];
}

const never = (): Promise<SourceResult> => new Promise<SourceResult>(() => undefined);

describe('ReconciliationDriver', () => {
  it('should complete matching entries and leave the rest alone', async () => {
    const entries = makeEntries();
    const { logger, lines } = captureLogger('info');
    const driver = new ReconciliationDriver(driverConfig(), logger);

    const { outcomes, summary } = await driver.run(entries, makeLookups());

    expect(entries[0].get('publisher')).toBe('Association for Computer Machinery');
    expect(entries[0].get('pages')).toBe('1--10');
    expect(entries[1].has('publisher')).toBe(false);
    expect(outcomes[0].changes).toEqual([
      {
        entryKey: 'e1',
        field: 'publisher',
        value: 'Association for Computer Machinery',
        sources: ['alpha', 'beta'],
        overwritten: false,
      },
      { entryKey: 'e1', field: 'pages', value: '1--10', sources: ['alpha', 'beta'], overwritten: false },
    ]);
    expect(outcomes[1].changes).toEqual([]);
    expect(summary).toEqual({
      total: 2,
      processed: 2,
      modified: 1,
      fieldsAdded: 2,
      fieldsOverwritten: 0,
      skipped: 0,
      cancelled: false,
    });
    expect(lines.some((entry) => entry.line.endsWith('Modified 1 / 2 entries, added 2 fields'))).toBe(true);
  });

  it('should record what every source returned in the data dump', async () => {
    const driver = new ReconciliationDriver(driverConfig(), silentLogger());
    const { outcomes } = await driver.run(makeEntries(), makeLookups());

    expect(outcomes[1].dump).toEqual({
      entry: 'e2',
      'new-fields': 0,
      alpha: { title: 'Something Else', publisher: 'Elsewhere Press' },
      beta: null,
    });
    expect(outcomes[0].dump['new-fields']).toBe(2);
  });

  it('should mark processed entries and skip marked ones on the next run', async () => {
    const entries = makeEntries();
    const driver = new ReconciliationDriver(
      driverConfig({ mark: true, now: () => new Date('2024-03-05T12:00:00Z') }),
      silentLogger()
    );

    await driver.run(entries, makeLookups());
    expect(entries.map((entry) => entry.get(MARKED_FIELD))).toEqual(['2024-03-05', '2024-03-05']);

    const second = await driver.run(entries, makeLookups());
    expect(second.summary).toMatchObject({ processed: 0, skipped: 2 });
  });

  it('should process marked entries again with ignoreMark', async () => {
    const entries = [makeEntry('e1', { title: 'Sparse Graph Sketches', [MARKED_FIELD]: '2020-01-01' })];
    const driver = new ReconciliationDriver(driverConfig({ ignoreMark: true }), silentLogger());
    const { summary } = await driver.run(entries, makeLookups());
    expect(summary.processed).toBe(1);
  });

  it('should write only new fields and the mark in diff records', async () => {
    const entries = makeEntries();
    const driver = new ReconciliationDriver(
      driverConfig({ mark: true, now: () => new Date('2024-03-05T00:00:00Z') }),
      silentLogger()
    );
    const { outcomes } = await driver.run(entries, makeLookups());

    expect(diffRecords(entries, outcomes, true)).toEqual([
      {
        key: 'e1',
        type: 'article',
        fields: {
          publisher: 'Association for Computer Machinery',
          pages: '1--10',
          [MARKED_FIELD]: '2024-03-05',
        },
      },
    ]);
  });

  it('should warn about entry keys that match nothing', async () => {
    const { logger, lines } = captureLogger('warn');
    const driver = new ReconciliationDriver(
      driverConfig({ entryFilter: OnlyExclude.fromNonEmpty(['e2', 'missing']) }),
      logger
    );

    const { summary } = await driver.run(makeEntries(), makeLookups());

    expect(summary).toMatchObject({ processed: 1, skipped: 1 });
    expect(lines.some((entry) => entry.level === 'warn' && entry.line.includes('No entry with key "missing"'))).toBe(
      true
    );
  });

  it('should list the fields an entry still accepts', () => {
    const driver = new ReconciliationDriver(
      driverConfig({ reconcile: reconcileOptions({ entryTypeFilter: 'required', overwrite: new Set(['year']) }) }),
      silentLogger()
    );
    const entry = makeEntry('e1', { title: 'T', year: '2001' });
    expect([...driver.fieldsToComplete(entry)]).toEqual(['author', 'journal', 'year']);
  });

  it('should reconcile without stragglers once the grace period expires', async () => {
    const stuck: SourceLookup = { name: 'stuck', query: () => never() };
    const driver = new ReconciliationDriver(
      driverConfig({ straggler: { minCompletedFraction: 0.5, maxLag: 0, graceMs: 20 } }),
      silentLogger()
    );
    const entries = makeEntries().slice(0, 1);

    const { outcomes } = await driver.run(entries, [makeLookups()[0], stuck]);

    expect(outcomes[0].skippedSources).toEqual(['stuck']);
    expect(entries[0].get('publisher')).toBe('ACM');
  });

  it('should skip a source once it lags the fastest by maxLag entries', async () => {
    const stuck: SourceLookup = { name: 'stuck', query: () => never() };
    const driver = new ReconciliationDriver(
      driverConfig({ straggler: { minCompletedFraction: 0.5, maxLag: 2, graceMs: 0 } }),
      silentLogger()
    );
    const entries = makeEntries();

    const { outcomes } = await driver.run(entries, [makeLookups()[0], stuck]);

    expect(outcomes.map((outcome) => outcome.skippedSources)).toEqual([['stuck'], ['stuck']]);
    expect(entries[0].get('publisher')).toBe('ACM');
  });

  it('should query only the sources the source filter admits', async () => {
    const { logger, lines } = captureLogger('warn');
    const driver = new ReconciliationDriver(
      driverConfig({ sourceFilter: OnlyExclude.fromNonEmpty(['beta', 'gone']) }),
      logger
    );
    const entries = makeEntries();

    const { outcomes } = await driver.run(entries, makeLookups());

    expect(entries[0].get('publisher')).toBe('Association for Computer Machinery');
    expect(outcomes[0].dump.alpha).toBeUndefined();
    expect(outcomes[0].dump.beta).not.toBeNull();
    expect(lines.filter((entry) => entry.level === 'warn').map((entry) => entry.line)).toEqual([
      expect.stringMatching(/No source named "gone" to query$/),
    ]);
  });

  it('should stop and report cancellation when the signal aborts', async () => {
    const controller = new AbortController();
    const cancelling: SourceLookup = {
      name: 'cancelling',
      query: () => {
        controller.abort();
        return never();
      },
    };
    const entries = makeEntries();
    const driver = new ReconciliationDriver(driverConfig(), silentLogger());

    const { outcomes, summary } = await driver.run(entries, [cancelling], { signal: controller.signal });

    expect(outcomes).toEqual([]);
    expect(summary).toMatchObject({ processed: 0, cancelled: true });
    expect(entries[0].has('publisher')).toBe(false);
  });
});

describe('describeSummary', () => {
  it('should mention overwrites, skips and cancellation only when present', () => {
    const base = {
      total: 10,
      processed: 8,
      modified: 3,
      fieldsAdded: 7,
      fieldsOverwritten: 0,
      skipped: 0,
      cancelled: false,
    };
    expect(describeSummary(base)).toBe('Modified 3 / 10 entries, added 7 fields');
    expect(describeSummary({ ...base, fieldsOverwritten: 2, skipped: 2, cancelled: true })).toBe(
      'Modified 3 / 10 entries, added 7 fields, overwrote 2 fields, skipped 2 entries (cancelled)'
    );
  });
});

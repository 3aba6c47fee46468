/**
 * CLI Command Tests
 *
 * Commands run against temp files with a captured CommandIO and an empty
 * environment; nothing touches the process streams.
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Command } from 'commander';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  executeCompare,
  executeFields,
  executeMerge,
  executeNormalize,
  registerCommands,
  toOverrides,
  type MergeOptions,
} from '../../../cli/commands/index.js';
import { parseTimeout } from '../../../cli/commands/merge.js';
import { globalOptionsOf, type CommandIO } from '../../../cli/lib/context.js';
import { EXIT_CODES } from '../../../cli/lib/exit-codes.js';

const ENTRIES = [
  { key: 'e1', type: 'article', fields: { title: 'Sparse Graph Sketches', author: 'Doe, Jane', year: '2001' } },
  { key: 'e2', type: 'article', fields: { title: 'Dense Graph Sketches' } },
];

const RESULTS = {
  e1: {
    alpha: {
      fields: { title: 'Sparse Graph Sketches', author: 'Jane Doe', year: '2001', publisher: 'ACM', pages: '1-10' },
    },
    beta: {
      fields: { title: 'sparse graph sketches', publisher: 'Association for Computer Machinery', pages: '1 to 10' },
    },
  },
  e2: {
    alpha: { fields: { title: 'Something Else', publisher: 'Elsewhere Press' } },
  },
};

interface Captured {
  readonly io: CommandIO;
  readonly out: string[];
  readonly err: string[];
}

function capture(dir: string, signal?: AbortSignal, env: Record<string, string> = {}): Captured {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: { out: (text) => out.push(text), err: (text) => err.push(text), cwd: dir, env, signal },
    out,
    err,
  };
}

describe('merge command', () => {
  let dir: string;
  let entriesPath: string;
  let resultsPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'bibconsensus-cli-'));
    entriesPath = join(dir, 'entries.json');
    resultsPath = join(dir, 'results.json');
    await writeFile(entriesPath, JSON.stringify(ENTRIES));
    await writeFile(resultsPath, JSON.stringify(RESULTS));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write completed entries to stdout', async () => {
    const { io, out } = capture(dir);
    const code = await executeMerge(entriesPath, { results: resultsPath }, io);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(out).toHaveLength(1);
    expect(JSON.parse(out[0])).toEqual([
      {
        key: 'e1',
        type: 'article',
        fields: {
          title: 'Sparse Graph Sketches',
          author: 'Doe, Jane',
          year: '2001',
          publisher: 'Association for Computer Machinery',
          pages: '1--10',
        },
      },
      ENTRIES[1],
    ]);
  });

  it('should write only prefixed new fields in diff mode', async () => {
    const { io } = capture(dir);
    const output = join(dir, 'out.json');
    const code = await executeMerge(entriesPath, { results: resultsPath, diff: true, prefix: true, output }, io);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(JSON.parse(await readFile(output, 'utf-8'))).toEqual([
      {
        key: 'e1',
        type: 'article',
        fields: { bcpublisher: 'Association for Computer Machinery', bcpages: '1--10' },
      },
    ]);
  });

  it('should dump what every source returned', async () => {
    const { io } = capture(dir);
    const dump = join(dir, 'dump.json');
    await executeMerge(entriesPath, { results: resultsPath, dumpData: dump }, io);

    const records = JSON.parse(await readFile(dump, 'utf-8'));
    expect(records).toHaveLength(2);
    expect(records[1]).toEqual({
      entry: 'e2',
      'new-fields': 0,
      alpha: { title: 'Something Else', publisher: 'Elsewhere Press' },
      beta: null,
    });
  });

  it('should take JSON logging from the environment when --json is left off', async () => {
    const { io, err } = capture(dir, undefined, { BIBCONSENSUS_JSON: 'true' });
    const code = await executeMerge(entriesPath, { results: resultsPath }, io);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(JSON.parse(err[0])).toMatchObject({ level: 'info', message: 'Starting merge', command: 'merge' });
  });

  it('should leave out sources named by --dont-query', async () => {
    const { io, out } = capture(dir);
    const code = await executeMerge(entriesPath, { results: resultsPath, dontQuery: ['beta'] }, io);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(JSON.parse(out[0])[0].fields).toMatchObject({ publisher: 'ACM', pages: '1--10' });
  });

  it('should report conflicting field filters as a configuration error', async () => {
    const { io, out, err } = capture(dir);
    const code = await executeMerge(
      entriesPath,
      { results: resultsPath, onlyComplete: ['title'], dontComplete: ['year'] },
      io
    );

    expect(code).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(out).toEqual([]);
    expect(err).toEqual([
      'Configuration error: Invalid configuration\n  - only-complete and dont-complete cannot be combined',
    ]);
  });

  it('should report a missing entries file as an input error', async () => {
    const { io, err } = capture(dir);
    const code = await executeMerge(join(dir, 'missing.json'), { results: resultsPath }, io);

    expect(code).toBe(EXIT_CODES.INPUT_ERROR);
    expect(err.at(-1)).toMatch(/^Input error: Cannot read file: /);
  });

  it('should stop and report cancellation when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const { io, out } = capture(dir, controller.signal);
    const code = await executeMerge(entriesPath, { results: resultsPath }, io);

    expect(code).toBe(EXIT_CODES.USER_CANCELLED);
    expect(JSON.parse(out[0])).toEqual(ENTRIES);
  });
});

describe('globalOptionsOf', () => {
  it('should leave flags that were not given undefined', () => {
    const program = new Command().option('-v, --verbose').option('--json').option('--config <path>');
    const merge = program.command('merge');

    expect(globalOptionsOf(merge)).toEqual({ verbose: undefined, json: undefined, config: undefined });

    program.setOptionValue('json', true);
    expect(globalOptionsOf(merge).json).toBe(true);
  });
});

describe('parseTimeout', () => {
  it('should accept timeouts a timer can hold', () => {
    expect(parseTimeout('0')).toBe(0);
    expect(parseTimeout('2147483647')).toBe(2147483647);
  });

  it.each(['-1', '1.5', 'soon', '2147483648'])('should reject "%s"', (value) => {
    expect(() => parseTimeout(value)).toThrow('Expected an integer between 0 and 2147483647.');
  });
});

describe('toOverrides', () => {
  it('should map flags onto configuration keys', () => {
    const options: MergeOptions = {
      results: 'results.json',
      prefix: true,
      verbose: true,
      filterByEntrytype: 'required',
      priority: ['alpha'],
      timeout: 0,
      onlyQuery: ['alpha'],
      dontOverwrite: ['year'],
      dontProtectUppercase: ['url'],
    };
    expect(toOverrides(options)).toMatchObject({
      fieldPrefix: 'BC',
      logLevel: 'debug',
      entryTypeFilter: 'required',
      sourcePriority: ['alpha'],
      timeoutMs: 0,
      onlyQuery: ['alpha'],
      dontOverwrite: ['year'],
      dontProtectUppercase: ['url'],
    });
  });

  it('should leave unset flags undefined', () => {
    const overrides = toOverrides({ results: 'results.json', prefix: '' });
    expect(overrides.fieldPrefix).toBeUndefined();
    expect(overrides.logLevel).toBeUndefined();
    expect(overrides.entryTypeFilter).toBeUndefined();
  });

  it('should keep an explicit prefix', () => {
    expect(toOverrides({ results: 'results.json', prefix: 'x_' }).fieldPrefix).toBe('x_');
  });
});

describe('normalize command', () => {
  it('should describe a page range', () => {
    const out: string[] = [];
    const code = executeNormalize('pages', '12 to 15', {}, { out: (text) => out.push(text), err: () => undefined });

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(out[0].split('\n')).toEqual([
      'field:   pages (pages)',
      'display: 12--15',
      'key:     12--15',
      'valid:   yes',
    ]);
  });
});

describe('compare command', () => {
  it('should exit 0 for equivalent values', () => {
    const out: string[] = [];
    const code = executeCompare('year', '2001', '2001', {}, { out: (text) => out.push(text), err: () => undefined });
    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(out).toEqual(['equivalent (numeric)']);
  });

  it('should exit 1 for different values', () => {
    const out: string[] = [];
    const code = executeCompare('year', '2001', '2002', {}, { out: (text) => out.push(text), err: () => undefined });
    expect(code).toBe(EXIT_CODES.WARNINGS);
    expect(out).toEqual(['not equivalent (numeric)']);
  });
});

describe('fields command', () => {
  it('should list the required fields of an entry type as JSON', () => {
    const out: string[] = [];
    executeFields(
      { json: true, entryType: 'article', filter: 'required' },
      { out: (text) => out.push(text), err: () => undefined }
    );

    const records: { name: string; category: string }[] = JSON.parse(out[0]);
    expect(records.map((record) => record.name)).toEqual(['author', 'journal', 'title', 'year']);
    expect(new Set(records.map((record) => record.category))).toEqual(new Set(['required']));
  });

  it('should print a table with a header row', () => {
    const out: string[] = [];
    executeFields({}, { out: (text) => out.push(text), err: () => undefined });
    expect(out[0].split('\n')[0]).toBe('field        | normalizer | comparator   | identifier | verified');
  });
});

describe('registerCommands', () => {
  it('should register every command', () => {
    const program = new Command();
    registerCommands(program);
    expect(program.commands.map((command) => command.name())).toEqual(['merge', 'normalize', 'compare', 'fields']);
  });
});

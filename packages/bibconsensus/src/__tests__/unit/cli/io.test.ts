/**
 * Interchange File Tests
 */

import { describe, it, expect } from 'vitest';
import { createFileLookups, parseEntries, parseResults, sourceNames } from '../../../cli/lib/io.js';
import { InputFormatError } from '../../../core/errors.js';
import { makeEntry } from '../../utils/fixtures.js';

function parseError(run: () => unknown): InputFormatError | null {
  try {
    run();
    return null;
  } catch (error) {
    return error instanceof InputFormatError ? error : null;
  }
}

describe('parseEntries', () => {
  it('should build entries with lowercased types and field names', () => {
    const [entry] = parseEntries('[{"key":"e1","type":"Article","fields":{"Title":"T"}}]', 'entries.json');
    expect(entry.key).toBe('e1');
    expect(entry.type).toBe('article');
    expect(entry.toJSON().fields).toEqual({ title: 'T' });
  });

  it('should reject invalid JSON', () => {
    const error = parseError(() => parseEntries('[{', 'entries.json'));
    expect(error?.message).toMatch(/^Invalid JSON: /);
    expect(error?.filePath).toBe('entries.json');
  });

  it('should report schema problems by path', () => {
    const error = parseError(() => parseEntries('[{"key":"","type":"article","fields":{}}]', 'entries.json'));
    expect(error?.issues).toEqual(['0.key: Entry key must not be empty']);
  });

  it('should reject duplicate keys', () => {
    const content = JSON.stringify([
      { key: 'a', type: 'misc', fields: {} },
      { key: 'a', type: 'misc', fields: {} },
    ]);
    const error = parseError(() => parseEntries(content, 'entries.json'));
    expect(error?.getSummary()).toBe('Duplicate entry keys (entries.json)\n  - key "a" appears more than once');
  });
});

describe('file lookups', () => {
  const results = parseResults(
    JSON.stringify({
      e1: {
        alpha: { fields: { Title: 'T' }, verified: ['DOI'], query: { url: 'https://example.org/q', statusCode: 200 } },
        beta: null,
      },
      e2: { gamma: { fields: {} } },
    }),
    'results.json'
  );

  it('should list sources in order of first appearance', () => {
    expect(sourceNames(results)).toEqual(['alpha', 'beta', 'gamma']);
  });

  it('should answer from the file', async () => {
    const [alpha, beta, gamma] = createFileLookups(results);
    const entry = makeEntry('e1', {});
    const signal = new AbortController().signal;

    const answer = await alpha.query(entry, signal);
    expect(answer.status).toBe('found');
    if (answer.status === 'found') {
      expect(answer.fields.get('title')).toBe('T');
      expect(answer.verified.has('doi')).toBe(true);
    }
    expect(answer.query).toEqual({ url: 'https://example.org/q', statusCode: 200 });
    expect((await beta.query(entry, signal)).status).toBe('no-match');
    expect((await gamma.query(entry, signal)).status).toBe('no-match');
  });

  it('should reject source names used by the data dump', () => {
    const content = JSON.stringify({ e1: { entry: null, alpha: null, 'new-fields': null } });
    const error = parseError(() => parseResults(content, 'results.json'));
    expect(error?.issues).toEqual([
      'source "entry" cannot be used as a source name',
      'source "new-fields" cannot be used as a source name',
    ]);
  });

  it('should reject results that are not objects', () => {
    expect(() => parseResults('[]', 'results.json')).toThrow(InputFormatError);
  });
});

/**
 * Interchange File I/O
 *
 * Reads and validates the JSON files the CLI works on:
 *
 *   entries file: [{ "key": "knuth1984", "type": "article", "fields": { "title": "..." } }]
 *   results file: { "knuth1984": { "crossref": { "fields": {...}, "verified": ["doi"] }, "dblp": null } }
 *
 * The results file stands in for the query layer: each source in it becomes a
 * SourceLookup answering from the file.
 *
 * @module cli/lib/io
 */

import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { RESERVED_SOURCE_NAMES } from '../../core/constants.js';
import { Entry } from '../../core/entry.js';
import { InputFormatError, describeError } from '../../core/errors.js';
import { createFoundResult, createNoMatch } from '../../core/source-result.js';
import type { SourceResult } from '../../core/types/index.js';
import type { SourceLookup } from '../../driver/lookup-scheduler.js';

// ============================================================================
// Schemas
// ============================================================================

const EntryRecordSchema = z.object({
  key: z.string().min(1, 'Entry key must not be empty'),
  type: z.string().min(1, 'Entry type must not be empty'),
  fields: z.record(z.string()),
});

export const EntriesFileSchema = z.array(EntryRecordSchema);

const QueryInfoSchema = z
  .object({
    url: z.string().optional(),
    responseTimeMs: z.number().min(0).optional(),
    statusCode: z.number().int().optional(),
    error: z.string().optional(),
  })
  .strict();

const SourceRecordSchema = z.object({
  fields: z.record(z.string()),
  verified: z.array(z.string()).optional(),
  query: QueryInfoSchema.optional(),
});

export const ResultsFileSchema = z.record(z.record(z.union([z.null(), SourceRecordSchema])));

export type ResultsFile = z.infer<typeof ResultsFileSchema>;

// ============================================================================
// Parsing
// ============================================================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function parseJson(content: string, filePath: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new InputFormatError(`Invalid JSON: ${describeError(error)}`, filePath);
  }
}

async function readText(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new InputFormatError(`Cannot read file: ${describeError(error)}`, filePath);
  }
}

export function parseEntries(content: string, filePath: string): Entry[] {
  const parsed = EntriesFileSchema.safeParse(parseJson(content, filePath));
  if (!parsed.success) {
    throw new InputFormatError('Invalid entries file', filePath, formatIssues(parsed.error));
  }

  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const record of parsed.data) {
    if (seen.has(record.key)) duplicates.add(record.key);
    seen.add(record.key);
  }
  if (duplicates.size > 0) {
    throw new InputFormatError(
      'Duplicate entry keys',
      filePath,
      [...duplicates].map((key) => `key "${key}" appears more than once`)
    );
  }
  return parsed.data.map((record) => Entry.fromRecord(record));
}

export function parseResults(content: string, filePath: string): ResultsFile {
  const parsed = ResultsFileSchema.safeParse(parseJson(content, filePath));
  if (!parsed.success) {
    throw new InputFormatError('Invalid results file', filePath, formatIssues(parsed.error));
  }

  const reserved = sourceNames(parsed.data).filter((name) => RESERVED_SOURCE_NAMES.has(name));
  if (reserved.length > 0) {
    throw new InputFormatError(
      'Reserved source names',
      filePath,
      reserved.map((name) => `source "${name}" cannot be used as a source name`)
    );
  }
  return parsed.data;
}

export async function readEntriesFile(filePath: string): Promise<Entry[]> {
  return parseEntries(await readText(filePath), filePath);
}

export async function readResultsFile(filePath: string): Promise<ResultsFile> {
  return parseResults(await readText(filePath), filePath);
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
}

// ============================================================================
// File-backed Lookups
// ============================================================================

/**
 * Source names in order of first appearance
 */
export function sourceNames(results: ResultsFile): string[] {
  const names = new Set<string>();
  for (const perSource of Object.values(results)) {
    Object.keys(perSource).forEach((source) => names.add(source));
  }
  return [...names];
}

function answerFromFile(results: ResultsFile, source: string, entry: Entry): SourceResult {
  const record = results[entry.key]?.[source];
  if (record === undefined || record === null) {
    return createNoMatch(source, entry.key);
  }
  return createFoundResult({
    source,
    entryKey: entry.key,
    fields: Object.entries(record.fields),
    verified: record.verified,
    query: record.query,
  });
}

/**
 * One lookup per source of the results file
 */
export function createFileLookups(results: ResultsFile): SourceLookup[] {
  return sourceNames(results).map((name) => ({
    name,
    query: async (entry: Entry) => answerFromFile(results, name, entry),
  }));
}

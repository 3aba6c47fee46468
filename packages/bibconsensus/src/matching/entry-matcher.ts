/**
 * Entry Matcher
 *
 * Decides whether a candidate returned by a source describes the same work as
 * the local entry. Gates, first applicable rule decides:
 *
 *   1. equal valid DOIs                          → match ('identifier')
 *   2. candidate has neither title nor valid DOI → no match
 *      titles must be exact-fold equal          → else 'title-mismatch'
 *   3. author lists must share a person          → else 'author-mismatch'
 *   4. years must be numerically equal           → else 'year-mismatch'
 *
 * Gates 3 and 4 only apply when both records carry the field.
 */

import { plainValue } from '../core/entry.js';
import type { FieldLookup, MatchDecision, MatchReason } from '../core/types/index.js';
import { equivalent, identifierEqual } from '../comparison/comparators.js';
import { normalize } from '../normalization/index.js';

function present(record: FieldLookup, field: string): string | null {
  const value = record.get(field);
  return value !== undefined && plainValue(value) !== '' ? value : null;
}

function decision(matched: boolean, reason: MatchReason): MatchDecision {
  return { matched, reason };
}

export function isMatch(entry: FieldLookup, candidate: FieldLookup): MatchDecision {
  const entryDoi = present(entry, 'doi');
  const candidateDoi = present(candidate, 'doi');
  const entryDoiValue = entryDoi !== null ? normalize('doi', entryDoi) : null;
  const candidateDoiValue = candidateDoi !== null ? normalize('doi', candidateDoi) : null;

  if (entryDoiValue !== null && candidateDoiValue !== null && identifierEqual(entryDoiValue, candidateDoiValue)) {
    return decision(true, 'identifier');
  }

  const candidateTitle = present(candidate, 'title');
  if (candidateTitle === null && candidateDoiValue?.valid !== true) {
    return decision(false, 'no-identifying-field');
  }

  const entryTitle = present(entry, 'title');
  if (entryTitle === null || candidateTitle === null || !equivalent('title', entryTitle, candidateTitle)) {
    return decision(false, 'title-mismatch');
  }

  const entryAuthors = present(entry, 'author');
  const candidateAuthors = present(candidate, 'author');
  if (entryAuthors !== null && candidateAuthors !== null && !equivalent('author', entryAuthors, candidateAuthors)) {
    return decision(false, 'author-mismatch');
  }

  const entryYear = present(entry, 'year');
  const candidateYear = present(candidate, 'year');
  if (entryYear !== null && candidateYear !== null && !equivalent('year', entryYear, candidateYear)) {
    return decision(false, 'year-mismatch');
  }

  return decision(true, 'title-author-year');
}

/**
 * Adapt a plain field map to the lookup interface
 */
export function lookupOf(fields: ReadonlyMap<string, string>): FieldLookup {
  return { get: (field) => fields.get(field.toLowerCase()) };
}

/**
 * Entry Matcher Tests
 */

import { describe, it, expect } from 'vitest';
import type { FieldLookup } from '../../../core/types/index.js';
import { isMatch, lookupOf } from '../../../matching/entry-matcher.js';
import { makeEntry } from '../../utils/fixtures.js';

function record(fields: Record<string, string>): FieldLookup {
  return lookupOf(new Map(Object.entries(fields)));
}

const ENTRY = makeEntry('doe2001', {
  title: 'Sparse Graph Sketches',
  author: 'Doe, Jane and Roe, Richard',
  year: '2001',
  doi: '10.5555/sketch.01',
});

describe('isMatch', () => {
  it('should match on equal DOIs whatever the other fields say', () => {
    const decision = isMatch(ENTRY, record({ doi: 'https://doi.org/10.5555/SKETCH.01', title: 'Something Else' }));
    expect(decision).toEqual({ matched: true, reason: 'identifier' });
  });

  it('should match equal DOIs in both directions when titles and authors disagree', () => {
    const left = makeEntry('left', { doi: '10.5555/sketch.01', title: 'Sparse Graph Sketches', author: 'Doe, Jane' });
    const right = makeEntry('right', {
      doi: 'doi:10.5555/SKETCH.01',
      title: 'Dense Matrix Sketches',
      author: 'Poe, Edgar',
    });

    expect(isMatch(left, right)).toEqual({ matched: true, reason: 'identifier' });
    expect(isMatch(right, left)).toEqual({ matched: true, reason: 'identifier' });
  });

  it('should reject candidates with neither title nor valid DOI', () => {
    expect(isMatch(ENTRY, record({ doi: 'pending', year: '2001' }))).toEqual({
      matched: false,
      reason: 'no-identifying-field',
    });
  });

  it('should reject a title that only extends the entry title', () => {
    const entry = makeEntry('x', { title: 'Neural Networks for X' });
    expect(isMatch(entry, record({ title: 'Neural Networks' })).reason).toBe('title-mismatch');
  });

  it('should reject when the entry has no title to compare', () => {
    const entry = makeEntry('x', { author: 'Doe, Jane' });
    expect(isMatch(entry, record({ title: 'Sparse Graph Sketches' })).reason).toBe('title-mismatch');
  });

  it('should reject author lists without a common person', () => {
    const decision = isMatch(ENTRY, record({ title: 'Sparse graph sketches', author: 'Poe, Edgar' }));
    expect(decision).toEqual({ matched: false, reason: 'author-mismatch' });
  });

  it('should reject different years', () => {
    const decision = isMatch(ENTRY, record({ title: 'Sparse Graph Sketches', author: 'J. Doe', year: '2003' }));
    expect(decision).toEqual({ matched: false, reason: 'year-mismatch' });
  });

  it('should match on title, authors and year', () => {
    const decision = isMatch(ENTRY, record({ title: 'SPARSE GRAPH SKETCHES.', author: 'J. Doe', year: '2001' }));
    expect(decision).toEqual({ matched: true, reason: 'title-author-year' });
  });

  it('should skip the author and year gates when a side lacks them', () => {
    expect(isMatch(ENTRY, record({ title: 'Sparse Graph Sketches' })).matched).toBe(true);
  });

  it('should treat brace-only values as absent', () => {
    expect(isMatch(ENTRY, record({ title: '{}' })).reason).toBe('no-identifying-field');
  });
});

describe('lookupOf', () => {
  it('should read fields case-insensitively', () => {
    expect(record({ title: 'T' }).get('TITLE')).toBe('T');
  });
});

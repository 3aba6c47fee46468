/**
 * Abbreviation and Acronym Tests
 */

import { describe, it, expect } from 'vitest';
import { isAbbreviation, isAcronymOf } from '../../../comparison/abbreviation.js';

const LONG = 'proceedings of the association for computer machinery';

describe('isAbbreviation', () => {
  it('should accept word-prefix abbreviations', () => {
    expect(isAbbreviation('proc acm', LONG)).toBe(true);
    expect(isAbbreviation('proc assoc comput mach', LONG)).toBe(true);
  });

  it('should require the first letter at the start', () => {
    expect(isAbbreviation('acm', LONG)).toBe(false);
  });

  it('should reject letters that are neither continuations nor word starts', () => {
    expect(isAbbreviation('jr', 'junior')).toBe(false);
  });

  it('should respect the minimum letter count', () => {
    expect(isAbbreviation('j', 'john')).toBe(false);
    expect(isAbbreviation('j', 'john', 1)).toBe(true);
  });

  it('should reject an empty long side', () => {
    expect(isAbbreviation('ab', '')).toBe(false);
  });
});

describe('isAcronymOf', () => {
  it('should match initials of all words', () => {
    expect(isAcronymOf('ieee', 'institute of electrical and electronics engineers')).toBe(true);
  });

  it('should match initials without stop words', () => {
    expect(isAcronymOf('acm', 'association for computer machinery')).toBe(true);
  });

  it('should match initials including stop words', () => {
    expect(isAcronymOf('afcm', 'association for computer machinery')).toBe(true);
  });

  it('should need at least two words', () => {
    expect(isAcronymOf('a', 'alpha')).toBe(false);
    expect(isAcronymOf('ab', 'alphabet')).toBe(false);
  });
});

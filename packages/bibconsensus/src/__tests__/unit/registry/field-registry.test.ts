/**
 * Field Registry Tests
 */

import { describe, it, expect } from 'vitest';
import { FIELD_NAMES } from '../../../core/constants.js';
import {
  entryTypeCategory,
  fieldsForEntryType,
  getEntryTypeFields,
  getFieldSpec,
  isFieldAllowedForEntryType,
  isRegisteredField,
  listFieldSpecs,
} from '../../../registry/field-registry.js';

describe('getFieldSpec', () => {
  it('should describe identifier fields', () => {
    expect(getFieldSpec('DOI')).toEqual({
      name: 'doi',
      normalizer: 'doi',
      comparator: 'identifier',
      identifier: true,
      requiresVerification: true,
      entryTypeFiltered: true,
    });
    expect(getFieldSpec('isbn').requiresVerification).toBe(false);
  });

  it('should use the abbreviation comparator for venues', () => {
    expect(getFieldSpec('journal').comparator).toBe('abbreviation');
    expect(getFieldSpec('publisher').comparator).toBe('abbreviation');
    expect(getFieldSpec('title').comparator).toBe('exact-fold');
  });

  it('should give unknown fields plain text handling outside entry-type filtering', () => {
    expect(getFieldSpec('Keywords')).toEqual({
      name: 'keywords',
      normalizer: 'text',
      comparator: 'exact-fold',
      identifier: false,
      requiresVerification: false,
      entryTypeFiltered: false,
    });
    expect(isRegisteredField('keywords')).toBe(false);
  });

  it('should return frozen specs', () => {
    expect(Object.isFrozen(getFieldSpec('title'))).toBe(true);
  });

  it('should list every known field', () => {
    expect(listFieldSpecs().map((spec) => spec.name)).toEqual([...FIELD_NAMES]);
  });
});

describe('entry types', () => {
  it('should fall back to misc for unknown types', () => {
    expect(getEntryTypeFields('patent')).toBe(getEntryTypeFields('misc'));
  });

  it('should widen the allowed fields with each filter mode', () => {
    expect([...fieldsForEntryType('article', 'required')]).toEqual(['author', 'title', 'journal', 'year']);
    expect(fieldsForEntryType('article', 'optional').has('pages')).toBe(true);
    expect(fieldsForEntryType('article', 'optional').has('doi')).toBe(false);
    expect(fieldsForEntryType('article', 'all').has('doi')).toBe(true);
    expect(fieldsForEntryType('article', 'no').size).toBe(FIELD_NAMES.length);
  });

  it('should never filter out unknown fields', () => {
    expect(isFieldAllowedForEntryType('keywords', 'article', 'required')).toBe(true);
    expect(isFieldAllowedForEntryType('publisher', 'article', 'all')).toBe(false);
    expect(isFieldAllowedForEntryType('publisher', 'article', 'no')).toBe(true);
  });

  it('should report how an entry type lists a field', () => {
    expect(entryTypeCategory('title', 'article')).toBe('required');
    expect(entryTypeCategory('pages', 'article')).toBe('optional');
    expect(entryTypeCategory('doi', 'article')).toBe('non-standard');
    expect(entryTypeCategory('publisher', 'article')).toBeNull();
    expect(entryTypeCategory('keywords', 'article')).toBeNull();
  });
});

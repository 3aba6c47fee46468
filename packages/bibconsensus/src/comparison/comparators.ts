/**
 * Field Comparators
 *
 * `equivalent(field, a, b)` decides whether two values of a field denote the
 * same thing. Every comparator is symmetric and reflexive; none is assumed
 * transitive (the reconciler closes classes with union-find).
 */

import type {
  ComparatorKind,
  FieldInput,
  NormalizedNames,
  NormalizedValue,
  PersonName,
} from '../core/types/index.js';
import { toNormalized } from '../normalization/index.js';
import { foldText } from '../normalization/text.js';
import { getFieldSpec } from '../registry/field-registry.js';
import { isAbbreviation, isAcronymOf } from './abbreviation.js';

// ============================================================================
// Person Names
// ============================================================================

/**
 * Same folded last name and, when both carry first names, first names that
 * are equal or abbreviate one another ("J." and "John")
 */
export function personsMatch(a: PersonName, b: PersonName): boolean {
  if (foldText(a.last) !== foldText(b.last)) return false;
  if (a.first === null || b.first === null) return true;

  const firstA = foldText(a.first);
  const firstB = foldText(b.first);
  return firstA === firstB || isAbbreviation(firstA, firstB, 1) || isAbbreviation(firstB, firstA, 1);
}

function nameListsIntersect(a: NormalizedNames, b: NormalizedNames): boolean {
  return a.persons.some((person) => b.persons.some((other) => personsMatch(person, other)));
}

// ============================================================================
// Per-kind Comparators
// ============================================================================

function exactFold(a: NormalizedValue, b: NormalizedValue): boolean {
  return a.key === b.key;
}

function abbreviationEqual(a: NormalizedValue, b: NormalizedValue): boolean {
  if (exactFold(a, b)) return true;
  if (a.key === '' || b.key === '') return false;
  return (
    isAcronymOf(a.key, b.key) ||
    isAcronymOf(b.key, a.key) ||
    isAbbreviation(a.key, b.key) ||
    isAbbreviation(b.key, a.key)
  );
}

function nameListEqual(a: NormalizedValue, b: NormalizedValue): boolean {
  if (a.kind === 'names' && b.kind === 'names' && a.valid && b.valid) {
    return nameListsIntersect(a, b);
  }
  // unparsable lists only match literally
  return !a.valid && !b.valid && exactFold(a, b);
}

/**
 * Identifier-grade equality: invalid values never equal anything
 */
export function identifierEqual(a: NormalizedValue, b: NormalizedValue): boolean {
  return a.valid && b.valid && a.key === b.key;
}

function identifierVoteEqual(a: NormalizedValue, b: NormalizedValue): boolean {
  if (a.valid !== b.valid) return false;
  return a.valid ? identifierEqual(a, b) : exactFold(a, b);
}

function numericOf(value: NormalizedValue): number | null {
  return value.kind === 'month' || value.kind === 'year' ? value.numeric : null;
}

function numericEqual(a: NormalizedValue, b: NormalizedValue): boolean {
  const left = numericOf(a);
  const right = numericOf(b);
  if (left !== null && right !== null) return left === right;
  return left === null && right === null && exactFold(a, b);
}

export function compareAs(kind: ComparatorKind, a: NormalizedValue, b: NormalizedValue): boolean {
  switch (kind) {
    case 'exact-fold':
      return exactFold(a, b);
    case 'abbreviation':
      return abbreviationEqual(a, b);
    case 'name-list':
      return nameListEqual(a, b);
    case 'identifier':
      return identifierVoteEqual(a, b);
    case 'numeric':
      return numericEqual(a, b);
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Whether two values of `field` are equivalent; accepts raw or normalized values
 *
 * @example
 * equivalent('pages', '12-15', '12 to 15')              // true
 * equivalent('author', 'Doe, John', 'Doe, J. and Smith, A.') // true
 */
export function equivalent(field: string, a: FieldInput, b: FieldInput): boolean {
  const spec = getFieldSpec(field);
  return compareAs(spec.comparator, toNormalized(field, a), toNormalized(field, b));
}

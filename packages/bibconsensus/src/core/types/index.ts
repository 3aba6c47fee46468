/**
 * Core Types Barrel
 *
 * @module core/types
 */

export type {
  KnownFieldName,
  NormalizerKind,
  ComparatorKind,
  EntryTypeFilter,
  FieldSpec,
  EntryTypeFields,
  NormalizedText,
  PersonName,
  NormalizedNames,
  NormalizedPages,
  NormalizedIdentifier,
  NormalizedNumeric,
  NormalizedValue,
  FieldInput,
} from './fields.js';

export type { QueryInfo, NoMatchResult, FoundResult, SourceResult, FieldLookup } from './source.js';

export type {
  MatchReason,
  MatchDecision,
  MatchedCandidate,
  FieldVote,
  VoteClass,
  FieldStatus,
  FieldProvenance,
  Provenance,
  FormattingOptions,
  ReconcileOptions,
} from './reconcile.js';

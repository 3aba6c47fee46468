/**
 * bibconsensus
 *
 * Matches candidate records from several lookup sources against a
 * bibliographic entry and fills in its fields by majority vote.
 *
 * @example
 * ```typescript
 * import { Entry, ReconciliationDriver, createLogger, loadConfig, toDriverConfig } from 'bibconsensus';
 *
 * const config = await loadConfig();
 * const driver = new ReconciliationDriver(toDriverConfig(config), createLogger());
 * const { outcomes, summary } = await driver.run(entries, lookups);
 * ```
 *
 * @packageDocumentation
 */

// Core
export * from './core/types/index.js';
export { Entry, plainValue, type EntryRecord } from './core/entry.js';
export {
  BibConsensusError,
  ConfigError,
  InputFormatError,
  FieldProcessingError,
  QueryTimeoutError,
  DuplicateSourceError,
  ReservedSourceError,
  describeError,
  type ErrorCode,
} from './core/errors.js';
export {
  ENTRY_SOURCE,
  MARKED_FIELD,
  DEFAULT_FIELD_PREFIX,
  DEFAULT_QUERY_TIMEOUT_MS,
  MAX_QUERY_TIMEOUT_MS,
  RESERVED_SOURCE_NAMES,
  FIELD_NAMES,
  ENTRY_TYPE_FILTERS,
  isKnownField,
  isEntryTypeFilter,
} from './core/constants.js';
export { createFoundResult, createNoMatch, type FoundResultInit } from './core/source-result.js';
export { OnlyExclude } from './core/utils/only-exclude.js';
export { Logger, createLogger, type LogLevel, type LogSink, type LoggerConfig } from './core/utils/logger.js';

// Registry
export {
  getFieldSpec,
  isRegisteredField,
  listFieldSpecs,
  getEntryTypeFields,
  fieldsForEntryType,
  isFieldAllowedForEntryType,
  entryTypeCategory,
  type EntryTypeCategory,
} from './registry/field-registry.js';

// Normalization and comparison
export * from './normalization/index.js';
export { isAbbreviation, isAcronymOf } from './comparison/abbreviation.js';
export { compareAs, equivalent, identifierEqual, personsMatch } from './comparison/comparators.js';

// Matching and reconciliation
export { isMatch, lookupOf } from './matching/entry-matcher.js';
export { UnionFind, clusterValues } from './reconciliation/union-find.js';
export { escapeUnicode, protectUppercase, formatValue } from './reconciliation/formatting.js';
export {
  reconcile,
  createSourceRanker,
  pickWinner,
  pickRepresentative,
  type ReconcileResult,
  type SourceRanker,
} from './reconciliation/field-reconciler.js';

// Driver
export {
  LookupScheduler,
  type SourceLookup,
  type SchedulerOptions,
  type LookupProgressEvent,
} from './driver/lookup-scheduler.js';
export {
  WAIT_FOR_ALL,
  completedFraction,
  hasQuorum,
  shouldSkipStraggler,
  type StragglerPolicy,
  type StragglerState,
} from './driver/straggler-policy.js';
export { DataDump, type DataDumpRecord, type DumpSourceRecord } from './driver/data-dump.js';
export { toDiffRecord, diffRecords } from './driver/diff.js';
export {
  ReconciliationDriver,
  DEFAULT_DRIVER_SETTINGS,
  describeSummary,
  type DriverConfig,
  type EntryOutcome,
  type FieldChange,
  type RunOptions,
  type RunReport,
  type RunSummary,
} from './driver/reconciliation-driver.js';

// Configuration
export {
  loadConfig,
  findConfigFile,
  parseConfigContent,
  validateConfig,
  unknownFieldNames,
  toReconcileOptions,
  selectFields,
  toDriverConfig,
  DEFAULT_CONFIG,
  type BibConsensusConfig,
  type ConfigFile,
  type ConfigOverrides,
  type LoadConfigOptions,
} from './config/config.js';

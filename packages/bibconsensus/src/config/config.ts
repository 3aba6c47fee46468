/**
 * bibconsensus Configuration Management
 *
 * Loads configuration from .bibconsensusrc (YAML) with environment variable
 * overrides and defaults, and turns it into the options the driver and the
 * reconciler take.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (BIBCONSENSUS_*)
 * 3. Config file (.bibconsensusrc or --config path)
 * 4. Default values
 *
 * @module config/config
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  DEFAULT_FIELD_PREFIX,
  DEFAULT_QUERY_TIMEOUT_MS,
  ENTRY_SOURCE,
  ENTRY_TYPE_FILTERS,
  FIELD_NAMES,
  MAX_QUERY_TIMEOUT_MS,
  isKnownField,
} from '../core/constants.js';
import { ConfigError, describeError } from '../core/errors.js';
import type { EntryTypeFilter, ReconcileOptions } from '../core/types/index.js';
import type { LogLevel } from '../core/utils/logger.js';
import { OnlyExclude } from '../core/utils/only-exclude.js';
import type { DriverConfig } from '../driver/reconciliation-driver.js';
import type { StragglerPolicy } from '../driver/straggler-policy.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface BibConsensusConfig {
  /** Configuration file version */
  readonly version: number;

  /** Tie-break order between sources, highest priority first */
  readonly sourcePriority: readonly string[];
  /** Sources to query (empty = all) */
  readonly onlyQuery: readonly string[];
  /** Sources never to query */
  readonly dontQuery: readonly string[];
  /** Per-query timeout in milliseconds (0 = none) */
  readonly timeoutMs: number;
  readonly straggler: StragglerPolicy;

  /** Fields to complete (empty = all) */
  readonly onlyComplete: readonly string[];
  /** Fields never to complete */
  readonly dontComplete: readonly string[];
  /** Fields whose existing value may be replaced */
  readonly overwrite: readonly string[];
  /** Fields whose existing value is kept; every other field may be replaced */
  readonly dontOverwrite: readonly string[];
  /** Replace every existing value */
  readonly forceOverwrite: boolean;
  readonly entryTypeFilter: EntryTypeFilter;
  /** Let the entry's current value vote when a field is overwritten */
  readonly entryVotes: boolean;

  /** Entries to complete (empty = all) */
  readonly onlyEntries: readonly string[];
  readonly excludeEntries: readonly string[];
  readonly mark: boolean;
  readonly ignoreMark: boolean;

  readonly escapeUnicode: boolean;
  readonly protectUppercase: readonly string[];
  /** Every field but these gets uppercase protection */
  readonly dontProtectUppercase: readonly string[];
  /** Prefix for written field names ('' = none) */
  readonly fieldPrefix: string;
  /** Write only the new fields */
  readonly diff: boolean;

  readonly logLevel: LogLevel;
  readonly json: boolean;

  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Values a command line may override
 */
export type ConfigOverrides = Partial<Omit<BibConsensusConfig, 'version' | 'configPath' | 'straggler'>> & {
  readonly straggler?: Partial<StragglerPolicy>;
};

// ============================================================================
// Config File Schema
// ============================================================================

const FieldList = z.array(z.string().min(1)).optional();

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const ConfigFileSchema = z
  .object({
    version: z.literal(1).optional(),
    sources: z
      .object({
        priority: FieldList,
        only: FieldList,
        exclude: FieldList,
        timeout_ms: z.number().int().min(0).max(MAX_QUERY_TIMEOUT_MS).optional(),
        straggler: z
          .object({
            min_completed_fraction: z.number().min(0).max(1).optional(),
            max_lag: z.number().int().min(0).optional(),
            grace_ms: z.number().int().min(0).optional(),
          })
          .strict()
          .optional(),
      })
      .strict()
      .optional(),
    fields: z
      .object({
        only: FieldList,
        exclude: FieldList,
        overwrite: FieldList,
        dont_overwrite: FieldList,
        force_overwrite: z.boolean().optional(),
        entry_type_filter: z.enum(ENTRY_TYPE_FILTERS).optional(),
        entry_votes: z.boolean().optional(),
      })
      .strict()
      .optional(),
    entries: z
      .object({
        only: FieldList,
        exclude: FieldList,
        mark: z.boolean().optional(),
        ignore_mark: z.boolean().optional(),
      })
      .strict()
      .optional(),
    output: z
      .object({
        escape_unicode: z.boolean().optional(),
        protect_uppercase: FieldList,
        dont_protect_uppercase: FieldList,
        prefix: z.union([z.boolean(), z.string()]).optional(),
        diff: z.boolean().optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: z.enum(LOG_LEVELS).optional(),
        json: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<BibConsensusConfig, 'configPath'> = {
  version: 1,
  sourcePriority: [],
  onlyQuery: [],
  dontQuery: [],
  timeoutMs: DEFAULT_QUERY_TIMEOUT_MS,
  straggler: {
    minCompletedFraction: 1,
    maxLag: 0,
    graceMs: 0,
  },
  onlyComplete: [],
  dontComplete: [],
  overwrite: [],
  dontOverwrite: [],
  forceOverwrite: false,
  entryTypeFilter: 'no',
  entryVotes: true,
  onlyEntries: [],
  excludeEntries: [],
  mark: false,
  ignoreMark: false,
  escapeUnicode: false,
  protectUppercase: [],
  dontProtectUppercase: [],
  fieldPrefix: '',
  diff: false,
  logLevel: 'info',
  json: false,
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = ['.bibconsensusrc', '.bibconsensusrc.yaml', '.bibconsensusrc.yml', '.bibconsensusrc.json'];

const ENV_PREFIX = 'BIBCONSENSUS_';

/**
 * Find config file in the start directory or one of its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Parse and validate config file content (YAML also covers JSON)
 */
export function parseConfigContent(content: string, filePath: string | null): ConfigFile {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Config file is not valid YAML: ${describeError(error)}`, filePath);
  }

  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', filePath, formatIssues(parsed.error));
  }
  return parsed.data;
}

async function readConfigFile(filePath: string): Promise<ConfigFile> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file: ${describeError(error)}`, filePath);
  }
  return parseConfigContent(content, filePath);
}

// ============================================================================
// Environment Overrides
// ============================================================================

export type Env = Readonly<Record<string, string | undefined>>;

class EnvReader {
  constructor(private readonly env: Env) {}

  string(name: string): string | undefined {
    const value = this.env[`${ENV_PREFIX}${name}`];
    return value === undefined || value === '' ? undefined : value;
  }

  bool(name: string): boolean | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    return value.toLowerCase() === 'true' || value === '1';
  }

  number(name: string): number | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    const num = Number(value);
    if (!Number.isFinite(num) || num < 0) {
      throw new ConfigError(`${ENV_PREFIX}${name} must be a non-negative number, got "${value}"`, null);
    }
    return num;
  }

  list(name: string): string[] | undefined {
    const value = this.string(name);
    return value === undefined ? undefined : splitList(value);
  }

  oneOf<T extends string>(name: string, allowed: readonly T[]): T | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    const match = allowed.find((candidate) => candidate === value.toLowerCase());
    if (match === undefined) {
      throw new ConfigError(`${ENV_PREFIX}${name} must be one of ${allowed.join(', ')}, got "${value}"`, null);
    }
    return match;
  }
}

/**
 * Split a comma separated list, dropping empty items
 */
export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function prefixOf(value: boolean | string | undefined): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'string') return value;
  return value ? DEFAULT_FIELD_PREFIX : '';
}

function lowercased(fields: readonly string[]): string[] {
  return fields.map((field) => field.toLowerCase());
}

// ============================================================================
// loadConfig
// ============================================================================

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory the config file search starts from */
  readonly cwd?: string;
  /** Environment to read BIBCONSENSUS_* variables from */
  readonly env?: Env;
  /** CLI flag overrides */
  readonly overrides?: ConfigOverrides;
}

/**
 * Load and merge configuration from all sources
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<BibConsensusConfig> {
  const env = new EnvReader(options.env ?? process.env);
  let configPath: string | null = null;
  let file: ConfigFile = {};

  const explicitPath = options.configPath ?? env.string('CONFIG');
  if (explicitPath !== undefined) {
    configPath = resolve(options.cwd ?? process.cwd(), explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
    file = await readConfigFile(configPath);
  } else {
    configPath = findConfigFile(options.cwd ?? process.cwd());
    if (configPath !== null) {
      file = await readConfigFile(configPath);
    }
  }

  const o = options.overrides ?? {};
  const d = DEFAULT_CONFIG;

  const config: BibConsensusConfig = {
    version: file.version ?? d.version,

    sourcePriority: o.sourcePriority ?? env.list('PRIORITY') ?? file.sources?.priority ?? d.sourcePriority,
    onlyQuery: o.onlyQuery ?? env.list('ONLY_QUERY') ?? file.sources?.only ?? d.onlyQuery,
    dontQuery: o.dontQuery ?? env.list('DONT_QUERY') ?? file.sources?.exclude ?? d.dontQuery,
    timeoutMs: o.timeoutMs ?? env.number('TIMEOUT') ?? file.sources?.timeout_ms ?? d.timeoutMs,
    straggler: {
      minCompletedFraction:
        o.straggler?.minCompletedFraction ??
        env.number('STRAGGLER_FRACTION') ??
        file.sources?.straggler?.min_completed_fraction ??
        d.straggler.minCompletedFraction,
      maxLag:
        o.straggler?.maxLag ??
        env.number('STRAGGLER_MAX_LAG') ??
        file.sources?.straggler?.max_lag ??
        d.straggler.maxLag,
      graceMs:
        o.straggler?.graceMs ??
        env.number('STRAGGLER_GRACE') ??
        file.sources?.straggler?.grace_ms ??
        d.straggler.graceMs,
    },

    onlyComplete: lowercased(o.onlyComplete ?? file.fields?.only ?? d.onlyComplete),
    dontComplete: lowercased(o.dontComplete ?? file.fields?.exclude ?? d.dontComplete),
    overwrite: lowercased(o.overwrite ?? env.list('OVERWRITE') ?? file.fields?.overwrite ?? d.overwrite),
    dontOverwrite: lowercased(
      o.dontOverwrite ?? env.list('DONT_OVERWRITE') ?? file.fields?.dont_overwrite ?? d.dontOverwrite
    ),
    forceOverwrite:
      o.forceOverwrite ?? env.bool('FORCE_OVERWRITE') ?? file.fields?.force_overwrite ?? d.forceOverwrite,
    entryTypeFilter:
      o.entryTypeFilter ??
      env.oneOf('FILTER_BY_ENTRYTYPE', ENTRY_TYPE_FILTERS) ??
      file.fields?.entry_type_filter ??
      d.entryTypeFilter,
    entryVotes: o.entryVotes ?? file.fields?.entry_votes ?? d.entryVotes,

    onlyEntries: o.onlyEntries ?? file.entries?.only ?? d.onlyEntries,
    excludeEntries: o.excludeEntries ?? file.entries?.exclude ?? d.excludeEntries,
    mark: o.mark ?? env.bool('MARK') ?? file.entries?.mark ?? d.mark,
    ignoreMark: o.ignoreMark ?? env.bool('IGNORE_MARK') ?? file.entries?.ignore_mark ?? d.ignoreMark,

    escapeUnicode: o.escapeUnicode ?? env.bool('ESCAPE_UNICODE') ?? file.output?.escape_unicode ?? d.escapeUnicode,
    protectUppercase: lowercased(
      o.protectUppercase ?? env.list('PROTECT_UPPERCASE') ?? file.output?.protect_uppercase ?? d.protectUppercase
    ),
    dontProtectUppercase: lowercased(
      o.dontProtectUppercase ??
        env.list('DONT_PROTECT_UPPERCASE') ??
        file.output?.dont_protect_uppercase ??
        d.dontProtectUppercase
    ),
    fieldPrefix: o.fieldPrefix ?? env.string('PREFIX') ?? prefixOf(file.output?.prefix) ?? d.fieldPrefix,
    diff: o.diff ?? file.output?.diff ?? d.diff,

    logLevel: o.logLevel ?? file.logging?.level ?? d.logLevel,
    json: o.json ?? env.bool('JSON') ?? file.logging?.json ?? d.json,

    configPath,
  };

  validateConfig(config);
  return config;
}

/**
 * Reject combinations that cannot be honoured
 *
 * @throws ConfigError listing every problem
 */
export function validateConfig(config: BibConsensusConfig): void {
  const issues: string[] = [];

  const conflicts: ReadonlyArray<readonly [readonly string[], readonly string[], string]> = [
    [config.onlyComplete, config.dontComplete, 'only-complete and dont-complete'],
    [config.onlyQuery, config.dontQuery, 'only-query and dont-query'],
    [config.overwrite, config.dontOverwrite, 'overwrite and dont-overwrite'],
    [config.protectUppercase, config.dontProtectUppercase, 'protect-uppercase and dont-protect-uppercase'],
  ];
  for (const [only, exclude, names] of conflicts) {
    if (only.length > 0 && exclude.length > 0) {
      issues.push(`${names} cannot be combined`);
    }
  }
  if (config.forceOverwrite && config.dontOverwrite.length > 0) {
    issues.push('force-overwrite and dont-overwrite cannot be combined');
  }
  if (!Number.isInteger(config.timeoutMs) || config.timeoutMs < 0 || config.timeoutMs > MAX_QUERY_TIMEOUT_MS) {
    issues.push(`timeout must be an integer between 0 and ${MAX_QUERY_TIMEOUT_MS} ms, got ${config.timeoutMs}`);
  }
  if (config.onlyEntries.length > 0 && config.excludeEntries.length > 0) {
    issues.push('only-entry and exclude-entry cannot be combined');
  }
  if (config.straggler.minCompletedFraction > 1) {
    issues.push('straggler min completed fraction must be between 0 and 1');
  }
  if (!/^[A-Za-z0-9_-]*$/.test(config.fieldPrefix)) {
    issues.push(`field prefix "${config.fieldPrefix}" may only hold letters, digits, "-" and "_"`);
  }

  if (issues.length > 0) {
    throw new ConfigError('Invalid configuration', config.configPath, issues);
  }
}

/**
 * Field names in the config the registry does not know, for warnings
 */
export function unknownFieldNames(config: BibConsensusConfig): string[] {
  const named = [
    ...config.onlyComplete,
    ...config.dontComplete,
    ...config.overwrite,
    ...config.dontOverwrite,
    ...config.protectUppercase,
    ...config.dontProtectUppercase,
  ];
  return [...new Set(named)].filter((field) => !isKnownField(field));
}

// ============================================================================
// Conversions
// ============================================================================

/**
 * Fields named by an opt-in list, or every known field but those of an
 * opt-out list; neither list selects nothing
 */
export function selectFields(only: readonly string[], exclude: readonly string[]): ReadonlySet<string> {
  if (exclude.length === 0) return new Set(only);
  return new Set(FIELD_NAMES.filter((field) => !exclude.includes(field)));
}

export function toReconcileOptions(config: BibConsensusConfig): ReconcileOptions {
  const fields = OnlyExclude.fromNonEmpty(config.onlyComplete, config.dontComplete);
  return {
    sourcePriority: config.sourcePriority,
    overwrite: selectFields(config.overwrite, config.dontOverwrite),
    force: config.forceOverwrite,
    allowField: (field) => fields.has(field),
    entryVotes: config.entryVotes,
    entrySource: ENTRY_SOURCE,
    fieldPrefix: config.fieldPrefix,
    formatting: {
      escapeUnicode: config.escapeUnicode,
      protectUppercase: selectFields(config.protectUppercase, config.dontProtectUppercase),
    },
    entryTypeFilter: config.entryTypeFilter,
  };
}

export function toDriverConfig(config: BibConsensusConfig): DriverConfig {
  return {
    reconcile: toReconcileOptions(config),
    entryFilter: OnlyExclude.fromNonEmpty(config.onlyEntries, config.excludeEntries),
    sourceFilter: OnlyExclude.fromNonEmpty(config.onlyQuery, config.dontQuery),
    mark: config.mark,
    ignoreMark: config.ignoreMark,
    timeoutMs: config.timeoutMs,
    straggler: config.straggler,
  };
}

/**
 * Merge Command
 *
 * Reconcile entries against per-source lookup results and write the
 * completed entries.
 *
 * Usage:
 *   bibconsensus merge <entries> --results <file> [options]
 *
 * Options:
 *   --results <file>          Per-source lookup results (JSON)
 *   -o, --output <file>       Write entries here instead of stdout
 *   --dump-data <file>        Write what every source returned
 *   --diff                    Write only the new fields
 *   -f, --force-overwrite     Replace every existing value
 *   --overwrite <fields>      Fields whose existing value may be replaced
 *   --dont-overwrite <fields> Replace existing values of every field but these
 *   --only-complete <fields>  Complete only these fields
 *   --dont-complete <fields>  Never complete these fields
 *   --only-entry <keys>       Process only these entries
 *   --exclude-entry <keys>    Skip these entries
 *   --only-query <sources>    Query only these sources
 *   --dont-query <sources>    Never query these sources
 *   --filter-by-entrytype     no|required|optional|all
 *   --escape-unicode          Write non-ASCII characters as LaTeX commands
 *   --protect-uppercase <f>   Brace uppercase words in these fields
 *   --dont-protect-uppercase <f>  Brace uppercase words in every field but these
 *   --priority <sources>      Tie-break order between sources
 *   --prefix [prefix]         Write new fields under a prefix (default "BC")
 *   --mark / --ignore-mark    Record processed entries / reprocess marked ones
 *   --timeout <ms>            Per-query timeout (0 = none)
 *
 * Exit codes: 0 success, 1 some fields failed, 3 configuration error,
 * 4 unreadable input, 10 interrupted.
 */

import { InvalidArgumentError, Option, type Command } from 'commander';
import {
  loadConfig,
  splitList,
  toDriverConfig,
  unknownFieldNames,
  type ConfigOverrides,
} from '../../config/config.js';
import {
  DEFAULT_FIELD_PREFIX,
  ENTRY_TYPE_FILTERS,
  MAX_QUERY_TIMEOUT_MS,
  isEntryTypeFilter,
} from '../../core/constants.js';
import { diffRecords } from '../../driver/diff.js';
import { ReconciliationDriver } from '../../driver/reconciliation-driver.js';
import {
  createCommandLogger,
  globalOptionsOf,
  processIO,
  reportKnownError,
  type CommandIO,
  type GlobalOptions,
} from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { createFileLookups, readEntriesFile, readResultsFile, writeJsonFile } from '../lib/io.js';
import { formatChanges, formatJson } from '../lib/output.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Merge options from CLI
 */
export interface MergeOptions extends GlobalOptions {
  readonly results: string;
  readonly output?: string;
  readonly dumpData?: string;
  readonly diff?: boolean;
  readonly forceOverwrite?: boolean;
  readonly overwrite?: string[];
  readonly dontOverwrite?: string[];
  readonly onlyComplete?: string[];
  readonly dontComplete?: string[];
  readonly onlyEntry?: string[];
  readonly excludeEntry?: string[];
  readonly onlyQuery?: string[];
  readonly dontQuery?: string[];
  readonly filterByEntrytype?: string;
  readonly escapeUnicode?: boolean;
  readonly protectUppercase?: string[];
  readonly dontProtectUppercase?: string[];
  readonly priority?: string[];
  readonly prefix?: boolean | string;
  readonly mark?: boolean;
  readonly ignoreMark?: boolean;
  readonly timeout?: number;
}

// ============================================================================
// Argument Parsing
// ============================================================================

export function parseTimeout(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > MAX_QUERY_TIMEOUT_MS) {
    throw new InvalidArgumentError(`Expected an integer between 0 and ${MAX_QUERY_TIMEOUT_MS}.`);
  }
  return parsed;
}

/**
 * Map command line flags onto configuration overrides; unset flags stay
 * undefined so the config file and environment apply
 */
export function toOverrides(options: MergeOptions): ConfigOverrides {
  const filter = options.filterByEntrytype;
  return {
    sourcePriority: options.priority,
    onlyQuery: options.onlyQuery,
    dontQuery: options.dontQuery,
    timeoutMs: options.timeout,
    onlyComplete: options.onlyComplete,
    dontComplete: options.dontComplete,
    overwrite: options.overwrite,
    dontOverwrite: options.dontOverwrite,
    forceOverwrite: options.forceOverwrite,
    entryTypeFilter: filter !== undefined && isEntryTypeFilter(filter) ? filter : undefined,
    onlyEntries: options.onlyEntry,
    excludeEntries: options.excludeEntry,
    mark: options.mark,
    ignoreMark: options.ignoreMark,
    escapeUnicode: options.escapeUnicode,
    protectUppercase: options.protectUppercase,
    dontProtectUppercase: options.dontProtectUppercase,
    fieldPrefix: options.prefix === true ? DEFAULT_FIELD_PREFIX : options.prefix || undefined,
    diff: options.diff,
    logLevel: options.verbose === true ? 'debug' : undefined,
    json: options.json,
  };
}

// ============================================================================
// Command
// ============================================================================

/**
 * Register the merge command
 */
export function registerMergeCommand(program: Command): void {
  program
    .command('merge')
    .description('Complete entries from per-source lookup results')
    .argument('<entries>', 'Entries file (JSON)')
    .requiredOption('--results <file>', 'Per-source lookup results (JSON)')
    .option('-o, --output <file>', 'Write entries to a file instead of stdout')
    .option('--dump-data <file>', 'Write what every source returned to a file')
    .option('--diff', 'Write only the new fields of changed entries')
    .option('-f, --force-overwrite', 'Replace every existing value')
    .option('--overwrite <fields>', 'Comma-separated fields whose value may be replaced', splitList)
    .option('--dont-overwrite <fields>', 'Comma-separated fields whose value is always kept', splitList)
    .option('--only-complete <fields>', 'Comma-separated fields to complete', splitList)
    .option('--dont-complete <fields>', 'Comma-separated fields never to complete', splitList)
    .option('--only-entry <keys>', 'Comma-separated entry keys to process', splitList)
    .option('--exclude-entry <keys>', 'Comma-separated entry keys to skip', splitList)
    .option('--only-query <sources>', 'Comma-separated sources to query', splitList)
    .option('--dont-query <sources>', 'Comma-separated sources never to query', splitList)
    .addOption(
      new Option('--filter-by-entrytype <mode>', 'Restrict fields by entry type').choices(ENTRY_TYPE_FILTERS)
    )
    .option('--escape-unicode', 'Write non-ASCII characters as LaTeX commands')
    .option('--protect-uppercase <fields>', 'Comma-separated fields whose uppercase words get braces', splitList)
    .option(
      '--dont-protect-uppercase <fields>',
      'Comma-separated fields left out of uppercase protection',
      splitList
    )
    .option('--priority <sources>', 'Comma-separated tie-break order between sources', splitList)
    .option('--prefix [prefix]', `Write new fields under a prefix (default "${DEFAULT_FIELD_PREFIX}")`)
    .option('--mark', 'Record the run date in processed entries')
    .option('--ignore-mark', 'Process entries even when already marked')
    .option('--timeout <ms>', 'Per-query timeout in milliseconds (0 = none)', parseTimeout)
    .action(async (entries: string, options: MergeOptions, command: Command) => {
      const controller = new AbortController();
      const onInterrupt = (): void => controller.abort();
      process.once('SIGINT', onInterrupt);
      try {
        process.exitCode = await executeMerge(
          entries,
          { ...options, ...globalOptionsOf(command) },
          { ...processIO, signal: controller.signal }
        );
      } finally {
        process.removeListener('SIGINT', onInterrupt);
      }
    });
}

/**
 * Execute the merge command
 */
export async function executeMerge(entriesPath: string, options: MergeOptions, io: CommandIO): Promise<ExitCode> {
  try {
    const config = await loadConfig({
      configPath: options.config,
      cwd: io.cwd,
      env: io.env,
      overrides: toOverrides(options),
    });
    const logger = createCommandLogger(io, config.logLevel, config.json);

    for (const field of unknownFieldNames(config)) {
      logger.warn(`Unknown field "${field}", compared as plain text`);
    }

    const entries = await readEntriesFile(entriesPath);
    const lookups = createFileLookups(await readResultsFile(options.results));

    logger.commandStart('merge', { entries: entries.length, sources: lookups.length });
    const driver = new ReconciliationDriver(toDriverConfig(config), logger);
    const { outcomes, summary } = await driver.run(entries, lookups, { signal: io.signal });

    const records = config.diff
      ? diffRecords(entries, outcomes, config.mark)
      : entries.map((entry) => entry.toJSON());
    if (options.output !== undefined) {
      await writeJsonFile(options.output, records);
    } else {
      io.out(formatJson(records));
    }
    if (options.dumpData !== undefined) {
      await writeJsonFile(
        options.dumpData,
        outcomes.map((outcome) => outcome.dump)
      );
    }
    if (options.verbose === true) {
      io.err(formatChanges(outcomes));
    }

    const failed = outcomes.some((outcome) => outcome.provenance.fields.some((field) => field.status === 'error'));
    logger.commandEnd(!summary.cancelled && !failed, { modified: summary.modified });

    if (summary.cancelled) return EXIT_CODES.USER_CANCELLED;
    return failed ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS;
  } catch (error) {
    const code = reportKnownError(error, io);
    if (code === null) throw error;
    return code;
  }
}

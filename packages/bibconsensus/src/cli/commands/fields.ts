/**
 * Fields Command
 *
 * List the field registry, optionally for one entry type.
 *
 * Usage:
 *   bibconsensus fields [--entry-type <type>] [--filter <mode>] [--json]
 *
 * With --entry-type, a "category" column shows how the type lists each field
 * and --filter keeps only the fields the filter mode would complete.
 */

import { Option, type Command } from 'commander';
import { ENTRY_TYPE_FILTERS, isEntryTypeFilter } from '../../core/constants.js';
import type { FieldSpec } from '../../core/types/index.js';
import { entryTypeCategory, fieldsForEntryType, listFieldSpecs } from '../../registry/field-registry.js';
import { globalOptionsOf, processIO, type CommandIO, type GlobalOptions } from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatJson, formatTable, type TableColumn } from '../lib/output.js';

export interface FieldsOptions extends GlobalOptions {
  readonly entryType?: string;
  readonly filter?: string;
}

export interface FieldRow {
  readonly spec: FieldSpec;
  readonly category: string | null;
}

const yesNo = (value: boolean): string => (value ? 'yes' : 'no');

const COLUMNS: readonly TableColumn<FieldRow>[] = [
  { header: 'field', value: (row) => row.spec.name },
  { header: 'normalizer', value: (row) => row.spec.normalizer },
  { header: 'comparator', value: (row) => row.spec.comparator },
  { header: 'identifier', value: (row) => yesNo(row.spec.identifier) },
  { header: 'verified', value: (row) => yesNo(row.spec.requiresVerification) },
];

const CATEGORY_COLUMN: TableColumn<FieldRow> = { header: 'category', value: (row) => row.category ?? '-' };

export function registerFieldsCommand(program: Command): void {
  program
    .command('fields')
    .description('List known fields and how they are compared')
    .option('--entry-type <type>', 'Show how an entry type lists each field')
    .addOption(
      new Option('--filter <mode>', 'With --entry-type, keep fields this filter mode completes').choices(
        ENTRY_TYPE_FILTERS
      )
    )
    .action((options: FieldsOptions, command: Command) => {
      process.exitCode = executeFields({ ...options, ...globalOptionsOf(command) }, processIO);
    });
}

export function listFieldRows(options: Pick<FieldsOptions, 'entryType' | 'filter'>): FieldRow[] {
  const { entryType, filter } = options;
  let specs = listFieldSpecs();
  if (entryType !== undefined && filter !== undefined && isEntryTypeFilter(filter)) {
    const allowed = fieldsForEntryType(entryType, filter);
    specs = specs.filter((spec) => allowed.has(spec.name));
  }
  return specs.map((spec) => ({
    spec,
    category: entryType !== undefined ? entryTypeCategory(spec.name, entryType) : null,
  }));
}

export function executeFields(options: FieldsOptions, io: CommandIO): ExitCode {
  const rows = listFieldRows(options);
  if (options.json === true) {
    const records = rows.map((row) =>
      options.entryType !== undefined ? { ...row.spec, category: row.category } : row.spec
    );
    io.out(formatJson(records));
  } else {
    io.out(formatTable(rows, options.entryType !== undefined ? [...COLUMNS, CATEGORY_COLUMN] : COLUMNS));
  }
  return EXIT_CODES.SUCCESS;
}

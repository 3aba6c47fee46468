/**
 * Compare Command
 *
 * Tell whether two values of a field are equivalent under the field's
 * comparator.
 *
 * Usage:
 *   bibconsensus compare <field> <a> <b> [--json]
 *
 * Exits 0 when equivalent, 1 otherwise.
 */

import type { Command } from 'commander';
import { compareAs } from '../../comparison/comparators.js';
import { normalize } from '../../normalization/index.js';
import { getFieldSpec } from '../../registry/field-registry.js';
import { globalOptionsOf, processIO, type CommandIO, type GlobalOptions } from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatJson } from '../lib/output.js';

export function registerCompareCommand(program: Command): void {
  program
    .command('compare')
    .description('Check whether two values of a field are equivalent')
    .argument('<field>', 'Field name')
    .argument('<a>', 'First value')
    .argument('<b>', 'Second value')
    .action((field: string, a: string, b: string, _options: GlobalOptions, command: Command) => {
      process.exitCode = executeCompare(field, a, b, globalOptionsOf(command), processIO);
    });
}

export function executeCompare(field: string, a: string, b: string, options: GlobalOptions, io: CommandIO): ExitCode {
  const spec = getFieldSpec(field);
  const left = normalize(spec.name, a);
  const right = normalize(spec.name, b);
  const equivalent = compareAs(spec.comparator, left, right);

  if (options.json === true) {
    io.out(
      formatJson({
        field: spec.name,
        comparator: spec.comparator,
        equivalent,
        keys: [left.key, right.key],
      })
    );
  } else {
    io.out(`${equivalent ? 'equivalent' : 'not equivalent'} (${spec.comparator})`);
  }
  return equivalent ? EXIT_CODES.SUCCESS : EXIT_CODES.WARNINGS;
}

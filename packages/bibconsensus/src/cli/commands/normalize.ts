/**
 * Normalize Command
 *
 * Show how a field value is normalized: its display form, comparison key,
 * validity and, for name lists, the parsed persons.
 *
 * Usage:
 *   bibconsensus normalize <field> <value> [--json]
 */

import type { Command } from 'commander';
import type { NormalizedValue } from '../../core/types/index.js';
import { normalize } from '../../normalization/index.js';
import { getFieldSpec } from '../../registry/field-registry.js';
import { globalOptionsOf, processIO, type CommandIO, type GlobalOptions } from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatJson } from '../lib/output.js';

export function registerNormalizeCommand(program: Command): void {
  program
    .command('normalize')
    .description('Show the normalized form of a field value')
    .argument('<field>', 'Field name')
    .argument('<value>', 'Raw field value')
    .action((field: string, value: string, _options: GlobalOptions, command: Command) => {
      process.exitCode = executeNormalize(field, value, globalOptionsOf(command), processIO);
    });
}

/**
 * Human-readable description, one property per line
 */
export function describeNormalized(field: string, value: NormalizedValue): string {
  const spec = getFieldSpec(field);
  const lines = [
    `field:   ${spec.name} (${spec.normalizer})`,
    `display: ${value.display}`,
    `key:     ${value.key}`,
    `valid:   ${value.valid ? 'yes' : 'no'}`,
  ];
  if (value.kind === 'names') {
    value.persons.forEach((person, index) => {
      const parts = [`last=${person.last}`];
      if (person.first !== null) parts.push(`first=${person.first}`);
      if (person.suffix !== null) parts.push(`suffix=${person.suffix}`);
      lines.push(`person ${index + 1}: ${parts.join(' ')}`);
    });
  }
  return lines.join('\n');
}

export function executeNormalize(field: string, value: string, options: GlobalOptions, io: CommandIO): ExitCode {
  const normalized = normalize(field, value);
  io.out(options.json === true ? formatJson(normalized) : describeNormalized(field, normalized));
  return EXIT_CODES.SUCCESS;
}

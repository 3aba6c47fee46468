/**
 * CLI Commands Index
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerCompareCommand } from './compare.js';
import { registerFieldsCommand } from './fields.js';
import { registerMergeCommand } from './merge.js';
import { registerNormalizeCommand } from './normalize.js';

export { executeMerge, toOverrides, type MergeOptions } from './merge.js';
export { executeNormalize, describeNormalized } from './normalize.js';
export { executeCompare } from './compare.js';
export { executeFields, listFieldRows, type FieldsOptions } from './fields.js';

export function registerCommands(program: Command): void {
  registerMergeCommand(program);
  registerNormalizeCommand(program);
  registerCompareCommand(program);
  registerFieldsCommand(program);
}

#!/usr/bin/env tsx
/**
 * bibconsensus CLI Entry Point
 *
 * Complete bibliographic entries from several lookup sources by matching
 * candidates and voting field values.
 *
 * @module bibconsensus-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { registerCommands } from '../src/cli/commands/index.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';
import { describeError } from '../src/core/errors.js';

// ============================================================================
// CLI Setup
// ============================================================================

const PackageJsonSchema = z.object({ version: z.string().default('0.0.0') });

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
  return parsed.success ? parsed.data.version : '0.0.0';
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('bibconsensus')
    .description('Complete bibliographic entries by majority vote across lookup sources')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .bibconsensusrc)');

  registerCommands(program);

  program.showHelpAfterError();
  return program;
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(`Error: ${describeError(error)}`);
  process.exitCode = EXIT_CODES.ERRORS;
});

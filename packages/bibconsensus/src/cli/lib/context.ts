/**
 * Command I/O
 *
 * Commands write through a CommandIO instead of touching process streams, so
 * they can run inside tests. Results go to `out`, logs and diagnostics to
 * `err`.
 *
 * @module cli/lib/context
 */

import type { Command } from 'commander';
import type { Env } from '../../config/config.js';
import { ConfigError, InputFormatError } from '../../core/errors.js';
import { createLogger, type LogLevel, type Logger } from '../../core/utils/logger.js';
import { EXIT_CODES, type ExitCode } from './exit-codes.js';

export interface CommandIO {
  readonly out: (text: string) => void;
  readonly err: (text: string) => void;
  readonly signal?: AbortSignal;
  /** Directory the config file search starts from */
  readonly cwd?: string;
  /** Environment read for BIBCONSENSUS_* variables */
  readonly env?: Env;
}

/**
 * Options declared on the root program
 */
export interface GlobalOptions {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
}

export const processIO: CommandIO = {
  out: (text) => {
    process.stdout.write(`${text}\n`);
  },
  err: (text) => {
    process.stderr.write(`${text}\n`);
  },
};

/**
 * Logger writing every line to the command's error stream
 */
export function createCommandLogger(io: CommandIO, level: LogLevel, json: boolean): Logger {
  return createLogger({
    level,
    json,
    color: json ? false : undefined,
    sink: (_level, line) => io.err(line),
  });
}

/**
 * Exit code for an error raised while loading configuration or input;
 * null for anything else
 */
export function reportKnownError(error: unknown, io: CommandIO): ExitCode | null {
  if (error instanceof ConfigError) {
    io.err(`Configuration error: ${error.getSummary()}`);
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (error instanceof InputFormatError) {
    io.err(`Input error: ${error.getSummary()}`);
    return EXIT_CODES.INPUT_ERROR;
  }
  return null;
}

/**
 * Global options merged with the command's own; flags left off stay
 * undefined so the environment and config file still apply
 */
export function globalOptionsOf(command: Command): GlobalOptions {
  const { verbose, json, config } = command.optsWithGlobals();
  return {
    verbose: verbose === true ? true : undefined,
    json: json === true ? true : undefined,
    config: typeof config === 'string' ? config : undefined,
  };
}

/**
 * Structured logging utility for bibconsensus
 *
 * Structured logging with levels, timestamps, and contextual metadata.
 * Human-readable coloured lines for interactive use, JSON lines for machine
 * consumption. Console-based; a custom sink can be injected.
 *
 * @module logger
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Structured log entry for JSON output
 */
export interface StructuredLogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly service?: string;
  readonly command?: string;
  readonly [key: string]: unknown;
}

/**
 * Receives every formatted line; defaults to the console
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerConfig {
  /** Minimum log level to output */
  readonly level: LogLevel;
  /** Output as JSON lines */
  readonly json: boolean;
  /** Colourize human-readable output */
  readonly color: boolean;
  readonly service: string;
  readonly sink?: LogSink;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};

// ============================================================================
// Logger
// ============================================================================

export class Logger {
  private readonly config: LoggerConfig;
  private readonly context: LogMetadata;
  private commandContext: string | null = null;
  private startTime = Date.now();

  constructor(config: LoggerConfig, context: LogMetadata = {}) {
    this.config = config;
    this.context = context;
  }

  get level(): LogLevel {
    return this.config.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private paint(color: string, text: string): string {
    return this.config.color ? `${color}${text}${COLORS.reset}` : text;
  }

  private formatJson(level: LogLevel, message: string, metadata: LogMetadata): string {
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.config.service,
      ...(this.commandContext !== null && { command: this.commandContext }),
      ...metadata,
    };
    return JSON.stringify(entry);
  }

  private formatHuman(level: LogLevel, message: string, metadata: LogMetadata): string {
    let line = `${this.paint(COLORS.dim, new Date().toISOString())} `;
    line += `${this.paint(LEVEL_COLORS[level], LEVEL_LABELS[level])} `;
    line += message;

    const keys = Object.keys(metadata);
    if (keys.length > 0) {
      const metaStr = keys
        .map((key) => {
          const value = metadata[key];
          const valueStr = typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${this.paint(COLORS.cyan, key)}=${valueStr}`;
        })
        .join(' ');
      line += ` ${this.paint(COLORS.dim, `(${metaStr})`)}`;
    }
    return line;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.isLevelEnabled(level)) return;

    const merged = { ...this.context, ...metadata };
    const formatted = this.config.json
      ? this.formatJson(level, message, merged)
      : this.formatHuman(level, message, merged);

    (this.config.sink ?? consoleSink)(level, formatted);
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  /**
   * Log command start and reset the duration timer
   */
  commandStart(command: string, options?: LogMetadata): void {
    this.commandContext = command;
    this.startTime = Date.now();
    this.info(`Starting ${command}`, options);
  }

  /**
   * Log command completion with duration
   */
  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const baseMetadata = { duration_ms: Date.now() - this.startTime, ...metadata };
    if (success) {
      this.info('Command completed', baseMetadata);
    } else {
      this.error('Command failed', baseMetadata);
    }
  }

  /**
   * Create a child logger whose entries carry extra context
   */
  child(context: LogMetadata): Logger {
    const childLogger = new Logger(this.config, { ...this.context, ...context });
    childLogger.commandContext = this.commandContext;
    return childLogger;
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
};

/**
 * Create a logger; unset options come from LOG_LEVEL, NO_COLOR and the TTY
 */
export function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  return new Logger({
    level: config.level ?? getLogLevel(),
    json: config.json ?? false,
    color: config.color ?? (process.env.NO_COLOR === undefined && process.stderr.isTTY === true),
    service: config.service ?? 'bibconsensus',
    sink: config.sink,
  });
}

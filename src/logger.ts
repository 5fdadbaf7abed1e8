/**
 * Structured logging
 *
 * Every component logs through a child logger tagged with its scope
 * (`analyzer`, `optimizer`, ...). Output defaults to stderr so hosts
 * that speak a protocol over stdout are not disturbed.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFormatName = 'pretty' | 'json';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: Record<string, unknown>;
  error?: Error;
}

export interface LoggerOptions {
  /** Minimum log level (default: INFO) */
  level?: LogLevel;

  /** Log formatter (default: prettyFormat) */
  formatter?: (entry: LogEntry) => string;

  /** Log output function (default: one line to stderr) */
  output?: (formatted: string) => void;

  /** Include timestamps (default: true) */
  timestamps?: boolean;

  /** Context merged into every entry */
  context?: Record<string, unknown>;
}

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

function writeStderr(formatted: string): void {
  process.stderr.write(`${formatted}\n`);
}

export class Logger {
  private readonly level: LogLevel;
  private readonly formatter: (entry: LogEntry) => string;
  private readonly output: (formatted: string) => void;
  private readonly timestamps: boolean;
  private readonly context: Record<string, unknown>;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.formatter = options.formatter ?? prettyFormat;
    this.output = options.output ?? writeStderr;
    this.timestamps = options.timestamps ?? true;
    this.context = options.context ?? {};
  }

  /**
   * Logger sharing this one's settings, tagging entries with `scope`
   */
  child(scope: string, context: Record<string, unknown> = {}): Logger {
    return new Logger({
      level: this.level,
      formatter: this.formatter,
      output: this.output,
      timestamps: this.timestamps,
      context: { ...this.context, scope, ...context },
    });
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.level && this.level !== LogLevel.SILENT;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.log(LogLevel.WARN, message, context, error);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  /**
   * Time an async call; failures are logged and rethrown
   */
  async time<T>(
    label: string,
    fn: () => Promise<T>,
    context?: Record<string, unknown>
  ): Promise<T> {
    const start = Date.now();
    this.debug(`${label} started`, context);

    try {
      const result = await fn();
      this.debug(`${label} completed`, { ...context, duration: Date.now() - start });
      return result;
    } catch (error) {
      this.warn(
        `${label} failed`,
        { ...context, duration: Date.now() - start },
        error instanceof Error ? error : new Error(String(error))
      );
      throw error;
    }
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: this.timestamps ? Date.now() : 0,
      context: { ...this.context, ...context },
      error
    };

    this.output(this.formatter(entry));
  }
}

/**
 * Pretty format for terminals
 */
export function prettyFormat(entry: LogEntry): string {
  const levelColors: Record<LogLevel, string> = {
    [LogLevel.DEBUG]: '\x1b[36m', // Cyan
    [LogLevel.INFO]: '\x1b[32m',  // Green
    [LogLevel.WARN]: '\x1b[33m',  // Yellow
    [LogLevel.ERROR]: '\x1b[31m', // Red
    [LogLevel.SILENT]: ''
  };

  const reset = '\x1b[0m';
  const { scope, ...rest } = entry.context ?? {};

  let output = `${levelColors[entry.level]}[${LogLevel[entry.level]}]${reset}`;

  if (entry.timestamp) {
    output += ` ${new Date(entry.timestamp).toISOString()}`;
  }

  if (typeof scope === 'string') {
    output += ` [${scope}]`;
  }

  output += ` ${entry.message}`;

  if (Object.keys(rest).length > 0) {
    output += ` ${JSON.stringify(rest)}`;
  }

  if (entry.error) {
    output += `\n  Error: ${entry.error.message}`;
  }

  return output;
}

/**
 * One JSON object per line, for log aggregation
 */
export function jsonFormat(entry: LogEntry): string {
  return JSON.stringify({
    level: LogLevel[entry.level].toLowerCase(),
    message: entry.message,
    timestamp: entry.timestamp,
    context: entry.context,
    error: entry.error ? {
      message: entry.error.message,
      stack: entry.error.stack
    } : undefined
  });
}

export function parseLogLevel(name: LogLevelName): LogLevel {
  return LEVEL_BY_NAME[name];
}

/**
 * Build a logger from configuration values
 */
export function createLogger(options: { level?: LogLevelName; format?: LogFormatName } = {}): Logger {
  return new Logger({
    level: parseLogLevel(options.level ?? 'info'),
    formatter: options.format === 'json' ? jsonFormat : prettyFormat,
  });
}

export const defaultLogger = new Logger({ level: LogLevel.WARN });

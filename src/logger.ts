/**
 * Structured logging for context stores and sessions
 *
 * - Log levels (debug, info, warn, error)
 * - Bound context, inherited by child loggers
 * - Formatters (pretty, JSON)
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Epoch milliseconds, 0 when timestamps are disabled */
  timestamp: number;
  context: Record<string, unknown>;
  error?: Error;
}

export type LogFormatter = (entry: LogEntry) => string;

export interface LoggerOptions {
  /** Minimum log level (default: INFO) */
  level?: LogLevel;

  /** Log formatter (default: prettyFormat) */
  formatter?: LogFormatter;

  /** Log output function (default: console.log) */
  output?: (formatted: string) => void;

  /** Include timestamps (default: true) */
  timestamps?: boolean;

  /** Context merged into every entry */
  context?: Record<string, unknown>;
}

export class Logger {
  readonly level: LogLevel;
  private readonly options: Required<Omit<LoggerOptions, 'level' | 'context'>>;
  private readonly context: Readonly<Record<string, unknown>>;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.options = {
      formatter: options.formatter ?? prettyFormat,
      output: options.output ?? console.log,
      timestamps: options.timestamps ?? true,
    };
    this.context = { ...options.context };
  }

  /**
   * Logger with the same settings and extra bound context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      ...this.options,
      level: this.level,
      context: { ...this.context, ...context },
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.level !== LogLevel.SILENT && level >= this.level;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, message, context, error);
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (!this.isLevelEnabled(level)) return;

    this.options.output(
      this.options.formatter({
        level,
        message,
        timestamp: this.options.timestamps ? Date.now() : 0,
        context: { ...this.context, ...context },
        error,
      })
    );
  }
}

const LEVELS: Record<LogLevel, { name: string; color: string }> = {
  [LogLevel.DEBUG]: { name: 'DEBUG', color: '\x1b[36m' },
  [LogLevel.INFO]: { name: 'INFO', color: '\x1b[32m' },
  [LogLevel.WARN]: { name: 'WARN', color: '\x1b[33m' },
  [LogLevel.ERROR]: { name: 'ERROR', color: '\x1b[31m' },
  [LogLevel.SILENT]: { name: '', color: '' },
};

const RESET = '\x1b[0m';

/**
 * Coloured, multi-line format for terminals
 */
export const prettyFormat: LogFormatter = ({ level, message, timestamp, context, error }) => {
  const { name, color } = LEVELS[level];
  const lines = [
    [`${color}[${name}]${RESET}`, timestamp ? new Date(timestamp).toISOString() : '', message]
      .filter(Boolean)
      .join(' '),
  ];

  if (Object.keys(context).length > 0) {
    lines.push(`  Context: ${JSON.stringify(context, null, 2)}`);
  }
  if (error) {
    lines.push(`  Error: ${error.message}`);
    if (error.stack) lines.push(`  Stack: ${error.stack}`);
  }

  return lines.join('\n');
};

/**
 * One JSON object per line, for log shippers
 */
export const jsonFormat: LogFormatter = ({ level, message, timestamp, context, error }) =>
  JSON.stringify({
    level: LEVELS[level].name,
    message,
    timestamp,
    context,
    error: error && { message: error.message, stack: error.stack },
  });

/**
 * Logger used by stores that are not given one: warnings and errors only
 */
export function createDefaultLogger(): Logger {
  return new Logger({ level: LogLevel.WARN });
}

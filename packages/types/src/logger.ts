/**
 * Structured logging for the Vowline client.
 *
 * A zero-dependency logger that emits one JSON object per entry. Supports
 * level filtering, contextual fields and child loggers scoped to a
 * component (`rpc`, `rpc.submit`, `keystore`, ...).
 *
 * Entries go to stderr by default so that command output on stdout stays
 * machine-readable.
 *
 * @packageDocumentation
 */

// ─── Log levels ─────────────────────────────────────────────────────────────────

/**
 * Numeric log levels. An entry is emitted only when its level is greater
 * than or equal to the logger's threshold.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  /** Suppress all logging output. */
  SILENT = 4,
}

// ─── Types ──────────────────────────────────────────────────────────────────────

/** A single structured log entry. */
export interface LogEntry {
  /** Human-readable level name (e.g. "DEBUG", "INFO"). */
  level: string;
  message: string;
  /** ISO 8601 timestamp of when the entry was created. */
  timestamp: string;
  /** Component name for scoped logging. */
  component?: string;
  [key: string]: unknown;
}

/** A sink that receives every emitted {@link LogEntry}. */
export type LogOutput = (entry: LogEntry) => void;

// ─── Helpers ────────────────────────────────────────────────────────────────────

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

/** Default output: one JSON line on stderr. */
const defaultOutput: LogOutput = (entry: LogEntry): void => {
  process.stderr.write(JSON.stringify(entry) + '\n');
};

/**
 * Parse a level name such as `"debug"` or `"WARN"`.
 *
 * @returns The matching level, or `undefined` for an unknown name.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

// ─── Logger options ─────────────────────────────────────────────────────────────

/** Configuration options accepted by the {@link Logger} constructor. */
export interface LoggerOptions {
  /** Minimum level to emit. Defaults to {@link LogLevel.INFO}. */
  level?: LogLevel;
  /** Component name prepended to child logger components. */
  component?: string;
  /** Custom output sink. Defaults to JSON lines on stderr. */
  output?: LogOutput;
}

// ─── Logger class ───────────────────────────────────────────────────────────────

/**
 * Structured logger with level filtering, contextual fields, and child loggers.
 *
 * ```ts
 * const log = new Logger({ level: LogLevel.DEBUG, component: 'rpc' });
 * log.debug('posting transaction', { requestId });
 * const child = log.child('query');
 * child.warn('value is not valid UTF-8', { bytes: 12 });
 * ```
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string | undefined;
  private readonly output: LogOutput;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? LogLevel.INFO;
    this.component = options?.component;
    this.output = options?.output ?? defaultOutput;
  }

  // ── Public API ──────────────────────────────────────────────────────────────

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, fields);
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, fields);
  }

  /**
   * Create a child logger that inherits this logger's level and output
   * but extends the component prefix (`parent.child`).
   */
  child(component: string): Logger {
    const childComponent = this.component
      ? `${this.component}.${component}`
      : component;

    return new Logger({
      level: this.level,
      component: childComponent,
      output: this.output,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  // ── Private ─────────────────────────────────────────────────────────────────

  private log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (level < this.level) {
      return;
    }

    const entry: LogEntry = {
      level: LEVEL_NAMES[level],
      message,
      timestamp: new Date().toISOString(),
      ...(this.component !== undefined ? { component: this.component } : {}),
      ...fields,
    };

    this.output(entry);
  }
}

// ─── Factory & default instance ─────────────────────────────────────────────────

/** Convenience wrapper around `new Logger(options)`. */
export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}

/** A logger that discards everything; the default for library components. */
export const silentLogger: Logger = createLogger({ level: LogLevel.SILENT });

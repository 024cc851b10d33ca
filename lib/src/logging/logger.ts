/**
 * Logger Implementation
 *
 * Structured logger used by the pipeline stages, the service clients and the
 * HTTP handlers. One logger per component (`child`), with request-scoped
 * context bound through `withContext`.
 */

import {
  type LogEntry,
  type LoggerConfig,
  type LogLevel,
  LogLevelName,
  LogLevelColors,
  LogColors,
  createDefaultLoggerConfig,
  shouldLog,
  formatError,
  LogLevel as LogLevelEnum,
  LogFormat,
} from './types.js';

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config?: Partial<LoggerConfig>) {
    this.config = createDefaultLoggerConfig(config);
  }

  /**
   * Create a child logger whose source is appended to this logger's source
   */
  child(source: string): Logger {
    return new Logger({
      ...this.config,
      source: this.config.source ? `${this.config.source}:${source}` : source,
    });
  }

  /**
   * Create a logger that adds `bindings` to the context of every entry.
   * Per-call context wins over bound keys of the same name.
   */
  withContext(bindings: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      bindings: { ...this.config.bindings, ...bindings },
    });
  }

  error(message: string, context?: Record<string, unknown>): void;
  error(message: string, error: Error, context?: Record<string, unknown>): void;
  error(
    message: string,
    errorOrContext?: Error | Record<string, unknown>,
    context?: Record<string, unknown>
  ): void {
    if (errorOrContext instanceof Error) {
      this.log(LogLevelEnum.ERROR, message, context, errorOrContext);
      return;
    }
    this.log(LogLevelEnum.ERROR, message, errorOrContext);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.WARN, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.INFO, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.DEBUG, message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.TRACE, message, context);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.config.level);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  getConfig(): Readonly<LoggerConfig> {
    return this.config;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!shouldLog(level, this.config.level)) {
      return;
    }

    const merged = { ...this.config.bindings, ...context };

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: Object.keys(merged).length > 0 ? merged : undefined,
      source: this.config.source,
      error: error ? formatError(error) : undefined,
    };

    this.output(this.format(entry), level);
  }

  private format(entry: LogEntry): string {
    switch (this.config.format) {
      case LogFormat.JSON:
        return JSON.stringify({
          timestamp: entry.timestamp.toISOString(),
          level: LogLevelName[entry.level],
          message: entry.message,
          source: entry.source,
          context: entry.context,
          error: entry.error,
        });
      case LogFormat.COMPACT: {
        const time = entry.timestamp.toISOString().slice(11, 19);
        return `${time} ${LogLevelName[entry.level].charAt(0)} ${entry.message}`;
      }
      case LogFormat.PRETTY:
        return this.formatLine(entry, this.config.colors);
      case LogFormat.TEXT:
      default:
        return this.formatLine(entry, false);
    }
  }

  /**
   * Text layout shared by the `text` and `pretty` formats
   */
  private formatLine(entry: LogEntry, colored: boolean): string {
    const paint = (color: string, text: string): string =>
      colored ? `${color}${text}${LogColors.reset}` : text;

    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(paint(LogColors.gray, `[${entry.timestamp.toISOString()}]`));
    }

    parts.push(paint(LogLevelColors[entry.level], LogLevelName[entry.level].padEnd(5)));

    if (entry.source) {
      parts.push(paint(LogColors.cyan, `[${entry.source}]`));
    }

    parts.push(entry.message);

    if (entry.context) {
      parts.push(paint(LogColors.dim, JSON.stringify(entry.context)));
    }

    if (entry.error) {
      parts.push(paint(LogColors.red, `\n  Error: ${entry.error.name}: ${entry.error.message}`));
      if (entry.error.stack) {
        parts.push(paint(LogColors.gray, `\n  ${entry.error.stack.replace(/\n/g, '\n  ')}`));
      }
    }

    return parts.join(' ');
  }

  private output(formatted: string, level: LogLevel): void {
    if (this.config.output) {
      this.config.output(formatted, level);
      return;
    }

    if (!this.config.console) {
      return;
    }

    if (level === LogLevelEnum.ERROR) {
      console.error(formatted);
    } else if (level === LogLevelEnum.WARN) {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }
}

// =============================================================================
// Global Logger Instance
// =============================================================================

let globalLogger: Logger | null = null;

export function getGlobalLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger({
      level: LogLevelEnum.INFO,
      format: 'pretty',
    });
  }
  return globalLogger;
}

export function setGlobalLogger(logger: Logger): void {
  globalLogger = logger;
}

export function resetGlobalLogger(): void {
  globalLogger = null;
}

export function createLogger(
  source: string,
  config?: Partial<LoggerConfig>
): Logger {
  return new Logger({
    ...config,
    source,
  });
}

/**
 * Logger that discards everything. Used where a component is built without one
 * and output would only be noise, e.g. in tests.
 */
export function createSilentLogger(): Logger {
  return new Logger({ console: false });
}

// src/logger.ts

export type LogLevel = "debug" | "info" | "warn" | "error" | "none";

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 4,
};

export interface LogContext {
  registryId?: string;
  component?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: Date;
  error?: Error;
}

export type LogHandler = (entry: LogEntry) => void;

/**
 * Handler that drops every entry. Libraries embedding a registry stay silent
 * until they opt into output.
 */
export const noopLogHandler: LogHandler = () => {};

/**
 * Console log handler that formats entries for terminal output.
 */
export const consoleLogHandler: LogHandler = (entry: LogEntry) => {
  const { level, message, context, timestamp, error } = entry;
  const ts = timestamp.toISOString();
  const ctx = Object.entries(context)
    .filter(([_, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${v}`)
    .join(" ");

  const prefix = ctx ? `[${ctx}]` : "";
  const formatted = `${ts} ${level.toUpperCase().padEnd(5)} ${prefix} ${message}`;

  switch (level) {
    case "debug":
      console.debug(formatted);
      break;
    case "info":
      console.log(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    case "error":
      console.error(formatted);
      if (error) {
        console.error(error);
      }
      break;
  }
};

/**
 * Process-wide defaults used by loggers that were not given their own sink.
 */
class LoggerConfig {
  private _level: LogLevel = "info";
  private _handler: LogHandler = noopLogHandler;

  get level(): LogLevel {
    return this._level;
  }

  set level(level: LogLevel) {
    this._level = level;
  }

  get handler(): LogHandler {
    return this._handler;
  }

  set handler(handler: LogHandler) {
    this._handler = handler;
  }

  configure(options: { level?: LogLevel; handler?: LogHandler }): void {
    if (options.level !== undefined) {
      this._level = options.level;
    }
    if (options.handler !== undefined) {
      this._handler = options.handler;
    }
  }
}

export const loggerConfig = new LoggerConfig();

/**
 * Per-logger overrides. A logger built with a handler or level keeps them for
 * all of its children and ignores the global configuration for that setting.
 */
export interface LoggerOptions {
  handler?: LogHandler;
  level?: LogLevel;
}

/**
 * A structured logger with context.
 */
export class Logger {
  private readonly context: LogContext;
  private readonly options: LoggerOptions;

  constructor(context: LogContext = {}, options: LoggerOptions = {}) {
    this.context = context;
    this.options = options;
  }

  /**
   * Creates a child logger with additional context.
   */
  child(additionalContext: LogContext): Logger {
    return new Logger({ ...this.context, ...additionalContext }, this.options);
  }

  private log(
    level: LogLevel,
    message: string,
    extra?: LogContext,
    error?: Error,
  ): void {
    const threshold = this.options.level ?? loggerConfig.level;
    if (LOG_LEVELS[level] < LOG_LEVELS[threshold]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      context: { ...this.context, ...extra },
      timestamp: new Date(),
      error,
    };

    (this.options.handler ?? loggerConfig.handler)(entry);
  }

  debug(message: string, extra?: LogContext): void {
    this.log("debug", message, extra);
  }

  info(message: string, extra?: LogContext): void {
    this.log("info", message, extra);
  }

  warn(message: string, extra?: LogContext): void {
    this.log("warn", message, extra);
  }

  error(message: string, error?: Error, extra?: LogContext): void {
    this.log("error", message, extra, error);
  }
}

/**
 * Creates a logger for a specific component.
 */
export function createLogger(
  component: string,
  registryId?: string,
  options?: LoggerOptions,
): Logger {
  return new Logger({ component, registryId }, options);
}

/**
 * Formats an unknown thrown value for a log context field.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

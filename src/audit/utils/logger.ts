/**
 * Audit logging
 * Structured log lines on stderr; stdout is reserved for the report itself
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal'
}

export interface LogEntry {
  level: LogLevel;
  message: string;

  /** Module name */
  module: string;

  timestamp: Date;

  /** Extra data */
  data?: Record<string, unknown>;

  error?: Error;
}

export interface LoggerOptions {
  /** Minimum level that gets written */
  minLevel?: LogLevel;

  moduleName?: string;

  /** Output sink, defaults to console.error */
  write?: (line: string) => void;

  /** Sub-loggers follow the parent's level unless given their own */
  parent?: AuditLogger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.FATAL]: 4
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}

export class AuditLogger {
  private minLevel?: LogLevel;
  private moduleName: string;
  private write: (line: string) => void;
  private parent?: AuditLogger;

  constructor(options: LoggerOptions = {}) {
    this.parent = options.parent;
    this.minLevel = options.minLevel ?? (this.parent ? undefined : LogLevel.WARN);
    this.moduleName = options.moduleName ?? 'audit';
    this.write = options.write ?? ((line: string) => console.error(line));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, data);
  }

  error(message: string, error?: Error, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, data, error);
  }

  fatal(message: string, error?: Error, data?: Record<string, unknown>): void {
    this.log(LogLevel.FATAL, message, data, error);
  }

  /**
   * Change the threshold at runtime (after config has been loaded)
   */
  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel ?? this.parent?.getLevel() ?? LogLevel.WARN;
  }

  createSubLogger(moduleName: string): AuditLogger {
    return new AuditLogger({
      moduleName: `${this.moduleName}.${moduleName}`,
      write: this.write,
      parent: this
    });
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: Error
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.getLevel()]) {
      return;
    }

    this.write(this.format({
      level,
      message,
      module: this.moduleName,
      timestamp: new Date(),
      data,
      error
    }));
  }

  private format(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const levelStr = entry.level.toUpperCase().padEnd(5);

    let logMessage = `${timestamp} ${levelStr} [${entry.module}] ${entry.message}`;

    if (entry.error) {
      logMessage += `\nError: ${entry.error.message}`;
      if (entry.error.stack && this.getLevel() === LogLevel.DEBUG) {
        logMessage += `\nStack: ${entry.error.stack}`;
      }
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
      logMessage += `\nData: ${JSON.stringify(entry.data, null, 2)}`;
    }

    return logMessage;
  }
}

/**
 * Root logger shared by the CLIs
 */
export const defaultLogger = new AuditLogger();

export function createModuleLogger(moduleName: string): AuditLogger {
  return defaultLogger.createSubLogger(moduleName);
}

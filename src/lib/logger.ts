/**
 * Structured Logger
 *
 * Console and JSON-lines file logging for monitor invocations. One instance is
 * created per process by the entry point and handed to every component that
 * needs it.
 */

import { MonitorBaseError, errorMessage } from './errors';
import { DailyLogFile } from './log-file';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: LogContext;
  correlation_id?: string;
  role?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  enableConsole: boolean;
  enableFile: boolean;
  logDirectory: string;
  maxFileSize?: number; // in bytes
  maxFiles?: number;
  enableStructuredLogging: boolean;
}

const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  enableConsole: true,
  enableFile: false,
  logDirectory: './logs',
  maxFileSize: 10 * 1024 * 1024, // 10MB
  maxFiles: 10,
  enableStructuredLogging: false
};

export class Logger {
  private config: LoggerConfig;
  private correlationId: string | null = null;
  private role: string | null = null;
  private logFile: DailyLogFile | null;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
    this.logFile = this.config.enableFile
      ? new DailyLogFile(this.config.logDirectory, { maxFileSize: this.config.maxFileSize, maxFiles: this.config.maxFiles })
      : null;
  }

  /**
   * Set correlation ID for tracing one invocation across its log lines
   */
  setCorrelationId(correlationId: string): void {
    this.correlationId = correlationId;
  }

  /**
   * Set the worker role this process is running as
   */
  setRole(role: string): void {
    this.role = role;
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  /**
   * Log error message, expanding monitor errors into their structured form
   */
  error(message: string, error?: Error, context?: LogContext): void {
    const errorContext = error instanceof MonitorBaseError
      ? { ...context, ...error.context, error_details: error.toLogFormat() }
      : { ...context, error_message: error?.message, stack_trace: error?.stack };

    this.log(LogLevel.ERROR, message, errorContext);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const logEntry: LogEntry = {
      timestamp: new Date(),
      level,
      message,
      context,
      correlation_id: this.correlationId || undefined,
      role: this.role || undefined
    };

    this.writeLogEntry(logEntry);
  }

  private writeLogEntry(entry: LogEntry): void {
    if (this.config.enableConsole) {
      this.writeToConsole(entry.level, this.formatLogEntry(entry, this.config.enableStructuredLogging));
    }

    if (this.logFile) {
      this.writeToFile(this.logFile, this.formatLogEntry(entry, true));
    }
  }

  private formatLogEntry(entry: LogEntry, structured: boolean): string {
    if (structured) {
      return JSON.stringify({
        ...entry,
        timestamp: entry.timestamp.toISOString()
      });
    }

    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const correlation = entry.correlation_id ? `[${entry.correlation_id}] ` : '';
    const role = entry.role ? `[${entry.role}] ` : '';
    const context = entry.context && Object.keys(entry.context).length > 0
      ? ` ${JSON.stringify(entry.context)}`
      : '';

    return `${timestamp} ${level} ${role}${correlation}${entry.message}${context}`;
  }

  private writeToConsole(level: LogLevel, message: string): void {
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(message);
        break;
      case LogLevel.INFO:
        console.info(message);
        break;
      case LogLevel.WARN:
        console.warn(message);
        break;
      case LogLevel.ERROR:
        console.error(message);
        break;
    }
  }

  private writeToFile(logFile: DailyLogFile, message: string): void {
    try {
      logFile.append(message);
    } catch (error) {
      // console output carries on without the file
      console.error(`Log file output stopped: ${errorMessage(error)}`);
      this.logFile = null;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.level);
  }
}

/**
 * Parse log level from string, falling back to info
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Error Classification
 *
 * Error hierarchy for the monitoring system. Every error carries a code,
 * a category and a severity so that callers can decide between aborting
 * the invocation and dropping a single test or destination.
 */

// ===== ERROR CLASSIFICATION =====

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  CONFIGURATION = 'configuration',
  FETCH = 'fetch',
  COMPUTATION = 'computation',
  PUBLISH = 'publish',
  SYSTEM = 'system'
}

export type ErrorContext = Record<string, unknown>;

export interface ErrorLogFormat {
  timestamp: string;
  message: string;
  error_code: string;
  category: ErrorCategory;
  severity: ErrorSeverity;
  context: ErrorContext;
  stack_trace?: string;
}

// ===== CUSTOM ERROR CLASSES =====

export class MonitorBaseError extends Error {
  public readonly errorCode: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    errorCode: string,
    category: ErrorCategory,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context: ErrorContext = {}
  ) {
    super(message);
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.category = category;
    this.severity = severity;
    this.context = context;
    this.timestamp = new Date();

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to structured log format
   */
  toLogFormat(): ErrorLogFormat {
    return {
      timestamp: this.timestamp.toISOString(),
      message: this.message,
      error_code: this.errorCode,
      category: this.category,
      severity: this.severity,
      context: this.context,
      stack_trace: this.stack
    };
  }
}

/**
 * Wrong role, malformed definition or invalid configuration. Never retried.
 */
export class ConfigurationError extends MonitorBaseError {
  constructor(message: string, errorCode: string = 'CONFIG_ERROR', context: ErrorContext = {}) {
    super(message, errorCode, ErrorCategory.CONFIGURATION, ErrorSeverity.CRITICAL, context);
  }
}

export type FetchFailureReason = 'NO_ROWS' | 'QUERY_ERROR' | 'INTERNAL_ERROR';

export class FetchError extends MonitorBaseError {
  public readonly reason: FetchFailureReason;

  constructor(message: string, reason: FetchFailureReason, context: ErrorContext = {}) {
    super(message, `FETCH_${reason}`, ErrorCategory.FETCH, ErrorSeverity.LOW, context);
    this.reason = reason;
  }
}

export class ResultComputationError extends MonitorBaseError {
  constructor(message: string, errorCode: string = 'COMPUTATION_ERROR', context: ErrorContext = {}) {
    super(message, errorCode, ErrorCategory.COMPUTATION, ErrorSeverity.MEDIUM, context);
  }
}

export class PublishError extends MonitorBaseError {
  constructor(message: string, errorCode: string = 'PUBLISH_ERROR', context: ErrorContext = {}) {
    super(message, errorCode, ErrorCategory.PUBLISH, ErrorSeverity.HIGH, context);
  }
}

/**
 * Extracts a readable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Normalises anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

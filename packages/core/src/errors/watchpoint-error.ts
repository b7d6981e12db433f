/**
 * WatchpointError - error class with structured error information
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a WatchpointError
 */
export interface WatchpointErrorOptions {
  code: ErrorCode;
  /** Replaces the code's default message */
  message?: string;
  /** Values that identify what was rejected */
  context?: Record<string, unknown>;
}

/**
 * Base error for everything Watchpoint itself rejects.
 *
 * Errors raised by user code (accessors, comparators, callbacks) are never
 * wrapped in a WatchpointError; they reach the caller of `update()` as thrown.
 *
 * @example
 * ```typescript
 * try {
 *   scope.observe(() => count, { onChange });
 * } catch (error) {
 *   if (WatchpointError.isCode(error, 'WATCH_L200')) {
 *     // scope already torn down
 *   }
 * }
 * ```
 */
export class WatchpointError extends Error {
  readonly code: ErrorCode;
  /** How to resolve the error, from the code table */
  readonly suggestion: string;
  readonly category: ErrorCategory;
  readonly context: Record<string, unknown>;

  constructor(options: WatchpointErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    super(options.message ?? errorInfo.message);

    this.name = 'WatchpointError';
    this.code = options.code;
    this.suggestion = errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
  }

  static isCode(error: unknown, code: ErrorCode): boolean {
    return error instanceof WatchpointError && error.code === code;
  }

  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return error instanceof WatchpointError && error.category === category;
  }

  /** `[code] message`, then context and suggestion lines */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];
    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }
    lines.push(`Suggestion: ${this.suggestion}`);
    return lines.join('\n');
  }
}

/**
 * Observer or registry options failed validation
 */
export class ObserverConfigError extends WatchpointError {
  /** Individual validation messages */
  readonly errors: readonly string[];

  constructor(code: ErrorCode, errors: readonly string[], context?: Record<string, unknown>) {
    super({
      code,
      message: `Invalid observer configuration: ${errors.join('; ')}`,
      context: { ...context, errors },
    });

    this.name = 'ObserverConfigError';
    this.errors = errors;
  }
}

/**
 * An ObserverScope was used after dispose()
 */
export class ScopeDisposedError extends WatchpointError {
  /** The operation that was attempted */
  readonly operation: string;

  constructor(operation: string) {
    super({
      code: 'WATCH_L200',
      message: `Cannot ${operation}: observer scope has been disposed`,
      context: { operation },
    });

    this.name = 'ScopeDisposedError';
    this.operation = operation;
  }
}

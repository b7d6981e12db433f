/**
 * Watchpoint Error System
 *
 * Structured errors for configuration and lifecycle misuse. Each error
 * carries a code (WATCH_V101, WATCH_L200, ...), a category and a
 * suggestion for resolution.
 *
 * @example
 * ```typescript
 * import { WatchpointError } from '@watchpoint/core';
 *
 * try {
 *   createObserver(() => value, { onChange, maxHistoryLength: -1 });
 * } catch (error) {
 *   if (WatchpointError.isCategory(error, 'validation')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 *
 * @module errors
 */

// Error codes
export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

// Error classes
export {
  ObserverConfigError,
  ScopeDisposedError,
  WatchpointError,
  type WatchpointErrorOptions,
} from './watchpoint-error.js';

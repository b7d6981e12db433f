/**
 * Input validation for observer construction.
 *
 * Checks run once per observer, at construction. Nothing here is
 * consulted on the `update()` path.
 *
 * @module validation
 */

import type { ErrorCode } from '../errors/error-codes.js';
import { ObserverConfigError } from '../errors/watchpoint-error.js';
import type { ObserverOptions } from '../types.js';

/** Observer options as they may arrive from untyped callers */
export type UncheckedObserverOptions = {
  readonly [K in keyof ObserverOptions<unknown>]?: unknown;
};

/** A single failed check */
export interface ValidationIssue {
  readonly code: ErrorCode;
  readonly message: string;
}

/** Validation result */
export interface InputValidationResult {
  readonly valid: boolean;
  readonly errors: readonly string[];
  readonly issues: readonly ValidationIssue[];
}

function toResult(issues: ValidationIssue[]): InputValidationResult {
  return {
    valid: issues.length === 0,
    errors: issues.map((issue) => issue.message),
    issues,
  };
}

/** Validate a history cap */
export function validateMaxHistoryLength(value: unknown): InputValidationResult {
  const issues: ValidationIssue[] = [];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    issues.push({ code: 'WATCH_V103', message: 'maxHistoryLength must be an integer' });
  } else if (value < 0) {
    issues.push({ code: 'WATCH_V103', message: 'maxHistoryLength cannot be negative' });
  }
  return toResult(issues);
}

/** Validate everything an observer is constructed from */
export function validateObserverOptions(
  accessor: unknown,
  options: UncheckedObserverOptions
): InputValidationResult {
  const issues: ValidationIssue[] = [];

  if (typeof accessor !== 'function') {
    issues.push({ code: 'WATCH_V101', message: 'accessor must be a function' });
  }
  if (typeof options.onChange !== 'function') {
    issues.push({ code: 'WATCH_V102', message: 'onChange must be a function' });
  }
  for (const key of ['comparator', 'clock'] as const) {
    const fn = options[key];
    if (fn !== undefined && typeof fn !== 'function') {
      issues.push({ code: 'WATCH_V100', message: `${key} must be a function when provided` });
    }
  }
  for (const key of ['initializeImmediately', 'fireOnFirstSample'] as const) {
    const flag = options[key];
    if (flag !== undefined && typeof flag !== 'boolean') {
      issues.push({ code: 'WATCH_V100', message: `${key} must be a boolean when provided` });
    }
  }
  if (options.maxHistoryLength !== undefined) {
    issues.push(...validateMaxHistoryLength(options.maxHistoryLength).issues);
  }

  return toResult(issues);
}

/**
 * Assert observer options are valid, throwing ObserverConfigError if not.
 * A single failure keeps its specific code; several collapse to WATCH_V100.
 */
export function assertObserverOptions(accessor: unknown, options: UncheckedObserverOptions): void {
  const result = validateObserverOptions(accessor, options);
  if (result.valid) return;

  const [first] = result.issues;
  const code: ErrorCode = result.issues.length === 1 && first ? first.code : 'WATCH_V100';
  throw new ObserverConfigError(code, result.errors);
}

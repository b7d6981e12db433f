/**
 * Watchpoint Error Codes
 *
 * Error codes are structured as WATCH_[CATEGORY][NUMBER]:
 * - V: Validation/configuration errors (V100-V199)
 * - L: Lifecycle errors (L200-L299)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Validation errors (V100-V199)
  WATCH_V100: {
    code: 'WATCH_V100',
    message: 'Invalid observer configuration',
    suggestion: 'Check the validation errors for the offending options.',
  },
  WATCH_V101: {
    code: 'WATCH_V101',
    message: 'Accessor must be a function',
    suggestion: 'Pass a zero-argument function that returns the value to observe.',
  },
  WATCH_V102: {
    code: 'WATCH_V102',
    message: 'Callback must be a function',
    suggestion: 'Provide an onChange function; it receives the ChangeEvent.',
  },
  WATCH_V103: {
    code: 'WATCH_V103',
    message: 'Invalid history length',
    suggestion: 'maxHistoryLength must be a non-negative integer.',
  },

  // Lifecycle errors (L200-L299)
  WATCH_L200: {
    code: 'WATCH_L200',
    message: 'Observer scope has been disposed',
    suggestion: 'Create a new scope instead of reusing one after dispose().',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'validation' | 'lifecycle';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  return code.charAt(6) === 'V' ? 'validation' : 'lifecycle';
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}

/**
 * Error Code Infrastructure
 * Stable error codes shared by every error the core can raise.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Caller contract violations (E100–E199)
  INVALID_ARGUMENT = 'E100',
  INVALID_STATE_SHAPE = 'E101',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',
  UNKNOWN_GENERATOR = 'E301',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// Short human labels carried by serialized errors
export const ERROR_TITLES = {
  [ErrorCode.INVALID_ARGUMENT]: 'Invalid argument',
  [ErrorCode.INVALID_STATE_SHAPE]: 'Invalid state tuple',
  [ErrorCode.CONFIGURATION_ERROR]: 'Invalid configuration',
  [ErrorCode.UNKNOWN_GENERATOR]: 'Unknown generator',
  [ErrorCode.INTERNAL_ERROR]: 'Internal error',
} satisfies Record<ErrorCode, string>;

export function getErrorTitle(code: ErrorCode): string {
  return ERROR_TITLES[code];
}

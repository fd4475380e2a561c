/**
 * Error Code Infrastructure
 * Stable error codes and exit-code mappings.
 */

export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',
  INVALID_SIZE_RANGE = 'E301',

  // Context Errors (E400–E499)
  CONTEXT_STATE_VIOLATION = 'E400',
  POOL_EMPTY = 'E401',
}

export const EXIT_CODES = {
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INVALID_SIZE_RANGE]: 51,
  [ErrorCode.CONTEXT_STATE_VIOLATION]: 70,
  [ErrorCode.POOL_EMPTY]: 71,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}

/**
 * Exit codes shared by the CLI, the API error handler and StmError.
 * Ranges: 0 = success, 1-9 = general, 10-19 = users/auth,
 * 20-29 = tasks, 30-39 = categories/tags.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  STORAGE_ERROR = 5,
  VALIDATION_ERROR = 6,
  LOCK_TIMEOUT = 7,
  CONFIG_ERROR = 8,

  // === USER / AUTH ERRORS (10-19) ===
  USERNAME_TAKEN = 10,
  UNAUTHORIZED = 11,
  USER_DISABLED = 12,
  USER_NOT_FOUND = 13,

  // === TASK ERRORS (20-29) ===
  TASK_NOT_FOUND = 20,
  INVALID_PRIORITY = 21,

  // === CATEGORY / TAG ERRORS (30-39) ===
  CATEGORY_EXISTS = 30,
  TAG_EXISTS = 31,
  INVALID_COLOR = 32,
  CATEGORY_NOT_FOUND = 33,
  TAG_NOT_FOUND = 34,
}

/** Error category every exit code folds into. */
export type ErrorCategory = 'INVALID' | 'NOT_FOUND' | 'CONFLICT' | 'UNAUTHORIZED' | 'INTERNAL';

/** Check if an exit code represents an error. */
export function isErrorCode(code: ExitCode): boolean {
  return code !== ExitCode.SUCCESS;
}

/** Map an exit code to the category front-ends translate into responses. */
export function getErrorCategory(code: ExitCode): ErrorCategory {
  switch (code) {
    case ExitCode.INVALID_INPUT:
    case ExitCode.VALIDATION_ERROR:
    case ExitCode.CONFIG_ERROR:
    case ExitCode.INVALID_PRIORITY:
    case ExitCode.INVALID_COLOR:
      return 'INVALID';
    case ExitCode.NOT_FOUND:
    case ExitCode.USER_NOT_FOUND:
    case ExitCode.TASK_NOT_FOUND:
    case ExitCode.CATEGORY_NOT_FOUND:
    case ExitCode.TAG_NOT_FOUND:
      return 'NOT_FOUND';
    case ExitCode.USERNAME_TAKEN:
    case ExitCode.CATEGORY_EXISTS:
    case ExitCode.TAG_EXISTS:
    case ExitCode.LOCK_TIMEOUT:
      return 'CONFLICT';
    case ExitCode.UNAUTHORIZED:
    case ExitCode.USER_DISABLED:
      return 'UNAUTHORIZED';
    default:
      return 'INTERNAL';
  }
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}

/**
 * Error type for every failure the core reports.
 *
 * Carries an exit code; the category (Invalid, NotFound, Conflict,
 * Unauthorized, Internal) derives from it so front-ends can map errors
 * without knowing which service or backend raised them.
 */

import { ExitCode, getErrorCategory, getExitCodeName, type ErrorCategory } from '../types/exit-codes.js';

export interface StmErrorOptions {
  fix?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/** Shape produced by StmError.toJSON() and sent by the CLI and the API. */
export interface StmErrorBody {
  success: false;
  error: {
    code: ExitCode;
    name: string;
    category: ErrorCategory;
    message: string;
    fix?: string;
    details?: Record<string, unknown>;
  };
}

export class StmError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;
  readonly details?: Record<string, unknown>;

  constructor(code: ExitCode, message: string, options?: StmErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = 'StmError';
    this.code = code;
    this.fix = options?.fix;
    this.details = options?.details;
  }

  get category(): ErrorCategory {
    return getErrorCategory(this.code);
  }

  toJSON(): StmErrorBody {
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        category: this.category,
        message: this.message,
        ...(this.fix !== undefined && { fix: this.fix }),
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

export function isStmError(err: unknown): err is StmError {
  return err instanceof StmError;
}

/** Category of any thrown value; anything that is not an StmError is INTERNAL. */
export function errorCategory(err: unknown): ErrorCategory {
  return isStmError(err) ? err.category : 'INTERNAL';
}

/**
 * Pass StmErrors through; wrap anything else as a storage failure
 * that keeps the original error as its cause.
 */
export function toStmError(err: unknown, context: string): StmError {
  if (isStmError(err)) return err;
  const reason = err instanceof Error ? err.message : String(err);
  return new StmError(ExitCode.STORAGE_ERROR, `${context}: ${reason}`, { cause: err });
}

/** Minimal logger surface guardStorage reports through. */
interface ErrorLogger {
  error(obj: object, msg: string): void;
}

/**
 * Run a storage call, translating anything that is not already an StmError
 * into STORAGE_ERROR. Translated failures are logged at error level.
 */
export async function guardStorage<T>(log: ErrorLogger, context: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (isStmError(err)) throw err;
    const wrapped = toStmError(err, context);
    log.error({ err, code: wrapped.code }, wrapped.message);
    throw wrapped;
  }
}

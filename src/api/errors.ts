/**
 * Maps errors onto HTTP responses. StmErrors keep their toJSON() body and
 * get a status from their category; anything else becomes a 500.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { StmError, isStmError } from '../core/errors.js';
import { ExitCode, type ErrorCategory } from '../types/exit-codes.js';

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  INVALID: 422,
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNAUTHORIZED: 401,
  INTERNAL: 500,
};

export function statusForCategory(category: ErrorCategory): number {
  return STATUS_BY_CATEGORY[category];
}

function statusCodeOf(error: Error): number | undefined {
  return 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : undefined;
}

/** Convert framework errors (bad JSON, missing auth, ...) to StmError. */
export function toHttpError(error: Error): StmError {
  if (isStmError(error)) return error;
  const status = statusCodeOf(error);
  if (status === 401) {
    return new StmError(ExitCode.UNAUTHORIZED, 'Could not validate credentials', { cause: error });
  }
  if (status === 404) {
    return new StmError(ExitCode.NOT_FOUND, error.message, { cause: error });
  }
  if (status !== undefined && status >= 400 && status < 500) {
    return new StmError(ExitCode.INVALID_INPUT, error.message, { cause: error });
  }
  return new StmError(ExitCode.GENERAL_ERROR, 'Internal server error', { cause: error });
}

export function errorHandler(error: Error, request: FastifyRequest, reply: FastifyReply): void {
  const stmError = toHttpError(error);
  const status = statusForCategory(stmError.category);
  if (status >= 500) {
    request.log.error({ err: error }, 'request failed');
  }
  void reply.status(status).send(stmError.toJSON());
}

/**
 * Bearer-token authentication with @fastify/jwt.
 *
 * Tokens carry `{ sub: username, uid: userId }`. A token whose user has
 * since been disabled or no longer exists is rejected.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { StmError, isStmError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';
import type { Identity } from '../types/user.js';

export interface TokenPayload {
  sub: string;
  uid: number;
}

declare module '@fastify/jwt' {
  interface FastifyJWT {
    payload: TokenPayload;
    user: TokenPayload;
  }
}

declare module 'fastify' {
  interface FastifyInstance {
    authenticate: (request: FastifyRequest) => Promise<void>;
  }
}

export interface TokenResponse {
  access_token: string;
  token_type: 'bearer';
}

export function issueToken(app: FastifyInstance, identity: Identity): TokenResponse {
  return {
    access_token: app.jwt.sign({ sub: identity.username, uid: identity.userId }),
    token_type: 'bearer',
  };
}

/** Identity of the authenticated request. Only valid behind `authenticate`. */
export function currentIdentity(request: FastifyRequest): Identity {
  return { userId: request.user.uid, username: request.user.sub };
}

function unauthorized(cause?: unknown): StmError {
  return new StmError(ExitCode.UNAUTHORIZED, 'Could not validate credentials', { cause });
}

/** Decorate `app.authenticate`, the preHandler for protected routes. */
export function registerAuthentication(app: FastifyInstance): void {
  app.decorate('authenticate', async (request: FastifyRequest): Promise<void> => {
    try {
      await request.jwtVerify();
    } catch (err) {
      throw unauthorized(err);
    }

    try {
      const user = await app.orchestrator.getUser(request.user.uid);
      if (user.disabled || user.username !== request.user.sub) {
        throw unauthorized();
      }
    } catch (err) {
      if (isStmError(err) && err.category === 'NOT_FOUND') throw unauthorized(err);
      throw err;
    }
  });
}

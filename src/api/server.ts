/**
 * REST API server. buildServer() returns a configured Fastify instance that
 * is not yet listening, so tests can drive it with inject().
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import fastifyCors from '@fastify/cors';
import fastifyJwt from '@fastify/jwt';
import { registerAuthentication } from './auth.js';
import { errorHandler } from './errors.js';
import taskRoutes from './routes/tasks.js';
import userRoutes from './routes/users.js';
import type { Orchestrator } from '../core/orchestrator.js';
import type { AppConfig } from '../types/config.js';

declare module 'fastify' {
  interface FastifyInstance {
    orchestrator: Orchestrator;
  }
}

export interface BuildServerOptions {
  /** Fastify logger setting; defaults to the configured log level. */
  logger?: FastifyServerOptions['logger'];
}

export const API_PREFIX = '/api/v1';

export async function buildServer(
  orchestrator: Orchestrator,
  config: AppConfig,
  options: BuildServerOptions = {},
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? { level: config.logging.level },
  });

  await app.register(fastifyCors, { origin: true, credentials: true });
  await app.register(fastifyJwt, {
    secret: config.auth.secret,
    sign: { expiresIn: `${config.auth.tokenTtlMinutes}m` },
  });

  app.decorate('orchestrator', orchestrator);
  registerAuthentication(app);
  app.setErrorHandler(errorHandler);

  app.get(`${API_PREFIX}/health`, async () => ({
    status: 'ok',
    engine: orchestrator.engine,
    timestamp: new Date().toISOString(),
  }));

  await app.register(userRoutes, { prefix: API_PREFIX });
  await app.register(taskRoutes, { prefix: API_PREFIX });

  return app;
}

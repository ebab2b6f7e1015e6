/**
 * User, token and category/tag routes.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { currentIdentity, issueToken } from '../auth.js';
import { parseLabelParams, parseUserId } from './params.js';
import { StmError } from '../../core/errors.js';
import {
  credentialsSchema,
  labelSchema,
  parseInput,
  userRegisterSchema,
  userUpdateSchema,
} from '../../core/validation.js';
import { ExitCode } from '../../types/exit-codes.js';

/**
 * Only the authenticated user may change their own record; any other id
 * reads as not found.
 */
function assertSelf(request: FastifyRequest, userId: number): void {
  if (currentIdentity(request).userId !== userId) {
    throw new StmError(ExitCode.USER_NOT_FOUND, `User not found: id ${userId}`, { details: { id: userId } });
  }
}

async function userRoutes(app: FastifyInstance): Promise<void> {
  const orchestrator = app.orchestrator;
  const auth = { preHandler: app.authenticate };

  // ---- Accounts and tokens ----

  app.post('/register', async (request, reply) => {
    const user = await orchestrator.registerUser(parseInput(userRegisterSchema, request.body));
    return reply.code(201).send(user);
  });

  app.post('/token', async (request) => {
    const { username, password } = parseInput(credentialsSchema, request.body);
    const identity = await orchestrator.authenticate(username, password);
    return issueToken(app, identity);
  });

  app.post('/refresh', auth, async (request) => issueToken(app, currentIdentity(request)));

  // ---- Users ----

  app.get('/users', async () => orchestrator.listUsers());

  app.get('/users/me', auth, async (request) => orchestrator.getUser(currentIdentity(request).userId));

  app.get('/users/:userId', async (request) => orchestrator.getUser(parseUserId(request.params)));

  app.put('/users/:userId', auth, async (request) => {
    const userId = parseUserId(request.params);
    assertSelf(request, userId);
    return orchestrator.updateUser(userId, parseInput(userUpdateSchema, request.body));
  });

  // ---- Categories ----

  app.get('/users/:userId/categories', async (request) =>
    orchestrator.listCategories(parseUserId(request.params)),
  );

  app.put('/users/:userId/categories', auth, async (request, reply) => {
    const userId = parseUserId(request.params);
    assertSelf(request, userId);
    const { name, color } = parseInput(labelSchema, request.body);
    return reply.code(201).send(await orchestrator.addCategory(userId, name, color));
  });

  app.delete('/users/:userId/categories/:name', auth, async (request) => {
    const { userId, name } = parseLabelParams(request.params);
    assertSelf(request, userId);
    return orchestrator.removeCategory(userId, name);
  });

  // ---- Tags ----

  app.get('/users/:userId/tags', async (request) => orchestrator.listTags(parseUserId(request.params)));

  app.put('/users/:userId/tags', auth, async (request, reply) => {
    const userId = parseUserId(request.params);
    assertSelf(request, userId);
    const { name, color } = parseInput(labelSchema, request.body);
    return reply.code(201).send(await orchestrator.addTag(userId, name, color));
  });

  app.delete('/users/:userId/tags/:name', auth, async (request) => {
    const { userId, name } = parseLabelParams(request.params);
    assertSelf(request, userId);
    return orchestrator.removeTag(userId, name);
  });
}

export default userRoutes;

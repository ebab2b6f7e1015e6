/**
 * Task routes. Every route is authenticated and scoped to the token's user.
 */

import type { FastifyInstance } from 'fastify';
import { currentIdentity } from '../auth.js';
import { parseTaskId } from './params.js';
import {
  parseInput,
  taskCreateSchema,
  taskFiltersSchema,
  taskUpdateSchema,
} from '../../core/validation.js';

async function taskRoutes(app: FastifyInstance): Promise<void> {
  const orchestrator = app.orchestrator;
  app.addHook('preHandler', app.authenticate);

  app.get('/tasks', async (request) => {
    const filters = parseInput(taskFiltersSchema, request.query);
    return orchestrator.listTasks(currentIdentity(request).userId, filters);
  });

  app.get('/tasks/categories', async (request) =>
    orchestrator.listTaskCategories(currentIdentity(request).userId),
  );

  app.get('/tasks/:taskId', async (request) =>
    orchestrator.getTask(parseTaskId(request.params), currentIdentity(request).userId),
  );

  app.post('/tasks', async (request, reply) => {
    const input = parseInput(taskCreateSchema, request.body);
    const task = await orchestrator.createTask(currentIdentity(request).userId, input);
    return reply.code(201).send(task);
  });

  app.put('/tasks/:taskId', async (request) => {
    const input = parseInput(taskUpdateSchema, request.body);
    return orchestrator.updateTask(parseTaskId(request.params), currentIdentity(request).userId, input);
  });

  app.post('/tasks/:taskId/complete', async (request) =>
    orchestrator.completeTask(parseTaskId(request.params), currentIdentity(request).userId),
  );

  app.delete('/tasks/:taskId', async (request, reply) => {
    await orchestrator.deleteTask(parseTaskId(request.params), currentIdentity(request).userId);
    return reply.code(204).send();
  });
}

export default taskRoutes;

/**
 * REST API tests, driven through Fastify inject() against a JSON store.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../server.js';
import { statusForCategory, toHttpError } from '../errors.js';
import { Orchestrator } from '../../core/orchestrator.js';
import { getDefaultConfig } from '../../core/config.js';
import { ExitCode } from '../../types/exit-codes.js';

interface ErrorBody {
  success: false;
  error: { code: number; name: string; category: string; message: string };
}

describe('REST API', () => {
  let tempDir: string;
  let orchestrator: Orchestrator;
  let app: FastifyInstance;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'stm-api-test-'));
    orchestrator = await Orchestrator.create({
      storage: { engine: 'json', dataDir: tempDir },
      security: { hashRounds: 4 },
    });
    const config = getDefaultConfig();
    config.auth.secret = 'test-secret';
    app = await buildServer(orchestrator, config, { logger: false });
  });

  afterEach(async () => {
    await app.close();
    await orchestrator.close();
    await rm(tempDir, { recursive: true, force: true });
  });

  async function register(username: string, password: string): Promise<void> {
    const res = await app.inject({ method: 'POST', url: '/api/v1/register', payload: { username, password } });
    expect(res.statusCode).toBe(201);
  }

  async function login(username: string, password: string): Promise<string> {
    const res = await app.inject({ method: 'POST', url: '/api/v1/token', payload: { username, password } });
    expect(res.statusCode).toBe(200);
    return res.json<{ access_token: string }>().access_token;
  }

  function bearer(token: string): Record<string, string> {
    return { authorization: `Bearer ${token}` };
  }

  it('reports health', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'ok', engine: 'json' });
  });

  describe('accounts', () => {
    it('registers a user and hides the password hash', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/register',
        payload: { username: 'alice', password: 'pw123', email: 'alice@example.com' },
      });
      expect(res.statusCode).toBe(201);
      expect(res.json()).toEqual({
        id: 1,
        username: 'alice',
        email: 'alice@example.com',
        fullName: '',
        disabled: false,
        categories: [{ name: 'General', color: '#5dafb0' }],
        tags: [],
      });
    });

    it('answers a taken username with 409', async () => {
      await register('alice', 'pw123');
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/register',
        payload: { username: 'alice', password: 'other' },
      });
      expect(res.statusCode).toBe(409);
      expect(res.json<ErrorBody>().error).toMatchObject({
        code: ExitCode.USERNAME_TAKEN,
        name: 'USERNAME_TAKEN',
        category: 'CONFLICT',
      });
    });

    it('answers invalid input with 422', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/register',
        payload: { username: '', password: 'pw' },
      });
      expect(res.statusCode).toBe(422);
      expect(res.json<ErrorBody>().error.name).toBe('VALIDATION_ERROR');
    });

    it('answers malformed JSON with 422', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/register',
        headers: { 'content-type': 'application/json' },
        payload: '{bad',
      });
      expect(res.statusCode).toBe(422);
      expect(res.json<ErrorBody>().error.name).toBe('INVALID_INPUT');
    });

    it('issues a bearer token for valid credentials only', async () => {
      await register('alice', 'pw123');
      const ok = await app.inject({
        method: 'POST',
        url: '/api/v1/token',
        payload: { username: 'alice', password: 'pw123' },
      });
      expect(ok.statusCode).toBe(200);
      expect(ok.json()).toMatchObject({ token_type: 'bearer', access_token: expect.any(String) });

      const bad = await app.inject({
        method: 'POST',
        url: '/api/v1/token',
        payload: { username: 'alice', password: 'wrong' },
      });
      expect(bad.statusCode).toBe(401);
      expect(bad.json<ErrorBody>().error.message).toBe('Incorrect username or password');
    });

    it('refreshes a token', async () => {
      await register('alice', 'pw123');
      const token = await login('alice', 'pw123');
      const res = await app.inject({ method: 'POST', url: '/api/v1/refresh', headers: bearer(token) });
      expect(res.statusCode).toBe(200);
      const refreshed = res.json<{ access_token: string }>().access_token;
      const me = await app.inject({ method: 'GET', url: '/api/v1/users/me', headers: bearer(refreshed) });
      expect(me.json()).toMatchObject({ id: 1, username: 'alice' });
    });
  });

  describe('authentication', () => {
    it('rejects requests without a token', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/tasks' });
      expect(res.statusCode).toBe(401);
      expect(res.json<ErrorBody>().error).toMatchObject({
        name: 'UNAUTHORIZED',
        message: 'Could not validate credentials',
      });
    });

    it('rejects a forged token', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/users/me', headers: bearer('not.a.token') });
      expect(res.statusCode).toBe(401);
    });

    it('rejects the token of a user who has been disabled', async () => {
      await register('alice', 'pw123');
      const token = await login('alice', 'pw123');
      const disable = await app.inject({
        method: 'PUT',
        url: '/api/v1/users/1',
        headers: bearer(token),
        payload: { disabled: true },
      });
      expect(disable.statusCode).toBe(200);
      expect(disable.json()).toMatchObject({ disabled: true });

      const res = await app.inject({ method: 'GET', url: '/api/v1/users/me', headers: bearer(token) });
      expect(res.statusCode).toBe(401);
    });
  });

  describe('users and labels', () => {
    let token: string;

    beforeEach(async () => {
      await register('alice', 'pw123');
      await register('bob', 'pw456');
      token = await login('alice', 'pw123');
    });

    it('lists users and reads one by id', async () => {
      const list = await app.inject({ method: 'GET', url: '/api/v1/users' });
      expect(list.json<{ username: string }[]>().map((u) => u.username)).toEqual(['alice', 'bob']);
      const bob = await app.inject({ method: 'GET', url: '/api/v1/users/2' });
      expect(bob.json()).toMatchObject({ id: 2, username: 'bob' });
      const missing = await app.inject({ method: 'GET', url: '/api/v1/users/9' });
      expect(missing.statusCode).toBe(404);
    });

    it('only lets users change their own record', async () => {
      const res = await app.inject({
        method: 'PUT',
        url: '/api/v1/users/2',
        headers: bearer(token),
        payload: { fullName: 'Not Bob' },
      });
      expect(res.statusCode).toBe(404);
      expect(res.json<ErrorBody>().error.name).toBe('USER_NOT_FOUND');
    });

    it('adds, lists and removes categories', async () => {
      const added = await app.inject({
        method: 'PUT',
        url: '/api/v1/users/1/categories',
        headers: bearer(token),
        payload: { name: 'Work', color: '#f00' },
      });
      expect(added.statusCode).toBe(201);
      expect(added.json()).toEqual({ name: 'Work', color: '#f00' });

      const list = await app.inject({ method: 'GET', url: '/api/v1/users/1/categories' });
      expect(list.json()).toEqual([
        { name: 'General', color: '#5dafb0' },
        { name: 'Work', color: '#f00' },
      ]);

      const removed = await app.inject({
        method: 'DELETE',
        url: '/api/v1/users/1/categories/Work',
        headers: bearer(token),
      });
      expect(removed.statusCode).toBe(200);
      expect(removed.json()).toEqual({ name: 'Work', color: '#f00' });
    });

    it('rejects a bad tag color with 422 INVALID_COLOR', async () => {
      const res = await app.inject({
        method: 'PUT',
        url: '/api/v1/users/1/tags',
        headers: bearer(token),
        payload: { name: 'home', color: 'green' },
      });
      expect(res.statusCode).toBe(422);
      expect(res.json<ErrorBody>().error.name).toBe('INVALID_COLOR');
    });

    it('answers a duplicate tag with 409', async () => {
      const put = () =>
        app.inject({
          method: 'PUT',
          url: '/api/v1/users/1/tags',
          headers: bearer(token),
          payload: { name: 'home', color: '#0f0' },
        });
      expect((await put()).statusCode).toBe(201);
      const res = await put();
      expect(res.statusCode).toBe(409);
      expect(res.json<ErrorBody>().error.name).toBe('TAG_EXISTS');
    });
  });

  describe('tasks', () => {
    let alice: string;
    let bob: string;

    beforeEach(async () => {
      await register('alice', 'pw123');
      await register('bob', 'pw456');
      alice = await login('alice', 'pw123');
      bob = await login('bob', 'pw456');
    });

    async function createTask(token: string, payload: Record<string, unknown>): Promise<number> {
      const res = await app.inject({ method: 'POST', url: '/api/v1/tasks', headers: bearer(token), payload });
      expect(res.statusCode).toBe(201);
      return res.json<{ id: number }>().id;
    }

    it('creates a task owned by the token user', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/tasks',
        headers: bearer(alice),
        payload: { name: 'Buy milk', priority: 1, ownerId: 2 },
      });
      expect(res.statusCode).toBe(201);
      expect(res.json()).toEqual({
        id: 1,
        ownerId: 1,
        name: 'Buy milk',
        description: '',
        category: 'General',
        dueDate: null,
        parameters: {},
        completed: false,
        tags: [],
        priority: 1,
      });
    });

    it('rejects an out-of-range priority with 422', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/tasks',
        headers: bearer(alice),
        payload: { name: 'x', priority: 7 },
      });
      expect(res.statusCode).toBe(422);
      expect(res.json<ErrorBody>().error.name).toBe('INVALID_PRIORITY');
    });

    it('filters the list from the query string', async () => {
      await createTask(alice, { name: 'a', priority: 1 });
      await createTask(alice, { name: 'b', priority: 2 });
      await createTask(alice, { name: 'c', priority: 1, completed: true });
      const res = await app.inject({ method: 'GET', url: '/api/v1/tasks?completed=false&priority=1', headers: bearer(alice) });
      expect(res.statusCode).toBe(200);
      expect(res.json<{ name: string }[]>().map((t) => t.name)).toEqual(['a']);
    });

    it('updates, completes and deletes a task', async () => {
      const id = await createTask(alice, { name: 'Buy milk', category: 'Errands' });

      const updated = await app.inject({
        method: 'PUT',
        url: `/api/v1/tasks/${id}`,
        headers: bearer(alice),
        payload: { name: 'Buy oat milk' },
      });
      expect(updated.json()).toMatchObject({ name: 'Buy oat milk', category: 'Errands' });

      const done = await app.inject({ method: 'POST', url: `/api/v1/tasks/${id}/complete`, headers: bearer(alice) });
      expect(done.json()).toMatchObject({ completed: true });

      const categories = await app.inject({ method: 'GET', url: '/api/v1/tasks/categories', headers: bearer(alice) });
      expect(categories.json()).toEqual(['Errands']);

      const deleted = await app.inject({ method: 'DELETE', url: `/api/v1/tasks/${id}`, headers: bearer(alice) });
      expect(deleted.statusCode).toBe(204);
      expect(deleted.body).toBe('');

      const gone = await app.inject({ method: 'GET', url: `/api/v1/tasks/${id}`, headers: bearer(alice) });
      expect(gone.statusCode).toBe(404);
    });

    it('hides one user\'s tasks from another', async () => {
      const id = await createTask(alice, { name: 'Private' });
      for (const request of [
        { method: 'GET' as const, url: `/api/v1/tasks/${id}` },
        { method: 'PUT' as const, url: `/api/v1/tasks/${id}`, payload: { name: 'mine' } },
        { method: 'POST' as const, url: `/api/v1/tasks/${id}/complete` },
        { method: 'DELETE' as const, url: `/api/v1/tasks/${id}` },
      ]) {
        const res = await app.inject({ ...request, headers: bearer(bob) });
        expect(res.statusCode).toBe(404);
        expect(res.json<ErrorBody>().error.name).toBe('TASK_NOT_FOUND');
      }
      const list = await app.inject({ method: 'GET', url: '/api/v1/tasks', headers: bearer(bob) });
      expect(list.json()).toEqual([]);
    });

    it('rejects a non-numeric task id with 422', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/tasks/abc', headers: bearer(alice) });
      expect(res.statusCode).toBe(422);
      expect(res.json<ErrorBody>().error.name).toBe('VALIDATION_ERROR');
    });
  });
});

describe('toHttpError', () => {
  it('maps categories to status codes', () => {
    expect(statusForCategory('INVALID')).toBe(422);
    expect(statusForCategory('NOT_FOUND')).toBe(404);
    expect(statusForCategory('CONFLICT')).toBe(409);
    expect(statusForCategory('UNAUTHORIZED')).toBe(401);
    expect(statusForCategory('INTERNAL')).toBe(500);
  });

  it('hides the message of unexpected errors', () => {
    const err = toHttpError(new Error('secret detail'));
    expect(err.code).toBe(ExitCode.GENERAL_ERROR);
    expect(err.message).toBe('Internal server error');
  });
});

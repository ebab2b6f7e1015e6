/**
 * Tests for the storage engine registry.
 */

import { describe, it, expect, afterEach } from 'vitest';
import {
  listStorageEngines,
  openStorageBackend,
  registerStorageBackend,
  unregisterStorageBackend,
  type StorageBackend,
} from '../storage-backend.js';
import { ExitCode } from '../../types/exit-codes.js';

function stubBackend(engine: string): StorageBackend {
  const unused = async (): Promise<never> => {
    throw new Error('not used');
  };
  return {
    engine,
    createUser: unused,
    getUser: unused,
    findUser: async () => null,
    updateUser: unused,
    listUsers: async () => [],
    addLabel: unused,
    removeLabel: unused,
    createTask: unused,
    getTask: unused,
    findTask: async () => null,
    updateTask: unused,
    deleteTask: unused,
    listTasks: async () => [],
    close: async () => {},
  };
}

describe('storage engine registry', () => {
  afterEach(() => {
    unregisterStorageBackend('memory');
  });

  it('ships the relational and JSON engines', () => {
    expect(listStorageEngines()).toEqual(['sqlite', 'json']);
  });

  it('opens a newly registered engine by name', async () => {
    const seen: string[] = [];
    registerStorageBackend('memory', async ({ dataDir }) => {
      seen.push(dataDir);
      return stubBackend('memory');
    });

    const backend = await openStorageBackend('memory', { dataDir: '/data' });
    expect(backend.engine).toBe('memory');
    expect(seen).toEqual(['/data']);
    expect(listStorageEngines()).toContain('memory');
  });

  it('rejects unknown engines with CONFIG_ERROR', async () => {
    await expect(openStorageBackend('postgres', { dataDir: '/data' })).rejects.toMatchObject({
      code: ExitCode.CONFIG_ERROR,
      category: 'INVALID',
      message: 'Unknown storage engine: postgres',
      fix: 'Use one of: sqlite, json',
    });
  });

  it('reports whether an engine was removed', () => {
    expect(unregisterStorageBackend('memory')).toBe(false);
    registerStorageBackend('memory', async () => stubBackend('memory'));
    expect(unregisterStorageBackend('memory')).toBe(true);
  });
});

/**
 * Storage backend abstraction layer.
 *
 * Defines the StorageBackend contract that both the relational and the JSON
 * file store implement, plus the registry the Orchestrator resolves engines
 * through. Services depend on the interface only; engines are picked once,
 * when the Orchestrator is built.
 *
 * Both engines must produce identical observable results for the same call
 * sequence, including assigned ids (highest existing id + 1).
 */

import { StmError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';
import type { StorageEngine } from '../types/config.js';
import type { NewTaskRecord, Task, TaskFilters, TaskPatch } from '../types/task.js';
import type { Label, LabelKind, NewUserRecord, UserPatch, UserRecord, UserRef } from '../types/user.js';
import { createJsonBackend } from './json-backend.js';
import { createSqliteBackend } from './sqlite-backend.js';

/**
 * Storage backend interface.
 *
 * Lookups by id or username fail with a NotFound-category StmError,
 * uniqueness violations with a Conflict-category one. `find*` variants
 * return null instead of failing.
 */
export interface StorageBackend {
  readonly engine: StorageEngine;

  // User CRUD (users are never deleted; `disabled` deactivates them)
  createUser(user: NewUserRecord): Promise<UserRecord>;
  getUser(ref: UserRef): Promise<UserRecord>;
  findUser(ref: UserRef): Promise<UserRecord | null>;
  updateUser(userId: number, patch: UserPatch): Promise<UserRecord>;
  listUsers(): Promise<UserRecord[]>;

  // Per-user categories and tags. Each call checks and writes in one step,
  // so concurrent calls for the same user never lose an update.
  /** Append a label. Fails with CATEGORY_EXISTS / TAG_EXISTS on a duplicate name. */
  addLabel(userId: number, kind: LabelKind, label: Label): Promise<Label>;
  /** Remove a label by name and return it. Fails with CATEGORY_NOT_FOUND / TAG_NOT_FOUND. */
  removeLabel(userId: number, kind: LabelKind, name: string): Promise<Label>;

  // Task CRUD
  createTask(task: NewTaskRecord): Promise<Task>;
  getTask(taskId: number): Promise<Task>;
  findTask(taskId: number): Promise<Task | null>;
  updateTask(taskId: number, patch: TaskPatch): Promise<Task>;
  /** Delete a task and return it as it was. */
  deleteTask(taskId: number): Promise<Task>;
  /** Tasks owned by `ownerId` matching every given filter, by ascending id. */
  listTasks(ownerId: number, filters?: TaskFilters): Promise<Task[]>;

  /** Release files and handles. The backend is unusable afterwards. */
  close(): Promise<void>;
}

/** What a factory needs to open a backend. */
export interface StorageBackendOptions {
  /** Absolute path to the data directory. */
  dataDir: string;
}

export type StorageBackendFactory = (options: StorageBackendOptions) => Promise<StorageBackend>;

const factories = new Map<StorageEngine, StorageBackendFactory>([
  ['sqlite', createSqliteBackend],
  ['json', createJsonBackend],
]);

/**
 * Register (or replace) the factory for an engine name.
 * Services and front-ends need no change to use a new engine.
 */
export function registerStorageBackend(engine: StorageEngine, factory: StorageBackendFactory): void {
  factories.set(engine, factory);
}

/** Remove a registered engine. Returns whether one was registered. */
export function unregisterStorageBackend(engine: StorageEngine): boolean {
  return factories.delete(engine);
}

/** Names of every registered engine. */
export function listStorageEngines(): StorageEngine[] {
  return [...factories.keys()];
}

/**
 * Open a backend for a registered engine.
 * Unknown engine names fail with CONFIG_ERROR.
 */
export async function openStorageBackend(
  engine: StorageEngine,
  options: StorageBackendOptions,
): Promise<StorageBackend> {
  const factory = factories.get(engine);
  if (!factory) {
    throw new StmError(ExitCode.CONFIG_ERROR, `Unknown storage engine: ${engine}`, {
      fix: `Use one of: ${listStorageEngines().join(', ')}`,
      details: { engine },
    });
  }
  return factory(options);
}

/**
 * JSON file storage backend.
 *
 * Documents live in the data directory as users.json and tasks.json, each
 * `{ "version": 1, "<entity>": { "<id>": row } }`. Every read-modify-write
 * cycle holds a proper-lockfile lock on its document and writes through
 * write-file-atomic, so concurrent processes never interleave writes.
 *
 * Uniqueness and the task -> user reference, which the relational engine
 * enforces in its schema, are checked here in code before writing.
 */

import { mkdir } from 'node:fs/promises';
import { z } from 'zod';
import { atomicWriteJson } from './atomic.js';
import { readJsonDocument } from './json.js';
import { withLock } from './lock.js';
import {
  addLabelPatch,
  applyTaskPatch,
  applyUserPatch,
  byId,
  matchesFilters,
  nextId,
  removeLabelPatch,
  taskNotFound,
  userNotFound,
  usernameTaken,
} from './records.js';
import type { StorageBackend, StorageBackendOptions } from './storage-backend.js';
import { getTasksPath, getUsersPath } from '../core/paths.js';
import { getLogger } from '../core/logger.js';
import { prioritySchema } from '../core/validation.js';
import type { NewTaskRecord, Task, TaskFilters, TaskPatch } from '../types/task.js';
import type { Label, LabelKind, NewUserRecord, UserPatch, UserRecord, UserRef } from '../types/user.js';

/** Document format version written to both files. */
export const JSON_STORE_VERSION = 1;

const storedLabelSchema = z.object({ name: z.string(), color: z.string() });

const userRowSchema = z.object({
  id: z.number().int().positive(),
  username: z.string(),
  email: z.string(),
  hashedPassword: z.string(),
  fullName: z.string(),
  disabled: z.boolean(),
  categories: z.array(storedLabelSchema),
  tags: z.array(storedLabelSchema),
});

const taskRowSchema = z.object({
  id: z.number().int().positive(),
  ownerId: z.number().int().positive(),
  name: z.string(),
  description: z.string(),
  category: z.string(),
  dueDate: z.string().nullable(),
  parameters: z.record(z.unknown()),
  completed: z.boolean(),
  tags: z.array(z.string()),
  priority: prioritySchema,
});

const usersDocumentSchema = z.object({
  version: z.literal(JSON_STORE_VERSION),
  users: z.record(userRowSchema),
});

const tasksDocumentSchema = z.object({
  version: z.literal(JSON_STORE_VERSION),
  tasks: z.record(taskRowSchema),
});

type UsersDocument = z.infer<typeof usersDocumentSchema>;
type TasksDocument = z.infer<typeof tasksDocumentSchema>;

/** Copy the known fields in a fixed order. */
function toUserRecord(row: UserRecord): UserRecord {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    hashedPassword: row.hashedPassword,
    fullName: row.fullName,
    disabled: row.disabled,
    categories: row.categories.map((c) => ({ name: c.name, color: c.color })),
    tags: row.tags.map((t) => ({ name: t.name, color: t.color })),
  };
}

function toTask(row: Task): Task {
  return {
    id: row.id,
    ownerId: row.ownerId,
    name: row.name,
    description: row.description,
    category: row.category,
    dueDate: row.dueDate,
    parameters: { ...row.parameters },
    completed: row.completed,
    tags: [...row.tags],
    priority: row.priority,
  };
}

function findUserIn(doc: UsersDocument, ref: UserRef): UserRecord | null {
  if ('id' in ref) {
    return doc.users[String(ref.id)] ?? null;
  }
  return Object.values(doc.users).find((u) => u.username === ref.username) ?? null;
}

class JsonStorageBackend implements StorageBackend {
  readonly engine = 'json';

  private readonly usersPath: string;
  private readonly tasksPath: string;
  private readonly log = getLogger('json-store');

  constructor(dataDir: string) {
    this.usersPath = getUsersPath(dataDir);
    this.tasksPath = getTasksPath(dataDir);
  }

  // ---- Documents ----

  private readUsers(): Promise<UsersDocument> {
    return readJsonDocument(this.usersPath, usersDocumentSchema, () => ({
      version: JSON_STORE_VERSION,
      users: {},
    }));
  }

  private readTasks(): Promise<TasksDocument> {
    return readJsonDocument(this.tasksPath, tasksDocumentSchema, () => ({
      version: JSON_STORE_VERSION,
      tasks: {},
    }));
  }

  /** Read, apply `fn`, write back; all under the document's lock. */
  private mutateUsers<T>(fn: (doc: UsersDocument) => T): Promise<T> {
    return withLock(this.usersPath, async () => {
      const doc = await this.readUsers();
      const result = fn(doc);
      await atomicWriteJson(this.usersPath, doc);
      return result;
    });
  }

  private mutateTasks<T>(fn: (doc: TasksDocument) => T | Promise<T>): Promise<T> {
    return withLock(this.tasksPath, async () => {
      const doc = await this.readTasks();
      const result = await fn(doc);
      await atomicWriteJson(this.tasksPath, doc);
      return result;
    });
  }

  // ---- Users ----

  async createUser(user: NewUserRecord): Promise<UserRecord> {
    const created = await this.mutateUsers((doc) => {
      if (findUserIn(doc, { username: user.username })) {
        throw usernameTaken(user.username);
      }
      const row = toUserRecord({ ...user, id: nextId(Object.values(doc.users).map((u) => u.id)) });
      doc.users[String(row.id)] = row;
      return row;
    });
    this.log.debug({ userId: created.id }, 'user row written');
    return toUserRecord(created);
  }

  async findUser(ref: UserRef): Promise<UserRecord | null> {
    const row = findUserIn(await this.readUsers(), ref);
    return row ? toUserRecord(row) : null;
  }

  async getUser(ref: UserRef): Promise<UserRecord> {
    const user = await this.findUser(ref);
    if (!user) throw userNotFound(ref);
    return user;
  }

  async updateUser(userId: number, patch: UserPatch): Promise<UserRecord> {
    const updated = await this.mutateUsers((doc) => {
      const current = findUserIn(doc, { id: userId });
      if (!current) throw userNotFound({ id: userId });
      if (patch.username !== undefined && patch.username !== current.username) {
        const clash = findUserIn(doc, { username: patch.username });
        if (clash) throw usernameTaken(patch.username);
      }
      const row = applyUserPatch(current, patch);
      doc.users[String(userId)] = row;
      return row;
    });
    return toUserRecord(updated);
  }

  async listUsers(): Promise<UserRecord[]> {
    const doc = await this.readUsers();
    return Object.values(doc.users).sort(byId).map(toUserRecord);
  }

  async addLabel(userId: number, kind: LabelKind, label: Label): Promise<Label> {
    return this.mutateUsers((doc) => {
      const current = findUserIn(doc, { id: userId });
      if (!current) throw userNotFound({ id: userId });
      doc.users[String(userId)] = applyUserPatch(current, addLabelPatch(current, kind, label));
      return { name: label.name, color: label.color };
    });
  }

  async removeLabel(userId: number, kind: LabelKind, name: string): Promise<Label> {
    return this.mutateUsers((doc) => {
      const current = findUserIn(doc, { id: userId });
      if (!current) throw userNotFound({ id: userId });
      const { removed, patch } = removeLabelPatch(current, kind, name);
      doc.users[String(userId)] = applyUserPatch(current, patch);
      return { name: removed.name, color: removed.color };
    });
  }

  // ---- Tasks ----

  async createTask(task: NewTaskRecord): Promise<Task> {
    const created = await this.mutateTasks(async (doc) => {
      const owner = findUserIn(await this.readUsers(), { id: task.ownerId });
      if (!owner) throw userNotFound({ id: task.ownerId });
      const row = toTask({ ...task, id: nextId(Object.values(doc.tasks).map((t) => t.id)) });
      doc.tasks[String(row.id)] = row;
      return row;
    });
    this.log.debug({ taskId: created.id }, 'task row written');
    return toTask(created);
  }

  async findTask(taskId: number): Promise<Task | null> {
    const row = (await this.readTasks()).tasks[String(taskId)];
    return row ? toTask(row) : null;
  }

  async getTask(taskId: number): Promise<Task> {
    const task = await this.findTask(taskId);
    if (!task) throw taskNotFound(taskId);
    return task;
  }

  async updateTask(taskId: number, patch: TaskPatch): Promise<Task> {
    const updated = await this.mutateTasks((doc) => {
      const current = doc.tasks[String(taskId)];
      if (!current) throw taskNotFound(taskId);
      const row = applyTaskPatch(current, patch);
      doc.tasks[String(taskId)] = row;
      return row;
    });
    return toTask(updated);
  }

  async deleteTask(taskId: number): Promise<Task> {
    const removed = await this.mutateTasks((doc) => {
      const current = doc.tasks[String(taskId)];
      if (!current) throw taskNotFound(taskId);
      delete doc.tasks[String(taskId)];
      return current;
    });
    return toTask(removed);
  }

  async listTasks(ownerId: number, filters: TaskFilters = {}): Promise<Task[]> {
    const doc = await this.readTasks();
    return Object.values(doc.tasks)
      .filter((t) => t.ownerId === ownerId && matchesFilters(t, filters))
      .sort(byId)
      .map(toTask);
  }

  async close(): Promise<void> {
    // Nothing is held open between calls.
  }
}

/**
 * Open the JSON backend in `dataDir`, creating the directory if needed.
 * Missing documents read as empty.
 */
export async function createJsonBackend(options: StorageBackendOptions): Promise<StorageBackend> {
  await mkdir(options.dataDir, { recursive: true });
  return new JsonStorageBackend(options.dataDir);
}

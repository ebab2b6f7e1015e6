/**
 * Relational storage backend on drizzle-orm.
 *
 * Username uniqueness and the task -> user foreign key are enforced by the
 * schema; constraint failures are translated into the same StmErrors the
 * JSON backend raises. Every mutation runs in a handle transaction, so a
 * failed write leaves neither memory nor disk changed.
 */

import { and, asc, eq, sql, type SQL } from 'drizzle-orm';
import * as schema from './schema.js';
import { openDatabase, findConstraintMessage, type SqliteHandle, type StmDatabase } from './sqlite.js';
import { addLabelPatch, removeLabelPatch, taskNotFound, userNotFound, usernameTaken } from './records.js';
import type { StorageBackend, StorageBackendOptions } from './storage-backend.js';
import { StmError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';
import type { NewTaskRecord, Task, TaskFilters, TaskPatch } from '../types/task.js';
import type { Label, LabelKind, NewUserRecord, UserPatch, UserRecord, UserRef } from '../types/user.js';

/** Convert a database row to a UserRecord. */
function rowToUser(row: schema.UserRow): UserRecord {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    hashedPassword: row.hashedPassword,
    fullName: row.fullName,
    disabled: row.disabled,
    categories: row.categories,
    tags: row.tags,
  };
}

/** Convert a database row to a Task. */
function rowToTask(row: schema.TaskRow): Task {
  return {
    id: row.id,
    ownerId: row.ownerId,
    name: row.name,
    description: row.description,
    category: row.category,
    dueDate: row.dueDate,
    parameters: row.parameters,
    completed: row.completed,
    tags: row.tags,
    priority: row.priority,
  };
}

function hasChanges(patch: object): boolean {
  return Object.values(patch).some((value) => value !== undefined);
}

class SqliteStorageBackend implements StorageBackend {
  readonly engine = 'sqlite';

  private readonly db: StmDatabase;

  constructor(private readonly handle: SqliteHandle) {
    this.db = handle.db;
  }

  // ---- Users ----

  async createUser(user: NewUserRecord): Promise<UserRecord> {
    try {
      return await this.handle.transaction(async () => {
        const [row] = await this.db.insert(schema.users).values(user).returning();
        if (!row) throw new StmError(ExitCode.STORAGE_ERROR, 'Insert returned no row: users');
        return rowToUser(row);
      });
    } catch (err) {
      throw this.translate(err, { username: user.username });
    }
  }

  async findUser(ref: UserRef): Promise<UserRecord | null> {
    const where = 'id' in ref ? eq(schema.users.id, ref.id) : eq(schema.users.username, ref.username);
    const rows = await this.db.select().from(schema.users).where(where).limit(1);
    const row = rows[0];
    return row ? rowToUser(row) : null;
  }

  async getUser(ref: UserRef): Promise<UserRecord> {
    const user = await this.findUser(ref);
    if (!user) throw userNotFound(ref);
    return user;
  }

  async updateUser(userId: number, patch: UserPatch): Promise<UserRecord> {
    if (!hasChanges(patch)) return this.getUser({ id: userId });
    try {
      return await this.handle.transaction(() => this.writeUser(userId, patch));
    } catch (err) {
      throw this.translate(err, { username: patch.username });
    }
  }

  async addLabel(userId: number, kind: LabelKind, label: Label): Promise<Label> {
    return this.handle.transaction(async () => {
      const user = await this.getUser({ id: userId });
      await this.writeUser(userId, addLabelPatch(user, kind, label));
      return { name: label.name, color: label.color };
    });
  }

  async removeLabel(userId: number, kind: LabelKind, name: string): Promise<Label> {
    return this.handle.transaction(async () => {
      const { removed, patch } = removeLabelPatch(await this.getUser({ id: userId }), kind, name);
      await this.writeUser(userId, patch);
      return { name: removed.name, color: removed.color };
    });
  }

  async listUsers(): Promise<UserRecord[]> {
    const rows = await this.db.select().from(schema.users).orderBy(asc(schema.users.id));
    return rows.map(rowToUser);
  }

  // ---- Tasks ----

  async createTask(task: NewTaskRecord): Promise<Task> {
    try {
      return await this.handle.transaction(async () => {
        const [row] = await this.db.insert(schema.tasks).values(task).returning();
        if (!row) throw new StmError(ExitCode.STORAGE_ERROR, 'Insert returned no row: tasks');
        return rowToTask(row);
      });
    } catch (err) {
      throw this.translate(err, { ownerId: task.ownerId });
    }
  }

  async findTask(taskId: number): Promise<Task | null> {
    const rows = await this.db.select().from(schema.tasks).where(eq(schema.tasks.id, taskId)).limit(1);
    const row = rows[0];
    return row ? rowToTask(row) : null;
  }

  async getTask(taskId: number): Promise<Task> {
    const task = await this.findTask(taskId);
    if (!task) throw taskNotFound(taskId);
    return task;
  }

  async updateTask(taskId: number, patch: TaskPatch): Promise<Task> {
    if (!hasChanges(patch)) return this.getTask(taskId);
    return this.handle.transaction(async () => {
      const [row] = await this.db
        .update(schema.tasks)
        .set(patch)
        .where(eq(schema.tasks.id, taskId))
        .returning();
      if (!row) throw taskNotFound(taskId);
      return rowToTask(row);
    });
  }

  async deleteTask(taskId: number): Promise<Task> {
    return this.handle.transaction(async () => {
      const [row] = await this.db.delete(schema.tasks).where(eq(schema.tasks.id, taskId)).returning();
      if (!row) throw taskNotFound(taskId);
      return rowToTask(row);
    });
  }

  async listTasks(ownerId: number, filters: TaskFilters = {}): Promise<Task[]> {
    const conditions: SQL[] = [eq(schema.tasks.ownerId, ownerId)];
    if (filters.completed !== undefined) conditions.push(eq(schema.tasks.completed, filters.completed));
    if (filters.category !== undefined) conditions.push(eq(schema.tasks.category, filters.category));
    if (filters.priority !== undefined) conditions.push(eq(schema.tasks.priority, filters.priority));
    if (filters.tag !== undefined) {
      conditions.push(
        sql`exists (select 1 from json_each(${schema.tasks.tags}) where json_each.value = ${filters.tag})`,
      );
    }

    const rows = await this.db
      .select()
      .from(schema.tasks)
      .where(and(...conditions))
      .orderBy(asc(schema.tasks.id));
    return rows.map(rowToTask);
  }

  async close(): Promise<void> {
    await this.handle.close();
  }

  /** Update one user row inside the caller's transaction. */
  private async writeUser(userId: number, patch: UserPatch): Promise<UserRecord> {
    const [row] = await this.db
      .update(schema.users)
      .set(patch)
      .where(eq(schema.users.id, userId))
      .returning();
    if (!row) throw userNotFound({ id: userId });
    return rowToUser(row);
  }

  /** Map constraint violations onto the shared error taxonomy. */
  private translate(err: unknown, context: { username?: string; ownerId?: number }): unknown {
    if (err instanceof StmError) return err;
    const message = findConstraintMessage(err);
    if (message === null) return err;
    if (message.includes('UNIQUE') && message.includes('users.username') && context.username !== undefined) {
      return usernameTaken(context.username);
    }
    if (message.includes('FOREIGN KEY') && context.ownerId !== undefined) {
      return userNotFound({ id: context.ownerId });
    }
    return new StmError(ExitCode.STORAGE_ERROR, `Constraint violation: ${message}`, { cause: err });
  }
}

/**
 * Open the relational backend on `<dataDir>/stm.db`, creating it if needed.
 */
export async function createSqliteBackend(options: StorageBackendOptions): Promise<StorageBackend> {
  return new SqliteStorageBackend(await openDatabase(options.dataDir));
}

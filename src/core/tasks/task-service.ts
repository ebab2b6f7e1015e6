/**
 * Task business logic. Every operation on an existing task is scoped to its
 * owner through assertOwnership().
 */

import { guardStorage } from '../errors.js';
import { getLogger } from '../logger.js';
import {
  parseInput,
  taskCreateSchema,
  taskFiltersSchema,
  taskUpdateSchema,
  type TaskCreateInput,
  type TaskFiltersInput,
  type TaskUpdateInput,
} from '../validation.js';
import { assertOwnership } from './ownership.js';
import type { Task } from '../../types/task.js';
import type { StorageBackend } from '../../store/storage-backend.js';

export class TaskService {
  private readonly log = getLogger('task-service');

  constructor(private readonly storage: StorageBackend) {}

  /**
   * Create a task for `ownerId`. Unset fields take their defaults; an
   * unknown owner fails with USER_NOT_FOUND.
   */
  async create(ownerId: number, input: TaskCreateInput): Promise<Task> {
    const fields = parseInput(taskCreateSchema, input);
    const task = await guardStorage(this.log, 'Failed to create task', () =>
      this.storage.createTask({ ownerId, ...fields }),
    );
    this.log.info({ taskId: task.id, ownerId }, 'task created');
    return task;
  }

  async get(taskId: number, ownerId: number): Promise<Task> {
    return this.loadOwned(taskId, ownerId);
  }

  /** The owner's tasks matching every given filter, by ascending id. */
  async list(ownerId: number, filters: TaskFiltersInput = {}): Promise<Task[]> {
    const parsed = parseInput(taskFiltersSchema, filters);
    return guardStorage(this.log, 'Failed to list tasks', () => this.storage.listTasks(ownerId, parsed));
  }

  async update(taskId: number, ownerId: number, input: TaskUpdateInput): Promise<Task> {
    const patch = parseInput(taskUpdateSchema, input);
    await this.loadOwned(taskId, ownerId);
    const task = await guardStorage(this.log, 'Failed to update task', () =>
      this.storage.updateTask(taskId, patch),
    );
    this.log.info({ taskId, ownerId, fields: Object.keys(patch) }, 'task updated');
    return task;
  }

  /** Mark a task completed. Completing a completed task returns it unchanged. */
  async complete(taskId: number, ownerId: number): Promise<Task> {
    const current = await this.loadOwned(taskId, ownerId);
    if (current.completed) return current;
    const task = await guardStorage(this.log, 'Failed to complete task', () =>
      this.storage.updateTask(taskId, { completed: true }),
    );
    this.log.info({ taskId, ownerId }, 'task completed');
    return task;
  }

  /** Delete a task and return it as it was. */
  async delete(taskId: number, ownerId: number): Promise<Task> {
    await this.loadOwned(taskId, ownerId);
    const task = await guardStorage(this.log, 'Failed to delete task', () => this.storage.deleteTask(taskId));
    this.log.info({ taskId, ownerId }, 'task deleted');
    return task;
  }

  /** Sorted distinct category names across the owner's tasks. */
  async listCategories(ownerId: number): Promise<string[]> {
    const tasks = await guardStorage(this.log, 'Failed to list tasks', () => this.storage.listTasks(ownerId));
    return [...new Set(tasks.map((t) => t.category))].sort();
  }

  private async loadOwned(taskId: number, ownerId: number): Promise<Task> {
    const task = await guardStorage(this.log, 'Failed to read task', () => this.storage.findTask(taskId));
    return assertOwnership(task, taskId, ownerId);
  }
}

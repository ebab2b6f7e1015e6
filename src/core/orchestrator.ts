/**
 * Orchestrator: the single entry point the CLI and the REST API call.
 *
 * Built from an explicit options value, it opens the storage backend the
 * options name (through the factory registry), wires one UserService and one
 * TaskService to it and exposes their operations. It never reads the
 * environment or config files itself.
 *
 * Lifecycle: uninitialized -> wired (backend open, services built) -> ready.
 * After close() every call fails.
 */

import { StmError } from './errors.js';
import { getLogger } from './logger.js';
import { TaskService } from './tasks/task-service.js';
import { UserService } from './users/user-service.js';
import type { TaskCreateInput, TaskFiltersInput, TaskUpdateInput, UserRegisterInput, UserUpdateInput } from './validation.js';
import { openStorageBackend, type StorageBackend } from '../store/storage-backend.js';
import { ExitCode } from '../types/exit-codes.js';
import type { StorageEngine } from '../types/config.js';
import type { Task } from '../types/task.js';
import type { Identity, Label, PublicUser } from '../types/user.js';

/** Explicit configuration the Orchestrator is built from. */
export interface OrchestratorOptions {
  storage: {
    engine: StorageEngine;
    /** Absolute path to the data directory. */
    dataDir: string;
  };
  security?: {
    /** bcrypt cost factor for new password hashes. */
    hashRounds?: number;
  };
}

export type OrchestratorState = 'uninitialized' | 'wired' | 'ready' | 'closed';

export class Orchestrator {
  private _state: OrchestratorState = 'uninitialized';
  private readonly users: UserService;
  private readonly tasks: TaskService;

  private constructor(private readonly storage: StorageBackend, options: OrchestratorOptions) {
    this.users = new UserService(storage, { hashRounds: options.security?.hashRounds });
    this.tasks = new TaskService(storage);
    this._state = 'wired';
  }

  /**
   * Open the configured backend and wire the services to it.
   * An engine with no registered factory fails with CONFIG_ERROR.
   */
  static async create(options: OrchestratorOptions): Promise<Orchestrator> {
    const log = getLogger('orchestrator');
    const storage = await openStorageBackend(options.storage.engine, { dataDir: options.storage.dataDir });
    const orchestrator = new Orchestrator(storage, options);
    orchestrator._state = 'ready';
    log.debug({ engine: storage.engine, dataDir: options.storage.dataDir }, 'orchestrator ready');
    return orchestrator;
  }

  get state(): OrchestratorState {
    return this._state;
  }

  /** Engine of the wired backend. */
  get engine(): StorageEngine {
    return this.storage.engine;
  }

  // ---- Users ----

  async registerUser(input: UserRegisterInput): Promise<PublicUser> {
    return this.ready().users.register(input);
  }

  async authenticate(username: string, password: string): Promise<Identity> {
    return this.ready().users.authenticate(username, password);
  }

  async ensureUser(username: string): Promise<PublicUser> {
    return this.ready().users.ensureUser(username);
  }

  async getUser(userId: number): Promise<PublicUser> {
    return this.ready().users.getUser(userId);
  }

  async getUserByUsername(username: string): Promise<PublicUser> {
    return this.ready().users.getUserByUsername(username);
  }

  async listUsers(): Promise<PublicUser[]> {
    return this.ready().users.listUsers();
  }

  async updateUser(userId: number, input: UserUpdateInput): Promise<PublicUser> {
    return this.ready().users.updateUser(userId, input);
  }

  async addCategory(userId: number, name: string, color: string): Promise<Label> {
    return this.ready().users.addCategory(userId, name, color);
  }

  async removeCategory(userId: number, name: string): Promise<Label> {
    return this.ready().users.removeCategory(userId, name);
  }

  async listCategories(userId: number): Promise<Label[]> {
    return this.ready().users.listCategories(userId);
  }

  async addTag(userId: number, name: string, color: string): Promise<Label> {
    return this.ready().users.addTag(userId, name, color);
  }

  async removeTag(userId: number, name: string): Promise<Label> {
    return this.ready().users.removeTag(userId, name);
  }

  async listTags(userId: number): Promise<Label[]> {
    return this.ready().users.listTags(userId);
  }

  // ---- Tasks ----

  async createTask(ownerId: number, input: TaskCreateInput): Promise<Task> {
    return this.ready().tasks.create(ownerId, input);
  }

  async getTask(taskId: number, ownerId: number): Promise<Task> {
    return this.ready().tasks.get(taskId, ownerId);
  }

  async listTasks(ownerId: number, filters?: TaskFiltersInput): Promise<Task[]> {
    return this.ready().tasks.list(ownerId, filters);
  }

  async updateTask(taskId: number, ownerId: number, input: TaskUpdateInput): Promise<Task> {
    return this.ready().tasks.update(taskId, ownerId, input);
  }

  async completeTask(taskId: number, ownerId: number): Promise<Task> {
    return this.ready().tasks.complete(taskId, ownerId);
  }

  async deleteTask(taskId: number, ownerId: number): Promise<Task> {
    return this.ready().tasks.delete(taskId, ownerId);
  }

  async listTaskCategories(ownerId: number): Promise<string[]> {
    return this.ready().tasks.listCategories(ownerId);
  }

  /** Release the backend. Safe to call more than once. */
  async close(): Promise<void> {
    if (this._state === 'closed') return;
    this._state = 'closed';
    await this.storage.close();
  }

  private ready(): this {
    if (this._state !== 'ready') {
      throw new StmError(ExitCode.GENERAL_ERROR, `Orchestrator is ${this._state}, not ready`);
    }
    return this;
  }
}

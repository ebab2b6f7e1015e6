/**
 * Smart Task Manager: users, tasks, categories and tags over interchangeable
 * SQLite and JSON-file storage.
 */

// Types
export * from './types/index.js';

// Core
export { StmError, isStmError, errorCategory, toStmError } from './core/errors.js';
export type { StmErrorBody, StmErrorOptions } from './core/errors.js';
export { Orchestrator } from './core/orchestrator.js';
export type { OrchestratorOptions, OrchestratorState } from './core/orchestrator.js';
export { loadConfig, resolveOrchestratorOptions, getDefaultConfig } from './core/config.js';
export { initLogger, getLogger, closeLogger } from './core/logger.js';
export { getDataDirAbsolute } from './core/paths.js';

// Services
export { UserService, toPublicUser } from './core/users/user-service.js';
export { TaskService } from './core/tasks/task-service.js';
export { assertOwnership, isOwnedBy } from './core/tasks/ownership.js';
export type {
  TaskCreateInput,
  TaskUpdateInput,
  TaskFiltersInput,
  UserRegisterInput,
  UserUpdateInput,
} from './core/validation.js';

// Storage
export {
  openStorageBackend,
  registerStorageBackend,
  unregisterStorageBackend,
  listStorageEngines,
} from './store/storage-backend.js';
export type { StorageBackend, StorageBackendFactory, StorageBackendOptions } from './store/storage-backend.js';
export { createJsonBackend } from './store/json-backend.js';
export { createSqliteBackend } from './store/sqlite-backend.js';

// API
export { buildServer } from './api/server.js';

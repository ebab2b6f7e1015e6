/**
 * Task type definitions.
 *
 * A Task is owned by exactly one User through `ownerId`, a non-owning
 * reference that is looked up, never followed.
 */

/** Allowed priority values, lowest first. */
export const TASK_PRIORITIES = [0, 1, 2, 3] as const;

/** Task priority. */
export type TaskPriority = (typeof TASK_PRIORITIES)[number];

/** Category a task falls back to when none (or an empty one) is given. */
export const DEFAULT_TASK_CATEGORY = 'General';

/** Free-form, JSON-serializable parameters attached to a task. */
export type TaskParameters = Record<string, unknown>;

/** A stored task. */
export interface Task {
  id: number;
  ownerId: number;
  name: string;
  description: string;
  category: string;
  /** ISO-8601 timestamp, or null when the task has no due date. */
  dueDate: string | null;
  parameters: TaskParameters;
  completed: boolean;
  tags: string[];
  priority: TaskPriority;
}

/** A task as handed to a backend for insertion (the backend assigns the id). */
export type NewTaskRecord = Omit<Task, 'id'>;

/** Fields a task update may change. Ownership is not transferable. */
export type TaskPatch = Partial<Omit<Task, 'id' | 'ownerId'>>;

/** Optional listTasks filters, combined with AND. */
export interface TaskFilters {
  completed?: boolean;
  category?: string;
  /** Matches tasks whose tag list contains this name. */
  tag?: string;
  priority?: TaskPriority;
}

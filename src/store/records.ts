/**
 * Helpers shared by every StorageBackend implementation, so both engines
 * raise the same errors and apply filters the same way.
 */

import { StmError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';
import type { Task, TaskFilters, TaskPatch } from '../types/task.js';
import type { Label, LabelKind, UserPatch, UserRecord, UserRef } from '../types/user.js';

export function describeUserRef(ref: UserRef): string {
  return 'id' in ref ? `id ${ref.id}` : `username '${ref.username}'`;
}

export function userNotFound(ref: UserRef): StmError {
  return new StmError(ExitCode.USER_NOT_FOUND, `User not found: ${describeUserRef(ref)}`, {
    details: { ...ref },
  });
}

export function usernameTaken(username: string): StmError {
  return new StmError(ExitCode.USERNAME_TAKEN, `Username already registered: ${username}`, {
    fix: 'Choose a different username',
    details: { username },
  });
}

export function taskNotFound(taskId: number): StmError {
  return new StmError(ExitCode.TASK_NOT_FOUND, `Task not found: ${taskId}`, {
    details: { taskId },
  });
}

function labelNoun(kind: LabelKind): string {
  return kind === 'category' ? 'Category' : 'Tag';
}

export function labelExists(kind: LabelKind, name: string): StmError {
  return new StmError(
    kind === 'category' ? ExitCode.CATEGORY_EXISTS : ExitCode.TAG_EXISTS,
    `${labelNoun(kind)} already exists: ${name}`,
    { details: { name } },
  );
}

export function labelNotFound(kind: LabelKind, name: string): StmError {
  return new StmError(
    kind === 'category' ? ExitCode.CATEGORY_NOT_FOUND : ExitCode.TAG_NOT_FOUND,
    `${labelNoun(kind)} not found: ${name}`,
    { details: { name } },
  );
}

export function labelsOf(user: UserRecord, kind: LabelKind): Label[] {
  return kind === 'category' ? user.categories : user.tags;
}

/**
 * The patch that appends `label` to the user's list of `kind`.
 * Throws *_EXISTS when the name is already there.
 */
export function addLabelPatch(user: UserRecord, kind: LabelKind, label: Label): UserPatch {
  const current = labelsOf(user, kind);
  if (current.some((l) => l.name === label.name)) throw labelExists(kind, label.name);
  const next = [...current, { name: label.name, color: label.color }];
  return kind === 'category' ? { categories: next } : { tags: next };
}

/**
 * The removed label and the patch that drops it from the user's list.
 * Throws *_NOT_FOUND when no label has that name.
 */
export function removeLabelPatch(
  user: UserRecord,
  kind: LabelKind,
  name: string,
): { removed: Label; patch: UserPatch } {
  const current = labelsOf(user, kind);
  const removed = current.find((l) => l.name === name);
  if (!removed) throw labelNotFound(kind, name);
  const next = current.filter((l) => l !== removed);
  return { removed, patch: kind === 'category' ? { categories: next } : { tags: next } };
}

/** AND of every filter that is set. */
export function matchesFilters(task: Task, filters: TaskFilters): boolean {
  if (filters.completed !== undefined && task.completed !== filters.completed) return false;
  if (filters.category !== undefined && task.category !== filters.category) return false;
  if (filters.tag !== undefined && !task.tags.includes(filters.tag)) return false;
  if (filters.priority !== undefined && task.priority !== filters.priority) return false;
  return true;
}

/** Next id for a table whose ids are `existing`: highest + 1, or 1 when empty. */
export function nextId(existing: Iterable<number>): number {
  let max = 0;
  for (const id of existing) {
    if (id > max) max = id;
  }
  return max + 1;
}

export function byId<T extends { id: number }>(a: T, b: T): number {
  return a.id - b.id;
}

function pick<T>(next: T | undefined, current: T): T {
  return next === undefined ? current : next;
}

/** Merge a patch over a user; keys left undefined keep their value. */
export function applyUserPatch(current: UserRecord, patch: UserPatch): UserRecord {
  return {
    id: current.id,
    username: pick(patch.username, current.username),
    email: pick(patch.email, current.email),
    hashedPassword: pick(patch.hashedPassword, current.hashedPassword),
    fullName: pick(patch.fullName, current.fullName),
    disabled: pick(patch.disabled, current.disabled),
    categories: pick(patch.categories, current.categories),
    tags: pick(patch.tags, current.tags),
  };
}

/** Merge a patch over a task; keys left undefined keep their value. */
export function applyTaskPatch(current: Task, patch: TaskPatch): Task {
  return {
    id: current.id,
    ownerId: current.ownerId,
    name: pick(patch.name, current.name),
    description: pick(patch.description, current.description),
    category: pick(patch.category, current.category),
    dueDate: pick(patch.dueDate, current.dueDate),
    parameters: pick(patch.parameters, current.parameters),
    completed: pick(patch.completed, current.completed),
    tags: pick(patch.tags, current.tags),
    priority: pick(patch.priority, current.priority),
  };
}

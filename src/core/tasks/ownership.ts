/**
 * Task ownership check.
 *
 * A task that exists but belongs to someone else is reported exactly like a
 * task that does not exist.
 */

import { StmError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { Task } from '../../types/task.js';

export function isOwnedBy(task: Task, ownerId: number): boolean {
  return task.ownerId === ownerId;
}

/**
 * Return `task` when it exists and belongs to `ownerId`; otherwise throw
 * TASK_NOT_FOUND for `taskId`.
 */
export function assertOwnership(task: Task | null, taskId: number, ownerId: number): Task {
  if (task === null || !isOwnedBy(task, ownerId)) {
    throw new StmError(ExitCode.TASK_NOT_FOUND, `Task not found: ${taskId}`, {
      details: { taskId },
    });
  }
  return task;
}

/**
 * Tests for the task ownership check.
 */

import { describe, it, expect } from 'vitest';
import { assertOwnership, isOwnedBy } from '../ownership.js';
import { ExitCode } from '../../../types/exit-codes.js';
import type { Task } from '../../../types/task.js';

const task: Task = {
  id: 5,
  ownerId: 2,
  name: 'Water plants',
  description: '',
  category: 'General',
  dueDate: null,
  parameters: {},
  completed: false,
  tags: [],
  priority: 0,
};

describe('assertOwnership', () => {
  it('returns a task its owner asks for', () => {
    expect(isOwnedBy(task, 2)).toBe(true);
    expect(assertOwnership(task, 5, 2)).toBe(task);
  });

  it('reports another user\'s task as not found', () => {
    expect(() => assertOwnership(task, 5, 1)).toThrow(
      expect.objectContaining({ code: ExitCode.TASK_NOT_FOUND, message: 'Task not found: 5' }),
    );
  });

  it('reports a missing task the same way', () => {
    expect(() => assertOwnership(null, 5, 2)).toThrow(
      expect.objectContaining({ code: ExitCode.TASK_NOT_FOUND, message: 'Task not found: 5' }),
    );
  });
});

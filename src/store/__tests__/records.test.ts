/**
 * Tests for helpers shared by the storage backends.
 */

import { describe, it, expect } from 'vitest';
import { applyTaskPatch, matchesFilters, nextId } from '../records.js';
import type { Task } from '../../types/task.js';

const task: Task = {
  id: 3,
  ownerId: 1,
  name: 'Write report',
  description: '',
  category: 'Work',
  dueDate: '2026-11-01T00:00:00.000Z',
  parameters: { pages: 4 },
  completed: false,
  tags: ['urgent'],
  priority: 2,
};

describe('nextId', () => {
  it('starts at 1', () => {
    expect(nextId([])).toBe(1);
  });

  it('follows the highest existing id', () => {
    expect(nextId([4, 1, 9, 2])).toBe(10);
  });
});

describe('matchesFilters', () => {
  it('matches everything without filters', () => {
    expect(matchesFilters(task, {})).toBe(true);
  });

  it('requires every given filter to hold', () => {
    expect(matchesFilters(task, { category: 'Work', tag: 'urgent', priority: 2, completed: false })).toBe(true);
    expect(matchesFilters(task, { category: 'Work', priority: 1 })).toBe(false);
    expect(matchesFilters(task, { tag: 'urg' })).toBe(false);
  });
});

describe('applyTaskPatch', () => {
  it('keeps fields the patch leaves undefined', () => {
    expect(applyTaskPatch(task, { name: undefined, completed: true })).toEqual({ ...task, completed: true });
  });

  it('clears the due date with null', () => {
    expect(applyTaskPatch(task, { dueDate: null }).dueDate).toBeNull();
  });
});

/**
 * Tests for human renderers and the cliOutput / cliError dispatch.
 * Colors are off in tests (NO_COLOR), so lines compare as plain text.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { cliError, cliOutput } from '../index.js';
import { formatTaskLine, renderTask, renderTaskCategories, renderTaskList } from '../tasks.js';
import { renderLabel, renderLabelList, renderUser, renderUserList } from '../users.js';
import { completionSymbol } from '../colors.js';
import { resetFormatContext, setFormatContext } from '../../format-context.js';
import { StmError } from '../../../core/errors.js';
import { ExitCode } from '../../../types/exit-codes.js';
import type { Task } from '../../../types/task.js';
import type { PublicUser } from '../../../types/user.js';

const milk: Task = {
  id: 1,
  ownerId: 1,
  name: 'Buy milk',
  description: '',
  category: 'General',
  dueDate: '2026-11-01T00:00:00.000Z',
  parameters: {},
  completed: false,
  tags: ['home', 'shop'],
  priority: 1,
};

const report: Task = { ...milk, id: 12, name: 'Report', category: 'Work', dueDate: null, tags: [], completed: true, priority: 3 };

const alice: PublicUser = {
  id: 1,
  username: 'alice',
  email: '',
  fullName: '',
  disabled: false,
  categories: [{ name: 'General', color: '#5dafb0' }],
  tags: [],
};

describe('task renderers', () => {
  it('prints only ids when quiet', () => {
    expect(renderTask({ task: milk }, true)).toBe('1');
    expect(renderTaskList({ tasks: [milk, report], total: 2 }, true)).toBe('1\n12');
  });

  it('formats one line per task', () => {
    expect(formatTaskLine(milk)).toBe(`   1 ${completionSymbol(false)} [1] Buy milk (General) due 2026-11-01 #home #shop`);
    expect(formatTaskLine(report)).toBe(`  12 ${completionSymbol(true)} [3] Report (Work)`);
  });

  it('summarizes the list', () => {
    expect(renderTaskList({ tasks: [milk, report], total: 2 }, false)).toBe(
      [formatTaskLine(milk), formatTaskLine(report), '', '2 tasks, 1 open'].join('\n'),
    );
    expect(renderTaskList({ tasks: [], total: 0 }, false)).toBe('No tasks found.');
  });

  it('shows the task detail fields', () => {
    const lines = renderTask({ task: milk }, false).split('\n');
    expect(lines.some((l) => l.endsWith('  Buy milk'))).toBe(true);
    expect(lines.some((l) => l.endsWith('Category:    General'))).toBe(true);
    expect(lines.some((l) => l.endsWith('Due:         2026-11-01'))).toBe(true);
    expect(lines.some((l) => l.endsWith('Tags:        home, shop'))).toBe(true);
  });

  it('lists task categories', () => {
    expect(renderTaskCategories({ categories: ['Errands', 'Work'] }, false)).toBe('Errands\nWork');
    expect(renderTaskCategories({ categories: [] }, false)).toBe('No categories in use.');
    expect(renderTaskCategories({ categories: [] }, true)).toBe('');
  });
});

describe('user renderers', () => {
  it('renders a user', () => {
    expect(renderUser({ user: alice }, false)).toBe('alice (#1)\n  Categories: General\n  Tags:       -');
    expect(renderUser({ user: alice }, true)).toBe('1');
  });

  it('renders the user list', () => {
    const bob = { ...alice, id: 2, username: 'bob', disabled: true };
    expect(renderUserList({ users: [alice, bob] }, false)).toBe('   1 alice\n   2 bob (disabled)');
    expect(renderUserList({ users: [alice, bob] }, true)).toBe('alice\nbob');
    expect(renderUserList({ users: [] }, false)).toBe('No users registered.');
  });

  it('renders labels', () => {
    expect(renderLabel({ label: { name: 'Work', color: '#f00' }, action: 'added' }, false)).toBe('Added Work  #f00');
    expect(renderLabel({ label: { name: 'Work', color: '#f00' }, action: 'removed' }, true)).toBe('Work');
    expect(renderLabelList({ labels: [] }, false)).toBe('None.');
    expect(renderLabelList({ labels: alice.categories }, false)).toBe('General  #5dafb0');
  });
});

describe('cliOutput / cliError', () => {
  afterEach(() => {
    resetFormatContext();
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it('prints the JSON envelope by default', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    cliOutput({ categories: ['Work'] }, { command: 'task.categories' });
    expect(log).toHaveBeenCalledWith('{"success":true,"data":{"categories":["Work"]}}');
  });

  it('dispatches to the human renderer', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    setFormatContext({ format: 'human', source: 'flag', quiet: true });
    cliOutput({ task: milk }, { command: 'task.add' });
    expect(log).toHaveBeenCalledWith('1');
  });

  it('prints nothing for an empty human rendering', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    setFormatContext({ format: 'human', source: 'flag', quiet: true });
    cliOutput({ categories: [] }, { command: 'task.categories' });
    expect(log).not.toHaveBeenCalled();
  });

  it('writes StmErrors to stderr as JSON and sets the exit code', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const err = new StmError(ExitCode.TASK_NOT_FOUND, 'Task not found: 3', { details: { taskId: 3 } });
    expect(cliError(err)).toBe(ExitCode.TASK_NOT_FOUND);
    expect(error).toHaveBeenCalledWith(JSON.stringify(err.toJSON()));
    expect(process.exitCode).toBe(20);
  });

  it('writes human errors with the fix', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    setFormatContext({ format: 'human', source: 'flag', quiet: false });
    cliError(new StmError(ExitCode.USERNAME_TAKEN, 'Username already registered: alice', { fix: 'Choose a different username' }));
    expect(error.mock.calls).toEqual([
      ['Error: Username already registered: alice (USERNAME_TAKEN)'],
      ['  Fix: Choose a different username'],
    ]);
  });

  it('reports foreign errors as GENERAL_ERROR', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(cliError(new Error('boom'))).toBe(ExitCode.GENERAL_ERROR);
    expect(process.exitCode).toBe(1);
  });
});

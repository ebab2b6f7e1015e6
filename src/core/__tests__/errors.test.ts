/**
 * Tests for StmError, the exit code taxonomy and guardStorage.
 */

import { describe, it, expect, vi } from 'vitest';
import { StmError, errorCategory, guardStorage, isStmError, toStmError } from '../errors.js';
import { ExitCode, getErrorCategory, getExitCodeName, isErrorCode } from '../../types/exit-codes.js';

describe('getErrorCategory', () => {
  it.each([
    [ExitCode.VALIDATION_ERROR, 'INVALID'],
    [ExitCode.INVALID_PRIORITY, 'INVALID'],
    [ExitCode.INVALID_COLOR, 'INVALID'],
    [ExitCode.CONFIG_ERROR, 'INVALID'],
    [ExitCode.USER_NOT_FOUND, 'NOT_FOUND'],
    [ExitCode.TASK_NOT_FOUND, 'NOT_FOUND'],
    [ExitCode.TAG_NOT_FOUND, 'NOT_FOUND'],
    [ExitCode.USERNAME_TAKEN, 'CONFLICT'],
    [ExitCode.CATEGORY_EXISTS, 'CONFLICT'],
    [ExitCode.LOCK_TIMEOUT, 'CONFLICT'],
    [ExitCode.UNAUTHORIZED, 'UNAUTHORIZED'],
    [ExitCode.USER_DISABLED, 'UNAUTHORIZED'],
    [ExitCode.STORAGE_ERROR, 'INTERNAL'],
    [ExitCode.GENERAL_ERROR, 'INTERNAL'],
  ])('maps code %i to %s', (code, category) => {
    expect(getErrorCategory(code)).toBe(category);
  });

  it('names codes and treats only SUCCESS as non-error', () => {
    expect(getExitCodeName(ExitCode.INVALID_COLOR)).toBe('INVALID_COLOR');
    expect(isErrorCode(ExitCode.SUCCESS)).toBe(false);
    expect(isErrorCode(ExitCode.NOT_FOUND)).toBe(true);
  });
});

describe('StmError', () => {
  it('derives its category from the code', () => {
    const err = new StmError(ExitCode.TASK_NOT_FOUND, 'Task not found: 7');
    expect(err.category).toBe('NOT_FOUND');
    expect(err.name).toBe('StmError');
    expect(isStmError(err)).toBe(true);
  });

  it('serializes to the error envelope', () => {
    const err = new StmError(ExitCode.USERNAME_TAKEN, 'Username already registered: alice', {
      fix: 'Choose a different username',
      details: { username: 'alice' },
    });
    expect(err.toJSON()).toEqual({
      success: false,
      error: {
        code: 10,
        name: 'USERNAME_TAKEN',
        category: 'CONFLICT',
        message: 'Username already registered: alice',
        fix: 'Choose a different username',
        details: { username: 'alice' },
      },
    });
  });

  it('omits fix and details when not given', () => {
    const body = new StmError(ExitCode.NOT_FOUND, 'gone').toJSON();
    expect(Object.keys(body.error)).toEqual(['code', 'name', 'category', 'message']);
  });
});

describe('errorCategory / toStmError', () => {
  it('reports foreign errors as INTERNAL', () => {
    expect(errorCategory(new Error('boom'))).toBe('INTERNAL');
    expect(errorCategory('boom')).toBe('INTERNAL');
  });

  it('wraps foreign errors as STORAGE_ERROR keeping the cause', () => {
    const cause = new Error('disk full');
    const wrapped = toStmError(cause, 'Failed to write');
    expect(wrapped.code).toBe(ExitCode.STORAGE_ERROR);
    expect(wrapped.message).toBe('Failed to write: disk full');
    expect(wrapped.cause).toBe(cause);
  });

  it('passes StmErrors through unchanged', () => {
    const err = new StmError(ExitCode.TAG_EXISTS, 'Tag already exists: home');
    expect(toStmError(err, 'ignored')).toBe(err);
  });
});

describe('guardStorage', () => {
  it('returns the result of a successful call', async () => {
    const log = { error: vi.fn() };
    await expect(guardStorage(log, 'ctx', async () => 42)).resolves.toBe(42);
    expect(log.error).not.toHaveBeenCalled();
  });

  it('translates and logs foreign failures', async () => {
    const log = { error: vi.fn() };
    const cause = new Error('database is locked');
    const promise = guardStorage(log, 'Failed to read task', async () => {
      throw cause;
    });
    await expect(promise).rejects.toMatchObject({
      code: ExitCode.STORAGE_ERROR,
      message: 'Failed to read task: database is locked',
    });
    expect(log.error).toHaveBeenCalledWith(
      { err: cause, code: ExitCode.STORAGE_ERROR },
      'Failed to read task: database is locked',
    );
  });

  it('rethrows StmErrors without logging', async () => {
    const log = { error: vi.fn() };
    const err = new StmError(ExitCode.USER_NOT_FOUND, 'User not found: id 3');
    await expect(guardStorage(log, 'ctx', async () => { throw err; })).rejects.toBe(err);
    expect(log.error).not.toHaveBeenCalled();
  });
});

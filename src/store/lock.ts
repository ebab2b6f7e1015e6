/**
 * Serialized access to store files.
 *
 * Two layers: a SerialQueue per path orders callers inside this process,
 * and a proper-lockfile lock on the path keeps other processes out while
 * the holder reads, modifies and writes the document.
 */

import { resolve } from 'node:path';
import lockfile from 'proper-lockfile';
import { StmError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

const LOCK_RETRY_DEFAULTS = {
  retries: 5,
  minTimeout: 50,
  maxTimeout: 1000,
  factor: 2,
};

/** Locks older than this are considered abandoned by a dead process. */
const STALE_LOCK_MS = 10_000;

export interface LockOptions {
  /** Attempts after the first before failing with LOCK_TIMEOUT. */
  retries?: number;
}

/**
 * Runs async functions one at a time, in call order. A failure is returned
 * to its own caller and does not stop the functions queued behind it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(fn);
    this.tail = result.then(settled, settled);
    return result;
  }

  /** Resolves once everything queued so far has settled. */
  async drain(): Promise<void> {
    await this.tail;
  }
}

function settled(): void {
  // The outcome belongs to the caller holding `result`.
}

const queues = new Map<string, SerialQueue>();

function queueFor(filePath: string): SerialQueue {
  const key = resolve(filePath);
  let queue = queues.get(key);
  if (!queue) {
    queue = new SerialQueue();
    queues.set(key, queue);
  }
  return queue;
}

async function lockFile(filePath: string, options?: LockOptions): Promise<() => Promise<void>> {
  try {
    return await lockfile.lock(filePath, {
      stale: STALE_LOCK_MS,
      realpath: false,
      retries: { ...LOCK_RETRY_DEFAULTS, retries: options?.retries ?? LOCK_RETRY_DEFAULTS.retries },
    });
  } catch (err) {
    throw new StmError(ExitCode.LOCK_TIMEOUT, `Failed to acquire lock: ${filePath}`, {
      fix: 'Another process may be writing to this file. Wait and retry.',
      cause: err,
    });
  }
}

/**
 * Run `fn` holding the lock on `filePath`; the file itself need not exist.
 * Calls from this process for the same path run one after another.
 */
export function withLock<T>(filePath: string, fn: () => Promise<T>, options?: LockOptions): Promise<T> {
  return queueFor(filePath).run(async () => {
    const release = await lockFile(filePath, options);
    try {
      return await fn();
    } finally {
      await release();
    }
  });
}

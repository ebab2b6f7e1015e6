/**
 * SQLite store via drizzle-orm/sqlite-proxy + sql.js.
 *
 * sql.js runs SQLite compiled to WebAssembly, so no native module has to
 * build on install. The database lives in memory while open; persist()
 * exports it and writes <dataDir>/stm.db atomically. Backends run every
 * mutation through transaction(), which commits and persists in one step.
 */

import initSqlJs from 'sql.js';
import type { Database, SqlJsStatic } from 'sql.js';
import { eq } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/sqlite-proxy';
import type { SqliteRemoteDatabase } from 'drizzle-orm/sqlite-proxy';
import * as schema from './schema.js';
import { atomicWrite, safeReadBytes } from './atomic.js';
import { createDrizzleCallback, createBatchCallback } from './sqljs-adapter.js';
import { SerialQueue } from './lock.js';
import { getDbPath } from '../core/paths.js';
import { getLogger } from '../core/logger.js';

/** Schema version for newly created databases. Single source of truth. */
export const SQLITE_SCHEMA_VERSION = '1.0.0';

export type StmDatabase = SqliteRemoteDatabase<typeof schema>;

/** An open database: the drizzle instance plus the means to save and close it. */
export interface SqliteHandle {
  readonly db: StmDatabase;
  /** The live sql.js database. Replaced when a failed write is rolled back. */
  readonly nativeDb: Database;
  readonly path: string;
  /**
   * Run `fn` as one transaction and write the result to disk. Transactions
   * run one at a time. If `fn` throws the transaction is rolled back; if
   * the write fails the database reverts to the last state on disk.
   */
  transaction<T>(fn: () => Promise<T>): Promise<T>;
  /** Write the in-memory database to disk. */
  persist(): Promise<void>;
  /** Persist and release the database. Safe to call more than once. */
  close(): Promise<void>;
}

/** The WASM module loads once per process. */
let _sqlPromise: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!_sqlPromise) {
    _sqlPromise = initSqlJs();
  }
  return _sqlPromise;
}

/**
 * Apply the standard pragmas. sql.js resets pragmas whenever the database is
 * exported, so this runs after every persist as well as on open.
 */
function applyPragmas(nativeDb: Database): void {
  nativeDb.run('PRAGMA foreign_keys=ON');
}

/**
 * Open (or create) the database in `dataDir`.
 * Creates the tables if they don't exist and seeds the schema version.
 */
export async function openDatabase(dataDir: string): Promise<SqliteHandle> {
  const path = getDbPath(dataDir);
  const log = getLogger('sqlite');
  const SQL = await loadSqlJs();

  // Bytes of the last successful write; what a failed write reverts to.
  let saved = await safeReadBytes(path);
  let nativeDb = new SQL.Database(saved ?? undefined);
  applyPragmas(nativeDb);
  nativeDb.exec(schema.SCHEMA_DDL);
  nativeDb.run('INSERT OR IGNORE INTO schema_meta (key, value) VALUES (?, ?)', [
    'schemaVersion',
    SQLITE_SCHEMA_VERSION,
  ]);

  const db = drizzle(
    createDrizzleCallback(() => nativeDb),
    createBatchCallback(() => nativeDb),
    { schema },
  );

  const writes = new SerialQueue();
  let closed = false;

  const persist = async (): Promise<void> => {
    const bytes = nativeDb.export();
    applyPragmas(nativeDb);
    await atomicWrite(path, bytes);
    saved = bytes;
  };

  const revert = (): void => {
    nativeDb.close();
    nativeDb = new SQL.Database(saved ?? undefined);
    applyPragmas(nativeDb);
  };

  const transaction = <T>(fn: () => Promise<T>): Promise<T> =>
    writes.run(async () => {
      nativeDb.run('BEGIN');
      let result: T;
      try {
        result = await fn();
      } catch (err) {
        nativeDb.run('ROLLBACK');
        throw err;
      }
      nativeDb.run('COMMIT');
      try {
        await persist();
      } catch (err) {
        revert();
        log.error({ err, path }, 'write failed, reverted to last saved state');
        throw err;
      }
      return result;
    });

  const close = async (): Promise<void> => {
    if (closed) return;
    await writes.drain();
    await persist();
    closed = true;
    nativeDb.close();
    log.debug({ path }, 'database closed');
  };

  if (saved === null) {
    await persist();
    log.info({ path }, 'database created');
  }

  return {
    db,
    get nativeDb() {
      return nativeDb;
    },
    path,
    transaction,
    persist,
    close,
  };
}

/**
 * Get the schema version recorded in an open database.
 */
export async function getSchemaVersion(handle: SqliteHandle): Promise<string | null> {
  const result = await handle.db
    .select()
    .from(schema.schemaMeta)
    .where(eq(schema.schemaMeta.key, 'schemaVersion'));

  return result[0]?.value ?? null;
}

/**
 * Message of an error or of any error in its cause chain that reports a
 * SQLite constraint violation.
 */
export function findConstraintMessage(err: unknown): string | null {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if (current.message.includes('constraint failed')) {
      return current.message;
    }
    current = current.cause;
  }
  return null;
}

/**
 * sql.js adapter for drizzle-orm/sqlite-proxy
 *
 * Provides the async callback that sqlite-proxy expects, backed by a sql.js
 * (WebAssembly SQLite) Database held in memory. The caller persists the
 * database to disk after mutations (see sqlite.ts).
 */

import type { Database, SqlValue } from 'sql.js';

/** Query method sqlite-proxy asks for. */
export type ProxyMethod = 'run' | 'all' | 'values' | 'get';

/**
 * Narrow a drizzle-bound parameter to a value sql.js can bind.
 * drizzle has already mapped booleans, JSON and dates to driver values.
 */
export function toSqlValue(value: unknown): SqlValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'bigint') return Number(value);
  if (value instanceof Uint8Array) return value;
  throw new TypeError(`Unsupported SQLite parameter type: ${typeof value}`);
}

/** Run one statement and collect its rows as arrays in column order. */
function queryRows(db: Database, sql: string, params: SqlValue[]): SqlValue[][] {
  const stmt = db.prepare(sql);
  try {
    stmt.bind(params);
    const rows: SqlValue[][] = [];
    while (stmt.step()) {
      rows.push(stmt.get());
    }
    return rows;
  } finally {
    stmt.free();
  }
}

/**
 * Create the sqlite-proxy callback that drizzle-orm expects. `getDb` is
 * called per statement, so the database behind it may be swapped.
 *
 * Rows are returned as arrays of column values. For 'get' the single row
 * itself is returned as `rows`, the shape sqlite-proxy maps from.
 */
export function createDrizzleCallback(getDb: () => Database) {
  return async (
    sql: string,
    params: unknown[],
    method: ProxyMethod,
  ): Promise<{ rows: unknown[] }> => {
    const db = getDb();
    const bound = params.map(toSqlValue);

    switch (method) {
      case 'run': {
        db.run(sql, bound);
        return { rows: [] };
      }

      case 'all':
      case 'values': {
        return { rows: queryRows(db, sql, bound) };
      }

      case 'get': {
        const [row] = queryRows(db, sql, bound);
        return { rows: row ?? [] };
      }

      default:
        throw new Error(`Unsupported method: ${String(method)}`);
    }
  };
}

/**
 * Create a batch callback for drizzle-orm sqlite-proxy batch operations.
 */
export function createBatchCallback(getDb: () => Database) {
  const callback = createDrizzleCallback(getDb);
  return async (
    batch: { sql: string; params: unknown[]; method: ProxyMethod }[],
  ): Promise<{ rows: unknown[] }[]> => {
    const results: { rows: unknown[] }[] = [];
    for (const item of batch) {
      results.push(await callback(item.sql, item.params, item.method));
    }
    return results;
  };
}

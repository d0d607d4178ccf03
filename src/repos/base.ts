import type { Connection } from '../db/client';

export { now } from '../db/client';

// --- Query helpers ---

type SqlParam = string | number | null;

/** Get a single row by query, or null */
export function queryOne<T>(db: Connection, sql: string, params: SqlParam[] = []): T | null {
  return db.prepare<SqlParam[], T>(sql).get(...params) ?? null;
}

/** Get all rows matching query */
export function queryAll<T>(db: Connection, sql: string, params: SqlParam[] = []): T[] {
  return db.prepare<SqlParam[], T>(sql).all(...params);
}

/** Execute a write statement, return changes count */
export function execute(db: Connection, sql: string, params: SqlParam[] = []): number {
  return db.prepare<SqlParam[]>(sql).run(...params).changes;
}

/** Count rows returned by a `SELECT COUNT(*) AS count ...` query */
export function count(db: Connection, sql: string, params: SqlParam[] = []): number {
  return queryOne<{ count: number }>(db, sql, params)?.count ?? 0;
}

// --- Result helpers ---

/** Wrap a value in a success result */
export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

/** Wrap an error in a failure result */
export function err<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import type { Result } from '../domain/types';

export type Connection = Database.Database;

export interface OpenDatabaseOptions {
  busyTimeoutMs?: number;
}

const DEFAULT_BUSY_TIMEOUT_MS = 5000;

function applyPragmas(connection: Connection, busyTimeoutMs: number): void {
  connection.pragma('journal_mode = WAL');
  connection.pragma(`busy_timeout = ${busyTimeoutMs}`);
  connection.pragma('foreign_keys = ON');
  connection.pragma('synchronous = NORMAL');
}

export function openDatabase(path: string, options: OpenDatabaseOptions = {}): Connection {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }
  const connection = new Database(path);
  applyPragmas(connection, options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS);
  return connection;
}

/**
 * Read handle. Reads run outside any explicit transaction and see data
 * committed as of the call.
 */
export class SqliteCatalogState {
  constructor(readonly db: Connection) {}

  beginTransaction(): SqliteTransaction {
    return new SqliteTransaction(this);
  }
}

/**
 * Caller-owned transaction. Opened as a deferred transaction: the write lock
 * is taken by the first write, and a write that loses the lock to another
 * connection fails with SQLITE_BUSY.
 */
export class SqliteTransaction {
  private finished = false;

  constructor(readonly state: SqliteCatalogState) {
    state.db.exec('BEGIN');
  }

  get db(): Connection {
    if (this.finished) {
      throw new Error('Transaction already finished');
    }
    return this.state.db;
  }

  get isOpen(): boolean {
    return !this.finished;
  }

  commit(): void {
    this.db.exec('COMMIT');
    this.finished = true;
  }

  rollback(): void {
    const db = this.db;
    this.finished = true;
    // SQLite may already have rolled back on its own (e.g. after SQLITE_FULL).
    if (db.inTransaction) {
      db.exec('ROLLBACK');
    }
  }
}

/**
 * Transaction helper: commits when `fn` succeeds, rolls back when it returns
 * a failure or throws.
 */
export function runInTransaction<T, E>(
  state: SqliteCatalogState,
  fn: (transaction: SqliteTransaction) => Result<T, E>
): Result<T, E> {
  const transaction = state.beginTransaction();
  let result: Result<T, E>;
  try {
    result = fn(transaction);
  } catch (error) {
    transaction.rollback();
    throw error;
  }

  if (!result.success) {
    transaction.rollback();
    return result;
  }

  try {
    transaction.commit();
  } catch (error) {
    transaction.rollback();
    throw error;
  }
  return result;
}

// Timestamp helper
export function now(): string {
  return new Date().toISOString();
}

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openDatabase, runInTransaction, SqliteCatalogState, type Connection } from './client';
import { err, ok } from '../repos/base';

let db: Connection;
let state: SqliteCatalogState;

function rows(): string[] {
  return db
    .prepare<[], { value: string }>('SELECT value FROM items ORDER BY value')
    .all()
    .map(row => row.value);
}

beforeEach(() => {
  db = openDatabase(':memory:');
  db.exec('CREATE TABLE items (value TEXT NOT NULL)');
  state = new SqliteCatalogState(db);
});

afterEach(() => {
  db.close();
});

describe('SqliteTransaction', () => {
  it('commits writes', () => {
    const tx = state.beginTransaction();
    tx.db.prepare('INSERT INTO items VALUES (?)').run('a');
    tx.commit();

    expect(tx.isOpen).toBe(false);
    expect(rows()).toEqual(['a']);
  });

  it('rolls back writes', () => {
    const tx = state.beginTransaction();
    tx.db.prepare('INSERT INTO items VALUES (?)').run('a');
    tx.rollback();

    expect(tx.isOpen).toBe(false);
    expect(rows()).toEqual([]);
  });

  it('refuses use after it finished', () => {
    const tx = state.beginTransaction();
    tx.commit();
    expect(() => tx.db).toThrow('Transaction already finished');
  });
});

describe('runInTransaction', () => {
  it('commits on success', () => {
    const result = runInTransaction(state, tx => {
      tx.db.prepare('INSERT INTO items VALUES (?)').run('kept');
      return ok('done');
    });

    expect(result).toEqual({ success: true, data: 'done' });
    expect(rows()).toEqual(['kept']);
    expect(db.inTransaction).toBe(false);
  });

  it('rolls back when the callback returns a failure', () => {
    const result = runInTransaction(state, tx => {
      tx.db.prepare('INSERT INTO items VALUES (?)').run('dropped');
      return err('nope');
    });

    expect(result).toEqual({ success: false, error: 'nope' });
    expect(rows()).toEqual([]);
    expect(db.inTransaction).toBe(false);
  });

  it('rolls back and rethrows when the callback throws', () => {
    expect(() =>
      runInTransaction(state, tx => {
        tx.db.prepare('INSERT INTO items VALUES (?)').run('dropped');
        throw new Error('callback failed');
      })
    ).toThrow('callback failed');

    expect(rows()).toEqual([]);
    expect(db.inTransaction).toBe(false);
  });
});

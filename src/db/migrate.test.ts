import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openDatabase, type Connection } from './client';
import { runMigrations } from './migrate';

let db: Connection;

beforeEach(() => {
  db = openDatabase(':memory:');
});

afterEach(() => {
  db.close();
});

function tableNames(): string[] {
  return db
    .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
    .all()
    .map(row => row.name);
}

describe('runMigrations', () => {
  it('creates the catalog schema and records the migration', () => {
    runMigrations(db);

    expect(tableNames()).toEqual(['_migrations', 'namespaces', 'projects', 'tabulars', 'tasks', 'warehouses']);
    const applied = db.prepare<[], { version: number; name: string }>('SELECT version, name FROM _migrations').all();
    expect(applied).toEqual([{ version: 1, name: '001_catalog_schema.sql' }]);
  });

  it('is idempotent', () => {
    runMigrations(db);
    runMigrations(db);

    const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM _migrations').get();
    expect(row?.count).toBe(1);
  });

  it('rejects a foreign migration history', () => {
    db.exec(`
      CREATE TABLE _migrations (version INTEGER PRIMARY KEY, name TEXT NOT NULL, applied_at TEXT NOT NULL);
      INSERT INTO _migrations VALUES (1, '001_initial_schema.sql', '2024-01-01T00:00:00.000Z');
    `);

    expect(() => runMigrations(db)).toThrow('Incompatible migration history at version 1');
  });

  it('rejects a schema missing required columns', () => {
    db.exec(`
      CREATE TABLE _migrations (version INTEGER PRIMARY KEY, name TEXT NOT NULL, applied_at TEXT NOT NULL);
      INSERT INTO _migrations VALUES (1, '001_catalog_schema.sql', '2024-01-01T00:00:00.000Z');
      CREATE TABLE projects (project_id TEXT PRIMARY KEY, name TEXT NOT NULL, created_at TEXT NOT NULL);
      CREATE TABLE warehouses (warehouse_id TEXT PRIMARY KEY, name TEXT NOT NULL);
    `);

    expect(() => runMigrations(db)).toThrow(
      'Database schema is incompatible with warehouse-catalog (missing tables: namespaces, tabulars, tasks | ' +
        'warehouses missing columns: project_id, storage_profile, storage_secret_id, status, tabular_delete_profile, protected)'
    );
  });
});

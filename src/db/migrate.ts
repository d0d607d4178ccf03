import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import type { Connection } from './client';

interface Migration {
  version: number;
  name: string;
  sql: string;
}

interface SchemaIssue {
  table: string;
  missingColumns: string[];
}

const MIGRATION_FILE_PATTERN = /^(\d{3})_.*\.sql$/;
const MIGRATIONS_DIR = fileURLToPath(new URL('./migrations', import.meta.url));

const REQUIRED_COLUMNS: Record<string, string[]> = {
  projects: ['project_id', 'name', 'created_at'],
  warehouses: [
    'warehouse_id',
    'name',
    'project_id',
    'storage_profile',
    'storage_secret_id',
    'status',
    'tabular_delete_profile',
    'protected',
  ],
  namespaces: ['namespace_id', 'warehouse_id'],
  tabulars: ['tabular_id', 'warehouse_id', 'deleted_at'],
  tasks: ['task_id', 'warehouse_id', 'status'],
};

function loadMigrations(): Migration[] {
  const files = readdirSync(MIGRATIONS_DIR)
    .filter(file => MIGRATION_FILE_PATTERN.test(file))
    .sort();

  return files.map(file => {
    const match = file.match(MIGRATION_FILE_PATTERN);
    if (!match?.[1]) {
      throw new Error(`Invalid migration filename: ${file}`);
    }

    return {
      version: Number.parseInt(match[1], 10),
      name: file,
      sql: readFileSync(join(MIGRATIONS_DIR, file), 'utf-8'),
    };
  });
}

function ensureMigrationsTable(db: Connection): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL
    )
  `);
}

function getAppliedMigrations(db: Connection): Map<number, string> {
  const rows = db
    .prepare<[], { version: number; name: string }>('SELECT version, name FROM _migrations')
    .all();

  return new Map(rows.map(row => [row.version, row.name]));
}

function assertMigrationHistory(appliedMigrations: Map<number, string>, migrations: Migration[]): void {
  for (const migration of migrations) {
    const existingName = appliedMigrations.get(migration.version);
    if (existingName && existingName !== migration.name) {
      throw new Error(
        `Incompatible migration history at version ${migration.version}: found "${existingName}" but expected "${migration.name}". ` +
        'Point WAREHOUSE_CATALOG_HOME to the intended datastore.'
      );
    }
  }
}

function applyMigration(db: Connection, migration: Migration): void {
  db.transaction(() => {
    db.exec(migration.sql);
    db.prepare('INSERT INTO _migrations (version, name, applied_at) VALUES (?, ?, ?)').run(
      migration.version,
      migration.name,
      new Date().toISOString()
    );
  })();
}

function getTableColumns(db: Connection, tableName: string): Set<string> {
  const rows = db.prepare<[], { name: string }>(`PRAGMA table_info(${tableName})`).all();
  return new Set(rows.map(row => row.name));
}

function collectSchemaIssues(db: Connection): { missingTables: string[]; issues: SchemaIssue[] } {
  const missingTables: string[] = [];
  const issues: SchemaIssue[] = [];

  for (const [table, requiredColumns] of Object.entries(REQUIRED_COLUMNS)) {
    const columns = getTableColumns(db, table);
    if (columns.size === 0) {
      missingTables.push(table);
      continue;
    }

    const missingColumns = requiredColumns.filter(column => !columns.has(column));
    if (missingColumns.length > 0) {
      issues.push({ table, missingColumns });
    }
  }

  return { missingTables, issues };
}

function assertSchemaCompatibility(db: Connection): void {
  const { missingTables, issues } = collectSchemaIssues(db);
  if (missingTables.length === 0 && issues.length === 0) {
    return;
  }

  const problems: string[] = [];
  if (missingTables.length > 0) {
    problems.push(`missing tables: ${missingTables.join(', ')}`);
  }
  for (const issue of issues) {
    problems.push(`${issue.table} missing columns: ${issue.missingColumns.join(', ')}`);
  }

  throw new Error(
    `Database schema is incompatible with warehouse-catalog (${problems.join(' | ')}). ` +
    'You may be connected to an old or unintended datastore.'
  );
}

/** Applies pending migrations (idempotent) and verifies the resulting schema. */
export function runMigrations(db: Connection): void {
  ensureMigrationsTable(db);

  const migrations = loadMigrations();
  const appliedMigrations = getAppliedMigrations(db);

  assertMigrationHistory(appliedMigrations, migrations);

  for (const migration of migrations) {
    if (appliedMigrations.has(migration.version)) continue;

    applyMigration(db, migration);
  }

  assertSchemaCompatibility(db);
}

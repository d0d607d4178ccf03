import { createCatalogContext, type CatalogContext } from './bootstrap';
import { openDatabase, SqliteCatalogState } from './db/client';
import { runMigrations } from './db/migrate';
import type { CatalogConfig } from './config';
import { createProject } from './repos/projects';
import type { ProjectId } from './domain/types';

export const TEST_CONFIG: CatalogConfig = {
  version: '1',
  database: { busyTimeoutMs: 0 },
  warehouses: { defaultTabularDeleteProfile: { type: 'hard' } },
};

/** Fresh migrated in-memory catalog. */
export function createTestCatalog(config: CatalogConfig = TEST_CONFIG): CatalogContext {
  const db = openDatabase(':memory:', { busyTimeoutMs: config.database.busyTimeoutMs });
  runMigrations(db);
  return createCatalogContext(config, new SqliteCatalogState(db));
}

export function seedProject(context: CatalogContext, name = 'analytics'): ProjectId {
  const result = createProject(context.state.db, { name });
  if (!result.success) {
    throw result.error;
  }
  return result.data.id;
}

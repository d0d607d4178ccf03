import { existsSync } from 'fs';
import { openDatabase, SqliteCatalogState, type SqliteTransaction } from './db/client';
import { runMigrations } from './db/migrate';
import {
  loadConfig,
  resolveCatalogPaths,
  writeDefaultConfig,
  type CatalogConfig,
  type CatalogPaths,
} from './config';
import { runStartupChecks } from './config/startup-checks';
import { SqliteWarehouseStore } from './repos/warehouses';
import { WarehouseService } from './services/warehouse-service';

export type SqliteWarehouseService = WarehouseService<SqliteCatalogState, SqliteTransaction>;

export interface CatalogContext {
  config: CatalogConfig;
  state: SqliteCatalogState;
  service: SqliteWarehouseService;
}

function logBootstrapPaths(paths: CatalogPaths): void {
  if (process.env.WAREHOUSE_CATALOG_DEBUG_PATHS !== '1') {
    return;
  }

  console.error('[warehouse-catalog] Storage paths:');
  console.error(`  home: ${paths.home}`);
  console.error(`  db: ${paths.db}`);
  console.error(`  config: ${paths.config}`);
}

/**
 * Wire a catalog over an already opened state. Used by bootstrap and tests.
 */
export function createCatalogContext(config: CatalogConfig, state: SqliteCatalogState): CatalogContext {
  return {
    config,
    state,
    service: new WarehouseService(new SqliteWarehouseStore()),
  };
}

/**
 * Safe bootstrap for library consumers.
 *
 * - Ensures config.yaml exists (creates default on first run).
 * - Always runs migrations (idempotent, skips already-applied ones).
 * - Loads config and warns about warehouses failing integrity checks.
 *
 * Paths default to resolveCatalogPaths(), which honours WAREHOUSE_CATALOG_HOME.
 */
export function bootstrap(paths: CatalogPaths = resolveCatalogPaths()): CatalogContext {
  logBootstrapPaths(paths);

  if (!existsSync(paths.config)) {
    writeDefaultConfig(paths.config);
  }

  const config = loadConfig(paths.config);
  const db = openDatabase(paths.db, { busyTimeoutMs: config.database.busyTimeoutMs });
  runMigrations(db);
  runStartupChecks(db);

  return createCatalogContext(config, new SqliteCatalogState(db));
}

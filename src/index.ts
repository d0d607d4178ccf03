// Re-export everything for library consumers
export * from './domain';
export * from './repos';
export * from './protocol/error-model';
export * from './services/catalog-store';
export { WarehouseService } from './services/warehouse-service';
export { bootstrap, createCatalogContext } from './bootstrap';
export type { CatalogContext, SqliteWarehouseService } from './bootstrap';
export { openDatabase, runInTransaction, SqliteCatalogState, SqliteTransaction } from './db/client';
export type { Connection } from './db/client';
export { runMigrations } from './db/migrate';
export { loadConfig, resolveCatalogPaths } from './config';
export type { CatalogConfig, CatalogPaths } from './config';

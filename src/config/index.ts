/**
 * Config loading and defaults for the warehouse catalog.
 *
 * Everything the catalog keeps on disk lives under one home directory:
 * WAREHOUSE_CATALOG_HOME, or ~/.warehouse-catalog when unset.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { dirname, join, resolve } from 'path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { catalogConfigSchema, type CatalogConfig } from './types';

export { CONFIG_VERSION, catalogConfigSchema } from './types';
export type { CatalogConfig } from './types';

const DEFAULT_CONFIG: CatalogConfig = {
  version: '1',
  database: {
    busyTimeoutMs: 5000,
  },
  warehouses: {
    defaultTabularDeleteProfile: { type: 'hard' },
  },
};

const CONFIG_COMMENT = `# Warehouse Catalog Configuration
#
# database.busyTimeoutMs: how long a writer waits for a competing transaction
#   before the operation fails with a ConcurrentModification error (409).
#   Set to 0 to fail immediately.
#
# warehouses.defaultTabularDeleteProfile: applied to new warehouses when the
#   caller does not pass one. Either:
#     { type: hard }
#     { type: soft, expirationSeconds: 604800 }
`;

export interface CatalogPaths {
  home: string;
  db: string;
  config: string;
}

export interface CatalogPathEnv {
  WAREHOUSE_CATALOG_HOME?: string;
}

function resolveCatalogHome(configured: string | undefined, userHome: string): string {
  const value = configured?.trim();
  if (!value) return join(userHome, '.warehouse-catalog');
  if (value === '~') return userHome;
  if (value.startsWith('~/')) return join(userHome, value.slice(2));
  if (value.startsWith('~')) {
    throw new Error(`Invalid WAREHOUSE_CATALOG_HOME "${value}": use an absolute path or a "~/" prefix`);
  }
  return resolve(value);
}

/**
 * Locate the catalog database and config file. Relative homes resolve
 * against the working directory.
 */
export function resolveCatalogPaths(env: CatalogPathEnv = process.env, userHome: string = homedir()): CatalogPaths {
  const home = resolveCatalogHome(env.WAREHOUSE_CATALOG_HOME, userHome);
  return {
    home,
    db: join(home, 'catalog.db'),
    config: join(home, 'config.yaml'),
  };
}

export function generateDefaultConfig(): string {
  return CONFIG_COMMENT + stringifyYaml(DEFAULT_CONFIG);
}

export function writeDefaultConfig(configPath: string): void {
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, generateDefaultConfig(), 'utf-8');
}

export function parseConfig(raw: unknown, source: string): CatalogConfig {
  if (!raw || typeof raw !== 'object') {
    throw new Error(`Invalid config file at ${source}: expected YAML object`);
  }

  const parsed = catalogConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new Error(`Invalid config file at ${source}: ${issues}`);
  }

  return parsed.data;
}

export function loadConfig(configPath?: string): CatalogConfig {
  const path = configPath ?? resolveCatalogPaths().config;

  if (!existsSync(path)) {
    return structuredClone(DEFAULT_CONFIG);
  }

  const raw: unknown = parseYaml(readFileSync(path, 'utf-8'));
  return parseConfig(raw, path);
}

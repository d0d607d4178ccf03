import { test, expect, describe, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync, readFileSync } from 'fs';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import { stringify as stringifyYaml } from 'yaml';
import {
  loadConfig,
  parseConfig,
  writeDefaultConfig,
  generateDefaultConfig,
  resolveCatalogPaths,
} from './index';

let testDir = '';

function writeTestConfig(content: object | string, path?: string): string {
  const configPath = path ?? join(testDir, 'config.yaml');
  mkdirSync(join(configPath, '..'), { recursive: true });
  writeFileSync(configPath, typeof content === 'string' ? content : stringifyYaml(content), 'utf-8');
  return configPath;
}

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), 'catalog-config-'));
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

// ============================================================================
// loadConfig
// ============================================================================

describe('loadConfig', () => {
  test('returns defaults when config file does not exist', () => {
    const config = loadConfig(join(testDir, 'nonexistent.yaml'));
    expect(config).toEqual({
      version: '1',
      database: { busyTimeoutMs: 5000 },
      warehouses: { defaultTabularDeleteProfile: { type: 'hard' } },
    });
  });

  test('loads valid config from file', () => {
    const configPath = writeTestConfig({
      version: '1',
      database: { busyTimeoutMs: 250 },
      warehouses: { defaultTabularDeleteProfile: { type: 'soft', expirationSeconds: 3600 } },
    });
    const config = loadConfig(configPath);
    expect(config.database.busyTimeoutMs).toBe(250);
    expect(config.warehouses.defaultTabularDeleteProfile).toEqual({ type: 'soft', expirationSeconds: 3600 });
  });

  test('fills missing sections with defaults', () => {
    const configPath = writeTestConfig('version: 1\n');
    const config = loadConfig(configPath);
    expect(config.version).toBe('1');
    expect(config.database.busyTimeoutMs).toBe(5000);
    expect(config.warehouses.defaultTabularDeleteProfile).toEqual({ type: 'hard' });
  });

  test('throws on wrong version', () => {
    const configPath = writeTestConfig({ version: '2' });
    expect(() => loadConfig(configPath)).toThrow("Unsupported config version: 2. Expected '1'.");
  });

  test('throws on non-object YAML', () => {
    const configPath = writeTestConfig('just a string\n');
    expect(() => loadConfig(configPath)).toThrow('expected YAML object');
  });

  test('throws on invalid delete profile', () => {
    const configPath = writeTestConfig({
      version: '1',
      warehouses: { defaultTabularDeleteProfile: { type: 'soft', expirationSeconds: -5 } },
    });
    expect(() => loadConfig(configPath)).toThrow('warehouses.defaultTabularDeleteProfile.expirationSeconds');
  });

  test('throws on negative busy timeout', () => {
    const configPath = writeTestConfig({ version: '1', database: { busyTimeoutMs: -1 } });
    expect(() => loadConfig(configPath)).toThrow('database.busyTimeoutMs');
  });
});

describe('parseConfig', () => {
  test('names the source in errors', () => {
    expect(() => parseConfig(null, 'inline')).toThrow('Invalid config file at inline: expected YAML object');
  });
});

// ============================================================================
// writeDefaultConfig
// ============================================================================

describe('writeDefaultConfig', () => {
  test('writes a loadable config file', () => {
    const configPath = join(testDir, 'nested', 'generated.yaml');
    writeDefaultConfig(configPath);
    const config = loadConfig(configPath);
    expect(config.version).toBe('1');
    expect(config.database.busyTimeoutMs).toBe(5000);
  });

  test('starts with the comment header', () => {
    const configPath = join(testDir, 'generated.yaml');
    writeDefaultConfig(configPath);
    expect(readFileSync(configPath, 'utf-8')).toBe(generateDefaultConfig());
    expect(generateDefaultConfig().startsWith('# Warehouse Catalog Configuration\n')).toBe(true);
  });
});

// ============================================================================
// resolveCatalogPaths
// ============================================================================

describe('resolveCatalogPaths', () => {
  test('defaults to .warehouse-catalog under the user home', () => {
    expect(resolveCatalogPaths({}, '/home/demo')).toEqual({
      home: '/home/demo/.warehouse-catalog',
      db: '/home/demo/.warehouse-catalog/catalog.db',
      config: '/home/demo/.warehouse-catalog/config.yaml',
    });
  });

  test('ignores a blank WAREHOUSE_CATALOG_HOME', () => {
    expect(resolveCatalogPaths({ WAREHOUSE_CATALOG_HOME: '  ' }, '/home/demo').home).toBe(
      '/home/demo/.warehouse-catalog'
    );
  });

  test('uses an absolute WAREHOUSE_CATALOG_HOME as is', () => {
    const paths = resolveCatalogPaths({ WAREHOUSE_CATALOG_HOME: '/srv/catalog' }, '/home/demo');
    expect(paths.db).toBe('/srv/catalog/catalog.db');
    expect(paths.config).toBe('/srv/catalog/config.yaml');
  });

  test('expands ~ and ~/ against the user home', () => {
    expect(resolveCatalogPaths({ WAREHOUSE_CATALOG_HOME: '~' }, '/home/demo').home).toBe('/home/demo');
    expect(resolveCatalogPaths({ WAREHOUSE_CATALOG_HOME: '~/catalogs/dev' }, '/home/demo').home).toBe(
      '/home/demo/catalogs/dev'
    );
  });

  test('resolves a relative home against the working directory', () => {
    expect(resolveCatalogPaths({ WAREHOUSE_CATALOG_HOME: 'catalog-data' }, '/home/demo').home).toBe(
      resolve('catalog-data')
    );
  });

  test('rejects ~user homes', () => {
    expect(() => resolveCatalogPaths({ WAREHOUSE_CATALOG_HOME: '~demo/catalog' }, '/home/demo')).toThrow(
      'Invalid WAREHOUSE_CATALOG_HOME "~demo/catalog": use an absolute path or a "~/" prefix'
    );
  });
});

import type { z } from 'zod';
import { classifyBackendError } from '../domain/backend-error';
import {
  DatabaseIntegrityError,
  ProjectIdNotFoundError,
  StorageProfileSerializationError,
  WarehouseAlreadyExists,
  WarehouseHasUnfinishedTasks,
  WarehouseIdNotFound,
  WarehouseNotEmpty,
  WarehouseProtected,
} from '../domain/errors';
import {
  type CreateWarehouseParams,
  type DeleteWarehouseQuery,
  type GetWarehouseResponse,
  type ProjectId,
  type Result,
  type WarehouseId,
  WarehouseStatus,
  newWarehouseId,
  projectIdSchema,
  secretIdentSchema,
  storageProfileSchema,
  tabularDeleteProfileSchema,
  warehouseIdSchema,
  warehouseStatusSchema,
} from '../domain/types';
import type {
  CreateWarehouseErrorVariant,
  DeleteWarehouseErrorVariant,
  GetWarehouseByIdErrorVariant,
  ListWarehousesErrorVariant,
  RenameWarehouseErrorVariant,
  SetWarehouseProtectionErrorVariant,
  SetWarehouseStatusErrorVariant,
} from '../domain/warehouse-errors';
import type { Connection, SqliteCatalogState, SqliteTransaction } from '../db/client';
import type { WarehouseStore } from '../services/catalog-store';
import { count, err, execute, now, ok, queryAll, queryOne } from './base';

interface WarehouseRow {
  warehouse_id: string;
  name: string;
  project_id: string;
  storage_profile: string;
  storage_secret_id: string | null;
  status: string;
  tabular_delete_profile: string;
  protected: number;
  project_ref: string | null;
}

const SELECT_WAREHOUSES = `
  SELECT w.warehouse_id, w.name, w.project_id, w.storage_profile, w.storage_secret_id,
         w.status, w.tabular_delete_profile, w.protected, p.project_id AS project_ref
  FROM warehouses w
  LEFT JOIN projects p ON p.project_id = w.project_id
`;

const UNFINISHED_TASK_STATUSES = ['scheduled', 'running'];

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}

function decodeColumn<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  column: string,
  warehouseId: string
): Result<z.output<S>, DatabaseIntegrityError> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    return err(
      new DatabaseIntegrityError(
        `Column '${column}' of warehouse '${warehouseId}' is invalid: ${describeIssues(parsed.error)}`
      )
    );
  }
  return ok(parsed.data);
}

function decodeJsonColumn<S extends z.ZodTypeAny>(
  schema: S,
  raw: string,
  column: string,
  warehouseId: string
): Result<z.output<S>, DatabaseIntegrityError> {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(
      new DatabaseIntegrityError(`Column '${column}' of warehouse '${warehouseId}' is not valid JSON: ${reason}`)
    );
  }
  return decodeColumn(schema, value, column, warehouseId);
}

/**
 * Convert a stored row into a warehouse record. Any row that violates an
 * expected invariant yields a DatabaseIntegrityError.
 */
export function decodeWarehouseRow(row: WarehouseRow): Result<GetWarehouseResponse, DatabaseIntegrityError> {
  const rowId = row.warehouse_id;

  if (row.project_ref === null) {
    return err(
      new DatabaseIntegrityError(`Warehouse '${rowId}' references project '${row.project_id}' which does not exist`)
    );
  }

  const id = decodeColumn(warehouseIdSchema, row.warehouse_id, 'warehouse_id', rowId);
  if (!id.success) return id;
  const projectId = decodeColumn(projectIdSchema, row.project_id, 'project_id', rowId);
  if (!projectId.success) return projectId;
  const secretId = decodeColumn(secretIdentSchema.nullable(), row.storage_secret_id, 'storage_secret_id', rowId);
  if (!secretId.success) return secretId;
  const status = decodeColumn(warehouseStatusSchema, row.status, 'status', rowId);
  if (!status.success) return status;
  const storageProfile = decodeJsonColumn(storageProfileSchema, row.storage_profile, 'storage_profile', rowId);
  if (!storageProfile.success) return storageProfile;
  const tabularDeleteProfile = decodeJsonColumn(
    tabularDeleteProfileSchema,
    row.tabular_delete_profile,
    'tabular_delete_profile',
    rowId
  );
  if (!tabularDeleteProfile.success) return tabularDeleteProfile;

  return ok({
    id: id.data,
    name: row.name,
    projectId: projectId.data,
    storageProfile: storageProfile.data,
    storageSecretId: secretId.data ?? undefined,
    status: status.data,
    tabularDeleteProfile: tabularDeleteProfile.data,
    protected: row.protected !== 0,
  });
}

function decodeWarehouseRows(rows: WarehouseRow[]): Result<GetWarehouseResponse[], DatabaseIntegrityError> {
  const warehouses: GetWarehouseResponse[] = [];
  for (const row of rows) {
    const decoded = decodeWarehouseRow(row);
    if (!decoded.success) return decoded;
    warehouses.push(decoded.data);
  }
  return ok(warehouses);
}

/** Decode every stored warehouse and collect the integrity violations found. */
export function findWarehouseIntegrityIssues(db: Connection): DatabaseIntegrityError[] {
  const rows = queryAll<WarehouseRow>(db, `${SELECT_WAREHOUSES} ORDER BY w.warehouse_id`);
  const issues: DatabaseIntegrityError[] = [];
  for (const row of rows) {
    const decoded = decodeWarehouseRow(row);
    if (!decoded.success) issues.push(decoded.error);
  }
  return issues;
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

function placeholders(values: readonly unknown[]): string {
  return values.map(() => '?').join(', ');
}

/**
 * SQLite implementation of the warehouse backend.
 */
export class SqliteWarehouseStore implements WarehouseStore<SqliteCatalogState, SqliteTransaction> {
  createWarehouse(
    params: CreateWarehouseParams,
    transaction: SqliteTransaction
  ): Result<WarehouseId, CreateWarehouseErrorVariant> {
    let storageProfile: string;
    let tabularDeleteProfile: string;
    try {
      storageProfile = JSON.stringify(params.storageProfile);
      tabularDeleteProfile = JSON.stringify(params.tabularDeleteProfile);
    } catch (error) {
      return err(new StorageProfileSerializationError(error));
    }

    try {
      const db = transaction.db;

      const project = queryOne<{ project_id: string }>(
        db,
        'SELECT project_id FROM projects WHERE project_id = ?',
        [params.projectId]
      );
      if (!project) {
        return err(new ProjectIdNotFoundError(params.projectId));
      }

      const existing = queryOne<{ warehouse_id: string }>(
        db,
        'SELECT warehouse_id FROM warehouses WHERE project_id = ? AND name = ?',
        [params.projectId, params.name]
      );
      if (existing) {
        return err(new WarehouseAlreadyExists(params.name, params.projectId));
      }

      const id = newWarehouseId();
      execute(
        db,
        `INSERT INTO warehouses (warehouse_id, name, project_id, storage_profile, storage_secret_id,
                                 status, tabular_delete_profile, protected, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, 0, ?)`,
        [
          id,
          params.name,
          params.projectId,
          storageProfile,
          params.storageSecretId ?? null,
          WarehouseStatus.ACTIVE,
          tabularDeleteProfile,
          now(),
        ]
      );
      return ok(id);
    } catch (error) {
      // A concurrent writer inserted the same name after our check
      if (isUniqueViolation(error)) {
        return err(new WarehouseAlreadyExists(params.name, params.projectId));
      }
      return err(classifyBackendError(error));
    }
  }

  deleteWarehouse(
    warehouseId: WarehouseId,
    query: DeleteWarehouseQuery,
    transaction: SqliteTransaction
  ): Result<void, DeleteWarehouseErrorVariant> {
    try {
      const db = transaction.db;

      const warehouse = queryOne<{ protected: number }>(
        db,
        'SELECT protected FROM warehouses WHERE warehouse_id = ?',
        [warehouseId]
      );
      if (!warehouse) {
        return err(new WarehouseIdNotFound(warehouseId));
      }

      const unfinishedTasks = count(
        db,
        `SELECT COUNT(*) AS count FROM tasks
         WHERE warehouse_id = ? AND status IN (${placeholders(UNFINISHED_TASK_STATUSES)})`,
        [warehouseId, ...UNFINISHED_TASK_STATUSES]
      );
      if (unfinishedTasks > 0) {
        return err(new WarehouseHasUnfinishedTasks());
      }

      if (warehouse.protected !== 0 && !query.force) {
        return err(new WarehouseProtected());
      }

      if (!query.force) {
        const contents = count(
          db,
          `SELECT (SELECT COUNT(*) FROM namespaces WHERE warehouse_id = ?)
                + (SELECT COUNT(*) FROM tabulars WHERE warehouse_id = ? AND deleted_at IS NULL) AS count`,
          [warehouseId, warehouseId]
        );
        if (contents > 0) {
          return err(new WarehouseNotEmpty());
        }
      }

      // Namespaces, tabulars and finished tasks cascade with the warehouse row
      execute(db, 'DELETE FROM warehouses WHERE warehouse_id = ?', [warehouseId]);
      return ok(undefined);
    } catch (error) {
      return err(classifyBackendError(error));
    }
  }

  renameWarehouse(
    warehouseId: WarehouseId,
    newName: string,
    transaction: SqliteTransaction
  ): Result<void, RenameWarehouseErrorVariant> {
    try {
      const changes = execute(
        transaction.db,
        'UPDATE warehouses SET name = ?, updated_at = ? WHERE warehouse_id = ? AND status = ?',
        [newName, now(), warehouseId, WarehouseStatus.ACTIVE]
      );
      if (changes === 0) {
        return err(new WarehouseIdNotFound(warehouseId));
      }
      return ok(undefined);
    } catch (error) {
      return err(classifyBackendError(error));
    }
  }

  listWarehouses(
    projectId: ProjectId,
    statuses: readonly WarehouseStatus[],
    state: SqliteCatalogState
  ): Result<GetWarehouseResponse[], ListWarehousesErrorVariant> {
    if (statuses.length === 0) return ok([]);

    try {
      const rows = queryAll<WarehouseRow>(
        state.db,
        `${SELECT_WAREHOUSES}
         WHERE w.project_id = ? AND w.status IN (${placeholders(statuses)})
         ORDER BY w.name, w.warehouse_id`,
        [projectId, ...statuses]
      );
      return decodeWarehouseRows(rows);
    } catch (error) {
      return err(classifyBackendError(error));
    }
  }

  getWarehouse(
    warehouseId: WarehouseId,
    statuses: readonly WarehouseStatus[],
    state: SqliteCatalogState
  ): Result<GetWarehouseResponse | null, GetWarehouseByIdErrorVariant> {
    if (statuses.length === 0) return ok(null);

    try {
      const row = queryOne<WarehouseRow>(
        state.db,
        `${SELECT_WAREHOUSES} WHERE w.warehouse_id = ? AND w.status IN (${placeholders(statuses)})`,
        [warehouseId, ...statuses]
      );
      if (!row) return ok(null);
      return decodeWarehouseRow(row);
    } catch (error) {
      return err(classifyBackendError(error));
    }
  }

  setWarehouseStatus(
    warehouseId: WarehouseId,
    status: WarehouseStatus,
    transaction: SqliteTransaction
  ): Result<void, SetWarehouseStatusErrorVariant> {
    try {
      const changes = execute(
        transaction.db,
        'UPDATE warehouses SET status = ?, updated_at = ? WHERE warehouse_id = ?',
        [status, now(), warehouseId]
      );
      if (changes === 0) {
        return err(new WarehouseIdNotFound(warehouseId));
      }
      return ok(undefined);
    } catch (error) {
      return err(classifyBackendError(error));
    }
  }

  setWarehouseProtection(
    warehouseId: WarehouseId,
    isProtected: boolean,
    transaction: SqliteTransaction
  ): Result<void, SetWarehouseProtectionErrorVariant> {
    try {
      const changes = execute(
        transaction.db,
        'UPDATE warehouses SET protected = ?, updated_at = ? WHERE warehouse_id = ?',
        [isProtected ? 1 : 0, now(), warehouseId]
      );
      if (changes === 0) {
        return err(new WarehouseIdNotFound(warehouseId));
      }
      return ok(undefined);
    } catch (error) {
      return err(classifyBackendError(error));
    }
  }
}

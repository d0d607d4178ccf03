import { CatalogBackendError } from '../domain/backend-error';
import { WarehouseIdNotFound } from '../domain/errors';
import {
  type CreateWarehouseParams,
  type DeleteWarehouseQuery,
  type GetWarehouseResponse,
  type ProjectId,
  type Result,
  type WarehouseId,
  WarehouseStatus,
} from '../domain/types';
import {
  CatalogCreateWarehouseError,
  CatalogDeleteWarehouseError,
  CatalogGetWarehouseByIdError,
  CatalogListWarehousesError,
  CatalogRenameWarehouseError,
  CatalogSetWarehouseProtectionError,
  CatalogSetWarehouseStatusError,
} from '../domain/warehouse-errors';
import { err, ok } from '../repos/base';
import type { CatalogTransaction, WarehouseStore } from './catalog-store';

const ALL_STATUSES: readonly WarehouseStatus[] = Object.values(WarehouseStatus);
const ACTIVE_ONLY: readonly WarehouseStatus[] = [WarehouseStatus.ACTIVE];

function closedTransactionError(): CatalogBackendError {
  return CatalogBackendError.unexpected(new Error('Transaction is not open'));
}

/**
 * Warehouse lifecycle operations over a backend store.
 *
 * Mutations run inside the caller's transaction; the service neither commits
 * nor rolls back. Every failure is wrapped into the operation's error set,
 * which stamps the operation context onto the error. Nothing is retried.
 */
export class WarehouseService<TState, TTransaction extends CatalogTransaction<TState>> {
  constructor(private readonly store: WarehouseStore<TState, TTransaction>) {}

  /** Create a warehouse. */
  createWarehouse(
    params: CreateWarehouseParams,
    transaction: TTransaction
  ): Result<WarehouseId, CatalogCreateWarehouseError> {
    if (!transaction.isOpen) return err(new CatalogCreateWarehouseError(closedTransactionError()));

    const result = this.store.createWarehouse(params, transaction);
    return result.success ? result : err(new CatalogCreateWarehouseError(result.error));
  }

  /**
   * Delete a warehouse. Guards are evaluated by the store inside the
   * transaction: unfinished tasks, then protection, then emptiness.
   */
  deleteWarehouse(
    warehouseId: WarehouseId,
    query: DeleteWarehouseQuery,
    transaction: TTransaction
  ): Result<void, CatalogDeleteWarehouseError> {
    if (!transaction.isOpen) return err(new CatalogDeleteWarehouseError(closedTransactionError()));

    const result = this.store.deleteWarehouse(warehouseId, query, transaction);
    return result.success ? result : err(new CatalogDeleteWarehouseError(result.error));
  }

  /** Rename an active warehouse. */
  renameWarehouse(
    warehouseId: WarehouseId,
    newName: string,
    transaction: TTransaction
  ): Result<void, CatalogRenameWarehouseError> {
    if (!transaction.isOpen) return err(new CatalogRenameWarehouseError(closedTransactionError()));

    const result = this.store.renameWarehouse(warehouseId, newName, transaction);
    return result.success ? result : err(new CatalogRenameWarehouseError(result.error));
  }

  /**
   * Return all warehouses in a project.
   * Without `statuses` only active warehouses are returned; otherwise
   * warehouses with any of the given statuses.
   */
  listWarehouses(
    projectId: ProjectId,
    statuses: readonly WarehouseStatus[] | undefined,
    state: TState
  ): Result<GetWarehouseResponse[], CatalogListWarehousesError> {
    const result = this.store.listWarehouses(projectId, statuses ?? ACTIVE_ONLY, state);
    return result.success ? result : err(new CatalogListWarehousesError(result.error));
  }

  /**
   * Get the warehouse metadata. Only returns active warehouses;
   * `null` if the warehouse does not exist.
   */
  getWarehouseById(
    warehouseId: WarehouseId,
    state: TState
  ): Result<GetWarehouseResponse | null, CatalogGetWarehouseByIdError> {
    const result = this.store.getWarehouse(warehouseId, ACTIVE_ONLY, state);
    return result.success ? result : err(new CatalogGetWarehouseByIdError(result.error));
  }

  /** Like `getWarehouseById`, but inactive warehouses are returned as well. */
  getWarehouseByIdAnyStatus(
    warehouseId: WarehouseId,
    state: TState
  ): Result<GetWarehouseResponse | null, CatalogGetWarehouseByIdError> {
    const result = this.store.getWarehouse(warehouseId, ALL_STATUSES, state);
    return result.success ? result : err(new CatalogGetWarehouseByIdError(result.error));
  }

  /** Wrapper around `getWarehouseById` that fails with not-found instead of returning null. */
  requireWarehouseById(
    warehouseId: WarehouseId,
    state: TState
  ): Result<GetWarehouseResponse, CatalogGetWarehouseByIdError> {
    const result = this.getWarehouseById(warehouseId, state);
    if (!result.success) return result;
    if (result.data === null) {
      return err(new CatalogGetWarehouseByIdError(new WarehouseIdNotFound(warehouseId)));
    }
    return ok(result.data);
  }

  /** Activate or deactivate a warehouse. */
  setWarehouseStatus(
    warehouseId: WarehouseId,
    status: WarehouseStatus,
    transaction: TTransaction
  ): Result<void, CatalogSetWarehouseStatusError> {
    if (!transaction.isOpen) return err(new CatalogSetWarehouseStatusError(closedTransactionError()));

    const result = this.store.setWarehouseStatus(warehouseId, status, transaction);
    return result.success ? result : err(new CatalogSetWarehouseStatusError(result.error));
  }

  setWarehouseProtection(
    warehouseId: WarehouseId,
    isProtected: boolean,
    transaction: TTransaction
  ): Result<void, CatalogSetWarehouseProtectionError> {
    if (!transaction.isOpen) return err(new CatalogSetWarehouseProtectionError(closedTransactionError()));

    const result = this.store.setWarehouseProtection(warehouseId, isProtected, transaction);
    return result.success ? result : err(new CatalogSetWarehouseProtectionError(result.error));
  }
}

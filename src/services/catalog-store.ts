/**
 * Backend capability consumed by the warehouse service.
 *
 * A backend supplies a read state for list/get and caller-owned
 * transactions for mutations. Backend methods never commit or roll back;
 * they report failures as typed domain or backend errors.
 */

import type {
  CreateWarehouseParams,
  DeleteWarehouseQuery,
  GetWarehouseResponse,
  ProjectId,
  Result,
  WarehouseId,
  WarehouseStatus,
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

export interface CatalogTransaction<TState> {
  readonly state: TState;
  readonly isOpen: boolean;
  commit(): void;
  rollback(): void;
}

export interface WarehouseStore<TState, TTransaction extends CatalogTransaction<TState>> {
  createWarehouse(params: CreateWarehouseParams, transaction: TTransaction): Result<WarehouseId, CreateWarehouseErrorVariant>;

  deleteWarehouse(
    warehouseId: WarehouseId,
    query: DeleteWarehouseQuery,
    transaction: TTransaction
  ): Result<void, DeleteWarehouseErrorVariant>;

  renameWarehouse(
    warehouseId: WarehouseId,
    newName: string,
    transaction: TTransaction
  ): Result<void, RenameWarehouseErrorVariant>;

  /** Warehouses of the project having one of `statuses`, ordered by name. */
  listWarehouses(
    projectId: ProjectId,
    statuses: readonly WarehouseStatus[],
    state: TState
  ): Result<GetWarehouseResponse[], ListWarehousesErrorVariant>;

  /** Returns null when no warehouse with one of `statuses` has this id. */
  getWarehouse(
    warehouseId: WarehouseId,
    statuses: readonly WarehouseStatus[],
    state: TState
  ): Result<GetWarehouseResponse | null, GetWarehouseByIdErrorVariant>;

  setWarehouseStatus(
    warehouseId: WarehouseId,
    status: WarehouseStatus,
    transaction: TTransaction
  ): Result<void, SetWarehouseStatusErrorVariant>;

  setWarehouseProtection(
    warehouseId: WarehouseId,
    isProtected: boolean,
    transaction: TTransaction
  ): Result<void, SetWarehouseProtectionErrorVariant>;
}

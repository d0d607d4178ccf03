/**
 * Per-operation error sets for the warehouse lifecycle.
 *
 * Each operation error wraps exactly one variant of its closed set. Wrapping
 * appends the operation's context string to the variant's stack, so every
 * propagated error names the operation that failed.
 */

import type { CatalogBackendError } from './backend-error';
import type { CatalogError } from './error-stack';
import type {
  DatabaseIntegrityError,
  ProjectIdNotFoundError,
  StorageProfileSerializationError,
  WarehouseAlreadyExists,
  WarehouseHasUnfinishedTasks,
  WarehouseIdNotFound,
  WarehouseNotEmpty,
  WarehouseProtected,
} from './errors';

export const CREATE_ERROR_STACK = 'Error creating warehouse in catalog';
export const DELETE_ERROR_STACK = 'Error deleting warehouse in catalog';
export const RENAME_ERROR_STACK = 'Error renaming warehouse in catalog';
export const LIST_ERROR_STACK = 'Error listing warehouses in catalog';
export const GET_ERROR_STACK = 'Error getting warehouse by id in catalog';
export const SET_STATUS_ERROR_STACK = 'Error setting warehouse status in catalog';
export const SET_PROTECTION_ERROR_STACK = 'Error setting warehouse protection in catalog';

export abstract class WarehouseOperationError<E extends CatalogError> extends Error {
  abstract readonly operation: string;
  readonly error: E;

  protected constructor(error: E, context: string) {
    super(error.message, { cause: error });
    error.appendDetail(context);
    this.error = error;
    this.name = new.target.name;
  }

  get contextStack(): readonly string[] {
    return this.error.contextStack;
  }

  /** Adds a caller-side detail to the wrapped error and returns this error. */
  withDetail(detail: string): this {
    this.error.appendDetail(detail);
    return this;
  }
}

// --------------------------- CREATE ERROR ---------------------------

export type CreateWarehouseErrorVariant =
  | WarehouseAlreadyExists
  | CatalogBackendError
  | StorageProfileSerializationError
  | ProjectIdNotFoundError;

export class CatalogCreateWarehouseError extends WarehouseOperationError<CreateWarehouseErrorVariant> {
  readonly operation = 'create' as const;

  constructor(error: CreateWarehouseErrorVariant) {
    super(error, CREATE_ERROR_STACK);
  }
}

// --------------------------- DELETE ERROR ---------------------------

export type DeleteWarehouseErrorVariant =
  | CatalogBackendError
  | WarehouseHasUnfinishedTasks
  | WarehouseIdNotFound
  | WarehouseNotEmpty
  | WarehouseProtected;

export class CatalogDeleteWarehouseError extends WarehouseOperationError<DeleteWarehouseErrorVariant> {
  readonly operation = 'delete' as const;

  constructor(error: DeleteWarehouseErrorVariant) {
    super(error, DELETE_ERROR_STACK);
  }
}

// --------------------------- RENAME ERROR ---------------------------

export type RenameWarehouseErrorVariant = CatalogBackendError | WarehouseIdNotFound;

export class CatalogRenameWarehouseError extends WarehouseOperationError<RenameWarehouseErrorVariant> {
  readonly operation = 'rename' as const;

  constructor(error: RenameWarehouseErrorVariant) {
    super(error, RENAME_ERROR_STACK);
  }
}

// --------------------------- LIST ERROR ---------------------------

export type ListWarehousesErrorVariant = CatalogBackendError | DatabaseIntegrityError;

export class CatalogListWarehousesError extends WarehouseOperationError<ListWarehousesErrorVariant> {
  readonly operation = 'list' as const;

  constructor(error: ListWarehousesErrorVariant) {
    super(error, LIST_ERROR_STACK);
  }
}

// --------------------------- GET ERROR ---------------------------

export type GetWarehouseByIdErrorVariant = CatalogBackendError | DatabaseIntegrityError | WarehouseIdNotFound;

export class CatalogGetWarehouseByIdError extends WarehouseOperationError<GetWarehouseByIdErrorVariant> {
  readonly operation = 'get' as const;

  constructor(error: GetWarehouseByIdErrorVariant) {
    super(error, GET_ERROR_STACK);
  }
}

// --------------------------- SET STATUS ERROR ---------------------------

export type SetWarehouseStatusErrorVariant = CatalogBackendError | WarehouseIdNotFound;

export class CatalogSetWarehouseStatusError extends WarehouseOperationError<SetWarehouseStatusErrorVariant> {
  readonly operation = 'set-status' as const;

  constructor(error: SetWarehouseStatusErrorVariant) {
    super(error, SET_STATUS_ERROR_STACK);
  }
}

// --------------------------- SET PROTECTION ERROR ---------------------------

export type SetWarehouseProtectionErrorVariant = CatalogBackendError | WarehouseIdNotFound;

export class CatalogSetWarehouseProtectionError extends WarehouseOperationError<SetWarehouseProtectionErrorVariant> {
  readonly operation = 'set-protection' as const;

  constructor(error: SetWarehouseProtectionErrorVariant) {
    super(error, SET_PROTECTION_ERROR_STACK);
  }
}

export type CatalogWarehouseOperationError =
  | CatalogCreateWarehouseError
  | CatalogDeleteWarehouseError
  | CatalogRenameWarehouseError
  | CatalogListWarehousesError
  | CatalogGetWarehouseByIdError
  | CatalogSetWarehouseStatusError
  | CatalogSetWarehouseProtectionError;

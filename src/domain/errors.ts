import { CatalogError } from './error-stack';
import type { ProjectId, WarehouseId } from './types';

// ============================================================================
// Lookup errors
// ============================================================================

export class WarehouseIdNotFound extends CatalogError {
  readonly _tag = 'WarehouseIdNotFound' as const;

  constructor(readonly warehouseId: WarehouseId) {
    super(`A warehouse with id '${warehouseId}' does not exist`);
    this.name = 'WarehouseIdNotFound';
  }
}

export class ProjectIdNotFoundError extends CatalogError {
  readonly _tag = 'ProjectIdNotFoundError' as const;

  constructor(readonly projectId: ProjectId) {
    super(`Project with id '${projectId}' not found`);
    this.name = 'ProjectIdNotFoundError';
  }
}

// ============================================================================
// Create errors
// ============================================================================

export class WarehouseAlreadyExists extends CatalogError {
  readonly _tag = 'WarehouseAlreadyExists' as const;

  constructor(
    readonly warehouseName: string,
    readonly projectId: ProjectId
  ) {
    super(`A warehouse with the name '${warehouseName}' already exists in project with id '${projectId}'`);
    this.name = 'WarehouseAlreadyExists';
  }
}

export class StorageProfileSerializationError extends CatalogError {
  readonly _tag = 'StorageProfileSerializationError' as const;
  readonly source: Error;

  constructor(source: unknown) {
    const error = source instanceof Error ? source : new Error(String(source));
    super(`Error serializing storage profile: ${error.message}`, { cause: error });
    this.name = 'StorageProfileSerializationError';
    this.source = error;
  }
}

// ============================================================================
// Persisted state errors
// ============================================================================

/**
 * Persisted data violates an expected invariant (dangling reference,
 * unparseable stored value). Signals corrupt data, not a transient failure.
 */
export class DatabaseIntegrityError extends CatalogError {
  readonly _tag = 'DatabaseIntegrityError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'DatabaseIntegrityError';
  }
}

// ============================================================================
// Delete guard errors
// ============================================================================

export class WarehouseHasUnfinishedTasks extends CatalogError {
  readonly _tag = 'WarehouseHasUnfinishedTasks' as const;

  constructor() {
    super('Warehouse has unfinished tasks. Cannot delete warehouse until all tasks are finished.');
    this.name = 'WarehouseHasUnfinishedTasks';
  }
}

export class WarehouseNotEmpty extends CatalogError {
  readonly _tag = 'WarehouseNotEmpty' as const;

  constructor() {
    super('Warehouse is not empty. Cannot delete a non-empty warehouse.');
    this.name = 'WarehouseNotEmpty';
  }
}

export class WarehouseProtected extends CatalogError {
  readonly _tag = 'WarehouseProtected' as const;

  constructor() {
    super('Warehouse is protected and force flag not set. Cannot delete protected warehouse.');
    this.name = 'WarehouseProtected';
  }
}

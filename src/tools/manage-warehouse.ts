import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { CatalogContext } from '../bootstrap';
import { type CatalogBackendError, classifyBackendError } from '../domain/backend-error';
import {
  type Result,
  WarehouseStatus,
  projectIdSchema,
  secretIdentSchema,
  storageProfileSchema,
  tabularDeleteProfileSchema,
  warehouseIdSchema,
} from '../domain/types';
import {
  CatalogCreateWarehouseError,
  CatalogDeleteWarehouseError,
  CatalogRenameWarehouseError,
  CatalogSetWarehouseProtectionError,
  CatalogSetWarehouseStatusError,
} from '../domain/warehouse-errors';
import { runInTransaction, type SqliteCatalogState, type SqliteTransaction } from '../db/client';
import { err } from '../repos/base';
import {
  type ToolResponse,
  createBadRequestResponse,
  createCatalogErrorResponse,
  createSuccessResponse,
  createUnexpectedErrorResponse,
  toToolResult,
} from './registry';

export const manageWarehouseSchema = z.object({
  operation: z.enum(['create', 'delete', 'rename', 'activate', 'deactivate', 'protect', 'unprotect']),
  warehouseId: warehouseIdSchema.optional().describe('Target warehouse. Required for every operation except create.'),
  projectId: projectIdSchema.optional().describe('Owning project. Required for create.'),
  name: z.string().optional().describe('Warehouse name for create, new name for rename.'),
  storageProfile: storageProfileSchema
    .optional()
    .describe('Opaque storage profile object with a "type" discriminator. Required for create.'),
  storageSecretId: secretIdentSchema.optional(),
  tabularDeleteProfile: tabularDeleteProfileSchema
    .optional()
    .describe('Defaults to warehouses.defaultTabularDeleteProfile from config.yaml.'),
  force: z.boolean().optional().describe('For delete: bypass the protection and not-empty guards. Contents are removed with the warehouse.'),
});

export type ManageWarehouseParams = z.infer<typeof manageWarehouseSchema>;

/**
 * Run a mutation in its own transaction. A failure raised while committing
 * is classified and stamped with the operation's context like any other
 * backend failure.
 */
function transact<T, E>(
  state: SqliteCatalogState,
  fn: (transaction: SqliteTransaction) => Result<T, E>,
  wrap: (error: CatalogBackendError) => E
): Result<T, E> {
  try {
    return runInTransaction(state, fn);
  } catch (error) {
    return err(wrap(classifyBackendError(error)));
  }
}

export function handleManageWarehouse(context: CatalogContext, params: ManageWarehouseParams): ToolResponse {
  const { service, state, config } = context;

  if (params.operation === 'create') {
    const name = params.name?.trim();
    if (!params.projectId) {
      return createBadRequestResponse('projectId is required for create operation');
    }
    if (!name) {
      return createBadRequestResponse('name is required for create operation');
    }
    if (!params.storageProfile) {
      return createBadRequestResponse('storageProfile is required for create operation');
    }

    const createParams = {
      name,
      projectId: params.projectId,
      storageProfile: params.storageProfile,
      storageSecretId: params.storageSecretId,
      tabularDeleteProfile: params.tabularDeleteProfile ?? config.warehouses.defaultTabularDeleteProfile,
    };
    const result = transact(
      state,
      transaction => service.createWarehouse(createParams, transaction),
      error => new CatalogCreateWarehouseError(error)
    );
    if (!result.success) {
      return createCatalogErrorResponse('Failed to create warehouse', result.error);
    }
    return createSuccessResponse('Warehouse created successfully', { warehouseId: result.data });
  }

  const warehouseId = params.warehouseId;
  if (!warehouseId) {
    return createBadRequestResponse(`warehouseId is required for ${params.operation} operation`);
  }

  switch (params.operation) {
    case 'delete': {
      const force = params.force ?? false;
      const result = transact(
        state,
        transaction => service.deleteWarehouse(warehouseId, { force }, transaction),
        error => new CatalogDeleteWarehouseError(error)
      );
      if (!result.success) {
        return createCatalogErrorResponse('Failed to delete warehouse', result.error);
      }
      return createSuccessResponse('Warehouse deleted successfully', { warehouseId, deleted: true });
    }

    case 'rename': {
      const newName = params.name?.trim();
      if (!newName) {
        return createBadRequestResponse('name is required for rename operation');
      }
      const result = transact(
        state,
        transaction => service.renameWarehouse(warehouseId, newName, transaction),
        error => new CatalogRenameWarehouseError(error)
      );
      if (!result.success) {
        return createCatalogErrorResponse('Failed to rename warehouse', result.error);
      }
      return createSuccessResponse('Warehouse renamed successfully', { warehouseId, name: newName });
    }

    case 'activate':
    case 'deactivate': {
      const status = params.operation === 'activate' ? WarehouseStatus.ACTIVE : WarehouseStatus.INACTIVE;
      const result = transact(
        state,
        transaction => service.setWarehouseStatus(warehouseId, status, transaction),
        error => new CatalogSetWarehouseStatusError(error)
      );
      if (!result.success) {
        return createCatalogErrorResponse(`Failed to ${params.operation} warehouse`, result.error);
      }
      return createSuccessResponse(`Warehouse ${params.operation}d successfully`, { warehouseId, status });
    }

    case 'protect':
    case 'unprotect': {
      const isProtected = params.operation === 'protect';
      const result = transact(
        state,
        transaction => service.setWarehouseProtection(warehouseId, isProtected, transaction),
        error => new CatalogSetWarehouseProtectionError(error)
      );
      if (!result.success) {
        return createCatalogErrorResponse(`Failed to ${params.operation} warehouse`, result.error);
      }
      return createSuccessResponse(`Warehouse ${params.operation}ed successfully`, {
        warehouseId,
        protected: isProtected,
      });
    }
  }
}

export function registerManageWarehouseTool(server: McpServer, context: CatalogContext): void {
  server.tool(
    'manage_warehouse',
    'Write operations for warehouses: create, delete, rename, activate, deactivate, protect and unprotect. Delete refuses warehouses with unfinished tasks; protected or non-empty warehouses need force.',
    manageWarehouseSchema.shape,
    async (params) => {
      try {
        return toToolResult(handleManageWarehouse(context, params));
      } catch (error) {
        return toToolResult(createUnexpectedErrorResponse('Internal error', error));
      }
    }
  );
}

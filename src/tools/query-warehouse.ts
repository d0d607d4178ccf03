import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { CatalogContext } from '../bootstrap';
import { WarehouseIdNotFound } from '../domain/errors';
import {
  compareWarehouseStatus,
  projectIdSchema,
  WarehouseStatus,
  warehouseIdSchema,
  warehouseStatusSchema,
} from '../domain/types';
import { CatalogGetWarehouseByIdError } from '../domain/warehouse-errors';
import {
  type ToolResponse,
  createBadRequestResponse,
  createCatalogErrorResponse,
  createSuccessResponse,
  createUnexpectedErrorResponse,
  toToolResult,
} from './registry';

export const queryWarehouseSchema = z.object({
  operation: z.enum(['get', 'list']),
  warehouseId: warehouseIdSchema.optional().describe('Required for get.'),
  projectId: projectIdSchema.optional().describe('Required for list.'),
  includeInactive: z.boolean().optional().describe('For get: also return inactive warehouses.'),
  statuses: z
    .array(warehouseStatusSchema)
    .optional()
    .describe('For list: statuses to include. Defaults to ["active"]. An empty list matches nothing.'),
});

export type QueryWarehouseParams = z.infer<typeof queryWarehouseSchema>;

export function handleQueryWarehouse(context: CatalogContext, params: QueryWarehouseParams): ToolResponse {
  const { service, state } = context;

  if (params.operation === 'get') {
    const warehouseId = params.warehouseId;
    if (!warehouseId) {
      return createBadRequestResponse('warehouseId is required for get operation');
    }

    if (!params.includeInactive) {
      const result = service.requireWarehouseById(warehouseId, state);
      if (!result.success) {
        return createCatalogErrorResponse('Failed to get warehouse', result.error);
      }
      return createSuccessResponse('Warehouse retrieved successfully', { warehouse: result.data });
    }

    const result = service.getWarehouseByIdAnyStatus(warehouseId, state);
    if (!result.success) {
      return createCatalogErrorResponse('Failed to get warehouse', result.error);
    }
    if (result.data === null) {
      return createCatalogErrorResponse(
        'Failed to get warehouse',
        new CatalogGetWarehouseByIdError(new WarehouseIdNotFound(warehouseId))
      );
    }
    return createSuccessResponse('Warehouse retrieved successfully', { warehouse: result.data });
  }

  if (!params.projectId) {
    return createBadRequestResponse('projectId is required for list operation');
  }

  const statuses = params.statuses && [...new Set(params.statuses)].sort(compareWarehouseStatus);
  const result = service.listWarehouses(params.projectId, statuses, state);
  if (!result.success) {
    return createCatalogErrorResponse('Failed to list warehouses', result.error);
  }
  return createSuccessResponse(`Found ${result.data.length} warehouse(s)`, {
    warehouses: result.data,
    count: result.data.length,
    statuses: statuses ?? [WarehouseStatus.ACTIVE],
  });
}

export function registerQueryWarehouseTool(server: McpServer, context: CatalogContext): void {
  server.tool(
    'query_warehouse',
    'Read operations for warehouses. get returns one warehouse by id (active only unless includeInactive). list returns the warehouses of a project ordered by name.',
    queryWarehouseSchema.shape,
    async (params) => {
      try {
        return toToolResult(handleQueryWarehouse(context, params));
      } catch (error) {
        return toToolResult(createUnexpectedErrorResponse('Internal error', error));
      }
    }
  );
}

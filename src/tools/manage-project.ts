import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { CatalogContext } from '../bootstrap';
import { ProjectIdNotFoundError } from '../domain/errors';
import { projectIdSchema } from '../domain/types';
import { createProject, getProject } from '../repos/projects';
import {
  type ToolResponse,
  createBadRequestResponse,
  createCatalogErrorResponse,
  createSuccessResponse,
  createUnexpectedErrorResponse,
  toToolResult,
} from './registry';

export const manageProjectSchema = z.object({
  operation: z.enum(['create', 'get']),
  projectId: projectIdSchema
    .optional()
    .describe('Required for get. Optional for create: a fresh id is generated when omitted.'),
  name: z.string().optional().describe('Project name. Required for create.'),
});

export type ManageProjectParams = z.infer<typeof manageProjectSchema>;

export function handleManageProject(context: CatalogContext, params: ManageProjectParams): ToolResponse {
  const db = context.state.db;

  if (params.operation === 'create') {
    const name = params.name?.trim();
    if (!name) {
      return createBadRequestResponse('name is required for create operation');
    }

    const result = createProject(db, { name, id: params.projectId });
    if (!result.success) {
      return createCatalogErrorResponse('Failed to create project', result.error);
    }
    return createSuccessResponse('Project created successfully', { project: result.data });
  }

  const projectId = params.projectId;
  if (!projectId) {
    return createBadRequestResponse('projectId is required for get operation');
  }

  const result = getProject(db, projectId);
  if (!result.success) {
    return createCatalogErrorResponse('Failed to get project', result.error);
  }
  if (result.data === null) {
    return createCatalogErrorResponse('Failed to get project', new ProjectIdNotFoundError(projectId));
  }
  return createSuccessResponse('Project retrieved successfully', { project: result.data });
}

export function registerManageProjectTool(server: McpServer, context: CatalogContext): void {
  server.tool(
    'manage_project',
    'Create a project or look one up by id. Warehouses always belong to a project.',
    manageProjectSchema.shape,
    async (params) => {
      try {
        return toToolResult(handleManageProject(context, params));
      } catch (error) {
        return toToolResult(createUnexpectedErrorResponse('Internal error', error));
      }
    }
  );
}

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { CatalogBackendError, classifyBackendError, renderErrorChain } from '../domain/backend-error';
import { renderContextStack } from '../domain/error-stack';
import { WarehouseOperationError } from '../domain/warehouse-errors';
import {
  type CatalogDomainError,
  type ErrorModel,
  type ErrorResponse,
  badRequest,
  toErrorModel,
  toErrorResponse,
} from '../protocol/error-model';

export const SERVER_NAME = 'warehouse-catalog';
export const SERVER_VERSION = '1.0.0';

// --- Standard response format ---
export interface ToolResponse {
  success: boolean;
  message: string;
  data?: unknown;
  error?: ErrorResponse['error'];
  metadata: {
    timestamp: string;
    version: string;
  };
}

function metadata(): ToolResponse['metadata'] {
  return {
    timestamp: new Date().toISOString(),
    version: SERVER_VERSION,
  };
}

export function createSuccessResponse(message: string, data: unknown): ToolResponse {
  return {
    success: true,
    message,
    data,
    metadata: metadata(),
  };
}

function logServerError(model: ErrorModel, error?: CatalogDomainError): void {
  if (model.code < 500) return;

  console.error(`[warehouse-catalog] ${model.code} ${model.type}: ${model.message}`);
  if (error instanceof CatalogBackendError) {
    console.error(error.render());
  } else if (model.source) {
    console.error(renderErrorChain(model.source));
  } else if (model.stack.length > 0) {
    console.error(renderContextStack(model.stack));
  }
}

/**
 * Wrap a wire error model into a failed tool response. 5xx errors are logged
 * with their source; the source never leaves the process.
 */
export function createErrorResponse(message: string, model: ErrorModel, error?: CatalogDomainError): ToolResponse {
  logServerError(model, error);
  return {
    success: false,
    message,
    error: toErrorResponse(model).error,
    metadata: metadata(),
  };
}

/** Failed tool response for a catalog error, translated into its wire record. */
export function createCatalogErrorResponse(
  message: string,
  error: CatalogDomainError | WarehouseOperationError<CatalogDomainError>
): ToolResponse {
  const domainError = error instanceof WarehouseOperationError ? error.error : error;
  return createErrorResponse(message, toErrorModel(domainError), domainError);
}

export function createBadRequestResponse(message: string): ToolResponse {
  return createErrorResponse(message, badRequest(message));
}

/** Failed tool response for an exception that escaped the catalog layers. */
export function createUnexpectedErrorResponse(message: string, error: unknown): ToolResponse {
  return createCatalogErrorResponse(message, classifyBackendError(error));
}

export function toToolResult(response: ToolResponse): CallToolResult {
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify(response, null, 2),
      },
    ],
  };
}

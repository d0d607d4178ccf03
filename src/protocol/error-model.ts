/**
 * Translation of catalog errors into the uniform wire error record.
 *
 * The wire record is the only error representation serialized across a
 * protocol boundary. Native causes are attached to the model for logging and
 * only where diagnostically necessary (serialization failures).
 */

import { CatalogBackendError, CatalogBackendErrorType } from '../domain/backend-error';
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
import { WarehouseOperationError } from '../domain/warehouse-errors';

export const StatusCode = {
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  INTERNAL_SERVER_ERROR: 500,
} as const;

export interface ErrorModel {
  /** Machine-readable error type tag */
  type: string;
  code: number;
  message: string;
  stack: string[];
  source?: Error;
}

export interface ErrorResponse {
  error: Omit<ErrorModel, 'source'>;
}

export type CatalogDomainError =
  | CatalogBackendError
  | DatabaseIntegrityError
  | WarehouseIdNotFound
  | WarehouseAlreadyExists
  | ProjectIdNotFoundError
  | StorageProfileSerializationError
  | WarehouseHasUnfinishedTasks
  | WarehouseNotEmpty
  | WarehouseProtected;

function backendErrorModel(error: CatalogBackendError): ErrorModel {
  // Eventually this should become 503, however older protocol clients
  // retry 503 automatically, which can repeat side effects.
  const code =
    error.type === CatalogBackendErrorType.ConcurrentModification
      ? StatusCode.CONFLICT
      : StatusCode.INTERNAL_SERVER_ERROR;

  return {
    type: 'CatalogBackendError',
    code,
    message: `Catalog backend error (${error.type}): ${error.source.message}`,
    stack: [...error.contextStack],
  };
}

function conflict(type: string, error: CatalogDomainError): ErrorModel {
  return { type, code: StatusCode.CONFLICT, message: error.message, stack: [...error.contextStack] };
}

function domainErrorModel(error: CatalogDomainError): ErrorModel {
  switch (error._tag) {
    case 'CatalogBackendError':
      return backendErrorModel(error);
    case 'DatabaseIntegrityError':
      return {
        type: 'DatabaseIntegrityError',
        code: StatusCode.INTERNAL_SERVER_ERROR,
        message: `Database integrity error: ${error.message}`,
        stack: [...error.contextStack],
      };
    case 'WarehouseIdNotFound':
      return {
        type: 'WarehouseNotFound',
        code: StatusCode.NOT_FOUND,
        message: error.message,
        stack: [...error.contextStack],
      };
    case 'ProjectIdNotFoundError':
      return {
        type: 'ProjectNotFound',
        code: StatusCode.NOT_FOUND,
        message: error.message,
        stack: [...error.contextStack],
      };
    case 'StorageProfileSerializationError':
      return {
        type: 'StorageProfileSerializationError',
        code: StatusCode.INTERNAL_SERVER_ERROR,
        message: error.message,
        stack: [...error.contextStack],
        source: error.source,
      };
    case 'WarehouseAlreadyExists':
      return conflict('WarehouseAlreadyExists', error);
    case 'WarehouseHasUnfinishedTasks':
      return conflict('WarehouseHasUnfinishedTasks', error);
    case 'WarehouseNotEmpty':
      return conflict('WarehouseNotEmpty', error);
    case 'WarehouseProtected':
      return conflict('WarehouseProtected', error);
    default: {
      const unhandled: never = error;
      throw new Error(`Unhandled catalog error: ${String(unhandled)}`);
    }
  }
}

export function toErrorModel(error: CatalogDomainError | WarehouseOperationError<CatalogDomainError>): ErrorModel {
  return domainErrorModel(error instanceof WarehouseOperationError ? error.error : error);
}

export function badRequest(message: string): ErrorModel {
  return { type: 'BadRequest', code: StatusCode.BAD_REQUEST, message, stack: [] };
}

export function toErrorResponse(model: ErrorModel): ErrorResponse {
  return {
    error: {
      message: model.message,
      type: model.type,
      code: model.code,
      stack: model.stack,
    },
  };
}

import { CatalogError, renderContextStack } from './error-stack';

export enum CatalogBackendErrorType {
  Unexpected = 'Unexpected',
  /** A write lost a race against another writer; the caller may retry. */
  ConcurrentModification = 'ConcurrentModification',
}

// SQLite reports lock conflicts with these primary result codes
// (extended codes such as SQLITE_BUSY_SNAPSHOT share the prefix).
const CONCURRENT_MODIFICATION_CODES = ['SQLITE_BUSY', 'SQLITE_LOCKED'];

function toError(source: unknown): Error {
  return source instanceof Error ? source : new Error(String(source));
}

function errorCode(error: Error): string | undefined {
  const code: unknown = 'code' in error ? error.code : undefined;
  return typeof code === 'string' ? code : undefined;
}

/**
 * Renders an error followed by its `cause` chain, one entry per link.
 * The walk stops at the first cause already rendered (or listed in `seen`).
 */
export function renderErrorChain(error: Error, seen: Iterable<unknown> = []): string {
  const visited = new Set<unknown>(seen);
  visited.add(error);
  let output = `${error.message}\n\n`;
  let current: unknown = error.cause;
  while (current !== undefined && current !== null && !visited.has(current)) {
    visited.add(current);
    const cause = toError(current);
    output += `Caused by:\n\t${cause.message}\n`;
    current = cause.cause;
  }
  return output;
}

export class CatalogBackendError extends CatalogError {
  readonly _tag = 'CatalogBackendError' as const;
  readonly type: CatalogBackendErrorType;
  readonly source: Error;

  constructor(source: unknown, type: CatalogBackendErrorType) {
    const error = toError(source);
    super(`CatalogBackendError (${type}): ${error.message}`, { cause: error });
    this.name = 'CatalogBackendError';
    this.type = type;
    this.source = error;
  }

  static unexpected(source: unknown): CatalogBackendError {
    return new CatalogBackendError(source, CatalogBackendErrorType.Unexpected);
  }

  static concurrentModification(source: unknown): CatalogBackendError {
    return new CatalogBackendError(source, CatalogBackendErrorType.ConcurrentModification);
  }

  /**
   * Two backend errors are equal when they carry the same classification,
   * the same context and a source with the same message.
   */
  equals(other: CatalogBackendError): boolean {
    return (
      this.type === other.type &&
      this.contextStack.length === other.contextStack.length &&
      this.contextStack.every((detail, index) => detail === other.contextStack[index]) &&
      this.source.message === other.source.message
    );
  }

  /** Operator-facing rendering; not the wire representation. */
  render(): string {
    let output = `CatalogBackendError (${this.type}): ${this.source.message}\n`;
    output += renderContextStack(this.contextStack);
    if (this.source.cause !== undefined && this.source.cause !== null) {
      output += 'Caused by:\n';
      output += renderErrorChain(toError(this.source.cause), [this.source]);
    }
    return output;
  }

  override toString(): string {
    return this.render();
  }
}

/**
 * Classify an arbitrary storage failure. Lock conflicts become
 * ConcurrentModification; anything else is Unexpected.
 */
export function classifyBackendError(error: unknown): CatalogBackendError {
  if (error instanceof CatalogBackendError) return error;

  const source = toError(error);
  const code = errorCode(source);
  if (code && CONCURRENT_MODIFICATION_CODES.some(prefix => code.startsWith(prefix))) {
    return CatalogBackendError.concurrentModification(source);
  }
  return CatalogBackendError.unexpected(source);
}

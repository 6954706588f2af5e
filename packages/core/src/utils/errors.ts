/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Error taxonomy for the context provider.
 *
 * Configuration errors are raised at construction. Connection, store and
 * timeout errors come from the graph store boundary. Conflict errors guard
 * per-operation thread scoping.
 */

export type GraphContextErrorCode =
  | 'CONFIGURATION'
  | 'CONNECTION'
  | 'NOT_CONNECTED'
  | 'CONFLICT'
  | 'STORE_QUERY'
  | 'VECTOR_INDEX_UNSUPPORTED'
  | 'STORE_TIMEOUT'
  | 'EMBEDDING';

/**
 * Base class for every error raised by this package.
 */
export class GraphContextError extends Error {
  readonly code: GraphContextErrorCode;

  constructor(
    code: GraphContextErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Invalid or missing option. Fatal to the instance. */
export class ConfigurationError extends GraphContextError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION', message, options);
  }
}

/** Authentication failure or unreachable store. */
export class ConnectionError extends GraphContextError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECTION', message, options);
  }
}

export class NotConnectedError extends GraphContextError {
  constructor(operation: string) {
    super(
      'NOT_CONNECTED',
      `Cannot ${operation}: provider is not connected. Call connect() first.`,
    );
  }
}

/** A second, distinct thread id was seen by a provider scoped per operation. */
export class ConflictError extends GraphContextError {
  constructor(message: string) {
    super('CONFLICT', message);
  }
}

/**
 * The store rejected a statement.
 */
export class StoreQueryError extends GraphContextError {
  /** Driver error code, when the store reported one */
  readonly storeCode?: string;

  constructor(
    message: string,
    options?: { cause?: unknown; storeCode?: string },
    code: GraphContextErrorCode = 'STORE_QUERY',
  ) {
    super(code, message, { cause: options?.cause });
    this.storeCode = options?.storeCode;
  }
}

export class VectorIndexUnsupportedError extends StoreQueryError {
  constructor(original: unknown) {
    super(
      `Vector index creation failed: this Neo4j version does not support vector indexes (5.11+ required). Original error: ${getErrorMessage(original)}`,
      {
        cause: original,
        storeCode:
          original instanceof StoreQueryError ? original.storeCode : undefined,
      },
      'VECTOR_INDEX_UNSUPPORTED',
    );
  }
}

export class StoreTimeoutError extends GraphContextError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('STORE_TIMEOUT', `Store call timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class EmbeddingError extends GraphContextError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EMBEDDING', message, options);
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return String(error);
  } catch {
    return 'Unknown error';
  }
}

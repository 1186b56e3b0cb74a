/**
 * Error types for qshape
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

import type { QueryError, QueryErrorKind } from "./types.js";

/**
 * One-line summary of a violation: `<kind> at <path>: <message>`
 */
export function formatQueryError(error: QueryError): string {
  return `${error.kind} at ${error.path === "" ? "<root>" : error.path}: ${error.message}`;
}

/**
 * Base class for all qshape errors
 */
export abstract class QShapeError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a raw query violates the query grammar
 */
export class QueryValidationError extends QShapeError {
  readonly code = "E_QUERY_SHAPE";

  constructor(
    public readonly kind: QueryErrorKind,
    public readonly path: string,
    public readonly detail: string,
    options?: ErrorOptions
  ) {
    super(formatQueryError({ kind, path, message: detail }), options);
  }

  /**
   * Plain value form, as returned by validate()
   */
  toQueryError(): QueryError {
    return { kind: this.kind, path: this.path, message: this.detail };
  }
}

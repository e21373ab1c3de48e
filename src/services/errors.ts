/**
 * Query error taxonomy
 *
 * Connector-internal transient failures are retried by the HTTP client and
 * only surface here after exhaustion. Everything else surfaces immediately
 * and is converted into a structured failure result at the engine boundary.
 */

import { ErrorContext, QueryErrorCode } from '../types/query-error';
import { QueryFailure } from '../types/query';

/**
 * Base class for all errors raised on the query path
 */
export class QueryError extends Error {
  constructor(
    message: string,
    public readonly code: QueryErrorCode,
    public readonly context: ErrorContext = {}
  ) {
    super(message);
    this.name = 'QueryError';
  }
}

/**
 * Missing or invalid connector / stored query configuration. Never retried.
 */
export class ConfigurationError extends QueryError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

/**
 * Connector could not establish a session
 */
export class ConnectionError extends QueryError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'CONNECTION_ERROR', context);
    this.name = 'ConnectionError';
  }
}

/**
 * Upstream API answered with a non-2xx status, or could not be reached,
 * after the retry budget was spent
 */
export class UpstreamError extends QueryError {
  constructor(
    message: string,
    context: ErrorContext,
    public readonly statusCode?: number,
    public readonly retryable: boolean = false,
    public readonly retryAfterMs?: number,
    public readonly detail?: unknown
  ) {
    super(message, 'UPSTREAM_ERROR', context);
    this.name = 'UpstreamError';
  }
}

/**
 * Missing or invalid query parameter. Never retried.
 */
export class ValidationError extends QueryError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'VALIDATION_ERROR', context);
    this.name = 'ValidationError';
  }
}

/**
 * A source's table lacks one or more join keys; aborts the whole federation call
 */
export class JoinError extends QueryError {
  constructor(
    message: string,
    public readonly missingKeys: string[],
    context: ErrorContext = {}
  ) {
    super(message, 'JOIN_ERROR', context);
    this.name = 'JoinError';
  }
}

export class NotFoundError extends QueryError {
  constructor(resourceType: string, resourceId: string, context: ErrorContext = {}) {
    super(`${resourceType} not found: ${resourceId}`, 'NOT_FOUND', context);
    this.name = 'NotFoundError';
  }
}

export class InactiveError extends QueryError {
  constructor(resourceType: string, resourceId: string, context: ErrorContext = {}) {
    super(`${resourceType} is not active: ${resourceId}`, 'INACTIVE', context);
    this.name = 'InactiveError';
  }
}

export class ConflictError extends QueryError {
  constructor(resourceType: string, resourceId: string, context: ErrorContext = {}) {
    super(`${resourceType} already exists: ${resourceId}`, 'CONFLICT', context);
    this.name = 'ConflictError';
  }
}

/**
 * Extract a readable message from any thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Normalize any thrown value into a QueryError
 */
export function toQueryError(error: unknown, context: ErrorContext = {}): QueryError {
  if (error instanceof QueryError) {
    return error;
  }
  return new QueryError(errorMessage(error), 'INTERNAL_ERROR', context);
}

/**
 * Convert any thrown value into a structured failure result.
 * Context carried by the error wins over the caller's context.
 */
export function toFailure(error: unknown, context: ErrorContext = {}): QueryFailure {
  const queryError = toQueryError(error, context);
  const sourceId = queryError.context.sourceId ?? context.sourceId;
  const queryId = queryError.context.queryId ?? context.queryId;
  return {
    success: false,
    error: queryError.message,
    errorCode: queryError.code,
    ...(sourceId !== undefined && { sourceId }),
    ...(queryId !== undefined && { queryId })
  };
}

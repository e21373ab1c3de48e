/**
 * Error classification for federated queries
 */

/**
 * Error codes carried by structured failure results
 * - CONFIGURATION_ERROR: missing or invalid connector / stored query config
 * - CONNECTION_ERROR: connector could not establish a session
 * - UPSTREAM_ERROR: non-2xx response after retries
 * - VALIDATION_ERROR: missing or invalid query parameter
 * - JOIN_ERROR: a source's table lacks a join key
 * - NOT_FOUND: unknown stored query or source
 * - INACTIVE: stored query or source is disabled
 * - CONFLICT: an item with the same id already exists
 * - INTERNAL_ERROR: anything unclassified
 */
export type QueryErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'CONNECTION_ERROR'
  | 'UPSTREAM_ERROR'
  | 'VALIDATION_ERROR'
  | 'JOIN_ERROR'
  | 'NOT_FOUND'
  | 'INACTIVE'
  | 'CONFLICT'
  | 'INTERNAL_ERROR';

/**
 * Context attached to errors so failures are actionable without a stack trace
 */
export interface ErrorContext {
  sourceId?: string;
  queryId?: string;
}

/**
 * Retry policy for outbound HTTP calls
 */
export interface RetryConfig {
  /** Total number of attempts */
  maxRetries: number;
  /** Base delay for exponential backoff */
  retryDelayMs: number;
}

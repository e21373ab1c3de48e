import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { isPlainObject } from '../adapters/connectors/base-connector';
import { getRuntime } from './runtime';
import {
  errorResponse,
  handleError,
  missingParameter,
  optionsResponse,
  parseBody,
  successResponse
} from './common';

/**
 * Cache and engine status handlers
 *
 * - GET /stats - Cache statistics and loaded sources
 * - DELETE /cache/{sourceId} - Invalidate a source, or one entry when the
 *   body carries its parameters
 * - POST /cache/purge - Remove expired entries
 * - GET /health - Liveness
 */

/**
 * GET /stats
 */
export async function getStats(): Promise<APIGatewayProxyResult> {
  try {
    const stats = await getRuntime().engine.getStats();
    return successResponse(stats);
  } catch (error) {
    return handleError(error, 'getting stats');
  }
}

/**
 * DELETE /cache/{sourceId}
 */
export async function invalidateCache(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const sourceId = event.pathParameters?.sourceId;
    if (!sourceId) {
      return missingParameter('sourceId');
    }

    const body = parseBody(event);
    const parameters = isPlainObject(body) && isPlainObject(body.parameters) ? body.parameters : undefined;
    const removed = await getRuntime().cache.invalidate(sourceId, parameters);
    return successResponse({ sourceId, removed });
  } catch (error) {
    return handleError(error, 'invalidating cache');
  }
}

/**
 * POST /cache/purge
 */
export async function purgeExpired(): Promise<APIGatewayProxyResult> {
  try {
    const removed = await getRuntime().cache.purgeExpired();
    return successResponse({ removed });
  } catch (error) {
    return handleError(error, 'purging cache');
  }
}

export function health(): APIGatewayProxyResult {
  return successResponse({ status: 'ok', timestamp: new Date().toISOString() });
}

/**
 * Main handler that routes requests based on HTTP method and path
 */
export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  if (event.httpMethod === 'OPTIONS') {
    return optionsResponse();
  }

  const path = event.path;
  const method = event.httpMethod;

  if (method === 'GET' && path === '/health') {
    return health();
  }
  if (method === 'GET' && path === '/stats') {
    return getStats();
  }
  if (method === 'POST' && path === '/cache/purge') {
    return purgeExpired();
  }
  if (method === 'DELETE' && path.match(/^\/cache\/[^/]+$/)) {
    return invalidateCache(event);
  }

  return errorResponse(404, 'Route not found', 'NOT_FOUND');
}

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { ConnectorConfig } from '../types/connector';
import { getRuntime } from './runtime';
import {
  errorResponse,
  handleError,
  invalidBody,
  missingParameter,
  optionsResponse,
  parseBody,
  successResponse,
  validationFailed
} from './common';

/**
 * Data Source API Handlers
 *
 * Implements endpoints for connector configuration management:
 * - GET /sources - List source configurations
 * - GET /sources/types - List registered connector types
 * - GET /sources/live - List loaded connectors with capabilities
 * - GET /sources/{sourceId} - Get a source configuration
 * - POST /sources - Create a source configuration
 * - PUT /sources/{sourceId} - Update a source configuration
 * - DELETE /sources/{sourceId} - Delete a source configuration
 * - POST /sources/{sourceId}/validate - Issue a live check against the source
 */

/**
 * Credentials never leave the service
 */
function redact(config: ConnectorConfig): Omit<ConnectorConfig, 'credentials'> & { hasCredentials: boolean } {
  const { credentials, ...rest } = config;
  return { ...rest, hasCredentials: credentials !== undefined && Object.keys(credentials).length > 0 };
}

/**
 * GET /sources
 */
export async function listSources(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const activeOnly = event.queryStringParameters?.activeOnly === 'true';
    const configs = await getRuntime().configStore.getAll(activeOnly);
    return successResponse({ sources: configs.map(redact), count: configs.length });
  } catch (error) {
    return handleError(error, 'listing sources');
  }
}

/**
 * GET /sources/types
 */
export async function listConnectorTypes(): Promise<APIGatewayProxyResult> {
  return successResponse({ types: getRuntime().manager.listTypes() });
}

/**
 * GET /sources/live
 */
export async function listLiveSources(): Promise<APIGatewayProxyResult> {
  try {
    const { manager } = getRuntime();
    const summary = await manager.loadAll();
    return successResponse({ sources: manager.listSources(), failed: summary.failed });
  } catch (error) {
    return handleError(error, 'loading sources');
  }
}

/**
 * GET /sources/{sourceId}
 */
export async function getSource(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const sourceId = event.pathParameters?.sourceId;
    if (!sourceId) {
      return missingParameter('sourceId');
    }

    const config = await getRuntime().configStore.getBySourceId(sourceId);
    if (!config) {
      return errorResponse(404, `Connector not found: ${sourceId}`, 'NOT_FOUND');
    }
    return successResponse(redact(config));
  } catch (error) {
    return handleError(error, 'getting source');
  }
}

/**
 * POST /sources
 */
export async function createSource(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const body = parseBody(event);
    if (body === undefined) {
      return invalidBody();
    }

    const { configStore, validator } = getRuntime();
    const validation = validator.validateConnectorConfig(body);
    if (!validation.valid) {
      return validationFailed(validation.errors);
    }

    const created = await configStore.create({ ...validation.value, active: validation.value.active ?? true });
    console.log('[Sources] Created source', { sourceId: created.sourceId, connectorType: created.connectorType });
    return successResponse(redact(created), 201);
  } catch (error) {
    return handleError(error, 'creating source');
  }
}

/**
 * PUT /sources/{sourceId}
 */
export async function updateSource(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const sourceId = event.pathParameters?.sourceId;
    if (!sourceId) {
      return missingParameter('sourceId');
    }

    const body = parseBody(event);
    if (body === undefined) {
      return invalidBody();
    }

    const { configStore, manager, validator } = getRuntime();
    const validation = validator.validateConnectorConfigUpdate(body);
    if (!validation.valid) {
      return validationFailed(validation.errors);
    }

    const updated = await configStore.update(sourceId, validation.value);
    await manager.evict(sourceId);
    return successResponse(redact(updated));
  } catch (error) {
    return handleError(error, 'updating source');
  }
}

/**
 * DELETE /sources/{sourceId}
 */
export async function deleteSource(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const sourceId = event.pathParameters?.sourceId;
    if (!sourceId) {
      return missingParameter('sourceId');
    }

    const { configStore, manager, cache } = getRuntime();
    await configStore.delete(sourceId);
    await manager.evict(sourceId);
    const invalidated = await cache.invalidate(sourceId);
    return successResponse({ deleted: true, sourceId, invalidatedCacheEntries: invalidated });
  } catch (error) {
    return handleError(error, 'deleting source');
  }
}

/**
 * POST /sources/{sourceId}/validate
 */
export async function validateSource(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const sourceId = event.pathParameters?.sourceId;
    if (!sourceId) {
      return missingParameter('sourceId');
    }
    const result = await getRuntime().manager.validateConnector(sourceId);
    return successResponse(result);
  } catch (error) {
    return handleError(error, 'validating source');
  }
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

  if (method === 'GET' && path === '/sources') {
    return listSources(event);
  }
  if (method === 'POST' && path === '/sources') {
    return createSource(event);
  }
  if (method === 'GET' && path === '/sources/types') {
    return listConnectorTypes();
  }
  if (method === 'GET' && path === '/sources/live') {
    return listLiveSources();
  }
  if (method === 'POST' && path.match(/^\/sources\/[^/]+\/validate$/)) {
    return validateSource(event);
  }
  if (method === 'GET' && path.match(/^\/sources\/[^/]+$/)) {
    return getSource(event);
  }
  if (method === 'PUT' && path.match(/^\/sources\/[^/]+$/)) {
    return updateSource(event);
  }
  if (method === 'DELETE' && path.match(/^\/sources\/[^/]+$/)) {
    return deleteSource(event);
  }

  return errorResponse(404, 'Route not found', 'NOT_FOUND');
}

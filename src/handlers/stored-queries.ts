import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { StoredQueryFilter } from '../types/stored-query';
import { getRuntime } from './runtime';
import {
  errorResponse,
  failureResponse,
  handleError,
  invalidBody,
  missingParameter,
  optionsResponse,
  parseBody,
  successResponse,
  validationFailed
} from './common';

/**
 * Stored Query API Handlers
 *
 * - GET /stored-queries - List stored queries (?connectorId, ?activeOnly, ?tags=a,b)
 * - GET /stored-queries/search?term= - Search by name or description
 * - GET /stored-queries/{queryId} - Get a stored query
 * - POST /stored-queries - Create a stored query
 * - PUT /stored-queries/{queryId} - Update a stored query
 * - DELETE /stored-queries/{queryId} - Delete a stored query
 * - POST /stored-queries/{queryId}/tags/{tag} - Add a tag
 * - DELETE /stored-queries/{queryId}/tags/{tag} - Remove a tag
 * - POST /stored-queries/{queryId}/execute - Execute with overrides
 */

/**
 * GET /stored-queries
 */
export async function listStoredQueries(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const params = event.queryStringParameters ?? {};
    const filter: StoredQueryFilter = {
      activeOnly: params.activeOnly === 'true'
    };
    if (params.connectorId) filter.connectorId = params.connectorId;
    if (params.tags) filter.tags = params.tags.split(',').map(tag => tag.trim()).filter(Boolean);

    const queries = await getRuntime().engine.listStoredQueries(filter);
    return successResponse({ queries, count: queries.length });
  } catch (error) {
    return handleError(error, 'listing stored queries');
  }
}

/**
 * GET /stored-queries/search
 */
export async function searchStoredQueries(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const term = event.queryStringParameters?.term;
    if (!term) {
      return missingParameter('term');
    }
    const queries = await getRuntime().catalog.search(term);
    return successResponse({ queries, count: queries.length });
  } catch (error) {
    return handleError(error, 'searching stored queries');
  }
}

/**
 * GET /stored-queries/{queryId}
 */
export async function getStoredQuery(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const queryId = event.pathParameters?.queryId;
    if (!queryId) {
      return missingParameter('queryId');
    }

    const query = await getRuntime().engine.getStoredQuery(queryId);
    if (!query) {
      return errorResponse(404, `Stored query not found: ${queryId}`, 'NOT_FOUND');
    }
    return successResponse(query);
  } catch (error) {
    return handleError(error, 'getting stored query');
  }
}

/**
 * POST /stored-queries
 */
export async function createStoredQuery(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const body = parseBody(event);
    if (body === undefined) {
      return invalidBody();
    }

    const { catalog, validator } = getRuntime();
    const validation = validator.validateStoredQueryInput(body);
    if (!validation.valid) {
      return validationFailed(validation.errors);
    }

    const created = await catalog.create(validation.value);
    return successResponse(created, 201);
  } catch (error) {
    return handleError(error, 'creating stored query');
  }
}

/**
 * PUT /stored-queries/{queryId}
 */
export async function updateStoredQuery(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const queryId = event.pathParameters?.queryId;
    if (!queryId) {
      return missingParameter('queryId');
    }

    const body = parseBody(event);
    if (body === undefined) {
      return invalidBody();
    }

    const { catalog, validator } = getRuntime();
    const validation = validator.validateStoredQueryUpdate(body);
    if (!validation.valid) {
      return validationFailed(validation.errors);
    }

    const updated = await catalog.update(queryId, validation.value);
    return successResponse(updated);
  } catch (error) {
    return handleError(error, 'updating stored query');
  }
}

/**
 * DELETE /stored-queries/{queryId}
 */
export async function deleteStoredQuery(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const queryId = event.pathParameters?.queryId;
    if (!queryId) {
      return missingParameter('queryId');
    }

    const removed = await getRuntime().catalog.delete(queryId);
    if (!removed) {
      return errorResponse(404, `Stored query not found: ${queryId}`, 'NOT_FOUND');
    }
    return successResponse({ deleted: true, queryId });
  } catch (error) {
    return handleError(error, 'deleting stored query');
  }
}

/**
 * POST|DELETE /stored-queries/{queryId}/tags/{tag}
 */
export async function changeTag(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const queryId = event.pathParameters?.queryId;
    const tag = event.pathParameters?.tag;
    if (!queryId || !tag) {
      return missingParameter(queryId ? 'tag' : 'queryId');
    }

    const { catalog } = getRuntime();
    const updated = event.httpMethod === 'DELETE'
      ? await catalog.removeTag(queryId, tag)
      : await catalog.addTag(queryId, tag);
    return successResponse(updated);
  } catch (error) {
    return handleError(error, 'changing stored query tags');
  }
}

/**
 * POST /stored-queries/{queryId}/execute
 */
export async function executeStoredQuery(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const queryId = event.pathParameters?.queryId;
    if (!queryId) {
      return missingParameter('queryId');
    }

    const body = event.body ? parseBody(event) : {};
    if (body === undefined) {
      return invalidBody();
    }

    const { engine, validator } = getRuntime();
    const validation = validator.validateStoredQueryExecution(body);
    if (!validation.valid) {
      return validationFailed(validation.errors);
    }

    const result = await engine.executeStoredQuery(queryId, validation.value);
    return result.success ? successResponse(result) : failureResponse(result);
  } catch (error) {
    return handleError(error, 'executing stored query');
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

  if (method === 'GET' && path === '/stored-queries') {
    return listStoredQueries(event);
  }
  if (method === 'POST' && path === '/stored-queries') {
    return createStoredQuery(event);
  }
  if (method === 'GET' && path === '/stored-queries/search') {
    return searchStoredQueries(event);
  }
  if (method === 'POST' && path.match(/^\/stored-queries\/[^/]+\/execute$/)) {
    return executeStoredQuery(event);
  }
  if ((method === 'POST' || method === 'DELETE') && path.match(/^\/stored-queries\/[^/]+\/tags\/[^/]+$/)) {
    return changeTag(event);
  }
  if (method === 'GET' && path.match(/^\/stored-queries\/[^/]+$/)) {
    return getStoredQuery(event);
  }
  if (method === 'PUT' && path.match(/^\/stored-queries\/[^/]+$/)) {
    return updateStoredQuery(event);
  }
  if (method === 'DELETE' && path.match(/^\/stored-queries\/[^/]+$/)) {
    return deleteStoredQuery(event);
  }

  return errorResponse(404, 'Route not found', 'NOT_FOUND');
}

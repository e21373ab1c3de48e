import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { isPlainObject } from '../adapters/connectors/base-connector';
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
 * Query API Handlers
 *
 * - POST /queries/execute - Execute one query against one source
 * - POST /queries/multi - Execute independent queries against several sources
 * - POST /queries/validate - Check a query can be routed, without executing it
 * - POST /queries/table - Federate queries into one joined table
 * - POST /queries/analyze - Federate queries and run an analysis plan
 * - GET /queries/analyses/{planId} - Fetch a saved analysis result
 */

/**
 * POST /queries/execute
 */
export async function executeQuery(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const body = parseBody(event);
    if (body === undefined) {
      return invalidBody();
    }

    const { engine, validator } = getRuntime();
    const validation = validator.validateQueryRequest(body);
    if (!validation.valid) {
      return validationFailed(validation.errors);
    }

    const request = validation.value;
    const result = await engine.executeQuery(request.sourceId, request.parameters ?? {}, {
      useCache: request.useCache,
      queryId: request.queryId,
      dynamicParams: request.dynamicParams
    });
    return result.success ? successResponse(result) : failureResponse(result);
  } catch (error) {
    return handleError(error, 'executing query');
  }
}

/**
 * POST /queries/multi
 *
 * Always 200; each entry carries its own success flag.
 */
export async function executeMultiSourceQuery(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const body = parseBody(event);
    if (body === undefined) {
      return invalidBody();
    }

    const { engine, validator } = getRuntime();
    const validation = validator.validateMultiQueryRequest(body);
    if (!validation.valid) {
      return validationFailed(validation.errors);
    }

    const request = validation.value;
    const results = await engine.executeMultiSourceQuery(request.queries, request.useCache ?? true);
    if (!request.aggregate) {
      return successResponse({ results });
    }
    return successResponse({ results, aggregated: engine.aggregateResults(results, request.aggregate) });
  } catch (error) {
    return handleError(error, 'executing multi-source query');
  }
}

/**
 * POST /queries/validate
 */
export async function validateQuery(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const body = parseBody(event);
    if (!isPlainObject(body) || typeof body.sourceId !== 'string' || body.sourceId === '') {
      return errorResponse(400, 'sourceId is required', 'VALIDATION_FAILED', [
        { field: 'sourceId', code: 'REQUIRED', message: 'sourceId is required' }
      ]);
    }

    const result = await getRuntime().engine.validateQuery(body.sourceId, body.parameters ?? {});
    return successResponse(result);
  } catch (error) {
    return handleError(error, 'validating query');
  }
}

/**
 * POST /queries/table
 */
export async function executeQueriesToTable(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const body = parseBody(event);
    if (body === undefined) {
      return invalidBody();
    }

    const { engine, validator } = getRuntime();
    const validation = validator.validateFederationRequest(body);
    if (!validation.valid) {
      return validationFailed(validation.errors);
    }

    const request = validation.value;
    const table = await engine.executeQueriesToTable(
      request.queries,
      request.joinOn,
      request.how ?? 'inner',
      request.aggregation,
      request.useCache ?? true
    );
    return successResponse({ success: true, table, rowCount: table.rows.length });
  } catch (error) {
    return handleError(error, 'federating queries');
  }
}

/**
 * POST /queries/analyze
 */
export async function analyzeQueries(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const body = parseBody(event);
    if (body === undefined) {
      return invalidBody();
    }

    const { engine, validator } = getRuntime();
    const validation = validator.validateFederationRequest(body);
    if (!validation.valid) {
      return validationFailed(validation.errors);
    }

    const request = validation.value;
    if (!request.analysisPlan) {
      return errorResponse(400, 'analysisPlan is required', 'VALIDATION_FAILED', [
        { field: 'analysisPlan', code: 'REQUIRED', message: 'analysisPlan is required' }
      ]);
    }

    const outcome = await engine.analyzeQueries(
      request.queries,
      request.joinOn,
      request.analysisPlan,
      request.how ?? 'inner',
      request.aggregation,
      request.useCache ?? true,
      request.planId !== undefined
        ? { planId: request.planId, planName: request.planName, metadata: request.metadata }
        : undefined
    );
    return successResponse({ success: true, ...outcome });
  } catch (error) {
    return handleError(error, 'analyzing queries');
  }
}

/**
 * GET /queries/analyses/{planId}
 */
export async function getAnalysisResult(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const planId = event.pathParameters?.planId;
    if (!planId) {
      return missingParameter('planId');
    }

    const record = await getRuntime().engine.getAnalysisResult(planId);
    if (!record) {
      return errorResponse(404, `Analysis result not found: ${planId}`, 'NOT_FOUND');
    }
    return successResponse(record);
  } catch (error) {
    return handleError(error, 'fetching analysis result');
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

  if (method === 'POST' && path === '/queries/execute') {
    return executeQuery(event);
  }
  if (method === 'POST' && path === '/queries/multi') {
    return executeMultiSourceQuery(event);
  }
  if (method === 'POST' && path === '/queries/validate') {
    return validateQuery(event);
  }
  if (method === 'POST' && path === '/queries/table') {
    return executeQueriesToTable(event);
  }
  if (method === 'POST' && path === '/queries/analyze') {
    return analyzeQueries(event);
  }
  if (method === 'GET' && path.match(/^\/queries\/analyses\/[^/]+$/)) {
    return getAnalysisResult(event);
  }

  return errorResponse(404, 'Route not found', 'NOT_FOUND');
}

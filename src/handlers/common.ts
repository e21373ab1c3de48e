import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { ValidationError } from '../types/validation';
import { QueryErrorCode } from '../types/query-error';
import { QueryFailure } from '../types/query';
import { QueryError } from '../services/errors';
import { ResourceExistsError, ResourceNotFoundError } from '../db/access';

export const CORS_HEADERS = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,Authorization',
  'Access-Control-Allow-Methods': 'GET,POST,PUT,DELETE,OPTIONS'
};

interface ErrorResponseBody {
  error: string;
  code: string;
  details?: ValidationError[];
  sourceId?: string;
  queryId?: string;
}

const STATUS_BY_CODE: Record<QueryErrorCode, number> = {
  VALIDATION_ERROR: 400,
  JOIN_ERROR: 400,
  CONFIGURATION_ERROR: 400,
  NOT_FOUND: 404,
  INACTIVE: 409,
  CONFLICT: 409,
  UPSTREAM_ERROR: 502,
  CONNECTION_ERROR: 503,
  INTERNAL_ERROR: 500
};

export function statusForCode(code: QueryErrorCode): number {
  return STATUS_BY_CODE[code];
}

export function successResponse<T>(data: T, statusCode = 200): APIGatewayProxyResult {
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify(data)
  };
}

export function errorResponse(
  statusCode: number,
  message: string,
  code: string,
  details?: ValidationError[]
): APIGatewayProxyResult {
  const body: ErrorResponseBody = { error: message, code };
  if (details) body.details = details;
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify(body)
  };
}

export function optionsResponse(): APIGatewayProxyResult {
  return { statusCode: 200, headers: CORS_HEADERS, body: '' };
}

/**
 * Failure result of the engine as an error response
 */
export function failureResponse(failure: QueryFailure): APIGatewayProxyResult {
  const body: ErrorResponseBody = { error: failure.error, code: failure.errorCode };
  if (failure.sourceId !== undefined) body.sourceId = failure.sourceId;
  if (failure.queryId !== undefined) body.queryId = failure.queryId;
  return {
    statusCode: statusForCode(failure.errorCode),
    headers: CORS_HEADERS,
    body: JSON.stringify(body)
  };
}

/**
 * Known errors map to their status; anything else is logged and answered 500
 */
export function handleError(error: unknown, action: string): APIGatewayProxyResult {
  if (error instanceof QueryError) {
    return failureResponse({
      success: false,
      error: error.message,
      errorCode: error.code,
      ...(error.context.sourceId !== undefined && { sourceId: error.context.sourceId }),
      ...(error.context.queryId !== undefined && { queryId: error.context.queryId })
    });
  }
  if (error instanceof ResourceNotFoundError) {
    return errorResponse(404, error.message, 'NOT_FOUND');
  }
  if (error instanceof ResourceExistsError) {
    return errorResponse(409, error.message, 'CONFLICT');
  }

  console.error(`Error ${action}:`, error);
  return errorResponse(500, 'Internal server error', 'INTERNAL_ERROR');
}

/**
 * Parsed JSON body; undefined when absent or malformed
 */
export function parseBody(event: APIGatewayProxyEvent): unknown {
  if (!event.body) return undefined;
  try {
    const parsed: unknown = JSON.parse(event.body);
    return parsed;
  } catch {
    return undefined;
  }
}

export function invalidBody(): APIGatewayProxyResult {
  return errorResponse(400, 'Invalid request body', 'INVALID_BODY');
}

export function validationFailed(details: ValidationError[]): APIGatewayProxyResult {
  return errorResponse(400, 'Validation failed', 'VALIDATION_FAILED', details);
}

export function missingParameter(name: string): APIGatewayProxyResult {
  return errorResponse(400, `Missing ${name}`, 'MISSING_PARAMETER');
}

/**
 * Query string flag; absent means the fallback
 */
export function booleanParam(event: APIGatewayProxyEvent, name: string, fallback: boolean): boolean {
  const raw = event.queryStringParameters?.[name];
  if (raw === undefined) return fallback;
  return raw === 'true';
}

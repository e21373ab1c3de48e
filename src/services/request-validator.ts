/**
 * Request Validator
 *
 * Validates request bodies against the JSON schemas before they reach the
 * query engine. Errors carry the offending field path.
 */

import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import { ConnectorConfigInput, ConnectorConfigUpdate, QueryParameters } from '../types/connector';
import { CreateStoredQueryInput, StoredQueryUpdate } from '../types/stored-query';
import { AggregateResultsOptions, AggregationSpec, JoinHow, QuerySpec } from '../types/query';
import { AnalysisPlan } from '../types/analysis';
import { ValidationError } from '../types/validation';
import { ConnectorConfigSchema, ConnectorConfigUpdateSchema } from '../schemas/connector-config';
import { StoredQueryInputSchema, StoredQueryUpdateSchema } from '../schemas/stored-query';
import {
  FederationRequestSchema,
  MultiQueryRequestSchema,
  QueryRequestSchema,
  StoredQueryExecutionSchema
} from '../schemas/query-request';

export interface QueryRequest {
  sourceId: string;
  parameters?: QueryParameters;
  dynamicParams?: QueryParameters;
  useCache?: boolean;
  queryId?: string;
}

export interface MultiQueryRequest {
  queries: QuerySpec[];
  useCache?: boolean;
  /** Combine the successful results into one record list */
  aggregate?: AggregateResultsOptions;
}

export interface FederationRequest {
  queries: QuerySpec[];
  joinOn: string[];
  how?: JoinHow;
  aggregation?: AggregationSpec;
  useCache?: boolean;
  analysisPlan?: AnalysisPlan;
  /** Persist the analysis outcome under this id */
  planId?: string;
  planName?: string;
  metadata?: Record<string, unknown>;
}

export interface StoredQueryExecutionRequest {
  useCache?: boolean;
  overrides?: QueryParameters;
  dynamicParams?: QueryParameters;
}

export type RequestValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: ValidationError[] };

/**
 * Convert ajv errors into field-level validation errors
 */
function convertErrors(errors: ErrorObject[] | null | undefined): ValidationError[] {
  if (!errors) return [];

  return errors.map((error) => {
    const missing = error.keyword === 'required' ? error.params.missingProperty : undefined;
    const base = error.instancePath.replace(/^\//, '').replace(/\//g, '.');
    const field = typeof missing === 'string' ? [base, missing].filter(Boolean).join('.') : base || '/';
    return {
      field,
      message: error.message || 'Invalid value',
      code: error.keyword.toUpperCase()
    };
  });
}

export class RequestValidator {
  private readonly ajv: Ajv;
  private readonly connectorConfig: ValidateFunction<ConnectorConfigInput>;
  private readonly connectorConfigUpdate: ValidateFunction<ConnectorConfigUpdate>;
  private readonly storedQueryInput: ValidateFunction<CreateStoredQueryInput>;
  private readonly storedQueryUpdate: ValidateFunction<StoredQueryUpdate>;
  private readonly queryRequest: ValidateFunction<QueryRequest>;
  private readonly multiQueryRequest: ValidateFunction<MultiQueryRequest>;
  private readonly federationRequest: ValidateFunction<FederationRequest>;
  private readonly storedQueryExecution: ValidateFunction<StoredQueryExecutionRequest>;

  constructor() {
    this.ajv = new Ajv({ allErrors: true });
    this.connectorConfig = this.ajv.compile<ConnectorConfigInput>(ConnectorConfigSchema);
    this.connectorConfigUpdate = this.ajv.compile<ConnectorConfigUpdate>(ConnectorConfigUpdateSchema);
    this.storedQueryInput = this.ajv.compile<CreateStoredQueryInput>(StoredQueryInputSchema);
    this.storedQueryUpdate = this.ajv.compile<StoredQueryUpdate>(StoredQueryUpdateSchema);
    this.queryRequest = this.ajv.compile<QueryRequest>(QueryRequestSchema);
    this.multiQueryRequest = this.ajv.compile<MultiQueryRequest>(MultiQueryRequestSchema);
    this.federationRequest = this.ajv.compile<FederationRequest>(FederationRequestSchema);
    this.storedQueryExecution = this.ajv.compile<StoredQueryExecutionRequest>(StoredQueryExecutionSchema);
  }

  validateConnectorConfig(body: unknown): RequestValidationResult<ConnectorConfigInput> {
    return this.run(this.connectorConfig, body);
  }

  validateConnectorConfigUpdate(body: unknown): RequestValidationResult<ConnectorConfigUpdate> {
    return this.run(this.connectorConfigUpdate, body);
  }

  validateStoredQueryInput(body: unknown): RequestValidationResult<CreateStoredQueryInput> {
    return this.run(this.storedQueryInput, body);
  }

  validateStoredQueryUpdate(body: unknown): RequestValidationResult<StoredQueryUpdate> {
    return this.run(this.storedQueryUpdate, body);
  }

  validateQueryRequest(body: unknown): RequestValidationResult<QueryRequest> {
    return this.run(this.queryRequest, body);
  }

  validateMultiQueryRequest(body: unknown): RequestValidationResult<MultiQueryRequest> {
    return this.run(this.multiQueryRequest, body);
  }

  validateFederationRequest(body: unknown): RequestValidationResult<FederationRequest> {
    return this.run(this.federationRequest, body);
  }

  validateStoredQueryExecution(body: unknown): RequestValidationResult<StoredQueryExecutionRequest> {
    return this.run(this.storedQueryExecution, body);
  }

  private run<T>(validate: ValidateFunction<T>, body: unknown): RequestValidationResult<T> {
    if (validate(body)) {
      return { valid: true, value: body };
    }
    return { valid: false, errors: convertErrors(validate.errors) };
  }
}

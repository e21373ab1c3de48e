/**
 * JSON Schemas for query, multi-source and federation requests
 */

export const QueryRequestSchema = {
  type: 'object',
  required: ['sourceId'],
  properties: {
    sourceId: { type: 'string', minLength: 1 },
    parameters: { type: 'object' },
    dynamicParams: { type: 'object' },
    useCache: { type: 'boolean' },
    queryId: { type: 'string' }
  },
  additionalProperties: false
} as const;

/**
 * sourceId is optional here: a query without one yields a failure entry
 * for that query only
 */
export const QuerySpecSchema = {
  type: 'object',
  properties: {
    sourceId: { type: 'string' },
    parameters: { type: 'object' },
    dynamicParams: { type: 'object' },
    alias: { type: 'string', minLength: 1 },
    renameColumns: {
      type: 'object',
      additionalProperties: { type: 'string', minLength: 1 }
    }
  },
  additionalProperties: false
} as const;

export const MultiQueryRequestSchema = {
  type: 'object',
  required: ['queries'],
  properties: {
    queries: { type: 'array', items: QuerySpecSchema, minItems: 1 },
    useCache: { type: 'boolean' },
    aggregate: {
      type: 'object',
      required: ['type'],
      properties: {
        type: { type: 'string', enum: ['merge', 'union'] },
        uniqueKey: { type: 'string', minLength: 1 }
      },
      additionalProperties: false
    }
  },
  additionalProperties: false
} as const;

export const AggregationSchema = {
  type: 'object',
  required: ['groupBy', 'metrics'],
  properties: {
    groupBy: { type: 'array', items: { type: 'string', minLength: 1 } },
    metrics: {
      type: 'array',
      items: {
        type: 'object',
        required: ['column'],
        properties: {
          column: { type: 'string', minLength: 1 },
          agg: {
            type: 'string',
            enum: ['sum', 'mean', 'min', 'max', 'count', 'median', 'first', 'last', 'nunique']
          },
          alias: { type: 'string', minLength: 1 }
        },
        additionalProperties: false
      }
    }
  },
  additionalProperties: false
} as const;

export const FederationRequestSchema = {
  type: 'object',
  required: ['queries', 'joinOn'],
  properties: {
    queries: { type: 'array', items: QuerySpecSchema, minItems: 2 },
    joinOn: { type: 'array', items: { type: 'string', minLength: 1 }, minItems: 1 },
    how: { type: 'string', enum: ['inner', 'left', 'right', 'outer'] },
    aggregation: AggregationSchema,
    useCache: { type: 'boolean' },
    analysisPlan: { type: 'object' },
    planId: { type: 'string', minLength: 1 },
    planName: { type: 'string', minLength: 1 },
    metadata: { type: 'object' }
  },
  additionalProperties: false
} as const;

export const StoredQueryExecutionSchema = {
  type: 'object',
  properties: {
    useCache: { type: 'boolean' },
    overrides: { type: 'object' },
    dynamicParams: { type: 'object' }
  },
  additionalProperties: false
} as const;

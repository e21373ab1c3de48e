/**
 * JSON Schema for connector configuration documents
 */

export const ConnectorConfigSchema = {
  type: 'object',
  required: ['sourceId', 'connectorType'],
  properties: {
    sourceId: { type: 'string', minLength: 1, pattern: '^[A-Za-z0-9_.-]+$' },
    sourceName: { type: 'string' },
    connectorType: { type: 'string', minLength: 1 },
    baseUrl: { type: 'string', minLength: 1 },
    credentials: {
      type: 'object',
      additionalProperties: { type: 'string' }
    },
    maxRetries: { type: 'integer', minimum: 1, maximum: 10 },
    retryDelaySeconds: { type: 'number', minimum: 0, maximum: 300 },
    requestTimeoutMs: { type: 'integer', minimum: 1 },
    cacheTtlSeconds: { type: 'integer', minimum: 0 },
    active: { type: 'boolean' },
    dataPath: { type: 'string', minLength: 1 },
    apiKeyParam: { type: 'string', minLength: 1 },
    apiNamespace: { type: 'string' },
    yearMode: { type: 'string', enum: ['path', 'query'] },
    format: { type: 'string' },
    filePath: { type: 'string', minLength: 1 },
    fileType: { type: 'string', enum: ['csv', 'tsv', 'json'] },
    encoding: { type: 'string', enum: ['utf8', 'utf-8', 'latin1', 'ascii', 'utf16le'] },
    delimiter: { type: 'string', minLength: 1, maxLength: 1 }
  },
  additionalProperties: false
} as const;

/**
 * Partial update; sourceId and timestamps cannot change
 */
export const ConnectorConfigUpdateSchema = {
  ...ConnectorConfigSchema,
  required: [],
  properties: Object.fromEntries(
    Object.entries(ConnectorConfigSchema.properties).filter(([key]) => key !== 'sourceId')
  ),
  minProperties: 1
};

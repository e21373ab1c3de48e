/**
 * JSON Schemas for stored query input
 */

const tagsSchema = {
  type: 'array',
  items: { type: 'string', minLength: 1 },
  uniqueItems: true
} as const;

export const StoredQueryInputSchema = {
  type: 'object',
  required: ['queryId', 'queryName', 'connectorId', 'parameters'],
  properties: {
    queryId: { type: 'string', minLength: 1, pattern: '^[A-Za-z0-9_.-]+$' },
    queryName: { type: 'string', minLength: 1 },
    description: { type: 'string' },
    connectorId: { type: 'string', minLength: 1 },
    parameters: { type: 'object' },
    active: { type: 'boolean' },
    tags: tagsSchema,
    createdBy: { type: 'string' }
  },
  additionalProperties: false
} as const;

export const StoredQueryUpdateSchema = {
  type: 'object',
  properties: {
    queryName: { type: 'string', minLength: 1 },
    description: { type: 'string' },
    connectorId: { type: 'string', minLength: 1 },
    parameters: { type: 'object' },
    active: { type: 'boolean' },
    tags: tagsSchema,
    createdBy: { type: 'string' }
  },
  minProperties: 1,
  additionalProperties: false
} as const;

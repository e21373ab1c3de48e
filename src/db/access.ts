import { DynamoDB } from 'aws-sdk';

/**
 * Error thrown when a requested item does not exist
 */
export class ResourceNotFoundError extends Error {
  constructor(resourceType: string, resourceId: string) {
    super(`${resourceType} not found: ${resourceId}`);
    this.name = 'ResourceNotFoundError';
  }
}

/**
 * Result of a paginated query
 */
export interface PaginatedResult<T> {
  items: T[];
  lastEvaluatedKey?: DynamoDB.DocumentClient.Key;
}

/**
 * Drain a paginated scan or query into one list
 */
export async function collectPages<T>(
  fetchPage: (exclusiveStartKey?: DynamoDB.DocumentClient.Key) => Promise<PaginatedResult<T>>
): Promise<T[]> {
  const items: T[] = [];
  let startKey: DynamoDB.DocumentClient.Key | undefined;
  do {
    const page = await fetchPage(startKey);
    items.push(...page.items);
    startKey = page.lastEvaluatedKey;
  } while (startKey);
  return items;
}

/**
 * Error thrown when creating an item whose key is already taken
 */
export class ResourceExistsError extends Error {
  constructor(resourceType: string, resourceId: string) {
    super(`${resourceType} already exists: ${resourceId}`);
    this.name = 'ResourceExistsError';
  }
}

/**
 * True when a conditional write was rejected by DynamoDB
 */
export function isConditionalCheckFailure(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ConditionalCheckFailedException';
}

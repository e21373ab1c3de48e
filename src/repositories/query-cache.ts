/**
 * Query Cache Repository - DynamoDB persistence of cached query results
 *
 * One item per fingerprint (queryHash). DynamoDB's native TTL removes items
 * once expiresAtEpoch has passed; reads still filter on expiresAt because
 * the TTL sweep runs lazily.
 */

import { DynamoDB } from 'aws-sdk';
import { documentClient } from '../db/client';
import { TableNames, KeySchemas, GSINames } from '../db/tables';
import { PaginatedResult, collectPages, isConditionalCheckFailure } from '../db/access';
import { CacheBackend, CacheEntry } from '../types/cache';

export const QueryCacheRepository: CacheBackend = {
  async getEntry(queryHash: string): Promise<CacheEntry | null> {
    const result = await documentClient.get({
      TableName: TableNames.QUERY_CACHE,
      Key: {
        [KeySchemas.QUERY_CACHE.partitionKey]: queryHash
      }
    }).promise();

    if (!result.Item) {
      return null;
    }

    return result.Item as CacheEntry;
  },

  /**
   * Upsert an entry; an existing entry for the same fingerprint is replaced
   */
  async putEntry(entry: CacheEntry): Promise<void> {
    await documentClient.put({
      TableName: TableNames.QUERY_CACHE,
      Item: entry
    }).promise();
  },

  /**
   * Atomically bump the hit counter of an existing entry
   */
  async incrementHitCount(queryHash: string): Promise<void> {
    try {
      await documentClient.update({
        TableName: TableNames.QUERY_CACHE,
        Key: {
          [KeySchemas.QUERY_CACHE.partitionKey]: queryHash
        },
        UpdateExpression: 'ADD hitCount :one',
        ConditionExpression: 'attribute_exists(queryHash)',
        ExpressionAttributeValues: {
          ':one': 1
        }
      }).promise();
    } catch (error) {
      // Entry was purged between read and update
      if (isConditionalCheckFailure(error)) {
        return;
      }
      throw error;
    }
  },

  async deleteEntry(queryHash: string): Promise<boolean> {
    const result = await documentClient.delete({
      TableName: TableNames.QUERY_CACHE,
      Key: {
        [KeySchemas.QUERY_CACHE.partitionKey]: queryHash
      },
      ReturnValues: 'ALL_OLD'
    }).promise();

    return result.Attributes !== undefined;
  },

  async listBySource(sourceId: string): Promise<CacheEntry[]> {
    return collectPages(async (startKey): Promise<PaginatedResult<CacheEntry>> => {
      const queryParams: DynamoDB.DocumentClient.QueryInput = {
        TableName: TableNames.QUERY_CACHE,
        IndexName: GSINames.QUERY_CACHE.SOURCE_INDEX,
        KeyConditionExpression: 'sourceId = :sourceId',
        ExpressionAttributeValues: {
          ':sourceId': sourceId
        }
      };
      if (startKey) {
        queryParams.ExclusiveStartKey = startKey;
      }

      const result = await documentClient.query(queryParams).promise();
      return {
        items: (result.Items || []) as CacheEntry[],
        lastEvaluatedKey: result.LastEvaluatedKey
      };
    });
  },

  async listAll(): Promise<CacheEntry[]> {
    return collectPages(async (startKey): Promise<PaginatedResult<CacheEntry>> => {
      const scanParams: DynamoDB.DocumentClient.ScanInput = {
        TableName: TableNames.QUERY_CACHE
      };
      if (startKey) {
        scanParams.ExclusiveStartKey = startKey;
      }

      const result = await documentClient.scan(scanParams).promise();
      return {
        items: (result.Items || []) as CacheEntry[],
        lastEvaluatedKey: result.LastEvaluatedKey
      };
    });
  }
};

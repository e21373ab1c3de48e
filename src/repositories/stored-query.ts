/**
 * Stored Query Repository - persists named query templates
 *
 * Stored queries are keyed by queryId, with a GSI on connectorId.
 */

import { DynamoDB } from 'aws-sdk';
import { documentClient } from '../db/client';
import { TableNames, KeySchemas, GSINames } from '../db/tables';
import { PaginatedResult, collectPages } from '../db/access';
import { StoredQuery, StoredQueryStore } from '../types/stored-query';

export const StoredQueryRepository: StoredQueryStore = {
  async get(queryId: string): Promise<StoredQuery | null> {
    const result = await documentClient.get({
      TableName: TableNames.STORED_QUERIES,
      Key: {
        [KeySchemas.STORED_QUERIES.partitionKey]: queryId
      }
    }).promise();

    if (!result.Item) {
      return null;
    }

    return result.Item as StoredQuery;
  },

  async put(query: StoredQuery): Promise<void> {
    await documentClient.put({
      TableName: TableNames.STORED_QUERIES,
      Item: query
    }).promise();
  },

  /**
   * Delete a stored query
   *
   * @returns True if an item was removed
   */
  async delete(queryId: string): Promise<boolean> {
    const result = await documentClient.delete({
      TableName: TableNames.STORED_QUERIES,
      Key: {
        [KeySchemas.STORED_QUERIES.partitionKey]: queryId
      },
      ReturnValues: 'ALL_OLD'
    }).promise();

    return result.Attributes !== undefined;
  },

  async listAll(): Promise<StoredQuery[]> {
    return collectPages(async (startKey): Promise<PaginatedResult<StoredQuery>> => {
      const scanParams: DynamoDB.DocumentClient.ScanInput = {
        TableName: TableNames.STORED_QUERIES
      };
      if (startKey) {
        scanParams.ExclusiveStartKey = startKey;
      }

      const result = await documentClient.scan(scanParams).promise();
      return {
        items: (result.Items || []) as StoredQuery[],
        lastEvaluatedKey: result.LastEvaluatedKey
      };
    });
  },

  /**
   * List stored queries of one connector using the connectorId GSI
   */
  async listByConnector(connectorId: string): Promise<StoredQuery[]> {
    return collectPages(async (startKey): Promise<PaginatedResult<StoredQuery>> => {
      const queryParams: DynamoDB.DocumentClient.QueryInput = {
        TableName: TableNames.STORED_QUERIES,
        IndexName: GSINames.STORED_QUERIES.CONNECTOR_INDEX,
        KeyConditionExpression: 'connectorId = :connectorId',
        ExpressionAttributeValues: {
          ':connectorId': connectorId
        }
      };
      if (startKey) {
        queryParams.ExclusiveStartKey = startKey;
      }

      const result = await documentClient.query(queryParams).promise();
      return {
        items: (result.Items || []) as StoredQuery[],
        lastEvaluatedKey: result.LastEvaluatedKey
      };
    });
  }
};

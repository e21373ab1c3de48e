/**
 * Connector Config Repository - persists data source configurations
 *
 * Configurations are stored with sourceId as partition key.
 */

import { DynamoDB } from 'aws-sdk';
import { documentClient } from '../db/client';
import { TableNames, KeySchemas } from '../db/tables';
import {
  ResourceNotFoundError,
  ResourceExistsError,
  PaginatedResult,
  collectPages,
  isConditionalCheckFailure
} from '../db/access';
import { ConnectorConfig, ConnectorConfigStore, ConnectorConfigUpdate } from '../types/connector';

export const ConnectorConfigRepository: ConnectorConfigStore & {
  scanPage(exclusiveStartKey?: DynamoDB.DocumentClient.Key): Promise<PaginatedResult<ConnectorConfig>>;
} = {
  /**
   * Get a connector configuration by source ID
   *
   * @returns The configuration, or null if not found
   */
  async getBySourceId(sourceId: string): Promise<ConnectorConfig | null> {
    const result = await documentClient.get({
      TableName: TableNames.CONNECTOR_CONFIGS,
      Key: {
        [KeySchemas.CONNECTOR_CONFIGS.partitionKey]: sourceId
      }
    }).promise();

    if (!result.Item) {
      return null;
    }

    return result.Item as ConnectorConfig;
  },

  /**
   * Scan one page of configurations
   */
  async scanPage(exclusiveStartKey?: DynamoDB.DocumentClient.Key): Promise<PaginatedResult<ConnectorConfig>> {
    const scanParams: DynamoDB.DocumentClient.ScanInput = {
      TableName: TableNames.CONNECTOR_CONFIGS
    };

    if (exclusiveStartKey) {
      scanParams.ExclusiveStartKey = exclusiveStartKey;
    }

    const result = await documentClient.scan(scanParams).promise();

    return {
      items: (result.Items || []) as ConnectorConfig[],
      lastEvaluatedKey: result.LastEvaluatedKey
    };
  },

  /**
   * List all configurations, optionally only the active ones
   */
  async getAll(activeOnly = false): Promise<ConnectorConfig[]> {
    const configs = await collectPages((startKey) => this.scanPage(startKey));
    const filtered = activeOnly ? configs.filter(config => config.active) : configs;
    return filtered.sort((a, b) => a.sourceId.localeCompare(b.sourceId));
  },

  /**
   * Create a configuration
   *
   * @throws ResourceExistsError if the sourceId is taken
   */
  async create(config: ConnectorConfig): Promise<ConnectorConfig> {
    const now = new Date().toISOString();
    const item: ConnectorConfig = {
      ...config,
      createdAt: now,
      updatedAt: now
    };

    try {
      await documentClient.put({
        TableName: TableNames.CONNECTOR_CONFIGS,
        Item: item,
        ConditionExpression: 'attribute_not_exists(#pk)',
        ExpressionAttributeNames: {
          '#pk': KeySchemas.CONNECTOR_CONFIGS.partitionKey
        }
      }).promise();
    } catch (error) {
      if (isConditionalCheckFailure(error)) {
        throw new ResourceExistsError('ConnectorConfig', config.sourceId);
      }
      throw error;
    }

    return item;
  },

  /**
   * Update a configuration
   *
   * @throws ResourceNotFoundError if the configuration doesn't exist
   */
  async update(
    sourceId: string,
    updates: ConnectorConfigUpdate
  ): Promise<ConnectorConfig> {
    const existing = await this.getBySourceId(sourceId);
    if (!existing) {
      throw new ResourceNotFoundError('ConnectorConfig', sourceId);
    }

    const updated: ConnectorConfig = {
      ...existing,
      ...updates,
      sourceId,
      updatedAt: new Date().toISOString()
    };

    await documentClient.put({
      TableName: TableNames.CONNECTOR_CONFIGS,
      Item: updated
    }).promise();

    return updated;
  },

  /**
   * Delete a configuration
   *
   * @throws ResourceNotFoundError if the configuration doesn't exist
   */
  async delete(sourceId: string): Promise<void> {
    const existing = await this.getBySourceId(sourceId);
    if (!existing) {
      throw new ResourceNotFoundError('ConnectorConfig', sourceId);
    }

    await documentClient.delete({
      TableName: TableNames.CONNECTOR_CONFIGS,
      Key: {
        [KeySchemas.CONNECTOR_CONFIGS.partitionKey]: sourceId
      }
    }).promise();
  }
};

/**
 * DynamoDB tables of the query service
 */

export const TableNames = {
  CONNECTOR_CONFIGS: process.env.CONNECTOR_CONFIGS_TABLE || 'connector-configs',
  STORED_QUERIES: process.env.STORED_QUERIES_TABLE || 'stored-queries',
  QUERY_CACHE: process.env.QUERY_CACHE_TABLE || 'query-cache',
  ANALYSIS_RESULTS: process.env.ANALYSIS_RESULTS_TABLE || 'analysis-results'
} as const;

export const KeySchemas = {
  /**
   * Connector Configs Table
   * - Partition Key: sourceId
   */
  CONNECTOR_CONFIGS: {
    partitionKey: 'sourceId'
  },

  /**
   * Stored Queries Table
   * - Partition Key: queryId
   */
  STORED_QUERIES: {
    partitionKey: 'queryId'
  },

  /**
   * Query Cache Table
   * - Partition Key: queryHash
   * - TTL: expiresAtEpoch
   */
  QUERY_CACHE: {
    partitionKey: 'queryHash',
    ttlAttribute: 'expiresAtEpoch'
  },

  /**
   * Analysis Results Table
   * - Partition Key: planId
   */
  ANALYSIS_RESULTS: {
    partitionKey: 'planId'
  }
} as const;

export const GSINames = {
  STORED_QUERIES: {
    CONNECTOR_INDEX: 'connectorId-index'
  },
  QUERY_CACHE: {
    SOURCE_INDEX: 'sourceId-index'
  }
} as const;

/**
 * Analysis Result Repository - persists joined tables and their analysis
 *
 * One item per planId; a put replaces the previous item of the plan.
 */

import { documentClient } from '../db/client';
import { TableNames, KeySchemas } from '../db/tables';
import { AnalysisResultRecord, AnalysisResultStore } from '../types/analysis';

export const AnalysisResultRepository: AnalysisResultStore = {
  async get(planId: string): Promise<AnalysisResultRecord | null> {
    const result = await documentClient.get({
      TableName: TableNames.ANALYSIS_RESULTS,
      Key: {
        [KeySchemas.ANALYSIS_RESULTS.partitionKey]: planId
      }
    }).promise();

    if (!result.Item) {
      return null;
    }

    return result.Item as AnalysisResultRecord;
  },

  async put(record: AnalysisResultRecord): Promise<void> {
    await documentClient.put({
      TableName: TableNames.ANALYSIS_RESULTS,
      Item: record
    }).promise();
  }
};

/**
 * Query engine types
 */

import { DataRecord, QueryParameters, StandardResult } from './connector';
import { CacheStats } from './cache';
import { QueryErrorCode } from './query-error';

export type ResultSource = 'cache' | 'connector';

export interface QuerySuccess {
  success: true;
  source: ResultSource;
  data: StandardResult;
  sourceId: string;
  queryId?: string;
  queryName?: string;
  queryDescription?: string;
}

export interface QueryFailure {
  success: false;
  error: string;
  errorCode: QueryErrorCode;
  sourceId?: string;
  queryId?: string;
}

/**
 * Every engine-level operation answers with an explicit success flag
 */
export type QueryResult = QuerySuccess | QueryFailure;

export interface ExecuteQueryOptions {
  useCache?: boolean;
  queryId?: string;
  /** Values for dynamic placeholders in the parameters */
  dynamicParams?: QueryParameters;
}

/**
 * One input of a multi-source or federation call
 */
export interface QuerySpec {
  sourceId?: string;
  parameters?: QueryParameters;
  alias?: string;
  renameColumns?: Record<string, string>;
  dynamicParams?: QueryParameters;
}

export type JoinHow = 'inner' | 'left' | 'right' | 'outer';

export type AggregationFunction =
  | 'sum'
  | 'mean'
  | 'min'
  | 'max'
  | 'count'
  | 'median'
  | 'first'
  | 'last'
  | 'nunique';

export interface MetricSpec {
  column: string;
  agg?: AggregationFunction;
  alias?: string;
}

export interface AggregationSpec {
  groupBy: string[];
  metrics: MetricSpec[];
}

/**
 * Tabular dataset; every row carries every column (missing values are null)
 */
export interface Table {
  columns: string[];
  rows: DataRecord[];
}

export interface ValidateQueryResult {
  valid: boolean;
  error?: string;
}

export interface EngineStats {
  cacheStats: CacheStats;
  availableSourceCount: number;
  availableSources: string[];
}

export interface AggregateResultsOptions {
  type: 'merge' | 'union';
  /** Deduplication key for union */
  uniqueKey?: string;
}

export type AggregatedResults =
  | { success: true; data: DataRecord[]; recordCount: number }
  | { success: false; error: string; errorCode: QueryErrorCode };

/**
 * Analysis plan and engine contract
 */

import { DataRecord } from './connector';
import { JoinHow, QuerySpec, Table } from './query';

export interface InferentialTest {
  x: string;
  y: string;
  /** Defaults to pearson */
  test?: string;
}

export interface AnalysisPlan {
  basicStatistics?: boolean;
  exploratory?: boolean;
  inferentialTests?: InferentialTest[];
  timeSeries?: {
    timeColumn: string;
    targetColumn: string;
    freq?: string;
    rollingWindow?: number;
  };
  linearRegression?: { features: string[]; target: string };
  randomForest?: { features: string[]; target: string; [option: string]: unknown };
  multivariate?: { features: string[]; nComponents?: number };
  predictive?: { features: string[]; target: string; modelType: string };
}

export type AnalysisSection = keyof AnalysisPlan;

/**
 * Results keyed by the plan section names that were requested
 */
export type AnalysisResults = Partial<Record<AnalysisSection, unknown>>;

export interface AnalysisEngine {
  run(table: Table, plan: AnalysisPlan): Promise<AnalysisResults>;
}

export interface ColumnStatistics {
  count: number;
  mean: number | null;
  std: number | null;
  min: number | null;
  q25: number | null;
  median: number | null;
  q75: number | null;
  max: number | null;
}

export interface AnalysisOutcome {
  table: Table;
  analysis: AnalysisResults;
  /** Set when the outcome was persisted under a plan id */
  savedPlanId?: string;
}

/**
 * Persisted federation + analysis outcome. One record per plan; saving the
 * same plan again replaces it and keeps createdAt.
 */
export interface AnalysisResultRecord {
  planId: string;
  planName: string;
  joinColumns: string[];
  joinStrategy: JoinHow;
  querySpecs: QuerySpec[];
  columns: string[];
  results: DataRecord[];
  recordCount: number;
  analysisSummary: AnalysisResults | null;
  metadata: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
}

export interface SaveAnalysisResultInput {
  planId: string;
  /** Defaults to planId */
  planName?: string;
  joinColumns: string[];
  joinStrategy: JoinHow;
  querySpecs: QuerySpec[];
  table: Table;
  analysisSummary?: AnalysisResults | null;
  metadata?: Record<string, unknown>;
}

export interface AnalysisSaveOptions {
  planId: string;
  planName?: string;
  metadata?: Record<string, unknown>;
}

export interface AnalysisResultStore {
  get(planId: string): Promise<AnalysisResultRecord | null>;
  put(record: AnalysisResultRecord): Promise<void>;
}

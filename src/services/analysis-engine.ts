/**
 * Basic Analysis Engine
 *
 * Descriptive statistics over a federated table. Model-based sections
 * (time series, regression, random forest, multivariate, predictive) are
 * reported as unsupported.
 */

import { DataRecord } from '../types/connector';
import { Table } from '../types/query';
import {
  AnalysisEngine,
  AnalysisPlan,
  AnalysisResults,
  AnalysisSection,
  ColumnStatistics,
  InferentialTest
} from '../types/analysis';
import { toNumber } from './table';

export interface ColumnProfile {
  name: string;
  kind: 'numeric' | 'categorical';
  missing: number;
  unique: number;
}

export interface ExploratorySummary {
  rowCount: number;
  columnCount: number;
  columns: ColumnProfile[];
  correlations: Record<string, Record<string, number | null>>;
}

export interface CorrelationResult {
  x: string;
  y: string;
  test: string;
  coefficient: number | null;
  n: number;
}

const MODEL_SECTIONS: AnalysisSection[] = ['timeSeries', 'linearRegression', 'randomForest', 'multivariate', 'predictive'];

function isMissing(value: unknown): boolean {
  return value === null || value === undefined || value === '';
}

/**
 * Linear-interpolated quantile of sorted values
 */
export function quantile(sorted: number[], q: number): number | null {
  if (sorted.length === 0) return null;
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

export function summarize(values: number[]): ColumnStatistics {
  const count = values.length;
  if (count === 0) {
    return { count, mean: null, std: null, min: null, q25: null, median: null, q75: null, max: null };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const mean = values.reduce((sum, value) => sum + value, 0) / count;
  const variance = count > 1
    ? values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / (count - 1)
    : null;

  return {
    count,
    mean,
    std: variance === null ? null : Math.sqrt(variance),
    min: sorted[0],
    q25: quantile(sorted, 0.25),
    median: quantile(sorted, 0.5),
    q75: quantile(sorted, 0.75),
    max: sorted[count - 1]
  };
}

export function pearson(xs: number[], ys: number[]): number | null {
  const n = xs.length;
  if (n < 2 || n !== ys.length) return null;
  const meanX = xs.reduce((s, v) => s + v, 0) / n;
  const meanY = ys.reduce((s, v) => s + v, 0) / n;
  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - meanX;
    const dy = ys[i] - meanY;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }
  if (varianceX === 0 || varianceY === 0) return null;
  return covariance / Math.sqrt(varianceX * varianceY);
}

/**
 * Ranks with ties sharing their average rank (1-based)
 */
export function rank(values: number[]): number[] {
  const order = values.map((value, index) => ({ value, index })).sort((a, b) => a.value - b.value);
  const ranks = new Array<number>(values.length);
  let i = 0;
  while (i < order.length) {
    let j = i;
    while (j + 1 < order.length && order[j + 1].value === order[i].value) j++;
    const averageRank = (i + j) / 2 + 1;
    for (let k = i; k <= j; k++) ranks[order[k].index] = averageRank;
    i = j + 1;
  }
  return ranks;
}

/**
 * Columns whose present values are all numeric, with at least one value
 */
export function numericColumns(table: Table): string[] {
  return table.columns.filter(column => {
    const present = table.rows.map(row => row[column]).filter(value => !isMissing(value));
    return present.length > 0 && present.every(value => toNumber(value) !== null);
  });
}

function pairedValues(rows: DataRecord[], x: string, y: string): { xs: number[]; ys: number[] } {
  const xs: number[] = [];
  const ys: number[] = [];
  for (const row of rows) {
    const a = toNumber(row[x]);
    const b = toNumber(row[y]);
    if (a !== null && b !== null) {
      xs.push(a);
      ys.push(b);
    }
  }
  return { xs, ys };
}

export class BasicAnalysisEngine implements AnalysisEngine {
  async run(table: Table, plan: AnalysisPlan): Promise<AnalysisResults> {
    const results: AnalysisResults = {};

    if (plan.basicStatistics) {
      results.basicStatistics = this.basicStatistics(table);
    }
    if (plan.exploratory) {
      results.exploratory = this.exploratory(table);
    }
    if (plan.inferentialTests && plan.inferentialTests.length > 0) {
      results.inferentialTests = plan.inferentialTests.map(test => this.correlationTest(table, test));
    }
    for (const section of MODEL_SECTIONS) {
      if (plan[section] !== undefined) {
        results[section] = { error: `Analysis section not supported: ${section}` };
      }
    }

    return results;
  }

  basicStatistics(table: Table): Record<string, ColumnStatistics> {
    const statistics: Record<string, ColumnStatistics> = {};
    for (const column of numericColumns(table)) {
      const values = table.rows
        .map(row => toNumber(row[column]))
        .filter((value): value is number => value !== null);
      statistics[column] = summarize(values);
    }
    return statistics;
  }

  exploratory(table: Table): ExploratorySummary {
    const numeric = new Set(numericColumns(table));
    const columns = table.columns.map((name): ColumnProfile => {
      const values = table.rows.map(row => row[name]);
      const present = values.filter(value => !isMissing(value));
      return {
        name,
        kind: numeric.has(name) ? 'numeric' : 'categorical',
        missing: values.length - present.length,
        unique: new Set(present.map(value => JSON.stringify(value))).size
      };
    });

    const correlations: Record<string, Record<string, number | null>> = {};
    const numericList = Array.from(numeric);
    for (const x of numericList) {
      correlations[x] = {};
      for (const y of numericList) {
        const { xs, ys } = pairedValues(table.rows, x, y);
        correlations[x][y] = pearson(xs, ys);
      }
    }

    return {
      rowCount: table.rows.length,
      columnCount: table.columns.length,
      columns,
      correlations
    };
  }

  correlationTest(table: Table, spec: InferentialTest): CorrelationResult | { x: string; y: string; test: string; error: string } {
    const test = spec.test ?? 'pearson';
    const missing = [spec.x, spec.y].filter(column => !table.columns.includes(column));
    if (missing.length > 0) {
      return { x: spec.x, y: spec.y, test, error: `Unknown columns: ${missing.join(', ')}` };
    }

    const { xs, ys } = pairedValues(table.rows, spec.x, spec.y);
    if (test === 'pearson') {
      return { x: spec.x, y: spec.y, test, coefficient: pearson(xs, ys), n: xs.length };
    }
    if (test === 'spearman') {
      return { x: spec.x, y: spec.y, test, coefficient: pearson(rank(xs), rank(ys)), n: xs.length };
    }
    return { x: spec.x, y: spec.y, test, error: `Unsupported test: ${test}` };
  }
}

/**
 * Tabular operations for federation: record-to-table conversion,
 * equi-joins and grouped aggregation
 */

import { DataRecord } from '../types/connector';
import { AggregationFunction, AggregationSpec, JoinHow, MetricSpec, Table } from '../types/query';
import { ValidationError } from './errors';

export interface AliasedTable {
  table: Table;
  alias: string;
}

function isMissing(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value));
}

/**
 * Build a table from records; columns in first-seen order, gaps filled with null
 */
export function tableFromRecords(records: DataRecord[]): Table {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  const rows = records.map(record => {
    const row: DataRecord = {};
    for (const column of columns) {
      row[column] = column in record ? record[column] : null;
    }
    return row;
  });

  return { columns, rows };
}

export function renameColumns(table: Table, mapping: Record<string, string>): Table {
  const rename = (column: string): string => mapping[column] ?? column;
  return {
    columns: table.columns.map(rename),
    rows: table.rows.map(row => {
      const renamed: DataRecord = {};
      for (const [key, value] of Object.entries(row)) {
        renamed[rename(key)] = value;
      }
      return renamed;
    })
  };
}

export function missingColumns(table: Table, columns: string[]): string[] {
  const present = new Set(table.columns);
  return columns.filter(column => !present.has(column));
}

function keyOf(row: DataRecord, on: string[]): string {
  return JSON.stringify(on.map(column => (row[column] === undefined ? null : row[column])));
}

/**
 * Equality join of two tables on the given key columns.
 *
 * Left columns keep their names. A right non-key column whose name is
 * already taken is renamed `${name}${suffix}`.
 * Row order:
 * - inner, left: left row order, then right order within a key
 * - right: right row order, then left order within a key
 * - outer: sorted by key tuple, left order then right order within a key
 */
export function joinTables(left: Table, right: Table, on: string[], how: JoinHow, suffix: string): Table {
  const keySet = new Set(on);
  const leftNames = new Set(left.columns);
  const rightMapping = new Map<string, string>();
  for (const column of right.columns) {
    if (keySet.has(column)) continue;
    rightMapping.set(column, leftNames.has(column) ? `${column}${suffix}` : column);
  }

  const columns = [...left.columns, ...rightMapping.values()];

  const combine = (leftRow: DataRecord | null, rightRow: DataRecord | null): DataRecord => {
    const row: DataRecord = {};
    for (const column of left.columns) {
      row[column] = leftRow ? leftRow[column] ?? null : null;
    }
    if (!leftRow && rightRow) {
      for (const key of on) {
        row[key] = rightRow[key] ?? null;
      }
    }
    for (const [source, target] of rightMapping) {
      row[target] = rightRow ? rightRow[source] ?? null : null;
    }
    return row;
  };

  const rows: DataRecord[] = [];

  if (how === 'right') {
    const leftIndex = indexRows(left.rows, on);
    for (const rightRow of right.rows) {
      const matches = leftIndex.get(keyOf(rightRow, on));
      if (matches) {
        for (const leftRow of matches) rows.push(combine(leftRow, rightRow));
      } else {
        rows.push(combine(null, rightRow));
      }
    }
    return { columns, rows };
  }

  const rightIndex = indexRows(right.rows, on);
  const matchedRightKeys = new Set<string>();

  for (const leftRow of left.rows) {
    const key = keyOf(leftRow, on);
    const matches = rightIndex.get(key);
    if (matches) {
      matchedRightKeys.add(key);
      for (const rightRow of matches) rows.push(combine(leftRow, rightRow));
    } else if (how === 'left' || how === 'outer') {
      rows.push(combine(leftRow, null));
    }
  }

  if (how === 'outer') {
    for (const rightRow of right.rows) {
      if (!matchedRightKeys.has(keyOf(rightRow, on))) {
        rows.push(combine(null, rightRow));
      }
    }
    rows.sort((a, b) => compareKeyTuples(on.map(column => a[column]), on.map(column => b[column])));
  }

  return { columns, rows };
}

function indexRows(rows: DataRecord[], on: string[]): Map<string, DataRecord[]> {
  const index = new Map<string, DataRecord[]>();
  for (const row of rows) {
    const key = keyOf(row, on);
    const bucket = index.get(key);
    if (bucket) {
      bucket.push(row);
    } else {
      index.set(key, [row]);
    }
  }
  return index;
}

/**
 * Left fold: ((t0 ⋈ t1) ⋈ t2) ⋈ ... Each right-hand table suffixes its
 * colliding columns with `_${alias}`.
 */
export function foldJoin(tables: AliasedTable[], on: string[], how: JoinHow): Table {
  if (tables.length === 0) {
    return { columns: [], rows: [] };
  }
  return tables
    .slice(1)
    .reduce((accumulator, next) => joinTables(accumulator, next.table, on, how, `_${next.alias}`), tables[0].table);
}

/**
 * Order used for group keys: missing first, then numbers, booleans and
 * strings, each in natural order
 */
function compareKeyValues(a: unknown, b: unknown): number {
  const rank = (value: unknown): number => {
    if (isMissing(value)) return 0;
    if (typeof value === 'number') return 1;
    if (typeof value === 'boolean') return 2;
    return 3;
  };
  const rankDiff = rank(a) - rank(b);
  if (rankDiff !== 0) return rankDiff;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  const left = typeof a === 'string' ? a : JSON.stringify(a) ?? '';
  const right = typeof b === 'string' ? b : JSON.stringify(b) ?? '';
  return left < right ? -1 : left > right ? 1 : 0;
}

function compareKeyTuples(a: unknown[], b: unknown[]): number {
  for (let i = 0; i < a.length; i++) {
    const order = compareKeyValues(a[i], b[i]);
    if (order !== 0) return order;
  }
  return 0;
}

/**
 * Numbers and numeric strings; anything else is skipped by numeric aggregates
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.replace(/,/g, ''));
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function median(values: number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
}

export function aggregate(values: unknown[], agg: AggregationFunction): unknown {
  const present = values.filter(value => !isMissing(value));
  const numbers = present.map(toNumber).filter((value): value is number => value !== null);

  switch (agg) {
    case 'sum':
      return numbers.reduce((sum, value) => sum + value, 0);
    case 'mean':
      return numbers.length === 0 ? null : numbers.reduce((sum, value) => sum + value, 0) / numbers.length;
    case 'median':
      return median(numbers);
    case 'min':
      return present.length === 0 ? null : present.reduce((best, value) => (compareKeyValues(value, best) < 0 ? value : best));
    case 'max':
      return present.length === 0 ? null : present.reduce((best, value) => (compareKeyValues(value, best) > 0 ? value : best));
    case 'count':
      return present.length;
    case 'first':
      return present.length === 0 ? null : present[0];
    case 'last':
      return present.length === 0 ? null : present[present.length - 1];
    case 'nunique':
      return new Set(present.map(value => JSON.stringify(value))).size;
  }
}

function outputName(metric: MetricSpec): string {
  return metric.alias ?? metric.column;
}

/**
 * Group rows by the groupBy columns and apply each metric.
 * Missing key values (null, undefined, NaN) form their own group as null;
 * groups are sorted by key, missing first.
 * A metric's output column is its alias, or the source column name.
 *
 * @throws ValidationError on empty groupBy/metrics, unknown columns or duplicate output names
 */
export function applyAggregation(table: Table, spec: AggregationSpec): Table {
  if (spec.groupBy.length === 0 || spec.metrics.length === 0) {
    throw new ValidationError('Aggregation requires non-empty groupBy and metrics');
  }

  const unknown = missingColumns(table, [...spec.groupBy, ...spec.metrics.map(metric => metric.column)]);
  if (unknown.length > 0) {
    throw new ValidationError(`Aggregation references unknown columns: ${unknown.join(', ')}`);
  }

  const columns = [...spec.groupBy];
  for (const metric of spec.metrics) {
    const name = outputName(metric);
    if (columns.includes(name)) {
      throw new ValidationError(`Duplicate aggregation output column: ${name}`);
    }
    columns.push(name);
  }

  const groups = new Map<string, { key: unknown[]; rows: DataRecord[] }>();
  for (const row of table.rows) {
    const key = spec.groupBy.map(column => (isMissing(row[column]) ? null : row[column]));
    const id = JSON.stringify(key);
    const group = groups.get(id);
    if (group) {
      group.rows.push(row);
    } else {
      groups.set(id, { key, rows: [row] });
    }
  }

  const ordered = Array.from(groups.values()).sort((a, b) => compareKeyTuples(a.key, b.key));

  const rows = ordered.map(group => {
    const row: DataRecord = {};
    spec.groupBy.forEach((column, index) => {
      row[column] = group.key[index];
    });
    for (const metric of spec.metrics) {
      row[outputName(metric)] = aggregate(group.rows.map(r => r[metric.column]), metric.agg ?? 'sum');
    }
    return row;
  });

  return { columns, rows };
}

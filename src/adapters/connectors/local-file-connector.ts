/**
 * Local file connector
 *
 * Serves CSV, TSV and JSON files from disk with column selection,
 * filters, sorting and offset/limit pagination.
 */

import { promises as fs, constants as fsConstants } from 'fs';
import * as path from 'path';
import * as Papa from 'papaparse';
import { CapabilitiesDescriptor, ConnectorConfig, DataRecord, LocalFileType, QueryParameters, StandardResult } from '../../types/connector';
import { ConfigurationError, ValidationError } from '../../services/errors';
import { BaseConnector, isPlainObject, toRecords } from './base-connector';
import { resolveParameters } from './placeholders';

type FilterOperator = '$gt' | '$lt' | '$gte' | '$lte' | '$eq' | '$ne';

const FILTER_OPERATORS: FilterOperator[] = ['$gt', '$lt', '$gte', '$lte', '$eq', '$ne'];

function detectFileType(filePath: string): LocalFileType | undefined {
  switch (path.extname(filePath).toLowerCase()) {
    case '.csv':
      return 'csv';
    case '.tsv':
      return 'tsv';
    case '.json':
      return 'json';
    default:
      return undefined;
  }
}

/**
 * Ordering used by sorting and range filters: numbers numerically,
 * everything else by its string form. Nulls compare as undefined (NaN).
 */
export function compareValues(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (a === null || a === undefined || b === null || b === undefined) {
    return NaN;
  }
  return String(a).localeCompare(String(b));
}

function matchesOperator(value: unknown, operator: FilterOperator, operand: unknown): boolean {
  switch (operator) {
    case '$eq':
      return value === operand;
    case '$ne':
      return value !== operand;
    case '$gt':
      return compareValues(value, operand) > 0;
    case '$lt':
      return compareValues(value, operand) < 0;
    case '$gte':
      return compareValues(value, operand) >= 0;
    case '$lte':
      return compareValues(value, operand) <= 0;
  }
}

/**
 * Apply equality or operator filters. Filters on unknown columns are ignored.
 */
export function applyFilters(records: DataRecord[], filters: Record<string, unknown>, columns: Set<string>): DataRecord[] {
  let result = records;
  for (const [column, condition] of Object.entries(filters)) {
    if (!columns.has(column)) {
      continue;
    }
    if (isPlainObject(condition)) {
      for (const operator of FILTER_OPERATORS) {
        if (operator in condition) {
          result = result.filter(record => matchesOperator(record[column], operator, condition[operator]));
        }
      }
    } else {
      result = result.filter(record => record[column] === condition);
    }
  }
  return result;
}

/**
 * Stable multi-column sort; nulls go last regardless of direction
 */
export function sortRecords(records: DataRecord[], sortBy: string[], ascending: boolean[]): DataRecord[] {
  return [...records].sort((left, right) => {
    for (let i = 0; i < sortBy.length; i++) {
      const column = sortBy[i];
      const a = left[column];
      const b = right[column];
      const aMissing = a === null || a === undefined;
      const bMissing = b === null || b === undefined;
      if (aMissing || bMissing) {
        if (aMissing && bMissing) continue;
        return aMissing ? 1 : -1;
      }
      const order = compareValues(a, b);
      if (order !== 0) {
        return (ascending[i] ?? ascending[0] ?? true) ? order : -order;
      }
    }
    return 0;
  });
}

function asStringList(value: unknown): string[] {
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) return value.filter((item): item is string => typeof item === 'string');
  return [];
}

function asBooleanList(value: unknown): boolean[] {
  if (typeof value === 'boolean') return [value];
  if (Array.isArray(value)) return value.filter((item): item is boolean => typeof item === 'boolean');
  return [true];
}

function asNonNegativeInt(value: unknown, name: string, sourceId: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ValidationError(`${name} must be a non-negative integer`, { sourceId });
  }
  return parsed;
}

export class LocalFileConnector extends BaseConnector {
  private readonly filePath: string;
  private readonly fileType: LocalFileType;

  constructor(config: ConnectorConfig) {
    super(config);
    if (!config.filePath) {
      throw new ConfigurationError('filePath is required for local file connector', { sourceId: config.sourceId });
    }
    const fileType = config.fileType ?? detectFileType(config.filePath);
    if (!fileType) {
      throw new ConfigurationError(
        `Unsupported file extension: ${path.extname(config.filePath) || '(none)'}`,
        { sourceId: config.sourceId }
      );
    }
    this.filePath = config.filePath;
    this.fileType = fileType;
  }

  /**
   * Succeeds when the file exists and is readable
   */
  async connect(): Promise<boolean> {
    try {
      await fs.access(this.filePath, fsConstants.R_OK);
    } catch (error) {
      console.error(`[LocalFileConnector] File not readable: ${this.filePath}`, error);
      return false;
    }
    this.connected = true;
    return true;
  }

  async validate(): Promise<boolean> {
    try {
      if (!(await this.connect())) {
        return false;
      }
      await this.readRecords();
      return true;
    } catch (error) {
      console.error(`[LocalFileConnector] Validation failed for ${this.sourceId}:`, error);
      return false;
    }
  }

  protected async executeQuery(parameters: QueryParameters, dynamicParams: QueryParameters): Promise<StandardResult> {
    const resolved = resolveParameters(parameters, dynamicParams).parameters;
    let records = await this.readRecords();
    const available = new Set(records.flatMap(record => Object.keys(record)));

    const filters = resolved.filters;
    if (isPlainObject(filters)) {
      records = applyFilters(records, filters, available);
    }

    const sortBy = asStringList(resolved.sortBy ?? resolved.sort_by).filter(column => available.has(column));
    if (sortBy.length > 0) {
      records = sortRecords(records, sortBy, asBooleanList(resolved.ascending));
    }

    const offset = asNonNegativeInt(resolved.offset, 'offset', this.sourceId) ?? 0;
    const limit = asNonNegativeInt(resolved.limit, 'limit', this.sourceId);
    records = records.slice(offset, limit === undefined ? undefined : offset + limit);

    const columns = asStringList(resolved.columns).filter(column => available.has(column));
    if (columns.length > 0) {
      records = records.map(record => {
        const projected: DataRecord = {};
        for (const column of columns) {
          projected[column] = column in record ? record[column] : null;
        }
        return projected;
      });
    }

    const result = this.transform(records, parameters);
    result.metadata = { ...result.metadata, endpoint: this.filePath };
    return result;
  }

  getCapabilities(): CapabilitiesDescriptor {
    return {
      ...super.getCapabilities(),
      supportsPagination: true,
      supportsFiltering: true,
      supportsSorting: true,
      supportedFormats: ['csv', 'tsv', 'json']
    };
  }

  private async readRecords(): Promise<DataRecord[]> {
    const text = await fs.readFile(this.filePath, { encoding: this.config.encoding ?? 'utf-8' });

    if (this.fileType === 'json') {
      const parsed: unknown = JSON.parse(text);
      return toRecords(parsed);
    }

    const delimiter = this.fileType === 'tsv' ? '\t' : (this.config.delimiter ?? ',');
    const parsed = Papa.parse<DataRecord>(text, {
      header: true,
      delimiter,
      dynamicTyping: true,
      skipEmptyLines: true
    });

    if (parsed.errors.length > 0) {
      console.warn('[LocalFileConnector] Parse warnings', {
        sourceId: this.sourceId,
        errors: parsed.errors.slice(0, 5).map(error => `row ${error.row}: ${error.message}`)
      });
    }

    return parsed.data;
  }
}

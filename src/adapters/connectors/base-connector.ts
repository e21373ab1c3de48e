/**
 * Base Connector - common result shaping for all data source connectors
 *
 * Implements the parts of the Connector contract that do not depend on the
 * source: connection state, StandardResult assembly, schema inference and
 * the default payload-to-records mapping. Subclasses supply connect,
 * validate and executeQuery.
 */

import {
  CapabilitiesDescriptor,
  Connector,
  ConnectorConfig,
  DataRecord,
  FieldType,
  QueryParameters,
  ResultMetadata,
  SchemaField,
  StandardResult
} from '../../types/connector';
import { ErrorContext } from '../../types/query-error';
import { ConnectionError } from '../../services/errors';

export const RESULT_VERSION = '1.0';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Map a raw payload onto a list of records.
 * - object with a results or data key: that value
 * - list: one record per element (non-objects become { value })
 * - other object: one record
 * - scalar: { value: payload }
 * - null / undefined: no records
 */
export function toRecords(payload: unknown): DataRecord[] {
  if (payload === null || payload === undefined) {
    return [];
  }

  if (Array.isArray(payload)) {
    return payload.map(item => (isPlainObject(item) ? item : { value: item }));
  }

  if (isPlainObject(payload)) {
    if ('results' in payload) {
      return toRecords(payload.results);
    }
    if ('data' in payload) {
      return toRecords(payload.data);
    }
    return [payload];
  }

  return [{ value: payload }];
}

export function fieldTypeOf(value: unknown): FieldType {
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'number':
    case 'bigint':
      return 'number';
    case 'boolean':
      return 'boolean';
    case 'object':
      return value === null ? 'string' : 'object';
    default:
      return 'string';
  }
}

/**
 * Union of keys across all records, in first-seen order. A field's type is
 * taken from its first non-null value; fields that are always null are strings.
 */
export function inferSchema(records: DataRecord[]): SchemaField[] {
  const types = new Map<string, FieldType | null>();

  for (const record of records) {
    for (const [key, value] of Object.entries(record)) {
      const known = types.get(key);
      if (known) {
        continue;
      }
      types.set(key, value === null || value === undefined ? null : fieldTypeOf(value));
    }
  }

  return Array.from(types.entries()).map(([name, type]) => ({ name, type: type ?? 'string' }));
}

/**
 * Abstract base class for connectors
 */
export abstract class BaseConnector implements Connector {
  readonly sourceId: string;

  protected readonly config: ConnectorConfig;
  protected connected = false;

  constructor(config: ConnectorConfig) {
    this.config = config;
    this.sourceId = config.sourceId;
  }

  abstract connect(): Promise<boolean>;

  abstract validate(): Promise<boolean>;

  /**
   * Execute the query once connected
   */
  protected abstract executeQuery(
    parameters: QueryParameters,
    dynamicParams: QueryParameters
  ): Promise<StandardResult>;

  async disconnect(): Promise<boolean> {
    this.connected = false;
    return true;
  }

  async query(parameters: QueryParameters, dynamicParams: QueryParameters = {}): Promise<StandardResult> {
    await this.ensureConnected();
    return this.executeQuery(parameters, dynamicParams);
  }

  transform(rawPayload: unknown, parameters: QueryParameters = {}): StandardResult {
    return this.buildResult(toRecords(rawPayload), parameters);
  }

  getCapabilities(): CapabilitiesDescriptor {
    return {
      sourceId: this.sourceId,
      sourceName: this.config.sourceName,
      connectorType: this.config.connectorType,
      supportsPagination: false,
      supportsFiltering: false,
      supportsSorting: false,
      supportsGeography: false,
      supportedFormats: ['json'],
      requiredParameters: []
    };
  }

  isConnected(): boolean {
    return this.connected;
  }

  protected async ensureConnected(): Promise<void> {
    if (this.connected) {
      return;
    }
    const ok = await this.connect();
    if (!ok) {
      throw new ConnectionError(`Failed to connect to source ${this.sourceId}`, this.errorContext());
    }
  }

  protected errorContext(): ErrorContext {
    return { sourceId: this.sourceId };
  }

  protected createMetadata(
    recordCount: number,
    parameters: QueryParameters,
    extra: Partial<ResultMetadata> = {}
  ): ResultMetadata {
    return {
      sourceId: this.sourceId,
      ...(this.config.sourceName && { sourceName: this.config.sourceName }),
      timestamp: new Date().toISOString(),
      recordCount,
      queryParameters: parameters,
      version: RESULT_VERSION,
      ...extra
    };
  }

  protected buildResult(
    records: DataRecord[],
    parameters: QueryParameters,
    extra: Partial<ResultMetadata> = {},
    schema?: SchemaField[]
  ): StandardResult {
    return {
      metadata: this.createMetadata(records.length, parameters, extra),
      data: records,
      schema: schema ?? inferSchema(records)
    };
  }
}

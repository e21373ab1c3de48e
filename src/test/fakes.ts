import { BaseConnector } from '../adapters/connectors/base-connector';
import {
  ConnectorConfig,
  ConnectorConfigStore,
  ConnectorConfigUpdate,
  ConnectorFactory,
  DataRecord,
  FetchFn,
  QueryParameters,
  StandardResult
} from '../types/connector';
import { StoredQuery, StoredQueryStore } from '../types/stored-query';
import { AnalysisResultRecord, AnalysisResultStore } from '../types/analysis';
import { ResourceExistsError, ResourceNotFoundError } from '../db/access';

/**
 * In-process stand-in for the connector config table
 */
export class InMemoryConnectorConfigStore implements ConnectorConfigStore {
  private readonly configs = new Map<string, ConnectorConfig>();

  constructor(configs: ConnectorConfig[] = []) {
    for (const config of configs) {
      this.configs.set(config.sourceId, { ...config });
    }
  }

  async getBySourceId(sourceId: string): Promise<ConnectorConfig | null> {
    const config = this.configs.get(sourceId);
    return config ? { ...config } : null;
  }

  async getAll(activeOnly = false): Promise<ConnectorConfig[]> {
    return Array.from(this.configs.values())
      .filter(config => !activeOnly || config.active)
      .sort((a, b) => a.sourceId.localeCompare(b.sourceId));
  }

  async create(config: ConnectorConfig): Promise<ConnectorConfig> {
    if (this.configs.has(config.sourceId)) {
      throw new ResourceExistsError('ConnectorConfig', config.sourceId);
    }
    this.configs.set(config.sourceId, { ...config });
    return config;
  }

  async update(sourceId: string, updates: ConnectorConfigUpdate): Promise<ConnectorConfig> {
    const existing = this.configs.get(sourceId);
    if (!existing) {
      throw new ResourceNotFoundError('ConnectorConfig', sourceId);
    }
    const updated = { ...existing, ...updates };
    this.configs.set(sourceId, updated);
    return updated;
  }

  async delete(sourceId: string): Promise<void> {
    if (!this.configs.delete(sourceId)) {
      throw new ResourceNotFoundError('ConnectorConfig', sourceId);
    }
  }
}

/**
 * In-process stand-in for the stored query table
 */
export class InMemoryStoredQueryStore implements StoredQueryStore {
  private readonly queries = new Map<string, StoredQuery>();

  async get(queryId: string): Promise<StoredQuery | null> {
    const query = this.queries.get(queryId);
    return query ? { ...query } : null;
  }

  async put(query: StoredQuery): Promise<void> {
    this.queries.set(query.queryId, { ...query });
  }

  async delete(queryId: string): Promise<boolean> {
    return this.queries.delete(queryId);
  }

  async listAll(): Promise<StoredQuery[]> {
    return Array.from(this.queries.values());
  }

  async listByConnector(connectorId: string): Promise<StoredQuery[]> {
    return Array.from(this.queries.values()).filter(query => query.connectorId === connectorId);
  }
}

/**
 * In-process stand-in for the analysis results table
 */
export class InMemoryAnalysisResultStore implements AnalysisResultStore {
  readonly records = new Map<string, AnalysisResultRecord>();

  async get(planId: string): Promise<AnalysisResultRecord | null> {
    const record = this.records.get(planId);
    return record ? structuredClone(record) : null;
  }

  async put(record: AnalysisResultRecord): Promise<void> {
    this.records.set(record.planId, structuredClone(record));
  }
}

export type RecordSource = (parameters: QueryParameters, dynamicParams: QueryParameters) => DataRecord[];

export interface StaticConnectorBehavior {
  records: RecordSource;
  connects?: boolean;
}

/**
 * Connector answering from an in-memory record source
 */
export class StaticConnector extends BaseConnector {
  queryCount = 0;

  constructor(config: ConnectorConfig, private readonly behavior: StaticConnectorBehavior) {
    super(config);
  }

  async connect(): Promise<boolean> {
    this.connected = this.behavior.connects ?? true;
    return this.connected;
  }

  async validate(): Promise<boolean> {
    return this.connected;
  }

  protected async executeQuery(parameters: QueryParameters, dynamicParams: QueryParameters): Promise<StandardResult> {
    this.queryCount++;
    return this.buildResult(this.behavior.records(parameters, dynamicParams), parameters);
  }
}

/**
 * Factory for the "static" connector type; behaviors are looked up by sourceId
 */
export function staticConnectorFactory(
  behaviors: Record<string, StaticConnectorBehavior>,
  created: StaticConnector[] = []
): ConnectorFactory {
  return (config: ConnectorConfig) => {
    const behavior = behaviors[config.sourceId] ?? { records: () => [] };
    const connector = new StaticConnector(config, behavior);
    created.push(connector);
    return connector;
  };
}

export function staticConfig(sourceId: string, overrides: Partial<ConnectorConfig> = {}): ConnectorConfig {
  return { sourceId, connectorType: 'static', active: true, ...overrides };
}

/**
 * JSON response with the given status and headers
 */
export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers }
  });
}

export interface RecordedFetch {
  fetchImpl: jest.MockedFunction<FetchFn>;
  urls: () => string[];
}

/**
 * fetch stub answering each call with the next response in line; the last
 * response repeats once the list runs out
 */
export function scriptedFetch(responses: Array<Response | Error | (() => Response)>): RecordedFetch {
  let index = 0;
  const fetchImpl = jest.fn<Promise<Response>, Parameters<FetchFn>>(async () => {
    const next = responses[Math.min(index, responses.length - 1)];
    index++;
    if (next instanceof Error) {
      throw next;
    }
    return typeof next === 'function' ? next() : next.clone();
  });
  return {
    fetchImpl,
    urls: () => fetchImpl.mock.calls.map(call => call[0])
  };
}

export const noSleep = jest.fn(async (_ms: number): Promise<void> => undefined);

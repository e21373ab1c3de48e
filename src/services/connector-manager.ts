/**
 * Connector Manager
 *
 * Owns the live connector instances. Connectors are created lazily from
 * their stored configuration, connected once and reused. A failure of one
 * source never affects another.
 */

import {
  CapabilitiesDescriptor,
  Connector,
  ConnectorConfig,
  ConnectorConfigStore,
  ConnectorFactory,
  ConnectorOptions,
  QueryParameters,
  StandardResult
} from '../types/connector';
import { QueryFailure } from '../types/query';
import { ConnectorRegistry } from '../adapters/connectors/registry';
import { ConnectionError, InactiveError, NotFoundError, QueryError, errorMessage, toFailure, toQueryError } from './errors';

export interface SourceQuerySuccess {
  success: true;
  data: StandardResult;
  sourceId: string;
  /** Default cache TTL configured for this source */
  ttlSeconds?: number;
}

export type SourceQueryResult = SourceQuerySuccess | QueryFailure;

export interface SourceInfo {
  sourceId: string;
  sourceName?: string;
  connectorType: string;
  connected: boolean;
  capabilities: CapabilitiesDescriptor;
}

export interface LoadSummary {
  loaded: string[];
  failed: Array<{ sourceId: string; error: string }>;
}

export interface ConnectorValidation {
  sourceId: string;
  valid: boolean;
  error?: string;
}

export interface ConnectorManagerOptions {
  registry?: ConnectorRegistry;
  connectorOptions?: ConnectorOptions;
}

type Resolution = { connector: Connector } | { error: QueryError };

export class ConnectorManager {
  private readonly registry: ConnectorRegistry;
  private readonly connectorOptions?: ConnectorOptions;
  private readonly connectors = new Map<string, Connector>();
  private readonly configs = new Map<string, ConnectorConfig>();
  private readonly pending = new Map<string, Promise<Resolution>>();

  constructor(
    private readonly configStore: ConnectorConfigStore,
    options: ConnectorManagerOptions = {}
  ) {
    this.registry = options.registry ?? new ConnectorRegistry();
    this.connectorOptions = options.connectorOptions;
  }

  registerType(typeName: string, factory: ConnectorFactory): void {
    this.registry.register(typeName, factory);
  }

  listTypes(): string[] {
    return this.registry.listTypes();
  }

  /**
   * Construct and connect every active source. Failures are logged and skipped.
   */
  async loadAll(): Promise<LoadSummary> {
    const configs = await this.configStore.getAll(true);
    const summary: LoadSummary = { loaded: [], failed: [] };

    for (const config of configs) {
      if (this.connectors.has(config.sourceId)) {
        summary.loaded.push(config.sourceId);
        continue;
      }

      const resolution = await this.singleFlight(config.sourceId, () => this.instantiate(config));
      if ('connector' in resolution) {
        summary.loaded.push(config.sourceId);
      } else {
        console.error(`[ConnectorManager] Skipping source ${config.sourceId}:`, resolution.error.message);
        summary.failed.push({ sourceId: config.sourceId, error: resolution.error.message });
      }
    }

    console.log('[ConnectorManager] Loaded connectors', {
      loaded: summary.loaded.length,
      failed: summary.failed.length
    });
    return summary;
  }

  /**
   * Live connector for a source, or null when the config is missing,
   * inactive or the connection fails
   */
  async getConnector(sourceId: string): Promise<Connector | null> {
    const resolution = await this.resolve(sourceId);
    return 'connector' in resolution ? resolution.connector : null;
  }

  /**
   * Route a query to its connector. Never throws.
   */
  async query(
    sourceId: string,
    parameters: QueryParameters,
    dynamicParams?: QueryParameters
  ): Promise<SourceQueryResult> {
    const resolution = await this.resolve(sourceId);
    if ('error' in resolution) {
      return toFailure(resolution.error, { sourceId });
    }

    try {
      const data = await resolution.connector.query(parameters, dynamicParams);
      const ttlSeconds = this.configs.get(sourceId)?.cacheTtlSeconds;
      return {
        success: true,
        data,
        sourceId,
        ...(ttlSeconds !== undefined && { ttlSeconds })
      };
    } catch (error) {
      console.error(`[ConnectorManager] Query failed for source ${sourceId}:`, errorMessage(error));
      return toFailure(error, { sourceId });
    }
  }

  /**
   * Live sources with their capabilities
   */
  listSources(): SourceInfo[] {
    return Array.from(this.connectors.entries())
      .map(([sourceId, connector]) => {
        const config = this.configs.get(sourceId);
        return {
          sourceId,
          sourceName: config?.sourceName,
          connectorType: config?.connectorType ?? 'unknown',
          connected: connector.isConnected(),
          capabilities: connector.getCapabilities()
        };
      })
      .sort((a, b) => a.sourceId.localeCompare(b.sourceId));
  }

  /**
   * Out-of-band health check; issues a real request through the connector
   */
  async validateConnector(sourceId: string): Promise<ConnectorValidation> {
    const resolution = await this.resolve(sourceId);
    if ('error' in resolution) {
      return { sourceId, valid: false, error: resolution.error.message };
    }

    try {
      const valid = await resolution.connector.validate();
      return valid ? { sourceId, valid } : { sourceId, valid, error: 'Connector validation failed' };
    } catch (error) {
      return { sourceId, valid: false, error: errorMessage(error) };
    }
  }

  /**
   * Drop a cached connector so the next call reloads its configuration
   */
  async evict(sourceId: string): Promise<void> {
    const connector = this.connectors.get(sourceId);
    this.connectors.delete(sourceId);
    this.configs.delete(sourceId);
    if (connector) {
      await this.safeDisconnect(sourceId, connector);
    }
  }

  /**
   * Disconnect every cached connector and clear the cache
   */
  async disconnectAll(): Promise<void> {
    const entries = Array.from(this.connectors.entries());
    this.connectors.clear();
    this.configs.clear();

    for (const [sourceId, connector] of entries) {
      await this.safeDisconnect(sourceId, connector);
    }
  }

  private async safeDisconnect(sourceId: string, connector: Connector): Promise<void> {
    try {
      await connector.disconnect();
    } catch (error) {
      console.error(`[ConnectorManager] Error disconnecting ${sourceId}:`, errorMessage(error));
    }
  }

  private async resolve(sourceId: string): Promise<Resolution> {
    const cached = this.connectors.get(sourceId);
    if (cached) {
      return { connector: cached };
    }

    return this.singleFlight(sourceId, async () => {
      let config: ConnectorConfig | null;
      try {
        config = await this.configStore.getBySourceId(sourceId);
      } catch (error) {
        return { error: toQueryError(error, { sourceId }) };
      }

      if (!config) {
        return { error: new NotFoundError('Connector', sourceId, { sourceId }) };
      }
      if (!config.active) {
        return { error: new InactiveError('Connector', sourceId, { sourceId }) };
      }
      return this.instantiate(config);
    });
  }

  /**
   * Concurrent callers for the same source share one construct-and-connect
   */
  private singleFlight(sourceId: string, work: () => Promise<Resolution>): Promise<Resolution> {
    const inFlight = this.pending.get(sourceId);
    if (inFlight) {
      return inFlight;
    }

    const promise = work().finally(() => {
      this.pending.delete(sourceId);
    });
    this.pending.set(sourceId, promise);
    return promise;
  }

  private async instantiate(config: ConnectorConfig): Promise<Resolution> {
    const context = { sourceId: config.sourceId };
    let connector: Connector;
    try {
      connector = this.registry.create(config, this.connectorOptions);
    } catch (error) {
      console.error(`[ConnectorManager] Failed to create connector ${config.sourceId}:`, errorMessage(error));
      return { error: toQueryError(error, context) };
    }

    let connected: boolean;
    try {
      connected = await connector.connect();
    } catch (error) {
      return { error: new ConnectionError(`Failed to connect to source ${config.sourceId}: ${errorMessage(error)}`, context) };
    }
    if (!connected) {
      return { error: new ConnectionError(`Failed to connect to source ${config.sourceId}`, context) };
    }

    this.connectors.set(config.sourceId, connector);
    this.configs.set(config.sourceId, config);
    return { connector };
  }
}

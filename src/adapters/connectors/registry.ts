/**
 * Connector Registry
 *
 * Maps a connector-type tag to the factory that builds it. Built-in types
 * are registered when the registry is created; new types are added with
 * register().
 */

import { Connector, ConnectorConfig, ConnectorFactory, ConnectorOptions } from '../../types/connector';
import { ConfigurationError, errorMessage, QueryError } from '../../services/errors';
import { FbiCrimeConnector } from './fbi-crime-connector';
import { CensusConnector } from './census-connector';
import { UsdaNassConnector } from './usda-nass-connector';
import { LocalFileConnector } from './local-file-connector';

export const BUILT_IN_CONNECTORS: Record<string, ConnectorFactory> = {
  fbi_crime: (config, options) => new FbiCrimeConnector(config, options),
  census: (config, options) => new CensusConnector(config, options),
  usda_nass: (config, options) => new UsdaNassConnector(config, options),
  local_file: (config) => new LocalFileConnector(config)
};

export class ConnectorRegistry {
  private readonly factories = new Map<string, ConnectorFactory>();

  constructor(factories: Record<string, ConnectorFactory> = BUILT_IN_CONNECTORS) {
    for (const [typeName, factory] of Object.entries(factories)) {
      this.factories.set(typeName, factory);
    }
  }

  /**
   * Associate a type tag with a factory; re-registering replaces the factory
   */
  register(typeName: string, factory: ConnectorFactory): void {
    if (!typeName.trim()) {
      throw new ConfigurationError('Connector type name must not be empty');
    }
    this.factories.set(typeName, factory);
  }

  has(typeName: string): boolean {
    return this.factories.has(typeName);
  }

  listTypes(): string[] {
    return Array.from(this.factories.keys()).sort();
  }

  /**
   * Build a connector for a configuration
   *
   * @throws ConfigurationError for unknown types or factory failures
   */
  create(config: ConnectorConfig, options?: ConnectorOptions): Connector {
    const factory = this.factories.get(config.connectorType);
    if (!factory) {
      throw new ConfigurationError(`Unknown connector type: ${config.connectorType}`, { sourceId: config.sourceId });
    }

    try {
      return factory(config, options);
    } catch (error) {
      if (error instanceof QueryError) {
        throw error;
      }
      throw new ConfigurationError(
        `Failed to create connector ${config.sourceId}: ${errorMessage(error)}`,
        { sourceId: config.sourceId }
      );
    }
  }
}

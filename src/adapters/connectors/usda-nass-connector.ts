/**
 * Agricultural statistics connector (USDA NASS QuickStats)
 */

import { CapabilitiesDescriptor, ConnectorConfig, ConnectorOptions, QueryParameters, StandardResult } from '../../types/connector';
import { ConfigurationError } from '../../services/errors';
import { HttpConnector } from './http-connector';
import { isPlainObject } from './base-connector';
import { resolveParameters } from './placeholders';

export const USDA_NASS_DEFAULT_BASE_URL = 'https://quickstats.nass.usda.gov/api';

export class UsdaNassConnector extends HttpConnector {
  private readonly format: string;

  constructor(config: ConnectorConfig, options: ConnectorOptions = {}) {
    super(config, options, USDA_NASS_DEFAULT_BASE_URL);
    if (!this.apiKey) {
      throw new ConfigurationError('API key is required for USDA NASS connector', { sourceId: config.sourceId });
    }
    this.format = (config.format ?? 'JSON').toUpperCase();
  }

  async validate(): Promise<boolean> {
    try {
      return await this.probe({
        commodity_desc: 'CORN',
        year: '2020',
        state_alpha: 'IA',
        statisticcat_desc: 'PRODUCTION'
      });
    } finally {
      await this.disconnect();
    }
  }

  protected async executeQuery(parameters: QueryParameters, dynamicParams: QueryParameters): Promise<StandardResult> {
    const resolved = resolveParameters(parameters, dynamicParams).parameters;
    const params: QueryParameters = {
      key: this.apiKey,
      format: this.format,
      ...resolved
    };

    const response = await this.fetchJson(`${this.baseUrl}/api_GET`, params);
    const result = this.transform(this.applyDataPath(response.data), parameters);
    result.metadata = { ...result.metadata, endpoint: 'api_GET', statusCode: response.status };
    return result;
  }

  /**
   * QuickStats wraps rows in { data: [...] }; anything that is neither that
   * nor a list yields no records
   */
  transform(rawPayload: unknown, parameters: QueryParameters = {}): StandardResult {
    if (Array.isArray(rawPayload) || (isPlainObject(rawPayload) && 'data' in rawPayload)) {
      return super.transform(rawPayload, parameters);
    }
    return this.buildResult([], parameters);
  }

  getCapabilities(): CapabilitiesDescriptor {
    return {
      ...super.getCapabilities(),
      supportsFiltering: true,
      supportsGeography: true,
      supportedFormats: ['json', 'csv', 'xml'],
      maxRecordsPerRequest: 50000
    };
  }
}

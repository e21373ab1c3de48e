/**
 * Census demographics connector
 *
 * The Census API answers with an array of arrays whose first row holds the
 * column names. Every value is delivered as text, so every field is typed string.
 */

import { CapabilitiesDescriptor, ConnectorConfig, ConnectorOptions, DataRecord, QueryParameters, StandardResult } from '../../types/connector';
import { ValidationError } from '../../services/errors';
import { HttpConnector } from './http-connector';
import { resolveParameters } from './placeholders';

export const CENSUS_DEFAULT_BASE_URL = 'https://api.census.gov/data';

export class CensusConnector extends HttpConnector {
  constructor(config: ConnectorConfig, options: ConnectorOptions = {}) {
    super(config, options, CENSUS_DEFAULT_BASE_URL);
  }

  async validate(): Promise<boolean> {
    try {
      return await this.probe({ dataset: '2020/acs/acs5', get: 'NAME', for: 'state:01' });
    } finally {
      await this.disconnect();
    }
  }

  protected async executeQuery(parameters: QueryParameters, dynamicParams: QueryParameters): Promise<StandardResult> {
    const resolved = resolveParameters(parameters, dynamicParams).parameters;
    const dataset = resolved.dataset;
    if (typeof dataset !== 'string' || dataset.trim() === '') {
      throw new ValidationError('Dataset parameter is required', this.errorContext());
    }

    const url = `${this.baseUrl}/${dataset.trim().replace(/^\/+/, '')}`;
    const params: QueryParameters = {};
    for (const [key, value] of Object.entries(resolved)) {
      if (key !== 'dataset') {
        params[key] = value;
      }
    }
    if (this.apiKey) {
      params.key = this.apiKey;
    }

    const response = await this.fetchJson(url, params);
    const result = this.transform(this.applyDataPath(response.data), parameters);
    result.metadata = { ...result.metadata, endpoint: dataset, statusCode: response.status };
    return result;
  }

  /**
   * Map header-row tables onto records; any other shape uses the default mapping
   */
  transform(rawPayload: unknown, parameters: QueryParameters = {}): StandardResult {
    if (!Array.isArray(rawPayload) || !rawPayload.every(row => Array.isArray(row))) {
      return super.transform(rawPayload, parameters);
    }

    const rows: unknown[][] = rawPayload;
    if (rows.length < 2) {
      return this.buildResult([], parameters, {}, []);
    }

    const headers = rows[0].map(header => String(header));
    const records: DataRecord[] = rows.slice(1).map(row => {
      const record: DataRecord = {};
      headers.forEach((header, index) => {
        record[header] = index < row.length ? row[index] : null;
      });
      return record;
    });

    return this.buildResult(
      records,
      parameters,
      {},
      headers.map(name => ({ name, type: 'string' }))
    );
  }

  getCapabilities(): CapabilitiesDescriptor {
    return {
      ...super.getCapabilities(),
      supportsFiltering: true,
      supportsGeography: true,
      requiredParameters: ['dataset']
    };
  }
}

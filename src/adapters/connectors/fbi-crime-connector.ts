/**
 * Crime statistics connector
 *
 * Talks to the FBI Crime Data API in either of its addressing dialects:
 * - legacy SAPI: /api/{endpoint}/{from}/{to} with an `api_key` parameter
 * - CDE: /{endpoint}?from=..&to=.. with an `API_KEY` parameter
 * A full URL passed as endpoint is used verbatim.
 */

import { ConnectorConfig, ConnectorOptions, QueryParameters, StandardResult, YearMode, CapabilitiesDescriptor } from '../../types/connector';
import { HttpConnector } from './http-connector';
import { isPlainObject } from './base-connector';
import { resolveParameters } from './placeholders';

export const FBI_CRIME_DEFAULT_BASE_URL = 'https://api.usa.gov/crime/fbi/sapi';

const DEFAULT_ENDPOINT = 'estimates/national';
const DEFAULT_PATH_YEAR = '2020';
const CDE_URL_SEGMENT = '/crime/fbi/cde/';

export interface CrimeRequest {
  url: string;
  params: QueryParameters;
  endpoint: string;
  yearMode: YearMode;
}

function isFullUrl(endpoint: string): boolean {
  const lower = endpoint.trim().toLowerCase();
  return lower.startsWith('http://') || lower.startsWith('https://');
}

function isCdeEndpoint(endpoint: string): boolean {
  return isFullUrl(endpoint) && endpoint.trim().toLowerCase().includes(CDE_URL_SEGMENT);
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, '');
}

function asText(value: unknown): string | undefined {
  if (value === null || value === undefined || value === '') {
    return undefined;
  }
  return String(value);
}

/**
 * Series label from tooltip.leftYAxisHeaders.yAxisHeaderActual, when present
 */
export function tooltipHeader(payload: unknown): string | undefined {
  if (!isPlainObject(payload) || !isPlainObject(payload.tooltip)) {
    return undefined;
  }
  const headers = payload.tooltip.leftYAxisHeaders;
  if (!isPlainObject(headers) || typeof headers.yAxisHeaderActual !== 'string') {
    return undefined;
  }
  return headers.yAxisHeaderActual;
}

/**
 * Reshape a time series into [{ date, <header>: value }].
 * Accepts rows of { date, <one value column> } or parallel arrays
 * { date: [...], <one value column>: [...] }. Anything else is returned as is.
 */
export function reshapeTimeSeries(data: unknown, header: string): unknown {
  if (Array.isArray(data)) {
    return data.map(row => {
      if (!isPlainObject(row) || !('date' in row)) {
        return row;
      }
      const valueKeys = Object.keys(row).filter(key => key !== 'date');
      if (valueKeys.length !== 1) {
        return row;
      }
      return { date: row.date, [header]: row[valueKeys[0]] };
    });
  }

  if (isPlainObject(data) && Array.isArray(data.date)) {
    const dates: unknown[] = data.date;
    const valueKeys = Object.keys(data).filter(key => key !== 'date');
    if (valueKeys.length !== 1) {
      return data;
    }
    const values: unknown = data[valueKeys[0]];
    if (!Array.isArray(values) || values.length !== dates.length) {
      return data;
    }
    return dates.map((date, index) => ({ date, [header]: values[index] }));
  }

  return data;
}

export class FbiCrimeConnector extends HttpConnector {
  private readonly yearMode: YearMode;
  private readonly apiKeyParam: string;
  private readonly apiNamespace: string;

  constructor(config: ConnectorConfig, options: ConnectorOptions = {}) {
    super(config, options, FBI_CRIME_DEFAULT_BASE_URL);

    const cde = this.baseUrl.toLowerCase().includes('cde');
    this.yearMode = config.yearMode ?? (cde ? 'query' : 'path');
    this.apiKeyParam = config.apiKeyParam ?? (cde ? 'API_KEY' : 'api_key');
    this.apiNamespace = config.apiNamespace !== undefined ? trimSlashes(config.apiNamespace) : (cde ? '' : 'api');

    if (config.yearMode === undefined || config.apiKeyParam === undefined) {
      console.warn('[FbiCrimeConnector] Addressing dialect inferred from base URL', {
        sourceId: this.sourceId,
        baseUrl: this.baseUrl,
        yearMode: this.yearMode,
        apiKeyParam: this.apiKeyParam
      });
    }
  }

  async validate(): Promise<boolean> {
    if (!this.apiKey) {
      console.error(`[FbiCrimeConnector] API key is required for ${this.sourceId}`);
      return false;
    }
    try {
      return await this.probe({ endpoint: DEFAULT_ENDPOINT, from: DEFAULT_PATH_YEAR, to: DEFAULT_PATH_YEAR });
    } finally {
      await this.disconnect();
    }
  }

  /**
   * Build the outbound URL and query parameters, resolving placeholders first
   */
  buildRequest(parameters: QueryParameters, dynamicParams: QueryParameters = {}): CrimeRequest {
    const resolved = resolveParameters(parameters, dynamicParams).parameters;
    const endpoint = (asText(resolved.endpoint) ?? DEFAULT_ENDPOINT).trim();
    const yearMode = this.resolveYearMode(endpoint);
    const apiKeyParam = this.resolveApiKeyParam(endpoint);

    let from = asText(resolved.from);
    let to = asText(resolved.to);
    if (yearMode === 'path') {
      from = from ?? DEFAULT_PATH_YEAR;
      to = to ?? DEFAULT_PATH_YEAR;
    }

    const params: QueryParameters = {};
    if (this.apiKey) {
      params[apiKeyParam] = this.apiKey;
    }
    const excluded = new Set(['endpoint', 'from', 'to', 'api_key', 'API_KEY', 'apiKeyParam', this.apiKeyParam]);
    for (const [key, value] of Object.entries(resolved)) {
      if (!excluded.has(key) && value !== null && value !== undefined) {
        params[key] = value;
      }
    }

    const url = this.buildUrl(endpoint, yearMode, from, to);

    if (yearMode === 'query') {
      if (from && !('from' in params)) params.from = from;
      if (to && !('to' in params)) params.to = to;
    }

    return { url, params, endpoint, yearMode };
  }

  protected async executeQuery(parameters: QueryParameters, dynamicParams: QueryParameters): Promise<StandardResult> {
    const request = this.buildRequest(parameters, dynamicParams);
    console.log('[FbiCrimeConnector] Executing query', { sourceId: this.sourceId, url: request.url });

    const response = await this.fetchJson(request.url, request.params);
    const raw = response.data;

    let data = this.applyDataPath(raw);
    const header = tooltipHeader(raw);
    if (header) {
      const series = data === raw && isPlainObject(raw) && 'data' in raw ? raw.data : data;
      data = reshapeTimeSeries(series, header);
    }

    const result = this.transform(data, parameters);
    result.metadata = {
      ...result.metadata,
      endpoint: request.endpoint,
      statusCode: response.status,
      ...(this.config.dataPath && { dataPath: this.config.dataPath })
    };
    return result;
  }

  getCapabilities(): CapabilitiesDescriptor {
    return {
      ...super.getCapabilities(),
      supportsPagination: true,
      supportsFiltering: true,
      supportsGeography: true,
      requiredParameters: []
    };
  }

  private resolveYearMode(endpoint: string): YearMode {
    if (this.config.yearMode !== undefined) {
      return this.config.yearMode;
    }
    return isCdeEndpoint(endpoint) ? 'query' : this.yearMode;
  }

  private resolveApiKeyParam(endpoint: string): string {
    if (this.config.apiKeyParam !== undefined) {
      return this.config.apiKeyParam;
    }
    return isCdeEndpoint(endpoint) ? 'API_KEY' : this.apiKeyParam;
  }

  private buildUrl(endpoint: string, yearMode: YearMode, from?: string, to?: string): string {
    if (isFullUrl(endpoint)) {
      return endpoint;
    }

    const cleanEndpoint = trimSlashes(endpoint);
    const namespace = this.apiNamespace;
    let route = cleanEndpoint;
    if (namespace && cleanEndpoint !== namespace && !cleanEndpoint.startsWith(`${namespace}/`)) {
      route = [namespace, cleanEndpoint].filter(part => part !== '').join('/');
    }

    const parts = [this.baseUrl, route];
    if (yearMode === 'path') {
      if (from) parts.push(from);
      if (to) parts.push(to);
    }

    return parts
      .map((part, index) => (index === 0 ? part.replace(/\/+$/, '') : trimSlashes(part)))
      .filter(part => part !== '')
      .join('/');
  }
}

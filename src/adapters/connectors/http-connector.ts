/**
 * HTTP Connector - shared plumbing for connectors backed by a REST API
 */

import { ConnectorConfig, ConnectorOptions, QueryParameters } from '../../types/connector';
import { DEFAULT_SERVICE_CONFIG } from '../../config';
import { BaseConnector } from './base-connector';
import { HttpClient, HttpResponse } from './http-client';
import { extractByPath } from './data-path';

/**
 * Serialize parameter values for a query string. Null and undefined are dropped.
 */
export function toQueryString(params: QueryParameters): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value === null || value === undefined) {
      continue;
    }
    if (Array.isArray(value)) {
      result[key] = value.map(item => String(item)).join(',');
    } else if (typeof value === 'object') {
      result[key] = JSON.stringify(value);
    } else {
      result[key] = String(value);
    }
  }
  return result;
}

export abstract class HttpConnector extends BaseConnector {
  protected readonly baseUrl: string;
  protected readonly apiKey?: string;
  protected readonly http: HttpClient;

  constructor(config: ConnectorConfig, options: ConnectorOptions = {}, defaultBaseUrl?: string) {
    super(config);
    this.baseUrl = (config.baseUrl ?? defaultBaseUrl ?? '').replace(/\/+$/, '');
    this.apiKey = config.credentials?.apiKey;
    this.http = new HttpClient(config.sourceId, {
      retryConfig: {
        maxRetries: config.maxRetries ?? DEFAULT_SERVICE_CONFIG.maxRetries,
        retryDelayMs: (config.retryDelaySeconds ?? DEFAULT_SERVICE_CONFIG.retryDelaySeconds) * 1000
      },
      timeoutMs: config.requestTimeoutMs ?? DEFAULT_SERVICE_CONFIG.requestTimeoutMs,
      fetchImpl: options.fetchImpl,
      sleep: options.sleep
    });
  }

  /**
   * Prepare the session. No network traffic; fails only on an unusable base URL.
   */
  async connect(): Promise<boolean> {
    if (this.connected) {
      return true;
    }

    try {
      const parsed = new URL(this.baseUrl);
      if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
        console.error(`[${this.constructor.name}] Unsupported protocol for ${this.sourceId}: ${parsed.protocol}`);
        return false;
      }
    } catch (error) {
      console.error(`[${this.constructor.name}] Invalid base URL for ${this.sourceId}:`, error);
      return false;
    }

    this.connected = true;
    return true;
  }

  protected async fetchJson(url: string, params: QueryParameters): Promise<HttpResponse> {
    return this.http.getWithRetry({
      url,
      params: toQueryString(params),
      headers: { Accept: 'application/json' }
    });
  }

  /**
   * Narrow the payload with the configured dataPath, failing open
   */
  protected applyDataPath(payload: unknown): unknown {
    const dataPath = this.config.dataPath;
    if (!dataPath) {
      return payload;
    }

    const extraction = extractByPath(payload, dataPath);
    if (extraction.warning) {
      console.warn(`[${this.constructor.name}] ${extraction.warning}`, { sourceId: this.sourceId });
    }
    return extraction.value;
  }

  /**
   * Issue a cheap request and report whether it succeeded
   */
  protected async probe(parameters: QueryParameters): Promise<boolean> {
    try {
      await this.query(parameters);
      return true;
    } catch (error) {
      console.error(`[${this.constructor.name}] Validation failed for ${this.sourceId}:`, error);
      return false;
    }
  }
}

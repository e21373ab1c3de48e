/**
 * HTTP client for data source connectors
 *
 * Provides GET requests with:
 * - Per-request timeout (AbortController)
 * - Status code classification
 * - Retry with exponential backoff, honouring Retry-After on 429
 */

import { FetchFn, SleepFn } from '../../types/connector';
import { RetryConfig } from '../../types/query-error';
import { UpstreamError } from '../../services/errors';

export interface HttpRequest {
  url: string;
  params?: Record<string, string>;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface HttpResponse {
  data: unknown;
  status: number;
  headers: Record<string, string>;
  latencyMs: number;
}

export interface HttpClientOptions {
  retryConfig?: Partial<RetryConfig>;
  timeoutMs?: number;
  fetchImpl?: FetchFn;
  sleep?: SleepFn;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  retryDelayMs: 1000
};

const DEFAULT_TIMEOUT_MS = 30000;

export const defaultSleep: SleepFn = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

export class HttpClient {
  private readonly sourceId: string;
  private readonly retryConfig: RetryConfig;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchFn;
  private readonly sleep: SleepFn;

  constructor(sourceId: string, options: HttpClientOptions = {}) {
    this.sourceId = sourceId;
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.retryConfig };
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Execute a single GET request
   *
   * @throws UpstreamError on non-2xx, timeout, network failure or a non-JSON body
   */
  async get(request: HttpRequest): Promise<HttpResponse> {
    const startTime = Date.now();
    const timeout = request.timeoutMs ?? this.timeoutMs;
    const url = buildUrl(request.url, request.params);

    let response: Response;
    try {
      response = await this.fetchWithTimeout(url, { method: 'GET', headers: request.headers }, timeout);
    } catch (error) {
      throw this.categorizeError(error, Date.now() - startTime);
    }

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });

    if (!response.ok) {
      const errorBody = await safeReadBody(response);
      throw this.createErrorFromResponse(response.status, errorBody, headers);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new UpstreamError(
        `Invalid JSON response from ${request.url}`,
        { sourceId: this.sourceId },
        response.status,
        false,
        undefined,
        error instanceof Error ? error.message : undefined
      );
    }

    return {
      data,
      status: response.status,
      headers,
      latencyMs: Date.now() - startTime
    };
  }

  /**
   * Execute a GET request with retry.
   *
   * Up to maxRetries attempts. A 429 waits Retry-After (or the base delay);
   * any other non-2xx, timeouts and network errors wait
   * retryDelayMs * 2^attempt. Non-JSON bodies and unknown failures surface
   * immediately. After the last attempt the last error is thrown unmodified.
   */
  async getWithRetry(request: HttpRequest): Promise<HttpResponse> {
    const attempts = Math.max(1, this.retryConfig.maxRetries);
    let lastError: UpstreamError | undefined;

    for (let attempt = 0; attempt < attempts; attempt++) {
      try {
        return await this.get(request);
      } catch (error) {
        if (!(error instanceof UpstreamError) || !error.retryable) {
          throw error;
        }

        lastError = error;
        if (attempt === attempts - 1) {
          break;
        }

        const delayMs = this.retryDelayFor(error, attempt);
        console.warn('[HttpClient] Retrying request', {
          sourceId: this.sourceId,
          url: request.url,
          attempt: attempt + 1,
          statusCode: error.statusCode,
          delayMs
        });
        await this.sleep(delayMs);
      }
    }

    throw lastError ?? new UpstreamError('Max retries exceeded', { sourceId: this.sourceId });
  }

  /**
   * Exponential backoff: retryDelayMs * 2^attempt
   */
  calculateRetryDelay(attempt: number): number {
    return this.retryConfig.retryDelayMs * Math.pow(2, attempt);
  }

  getRetryConfig(): RetryConfig {
    return { ...this.retryConfig };
  }

  private retryDelayFor(error: UpstreamError, attempt: number): number {
    if (error.statusCode === 429) {
      return error.retryAfterMs ?? this.retryConfig.retryDelayMs;
    }
    return this.calculateRetryDelay(attempt);
  }

  private async fetchWithTimeout(url: string, init: RequestInit, timeout: number): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      return await this.fetchImpl(url, { ...init, signal: controller.signal });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private createErrorFromResponse(
    status: number,
    body: unknown,
    headers: Record<string, string>
  ): UpstreamError {
    return new UpstreamError(
      extractErrorMessage(body, status),
      { sourceId: this.sourceId },
      status,
      true,
      status === 429 ? parseRetryAfter(headers) : undefined,
      body
    );
  }

  /**
   * Timeouts and network failures are retryable; anything else is not
   */
  private categorizeError(error: unknown, latencyMs: number): UpstreamError {
    const context = { sourceId: this.sourceId };

    if (error instanceof Error) {
      const message = error.message.toLowerCase();

      if (error.name === 'AbortError' || message.includes('abort') || message.includes('timeout')) {
        return new UpstreamError(`Request timed out after ${latencyMs}ms`, context, undefined, true);
      }

      if (
        message.includes('network') ||
        message.includes('econnreset') ||
        message.includes('econnrefused') ||
        message.includes('enotfound') ||
        message.includes('fetch failed')
      ) {
        return new UpstreamError(`Network error: ${error.message}`, context, undefined, true);
      }

      return new UpstreamError(error.message, context, undefined, false);
    }

    return new UpstreamError('Unknown error', context, undefined, false, undefined, error);
  }
}

/**
 * Append query parameters to a URL that may already carry a query string
 */
export function buildUrl(url: string, params?: Record<string, string>): string {
  if (!params || Object.keys(params).length === 0) {
    return url;
  }
  const query = new URLSearchParams(params).toString();
  return url.includes('?') ? `${url}&${query}` : `${url}?${query}`;
}

/**
 * Parse a Retry-After header given in seconds or as an HTTP date
 *
 * @returns Milliseconds to wait, or undefined if absent or unparseable
 */
export function parseRetryAfter(headers: Record<string, string>): number | undefined {
  const retryAfter = headers['retry-after'];
  if (!retryAfter) {
    return undefined;
  }

  const seconds = Number(retryAfter);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  const date = new Date(retryAfter);
  if (!Number.isNaN(date.getTime())) {
    const delayMs = date.getTime() - Date.now();
    return delayMs > 0 ? delayMs : 0;
  }

  return undefined;
}

function extractErrorMessage(body: unknown, status: number): string {
  if (typeof body === 'string' && body.trim() !== '') {
    return `HTTP ${status}: ${body.trim().slice(0, 200)}`;
  }

  if (body && typeof body === 'object' && !Array.isArray(body)) {
    for (const field of ['message', 'error', 'detail', 'msg']) {
      const value: unknown = Reflect.get(body, field);
      if (typeof value === 'string') {
        return `HTTP ${status}: ${value}`;
      }
    }
  }

  return `HTTP ${status} error`;
}

async function safeReadBody(response: Response): Promise<unknown> {
  let text: string;
  try {
    text = await response.text();
  } catch {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

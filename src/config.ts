/**
 * Process-wide defaults, read from environment variables
 */

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function floatFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = parseFloat(raw);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export interface ServiceConfig {
  /** Default TTL of cached query results */
  cacheTtlSeconds: number;
  cacheEnabled: boolean;
  /** Default attempt budget for outbound HTTP calls */
  maxRetries: number;
  retryDelaySeconds: number;
  requestTimeoutMs: number;
}

export const DEFAULT_SERVICE_CONFIG: ServiceConfig = {
  cacheTtlSeconds: intFromEnv('CACHE_TTL_SECONDS', 3600),
  cacheEnabled: process.env.QUERY_CACHE_ENABLED !== 'false',
  maxRetries: intFromEnv('DEFAULT_MAX_RETRIES', 3),
  retryDelaySeconds: floatFromEnv('DEFAULT_RETRY_DELAY_SECONDS', 1),
  requestTimeoutMs: intFromEnv('REQUEST_TIMEOUT_MS', 30000)
};

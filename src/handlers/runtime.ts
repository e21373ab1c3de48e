/**
 * Process-wide service wiring for the Lambda handlers.
 * Built on first use and reused across warm invocations.
 */

import { DEFAULT_SERVICE_CONFIG } from '../config';
import { ConnectorConfigRepository } from '../repositories/connector-config';
import { StoredQueryRepository } from '../repositories/stored-query';
import { QueryCacheRepository } from '../repositories/query-cache';
import { AnalysisResultRepository } from '../repositories/analysis-result';
import { ConnectorManager } from '../services/connector-manager';
import { CacheStore } from '../services/cache-store';
import { StoredQueryCatalog } from '../services/stored-query-catalog';
import { QueryEngine } from '../services/query-engine';
import { BasicAnalysisEngine } from '../services/analysis-engine';
import { RequestValidator } from '../services/request-validator';
import { ConnectorConfigStore } from '../types/connector';

export interface Runtime {
  configStore: ConnectorConfigStore;
  manager: ConnectorManager;
  cache: CacheStore;
  catalog: StoredQueryCatalog;
  engine: QueryEngine;
  validator: RequestValidator;
}

let runtime: Runtime | null = null;

export function getRuntime(): Runtime {
  if (runtime) {
    return runtime;
  }

  const validator = new RequestValidator();
  const manager = new ConnectorManager(ConnectorConfigRepository);
  const cache = new CacheStore(QueryCacheRepository, {
    defaultTtlSeconds: DEFAULT_SERVICE_CONFIG.cacheTtlSeconds
  });
  const catalog = new StoredQueryCatalog(StoredQueryRepository, { validator });
  const engine = new QueryEngine(manager, cache, catalog, new BasicAnalysisEngine(), {
    cacheEnabled: DEFAULT_SERVICE_CONFIG.cacheEnabled,
    resultStore: AnalysisResultRepository
  });

  runtime = {
    configStore: ConnectorConfigRepository,
    manager,
    cache,
    catalog,
    engine,
    validator
  };
  return runtime;
}

/**
 * Drop the wiring; the next call rebuilds it
 */
export async function resetRuntime(): Promise<void> {
  const current = runtime;
  runtime = null;
  if (current) {
    await current.manager.disconnectAll();
  }
}

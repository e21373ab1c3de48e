export * from './types/connector';
export * from './types/cache';
export * from './types/stored-query';
export * from './types/query';
export * from './types/query-error';
export * from './types/analysis';
export * from './services/errors';
export { DEFAULT_SERVICE_CONFIG, ServiceConfig } from './config';
export { ConnectorRegistry, BUILT_IN_CONNECTORS } from './adapters/connectors/registry';
export { BaseConnector } from './adapters/connectors/base-connector';
export { HttpConnector } from './adapters/connectors/http-connector';
export { HttpClient, DEFAULT_RETRY_CONFIG } from './adapters/connectors/http-client';
export { FbiCrimeConnector } from './adapters/connectors/fbi-crime-connector';
export { CensusConnector } from './adapters/connectors/census-connector';
export { UsdaNassConnector } from './adapters/connectors/usda-nass-connector';
export { LocalFileConnector } from './adapters/connectors/local-file-connector';
export { resolveParameters, isDynamicPlaceholder } from './adapters/connectors/placeholders';
export { ConnectorManager, SourceQueryResult, SourceInfo, LoadSummary } from './services/connector-manager';
export { CacheStore, InMemoryCacheBackend, fingerprint } from './services/cache-store';
export { StoredQueryCatalog } from './services/stored-query-catalog';
export { QueryEngine, QueryEngineOptions } from './services/query-engine';
export { BasicAnalysisEngine } from './services/analysis-engine';
export { RequestValidator } from './services/request-validator';

/**
 * Connector types for federated data queries
 *
 * A connector executes one query against one external data source and
 * returns a StandardResult document.
 */

/**
 * Dispatch tags of the built-in connector types
 */
export type BuiltInConnectorType = 'fbi_crime' | 'census' | 'usda_nass' | 'local_file';

/**
 * Year addressing scheme for the crime statistics API
 * - path: years embedded in the path (/api/{endpoint}/{from}/{to})
 * - query: years sent as from/to query parameters
 */
export type YearMode = 'path' | 'query';

export type LocalFileType = 'csv' | 'tsv' | 'json';

/**
 * Query parameters passed to a connector
 */
export type QueryParameters = Record<string, unknown>;

/**
 * One record of a standardized result
 */
export type DataRecord = Record<string, unknown>;

/**
 * Configuration of one data source
 */
export interface ConnectorConfig {
  sourceId: string;
  sourceName?: string;
  connectorType: string;
  baseUrl?: string;
  /** Opaque secrets; HTTP connectors read `apiKey` */
  credentials?: Record<string, string>;
  maxRetries?: number;
  retryDelaySeconds?: number;
  requestTimeoutMs?: number;
  /** Default cache TTL for results of this source */
  cacheTtlSeconds?: number;
  active: boolean;
  dataPath?: string;
  apiKeyParam?: string;
  apiNamespace?: string;
  yearMode?: YearMode;
  format?: string;
  filePath?: string;
  fileType?: LocalFileType;
  encoding?: BufferEncoding;
  delimiter?: string;
  createdAt?: string;
  updatedAt?: string;
}

export type FieldType = 'string' | 'number' | 'boolean' | 'object' | 'array';

export interface SchemaField {
  name: string;
  type: FieldType;
}

export interface ResultMetadata {
  sourceId: string;
  sourceName?: string;
  timestamp: string;
  recordCount: number;
  queryParameters: QueryParameters;
  version: string;
  endpoint?: string;
  dataPath?: string;
  statusCode?: number;
}

/**
 * Standardized connector output.
 * data.length always equals metadata.recordCount.
 */
export interface StandardResult {
  metadata: ResultMetadata;
  data: DataRecord[];
  schema: SchemaField[];
}

/**
 * Static description of what a connector supports
 */
export interface CapabilitiesDescriptor {
  sourceId: string;
  sourceName?: string;
  connectorType: string;
  supportsPagination: boolean;
  supportsFiltering: boolean;
  supportsSorting: boolean;
  supportsGeography: boolean;
  supportedFormats: string[];
  requiredParameters: string[];
  maxRecordsPerRequest?: number;
}

/**
 * Uniform contract implemented by every data source connector
 */
export interface Connector {
  readonly sourceId: string;
  connect(): Promise<boolean>;
  disconnect(): Promise<boolean>;
  validate(): Promise<boolean>;
  query(parameters: QueryParameters, dynamicParams?: QueryParameters): Promise<StandardResult>;
  transform(rawPayload: unknown, parameters?: QueryParameters): StandardResult;
  getCapabilities(): CapabilitiesDescriptor;
  isConnected(): boolean;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type SleepFn = (ms: number) => Promise<void>;

/**
 * Runtime hooks shared by connectors; tests replace fetch and sleep
 */
export interface ConnectorOptions {
  fetchImpl?: FetchFn;
  sleep?: SleepFn;
}

export type ConnectorFactory = (config: ConnectorConfig, options?: ConnectorOptions) => Connector;

/**
 * Persistence of connector configurations
 */
export interface ConnectorConfigStore {
  getBySourceId(sourceId: string): Promise<ConnectorConfig | null>;
  getAll(activeOnly?: boolean): Promise<ConnectorConfig[]>;
  create(config: ConnectorConfig): Promise<ConnectorConfig>;
  update(sourceId: string, updates: ConnectorConfigUpdate): Promise<ConnectorConfig>;
  delete(sourceId: string): Promise<void>;
}

/**
 * Connector configuration as submitted by clients; active defaults to true
 */
export type ConnectorConfigInput = Omit<ConnectorConfig, 'active' | 'createdAt' | 'updatedAt'> & { active?: boolean };

export type ConnectorConfigUpdate = Partial<Omit<ConnectorConfig, 'sourceId' | 'createdAt' | 'updatedAt'>>;

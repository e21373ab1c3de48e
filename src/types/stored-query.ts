/**
 * Stored query types
 */

import { QueryParameters } from './connector';

/**
 * A named, reusable query template. Parameter values may hold
 * dynamic placeholders such as "{from mm-yyyy}".
 */
export interface StoredQuery {
  queryId: string;
  queryName: string;
  description?: string;
  connectorId: string;
  parameters: QueryParameters;
  active: boolean;
  tags: string[];
  createdBy?: string;
  createdAt: string;
  updatedAt: string;
}

export interface CreateStoredQueryInput {
  queryId: string;
  queryName: string;
  description?: string;
  connectorId: string;
  parameters: QueryParameters;
  active?: boolean;
  tags?: string[];
  createdBy?: string;
}

export type StoredQueryUpdate = Partial<Omit<StoredQuery, 'queryId' | 'createdAt' | 'updatedAt'>>;

export interface StoredQueryFilter {
  connectorId?: string;
  activeOnly?: boolean;
  /** Matches queries carrying any of these tags */
  tags?: string[];
}

/**
 * Result of resolving a stored query with caller overrides
 */
export interface ResolvedStoredQuery {
  storedQuery: StoredQuery;
  connectorId: string;
  parameters: QueryParameters;
}

/**
 * Persistence of stored queries
 */
export interface StoredQueryStore {
  get(queryId: string): Promise<StoredQuery | null>;
  put(query: StoredQuery): Promise<void>;
  delete(queryId: string): Promise<boolean>;
  listAll(): Promise<StoredQuery[]>;
  listByConnector(connectorId: string): Promise<StoredQuery[]>;
}

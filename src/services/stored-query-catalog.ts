/**
 * Stored Query Catalog
 *
 * Named, persisted query templates that can be resolved by id and executed
 * with caller-supplied parameter overrides.
 */

import { QueryParameters } from '../types/connector';
import {
  CreateStoredQueryInput,
  ResolvedStoredQuery,
  StoredQuery,
  StoredQueryFilter,
  StoredQueryStore
} from '../types/stored-query';
import { ConflictError, InactiveError, NotFoundError, ValidationError } from './errors';
import { RequestValidator } from './request-validator';

export interface StoredQueryCatalogOptions {
  validator?: RequestValidator;
  now?: () => Date;
}

function byName(a: StoredQuery, b: StoredQuery): number {
  return a.queryName.localeCompare(b.queryName);
}

export class StoredQueryCatalog {
  private readonly validator: RequestValidator;
  private readonly now: () => Date;

  constructor(
    private readonly store: StoredQueryStore,
    options: StoredQueryCatalogOptions = {}
  ) {
    this.validator = options.validator ?? new RequestValidator();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Create a stored query; active defaults to true and tags to []
   *
   * @throws ValidationError if required fields are missing
   * @throws ConflictError if the queryId is taken
   */
  async create(input: unknown): Promise<StoredQuery> {
    const validation = this.validator.validateStoredQueryInput(input);
    if (!validation.valid) {
      const fields = validation.errors.map(error => `${error.field}: ${error.message}`).join('; ');
      throw new ValidationError(`Invalid stored query: ${fields}`);
    }

    const data: CreateStoredQueryInput = validation.value;
    const existing = await this.store.get(data.queryId);
    if (existing) {
      throw new ConflictError('Stored query', data.queryId, { queryId: data.queryId });
    }

    const timestamp = this.now().toISOString();
    const query: StoredQuery = {
      ...data,
      active: data.active ?? true,
      tags: data.tags ?? [],
      createdAt: timestamp,
      updatedAt: timestamp
    };

    await this.store.put(query);
    console.log('[StoredQueryCatalog] Created stored query', { queryId: query.queryId, connectorId: query.connectorId });
    return query;
  }

  async get(queryId: string): Promise<StoredQuery | null> {
    return this.store.get(queryId);
  }

  /**
   * List stored queries sorted by name
   */
  async list(filter: StoredQueryFilter = {}): Promise<StoredQuery[]> {
    const queries = filter.connectorId
      ? await this.store.listByConnector(filter.connectorId)
      : await this.store.listAll();

    const tags = filter.tags ?? [];
    return queries
      .filter(query => !filter.activeOnly || query.active)
      .filter(query => tags.length === 0 || query.tags.some(tag => tags.includes(tag)))
      .sort(byName);
  }

  async listByConnector(connectorId: string, activeOnly = true): Promise<StoredQuery[]> {
    return this.list({ connectorId, activeOnly });
  }

  /**
   * Apply a partial update. queryId and createdAt never change.
   *
   * @throws NotFoundError if the query does not exist
   */
  async update(queryId: string, updates: unknown): Promise<StoredQuery> {
    const validation = this.validator.validateStoredQueryUpdate(updates);
    if (!validation.valid) {
      const fields = validation.errors.map(error => `${error.field}: ${error.message}`).join('; ');
      throw new ValidationError(`Invalid stored query update: ${fields}`, { queryId });
    }

    return this.modify(queryId, existing => ({ ...existing, ...validation.value }));
  }

  /**
   * @returns True if a query was removed
   */
  async delete(queryId: string): Promise<boolean> {
    const removed = await this.store.delete(queryId);
    if (removed) {
      console.log('[StoredQueryCatalog] Deleted stored query', { queryId });
    }
    return removed;
  }

  /**
   * Case-insensitive substring match on name and description
   */
  async search(term: string): Promise<StoredQuery[]> {
    const needle = term.trim().toLowerCase();
    const queries = await this.store.listAll();
    return queries
      .filter(query =>
        query.queryName.toLowerCase().includes(needle) ||
        (query.description ?? '').toLowerCase().includes(needle)
      )
      .sort(byName);
  }

  async addTag(queryId: string, tag: string): Promise<StoredQuery> {
    return this.modify(queryId, existing =>
      existing.tags.includes(tag) ? existing : { ...existing, tags: [...existing.tags, tag] }
    );
  }

  async removeTag(queryId: string, tag: string): Promise<StoredQuery> {
    return this.modify(queryId, existing => ({ ...existing, tags: existing.tags.filter(t => t !== tag) }));
  }

  async count(filter: Omit<StoredQueryFilter, 'tags'> = {}): Promise<number> {
    const queries = await this.list(filter);
    return queries.length;
  }

  /**
   * Resolve a stored query to (connectorId, parameters) with overrides
   * merged on top; an override wins on key conflict
   *
   * @throws NotFoundError if absent
   * @throws InactiveError if active is false
   */
  async resolve(queryId: string, overrides: QueryParameters = {}): Promise<ResolvedStoredQuery> {
    const storedQuery = await this.store.get(queryId);
    if (!storedQuery) {
      throw new NotFoundError('Stored query', queryId, { queryId });
    }
    if (!storedQuery.active) {
      throw new InactiveError('Stored query', queryId, { queryId, sourceId: storedQuery.connectorId });
    }

    return {
      storedQuery,
      connectorId: storedQuery.connectorId,
      parameters: { ...storedQuery.parameters, ...overrides }
    };
  }

  private async modify(
    queryId: string,
    change: (existing: StoredQuery) => StoredQuery
  ): Promise<StoredQuery> {
    const existing = await this.store.get(queryId);
    if (!existing) {
      throw new NotFoundError('Stored query', queryId, { queryId });
    }

    const changed = change(existing);
    const updated: StoredQuery = {
      ...existing,
      ...changed,
      queryId: existing.queryId,
      createdAt: existing.createdAt,
      updatedAt: this.now().toISOString()
    };

    await this.store.put(updated);
    return updated;
  }
}

/**
 * Query Engine
 *
 * Cache-first execution of single, stored, multi-source and federated
 * queries. Single-source calls never throw; they answer with a
 * QueryResult. Table-producing calls abort on the first failing source.
 */

import { DataRecord, QueryParameters, StandardResult } from '../types/connector';
import {
  AggregateResultsOptions,
  AggregatedResults,
  AggregationSpec,
  EngineStats,
  ExecuteQueryOptions,
  JoinHow,
  QueryResult,
  QuerySpec,
  Table,
  ValidateQueryResult
} from '../types/query';
import {
  AnalysisEngine,
  AnalysisOutcome,
  AnalysisPlan,
  AnalysisResultRecord,
  AnalysisResultStore,
  AnalysisSaveOptions,
  SaveAnalysisResultInput
} from '../types/analysis';
import { ResolvedStoredQuery, StoredQuery, StoredQueryFilter } from '../types/stored-query';
import { DEFAULT_SERVICE_CONFIG } from '../config';
import { ConnectorManager } from './connector-manager';
import { CacheStore } from './cache-store';
import { StoredQueryCatalog } from './stored-query-catalog';
import { ConfigurationError, JoinError, QueryError, ValidationError, errorMessage, toFailure } from './errors';
import { AliasedTable, applyAggregation, foldJoin, missingColumns, renameColumns, tableFromRecords } from './table';
import { isPlainObject } from '../adapters/connectors/base-connector';

export interface QueryEngineOptions {
  /** Global switch; when false no call reads or writes the cache */
  cacheEnabled?: boolean;
  /** Where analyzeQueries persists outcomes given a plan id */
  resultStore?: AnalysisResultStore;
}

export interface StoredQueryExecutionOptions {
  useCache?: boolean;
  overrides?: QueryParameters;
  dynamicParams?: QueryParameters;
}

export class QueryEngine {
  private readonly cacheEnabled: boolean;
  private readonly resultStore?: AnalysisResultStore;

  constructor(
    private readonly manager: ConnectorManager,
    private readonly cache: CacheStore,
    private readonly catalog: StoredQueryCatalog,
    private readonly analysisEngine: AnalysisEngine,
    options: QueryEngineOptions = {}
  ) {
    this.cacheEnabled = options.cacheEnabled ?? DEFAULT_SERVICE_CONFIG.cacheEnabled;
    this.resultStore = options.resultStore;
  }

  /**
   * Execute one query against one source, cache first. Never throws.
   */
  async executeQuery(
    sourceId: string,
    parameters: QueryParameters,
    options: ExecuteQueryOptions = {}
  ): Promise<QueryResult> {
    const { queryId, dynamicParams } = options;
    const useCache = this.cacheEnabled && options.useCache !== false;
    const cacheKey = this.cacheKey(parameters, dynamicParams);

    try {
      if (useCache) {
        const cached = await this.readCache(sourceId, cacheKey);
        if (cached) {
          console.log('[QueryEngine] Cache hit', { sourceId, queryId });
          return {
            success: true,
            source: 'cache',
            data: cached,
            sourceId,
            ...(queryId !== undefined && { queryId })
          };
        }
      }

      const result = await this.manager.query(sourceId, parameters, dynamicParams);
      if (!result.success) {
        return queryId !== undefined ? { ...result, queryId } : result;
      }

      if (useCache) {
        await this.writeCache(sourceId, cacheKey, result.data, result.ttlSeconds, queryId);
      }

      return {
        success: true,
        source: 'connector',
        data: result.data,
        sourceId,
        ...(queryId !== undefined && { queryId })
      };
    } catch (error) {
      console.error(`[QueryEngine] Query failed for source ${sourceId}:`, error);
      return toFailure(error, { sourceId, queryId });
    }
  }

  /**
   * Resolve a stored query, merge overrides and execute it. Never throws.
   */
  async executeStoredQuery(queryId: string, options: StoredQueryExecutionOptions = {}): Promise<QueryResult> {
    let resolved: ResolvedStoredQuery;
    try {
      resolved = await this.catalog.resolve(queryId, options.overrides ?? {});
    } catch (error) {
      return toFailure(error, { queryId });
    }

    const { storedQuery, connectorId, parameters } = resolved;
    const result = await this.executeQuery(connectorId, parameters, {
      useCache: options.useCache,
      queryId,
      dynamicParams: options.dynamicParams
    });

    if (!result.success) {
      return result;
    }
    return {
      ...result,
      queryName: storedQuery.queryName,
      ...(storedQuery.description !== undefined && { queryDescription: storedQuery.description })
    };
  }

  /**
   * Execute each query independently; one bad entry never aborts the batch
   */
  async executeMultiSourceQuery(specs: QuerySpec[], useCache = true): Promise<QueryResult[]> {
    const results: QueryResult[] = [];
    for (const spec of specs) {
      if (!spec.sourceId) {
        results.push({ success: false, error: 'sourceId is required', errorCode: 'VALIDATION_ERROR' });
        continue;
      }
      results.push(
        await this.executeQuery(spec.sourceId, spec.parameters ?? {}, {
          useCache,
          dynamicParams: spec.dynamicParams
        })
      );
    }
    return results;
  }

  /**
   * Execute two or more queries and fold their records into one joined table
   *
   * @throws ValidationError for fewer than two specs or a bad aggregation
   * @throws JoinError when a source lacks a join key
   * @throws QueryError of the first failing source
   */
  async executeQueriesToTable(
    specs: QuerySpec[],
    joinOn: string[],
    how: JoinHow = 'inner',
    aggregation?: AggregationSpec,
    useCache = true
  ): Promise<Table> {
    if (specs.length < 2) {
      throw new ValidationError('At least two queries are required for a join');
    }
    if (joinOn.length === 0) {
      throw new ValidationError('At least one join key is required');
    }

    const tables: AliasedTable[] = [];
    for (const [index, spec] of specs.entries()) {
      const sourceId = spec.sourceId;
      if (!sourceId) {
        throw new ValidationError(`Query ${index + 1} is missing a sourceId`);
      }

      const result = await this.executeQuery(sourceId, spec.parameters ?? {}, {
        useCache,
        dynamicParams: spec.dynamicParams
      });
      if (!result.success) {
        throw new QueryError(result.error, result.errorCode, { sourceId });
      }

      let table = tableFromRecords(result.data.data);
      if (spec.renameColumns) {
        table = renameColumns(table, spec.renameColumns);
      }

      const missing = missingColumns(table, joinOn);
      if (missing.length > 0) {
        throw new JoinError(
          `Join keys missing from source ${sourceId}: ${missing.join(', ')}`,
          missing,
          { sourceId }
        );
      }

      tables.push({ table, alias: spec.alias ?? sourceId });
    }

    const joined = foldJoin(tables, joinOn, how);
    console.log('[QueryEngine] Joined sources', {
      sources: tables.map(entry => entry.alias),
      how,
      rows: joined.rows.length
    });

    return aggregation ? applyAggregation(joined, aggregation) : joined;
  }

  /**
   * Build the joined table and hand it to the analysis engine. With save
   * options the outcome is also stored under save.planId.
   *
   * @throws ConfigurationError when saving without a result store
   */
  async analyzeQueries(
    specs: QuerySpec[],
    joinOn: string[],
    analysisPlan: AnalysisPlan,
    how: JoinHow = 'inner',
    aggregation?: AggregationSpec,
    useCache = true,
    save?: AnalysisSaveOptions
  ): Promise<AnalysisOutcome> {
    if (save && !this.resultStore) {
      throw new ConfigurationError('No analysis result store configured');
    }

    const table = await this.executeQueriesToTable(specs, joinOn, how, aggregation, useCache);
    const analysis = await this.analysisEngine.run(table, analysisPlan);
    if (!save) {
      return { table, analysis };
    }

    const saved = await this.saveAnalysisResult({
      ...save,
      joinColumns: joinOn,
      joinStrategy: how,
      querySpecs: specs,
      table,
      analysisSummary: analysis
    });
    return { table, analysis, savedPlanId: saved.planId };
  }

  /**
   * Store a joined table and its analysis; an existing record of the same
   * plan is replaced and keeps its createdAt
   */
  async saveAnalysisResult(input: SaveAnalysisResultInput): Promise<AnalysisResultRecord> {
    const store = this.requireResultStore();
    const existing = await store.get(input.planId);
    const now = new Date().toISOString();

    const record: AnalysisResultRecord = {
      planId: input.planId,
      planName: input.planName ?? input.planId,
      joinColumns: input.joinColumns,
      joinStrategy: input.joinStrategy,
      querySpecs: input.querySpecs,
      columns: input.table.columns,
      results: input.table.rows,
      recordCount: input.table.rows.length,
      analysisSummary: input.analysisSummary ?? null,
      metadata: input.metadata ?? {},
      createdAt: existing?.createdAt ?? now,
      updatedAt: now
    };

    await store.put(record);
    console.log('[QueryEngine] Saved analysis result', {
      planId: record.planId,
      recordCount: record.recordCount,
      replaced: existing !== null
    });
    return record;
  }

  async getAnalysisResult(planId: string): Promise<AnalysisResultRecord | null> {
    return this.requireResultStore().get(planId);
  }

  /**
   * Check a query can be routed without executing it
   */
  async validateQuery(sourceId: string, parameters: unknown): Promise<ValidateQueryResult> {
    try {
      const connector = await this.manager.getConnector(sourceId);
      if (!connector) {
        return { valid: false, error: `Connector not found: ${sourceId}` };
      }
      if (!connector.isConnected()) {
        return { valid: false, error: `Connector not connected: ${sourceId}` };
      }
      if (!isPlainObject(parameters)) {
        return { valid: false, error: 'Parameters must be an object' };
      }
      return { valid: true };
    } catch (error) {
      return { valid: false, error: errorMessage(error) };
    }
  }

  async getStats(): Promise<EngineStats> {
    const cacheStats = await this.cache.stats();
    const availableSources = this.manager.listSources().map(source => source.sourceId);
    return {
      cacheStats,
      availableSourceCount: availableSources.length,
      availableSources
    };
  }

  /**
   * Combine the records of successful results. merge concatenates;
   * union keeps the first record seen per uniqueKey value.
   */
  aggregateResults(results: QueryResult[], options: AggregateResultsOptions): AggregatedResults {
    const recordSets = results.flatMap(result => (result.success ? [result.data.data] : []));
    if (recordSets.length === 0) {
      return { success: false, error: 'No successful results to aggregate', errorCode: 'VALIDATION_ERROR' };
    }

    if (options.type === 'merge') {
      const data = recordSets.flat();
      return { success: true, data, recordCount: data.length };
    }

    const uniqueKey = options.uniqueKey;
    if (!uniqueKey) {
      return { success: false, error: 'uniqueKey is required for union aggregation', errorCode: 'VALIDATION_ERROR' };
    }

    const seen = new Set<string>();
    const data: DataRecord[] = [];
    for (const record of recordSets.flat()) {
      const key = JSON.stringify(record[uniqueKey] ?? null);
      if (!seen.has(key)) {
        seen.add(key);
        data.push(record);
      }
    }
    return { success: true, data, recordCount: data.length };
  }

  async getStoredQuery(queryId: string): Promise<StoredQuery | null> {
    return this.catalog.get(queryId);
  }

  async listStoredQueries(filter: StoredQueryFilter = {}): Promise<StoredQuery[]> {
    return this.catalog.list(filter);
  }

  private requireResultStore(): AnalysisResultStore {
    if (!this.resultStore) {
      throw new ConfigurationError('No analysis result store configured');
    }
    return this.resultStore;
  }

  /**
   * Dynamic values change the upstream request, so they take part in the key
   */
  private cacheKey(parameters: QueryParameters, dynamicParams?: QueryParameters): QueryParameters {
    if (!dynamicParams || Object.keys(dynamicParams).length === 0) {
      return parameters;
    }
    return { ...parameters, __dynamicParams: dynamicParams };
  }

  private async readCache(sourceId: string, key: QueryParameters): Promise<StandardResult | null> {
    try {
      return await this.cache.get(sourceId, key);
    } catch (error) {
      console.warn('[QueryEngine] Cache read failed, querying source', { sourceId, error: errorMessage(error) });
      return null;
    }
  }

  private async writeCache(
    sourceId: string,
    key: QueryParameters,
    data: StandardResult,
    ttlSeconds?: number,
    queryId?: string
  ): Promise<void> {
    try {
      await this.cache.set(sourceId, key, data, ttlSeconds, queryId);
    } catch (error) {
      console.warn('[QueryEngine] Cache write failed', { sourceId, error: errorMessage(error) });
    }
  }
}

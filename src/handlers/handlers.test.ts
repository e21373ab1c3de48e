import { APIGatewayProxyEvent } from 'aws-lambda';

/**
 * Routing, status codes and response bodies of the Lambda handlers,
 * wired to in-memory stores
 */

jest.mock('./runtime', () => ({
  getRuntime: jest.fn()
}));

import { handler as sourcesHandler } from './sources';
import { handler as queriesHandler } from './queries';
import { handler as storedQueriesHandler } from './stored-queries';
import { handler as cacheHandler } from './cache';
import { getRuntime, Runtime } from './runtime';
import { ConnectorManager } from '../services/connector-manager';
import { CacheStore, InMemoryCacheBackend } from '../services/cache-store';
import { StoredQueryCatalog } from '../services/stored-query-catalog';
import { QueryEngine } from '../services/query-engine';
import { BasicAnalysisEngine } from '../services/analysis-engine';
import { RequestValidator } from '../services/request-validator';
import { ConnectorRegistry } from '../adapters/connectors/registry';
import {
  InMemoryAnalysisResultStore,
  InMemoryConnectorConfigStore,
  InMemoryStoredQueryStore,
  StaticConnectorBehavior,
  staticConfig,
  staticConnectorFactory
} from '../test/fakes';

const behaviors: Record<string, StaticConnectorBehavior> = {
  pop: { records: () => [{ state: 'CA', year: 2020, population: 10 }] },
  corn: { records: () => [{ st: 'CA', year: 2020, corn: 5 }] }
};

function buildRuntime(): Runtime {
  const configStore = new InMemoryConnectorConfigStore([
    staticConfig('pop'),
    staticConfig('corn'),
    staticConfig('crime', { credentials: { apiKey: 'test-key' } })
  ]);
  const validator = new RequestValidator();
  const manager = new ConnectorManager(configStore, {
    registry: new ConnectorRegistry({ static: staticConnectorFactory(behaviors) })
  });
  const cache = new CacheStore(new InMemoryCacheBackend(), { defaultTtlSeconds: 3600 });
  const catalog = new StoredQueryCatalog(new InMemoryStoredQueryStore(), { validator });
  const engine = new QueryEngine(manager, cache, catalog, new BasicAnalysisEngine(), {
    cacheEnabled: true,
    resultStore: new InMemoryAnalysisResultStore()
  });
  return { configStore, manager, cache, catalog, engine, validator };
}

/**
 * Helper to create a mock API Gateway event
 */
function createMockEvent(overrides: Partial<APIGatewayProxyEvent> = {}): APIGatewayProxyEvent {
  return {
    httpMethod: 'GET',
    path: '/',
    headers: {},
    pathParameters: null,
    queryStringParameters: null,
    body: null,
    isBase64Encoded: false,
    multiValueHeaders: {},
    multiValueQueryStringParameters: null,
    stageVariables: null,
    requestContext: {} as APIGatewayProxyEvent['requestContext'],
    resource: '',
    ...overrides
  };
}

function post(path: string, body: unknown, pathParameters: Record<string, string> | null = null): APIGatewayProxyEvent {
  return createMockEvent({ httpMethod: 'POST', path, pathParameters, body: JSON.stringify(body) });
}

describe('Lambda Handlers', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, 'log').mockImplementation();
    jest.spyOn(console, 'warn').mockImplementation();
    jest.spyOn(console, 'error').mockImplementation();
    (getRuntime as jest.Mock).mockReturnValue(buildRuntime());
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('Common behavior', () => {
    it('should answer preflight requests with CORS headers', async () => {
      const response = await sourcesHandler(createMockEvent({ httpMethod: 'OPTIONS', path: '/sources' }));

      expect(response.statusCode).toBe(200);
      expect(response.headers).toHaveProperty('Access-Control-Allow-Origin', '*');
    });

    it('should return 404 for unknown routes', async () => {
      const response = await queriesHandler(createMockEvent({ httpMethod: 'GET', path: '/queries/unknown' }));

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body)).toEqual({ error: 'Route not found', code: 'NOT_FOUND' });
    });

    it('should return 500 for unexpected errors', async () => {
      (getRuntime as jest.Mock).mockImplementation(() => {
        throw new Error('boom');
      });

      const response = await sourcesHandler(createMockEvent({ path: '/sources' }));

      expect(response.statusCode).toBe(500);
      expect(JSON.parse(response.body)).toEqual({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
    });

    it('should reject malformed JSON bodies', async () => {
      const response = await sourcesHandler(createMockEvent({ httpMethod: 'POST', path: '/sources', body: 'not json' }));

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).code).toBe('INVALID_BODY');
    });
  });

  describe('Sources', () => {
    it('should list sources without their credentials', async () => {
      const response = await sourcesHandler(createMockEvent({ path: '/sources' }));
      const body = JSON.parse(response.body);

      expect(response.statusCode).toBe(200);
      expect(body.count).toBe(3);
      expect(body.sources[1]).toEqual({
        sourceId: 'crime',
        connectorType: 'static',
        active: true,
        hasCredentials: true
      });
    });

    it('should create a source as active by default', async () => {
      const response = await sourcesHandler(post('/sources', { sourceId: 'wheat', connectorType: 'static' }));

      expect(response.statusCode).toBe(201);
      expect(JSON.parse(response.body)).toEqual({
        sourceId: 'wheat',
        connectorType: 'static',
        active: true,
        hasCredentials: false
      });
    });

    it('should return 409 for a duplicate sourceId', async () => {
      const response = await sourcesHandler(post('/sources', { sourceId: 'pop', connectorType: 'static' }));

      expect(response.statusCode).toBe(409);
      expect(JSON.parse(response.body)).toEqual({ error: 'ConnectorConfig already exists: pop', code: 'CONFLICT' });
    });

    it('should include validation details', async () => {
      const response = await sourcesHandler(post('/sources', { connectorType: 'static' }));
      const body = JSON.parse(response.body);

      expect(response.statusCode).toBe(400);
      expect(body.code).toBe('VALIDATION_FAILED');
      expect(body.details).toEqual([
        { field: 'sourceId', message: "must have required property 'sourceId'", code: 'REQUIRED' }
      ]);
    });

    it('should return 404 for an unknown source', async () => {
      const response = await sourcesHandler(
        createMockEvent({ path: '/sources/nope', pathParameters: { sourceId: 'nope' } })
      );

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body)).toEqual({ error: 'Connector not found: nope', code: 'NOT_FOUND' });
    });

    it('should list registered connector types', async () => {
      const response = await sourcesHandler(createMockEvent({ path: '/sources/types' }));

      expect(JSON.parse(response.body)).toEqual({ types: ['static'] });
    });

    it('should drop cached results when a source is deleted', async () => {
      await queriesHandler(post('/queries/execute', { sourceId: 'pop' }));

      const response = await sourcesHandler(
        createMockEvent({ httpMethod: 'DELETE', path: '/sources/pop', pathParameters: { sourceId: 'pop' } })
      );

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({ deleted: true, sourceId: 'pop', invalidatedCacheEntries: 1 });
    });

    it('should return 404 when deleting an unknown source', async () => {
      const response = await sourcesHandler(
        createMockEvent({ httpMethod: 'DELETE', path: '/sources/nope', pathParameters: { sourceId: 'nope' } })
      );

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body).error).toBe('ConnectorConfig not found: nope');
    });
  });

  describe('Queries', () => {
    it('should execute a query', async () => {
      const response = await queriesHandler(post('/queries/execute', { sourceId: 'pop', parameters: { year: 2020 } }));
      const body = JSON.parse(response.body);

      expect(response.statusCode).toBe(200);
      expect(body.success).toBe(true);
      expect(body.source).toBe('connector');
      expect(body.data.data).toEqual([{ state: 'CA', year: 2020, population: 10 }]);
    });

    it('should map a failed query to its status', async () => {
      const response = await queriesHandler(post('/queries/execute', { sourceId: 'absent' }));

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body)).toEqual({
        error: 'Connector not found: absent',
        code: 'NOT_FOUND',
        sourceId: 'absent'
      });
    });

    it('should require a sourceId to execute', async () => {
      const response = await queriesHandler(post('/queries/execute', { parameters: {} }));

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).code).toBe('VALIDATION_FAILED');
    });

    it('should aggregate multi-source results on request', async () => {
      const response = await queriesHandler(
        post('/queries/multi', { queries: [{ sourceId: 'pop' }, { sourceId: 'corn' }], aggregate: { type: 'merge' } })
      );
      const body = JSON.parse(response.body);

      expect(response.statusCode).toBe(200);
      expect(body.results).toHaveLength(2);
      expect(body.aggregated).toEqual({
        success: true,
        data: [
          { state: 'CA', year: 2020, population: 10 },
          { st: 'CA', year: 2020, corn: 5 }
        ],
        recordCount: 2
      });
    });

    it('should join sources into a table', async () => {
      const response = await queriesHandler(
        post('/queries/table', {
          queries: [{ sourceId: 'pop' }, { sourceId: 'corn', renameColumns: { st: 'state' } }],
          joinOn: ['state', 'year']
        })
      );

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({
        success: true,
        table: {
          columns: ['state', 'year', 'population', 'corn'],
          rows: [{ state: 'CA', year: 2020, population: 10, corn: 5 }]
        },
        rowCount: 1
      });
    });

    it('should return 400 when a source lacks a join key', async () => {
      const response = await queriesHandler(
        post('/queries/table', { queries: [{ sourceId: 'pop' }, { sourceId: 'corn' }], joinOn: ['state', 'year'] })
      );

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body)).toEqual({
        error: 'Join keys missing from source corn: state',
        code: 'JOIN_ERROR',
        sourceId: 'corn'
      });
    });

    it('should require an analysis plan to analyze', async () => {
      const response = await queriesHandler(
        post('/queries/analyze', { queries: [{ sourceId: 'pop' }, { sourceId: 'corn' }], joinOn: ['year'] })
      );

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('analysisPlan is required');
    });

    it('should analyze the joined table', async () => {
      const response = await queriesHandler(
        post('/queries/analyze', {
          queries: [{ sourceId: 'pop' }, { sourceId: 'corn' }],
          joinOn: ['year'],
          analysisPlan: { basicStatistics: true }
        })
      );
      const body = JSON.parse(response.body);

      expect(response.statusCode).toBe(200);
      expect(body.table.columns).toEqual(['state', 'year', 'population', 'st', 'corn']);
      expect(body.analysis.basicStatistics.population).toMatchObject({ count: 1, mean: 10 });
    });

    it('should save an analysis under its plan id and serve it back', async () => {
      const analyzed = await queriesHandler(
        post('/queries/analyze', {
          queries: [{ sourceId: 'pop' }, { sourceId: 'corn' }],
          joinOn: ['year'],
          analysisPlan: { basicStatistics: true },
          planId: 'plan-a',
          metadata: { owner: 'tests' }
        })
      );
      expect(JSON.parse(analyzed.body).savedPlanId).toBe('plan-a');

      const response = await queriesHandler(
        createMockEvent({ path: '/queries/analyses/plan-a', pathParameters: { planId: 'plan-a' } })
      );
      const body = JSON.parse(response.body);

      expect(response.statusCode).toBe(200);
      expect(body).toMatchObject({
        planId: 'plan-a',
        planName: 'plan-a',
        joinColumns: ['year'],
        recordCount: 1,
        metadata: { owner: 'tests' }
      });
    });

    it('should return 404 for an unknown analysis plan', async () => {
      const response = await queriesHandler(
        createMockEvent({ path: '/queries/analyses/nope', pathParameters: { planId: 'nope' } })
      );

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body)).toEqual({ error: 'Analysis result not found: nope', code: 'NOT_FOUND' });
    });

    it('should validate a query without executing it', async () => {
      const missing = await queriesHandler(post('/queries/validate', {}));
      const valid = await queriesHandler(post('/queries/validate', { sourceId: 'pop' }));

      expect(missing.statusCode).toBe(400);
      expect(JSON.parse(valid.body)).toEqual({ valid: true });
    });
  });

  describe('Stored queries', () => {
    const storedQuery = {
      queryId: 'pop_2020',
      queryName: 'Population 2020',
      connectorId: 'pop',
      parameters: { year: 2020 }
    };

    it('should create and execute a stored query', async () => {
      const created = await storedQueriesHandler(post('/stored-queries', storedQuery));
      expect(created.statusCode).toBe(201);
      expect(JSON.parse(created.body)).toMatchObject({ ...storedQuery, active: true, tags: [] });

      const response = await storedQueriesHandler(
        createMockEvent({ httpMethod: 'POST', path: '/stored-queries/pop_2020/execute', pathParameters: { queryId: 'pop_2020' } })
      );
      const body = JSON.parse(response.body);

      expect(response.statusCode).toBe(200);
      expect(body.queryId).toBe('pop_2020');
      expect(body.queryName).toBe('Population 2020');
      expect(body.sourceId).toBe('pop');
    });

    it('should return 404 with the queryId for an unknown stored query', async () => {
      const response = await storedQueriesHandler(post('/stored-queries/nope/execute', {}, { queryId: 'nope' }));

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body)).toEqual({
        error: 'Stored query not found: nope',
        code: 'NOT_FOUND',
        queryId: 'nope'
      });
    });

    it('should return 404 when updating an unknown stored query', async () => {
      const response = await storedQueriesHandler(
        createMockEvent({
          httpMethod: 'PUT',
          path: '/stored-queries/nope',
          pathParameters: { queryId: 'nope' },
          body: JSON.stringify({ queryName: 'Renamed' })
        })
      );

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body).code).toBe('NOT_FOUND');
    });

    it('should return 404 when deleting an unknown stored query', async () => {
      const response = await storedQueriesHandler(
        createMockEvent({ httpMethod: 'DELETE', path: '/stored-queries/nope', pathParameters: { queryId: 'nope' } })
      );

      expect(response.statusCode).toBe(404);
    });

    it('should add a tag', async () => {
      await storedQueriesHandler(post('/stored-queries', storedQuery));

      const response = await storedQueriesHandler(
        post('/stored-queries/pop_2020/tags/census', null, { queryId: 'pop_2020', tag: 'census' })
      );

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body).tags).toEqual(['census']);
    });
  });

  describe('Cache and stats', () => {
    it('should report liveness', async () => {
      const response = await cacheHandler(createMockEvent({ path: '/health' }));

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body).status).toBe('ok');
    });

    it('should report cache statistics and live sources', async () => {
      await queriesHandler(post('/queries/execute', { sourceId: 'pop' }));

      const response = await cacheHandler(createMockEvent({ path: '/stats' }));
      const body = JSON.parse(response.body);

      expect(body.cacheStats.totalEntries).toBe(1);
      expect(body.availableSources).toEqual(['pop']);
    });

    it('should invalidate a source', async () => {
      await queriesHandler(post('/queries/execute', { sourceId: 'pop' }));

      const response = await cacheHandler(
        createMockEvent({ httpMethod: 'DELETE', path: '/cache/pop', pathParameters: { sourceId: 'pop' } })
      );

      expect(JSON.parse(response.body)).toEqual({ sourceId: 'pop', removed: 1 });
    });
  });
});

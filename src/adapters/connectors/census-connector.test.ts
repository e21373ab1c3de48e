import { CensusConnector } from './census-connector';
import { ValidationError } from '../../services/errors';
import { ConnectorConfig } from '../../types/connector';
import { jsonResponse, scriptedFetch } from '../../test/fakes';

const config: ConnectorConfig = {
  sourceId: 'census',
  connectorType: 'census',
  active: true,
  credentials: { apiKey: 'test-key' }
};

describe('CensusConnector', () => {
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it('maps a header-row table onto string-typed records', () => {
    const connector = new CensusConnector(config);

    const result = connector.transform([
      ['NAME', 'B01001_001E', 'state'],
      ['Alabama', '5024279', '01'],
      ['Alaska', '733391', '02']
    ]);

    expect(result.data).toEqual([
      { NAME: 'Alabama', B01001_001E: '5024279', state: '01' },
      { NAME: 'Alaska', B01001_001E: '733391', state: '02' }
    ]);
    expect(result.schema).toEqual([
      { name: 'NAME', type: 'string' },
      { name: 'B01001_001E', type: 'string' },
      { name: 'state', type: 'string' }
    ]);
    expect(result.metadata.recordCount).toBe(2);
  });

  it('returns no records for a header-only table', () => {
    const result = new CensusConnector(config).transform([['NAME']]);

    expect(result.data).toEqual([]);
    expect(result.schema).toEqual([]);
  });

  it('requires a dataset', async () => {
    const { fetchImpl } = scriptedFetch([jsonResponse([])]);
    const connector = new CensusConnector(config, { fetchImpl });

    await expect(connector.query({ get: 'NAME' })).rejects.toThrow(ValidationError);
    await expect(connector.query({ get: 'NAME' })).rejects.toThrow('Dataset parameter is required');
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('addresses the dataset and sends the key', async () => {
    const { fetchImpl, urls } = scriptedFetch([jsonResponse([['NAME', 'state'], ['Alabama', '01']])]);
    const connector = new CensusConnector(config, { fetchImpl });

    const result = await connector.query({ dataset: '2020/acs/acs5', get: 'NAME', for: 'state:01' });

    const url = new URL(urls()[0]);
    expect(url.origin + url.pathname).toBe('https://api.census.gov/data/2020/acs/acs5');
    expect(url.searchParams.get('get')).toBe('NAME');
    expect(url.searchParams.get('for')).toBe('state:01');
    expect(url.searchParams.get('key')).toBe('test-key');
    expect(url.searchParams.has('dataset')).toBe(false);
    expect(result.data).toEqual([{ NAME: 'Alabama', state: '01' }]);
    expect(result.metadata.endpoint).toBe('2020/acs/acs5');
  });

  it('reports dataset as a required parameter', () => {
    expect(new CensusConnector(config).getCapabilities().requiredParameters).toEqual(['dataset']);
  });
});

import { ConnectorConfigRepository } from './connector-config';
import { TableNames } from '../db/tables';
import { ResourceExistsError, ResourceNotFoundError } from '../db/access';
import { ConnectorConfig } from '../types/connector';

const mockGet = jest.fn();
const mockPut = jest.fn();
const mockDelete = jest.fn();
const mockScan = jest.fn();

// Mock the DynamoDB document client
jest.mock('../db/client', () => ({
  documentClient: {
    get: (...args: unknown[]) => mockGet(...args),
    put: (...args: unknown[]) => mockPut(...args),
    delete: (...args: unknown[]) => mockDelete(...args),
    scan: (...args: unknown[]) => mockScan(...args)
  }
}));

function awsRequest(value: unknown) {
  return { promise: () => Promise.resolve(value) };
}

function awsFailure(error: Error) {
  return { promise: () => Promise.reject(error) };
}

const crime: ConnectorConfig = {
  sourceId: 'crime',
  connectorType: 'fbi_crime',
  baseUrl: 'https://api.example.test',
  active: true
};

describe('ConnectorConfigRepository', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('getBySourceId', () => {
    it('should return null when the configuration does not exist', async () => {
      mockGet.mockReturnValue(awsRequest({ Item: undefined }));

      await expect(ConnectorConfigRepository.getBySourceId('crime')).resolves.toBeNull();
      expect(mockGet).toHaveBeenCalledWith({
        TableName: TableNames.CONNECTOR_CONFIGS,
        Key: { sourceId: 'crime' }
      });
    });

    it('should return the stored configuration', async () => {
      mockGet.mockReturnValue(awsRequest({ Item: crime }));

      await expect(ConnectorConfigRepository.getBySourceId('crime')).resolves.toEqual(crime);
    });
  });

  describe('getAll', () => {
    beforeEach(() => {
      mockScan
        .mockReturnValueOnce(awsRequest({ Items: [crime], LastEvaluatedKey: { sourceId: 'crime' } }))
        .mockReturnValueOnce(awsRequest({ Items: [{ sourceId: 'census', connectorType: 'census', active: false }] }));
    });

    it('should read every page and sort by sourceId', async () => {
      const configs = await ConnectorConfigRepository.getAll();

      expect(configs.map(config => config.sourceId)).toEqual(['census', 'crime']);
      expect(mockScan).toHaveBeenCalledTimes(2);
      expect(mockScan).toHaveBeenLastCalledWith({
        TableName: TableNames.CONNECTOR_CONFIGS,
        ExclusiveStartKey: { sourceId: 'crime' }
      });
    });

    it('should filter inactive configurations on request', async () => {
      const configs = await ConnectorConfigRepository.getAll(true);

      expect(configs.map(config => config.sourceId)).toEqual(['crime']);
    });
  });

  describe('create', () => {
    it('should stamp timestamps and guard against overwrites', async () => {
      mockPut.mockReturnValue(awsRequest({}));

      const created = await ConnectorConfigRepository.create(crime);

      expect(created.createdAt).toBeDefined();
      expect(created.updatedAt).toBe(created.createdAt);
      expect(mockPut).toHaveBeenCalledWith(
        expect.objectContaining({ ConditionExpression: 'attribute_not_exists(#pk)' })
      );
    });

    it('should throw ResourceExistsError when the sourceId is taken', async () => {
      mockPut.mockReturnValue(
        awsFailure(Object.assign(new Error('The conditional request failed'), { code: 'ConditionalCheckFailedException' }))
      );

      await expect(ConnectorConfigRepository.create(crime)).rejects.toThrow(ResourceExistsError);
    });

    it('should rethrow other failures', async () => {
      mockPut.mockReturnValue(awsFailure(new Error('Requested resource not found')));

      await expect(ConnectorConfigRepository.create(crime)).rejects.toThrow('Requested resource not found');
    });
  });

  describe('update', () => {
    it('should keep the sourceId', async () => {
      mockGet.mockReturnValue(awsRequest({ Item: crime }));
      mockPut.mockReturnValue(awsRequest({}));

      const updated = await ConnectorConfigRepository.update('crime', { active: false, maxRetries: 5 });

      expect(updated).toMatchObject({ sourceId: 'crime', active: false, maxRetries: 5 });
    });

    it('should throw ResourceNotFoundError for an unknown source', async () => {
      mockGet.mockReturnValue(awsRequest({}));

      await expect(ConnectorConfigRepository.update('nope', { active: false })).rejects.toThrow(ResourceNotFoundError);
      expect(mockPut).not.toHaveBeenCalled();
    });
  });

  describe('delete', () => {
    it('should throw ResourceNotFoundError for an unknown source', async () => {
      mockGet.mockReturnValue(awsRequest({}));

      await expect(ConnectorConfigRepository.delete('nope')).rejects.toThrow('ConnectorConfig not found: nope');
      expect(mockDelete).not.toHaveBeenCalled();
    });
  });
});

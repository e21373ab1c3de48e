import { RequestValidator } from './request-validator';

describe('RequestValidator', () => {
  const validator = new RequestValidator();

  describe('validateConnectorConfig', () => {
    it('accepts a minimal config', () => {
      const body = { sourceId: 'crime', connectorType: 'fbi_crime', baseUrl: 'https://api.example.test' };

      expect(validator.validateConnectorConfig(body)).toEqual({ valid: true, value: body });
    });

    it('names the missing field', () => {
      const result = validator.validateConnectorConfig({ connectorType: 'census' });

      expect(result).toEqual({
        valid: false,
        errors: [{ field: 'sourceId', message: "must have required property 'sourceId'", code: 'REQUIRED' }]
      });
    });

    it('rejects unknown properties at the root', () => {
      const result = validator.validateConnectorConfig({ sourceId: 'x', connectorType: 'census', bogus: 1 });

      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.errors).toContainEqual(expect.objectContaining({ field: '/', code: 'ADDITIONALPROPERTIES' }));
      }
    });
  });

  describe('validateConnectorConfigUpdate', () => {
    it('does not allow the sourceId to change', () => {
      const result = validator.validateConnectorConfigUpdate({ sourceId: 'renamed' });

      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.errors.map(error => error.code)).toContain('ADDITIONALPROPERTIES');
      }
    });

    it('requires at least one field', () => {
      const result = validator.validateConnectorConfigUpdate({});

      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.errors.map(error => error.code)).toEqual(['MINPROPERTIES']);
      }
    });

    it('accepts a partial update', () => {
      expect(validator.validateConnectorConfigUpdate({ active: false }).valid).toBe(true);
    });
  });

  describe('validateStoredQueryInput', () => {
    it('reports every missing field', () => {
      const result = validator.validateStoredQueryInput({ queryName: 'Crime by year', parameters: {} });

      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.errors.map(error => error.field)).toEqual(['queryId', 'connectorId']);
      }
    });
  });

  describe('validateMultiQueryRequest', () => {
    it('checks the aggregate type', () => {
      const result = validator.validateMultiQueryRequest({
        queries: [{ sourceId: 'a' }],
        aggregate: { type: 'join' }
      });

      expect(result).toEqual({
        valid: false,
        errors: [
          { field: 'aggregate.type', message: 'must be equal to one of the allowed values', code: 'ENUM' }
        ]
      });
    });

    it('accepts a query without a sourceId', () => {
      expect(validator.validateMultiQueryRequest({ queries: [{ parameters: { year: 2020 } }] }).valid).toBe(true);
    });
  });

  describe('validateFederationRequest', () => {
    it('uses dotted paths for nested fields', () => {
      const result = validator.validateFederationRequest({
        queries: [{ sourceId: 'a' }, { sourceId: 'b', alias: '' }],
        joinOn: ['state']
      });

      expect(result).toEqual({
        valid: false,
        errors: [{ field: 'queries.1.alias', message: 'must NOT have fewer than 1 characters', code: 'MINLENGTH' }]
      });
    });

    it('needs two queries and a join key', () => {
      const result = validator.validateFederationRequest({ queries: [{ sourceId: 'a' }], joinOn: [] });

      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.errors.map(error => `${error.field}:${error.code}`)).toEqual(['queries:MINITEMS', 'joinOn:MINITEMS']);
      }
    });
  });

  describe('validateStoredQueryExecution', () => {
    it('accepts an empty body', () => {
      expect(validator.validateStoredQueryExecution({})).toEqual({ valid: true, value: {} });
    });
  });
});

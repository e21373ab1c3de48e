import * as fc from 'fast-check';
import { DataRecord, QueryParameters, StandardResult } from '../types/connector';
import { CreateStoredQueryInput } from '../types/stored-query';

/**
 * Generator for source identifiers
 */
export const sourceIdArb = (): fc.Arbitrary<string> =>
  fc.stringMatching(/^[a-z][a-z0-9_]{0,15}$/);

/**
 * Generator for parameter names
 */
export const parameterNameArb = (): fc.Arbitrary<string> =>
  fc.stringMatching(/^[a-zA-Z][a-zA-Z0-9_]{0,11}$/);

/**
 * Generator for JSON scalar values that survive a JSON round trip
 */
export const scalarValueArb = (): fc.Arbitrary<string | number | boolean | null> =>
  fc.oneof(
    fc.string({ maxLength: 20 }),
    fc.integer({ min: -100000, max: 100000 }),
    fc.boolean(),
    fc.constant(null)
  );

/**
 * Generator for query parameters, one level of nesting at most
 */
export const queryParametersArb = (): fc.Arbitrary<QueryParameters> =>
  fc.dictionary(
    parameterNameArb(),
    fc.oneof(
      scalarValueArb(),
      fc.array(scalarValueArb(), { maxLength: 4 }),
      fc.dictionary(parameterNameArb(), scalarValueArb(), { maxKeys: 3 })
    ),
    { maxKeys: 6 }
  );

/**
 * Generator for a data record with scalar values
 */
export const dataRecordArb = (): fc.Arbitrary<DataRecord> =>
  fc.dictionary(parameterNameArb(), scalarValueArb(), { minKeys: 1, maxKeys: 5 });

/**
 * Generator for a normalized connector result
 */
export const standardResultArb = (): fc.Arbitrary<StandardResult> =>
  fc.record({
    sourceId: sourceIdArb(),
    data: fc.array(dataRecordArb(), { maxLength: 5 }),
    queryParameters: queryParametersArb()
  }).map(({ sourceId, data, queryParameters }) => ({
    metadata: {
      sourceId,
      timestamp: '2024-01-01T00:00:00.000Z',
      recordCount: data.length,
      queryParameters,
      version: '1.0'
    },
    data,
    schema: []
  }));

/**
 * Generator for stored query input
 */
export const storedQueryInputArb = (): fc.Arbitrary<CreateStoredQueryInput> =>
  fc.record({
    queryId: fc.stringMatching(/^[a-z][a-z0-9_]{2,15}$/),
    queryName: fc.string({ minLength: 1, maxLength: 40 }),
    description: fc.option(fc.string({ maxLength: 80 }), { nil: undefined }),
    connectorId: sourceIdArb(),
    parameters: queryParametersArb(),
    tags: fc.option(fc.uniqueArray(fc.stringMatching(/^[a-z]{1,8}$/), { maxLength: 3 }), { nil: undefined })
  }).map(input => {
    const { description, tags, ...required } = input;
    return {
      ...required,
      ...(description !== undefined && { description }),
      ...(tags !== undefined && { tags })
    };
  });

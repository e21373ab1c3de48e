import * as fc from 'fast-check';
import { collectPages, isConditionalCheckFailure, PaginatedResult } from './access';

describe('collectPages', () => {
  it('follows lastEvaluatedKey until the last page', async () => {
    const pages: Record<string, PaginatedResult<number>> = {
      start: { items: [1, 2], lastEvaluatedKey: { id: 'a' } },
      a: { items: [3], lastEvaluatedKey: { id: 'b' } },
      b: { items: [] }
    };
    const fetchPage = jest.fn(async (startKey?: { [key: string]: unknown }) =>
      pages[typeof startKey?.id === 'string' ? startKey.id : 'start']
    );

    await expect(collectPages(fetchPage)).resolves.toEqual([1, 2, 3]);
    expect(fetchPage).toHaveBeenCalledTimes(3);
    expect(fetchPage).toHaveBeenNthCalledWith(1, undefined);
    expect(fetchPage).toHaveBeenNthCalledWith(2, { id: 'a' });
  });

  it('Property: concatenates pages in order', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(fc.array(fc.integer()), { minLength: 1, maxLength: 5 }), async chunks => {
        const fetchPage = async (startKey?: { [key: string]: unknown }): Promise<PaginatedResult<number>> => {
          const index = typeof startKey?.page === 'number' ? startKey.page : 0;
          return {
            items: chunks[index],
            ...(index + 1 < chunks.length && { lastEvaluatedKey: { page: index + 1 } })
          };
        };

        expect(await collectPages(fetchPage)).toEqual(chunks.flat());
      }),
      { numRuns: 100 }
    );
  });
});

describe('isConditionalCheckFailure', () => {
  it('recognizes the DynamoDB conditional failure code', () => {
    const failure = Object.assign(new Error('The conditional request failed'), {
      code: 'ConditionalCheckFailedException'
    });

    expect(isConditionalCheckFailure(failure)).toBe(true);
    expect(isConditionalCheckFailure(new Error('ProvisionedThroughputExceededException'))).toBe(false);
    expect(isConditionalCheckFailure({ code: 'ConditionalCheckFailedException' })).toBe(false);
  });
});

import { InvalidParameterError } from '../src/errors';
import { searchLimit } from '../src/limit-search';

describe('searchLimit', () => {
  test('stops at the first hit when one is enough', () => {
    const result = searchLimit({ sequence: '6', hits: 1, start: 1, base: 10, power: 2 });
    expect(result).toEqual({ hitIndices: [4], lastIndex: 4, lastNonHitIndex: 3 });
  });

  test('needs consecutive hits', () => {
    // 2^14 = 16384 and 2^15 = 32768 are the first neighbours both containing a 6
    const result = searchLimit({ sequence: '6', hits: 2, start: 1, base: 10, power: 2 });
    expect(result.hitIndices).toEqual([4, 6, 8, 12, 14, 15]);
    expect(result.lastIndex).toBe(15);
    expect(result.lastNonHitIndex).toBe(13);
  });

  test('reports no miss when the first powers all hit', () => {
    const result = searchLimit({ sequence: '1', hits: 3, start: 1, base: 2, power: 2 });
    expect(result).toEqual({ hitIndices: [1, 2, 3], lastIndex: 3, lastNonHitIndex: 0 });
  });

  test('reports no miss rather than the index before a later start', () => {
    // every power of 2 starts with a 1 in base 2
    const result = searchLimit({ sequence: '1', hits: 2, start: 50, base: 2, power: 2 });
    expect(result).toEqual({ hitIndices: [50, 51], lastIndex: 51, lastNonHitIndex: 0 });
  });

  test('rejects sequences outside the base', () => {
    expect(() => searchLimit({ sequence: '2', hits: 1, start: 1, base: 2, power: 3 })).toThrow(
      InvalidParameterError
    );
  });

  test('rejects a non-positive hit count', () => {
    expect(() => searchLimit({ sequence: '6', hits: 0, start: 1, base: 10, power: 2 })).toThrow(/hit count 0/);
  });
});

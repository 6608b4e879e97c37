import { InvalidParameterError } from '../src/errors';
import { mean, standardDeviation, summarize } from '../src/summary';

describe('mean and standardDeviation', () => {
  test('match known values', () => {
    const values = [2, 4, 4, 4, 5, 5, 7, 9];
    expect(mean(values)).toBe(5);
    expect(standardDeviation(values)).toBeCloseTo(Math.sqrt(32 / 7), 10);
  });

  test('degenerate inputs give zero', () => {
    expect(mean([])).toBe(0);
    expect(standardDeviation([])).toBe(0);
    expect(standardDeviation([3])).toBe(0);
  });
});

describe('summarize', () => {
  test('summarizes the 2^1..2^5 digit counts', () => {
    const universe = ['0', '1', '2', '3', '4', '5', '6', '7', '8', '9'];
    const report = summarize(universe, [5, 4, 3, 4, 4, 5, 4, 5, 4, 5]);
    expect(report.total).toBe(43);
    expect(report.mean).toBeCloseTo(4.3, 10);
    expect(report.deviations[2]).toBeCloseTo(-1.3, 10);
    expect(report.outliers).toEqual([]);
  });

  test('flags counts more than three deviations from the mean', () => {
    const universe = Array.from({ length: 21 }, (_, i) => String(i).padStart(2, '0'));
    const counts = [...new Array<number>(20).fill(10), 100];
    const report = summarize(universe, counts);
    expect(report.outliers).toHaveLength(1);
    expect(report.outliers[0].pattern).toBe('20');
    expect(report.outliers[0].count).toBe(100);
    expect(report.outliers[0].deviation).toBeCloseTo(100 - 300 / 21, 10);
  });

  test('identical counts have no outliers', () => {
    const report = summarize(['0', '1', '2'], [7, 7, 7]);
    expect(report.std).toBe(0);
    expect(report.outliers).toEqual([]);
  });

  test('rejects counts that do not match the universe', () => {
    expect(() => summarize(['0', '1'], [1])).toThrow(InvalidParameterError);
  });
});

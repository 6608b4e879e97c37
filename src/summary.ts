import { InvalidParameterError } from './errors';
import { SummaryReport } from './types';

const OUTLIER_SIGMA = 3;

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Sample standard deviation (n - 1 denominator); 0 for fewer than two values. */
export function standardDeviation(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  const squares = values.reduce((sum, v) => sum + (v - m) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

export function summarize(universe: readonly string[], counts: readonly number[]): SummaryReport {
  if (universe.length !== counts.length) {
    throw new InvalidParameterError(
      `Counts have ${counts.length} entries but the universe has ${universe.length} patterns`
    );
  }

  const m = mean(counts);
  const std = standardDeviation(counts);
  const deviations = counts.map((c) => c - m);
  const outliers: SummaryReport['outliers'] = [];
  for (let i = 0; i < counts.length; i++) {
    if (Math.abs(deviations[i]) > OUTLIER_SIGMA * std) {
      outliers.push({ pattern: universe[i], count: counts[i], deviation: deviations[i] });
    }
  }

  return {
    total: counts.reduce((sum, c) => sum + c, 0),
    mean: m,
    std,
    deviations,
    outliers,
  };
}

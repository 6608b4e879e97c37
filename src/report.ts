import { formatDuration } from './benchmark';
import { LimitSearchResult } from './limit-search';
import { Logger } from './logger';
import { summarize } from './summary';
import { SearchResult } from './types';

export function describeLastAbsence(lastAnyAbsentIndex: number): string {
  return lastAnyAbsentIndex > 0
    ? `Last non-matching power was ${lastAnyAbsentIndex}`
    : 'No power lacked any sequence';
}

export function printSearchSummary(result: SearchResult, logger: Logger): void {
  const summary = summarize(result.universe, result.counts);
  console.log(`\nSearched n=${result.start}..${result.stop} (${result.stats.samples} samples this run)`);
  console.log(`Total non-matches: ${summary.total}`);
  console.log(`Mean non-matches per sequence: ${summary.mean.toFixed(2)} (std ${summary.std.toFixed(2)})`);
  console.log('Outlier values from average matches:');
  for (const outlier of summary.outliers) {
    console.log(` ${outlier.pattern}: ${outlier.deviation.toFixed(2)}`);
  }
  logger.info(`Search took ${formatDuration(result.stats.elapsedMs / 1000)}`);
}

export function printLimitResult(result: LimitSearchResult, elapsedMs: number, logger: Logger): void {
  const lastMiss = result.lastNonHitIndex > 0 ? `n=${result.lastNonHitIndex}` : 'none';
  console.log(`Searched to n=${result.lastIndex}, last non-apocalypse n was ${lastMiss}`);
  console.log(`Hits found: ${result.hitIndices.length}`);
  logger.info(`Search took ${formatDuration(elapsedMs / 1000)}`);
}

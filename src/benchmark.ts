import { findAbsentNaive, SlidingWindowMatcher } from './matcher';
import { createUniverse } from './pattern';
import { PowerStream } from './power-stream';

const BENCHMARK_DURATION_MS = 10_000; // 10 seconds per benchmark
const BATCH_SIZE = 50;

export function formatDuration(seconds: number): string {
  if (seconds < 1) {
    return '<1 second';
  } else if (seconds < 60) {
    return `${seconds.toFixed(1)} seconds`;
  } else if (seconds < 3600) {
    return `${(seconds / 60).toFixed(1)} minutes`;
  } else if (seconds < 86400) {
    return `${(seconds / 3600).toFixed(1)} hours`;
  } else if (seconds < 86400 * 365) {
    return `${(seconds / 86400).toFixed(1)} days`;
  } else {
    return `${(seconds / (86400 * 365)).toFixed(1)} years`;
  }
}

export interface BenchmarkOptions {
  power: number;
  base: number;
  seqLen: number;
  durationMs?: number;
  now?: () => number;
}

export interface BenchmarkResult {
  name: string;
  rate: number; // samples per second
  samples: number;
  elapsed: number; // seconds
}

type Matcher = (digits: string) => number[];

function timeMatcher(
  name: string,
  match: Matcher,
  options: BenchmarkOptions,
  now: () => number
): BenchmarkResult {
  const durationMs = options.durationMs ?? BENCHMARK_DURATION_MS;
  const stream = new PowerStream(options.power, options.base);
  const start = now();
  let samples = 0;

  do {
    for (let i = 0; i < BATCH_SIZE; i++) {
      match(stream.next().digits);
      samples++;
    }
  } while (now() - start < durationMs);

  const elapsed = (now() - start) / 1000;
  return { name, rate: elapsed > 0 ? samples / elapsed : 0, samples, elapsed };
}

/**
 * Time the sliding-window matcher against one substring search per pattern,
 * both over the same p^n sequence.
 */
export function runBenchmark(options: BenchmarkOptions): BenchmarkResult[] {
  const now = options.now ?? Date.now;
  const universe = createUniverse(options.base, options.seqLen);
  const matcher = new SlidingWindowMatcher(universe);

  console.log('\n=== Pattern Matcher Benchmark ===');
  console.log(
    `${options.power}^n in base ${options.base}, ${universe.length} sequences of length ${options.seqLen}`
  );
  console.log(`Running each mode for ${(options.durationMs ?? BENCHMARK_DURATION_MS) / 1000} seconds...\n`);

  const results: BenchmarkResult[] = [];

  console.log('Naive benchmark (one substring search per sequence)...');
  const naive = timeMatcher('Naive', (digits) => findAbsentNaive(digits, universe), options, now);
  results.push(naive);
  console.log(`  Naive: ${naive.rate.toFixed(2)} samples/s`);

  console.log('Sliding window benchmark (single pass per sample)...');
  const sliding = timeMatcher('Sliding window', (digits) => matcher.findAbsent(digits), options, now);
  results.push(sliding);
  console.log(`  Sliding window: ${sliding.rate.toFixed(2)} samples/s`);

  console.log('\n=== Results ===');
  console.log(`Naive:          ${naive.rate.toFixed(2)} samples/s (baseline)`);
  const speedup = naive.rate > 0 ? sliding.rate / naive.rate : 0;
  const speedupStr = speedup >= 1 ? 'faster' : 'slower';
  console.log(`Sliding window  ${sliding.rate.toFixed(2)} samples/s (${speedup.toFixed(1)}x ${speedupStr})`);

  const fastest = results.reduce((a, b) => (a.rate > b.rate ? a : b));
  console.log(`\n${fastest.name} mode is fastest!`);

  return results;
}

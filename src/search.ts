import { InvalidParameterError } from './errors';
import { validateBase } from './digits';
import { Logger, silentLogger } from './logger';
import { SlidingWindowMatcher } from './matcher';
import { createUniverse, validateSeqLen } from './pattern';
import { PeriodicCheckpointer, saveCheckpoint } from './checkpoint';
import { PowerStream, validatePower, validateStart } from './power-stream';
import { RandomSampleStream, SeededRandom, validateSeed } from './random-stream';
import { StopController } from './stop-controller';
import { NonMatchTracker } from './tracker';
import {
  Checkpoint,
  ProgressCallback,
  RandomSearchParameters,
  SearchParameters,
  SearchResult,
  SearchStats,
} from './types';

export interface SearchOptions {
  logger?: Logger;
  /** Invoked once per processed sample. */
  onProgress?: ProgressCallback;
  /** Continue from this checkpoint instead of starting from zero counts. */
  resume?: Checkpoint;
  /** Periodic saves; `file` gets the index of the last processed sample. */
  checkpoint?: {
    intervalMinutes: number;
    file: (stop: number) => string;
  };
  now?: () => number;
}

class StatsClock {
  private readonly startTime: number;
  samples = 0;

  constructor(private readonly now: () => number) {
    this.startTime = now();
  }

  getStats(): SearchStats {
    const elapsedMs = this.now() - this.startTime;
    const elapsedSec = elapsedMs / 1000;
    return {
      samples: this.samples,
      rate: elapsedSec > 0 ? this.samples / elapsedSec : 0,
      elapsedMs,
    };
  }
}

function logCheckpointTally(checkpointer: PeriodicCheckpointer | null, logger: Logger): void {
  if (!checkpointer?.enabled) return;
  const { saves, failures } = checkpointer.stats;
  logger.info(`Periodic checkpoints: ${saves} saved, ${failures} failed`);
}

export function validateSearchParameters(params: SearchParameters): void {
  validatePower(params.power);
  validateBase(params.base);
  validateSeqLen(params.seqLen);
  validateStart(params.start);
  if (params.stopMode.kind === 'fixed' && params.stopMode.stop < params.start - 1) {
    throw new InvalidParameterError(
      `Invalid stop ${params.stopMode.stop}: must not precede start ${params.start}`
    );
  }
}

function checkResumeMatches(
  resume: Checkpoint,
  expected: { method: Checkpoint['method']; base: number; seqLen: number; power?: number; length?: number }
): void {
  const mismatches: string[] = [];
  if (resume.method !== expected.method) mismatches.push(`method ${resume.method} != ${expected.method}`);
  if (resume.base !== expected.base) mismatches.push(`base ${resume.base} != ${expected.base}`);
  if (resume.seqLen !== expected.seqLen) mismatches.push(`seq_len ${resume.seqLen} != ${expected.seqLen}`);
  if (expected.power !== undefined && resume.power !== expected.power) {
    mismatches.push(`power ${resume.power} != ${expected.power}`);
  }
  if (expected.length !== undefined && resume.length !== expected.length) {
    mismatches.push(`length ${resume.length} != ${expected.length}`);
  }
  if (mismatches.length > 0) {
    throw new InvalidParameterError(`Checkpoint does not match search parameters: ${mismatches.join(', ')}`);
  }
}

/**
 * Walk p^n from the start index (or the checkpoint's stop + 1) and count, per
 * pattern, the powers whose base-B digits lack it.
 *
 * The safety margin is counted from the later of `start - 1` and the last
 * absence. A resumed run counts it from the checkpoint's stop, so in safety
 * mode it can run up to `safety` samples longer than an uninterrupted run.
 * The reported `lastAnyAbsentIndex` is 0 when no sample lacked a pattern.
 */
export function runPowerSearch(params: SearchParameters, options: SearchOptions = {}): SearchResult {
  validateSearchParameters(params);
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? Date.now;
  const { resume } = options;

  if (resume) {
    checkResumeMatches(resume, {
      method: 'power',
      base: params.base,
      seqLen: params.seqLen,
      power: params.power,
    });
  }

  const universe = createUniverse(params.base, params.seqLen);
  const matcher = new SlidingWindowMatcher(universe);
  const countsStart = resume ? resume.start : params.start;
  const first = resume ? resume.stop + 1 : params.start;
  const tracker = new NonMatchTracker(universe.length, {
    trackLastAbsence: true,
    initialCounts: resume?.results,
    lastAnyAbsentIndex: resume?.lastAbsent ?? 0,
  });
  const marginFloor = first - 1;
  const stream = new PowerStream(params.power, params.base, first);
  const controller = new StopController(params.stopMode);
  const clock = new StatsClock(now);
  const checkpointer = options.checkpoint
    ? new PeriodicCheckpointer({ intervalMinutes: options.checkpoint.intervalMinutes, now, logger })
    : null;

  logger.info(
    `Searching ${params.power}^n in base ${params.base} for ${universe.length} sequences of length ${params.seqLen}, from n=${first}`
  );

  const snapshot = (stop: number): Checkpoint => ({
    power: params.power,
    base: params.base,
    seqLen: params.seqLen,
    start: countsStart,
    stop,
    results: tracker.snapshot(),
    method: 'power',
    lastAbsent: tracker.lastAnyAbsentIndex,
  });

  while (controller.shouldContinue(stream.index, Math.max(marginFloor, tracker.lastAnyAbsentIndex))) {
    const sample = stream.next();
    const absent = matcher.findAbsent(sample.digits);
    tracker.record(absent, sample.index);
    clock.samples++;

    options.onProgress?.({
      index: sample.index,
      absentCount: absent.length,
      universeSize: universe.length,
      lastAnyAbsentIndex: tracker.lastAnyAbsentIndex,
      stats: clock.getStats(),
    });

    if (checkpointer && options.checkpoint) {
      const { file } = options.checkpoint;
      checkpointer.tick(() => saveCheckpoint(file(sample.index), snapshot(sample.index), logger));
    }
  }

  logger.info(
    tracker.lastAnyAbsentIndex > 0
      ? `Last non-matching power was ${tracker.lastAnyAbsentIndex}`
      : 'No power lacked any sequence'
  );
  logCheckpointTally(checkpointer, logger);

  return {
    universe,
    counts: tracker.snapshot(),
    start: countsStart,
    stop: stream.index,
    lastAnyAbsentIndex: tracker.lastAnyAbsentIndex,
    stats: clock.getStats(),
  };
}

export function validateRandomParameters(params: RandomSearchParameters): void {
  validateBase(params.base);
  validateSeqLen(params.seqLen);
  validateStart(params.start);
  validateSeed(params.seed);
  if (!Number.isInteger(params.numberLength) || params.numberLength < 1) {
    throw new InvalidParameterError(`Invalid number length ${params.numberLength}: must be an integer >= 1`);
  }
  if (!Number.isInteger(params.stop) || params.stop < params.start - 1) {
    throw new InvalidParameterError(`Invalid sample count ${params.stop}: must not precede start ${params.start}`);
  }
}

/** Result of a random search, plus the generator state after the last draw. */
export interface RandomSearchResult extends SearchResult {
  rngState: number;
}

/**
 * Draw uniform numbers of `numberLength` digits for indices start..stop and
 * count, per pattern, the draws whose digits lack it. Same seed, same counts.
 */
export function runRandomSearch(params: RandomSearchParameters, options: SearchOptions = {}): RandomSearchResult {
  validateRandomParameters(params);
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? Date.now;
  const { resume } = options;

  if (resume) {
    checkResumeMatches(resume, {
      method: 'random',
      base: params.base,
      seqLen: params.seqLen,
      length: params.numberLength,
    });
  }

  const universe = createUniverse(params.base, params.seqLen);
  const matcher = new SlidingWindowMatcher(universe);
  const countsStart = resume ? resume.start : params.start;
  const first = resume ? resume.stop + 1 : params.start;
  const tracker = new NonMatchTracker(universe.length, { initialCounts: resume?.results });

  let stream: RandomSampleStream;
  if (resume && resume.rngState !== undefined) {
    stream = new RandomSampleStream(
      params.base,
      params.numberLength,
      params.stop,
      SeededRandom.fromState(resume.rngState),
      first
    );
  } else {
    stream = new RandomSampleStream(
      params.base,
      params.numberLength,
      params.stop,
      new SeededRandom(params.seed),
      countsStart
    );
    if (resume) {
      logger.warn(`Checkpoint has no generator state, replaying draws ${countsStart}..${resume.stop} from the seed`);
      stream.skip(resume.stop - countsStart + 1);
    }
  }

  const clock = new StatsClock(now);
  const checkpointer = options.checkpoint
    ? new PeriodicCheckpointer({ intervalMinutes: options.checkpoint.intervalMinutes, now, logger })
    : null;

  const snapshot = (stop: number): Checkpoint => ({
    power: 0,
    base: params.base,
    seqLen: params.seqLen,
    start: countsStart,
    stop,
    results: tracker.snapshot(),
    method: 'random',
    length: params.numberLength,
    rngState: stream.rngState,
  });

  logger.info(
    `Matching ${universe.length} sequences of length ${params.seqLen} against ${params.numberLength}-digit base ${params.base} numbers, samples ${first}..${params.stop}`
  );

  for (let sample = stream.next(); sample !== null; sample = stream.next()) {
    const absent = matcher.findAbsent(sample.digits);
    tracker.record(absent, sample.index);
    clock.samples++;

    options.onProgress?.({
      index: sample.index,
      absentCount: absent.length,
      universeSize: universe.length,
      lastAnyAbsentIndex: tracker.lastAnyAbsentIndex,
      stats: clock.getStats(),
    });

    if (checkpointer && options.checkpoint) {
      const { file } = options.checkpoint;
      const index = sample.index;
      checkpointer.tick(() => saveCheckpoint(file(index), snapshot(index), logger));
    }
  }

  logCheckpointTally(checkpointer, logger);

  return {
    universe,
    counts: tracker.snapshot(),
    start: countsStart,
    stop: stream.index,
    lastAnyAbsentIndex: tracker.lastAnyAbsentIndex,
    stats: clock.getStats(),
    rngState: stream.rngState,
  };
}

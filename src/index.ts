export * from './types';
export * from './errors';
export { createConsoleLogger, silentLogger } from './logger';
export type { Logger, LogLevel } from './logger';
export { renderDigits, validateBase } from './digits';
export { createUniverse, universeSize, containsSequence, validateSequence } from './pattern';
export { PowerStream } from './power-stream';
export { RandomSampleStream, SeededRandom, validateSeed, MAX_SEED } from './random-stream';
export { SlidingWindowMatcher, findAbsentNaive } from './matcher';
export { NonMatchTracker } from './tracker';
export { StopController, resolveStopMode } from './stop-controller';
export {
  loadCheckpoint,
  saveCheckpoint,
  parseCheckpoint,
  PeriodicCheckpointer,
  powerCheckpointPath,
  powerSnapshotPath,
  randomCheckpointPath,
} from './checkpoint';
export { runPowerSearch, runRandomSearch } from './search';
export type { SearchOptions, RandomSearchResult } from './search';
export { summarize, mean, standardDeviation } from './summary';
export { searchLimit } from './limit-search';
export { describeLastAbsence, printSearchSummary, printLimitResult } from './report';

export type SearchMethod = 'power' | 'random';

export type StopMode = { kind: 'fixed'; stop: number } | { kind: 'safety'; safety: number };

export interface SearchParameters {
  power: number;
  base: number;
  seqLen: number;
  start: number;
  stopMode: StopMode;
}

export interface RandomSearchParameters {
  base: number;
  seqLen: number;
  numberLength: number;
  start: number;
  stop: number;
  seed: number;
}

export interface Sample {
  index: number;
  value: bigint;
  digits: string;
}

export interface SampleSource {
  next(): Sample | null;
}

export interface SearchStats {
  samples: number;
  rate: number;
  elapsedMs: number;
}

export interface SearchProgress {
  index: number;
  absentCount: number;
  universeSize: number;
  lastAnyAbsentIndex: number;
  stats: SearchStats;
}

export type ProgressCallback = (progress: SearchProgress) => void;

export interface SearchResult {
  universe: string[];
  counts: number[];
  start: number;
  stop: number;
  lastAnyAbsentIndex: number;
  stats: SearchStats;
}

export interface Checkpoint {
  power: number;
  base: number;
  seqLen: number;
  start: number;
  stop: number;
  results: number[];
  method: SearchMethod;
  length?: number;
  rngState?: number;
  lastAbsent?: number;
}

export interface SummaryReport {
  total: number;
  mean: number;
  std: number;
  deviations: number[];
  outliers: Array<{ pattern: string; count: number; deviation: number }>;
}

export const NUMERAL_ALPHABET = '0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';
export const MAX_BASE = NUMERAL_ALPHABET.length;
export const MAX_UNIVERSE_SIZE = 1 << 24;

import { InvalidParameterError } from './errors';

export interface TrackerOptions {
  /** Maintain `lastAnyAbsentIndex` (power mode only). */
  trackLastAbsence?: boolean;
  /** Counts to continue from, e.g. restored from a checkpoint. */
  initialCounts?: readonly number[];
  /** Starting value for `lastAnyAbsentIndex`. */
  lastAnyAbsentIndex?: number;
}

/**
 * Cumulative per-pattern non-match counts, aligned with the universe order.
 *
 * `lastAnyAbsentIndex` is one marker shared by all patterns: it moves to the
 * sample index whenever at least one pattern is absent from that sample.
 */
export class NonMatchTracker {
  private readonly counts: number[];
  private readonly trackLastAbsence: boolean;
  private lastAbsent: number;

  constructor(
    readonly size: number,
    options: TrackerOptions = {}
  ) {
    if (options.initialCounts && options.initialCounts.length !== size) {
      throw new InvalidParameterError(
        `Initial counts have ${options.initialCounts.length} entries, expected ${size}`
      );
    }

    this.counts = options.initialCounts ? [...options.initialCounts] : new Array<number>(size).fill(0);
    this.trackLastAbsence = options.trackLastAbsence ?? false;
    this.lastAbsent = options.lastAnyAbsentIndex ?? 0;
  }

  get lastAnyAbsentIndex(): number {
    return this.lastAbsent;
  }

  record(absent: readonly number[], sampleIndex: number): void {
    for (const i of absent) {
      this.counts[i]++;
    }
    if (this.trackLastAbsence && absent.length > 0) {
      this.lastAbsent = sampleIndex;
    }
  }

  countOf(patternIndex: number): number {
    return this.counts[patternIndex];
  }

  total(): number {
    return this.counts.reduce((sum, c) => sum + c, 0);
  }

  snapshot(): number[] {
    return [...this.counts];
  }
}

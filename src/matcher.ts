import { InvalidParameterError } from './errors';

/**
 * Single-pass matcher for a whole pattern universe.
 *
 * One counter per pattern lives in `counters` for the lifetime of the matcher.
 * A sample slides one window across its digits, bumping counters, then a pass
 * over the universe collects the zero counters and resets the others. Cost per
 * sample is O(digits + universe) instead of O(digits * universe).
 */
export class SlidingWindowMatcher {
  readonly seqLen: number;
  private readonly counters = new Map<string, number>();

  constructor(readonly universe: readonly string[]) {
    if (universe.length === 0) {
      throw new InvalidParameterError('Pattern universe must not be empty');
    }

    this.seqLen = universe[0].length;
    for (const pattern of universe) {
      if (pattern.length !== this.seqLen) {
        throw new InvalidParameterError(
          `Pattern '${pattern}' has length ${pattern.length}, expected ${this.seqLen}`
        );
      }
      this.counters.set(pattern, 0);
    }
  }

  /** Universe indices of the patterns that do not occur anywhere in `digits`. */
  findAbsent(digits: string): number[] {
    const last = digits.length - this.seqLen;
    for (let j = 0; j <= last; j++) {
      const window = digits.slice(j, j + this.seqLen);
      const count = this.counters.get(window);
      if (count !== undefined) {
        this.counters.set(window, count + 1);
      }
    }

    const absent: number[] = [];
    for (let i = 0; i < this.universe.length; i++) {
      const pattern = this.universe[i];
      if (this.counters.get(pattern) === 0) {
        absent.push(i);
      } else {
        this.counters.set(pattern, 0);
      }
    }
    return absent;
  }
}

/** Reference implementation: one substring search per pattern. */
export function findAbsentNaive(digits: string, universe: readonly string[]): number[] {
  const absent: number[] = [];
  for (let i = 0; i < universe.length; i++) {
    if (!digits.includes(universe[i])) absent.push(i);
  }
  return absent;
}

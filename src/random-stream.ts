import { InvalidParameterError } from './errors';
import { renderDigits, validateBase } from './digits';
import { Sample, SampleSource } from './types';

/**
 * Seeded pseudo-random number generator (Mulberry32).
 * The whole state is one uint32, so it can be saved and restored exactly.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    validateSeed(seed);
    this.state = seed;
  }

  static fromState(state: number): SeededRandom {
    return new SeededRandom(state);
  }

  getState(): number {
    return this.state;
  }

  nextUint32(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  /** Uniform integer in [0, limit), by rejection over the smallest covering bit width. */
  bigBelow(limit: bigint): bigint {
    if (limit <= 0n) {
      throw new InvalidParameterError(`Random limit must be positive, got ${limit}`);
    }

    const bits = BigInt((limit - 1n).toString(2).length);
    const words = Math.ceil(Number(bits) / 32);
    const mask = (1n << bits) - 1n;

    for (;;) {
      let candidate = 0n;
      for (let i = 0; i < words; i++) {
        candidate = (candidate << 32n) | BigInt(this.nextUint32());
      }
      candidate &= mask;
      if (candidate < limit) return candidate;
    }
  }
}

export const MAX_SEED = 0xffffffff;

/** Seeds are the generator's whole uint32 state; anything wider would be truncated. */
export function validateSeed(seed: number): void {
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new InvalidParameterError(`Invalid seed ${seed}: must be an integer in [0, ${MAX_SEED}]`);
  }
}

/**
 * Uniform draws from [0, base^numberLength - 1] for sample indices
 * start..stop inclusive. Values are rendered without padding.
 */
export class RandomSampleStream implements SampleSource {
  private readonly limit: bigint;
  private n: number;

  constructor(
    readonly base: number,
    readonly numberLength: number,
    readonly stop: number,
    private readonly rng: SeededRandom,
    start: number = 1
  ) {
    validateBase(base);
    if (!Number.isInteger(numberLength) || numberLength < 1) {
      throw new InvalidParameterError(`Invalid number length ${numberLength}: must be an integer >= 1`);
    }
    if (!Number.isInteger(start) || start < 1) {
      throw new InvalidParameterError(`Invalid start ${start}: must be an integer >= 1`);
    }
    if (!Number.isInteger(stop) || stop < start - 1) {
      throw new InvalidParameterError(`Invalid sample count ${stop}: must be an integer >= ${start - 1}`);
    }

    this.limit = BigInt(base) ** BigInt(numberLength);
    this.n = start - 1;
  }

  get index(): number {
    return this.n;
  }

  get rngState(): number {
    return this.rng.getState();
  }

  /** Advance past `count` draws without rendering them. */
  skip(count: number): void {
    for (let i = 0; i < count; i++) {
      this.rng.bigBelow(this.limit);
      this.n++;
    }
  }

  next(): Sample | null {
    if (this.n >= this.stop) return null;

    const value = this.rng.bigBelow(this.limit);
    this.n++;
    return { index: this.n, value, digits: renderDigits(value, this.base) };
  }
}

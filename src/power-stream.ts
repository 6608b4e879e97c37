import { InvalidParameterError } from './errors';
import { renderDigits, validateBase } from './digits';
import { Sample, SampleSource } from './types';

export function validatePower(power: number): void {
  if (!Number.isInteger(power) || power < 2) {
    throw new InvalidParameterError(`Invalid power ${power}: must be an integer >= 2`);
  }
}

export function validateStart(start: number): void {
  if (!Number.isInteger(start) || start < 1) {
    throw new InvalidParameterError(`Invalid start ${start}: must be an integer >= 1`);
  }
}

/**
 * Unbounded stream of p^n for n = start, start + 1, ...
 *
 * The accumulator is seeded once with p^(start - 1); every call to `next()`
 * costs exactly one big-integer multiply plus the base conversion.
 */
export class PowerStream implements SampleSource {
  private readonly multiplier: bigint;
  private accumulator: bigint;
  private n: number;

  constructor(
    readonly power: number,
    readonly base: number,
    start: number = 1
  ) {
    validatePower(power);
    validateBase(base);
    validateStart(start);

    this.multiplier = BigInt(power);
    this.accumulator = this.multiplier ** BigInt(start - 1);
    this.n = start - 1;
  }

  /** Index of the most recently produced sample (start - 1 before the first). */
  get index(): number {
    return this.n;
  }

  next(): Sample {
    this.accumulator *= this.multiplier;
    this.n++;
    return {
      index: this.n,
      value: this.accumulator,
      digits: renderDigits(this.accumulator, this.base),
    };
  }
}

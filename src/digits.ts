import { InvalidParameterError } from './errors';
import { MAX_BASE, NUMERAL_ALPHABET } from './types';

export function validateBase(base: number): void {
  if (!Number.isInteger(base) || base < 2) {
    throw new InvalidParameterError(`Invalid base ${base}: must be an integer >= 2`);
  }
  if (base > MAX_BASE) {
    throw new InvalidParameterError(`Invalid base ${base}: numerals only cover bases up to ${MAX_BASE}`);
  }
}

// Largest power of the base that stays well inside Number's exact integer range,
// so each chunk of digits can be peeled off with plain arithmetic.
function chunkFor(base: number): { size: number; divisor: bigint } {
  let size = 1;
  let divisor = base;
  while (divisor * base <= 2 ** 48) {
    divisor *= base;
    size++;
  }
  return { size, divisor: BigInt(divisor) };
}

function renderSmall(value: number, base: number): string {
  if (value === 0) return NUMERAL_ALPHABET[0];
  let out = '';
  while (value > 0) {
    out = NUMERAL_ALPHABET[value % base] + out;
    value = Math.floor(value / base);
  }
  return out;
}

/**
 * Render a non-negative arbitrary-precision integer in the given base using
 * the numerals 0-9a-zA-Z. The result has no leading zeros unless `pad` asks
 * for a minimum width.
 */
export function renderDigits(value: bigint, base: number, pad = 0): string {
  if (value < 0n) {
    throw new InvalidParameterError(`Cannot render negative value ${value}`);
  }

  let digits: string;
  if (base <= 36) {
    digits = value.toString(base);
  } else {
    const { size, divisor } = chunkFor(base);
    const chunks: string[] = [];
    let rest = value;
    while (rest >= divisor) {
      chunks.push(renderSmall(Number(rest % divisor), base).padStart(size, NUMERAL_ALPHABET[0]));
      rest /= divisor;
    }
    chunks.push(renderSmall(Number(rest), base));
    digits = chunks.reverse().join('');
  }

  return digits.padStart(pad, NUMERAL_ALPHABET[0]);
}

/** Render a small non-negative integer (below 2^53), zero-padded to `pad`. */
export function renderIndex(value: number, base: number, pad: number): string {
  const digits = base <= 36 ? value.toString(base) : renderSmall(value, base);
  return digits.padStart(pad, NUMERAL_ALPHABET[0]);
}

export function numeralsFor(base: number): string {
  return NUMERAL_ALPHABET.slice(0, base);
}

import { InvalidParameterError } from './errors';
import { numeralsFor, renderIndex, validateBase } from './digits';
import { MAX_UNIVERSE_SIZE } from './types';

export function validateSeqLen(seqLen: number): void {
  if (!Number.isInteger(seqLen) || seqLen < 1) {
    throw new InvalidParameterError(`Invalid sequence length ${seqLen}: must be an integer >= 1`);
  }
}

export function validateSequence(sequence: string, base: number): void {
  validateBase(base);
  if (sequence.length === 0) {
    throw new InvalidParameterError('Sequence must not be empty');
  }

  const numerals = numeralsFor(base);
  for (let i = 0; i < sequence.length; i++) {
    const c = sequence[i];
    if (!numerals.includes(c)) {
      throw new InvalidParameterError(
        `Invalid character '${c}' at position ${i}. Base ${base} numerals are: ${numerals}`
      );
    }
  }
}

/** Number of patterns for (base, seqLen), or throws once it passes the materialization ceiling. */
export function universeSize(base: number, seqLen: number): number {
  validateBase(base);
  validateSeqLen(seqLen);

  const size = BigInt(base) ** BigInt(seqLen);
  if (size > BigInt(MAX_UNIVERSE_SIZE)) {
    throw new InvalidParameterError(
      `Pattern universe ${base}^${seqLen} = ${size} exceeds the limit of ${MAX_UNIVERSE_SIZE} patterns`
    );
  }
  return Number(size);
}

/**
 * All base^seqLen zero-padded digit strings of length seqLen, in ascending
 * numeric order. Position in this list is the pattern's index everywhere
 * else (counts, checkpoints, summaries).
 */
export function createUniverse(base: number, seqLen: number): string[] {
  const size = universeSize(base, seqLen);
  const universe = new Array<string>(size);
  for (let i = 0; i < size; i++) {
    universe[i] = renderIndex(i, base, seqLen);
  }
  return universe;
}

export function containsSequence(digits: string, sequence: string): boolean {
  for (let i = 0; i <= digits.length - sequence.length; i++) {
    if (matchesAt(digits, sequence, i)) return true;
  }
  return false;
}

function matchesAt(digits: string, sequence: string, start: number): boolean {
  if (start + sequence.length > digits.length) return false;

  for (let i = 0; i < sequence.length; i++) {
    if (digits[start + i] !== sequence[i]) return false;
  }
  return true;
}

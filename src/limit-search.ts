import { InvalidParameterError } from './errors';
import { Logger, silentLogger } from './logger';
import { containsSequence, validateSequence } from './pattern';
import { PowerStream } from './power-stream';

export interface LimitSearchParameters {
  sequence: string;
  /** Consecutive hits after which the sequence is deemed always present. */
  hits: number;
  start: number;
  base: number;
  power: number;
}

export interface LimitSearchResult {
  hitIndices: number[];
  lastIndex: number;
  /** 0 when every searched power contained the sequence. */
  lastNonHitIndex: number;
}

const REPORT_EVERY = 1000;

/**
 * Walk p^n until `hits` consecutive powers all contain `sequence`.
 */
export function searchLimit(params: LimitSearchParameters, logger: Logger = silentLogger): LimitSearchResult {
  validateSequence(params.sequence, params.base);
  if (!Number.isInteger(params.hits) || params.hits < 1) {
    throw new InvalidParameterError(`Invalid hit count ${params.hits}: must be an integer >= 1`);
  }

  const stream = new PowerStream(params.power, params.base, params.start);
  const hitIndices: number[] = [];
  let consecutive = 0;
  let lastNonHitIndex = 0;
  let missesInChunk = 0;

  logger.info(`Searching for limit for "${params.sequence}", will stop after ${params.hits} hits`);

  while (consecutive < params.hits) {
    const sample = stream.next();
    if (sample.index % REPORT_EVERY === 0) {
      logger.info(`Reached ${sample.index} - ${missesInChunk} misses in last chunk`);
      missesInChunk = 0;
    }

    if (containsSequence(sample.digits, params.sequence)) {
      consecutive++;
      hitIndices.push(sample.index);
      logger.debug(`${sample.index} contains the sequence (${consecutive} consecutive)`);
    } else {
      logger.debug(`${sample.index} lacks the sequence`);
      consecutive = 0;
      lastNonHitIndex = sample.index;
      missesInChunk++;
    }
  }

  logger.info(`Searched to n=${stream.index}, last miss was n=${lastNonHitIndex}`);
  return { hitIndices, lastIndex: stream.index, lastNonHitIndex };
}

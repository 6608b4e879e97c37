import { InvalidParameterError } from './errors';
import { Logger, silentLogger } from './logger';
import { StopMode } from './types';

/**
 * Pick the stop mode from the optional --stop / --safety values.
 * Safety wins when both are present; neither is an error.
 */
export function resolveStopMode(
  stop: number | undefined,
  safety: number | undefined,
  logger: Logger = silentLogger
): StopMode {
  if (safety !== undefined) {
    if (!Number.isInteger(safety) || safety < 1) {
      throw new InvalidParameterError(`Invalid safety margin ${safety}: must be an integer >= 1`);
    }
    if (stop !== undefined) {
      logger.warn('Both stop value and safety value given - safety value takes precedence');
    }
    return { kind: 'safety', safety };
  }

  if (stop !== undefined) {
    if (!Number.isInteger(stop)) {
      throw new InvalidParameterError(`Invalid stop ${stop}: must be an integer`);
    }
    return { kind: 'fixed', stop };
  }

  throw new InvalidParameterError('One of stop or safety must be given');
}

export class StopController {
  constructor(readonly mode: StopMode) {}

  /**
   * Whether another sample should be drawn, given the index of the last
   * processed sample and the last index at which any pattern was absent.
   */
  shouldContinue(index: number, lastAnyAbsentIndex: number): boolean {
    switch (this.mode.kind) {
      case 'fixed':
        return index < this.mode.stop;
      case 'safety':
        return index - lastAnyAbsentIndex < this.mode.safety;
    }
  }
}

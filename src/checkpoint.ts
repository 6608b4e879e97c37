import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { CheckpointCorruptError, CheckpointWriteError, errorMessage } from './errors';
import { Logger, silentLogger } from './logger';
import { universeSize } from './pattern';
import { Checkpoint } from './types';

const CHECKPOINT_FORMAT = 'v4';

const CountSchema = z.number().int().nonnegative();

const CheckpointSchema = z.object({
  power: z.number().int().nonnegative(),
  base: z.number().int().min(2),
  seq_len: z.number().int().positive(),
  start: z.number().int().positive(),
  stop: z.number().int().nonnegative(),
  results: z.array(CountSchema),
  method: z.enum(['power', 'random']).optional(),
  length: z.number().int().positive().optional(),
  format: z.string().optional(),
  rng_state: z.number().int().min(0).max(0xffffffff).optional(),
  last_absent: z.number().int().nonnegative().optional(),
});

type CheckpointJson = z.infer<typeof CheckpointSchema>;

function toJson(checkpoint: Checkpoint): CheckpointJson {
  return {
    power: checkpoint.method === 'random' ? 0 : checkpoint.power,
    base: checkpoint.base,
    seq_len: checkpoint.seqLen,
    start: checkpoint.start,
    stop: checkpoint.stop,
    results: checkpoint.results,
    method: checkpoint.method,
    length: checkpoint.length,
    format: CHECKPOINT_FORMAT,
    rng_state: checkpoint.rngState,
    last_absent: checkpoint.lastAbsent,
  };
}

/**
 * Check a parsed JSON value and turn it into a Checkpoint. The universe size
 * is recomputed from base and seq_len; results must line up with it exactly.
 */
export function parseCheckpoint(raw: unknown, file?: string): Checkpoint {
  const parsed = CheckpointSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new CheckpointCorruptError(`Invalid checkpoint: ${issues}`, file);
  }

  const json = parsed.data;
  const method = json.method ?? (json.length !== undefined ? 'random' : 'power');

  let expected: number;
  try {
    expected = universeSize(json.base, json.seq_len);
  } catch (error) {
    throw new CheckpointCorruptError(`Inconsistent base/seq_len: ${errorMessage(error)}`, file);
  }
  if (json.results.length !== expected) {
    throw new CheckpointCorruptError(
      `Results have ${json.results.length} entries, but base ${json.base} with sequence length ${json.seq_len} has ${expected} patterns`,
      file
    );
  }
  if (json.stop < json.start - 1) {
    throw new CheckpointCorruptError(`Stop ${json.stop} precedes start ${json.start}`, file);
  }
  if (json.last_absent !== undefined && json.last_absent > json.stop) {
    throw new CheckpointCorruptError(`Last absence ${json.last_absent} is past stop ${json.stop}`, file);
  }
  if (method === 'power' && json.power < 2) {
    throw new CheckpointCorruptError(`Power checkpoint has invalid power ${json.power}`, file);
  }
  if (method === 'random' && json.length === undefined) {
    throw new CheckpointCorruptError('Random checkpoint is missing the number length', file);
  }

  return {
    power: json.power,
    base: json.base,
    seqLen: json.seq_len,
    start: json.start,
    stop: json.stop,
    results: json.results,
    method,
    length: json.length,
    rngState: json.rng_state,
    lastAbsent: json.last_absent,
  };
}

export function saveCheckpoint(file: string, checkpoint: Checkpoint, logger: Logger = silentLogger): void {
  const total = checkpoint.results.reduce((sum, c) => sum + c, 0);
  logger.info(
    `Saving results to ${file} at n=${checkpoint.stop} (total non-matches: ${total}) at ${new Date().toISOString()}`
  );

  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify(toJson(checkpoint), null, 2) + '\n');
  } catch (error) {
    throw new CheckpointWriteError(file, error);
  }
}

export function loadCheckpoint(file: string, logger: Logger = silentLogger): Checkpoint {
  logger.info(`Loading results from ${file}`);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new CheckpointCorruptError(`Cannot read checkpoint: ${errorMessage(error)}`, file);
  }
  return parseCheckpoint(raw, file);
}

export function powerCheckpointPath(
  params: { base: number; power: number; seqLen: number; start: number; stop: number },
  dir = 'results'
): string {
  return path.join(
    dir,
    `n-non-apocalypse-base-${params.base}-power-${params.power}-seq-${params.seqLen}-n${params.start}-${params.stop}.json`
  );
}

/** Periodic saves of one sweep overwrite this file instead of leaving one per interval. */
export function powerSnapshotPath(
  params: { base: number; power: number; seqLen: number; start: number },
  dir = 'results'
): string {
  return path.join(
    dir,
    `n-non-apocalypse-base-${params.base}-power-${params.power}-seq-${params.seqLen}-n${params.start}-latest.json`
  );
}

export function randomCheckpointPath(
  params: { base: number; numberLength: number; seqLen: number },
  dir = 'results'
): string {
  return path.join(
    dir,
    `n-non-match-v4-base-${params.base}-length-${params.numberLength}-seq-${params.seqLen}.json`
  );
}

export interface PeriodicCheckpointOptions {
  /** Minutes between saves; 0 disables periodic saving. */
  intervalMinutes: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * Wall-clock triggered saves. A failed save is logged and the search goes on;
 * only the final save of a run is allowed to fail the run.
 */
export class PeriodicCheckpointer {
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private lastSave: number;
  private saves = 0;
  private failures = 0;

  constructor(options: PeriodicCheckpointOptions) {
    this.intervalMs = options.intervalMinutes * 60_000;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    this.lastSave = this.now();
  }

  get enabled(): boolean {
    return this.intervalMs > 0;
  }

  get stats(): { saves: number; failures: number } {
    return { saves: this.saves, failures: this.failures };
  }

  /** Call once per sample; runs `write` when the interval has elapsed. */
  tick(write: () => void): boolean {
    if (!this.enabled) return false;

    const now = this.now();
    if (now - this.lastSave <= this.intervalMs) return false;

    this.lastSave = now;
    try {
      write();
      this.saves++;
      return true;
    } catch (error) {
      this.failures++;
      this.logger.error(`Periodic checkpoint failed, continuing search: ${errorMessage(error)}`);
      return false;
    }
  }
}

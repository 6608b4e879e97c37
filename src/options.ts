import { InvalidParameterError } from './errors';
import { LogLevel } from './logger';

export interface SweepOptions {
  command: 'sweep';
  power: number;
  base: number;
  seqLen: number;
  start: number;
  stop?: number;
  safety?: number;
  save: number;
  restart?: string;
  output?: string;
  logLevel: LogLevel;
}

export interface RandomOptions {
  command: 'random';
  base: number;
  seqLen: number;
  numberLength: number;
  samples: number;
  seed: number;
  save: number;
  restart?: string;
  output?: string;
  logLevel: LogLevel;
}

export interface LimitOptions {
  command: 'limit';
  sequence: string;
  hits: number;
  start: number;
  base: number;
  power: number;
  logLevel: LogLevel;
}

export interface BenchmarkCommandOptions {
  command: 'benchmark';
  power: number;
  base: number;
  seqLen: number;
  durationMs: number;
}

export type CliOptions = SweepOptions | RandomOptions | LimitOptions | BenchmarkCommandOptions | { command: 'help' };

const COMMANDS = ['sweep', 'random', 'limit', 'benchmark'] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

function getString(args: string[], name: string): string | undefined {
  const i = args.indexOf(`--${name}`);
  if (i === -1) return undefined;

  const value = args[i + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new InvalidParameterError(`Option --${name} needs a value`);
  }
  return value;
}

function getInt(args: string[], name: string): number | undefined {
  const raw = getString(args, name);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (raw.trim() === '' || !Number.isSafeInteger(value)) {
    throw new InvalidParameterError(`Option --${name} expects an integer, got '${raw}'`);
  }
  return value;
}

function logLevel(args: string[]): LogLevel {
  if (args.includes('--debug')) return 'debug';
  if (args.includes('--info')) return 'info';
  return 'warn';
}

export function parseCommandLine(args: string[]): CliOptions {
  if (args.includes('-h') || args.includes('--help')) {
    return { command: 'help' };
  }

  let command: Command = 'sweep';
  const first = args[0];
  if (first !== undefined && !first.startsWith('-')) {
    if (!isCommand(first)) {
      throw new InvalidParameterError(`Unknown command '${first}'`);
    }
    command = first;
  }

  switch (command) {
    case 'sweep':
      return {
        command,
        power: getInt(args, 'power') ?? 2,
        base: getInt(args, 'base') ?? 10,
        seqLen: getInt(args, 'seq-length') ?? 3,
        start: getInt(args, 'start') ?? 1,
        stop: getInt(args, 'stop'),
        safety: getInt(args, 'safety'),
        save: getInt(args, 'save') ?? 0,
        restart: getString(args, 'restart'),
        output: getString(args, 'output'),
        logLevel: logLevel(args),
      };
    case 'random':
      return {
        command,
        base: getInt(args, 'base') ?? 10,
        seqLen: getInt(args, 'seq-length') ?? 3,
        numberLength: getInt(args, 'number-length') ?? 100,
        samples: getInt(args, 'samples') ?? 100_000,
        seed: getInt(args, 'seed') ?? 123456789,
        save: getInt(args, 'save') ?? 10,
        restart: getString(args, 'restart'),
        output: getString(args, 'output'),
        logLevel: logLevel(args),
      };
    case 'limit':
      return {
        command,
        sequence: getString(args, 'sequence') ?? '666',
        hits: getInt(args, 'hits') ?? 10_000,
        start: getInt(args, 'start') ?? 1,
        base: getInt(args, 'base') ?? 10,
        power: getInt(args, 'power') ?? 2,
        logLevel: logLevel(args),
      };
    case 'benchmark':
      return {
        command,
        power: getInt(args, 'power') ?? 2,
        base: getInt(args, 'base') ?? 10,
        seqLen: getInt(args, 'seq-length') ?? 3,
        durationMs: (getInt(args, 'seconds') ?? 10) * 1000,
      };
  }
}

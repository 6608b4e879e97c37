#!/usr/bin/env node
import { runBenchmark } from './benchmark';
import {
  loadCheckpoint,
  powerCheckpointPath,
  powerSnapshotPath,
  randomCheckpointPath,
  saveCheckpoint,
} from './checkpoint';
import { errorMessage, InvalidParameterError } from './errors';
import { searchLimit } from './limit-search';
import { createConsoleLogger, Logger } from './logger';
import { CliOptions, LimitOptions, RandomOptions, SweepOptions, parseCommandLine } from './options';
import { runPowerSearch, runRandomSearch } from './search';
import { resolveStopMode } from './stop-controller';
import { describeLastAbsence, printLimitResult, printSearchSummary } from './report';
import { Checkpoint, ProgressCallback } from './types';

const SPINNER = ['|', '/', '-', '\\'];

function printUsage(): void {
  console.log('digit-sweep - search for digit sequences missing from p^n\n');
  console.log('Usage: digit-sweep [sweep|random|limit|benchmark] [options]\n');
  console.log('Commands:');
  console.log('  sweep                 Count, per sequence, the powers p^n lacking it (default)');
  console.log('  random                Same count over uniformly random numbers');
  console.log('  limit                 Find where a single sequence stops going missing');
  console.log('  benchmark             Compare the sliding-window matcher with naive search');
  console.log('\nOptions:');
  console.log('  -h, --help            Show help message');
  console.log('  --power P             Power p used for p^n (default 2)');
  console.log('  --base B              Number base (default 10)');
  console.log('  --seq-length L        Sequence length (default 3)');
  console.log('  --start N             First n searched (default 1)');
  console.log('  --stop N              Last n searched');
  console.log('  --safety S            Instead of --stop, halt once S powers in a row lack nothing');
  console.log('  --save M              Save a checkpoint every M minutes (0 disables)');
  console.log('  --restart FILE        Resume from a checkpoint file');
  console.log('  --output FILE         Checkpoint file to write');
  console.log('  --number-length D     Digits in each random number (random, default 100)');
  console.log('  --samples N           Random numbers to check (random, default 100000)');
  console.log('  --seed S              Random seed (random, default 123456789)');
  console.log('  --sequence SEQ        Sequence to search for (limit, default 666)');
  console.log('  --hits N              Consecutive hits before stopping (limit, default 10000)');
  console.log('  --seconds S           Duration of each benchmark mode (default 10)');
  console.log('  --info, --debug       More log output');
}

function createProgressReporter(label: string): ProgressCallback {
  let lastReportTime = 0;
  let tick = 0;
  return (progress) => {
    if (Date.now() - lastReportTime <= 1000) return;
    const lastMiss =
      progress.lastAnyAbsentIndex > 0 ? `${progress.index - progress.lastAnyAbsentIndex} since last miss` : 'no miss yet';
    process.stdout.write(
      `\r${SPINNER[tick++ % SPINNER.length]} [${label}] n=${progress.index} missing ${progress.absentCount}/${progress.universeSize}, ${lastMiss}, ${progress.stats.rate.toFixed(1)}/s    `
    );
    lastReportTime = Date.now();
  };
}

function restoreCheckpoint(file: string, method: Checkpoint['method'], logger: Logger): Checkpoint {
  const checkpoint = loadCheckpoint(file, logger);
  if (checkpoint.method !== method) {
    throw new InvalidParameterError(`${file} is a ${checkpoint.method} checkpoint, cannot resume a ${method} search`);
  }
  return checkpoint;
}

function warnOverride(logger: Logger, name: string, given: number, restored: number): void {
  if (given !== restored) {
    logger.warn(`Using ${name}=${restored} from checkpoint instead of ${given}`);
  }
}

function sweep(options: SweepOptions, logger: Logger): void {
  const stopMode = resolveStopMode(options.stop, options.safety, logger);
  let { power, base, seqLen, start } = options;

  let resume: Checkpoint | undefined;
  if (options.restart) {
    resume = restoreCheckpoint(options.restart, 'power', logger);
    warnOverride(logger, 'power', power, resume.power);
    warnOverride(logger, 'base', base, resume.base);
    warnOverride(logger, 'seq-length', seqLen, resume.seqLen);
    ({ power, base, seqLen, start } = resume);
  }

  const file = (stop: number) =>
    options.output ?? powerCheckpointPath({ base, power, seqLen, start, stop });
  const snapshotFile = options.output ?? powerSnapshotPath({ base, power, seqLen, start });

  console.log(`\n=== Sweep of ${power}^n in base ${base}, sequence length ${seqLen} ===`);
  console.log(stopMode.kind === 'safety' ? `Safety margin: ${stopMode.safety}` : `Stop: n=${stopMode.stop}`);

  const result = runPowerSearch(
    { power, base, seqLen, start, stopMode },
    {
      logger,
      resume,
      onProgress: createProgressReporter('sweep'),
      checkpoint: options.save > 0 ? { intervalMinutes: options.save, file: () => snapshotFile } : undefined,
    }
  );

  console.log(`\n${describeLastAbsence(result.lastAnyAbsentIndex)}`);
  saveCheckpoint(
    file(result.stop),
    {
      power,
      base,
      seqLen,
      start: result.start,
      stop: result.stop,
      results: result.counts,
      method: 'power',
      lastAbsent: result.lastAnyAbsentIndex,
    },
    logger
  );
  printSearchSummary(result, logger);
}

function random(options: RandomOptions, logger: Logger): void {
  let { base, seqLen, numberLength } = options;

  let resume: Checkpoint | undefined;
  if (options.restart) {
    resume = restoreCheckpoint(options.restart, 'random', logger);
    warnOverride(logger, 'base', base, resume.base);
    warnOverride(logger, 'seq-length', seqLen, resume.seqLen);
    ({ base, seqLen } = resume);
    numberLength = resume.length ?? numberLength;
  }

  const file = options.output ?? randomCheckpointPath({ base, numberLength, seqLen });

  console.log(`\n=== Random ${numberLength}-digit numbers in base ${base}, sequence length ${seqLen} ===`);
  console.log(`Samples: ${options.samples}, seed: ${options.seed}`);

  const result = runRandomSearch(
    { base, seqLen, numberLength, start: resume ? resume.start : 1, stop: options.samples, seed: options.seed },
    {
      logger,
      resume,
      onProgress: createProgressReporter('random'),
      checkpoint: options.save > 0 ? { intervalMinutes: options.save, file: () => file } : undefined,
    }
  );

  saveCheckpoint(
    file,
    {
      power: 0,
      base,
      seqLen,
      start: result.start,
      stop: result.stop,
      results: result.counts,
      method: 'random',
      length: numberLength,
      rngState: result.rngState,
    },
    logger
  );
  printSearchSummary(result, logger);
}

function limit(options: LimitOptions, logger: Logger): void {
  const startTime = Date.now();
  console.log(`Searching for limit for "${options.sequence}", will stop after ${options.hits} hits`);

  const result = searchLimit(options, logger);

  printLimitResult(result, Date.now() - startTime, logger);
}

function run(options: CliOptions): void {
  switch (options.command) {
    case 'help':
      printUsage();
      return;
    case 'benchmark':
      runBenchmark(options);
      return;
    case 'sweep':
      sweep(options, createConsoleLogger(options.logLevel));
      return;
    case 'random':
      random(options, createConsoleLogger(options.logLevel));
      return;
    case 'limit':
      limit(options, createConsoleLogger(options.logLevel));
      return;
  }
}

function main(): void {
  try {
    run(parseCommandLine(process.argv.slice(2)));
  } catch (error) {
    console.error(`\n${errorMessage(error)}`);
    process.exit(1);
  }
}

main();

import { Command, InvalidArgumentError } from 'commander';

export interface CliOptions {
  config: string;
  batchSize: number;
  interval: number;
  readingInterval: number;
  maxBatches: number;
  waitForCommit: boolean;
  verbose: boolean;
  logFile: string;
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Must be a positive integer.');
  return n;
}

function nonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('Must be a non-negative integer.');
  return n;
}

/** Longest delay a Node timer honours, in whole seconds (2^31 - 1 ms). */
export const MAX_INTERVAL_SECONDS = 2_147_483;

function nonNegativeSeconds(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) throw new InvalidArgumentError('Must be a non-negative number of seconds.');
  if (n > MAX_INTERVAL_SECONDS) {
    throw new InvalidArgumentError(`Must be at most ${MAX_INTERVAL_SECONDS} seconds.`);
  }
  return n;
}

export function buildProgram(): Command {
  return new Command()
    .name('telemetry-pipe')
    .description('Stream sensor telemetry into a warehouse pipe over the streaming REST API')
    .option('-c, --config <path>', 'path to the streaming config file', 'snowflake_config.json')
    .option('-b, --batch-size <n>', 'readings per batch', positiveInt, 10)
    .option('-i, --interval <seconds>', 'seconds between batches', nonNegativeSeconds, 5)
    .option('-r, --reading-interval <seconds>', 'seconds between readings within a batch', nonNegativeSeconds, 0.5)
    .option('--max-batches <n>', 'stop after this many batches (0 = unlimited)', nonNegativeInt, 0)
    .option('--wait-for-commit', 'wait for the last offset to commit before exiting', false)
    .option('-v, --verbose', 'enable debug logging', false)
    .option('--log-file <path>', 'append-only operational log file', 'sensehat_streaming.log');
}

/** Parses argv (including the node and script entries) into typed options. */
export function parseCliOptions(argv: readonly string[]): CliOptions {
  const program = buildProgram();
  program.parse([...argv]);
  return program.opts<CliOptions>();
}

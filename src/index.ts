#!/usr/bin/env node
import { IngestionStats, runIngestionLoop } from './application/index.js';
import { parseCliOptions } from './cli-options.js';
import {
  createLogger,
  createStreamingClient,
  loadStreamingConfig,
  SimulatedSensor,
  SystemMetricsSampler,
} from './infrastructure/index.js';
import type { StreamingClient } from './infrastructure/index.js';

/**
 * Process entry point.
 *
 * Order:
 * 1) Parse flags, build the logger
 * 2) Load config, wire credentials and open the channel (fatal on failure)
 * 3) Run the ingestion loop until SIGINT/SIGTERM or --max-batches
 * 4) Optionally wait for the last offset to commit, log stats, close
 */
async function main(): Promise<number> {
  const opts = parseCliOptions(process.argv);
  const log = createLogger({ level: opts.verbose ? 'debug' : 'info', logFile: opts.logFile });

  log.info(
    {
      config: opts.config,
      batchSize: opts.batchSize,
      intervalSeconds: opts.interval,
      readingIntervalSeconds: opts.readingInterval,
      maxBatches: opts.maxBatches,
    },
    'Starting sensor telemetry streaming',
  );

  // Abort controller for graceful shutdown
  const ac = new AbortController();
  const shutdown = (signal: NodeJS.Signals): void => {
    if (ac.signal.aborted) return;
    log.info({ signal }, 'Shutdown requested');
    ac.abort();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  const stats = new IngestionStats();
  const sensor = new SimulatedSensor({ metrics: new SystemMetricsSampler() });

  let client: StreamingClient;
  try {
    const config = loadStreamingConfig(opts.config);
    client = createStreamingClient(config, stats, log);
    await client.credentials.getIngestHost();
    await client.session.open();
  } catch (err: unknown) {
    log.fatal({ err }, 'Failed to initialize streaming client');
    return 1;
  }

  const { session } = client;
  try {
    const result = await runIngestionLoop(
      { source: sensor, sink: session, stats, log },
      {
        batchSize: opts.batchSize,
        readingIntervalMs: opts.readingInterval * 1000,
        batchIntervalMs: opts.interval * 1000,
        maxBatches: opts.maxBatches,
      },
      ac.signal,
    );

    if (opts.waitForCommit && result.lastOffset !== undefined) {
      await session.waitForCommit(result.lastOffset);
    }
  } catch (err: unknown) {
    log.error({ err }, 'Unexpected error in ingestion loop');
  } finally {
    stats.logSummary(log);
    session.close();
    log.info('Shutdown complete');
  }

  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('Fatal: failed to start', err);
    process.exit(1);
  });

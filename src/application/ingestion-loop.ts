import type { Logger } from 'pino';
import type { SensorReading, SensorSource, TelemetryRecord } from '../domain/index.js';
import type { IngestionStats } from './ingestion-stats.js';
import { sleep } from './sleep.js';

/** The part of a channel the loop writes through. */
export interface BatchSink {
  append(records: readonly TelemetryRecord[]): Promise<{ rowCount: number; offset: number }>;
}

export interface IngestionLoopDeps {
  source: SensorSource;
  sink: BatchSink;
  stats: IngestionStats;
  log: Logger;
}

export interface IngestionLoopOptions {
  batchSize: number;
  readingIntervalMs: number;
  batchIntervalMs: number;
  /** 0 = unlimited. */
  maxBatches?: number;
  /** Log the statistics summary after every N successful batches. */
  statsEvery?: number;
}

export interface IngestionLoopResult {
  batchesSent: number;
  batchesFailed: number;
  /** Offset after the last successful append, if any succeeded. */
  lastOffset: number | undefined;
}

/**
 * Collects up to `batchSize` readings, stopping early on abort.
 * A failed reading is logged and skipped; it never fails the batch.
 */
async function collectBatch(
  deps: IngestionLoopDeps,
  options: IngestionLoopOptions,
  signal: AbortSignal,
): Promise<SensorReading[]> {
  const readings: SensorReading[] = [];

  for (let i = 0; i < options.batchSize; i++) {
    if (signal.aborted) break;

    try {
      const reading = await deps.source.read();
      readings.push(reading);
      if (i === 0) {
        deps.log.info(
          {
            temperature: reading.temperature,
            humidity: reading.humidity,
            pressure: reading.pressure,
            cpu_percent: reading.cpu_percent,
          },
          'Sample reading',
        );
      }
    } catch (err: unknown) {
      deps.log.error({ err }, 'Error reading sensor');
    }

    if (i < options.batchSize - 1) {
      await sleep(options.readingIntervalMs, signal);
    }
  }

  return readings;
}

/**
 * Drives the batching cadence until `signal` aborts or `maxBatches` is hit.
 *
 * Per-batch error isolation: an append failure is logged and counted and
 * the loop moves on with the same channel, whose token and offset are
 * still those of the last acknowledged batch. The failed batch's rows
 * are dropped, not redriven.
 *
 * Abort is observed between readings, between batches and during the
 * inter-batch sleep.
 */
export async function runIngestionLoop(
  deps: IngestionLoopDeps,
  options: IngestionLoopOptions,
  signal: AbortSignal,
): Promise<IngestionLoopResult> {
  const { log, stats, sink } = deps;
  const maxBatches = options.maxBatches ?? 0;
  const statsEvery = options.statsEvery ?? 10;

  let batchesSent = 0;
  let batchesFailed = 0;
  let lastOffset: number | undefined;

  log.info(
    {
      batchSize: options.batchSize,
      readingIntervalMs: options.readingIntervalMs,
      batchIntervalMs: options.batchIntervalMs,
      maxBatches,
    },
    'Ingestion loop started',
  );

  while (!signal.aborted) {
    if (maxBatches > 0 && batchesSent >= maxBatches) {
      log.info({ maxBatches }, 'Reached max batches');
      break;
    }

    const readings = await collectBatch(deps, options, signal);

    if (readings.length > 0 && !signal.aborted) {
      try {
        const result = await sink.append(readings);
        batchesSent += 1;
        lastOffset = result.offset;
        log.info(
          { batch: batchesSent, rows: result.rowCount, offset: result.offset },
          'Batch sent',
        );
        if (statsEvery > 0 && batchesSent % statsEvery === 0) {
          stats.logSummary(log);
        }
      } catch (err: unknown) {
        batchesFailed += 1;
        stats.recordError();
        log.error({ err, rows: readings.length }, 'Batch append failed; rows dropped');
      }
    }

    if (!signal.aborted) {
      await sleep(options.batchIntervalMs, signal);
    }
  }

  log.info({ batchesSent, batchesFailed }, 'Ingestion loop stopped');
  return { batchesSent, batchesFailed, lastOffset };
}

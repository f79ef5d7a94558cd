import type { Logger } from 'pino';

export interface StatsSnapshot {
  totalRowsSent: number;
  totalBatches: number;
  totalBytesSent: number;
  errors: number;
  elapsedSeconds: number;
  rowsPerSecond: number;
}

/**
 * Monotonic ingestion counters, reset only when the process starts.
 *
 * Written after every batch by the channel and the loop, read by the
 * periodic summary. Node runs both on one thread, so plain increments
 * never interleave.
 */
export class IngestionStats {
  private rows = 0;
  private batches = 0;
  private bytes = 0;
  private errorCount = 0;

  constructor(private readonly startedAtMs: number = Date.now()) {}

  recordBatch(rowCount: number, byteCount: number): void {
    this.rows += rowCount;
    this.batches += 1;
    this.bytes += byteCount;
  }

  recordError(): void {
    this.errorCount += 1;
  }

  snapshot(nowMs: number = Date.now()): StatsSnapshot {
    const elapsedSeconds = Math.max(0, (nowMs - this.startedAtMs) / 1000);
    return {
      totalRowsSent: this.rows,
      totalBatches: this.batches,
      totalBytesSent: this.bytes,
      errors: this.errorCount,
      elapsedSeconds,
      rowsPerSecond:
        this.rows > 0 && elapsedSeconds > 0
          ? parseFloat((this.rows / elapsedSeconds).toFixed(2))
          : 0,
    };
  }

  logSummary(log: Logger, nowMs?: number): void {
    const snap = this.snapshot(nowMs);
    log.info(
      { ...snap, elapsedSeconds: parseFloat(snap.elapsedSeconds.toFixed(2)) },
      'Ingestion statistics',
    );
  }
}

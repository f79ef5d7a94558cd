import { describe, it, expect } from 'vitest';
import { IngestionStats } from '../../src/application/ingestion-stats.js';
import { fakeLogger } from '../helpers.js';

describe('IngestionStats', () => {
  it('starts at zero with no throughput', () => {
    const stats = new IngestionStats(1_000);
    expect(stats.snapshot(1_000)).toEqual({
      totalRowsSent: 0,
      totalBatches: 0,
      totalBytesSent: 0,
      errors: 0,
      elapsedSeconds: 0,
      rowsPerSecond: 0,
    });
  });

  it('accumulates batches and errors and derives throughput', () => {
    const stats = new IngestionStats(0);
    stats.recordBatch(10, 500);
    stats.recordBatch(10, 520);
    stats.recordError();

    expect(stats.snapshot(10_000)).toEqual({
      totalRowsSent: 20,
      totalBatches: 2,
      totalBytesSent: 1020,
      errors: 1,
      elapsedSeconds: 10,
      rowsPerSecond: 2,
    });
  });

  it('logs a summary through the given logger', () => {
    const log = fakeLogger();
    const stats = new IngestionStats(0);
    stats.recordBatch(3, 90);

    stats.logSummary(log, 1_500);

    expect(log.info).toHaveBeenCalledWith(
      expect.objectContaining({ totalRowsSent: 3, totalBatches: 1, elapsedSeconds: 1.5, rowsPerSecond: 2 }),
      'Ingestion statistics',
    );
  });
});

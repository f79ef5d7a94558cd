import { z } from 'zod';
import type { TelemetryRecord } from '../../domain/index.js';

/** Rows are flat: every column is a string, finite number or boolean. */
export const telemetryRecordSchema = z.record(
  z.string(),
  z.union([z.string(), z.number().finite(), z.boolean()]),
);

export interface EncodedBatch {
  payload: string;
  byteCount: number;
}

/**
 * One compact JSON object per line, joined by `\n`, no trailing newline.
 * `byteCount` is the UTF-8 length of the payload as sent on the wire.
 */
export function encodeNdjson(records: readonly TelemetryRecord[]): EncodedBatch {
  const payload = records.map((record) => JSON.stringify(record)).join('\n');
  return { payload, byteCount: Buffer.byteLength(payload, 'utf-8') };
}

/** Inverse of `encodeNdjson`. Blank lines are ignored. */
export function decodeNdjson(payload: string): TelemetryRecord[] {
  return payload
    .split('\n')
    .filter((line) => line.trim() !== '')
    .map((line) => telemetryRecordSchema.parse(JSON.parse(line)));
}

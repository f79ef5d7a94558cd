/**
 * Core telemetry types. These carry no framework dependencies.
 */

/** A single scalar column value. */
export type ScalarValue = string | number | boolean;

/**
 * One row handed to the streaming channel: a flat map of column name to
 * scalar. Opaque to the channel beyond being JSON-serializable.
 */
export type TelemetryRecord = Readonly<Record<string, ScalarValue>>;

/** Environmental and IMU values from the board. */
export type SensorSample = {
  readonly temperature: number;
  readonly humidity: number;
  readonly pressure: number;
  readonly pitch: number;
  readonly roll: number;
  readonly yaw: number;
  readonly accel_x: number;
  readonly accel_y: number;
  readonly accel_z: number;
  readonly gyro_x: number;
  readonly gyro_y: number;
  readonly gyro_z: number;
  readonly mag_x: number;
  readonly mag_y: number;
  readonly mag_z: number;
  readonly compass: number;
};

/** Host-level metrics sampled alongside each reading. */
export interface SystemMetrics {
  readonly cpu_percent: number;
  readonly memory_percent: number;
  readonly disk_usage_mb: number;
  readonly cpu_temp_c: number;
  readonly cpu_temp_f: number;
}

/**
 * Canonical reading row, matching the columns of the target table.
 *
 * `ts` is epoch seconds; `datetimestamp` is ISO-8601 UTC. Declared as type
 * aliases rather than interfaces so a reading is assignable to
 * `TelemetryRecord`.
 */
export type SensorReading = SensorSample & {
  readonly uuid: string;
  readonly rowid: string;
  readonly hostname: string;
  readonly ipaddress: string;
  readonly macaddress: string;
  readonly ts: number;
  readonly datetimestamp: string;
  readonly systemtime: string;
  readonly cpu_percent: number;
  readonly memory_percent: number;
  readonly disk_usage_mb: number;
  readonly cputempc: number;
  readonly cputempf: number;
  readonly simulated: boolean;
};

/** Anything the ingestion loop can pull readings from. */
export interface SensorSource {
  read(): Promise<SensorReading>;
}

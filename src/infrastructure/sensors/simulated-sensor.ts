import { randomUUID } from 'node:crypto';
import { hostname, networkInterfaces } from 'node:os';
import type { SensorReading, SensorSample, SensorSource, SystemMetrics } from '../../domain/index.js';

export type RandomSource = () => number;

export interface SimulatedSensorOptions {
  random?: RandomSource;
  now?: () => Date;
  metrics?: { sample(): Promise<SystemMetrics> };
  host?: HostIdentity;
}

export interface HostIdentity {
  hostname: string;
  ipaddress: string;
  macaddress: string;
}

const round = (n: number, digits: number): number => {
  const f = 10 ** digits;
  return Math.round(n * f) / f;
};

const ZERO_METRICS: SystemMetrics = {
  cpu_percent: 0,
  memory_percent: 0,
  disk_usage_mb: 0,
  cpu_temp_c: 0,
  cpu_temp_f: 32,
};

/** First non-internal IPv4 interface, falling back to loopback. */
export function detectHostIdentity(): HostIdentity {
  for (const addrs of Object.values(networkInterfaces())) {
    for (const addr of addrs ?? []) {
      if (!addr.internal && addr.family === 'IPv4') {
        return { hostname: hostname(), ipaddress: addr.address, macaddress: addr.mac };
      }
    }
  }
  return { hostname: hostname(), ipaddress: '127.0.0.1', macaddress: '00:00:00:00:00:00' };
}

/** Box-Muller normal variate. */
function gauss(random: RandomSource, mean: number, sigma: number): number {
  const u = 1 - random();
  const v = random();
  return mean + sigma * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

function uniform(random: RandomSource, lo: number, hi: number): number {
  return lo + (hi - lo) * random();
}

export function simulateSample(random: RandomSource = Math.random): SensorSample {
  return {
    temperature: round(gauss(random, 22, 2), 2),
    humidity: round(Math.max(0, Math.min(100, gauss(random, 45, 5))), 2),
    pressure: round(gauss(random, 1013.25, 5), 2),
    pitch: round(uniform(random, -5, 5), 2),
    roll: round(uniform(random, -5, 5), 2),
    yaw: round(uniform(random, 0, 360), 2),
    accel_x: round(gauss(random, 0, 0.1), 4),
    accel_y: round(gauss(random, 0, 0.1), 4),
    accel_z: round(gauss(random, 1, 0.05), 4),
    gyro_x: round(gauss(random, 0, 1), 4),
    gyro_y: round(gauss(random, 0, 1), 4),
    gyro_z: round(gauss(random, 0, 1), 4),
    mag_x: round(gauss(random, 20, 5), 4),
    mag_y: round(gauss(random, -10, 5), 4),
    mag_z: round(gauss(random, -50, 10), 4),
    compass: round(uniform(random, 0, 360), 2),
  };
}

const pad = (n: number): string => String(n).padStart(2, '0');

/** `YYYYMMDDHHMMSS` in UTC. */
export function compactUtc(at: Date): string {
  return (
    `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}` +
    `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`
  );
}

/** `MM/DD/YYYY HH:MM:SS` in UTC. */
export function systemTimeUtc(at: Date): string {
  return (
    `${pad(at.getUTCMonth() + 1)}/${pad(at.getUTCDate())}/${at.getUTCFullYear()} ` +
    `${pad(at.getUTCHours())}:${pad(at.getUTCMinutes())}:${pad(at.getUTCSeconds())}`
  );
}

/**
 * Sensor source producing plausible environmental and IMU values,
 * stamped with host identity and system metrics. Stands in for board
 * hardware on machines without one.
 */
export class SimulatedSensor implements SensorSource {
  private readingCount = 0;
  private readonly random: RandomSource;
  private readonly now: () => Date;
  private readonly host: HostIdentity;
  private readonly metrics: { sample(): Promise<SystemMetrics> } | undefined;

  constructor(options: SimulatedSensorOptions = {}) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    this.host = options.host ?? detectHostIdentity();
    this.metrics = options.metrics;
  }

  async read(): Promise<SensorReading> {
    this.readingCount += 1;
    const at = this.now();
    const stamp = compactUtc(at);
    const system = this.metrics ? await this.metrics.sample() : ZERO_METRICS;

    return {
      uuid: `sensehat_${this.host.hostname}_${stamp}_${this.readingCount}`,
      rowid: `${stamp}_${randomUUID()}`,
      hostname: this.host.hostname,
      ipaddress: this.host.ipaddress,
      macaddress: this.host.macaddress,
      ts: Math.floor(at.getTime() / 1000),
      datetimestamp: at.toISOString(),
      systemtime: systemTimeUtc(at),
      ...simulateSample(this.random),
      cpu_percent: system.cpu_percent,
      memory_percent: system.memory_percent,
      disk_usage_mb: system.disk_usage_mb,
      cputempc: system.cpu_temp_c,
      cputempf: system.cpu_temp_f,
      simulated: true,
    };
  }
}

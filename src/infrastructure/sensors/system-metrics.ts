import { readFile, statfs } from 'node:fs/promises';
import { cpus, freemem, totalmem } from 'node:os';
import type { SystemMetrics } from '../../domain/index.js';

const THERMAL_ZONE = '/sys/class/thermal/thermal_zone0/temp';
const MB = 1024 * 1024;

interface CpuTimes {
  idle: number;
  total: number;
}

function readCpuTimes(): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of cpus()) {
    const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
    idle += cpuIdle;
    total += user + nice + sys + cpuIdle + irq;
  }
  return { idle, total };
}

export const celsiusToFahrenheit = (c: number): number => (c * 9) / 5 + 32;

const round1 = (n: number): number => Math.round(n * 10) / 10;

/**
 * Samples host CPU, memory, disk and SoC temperature.
 *
 * CPU utilisation is the busy share since the previous sample. Every
 * probe that is unavailable on the host (no thermal zone, statfs denied)
 * reports 0 instead of failing the reading.
 */
export class SystemMetricsSampler {
  private previous: CpuTimes = readCpuTimes();

  constructor(
    private readonly diskPath = '/',
    private readonly thermalPath = THERMAL_ZONE,
  ) {}

  async sample(): Promise<SystemMetrics> {
    const [diskUsageMb, cpuTempC] = await Promise.all([this.diskUsageMb(), this.cpuTempC()]);
    return {
      cpu_percent: round1(this.cpuPercent()),
      memory_percent: round1(((totalmem() - freemem()) / totalmem()) * 100),
      disk_usage_mb: round1(diskUsageMb),
      cpu_temp_c: round1(cpuTempC),
      cpu_temp_f: round1(celsiusToFahrenheit(cpuTempC)),
    };
  }

  private cpuPercent(): number {
    const current = readCpuTimes();
    const total = current.total - this.previous.total;
    const idle = current.idle - this.previous.idle;
    this.previous = current;
    return total > 0 ? ((total - idle) / total) * 100 : 0;
  }

  private async diskUsageMb(): Promise<number> {
    try {
      const stats = await statfs(this.diskPath);
      return ((stats.blocks - stats.bfree) * stats.bsize) / MB;
    } catch {
      return 0;
    }
  }

  /** The thermal zone reports millidegrees Celsius. */
  private async cpuTempC(): Promise<number> {
    try {
      const raw = await readFile(this.thermalPath, 'utf-8');
      const milli = Number.parseInt(raw.trim(), 10);
      return Number.isFinite(milli) ? milli / 1000 : 0;
    } catch {
      return 0;
    }
  }
}

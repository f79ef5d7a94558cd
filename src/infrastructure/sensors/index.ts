export { SimulatedSensor, simulateSample, detectHostIdentity, compactUtc, systemTimeUtc } from './simulated-sensor.js';
export type { SimulatedSensorOptions, HostIdentity, RandomSource } from './simulated-sensor.js';
export { SystemMetricsSampler, celsiusToFahrenheit } from './system-metrics.js';

export {
  streamingConfigSchema,
  authModeOf,
  controlPlaneUrl,
  DEFAULT_CHANNEL_NAME,
} from './config-schema.js';
export type { StreamingConfig, AuthMode } from './config-schema.js';
export { IngestionStats } from './ingestion-stats.js';
export type { StatsSnapshot } from './ingestion-stats.js';
export { runIngestionLoop } from './ingestion-loop.js';
export type {
  BatchSink,
  IngestionLoopDeps,
  IngestionLoopOptions,
  IngestionLoopResult,
} from './ingestion-loop.js';
export { sleep } from './sleep.js';

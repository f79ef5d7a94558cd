export { loadStreamingConfig, parseStreamingConfig } from './config/index.js';
export { createLogger } from './logging/index.js';
export type { LoggerOptions } from './logging/index.js';
export { SimulatedSensor, SystemMetricsSampler } from './sensors/index.js';
export {
  createStreamingClient,
  ChannelSession,
  CredentialProvider,
  EndpointResolver,
} from './streaming/index.js';
export type { StreamingClient, AppendResult, ChannelStatus } from './streaming/index.js';

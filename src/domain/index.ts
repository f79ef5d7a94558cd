export {
  IngestError,
  ConfigurationError,
  CredentialError,
  ResolutionError,
  ChannelError,
} from './errors.js';
export type { IngestErrorDetails } from './errors.js';
export type {
  ScalarValue,
  TelemetryRecord,
  SensorSample,
  SystemMetrics,
  SensorReading,
  SensorSource,
} from './reading.js';

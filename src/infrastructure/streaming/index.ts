export { createStreamingClient } from './client.js';
export type { StreamingClient, StreamingClientOptions } from './client.js';
export { CredentialProvider } from './credential-provider.js';
export {
  KeyPairTokenSource,
  StaticTokenSource,
  createBearerTokenSource,
  publicKeyFingerprint,
  IDENTITY_TOKEN_LIFETIME_SECONDS,
  EXPIRY_MARGIN_SECONDS,
} from './bearer-token.js';
export type { BearerTokenSource, Clock } from './bearer-token.js';
export { EndpointResolver, normalizeIngestHost } from './endpoint-resolver.js';
export { ChannelSession, buildChannelName, parseOffsetToken } from './channel-session.js';
export type {
  ChannelState,
  ChannelTarget,
  AppendResult,
  ChannelStatus,
  WaitForCommitOptions,
} from './channel-session.js';
export { encodeNdjson, decodeNdjson, telemetryRecordSchema } from './ndjson.js';
export type { EncodedBatch } from './ndjson.js';
export { REQUEST_TIMEOUT_MS, TOKEN_TYPE_HEADER } from './http.js';
export type { TokenType } from './http.js';

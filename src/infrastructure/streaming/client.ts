import type { Logger } from 'pino';
import { controlPlaneUrl, DEFAULT_CHANNEL_NAME } from '../../application/config-schema.js';
import type { StreamingConfig } from '../../application/config-schema.js';
import type { IngestionStats } from '../../application/ingestion-stats.js';
import { createBearerTokenSource } from './bearer-token.js';
import type { Clock } from './bearer-token.js';
import { ChannelSession } from './channel-session.js';
import { CredentialProvider } from './credential-provider.js';
import { EndpointResolver } from './endpoint-resolver.js';

export interface StreamingClient {
  credentials: CredentialProvider;
  resolver: EndpointResolver;
  session: ChannelSession;
}

export interface StreamingClientOptions {
  now?: Clock;
  createdAt?: Date;
}

/**
 * Wires the credential chain and a fresh channel session for one
 * validated config. Throws `ConfigurationError` / `CredentialError`
 * synchronously if the key cannot be loaded.
 */
export function createStreamingClient(
  config: StreamingConfig,
  stats: IngestionStats,
  log: Logger,
  options: StreamingClientOptions = {},
): StreamingClient {
  const now = options.now ?? Date.now;
  const controlUrl = controlPlaneUrl(config);
  const tokens = createBearerTokenSource(config, log, now);
  const resolver = new EndpointResolver(controlUrl, tokens, log);
  const credentials = new CredentialProvider(controlUrl, tokens, resolver, log, now);
  const session = new ChannelSession(
    { database: config.database, schema: config.schema, pipe: config.pipe },
    config.channel_name ?? DEFAULT_CHANNEL_NAME,
    credentials,
    stats,
    log,
    options.createdAt,
    now,
  );

  log.info(
    {
      database: config.database,
      schema: config.schema,
      pipe: config.pipe,
      channel: session.channelName,
    },
    'Streaming client configured',
  );

  return { credentials, resolver, session };
}

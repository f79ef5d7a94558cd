/**
 * Error taxonomy for the ingestion pipeline.
 *
 * Every error carries the HTTP status and response body when one exists,
 * so a single `log.error({ err, status, body })` is enough to diagnose a
 * failure remotely.
 */
export interface IngestErrorDetails {
  status?: number | undefined;
  body?: string | undefined;
  cause?: unknown;
}

export class IngestError extends Error {
  readonly status: number | undefined;
  readonly body: string | undefined;

  constructor(message: string, details: IngestErrorDetails = {}) {
    super(message, details.cause !== undefined ? { cause: details.cause } : undefined);
    this.name = new.target.name;
    this.status = details.status;
    this.body = details.body;
  }
}

/** Missing or contradictory configuration. Fatal at startup. */
export class ConfigurationError extends IngestError {}

/** Key loading, JWT signing or token exchange failed. */
export class CredentialError extends IngestError {}

/** Ingest host discovery failed. */
export class ResolutionError extends IngestError {}

/** Channel open/append/status failed, or the channel was used out of order. */
export class ChannelError extends IngestError {}

import type { Logger } from 'pino';
import { z } from 'zod';
import { ResolutionError } from '../../domain/index.js';
import type { BearerTokenSource } from './bearer-token.js';
import { TOKEN_TYPE_HEADER, bearer, describeFailure, parseJsonBody, request } from './http.js';
import type { HttpResult } from './http.js';

const hostnameBodySchema = z.object({
  hostname: z.string().optional(),
  ingest_host: z.string().optional(),
});

/** Hostnames must be DNS-safe; the service may report account locators with underscores. */
export function normalizeIngestHost(host: string): string {
  return host.trim().replaceAll('_', '-');
}

/**
 * Discovers the account's data-plane ingest host once and caches it for
 * the life of the process. Concurrent first callers share one request.
 */
export class EndpointResolver {
  private host: string | undefined;
  private pending: Promise<string> | undefined;

  constructor(
    private readonly controlUrl: string,
    private readonly tokens: BearerTokenSource,
    private readonly log: Logger,
  ) {}

  getCachedHost(): string | undefined {
    return this.host;
  }

  resolveIngestHost(): Promise<string> {
    if (this.host !== undefined) return Promise.resolve(this.host);
    this.pending ??= this.discover().finally(() => {
      this.pending = undefined;
    });
    return this.pending;
  }

  private async discover(): Promise<string> {
    const url = `${this.controlUrl}/v2/streaming/hostname`;
    this.log.info({ url }, 'Discovering ingest host');

    const token = await this.tokens.getBearerToken();

    let res: HttpResult;
    try {
      res = await request(url, {
        method: 'GET',
        headers: { ...bearer(token), [TOKEN_TYPE_HEADER]: this.tokens.tokenType },
      });
    } catch (err: unknown) {
      throw new ResolutionError(`Ingest host discovery failed: ${describeFailure(err)}`, { cause: err });
    }

    if (!res.ok) {
      throw new ResolutionError(`Ingest host discovery returned HTTP ${res.status}`, {
        status: res.status,
        body: res.body,
      });
    }

    const raw = res.contentType.includes('application/json') ? this.hostFromJson(res.body) : res.body;
    const host = normalizeIngestHost(raw);
    if (host === '') {
      throw new ResolutionError('Ingest host discovery returned an empty host', {
        status: res.status,
        body: res.body,
      });
    }

    if (host !== raw.trim()) {
      this.log.info({ reported: raw.trim(), host }, 'Replaced underscores with dashes in ingest host');
    }
    this.log.info({ host }, 'Discovered ingest host');
    this.host = host;
    return host;
  }

  private hostFromJson(body: string): string {
    const parsed = hostnameBodySchema.safeParse(parseJsonBody(body));
    if (!parsed.success) {
      throw new ResolutionError('Ingest host discovery returned malformed JSON', { body });
    }
    return parsed.data.hostname || parsed.data.ingest_host || '';
  }
}

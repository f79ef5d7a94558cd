import type { Logger } from 'pino';
import { z } from 'zod';
import { CredentialError } from '../../domain/index.js';
import type { TokenType } from './http.js';
import { TOKEN_TYPE_HEADER, bearer, describeFailure, parseJsonBody, request } from './http.js';
import type { HttpResult } from './http.js';
import { EXPIRY_MARGIN_SECONDS } from './bearer-token.js';
import type { BearerTokenSource, Clock } from './bearer-token.js';
import type { EndpointResolver } from './endpoint-resolver.js';

const JWT_BEARER_GRANT = 'urn:ietf:params:oauth:grant-type:jwt-bearer';
const DEFAULT_SCOPED_LIFETIME_SECONDS = 3600;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1).optional(),
  expires_in: z.coerce.number().positive().optional(),
});

/**
 * Produces credentials for both planes.
 *
 * - Control plane: the bearer token from the configured source (PAT or
 *   key-pair JWT).
 * - Data plane: a scoped access token bound to the resolved ingest host,
 *   exchanged at `/oauth/token` and cached until `expires_in - 60s`.
 *
 * The exchange is never retried here; a failed refresh surfaces as
 * `CredentialError` and the next batch attempts it again.
 */
export class CredentialProvider {
  private scopedToken: string | undefined;
  private scopedExpiresAtMs = 0;
  private refreshing: Promise<string> | undefined;

  constructor(
    private readonly controlUrl: string,
    private readonly tokens: BearerTokenSource,
    private readonly resolver: EndpointResolver,
    private readonly log: Logger,
    private readonly now: Clock = Date.now,
  ) {}

  get tokenType(): TokenType {
    return this.tokens.tokenType;
  }

  getBearerToken(): Promise<string> {
    return this.tokens.getBearerToken();
  }

  /** Data-plane host the scoped token is bound to. */
  getIngestHost(): Promise<string> {
    return this.resolver.resolveIngestHost();
  }

  getScopedToken(): Promise<string> {
    if (this.scopedToken !== undefined && this.now() < this.scopedExpiresAtMs) {
      return Promise.resolve(this.scopedToken);
    }
    this.refreshing ??= this.exchange().finally(() => {
      this.refreshing = undefined;
    });
    return this.refreshing;
  }

  /** Forces the next `getScopedToken()` to exchange, e.g. after a 401 from the data plane. */
  invalidateScopedToken(): void {
    this.scopedToken = undefined;
    this.scopedExpiresAtMs = 0;
  }

  private async exchange(): Promise<string> {
    const host = await this.resolver.resolveIngestHost();
    const bearerToken = await this.tokens.getBearerToken();
    const url = `${this.controlUrl}/oauth/token`;

    this.log.info({ scope: host }, 'Obtaining scoped token');

    let res: HttpResult;
    try {
      res = await request(url, {
        method: 'POST',
        headers: {
          ...bearer(bearerToken),
          [TOKEN_TYPE_HEADER]: this.tokens.tokenType,
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: new URLSearchParams({ grant_type: JWT_BEARER_GRANT, scope: host }).toString(),
      });
    } catch (err: unknown) {
      throw new CredentialError(`Scoped token exchange failed: ${describeFailure(err)}`, { cause: err });
    }

    if (!res.ok) {
      throw new CredentialError(`Scoped token exchange returned HTTP ${res.status}`, {
        status: res.status,
        body: res.body,
      });
    }

    const parsed = tokenResponseSchema.safeParse(parseJsonBody(res.body));
    if (!parsed.success || parsed.data.access_token === undefined) {
      throw new CredentialError('No access_token in scoped token response', {
        status: res.status,
        body: res.body,
      });
    }

    const lifetime = parsed.data.expires_in ?? DEFAULT_SCOPED_LIFETIME_SECONDS;
    this.scopedToken = parsed.data.access_token;
    this.scopedExpiresAtMs = this.now() + (lifetime - EXPIRY_MARGIN_SECONDS) * 1000;

    this.log.info({ expiresInSeconds: lifetime }, 'Scoped token obtained');
    return this.scopedToken;
  }
}

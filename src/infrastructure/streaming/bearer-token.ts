import { createHash, createPrivateKey, createPublicKey } from 'node:crypto';
import type { KeyObject } from 'node:crypto';
import { readFileSync } from 'node:fs';
import { SignJWT } from 'jose';
import type { Logger } from 'pino';
import { ConfigurationError, CredentialError } from '../../domain/index.js';
import { authModeOf } from '../../application/config-schema.js';
import type { StreamingConfig } from '../../application/config-schema.js';
import type { TokenType } from './http.js';

/** Identity assertions are issued for one hour. */
export const IDENTITY_TOKEN_LIFETIME_SECONDS = 3600;

/** No token is handed out within this many seconds of its expiry. */
export const EXPIRY_MARGIN_SECONDS = 60;

export type Clock = () => number;

/**
 * Supplies the token presented to the control plane, together with the
 * token-type header value that tells the service how to verify it.
 */
export interface BearerTokenSource {
  readonly tokenType: TokenType;
  getBearerToken(): Promise<string>;
}

/** Programmatic access token: managed externally, returned as-is. */
export class StaticTokenSource implements BearerTokenSource {
  readonly tokenType: TokenType = 'PROGRAMMATIC_ACCESS_TOKEN';

  constructor(private readonly token: string) {}

  getBearerToken(): Promise<string> {
    return Promise.resolve(this.token);
  }
}

/**
 * `SHA256:` + base64 of the SHA-256 digest of the DER-encoded
 * SubjectPublicKeyInfo. This is the fingerprint the service stores for
 * the user's registered public key.
 */
export function publicKeyFingerprint(privateKey: KeyObject): string {
  const der = createPublicKey(privateKey).export({ type: 'spki', format: 'der' });
  return `SHA256:${createHash('sha256').update(der).digest('base64')}`;
}

/**
 * Signs RS256 identity assertions with the user's private key and caches
 * the current one until it is within `EXPIRY_MARGIN_SECONDS` of expiry.
 */
export class KeyPairTokenSource implements BearerTokenSource {
  readonly tokenType: TokenType = 'KEYPAIR_JWT';

  private readonly qualifiedUser: string;
  private readonly fingerprint: string;
  private token: string | undefined;
  private refreshAtSeconds = 0;

  constructor(
    account: string,
    user: string,
    private readonly privateKey: KeyObject,
    private readonly log: Logger,
    private readonly now: Clock = Date.now,
  ) {
    this.qualifiedUser = `${account.toUpperCase()}.${user.toUpperCase()}`;
    this.fingerprint = publicKeyFingerprint(privateKey);
  }

  /**
   * Reads a PEM private key from disk. A missing file is a configuration
   * problem; an undecodable key or wrong passphrase is a credential one.
   */
  static loadPrivateKey(path: string, passphrase?: string): KeyObject {
    let pem: string;
    try {
      pem = readFileSync(path, 'utf-8');
    } catch (err: unknown) {
      throw new ConfigurationError(`Private key file not found or unreadable: ${path}`, { cause: err });
    }

    try {
      return createPrivateKey({
        key: pem,
        format: 'pem',
        ...(passphrase !== undefined ? { passphrase } : {}),
      });
    } catch (err: unknown) {
      throw new CredentialError(
        `Failed to load private key ${path} (wrong passphrase or unsupported format)`,
        { cause: err },
      );
    }
  }

  async getBearerToken(): Promise<string> {
    const nowSeconds = Math.floor(this.now() / 1000);
    if (this.token === undefined || nowSeconds >= this.refreshAtSeconds) {
      this.token = await this.sign(nowSeconds);
    }
    return this.token;
  }

  private async sign(issuedAt: number): Promise<string> {
    const expiresAt = issuedAt + IDENTITY_TOKEN_LIFETIME_SECONDS;
    try {
      const token = await new SignJWT({})
        .setProtectedHeader({ alg: 'RS256', typ: 'JWT' })
        .setIssuer(`${this.qualifiedUser}.${this.fingerprint}`)
        .setSubject(this.qualifiedUser)
        .setIssuedAt(issuedAt)
        .setExpirationTime(expiresAt)
        .sign(this.privateKey);

      this.refreshAtSeconds = expiresAt - EXPIRY_MARGIN_SECONDS;
      this.log.debug({ sub: this.qualifiedUser, exp: expiresAt }, 'Identity JWT generated');
      return token;
    } catch (err: unknown) {
      throw new CredentialError('Failed to sign identity JWT', { cause: err });
    }
  }
}

/** Picks the token source for the configured authentication mode. */
export function createBearerTokenSource(
  config: StreamingConfig,
  log: Logger,
  now: Clock = Date.now,
): BearerTokenSource {
  const mode = authModeOf(config);
  if (mode.kind === 'pat') {
    log.info('Using programmatic access token authentication');
    return new StaticTokenSource(mode.token);
  }

  log.info({ privateKeyFile: mode.privateKeyFile }, 'Using key-pair JWT authentication');
  const key = KeyPairTokenSource.loadPrivateKey(mode.privateKeyFile, mode.passphrase);
  return new KeyPairTokenSource(config.account, config.user, key, log, now);
}

/** Per-call bound for every control-plane and data-plane request. */
export const REQUEST_TIMEOUT_MS = 30_000;

export const TOKEN_TYPE_HEADER = 'X-Snowflake-Authorization-Token-Type';

export type TokenType = 'KEYPAIR_JWT' | 'PROGRAMMATIC_ACCESS_TOKEN';

/** Response already drained to text, so callers can log the body on failure. */
export interface HttpResult {
  status: number;
  ok: boolean;
  contentType: string;
  body: string;
}

/**
 * Issues one request through the global `fetch` with a bounded timeout
 * and reads the full body. Network failures and timeouts reject; non-2xx
 * statuses resolve with `ok: false` so each caller maps them to its own
 * error class.
 */
export async function request(url: string, init: RequestInit): Promise<HttpResult> {
  const response = await fetch(url, {
    ...init,
    signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
  });
  const body = await response.text();
  return {
    status: response.status,
    ok: response.ok,
    contentType: response.headers.get('content-type') ?? '',
    body,
  };
}

export function bearer(token: string): Record<string, string> {
  return { Authorization: `Bearer ${token}` };
}

/** Parses a JSON body, returning `undefined` instead of throwing. */
export function parseJsonBody(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

export function describeFailure(err: unknown): string {
  if (err instanceof Error) {
    return err.name === 'TimeoutError' ? `timed out after ${REQUEST_TIMEOUT_MS}ms` : err.message;
  }
  return String(err);
}

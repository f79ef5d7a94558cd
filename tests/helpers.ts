import { vi } from 'vitest';
import type { Logger } from 'pino';
import { parseStreamingConfig } from '../src/infrastructure/config/index.js';
import type { StreamingConfig } from '../src/application/config-schema.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as Logger;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'content-type': 'text/plain' } });
}

export interface RecordedCall {
  url: string;
  method: string;
  headers: Headers;
  body: string;
}

type Respond = (call: RecordedCall) => Response | Promise<Response>;

const defaultHostname: Respond = () => textResponse('ingest_host.example.com');
const defaultToken: Respond = () => jsonResponse({ access_token: 'scoped-1', expires_in: 3600 });
const defaultStatus: Respond = () => jsonResponse({ channel_statuses: {} });
const defaultOpen: Respond = () =>
  jsonResponse({
    next_continuation_token: 'ct-1',
    channel_status: { last_committed_offset_token: null },
  });

export interface FakeServiceRoutes {
  hostname?: Respond;
  token?: Respond;
  open?: Respond;
  append?: Respond;
  status?: Respond;
}

/**
 * Stubs global `fetch` with an in-process stand-in for the control and
 * data planes. Defaults:
 * - hostname → text `ingest_host.example.com`
 * - token    → `{ access_token: 'scoped-1', expires_in: 3600 }`
 * - open     → `{ next_continuation_token: 'ct-1' }` with no committed offset
 * - append   → `{ next_continuation_token: 'ct-{n+1}' }` for the n-th append
 */
export function installFakeService(routes: FakeServiceRoutes = {}) {
  const calls: RecordedCall[] = [];
  let appends = 0;

  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const call: RecordedCall = {
      url: String(input),
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : '',
    };
    calls.push(call);

    if (call.url.endsWith('/v2/streaming/hostname')) {
      return (routes.hostname ?? defaultHostname)(call);
    }
    if (call.url.endsWith('/oauth/token')) {
      return (routes.token ?? defaultToken)(call);
    }
    if (call.url.includes(':bulk-channel-status')) {
      return (routes.status ?? defaultStatus)(call);
    }
    if (call.url.includes('/rows?')) {
      appends += 1;
      const n = appends;
      const defaultAppend: Respond = () => jsonResponse({ next_continuation_token: `ct-${n + 1}` });
      return (routes.append ?? defaultAppend)(call);
    }
    if (call.method === 'PUT') {
      return (routes.open ?? defaultOpen)(call);
    }
    return textResponse('not found', 404);
  });

  vi.stubGlobal('fetch', fetchMock);

  return {
    calls,
    fetchMock,
    callsTo: (fragment: string) => calls.filter((c) => c.url.includes(fragment)),
  };
}

export function patConfig(overrides: Record<string, unknown> = {}): StreamingConfig {
  return parseStreamingConfig({
    account: 'xy12345',
    user: 'bob',
    pat_token: 'tok',
    database: 'D',
    schema: 'S',
    pipe: 'P',
    ...overrides,
  });
}

import { describe, it, expect, vi, afterEach } from 'vitest';
import { EndpointResolver, normalizeIngestHost } from '../../src/infrastructure/streaming/endpoint-resolver.js';
import { StaticTokenSource } from '../../src/infrastructure/streaming/bearer-token.js';
import { ResolutionError } from '../../src/domain/index.js';
import { fakeLogger, installFakeService, jsonResponse, textResponse } from '../helpers.js';

const CONTROL = 'https://xy12345.snowflakecomputing.com';

function makeResolver() {
  return new EndpointResolver(CONTROL, new StaticTokenSource('tok'), fakeLogger());
}

describe('normalizeIngestHost', () => {
  it('replaces every underscore with a hyphen', () => {
    const host = normalizeIngestHost('org_acct_1.ingest_us_west.example.com');
    expect(host).toBe('org-acct-1.ingest-us-west.example.com');
    expect(host).not.toContain('_');
  });

  it('trims surrounding whitespace', () => {
    expect(normalizeIngestHost('  host.example.com\n')).toBe('host.example.com');
  });
});

describe('EndpointResolver', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('GETs the discovery endpoint with bearer and token-type headers', async () => {
    const service = installFakeService();

    const host = await makeResolver().resolveIngestHost();

    expect(host).toBe('ingest-host.example.com');
    expect(service.calls).toHaveLength(1);
    const [call] = service.calls;
    expect(call?.url).toBe(`${CONTROL}/v2/streaming/hostname`);
    expect(call?.method).toBe('GET');
    expect(call?.headers.get('authorization')).toBe('Bearer tok');
    expect(call?.headers.get('x-snowflake-authorization-token-type')).toBe('PROGRAMMATIC_ACCESS_TOKEN');
  });

  it('reads the hostname field from a JSON body', async () => {
    installFakeService({ hostname: () => jsonResponse({ hostname: 'abc_def.ingest.example.com' }) });
    await expect(makeResolver().resolveIngestHost()).resolves.toBe('abc-def.ingest.example.com');
  });

  it('falls back to the ingest_host field', async () => {
    installFakeService({ hostname: () => jsonResponse({ ingest_host: 'alt_host.example.com' }) });
    await expect(makeResolver().resolveIngestHost()).resolves.toBe('alt-host.example.com');
  });

  it('trims a plain-text body', async () => {
    installFakeService({ hostname: () => textResponse('  plain_host.example.com \n') });
    await expect(makeResolver().resolveIngestHost()).resolves.toBe('plain-host.example.com');
  });

  it('caches the host for subsequent calls', async () => {
    const service = installFakeService();
    const resolver = makeResolver();

    await resolver.resolveIngestHost();
    await resolver.resolveIngestHost();

    expect(service.fetchMock).toHaveBeenCalledOnce();
    expect(resolver.getCachedHost()).toBe('ingest-host.example.com');
  });

  it('shares one request between concurrent first callers', async () => {
    const service = installFakeService();
    const resolver = makeResolver();

    const [a, b] = await Promise.all([resolver.resolveIngestHost(), resolver.resolveIngestHost()]);

    expect(a).toBe(b);
    expect(service.fetchMock).toHaveBeenCalledOnce();
  });

  it('fails with ResolutionError on a non-2xx response', async () => {
    installFakeService({ hostname: () => textResponse('unavailable', 503) });

    const err = await makeResolver().resolveIngestHost().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ResolutionError);
    expect(err).toMatchObject({ status: 503, body: 'unavailable' });
  });

  it('fails with ResolutionError on an empty body', async () => {
    installFakeService({ hostname: () => textResponse('   ') });
    await expect(makeResolver().resolveIngestHost()).rejects.toThrow(ResolutionError);
  });

  it('fails with ResolutionError on malformed JSON', async () => {
    installFakeService({
      hostname: () => new Response('{not json', { headers: { 'content-type': 'application/json' } }),
    });
    await expect(makeResolver().resolveIngestHost()).rejects.toThrow('malformed JSON');
  });

  it('wraps network failures in ResolutionError and retries on the next call', async () => {
    const resolver = makeResolver();
    vi.stubGlobal('fetch', vi.fn().mockRejectedValueOnce(new Error('ECONNRESET')));

    await expect(resolver.resolveIngestHost()).rejects.toThrow(ResolutionError);
    expect(resolver.getCachedHost()).toBeUndefined();

    installFakeService();
    await expect(resolver.resolveIngestHost()).resolves.toBe('ingest-host.example.com');
  });
});

import { describe, it, expect } from 'vitest';
import { ContentFetcher } from '../ContentFetcher.js';
import { PolitenessGate, type CrawlPolicy } from '../PolitenessGate.js';
import { FakeClock } from '../../../__tests__/helpers/clock.js';
import { html, stubHttpClient, timeoutError, type StubHandler } from '../../../__tests__/helpers/http.js';
import { makeHit } from '../../../__tests__/helpers/fixtures.js';

const allowAll: CrawlPolicy = { isUrlAllowed: async () => true, getCrawlDelay: async () => null };

function createFetcher(handler: StubHandler, options: { policy?: CrawlPolicy; maxContentBytes?: number } = {}) {
  const clock = new FakeClock(1_000_000);
  const { client, calls } = stubHttpClient(handler);
  const gate = new PolitenessGate({ policy: options.policy ?? allowAll, delaySeconds: 0, clock });
  const fetcher = new ContentFetcher({
    gate,
    userAgent: 'TestBot/1.0',
    timeoutMs: 50,
    retryBackoffMs: 1000,
    maxRedirects: 5,
    maxContentBytes: options.maxContentBytes ?? 1024 * 1024,
    httpClient: client,
    clock,
  });
  return { fetcher, calls, clock };
}

describe('ContentFetcher', () => {
  it('returns the body, status and final URL of a successful fetch', async () => {
    const { fetcher, calls } = createFetcher(() => ({
      ...html('<p>hello</p>'),
      responseUrl: 'https://site0.example/final',
    }));

    const outcome = await fetcher.fetch(makeHit(0));

    expect(outcome.status).toEqual({ kind: 'fetched' });
    expect(outcome.rawBytes?.toString('utf8')).toBe('<p>hello</p>');
    expect(outcome.httpStatus).toBe(200);
    expect(outcome.finalUrl).toBe('https://site0.example/final');
    expect(outcome.contentType).toBe('text/html; charset=utf-8');
    expect(calls).toEqual(['https://site0.example/page']);
  });

  it('fails invalid and non-HTTP URLs without a request', async () => {
    const { fetcher, calls } = createFetcher(() => html('unused'));

    const invalid = await fetcher.fetch(makeHit(0, 'not a url'));
    const ftp = await fetcher.fetch(makeHit(1, 'ftp://files.example/data'));

    expect(invalid.status).toEqual({ kind: 'failed', reason: 'invalid_url' });
    expect(ftp.status).toEqual({ kind: 'failed', reason: 'invalid_url' });
    expect(calls).toEqual([]);
  });

  it('skips URLs disallowed by the crawl policy without a request', async () => {
    const { fetcher, calls } = createFetcher(() => html('unused'), {
      policy: { isUrlAllowed: async () => false, getCrawlDelay: async () => null },
    });

    const outcome = await fetcher.fetch(makeHit(0));

    expect(outcome.status).toEqual({ kind: 'skipped', reason: 'robots' });
    expect(outcome.error).toBe('Fetching https://site0.example/page is disallowed by robots.txt');
    expect(outcome.rawBytes).toBeUndefined();
    expect(calls).toEqual([]);
  });

  it('retries a timeout once after the backoff, then fails with reason timeout', async () => {
    const { fetcher, calls, clock } = createFetcher((_url, config) => {
      throw timeoutError(config);
    });

    const outcome = await fetcher.fetch(makeHit(0));

    expect(outcome.status).toEqual({ kind: 'failed', reason: 'timeout' });
    expect(calls).toHaveLength(2);
    expect(clock.sleeps).toEqual([1000]);
    expect(outcome.fetchDurationMs).toBe(1000);
  });

  it('recovers when the retry succeeds', async () => {
    let attempts = 0;
    const { fetcher, calls } = createFetcher(() => {
      attempts++;
      return attempts === 1 ? { status: 503, data: Buffer.from('busy') } : html('<p>ok</p>');
    });

    const outcome = await fetcher.fetch(makeHit(0));

    expect(outcome.status).toEqual({ kind: 'fetched' });
    expect(calls).toHaveLength(2);
  });

  it('reports the HTTP status of a persistent non-2xx answer', async () => {
    const { fetcher } = createFetcher(() => ({ status: 404, data: Buffer.from('missing') }));

    const outcome = await fetcher.fetch(makeHit(0));

    expect(outcome.status).toEqual({ kind: 'failed', reason: 'http_404' });
    expect(outcome.httpStatus).toBe(404);
  });

  it('reports transport errors', async () => {
    const { fetcher } = createFetcher(() => {
      throw new Error('socket hang up');
    });

    const outcome = await fetcher.fetch(makeHit(0));

    expect(outcome.status).toEqual({ kind: 'failed', reason: 'transport' });
    expect(outcome.error).toContain('socket hang up');
  });

  it('rejects bodies above the size limit', async () => {
    const { fetcher } = createFetcher(() => html('x'.repeat(200)), { maxContentBytes: 100 });

    const outcome = await fetcher.fetch(makeHit(0));

    expect(outcome.status).toEqual({ kind: 'failed', reason: 'transport' });
  });
});

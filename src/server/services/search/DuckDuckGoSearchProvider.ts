/**
 * DuckDuckGo HTML search provider
 *
 * Queries the key-less HTML endpoint and parses the result list with cheerio.
 * One retry after a fixed backoff on transport errors, non-2xx answers and
 * bot-check pages.
 */

import * as cheerio from 'cheerio';
import type { AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import type { SearchProvider } from './SearchProvider.js';
import type { SearchHit } from '../../types/deep-search.js';
import { createHttpClient } from '../../config/httpClient.js';
import { createChildLogger } from '../../utils/logger.js';
import { realSleep, retryWithBackoff, type Sleep } from '../../utils/retry.js';
import { ProviderEmptyError, ProviderUnavailableError, errorMessage } from '../../types/errors.js';

export interface DuckDuckGoSearchProviderOptions {
  endpoint: string;
  userAgent: string;
  timeoutMs: number;
  retryBackoffMs: number;
  /** DuckDuckGo region code (`kl`), e.g. `nl-nl` */
  region?: string;
  httpClient?: AxiosInstance;
  sleep?: Sleep;
}

export interface ParsedResult {
  url: string;
  title: string;
  snippet: string;
}

const PROVIDER_NAME = 'duckduckgo';

function isHttpUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

/**
 * Resolve a result link: protocol-relative and site-relative hrefs are made absolute,
 * `/l/?uddg=` redirect links are unwrapped to their target.
 */
export function resolveResultHref(href: string): string | null {
  let url: URL;
  try {
    url = new URL(href, 'https://duckduckgo.com');
  } catch {
    return null;
  }
  if (url.hostname.endsWith('duckduckgo.com')) {
    const target = url.pathname.startsWith('/l/') ? url.searchParams.get('uddg') : null;
    return target && isHttpUrl(target) ? target : null;
  }
  return url.toString();
}

/**
 * Extract organic results (ads excluded) from a result page, in page order
 */
export function parseDuckDuckGoResults(html: string): ParsedResult[] {
  const $ = cheerio.load(html);
  const results: ParsedResult[] = [];

  $('.result').each((_, el) => {
    const result = $(el);
    if (result.hasClass('result--ad')) return;

    const link = result.find('.result__a').first();
    const href = link.attr('href');
    const url = href ? resolveResultHref(href) : null;
    if (!url) return;

    results.push({
      url,
      title: link.text().replace(/\s+/g, ' ').trim(),
      snippet: result.find('.result__snippet').first().text().replace(/\s+/g, ' ').trim(),
    });
  });

  return results;
}

/**
 * Keep HTTP(S) results, drop duplicate URLs, cap at `maxResults` and rank from 0
 */
export function toSearchHits(results: readonly ParsedResult[], maxResults: number): SearchHit[] {
  const seen = new Set<string>();
  const hits: SearchHit[] = [];
  for (const result of results) {
    if (hits.length >= maxResults) break;
    if (!isHttpUrl(result.url) || seen.has(result.url)) continue;
    seen.add(result.url);
    hits.push({ rank: hits.length, url: result.url, title: result.title, snippet: result.snippet });
  }
  return hits;
}

function looksBlocked(html: string): boolean {
  return /\b(captcha|anomaly|bot)\b/i.test(html) && !/result__a/i.test(html);
}

export class DuckDuckGoSearchProvider implements SearchProvider {
  readonly name = PROVIDER_NAME;
  private readonly options: DuckDuckGoSearchProviderOptions;
  private readonly httpClient: AxiosInstance;
  private readonly log: Logger;

  constructor(options: DuckDuckGoSearchProviderOptions) {
    this.options = options;
    this.httpClient = options.httpClient ?? createHttpClient({ timeout: options.timeoutMs });
    this.log = createChildLogger({ component: 'DuckDuckGoSearchProvider' });
  }

  async search(query: string, maxResults: number): Promise<SearchHit[]> {
    if (!Number.isInteger(maxResults) || maxResults <= 0) {
      throw new RangeError('maxResults must be a positive integer');
    }

    let html: string;
    try {
      html = await retryWithBackoff(() => this.requestPage(query), {
        maxRetries: 1,
        initialDelay: this.options.retryBackoffMs,
        multiplier: 1,
        sleep: this.options.sleep ?? realSleep,
        onRetry: (attempt, error) =>
          this.log.debug({ attempt, error: errorMessage(error) }, 'Search request failed, retrying'),
      }, `search ${query}`);
    } catch (error) {
      this.log.error({ query, error: errorMessage(error) }, 'Search provider unavailable');
      throw new ProviderUnavailableError(PROVIDER_NAME, errorMessage(error), { query });
    }

    const hits = toSearchHits(parseDuckDuckGoResults(html), maxResults);
    if (hits.length === 0) {
      throw new ProviderEmptyError(PROVIDER_NAME, query);
    }
    this.log.info({ query, hits: hits.length, requested: maxResults }, 'Search completed');
    return hits;
  }

  private async requestPage(query: string): Promise<string> {
    const response = await this.httpClient.get<unknown>(this.options.endpoint, {
      params: { q: query, ...(this.options.region ? { kl: this.options.region } : {}) },
      timeout: this.options.timeoutMs,
      responseType: 'text',
      headers: {
        'User-Agent': this.options.userAgent,
        Accept: 'text/html,application/xhtml+xml',
      },
      validateStatus: () => true,
    });

    if (response.status < 200 || response.status >= 300) {
      throw new Error(`HTTP ${response.status}`);
    }
    const html = typeof response.data === 'string' ? response.data : '';
    if (looksBlocked(html)) {
      throw new Error('Bot-check page served instead of results');
    }
    return html;
  }
}

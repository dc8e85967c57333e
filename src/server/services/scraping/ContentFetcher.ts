/**
 * Content Fetcher
 *
 * Retrieves one search hit: policy check, politeness slot, a single GET with a
 * bounded timeout and one retry after a fixed backoff. Always resolves to a
 * FetchOutcome; failures are recorded on the outcome, never thrown.
 */

import axios, { type AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import { createHttpClient } from '../../config/httpClient.js';
import { createChildLogger } from '../../utils/logger.js';
import { retryWithBackoff, type Sleep } from '../../utils/retry.js';
import { FetchTimeoutError, FetchTransportError, PolicyDisallowedError, errorMessage } from '../../types/errors.js';
import type { FetchOutcome, SearchHit } from '../../types/deep-search.js';
import { systemClock, type Clock, type PolitenessGate } from './PolitenessGate.js';

export interface ContentFetcherOptions {
    gate: PolitenessGate;
    userAgent: string;
    timeoutMs: number;
    retryBackoffMs: number;
    maxRedirects: number;
    maxContentBytes: number;
    httpClient?: AxiosInstance;
    clock?: Clock;
}

interface FetchedResponse {
    body: Buffer;
    status: number;
    finalUrl: string;
    contentType?: string;
}

export class ContentFetcher {
    private readonly gate: PolitenessGate;
    private readonly httpClient: AxiosInstance;
    private readonly options: ContentFetcherOptions;
    private readonly clock: Clock;
    private readonly sleep: Sleep;
    private readonly log: Logger;

    constructor(options: ContentFetcherOptions) {
        this.options = options;
        this.gate = options.gate;
        this.clock = options.clock ?? systemClock;
        this.sleep = this.clock.sleep;
        this.httpClient = options.httpClient ?? createHttpClient();
        this.log = createChildLogger({ component: 'ContentFetcher' });
    }

    async fetch(hit: SearchHit): Promise<FetchOutcome> {
        const fetchedAt = new Date(this.clock.now());
        const started = this.clock.now();
        const elapsed = () => this.clock.now() - started;

        let target: URL;
        try {
            target = new URL(hit.url);
        } catch {
            return { hit, status: { kind: 'failed', reason: 'invalid_url' }, fetchDurationMs: 0, fetchedAt, error: 'Invalid URL' };
        }
        if (target.protocol !== 'http:' && target.protocol !== 'https:') {
            return {
                hit,
                status: { kind: 'failed', reason: 'invalid_url' },
                fetchDurationMs: 0,
                fetchedAt,
                error: `Unsupported protocol ${target.protocol}`,
            };
        }

        if (!(await this.gate.mayFetch(hit.url))) {
            const disallowed = new PolicyDisallowedError(hit.url);
            this.log.info({ url: hit.url, rank: hit.rank, code: disallowed.code }, 'Blocked by robots.txt');
            return {
                hit,
                status: { kind: 'skipped', reason: 'robots' },
                fetchDurationMs: elapsed(),
                fetchedAt,
                error: disallowed.message,
            };
        }

        try {
            const response = await retryWithBackoff(
                async () => {
                    await this.gate.waitSlot(target.host, target.origin);
                    return this.request(hit.url);
                },
                {
                    maxRetries: 1,
                    initialDelay: this.options.retryBackoffMs,
                    multiplier: 1,
                    sleep: this.sleep,
                    onRetry: (attempt, error) =>
                        this.log.debug({ url: hit.url, attempt, error: errorMessage(error) }, 'Fetch failed, retrying'),
                },
                `fetch ${hit.url}`
            );

            this.log.debug({ url: hit.url, status: response.status, bytes: response.body.length }, 'Fetched');
            return {
                hit,
                status: { kind: 'fetched' },
                rawBytes: response.body,
                finalUrl: response.finalUrl,
                httpStatus: response.status,
                contentType: response.contentType,
                fetchDurationMs: elapsed(),
                fetchedAt,
            };
        } catch (error) {
            const reason = failureReason(error);
            this.log.info({ url: hit.url, rank: hit.rank, reason, error: errorMessage(error) }, 'Fetch failed');
            return {
                hit,
                status: { kind: 'failed', reason },
                httpStatus: error instanceof FetchTransportError ? httpStatusOf(error) : undefined,
                fetchDurationMs: elapsed(),
                fetchedAt,
                error: errorMessage(error),
            };
        }
    }

    private async request(url: string): Promise<FetchedResponse> {
        const response = await this.httpClient
            .get<unknown>(url, {
                timeout: this.options.timeoutMs,
                responseType: 'arraybuffer',
                maxRedirects: this.options.maxRedirects,
                maxContentLength: this.options.maxContentBytes,
                headers: {
                    'User-Agent': this.options.userAgent,
                    Accept: 'text/html,application/xhtml+xml;q=0.9,text/plain;q=0.8,*/*;q=0.5',
                },
                validateStatus: () => true,
            })
            .catch((error: unknown): never => {
                if (axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')) {
                    throw new FetchTimeoutError(url, this.options.timeoutMs);
                }
                throw new FetchTransportError(url, 'transport', errorMessage(error));
            });

        if (response.status < 200 || response.status >= 300) {
            throw new FetchTransportError(url, `http_${response.status}`, `HTTP ${response.status}`, {
                status: response.status,
            });
        }

        const body = toBuffer(response.data);
        if (!body) {
            throw new FetchTransportError(url, 'transport', 'Response body is not binary data');
        }
        if (body.length > this.options.maxContentBytes) {
            throw new FetchTransportError(url, 'transport', `Response exceeds ${this.options.maxContentBytes} bytes`);
        }

        const contentType = response.headers['content-type'];
        return {
            body,
            status: response.status,
            finalUrl: resolveFinalUrl(response.request, url),
            contentType: typeof contentType === 'string' ? contentType : undefined,
        };
    }
}

function failureReason(error: unknown): string {
    if (error instanceof FetchTimeoutError) return 'timeout';
    if (error instanceof FetchTransportError) return error.reason;
    return 'transport';
}

function httpStatusOf(error: FetchTransportError): number | undefined {
    const status = error.context?.status;
    return typeof status === 'number' ? status : undefined;
}

function toBuffer(data: unknown): Buffer | null {
    if (Buffer.isBuffer(data)) return data;
    if (data instanceof ArrayBuffer) return Buffer.from(data);
    if (ArrayBuffer.isView(data)) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    if (typeof data === 'string') return Buffer.from(data, 'utf8');
    return null;
}

/**
 * URL after redirects, as reported by Node's http adapter (`request.res.responseUrl`)
 */
function resolveFinalUrl(request: unknown, fallback: string): string {
    if (typeof request === 'object' && request !== null && 'res' in request) {
        const res: unknown = request.res;
        if (typeof res === 'object' && res !== null && 'responseUrl' in res && typeof res.responseUrl === 'string') {
            return res.responseUrl;
        }
    }
    return fallback;
}

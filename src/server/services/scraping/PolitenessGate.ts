/**
 * Politeness Gate
 *
 * Combines robots.txt policy checks with a per-host minimum interval between
 * requests. The interval is tracked per host behind a keyed mutex, so requests
 * to different hosts proceed independently while requests to one host are
 * spaced by at least `delaySeconds` (or the host's Crawl-delay, if larger).
 *
 * Risk: a host whose robots.txt cannot be retrieved is treated as permissive.
 */

import type { Logger } from 'pino';
import { KeyedMutex } from '../../utils/keyedMutex.js';
import { createChildLogger } from '../../utils/logger.js';
import { realSleep, type Sleep } from '../../utils/retry.js';
import { errorMessage } from '../../types/errors.js';

export interface Clock {
    now(): number;
    sleep: Sleep;
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep: realSleep,
};

/**
 * Crawl policy lookup; `RobotsTxtParser` is the default implementation
 */
export interface CrawlPolicy {
    isUrlAllowed(url: string): Promise<boolean>;
    getCrawlDelay(origin: string): Promise<number | null>;
}

export interface PolitenessGateOptions {
    policy: CrawlPolicy;
    /** Minimum seconds between requests issued to the same host */
    delaySeconds: number;
    clock?: Clock;
}

export class PolitenessGate {
    private readonly policy: CrawlPolicy;
    private readonly delayMs: number;
    private readonly clock: Clock;
    private readonly mutex = new KeyedMutex();
    private readonly lastIssued: Map<string, number> = new Map();
    private readonly log: Logger;

    constructor(options: PolitenessGateOptions) {
        if (!(options.delaySeconds >= 0)) {
            throw new RangeError('delaySeconds must be >= 0');
        }
        this.policy = options.policy;
        this.delayMs = options.delaySeconds * 1000;
        this.clock = options.clock ?? systemClock;
        this.log = createChildLogger({ component: 'PolitenessGate' });
    }

    /**
     * Whether the host's crawl policy allows fetching `url`.
     * Policy lookups are cached per host by the underlying policy.
     */
    async mayFetch(url: string): Promise<boolean> {
        try {
            return await this.policy.isUrlAllowed(url);
        } catch (error) {
            this.log.warn({ url, error: errorMessage(error) }, 'Policy check failed; allowing');
            return true;
        }
    }

    /**
     * Resolve once a request to `host` may be issued, and record it as issued.
     *
     * @param host - Host key, as in `URL.host`
     * @param origin - Origin used to look up a robots Crawl-delay (defaults to https)
     */
    async waitSlot(host: string, origin: string = `https://${host}`): Promise<void> {
        const crawlDelay = await this.policy.getCrawlDelay(origin);
        const intervalMs = Math.max(this.delayMs, (crawlDelay ?? 0) * 1000);

        await this.mutex.runExclusive(host, async () => {
            const last = this.lastIssued.get(host);
            if (last !== undefined) {
                const waitMs = last + intervalMs - this.clock.now();
                if (waitMs > 0) {
                    this.log.debug({ host, waitMs }, 'Waiting for politeness slot');
                    await this.clock.sleep(waitMs);
                }
            }
            this.lastIssued.set(host, this.clock.now());
        });
    }

    /**
     * Timestamp (ms) of the last request issued to `host`, if any
     */
    lastRequestAt(host: string): number | undefined {
        return this.lastIssued.get(host);
    }
}

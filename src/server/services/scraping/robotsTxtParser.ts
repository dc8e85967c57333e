/**
 * Robots.txt Parser Service
 *
 * Fetches and parses robots.txt files to respect crawl-delay and disallow rules.
 * Parsed policies are cached per host for the lifetime of the parser instance.
 */

import type { AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import { createHttpClient, HTTP_TIMEOUTS } from '../../config/httpClient.js';
import { createChildLogger } from '../../utils/logger.js';
import { errorMessage } from '../../types/errors.js';

export interface RobotsRule {
    allow: boolean;
    pattern: string;
}

export interface RobotsTxtRules {
    crawlDelay?: number; // in seconds
    rules: RobotsRule[];
}

export interface ParsedRobotsTxt {
    groups: Map<string, RobotsTxtRules>; // key: user agent token (or '*' for all)
}

export interface RobotsTxtParserOptions {
    userAgent: string;
    httpClient?: AxiosInstance;
    timeoutMs?: number;
}

const EMPTY_POLICY = (): ParsedRobotsTxt => ({ groups: new Map() });

/**
 * Parse robots.txt content.
 *
 * Consecutive `User-agent` lines share one group; repeated groups for the same
 * agent are merged in file order.
 */
export function parseRobotsTxt(content: string): ParsedRobotsTxt {
    const parsedGroups: { agents: string[]; rules: RobotsTxtRules }[] = [];

    let current: { agents: string[]; rules: RobotsTxtRules } | null = null;
    let collectingAgents = false;

    for (const line of content.split(/\r?\n/)) {
        const trimmed = line.replace(/#.*$/, '').trim();
        if (!trimmed) {
            continue;
        }

        const colonIndex = trimmed.indexOf(':');
        if (colonIndex === -1) {
            continue;
        }

        const directive = trimmed.substring(0, colonIndex).trim().toLowerCase();
        const value = trimmed.substring(colonIndex + 1).trim();

        if (directive === 'user-agent') {
            if (!collectingAgents || !current) {
                current = { agents: [], rules: { rules: [] } };
                parsedGroups.push(current);
                collectingAgents = true;
            }
            current.agents.push(value.toLowerCase());
            continue;
        }

        // Sitemaps are not followed
        if (directive === 'sitemap') {
            continue;
        }

        collectingAgents = false;
        if (!current) {
            continue;
        }

        if (directive === 'disallow') {
            // Empty disallow means allow all; it adds no rule
            if (value) {
                current.rules.rules.push({ allow: false, pattern: value });
            }
        } else if (directive === 'allow') {
            if (value) {
                current.rules.rules.push({ allow: true, pattern: value });
            }
        } else if (directive === 'crawl-delay') {
            const delay = parseFloat(value);
            if (!isNaN(delay) && delay > 0) {
                current.rules.crawlDelay = delay;
            }
        }
    }

    const groups = new Map<string, RobotsTxtRules>();
    for (const group of parsedGroups) {
        for (const agent of group.agents) {
            const existing = groups.get(agent);
            groups.set(agent, {
                crawlDelay: group.rules.crawlDelay ?? existing?.crawlDelay,
                rules: [...(existing?.rules ?? []), ...group.rules.rules],
            });
        }
    }

    return { groups };
}

/**
 * Pick the group that applies to `userAgent`: the longest agent token contained in
 * the product name, else `*`.
 */
export function selectGroup(policy: ParsedRobotsTxt, userAgent: string): RobotsTxtRules | undefined {
    const product = userAgent.toLowerCase().split('/')[0].trim();
    let best: { token: string; rules: RobotsTxtRules } | undefined;
    for (const [token, rules] of policy.groups) {
        if (token === '*') continue;
        if (product.includes(token) && (!best || token.length > best.token.length)) {
            best = { token, rules };
        }
    }
    return best?.rules ?? policy.groups.get('*');
}

/**
 * Check if a path matches a robots pattern (`*` wildcard, trailing `$` anchor)
 */
export function pathMatches(path: string, pattern: string): boolean {
    const anchored = pattern.endsWith('$');
    const body = anchored ? pattern.slice(0, -1) : pattern;
    const regexPattern = body
        .split('*')
        .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
        .join('.*');
    return new RegExp(`^${regexPattern}${anchored ? '$' : ''}`).test(path);
}

/**
 * Evaluate a path against a group: the longest matching pattern wins, Allow wins ties.
 */
export function isPathAllowed(rules: RobotsTxtRules | undefined, path: string): boolean {
    if (!rules) return true;

    let verdict: RobotsRule | undefined;
    for (const rule of rules.rules) {
        if (!pathMatches(path, rule.pattern)) continue;
        if (
            !verdict ||
            rule.pattern.length > verdict.pattern.length ||
            (rule.pattern.length === verdict.pattern.length && rule.allow && !verdict.allow)
        ) {
            verdict = rule;
        }
    }
    return verdict ? verdict.allow : true;
}

export class RobotsTxtParser {
    private cache: Map<string, Promise<ParsedRobotsTxt | null>> = new Map();
    private readonly httpClient: AxiosInstance;
    private readonly userAgent: string;
    private readonly timeoutMs: number;
    private readonly log: Logger;

    constructor(options: RobotsTxtParserOptions) {
        this.userAgent = options.userAgent;
        this.timeoutMs = options.timeoutMs ?? HTTP_TIMEOUTS.SHORT;
        this.httpClient = options.httpClient ?? createHttpClient({ timeout: this.timeoutMs });
        this.log = createChildLogger({ component: 'RobotsTxtParser' });
    }

    /**
     * Fetch and parse robots.txt for an origin (`https://host[:port]`).
     * Concurrent callers for the same origin share one request.
     *
     * @returns the policy, or null when it could not be retrieved
     */
    getRobotsTxt(origin: string): Promise<ParsedRobotsTxt | null> {
        const cached = this.cache.get(origin);
        if (cached) {
            return cached;
        }
        const pending = this.fetchRobotsTxt(origin);
        this.cache.set(origin, pending);
        return pending;
    }

    private async fetchRobotsTxt(origin: string): Promise<ParsedRobotsTxt | null> {
        const robotsUrl = `${origin}/robots.txt`;
        try {
            const response = await this.httpClient.get<unknown>(robotsUrl, {
                timeout: this.timeoutMs,
                responseType: 'text',
                headers: { 'User-Agent': this.userAgent },
                validateStatus: () => true,
            });

            if (response.status >= 400 && response.status < 500) {
                // No robots.txt (or not readable): allow all
                return EMPTY_POLICY();
            }
            if (response.status < 200 || response.status >= 300) {
                throw new Error(`HTTP ${response.status}`);
            }

            const body = typeof response.data === 'string' ? response.data : '';
            return parseRobotsTxt(body);
        } catch (error) {
            this.log.warn(
                { origin, error: errorMessage(error) },
                'robots.txt unreachable; treating host as permissive'
            );
            return null;
        }
    }

    /**
     * Check if a URL is allowed by robots.txt. Unreachable policies allow.
     */
    async isUrlAllowed(url: string): Promise<boolean> {
        const urlObj = new URL(url);
        const robotsTxt = await this.getRobotsTxt(urlObj.origin);
        if (!robotsTxt) {
            return true;
        }
        const path = `${urlObj.pathname}${urlObj.search}`;
        return isPathAllowed(selectGroup(robotsTxt, this.userAgent), path);
    }

    /**
     * Crawl delay (seconds) already known for an origin, without triggering a fetch
     */
    async getCrawlDelay(origin: string): Promise<number | null> {
        const pending = this.cache.get(origin);
        if (!pending) return null;
        const robotsTxt = await pending;
        if (!robotsTxt) return null;
        return selectGroup(robotsTxt, this.userAgent)?.crawlDelay ?? null;
    }
}

/**
 * DeepSearch Configuration
 *
 * Central configuration for search, fetching and analysis.
 * Every collaborator receives its slice of this object at construction;
 * nothing reads module-level state at call time.
 */

import { getEnv, type Env } from './env.js';

export interface DeepSearchConfig {
    /** User agent sent with every request and matched against robots.txt groups */
    userAgent: string;

    search: {
        endpoint: string;
        region?: string;
        timeoutMs: number;
        /** Fixed delay before the provider's single retry */
        retryBackoffMs: number;
    };

    fetch: {
        timeoutMs: number;
        retryBackoffMs: number;
        maxRedirects: number;
        maxContentBytes: number;
        /** Worker pool size for concurrent fetches */
        poolSize: number;
    };

    politeness: {
        /** Default minimum interval between requests to one host, in seconds */
        delaySeconds: number;
        robotsTimeoutMs: number;
    };

    extraction: {
        minWords: number;
        boilerplateSelectors: string[];
    };

    analysis: {
        keyphraseCount: number;
        maxEntitiesPerType: number;
        summaryLength: number;
    };

    credibility: {
        reputationFile: string;
        defaultReputation: number;
        reputationWeight: number;
        qualityWeight: number;
        spamPhrases: string[];
    };

    insights: {
        topTopics: number;
        topSources: number;
        topEntities: number;
        minConsensusDocuments: number;
    };
}

const DEFAULT_USER_AGENT = 'DeepSearch-Bot/0.1 (+https://example.org/deepsearch-bot)';

export const DEFAULT_BOILERPLATE_SELECTORS = [
    'script',
    'style',
    'noscript',
    'template',
    'iframe',
    'svg',
    'form',
    'nav',
    'header',
    'footer',
    'aside',
    '.navigation',
    '.nav',
    '.header',
    '.footer',
    '.sidebar',
    '.menu',
    '.cookie-banner',
    '.advertisement',
    '.skip-link',
    '[role="navigation"]',
    '[role="banner"]',
    '[role="contentinfo"]',
    '[aria-hidden="true"]',
];

export const DEFAULT_SPAM_PHRASES = [
    'click here',
    'buy now',
    'limited time',
    'act now',
    'must see',
    'fake',
    'scam',
];

/**
 * Build the configuration from the environment
 */
export function loadDeepSearchConfig(env: Env = getEnv()): DeepSearchConfig {
    return {
        userAgent: env.DEEPSEARCH_USER_AGENT || DEFAULT_USER_AGENT,
        search: {
            endpoint: env.DEEPSEARCH_SEARCH_ENDPOINT,
            region: env.DEEPSEARCH_SEARCH_REGION,
            timeoutMs: env.DEEPSEARCH_FETCH_TIMEOUT_MS,
            retryBackoffMs: env.DEEPSEARCH_RETRY_BACKOFF_MS,
        },
        fetch: {
            timeoutMs: env.DEEPSEARCH_FETCH_TIMEOUT_MS,
            retryBackoffMs: env.DEEPSEARCH_RETRY_BACKOFF_MS,
            maxRedirects: 5,
            maxContentBytes: env.DEEPSEARCH_MAX_CONTENT_BYTES,
            poolSize: Math.max(1, env.DEEPSEARCH_POOL_SIZE),
        },
        politeness: {
            delaySeconds: Math.max(0, env.DEEPSEARCH_DEFAULT_DELAY_S),
            robotsTimeoutMs: env.DEEPSEARCH_ROBOTS_TIMEOUT_MS,
        },
        extraction: {
            minWords: env.DEEPSEARCH_MIN_WORDS,
            boilerplateSelectors: DEFAULT_BOILERPLATE_SELECTORS,
        },
        analysis: {
            keyphraseCount: env.DEEPSEARCH_KEYPHRASES,
            maxEntitiesPerType: 10,
            summaryLength: 500,
        },
        credibility: {
            reputationFile: env.DOMAIN_REPUTATION_FILE,
            defaultReputation: 0.5,
            reputationWeight: 0.6,
            qualityWeight: 0.4,
            spamPhrases: DEFAULT_SPAM_PHRASES,
        },
        insights: {
            topTopics: env.DEEPSEARCH_TOP_TOPICS,
            topSources: 3,
            topEntities: 10,
            minConsensusDocuments: 2,
        },
    };
}

/**
 * Environment Variable Parsing
 *
 * Centralized, typed access to every environment variable the pipeline reads.
 * Values are parsed manually with defaults; invalid numbers fall back to the default.
 */

// Load dotenv early so the values are present before getEnv() is first called
import * as dotenv from 'dotenv';
import { fileURLToPath } from 'node:url';
dotenv.config();

// Same relative location from src/server/config and dist/server/config
const BUNDLED_REPUTATION_FILE = fileURLToPath(new URL('../../../config/domain-reputation.json', import.meta.url));

/**
 * Helper function to safely parse an integer from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseFloatEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseFloat(value);
  return isNaN(num) ? defaultValue : num;
}

function parseNodeEnv(value: string | undefined): Env['NODE_ENV'] {
  if (value === 'production' || value === 'test') return value;
  return 'development';
}

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: 'development' | 'production' | 'test';
  LOG_LEVEL?: string;

  // HTTP identity and limits
  DEEPSEARCH_USER_AGENT?: string;
  DEEPSEARCH_FETCH_TIMEOUT_MS: number;
  DEEPSEARCH_ROBOTS_TIMEOUT_MS: number;
  DEEPSEARCH_RETRY_BACKOFF_MS: number;
  DEEPSEARCH_MAX_CONTENT_BYTES: number;

  // Pipeline defaults
  DEEPSEARCH_POOL_SIZE: number;
  DEEPSEARCH_DEFAULT_DELAY_S: number;
  DEEPSEARCH_MIN_WORDS: number;
  DEEPSEARCH_KEYPHRASES: number;
  DEEPSEARCH_TOP_TOPICS: number;

  // Search provider
  DEEPSEARCH_SEARCH_ENDPOINT: string;
  DEEPSEARCH_SEARCH_REGION?: string;

  // Credibility
  DOMAIN_REPUTATION_FILE: string;
}

let cachedEnv: Env | null = null;

/**
 * Read and parse environment variables (uncached)
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return {
    NODE_ENV: parseNodeEnv(source.NODE_ENV),
    LOG_LEVEL: source.LOG_LEVEL,

    DEEPSEARCH_USER_AGENT: source.DEEPSEARCH_USER_AGENT,
    DEEPSEARCH_FETCH_TIMEOUT_MS: parseNumericEnv(source.DEEPSEARCH_FETCH_TIMEOUT_MS, 10000),
    DEEPSEARCH_ROBOTS_TIMEOUT_MS: parseNumericEnv(source.DEEPSEARCH_ROBOTS_TIMEOUT_MS, 5000),
    DEEPSEARCH_RETRY_BACKOFF_MS: parseNumericEnv(source.DEEPSEARCH_RETRY_BACKOFF_MS, 1000),
    DEEPSEARCH_MAX_CONTENT_BYTES: parseNumericEnv(source.DEEPSEARCH_MAX_CONTENT_BYTES, 5 * 1024 * 1024),

    DEEPSEARCH_POOL_SIZE: parseNumericEnv(source.DEEPSEARCH_POOL_SIZE, 4),
    DEEPSEARCH_DEFAULT_DELAY_S: parseFloatEnv(source.DEEPSEARCH_DEFAULT_DELAY_S, 1.0),
    DEEPSEARCH_MIN_WORDS: parseNumericEnv(source.DEEPSEARCH_MIN_WORDS, 20),
    DEEPSEARCH_KEYPHRASES: parseNumericEnv(source.DEEPSEARCH_KEYPHRASES, 6),
    DEEPSEARCH_TOP_TOPICS: parseNumericEnv(source.DEEPSEARCH_TOP_TOPICS, 10),

    DEEPSEARCH_SEARCH_ENDPOINT: source.DEEPSEARCH_SEARCH_ENDPOINT || 'https://html.duckduckgo.com/html/',
    DEEPSEARCH_SEARCH_REGION: source.DEEPSEARCH_SEARCH_REGION,

    DOMAIN_REPUTATION_FILE: source.DOMAIN_REPUTATION_FILE || BUNDLED_REPUTATION_FILE,
  };
}

/**
 * Get the parsed environment (cached after first call)
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    cachedEnv = parseEnv();
  }
  return cachedEnv;
}


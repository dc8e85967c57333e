/**
 * Centralized HTTP Client Configuration
 *
 * Provides shared HTTP/HTTPS agents with connection pooling and a factory
 * function for creating configured axios instances.
 */

import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import https from 'https';
import http from 'http';
import { logger } from '../utils/logger.js';

// HTTP timeout constants for different scenarios
export const HTTP_TIMEOUTS = {
  SHORT: 5000,      // robots.txt
  STANDARD: 10000,  // page fetches and search requests
} as const;

const httpAgent = new http.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 10,
  maxFreeSockets: 5,
});

const httpsAgent = new https.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 10,
  maxFreeSockets: 5,
});

/**
 * Create a configured axios instance with connection pooling and default settings.
 *
 * Status validation is left to callers (`validateStatus` accepts everything) so
 * that retry and failure classification live in one place per component.
 */
export function createHttpClient(config?: CreateAxiosDefaults): AxiosInstance {
  const client = axios.create({
    timeout: HTTP_TIMEOUTS.STANDARD,
    httpAgent,
    httpsAgent,
    validateStatus: () => true,
    ...config,
  });

  client.interceptors.request.use((requestConfig) => {
    if (!requestConfig.timeout) {
      requestConfig.timeout = HTTP_TIMEOUTS.STANDARD;
    }
    logger.trace({ url: requestConfig.url, method: requestConfig.method }, 'HTTP request');
    return requestConfig;
  });

  return client;
}

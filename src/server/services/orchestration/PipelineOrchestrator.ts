/**
 * Pipeline Orchestrator - Runs one deep search end to end
 *
 * queried → searching → fetching → analyzing → aggregating → done
 *
 * Hits up to `maxFetch` are dispatched to a bounded worker pool. Each worker fetches
 * its hit (the politeness gate spaces requests per host), then extracts and
 * analyzes the document right away. Results are collected by hit index, so the
 * Result keeps search rank order whatever order the workers finish in.
 *
 * Only ProviderUnavailableError and InvalidSearchOptionsError leave `run`; every
 * per-document failure is recorded on its ResultEntry.
 */

import { randomUUID } from 'crypto';
import type { AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { SearchProvider } from '../search/SearchProvider.js';
import type { ContentExtractor } from '../../extraction/html/HtmlExtractor.js';
import type { SignalAnalyzer } from '../analysis/SignalAnalyzer.js';
import type { InsightAggregator } from '../insights/InsightAggregator.js';
import type { DeepSearchConfig } from '../../config/deepSearchConfig.js';
import type {
  AnalyzedDocument,
  FetchOutcome,
  NormalizedDocument,
  PipelineState,
  Result,
  ResultEntry,
  SearchHit,
} from '../../types/deep-search.js';
import { PipelineStateMachine } from './PipelineStateMachine.js';
import { PolitenessGate, systemClock, type Clock, type CrawlPolicy } from '../scraping/PolitenessGate.js';
import { ContentFetcher } from '../scraping/ContentFetcher.js';
import { RobotsTxtParser } from '../scraping/robotsTxtParser.js';
import { domainOf } from '../analysis/SignalAnalyzer.js';
import { pLimit } from '../../utils/concurrency.js';
import { createChildLogger, runContext } from '../../utils/logger.js';
import {
  InvalidSearchOptionsError,
  ProviderEmptyError,
  ProviderUnavailableError,
  errorMessage,
  isAppError,
} from '../../types/errors.js';

/**
 * Optional progress callbacks. Exceptions thrown here are logged and ignored.
 */
export interface PipelineObserver {
  onStateChange?(state: PipelineState, previous: PipelineState): void;
  onDocument?(entry: ResultEntry): void;
}

export function createSearchOptionsSchema(config: DeepSearchConfig) {
  return z
    .object({
      maxResults: z.number().int().min(1, 'maxResults must be >= 1').default(15),
      maxFetch: z.number().int().min(1, 'maxFetch must be >= 1').default(5),
      delay: z.number().finite().min(0, 'delay must be >= 0').default(config.politeness.delaySeconds),
      poolSize: z.number().int().min(1, 'poolSize must be >= 1').default(config.fetch.poolSize),
    })
    .strict()
    .transform((options) => ({ ...options, maxFetch: Math.min(options.maxFetch, options.maxResults) }));
}

export type SearchOptionsInput = z.input<ReturnType<typeof createSearchOptionsSchema>>;
export type SearchOptions = z.output<ReturnType<typeof createSearchOptionsSchema>>;

export interface DeepSearchOptions extends SearchOptionsInput {
  observer?: PipelineObserver;
  signal?: AbortSignal;
}

export interface PipelineDependencies {
  config: DeepSearchConfig;
  searchProvider: SearchProvider;
  extractor: ContentExtractor;
  analyzer: SignalAnalyzer;
  aggregator: InsightAggregator;
  /** Client used for page and robots.txt requests */
  httpClient?: AxiosInstance;
  clock?: Clock;
  /** Builds the crawl policy for one run; defaults to a fresh robots.txt parser */
  createCrawlPolicy?: () => CrawlPolicy;
}

function withoutBody(outcome: FetchOutcome): Omit<FetchOutcome, 'rawBytes'> {
  return {
    hit: outcome.hit,
    status: outcome.status,
    finalUrl: outcome.finalUrl,
    httpStatus: outcome.httpStatus,
    contentType: outcome.contentType,
    fetchDurationMs: outcome.fetchDurationMs,
    fetchedAt: outcome.fetchedAt,
    error: outcome.error,
  };
}

export class PipelineOrchestrator {
  private readonly deps: PipelineDependencies;
  private readonly clock: Clock;
  private readonly optionsSchema: ReturnType<typeof createSearchOptionsSchema>;
  private readonly log: Logger;

  constructor(deps: PipelineDependencies) {
    this.deps = deps;
    this.clock = deps.clock ?? systemClock;
    this.optionsSchema = createSearchOptionsSchema(deps.config);
    this.log = createChildLogger({ component: 'PipelineOrchestrator' });
  }

  /**
   * Validate entrypoint arguments
   *
   * @throws InvalidSearchOptionsError
   */
  parseOptions(query: unknown, options: SearchOptionsInput = {}): { query: string; options: SearchOptions } {
    if (typeof query !== 'string' || query.trim().length === 0) {
      throw new InvalidSearchOptionsError('query must be a non-empty string');
    }
    const parsed = this.optionsSchema.safeParse(options);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`);
      throw new InvalidSearchOptionsError(`Invalid search options: ${issues.join('; ')}`, { issues });
    }
    return { query: query.trim(), options: parsed.data };
  }

  async run(query: string, options: DeepSearchOptions = {}): Promise<Result> {
    const { observer, signal, ...searchOptions } = options;
    const validated = this.parseOptions(query, searchOptions);
    const runId = randomUUID();

    return runContext.run({ runId, query: validated.query }, () =>
      this.execute(validated.query, validated.options, observer, signal)
    );
  }

  private async execute(
    query: string,
    options: SearchOptions,
    observer: PipelineObserver | undefined,
    signal: AbortSignal | undefined
  ): Promise<Result> {
    const started = this.clock.now();
    const timestamp = new Date(started);
    const machine = new PipelineStateMachine((from, to) => {
      this.log.debug({ from, to }, 'Pipeline state change');
      this.notify(observer, 'onStateChange', () => observer?.onStateChange?.(to, from));
    });

    this.log.info({ ...options }, 'Deep search started');

    machine.transition('searching');
    const hits = await this.search(query, options.maxResults, signal).catch((error: unknown): never => {
      machine.transition('failed');
      throw error;
    });

    machine.transition('fetching');
    const candidates = hits.slice(0, options.maxFetch);
    const { entries, fetched } = await this.fetchAndAnalyze(candidates, options, observer, signal);

    machine.transition('analyzing');
    const results = entries.filter((entry): entry is ResultEntry => entry !== null);
    const analyzed = results
      .map((entry) => entry.analysis)
      .filter((analysis): analysis is AnalyzedDocument => analysis !== null);

    machine.transition('aggregating');
    const insights = this.deps.aggregator.aggregate(analyzed);

    machine.transition('done');
    const stats = {
      hitsReturned: hits.length,
      fetchAttempted: results.length,
      fetched,
      analyzed: analyzed.length,
      skipped: results.filter((entry) => entry.outcome.status.kind === 'skipped').length,
      failed: results.filter((entry) => entry.outcome.status.kind === 'failed').length,
      durationMs: this.clock.now() - started,
    };
    const cancelled = signal?.aborted ?? false;

    this.log.info({ ...stats, cancelled }, 'Deep search completed');

    return { query, timestamp, state: machine.state, cancelled, results, hits, insights, stats };
  }

  private async search(query: string, maxResults: number, signal: AbortSignal | undefined): Promise<SearchHit[]> {
    const provider = this.deps.searchProvider;
    if (signal?.aborted) {
      this.log.info('Cancelled before search');
      return [];
    }
    try {
      return await provider.search(query, maxResults);
    } catch (error) {
      if (error instanceof ProviderEmptyError) {
        this.log.info({ provider: provider.name }, 'Search returned no hits');
        return [];
      }
      if (error instanceof ProviderUnavailableError) {
        throw error;
      }
      throw new ProviderUnavailableError(provider.name, errorMessage(error), {
        code: isAppError(error) ? error.code : undefined,
      });
    }
  }

  private async fetchAndAnalyze(
    candidates: readonly SearchHit[],
    options: SearchOptions,
    observer: PipelineObserver | undefined,
    signal: AbortSignal | undefined
  ): Promise<{ entries: (ResultEntry | null)[]; fetched: number }> {
    const { config, httpClient } = this.deps;
    const policy =
      this.deps.createCrawlPolicy?.() ??
      new RobotsTxtParser({ userAgent: config.userAgent, httpClient, timeoutMs: config.politeness.robotsTimeoutMs });
    const gate = new PolitenessGate({ policy, delaySeconds: options.delay, clock: this.clock });
    const fetcher = new ContentFetcher({
      gate,
      userAgent: config.userAgent,
      timeoutMs: config.fetch.timeoutMs,
      retryBackoffMs: config.fetch.retryBackoffMs,
      maxRedirects: config.fetch.maxRedirects,
      maxContentBytes: config.fetch.maxContentBytes,
      httpClient,
      clock: this.clock,
    });

    const limit = pLimit(options.poolSize);
    let fetched = 0;

    const entries = await Promise.all(
      candidates.map((hit) =>
        limit(async (): Promise<ResultEntry | null> => {
          if (signal?.aborted) {
            return null;
          }
          const outcome = await fetcher.fetch(hit);
          if (outcome.status.kind === 'fetched') fetched++;
          const entry = this.analyzeOutcome(outcome);
          this.notify(observer, 'onDocument', () => observer?.onDocument?.(entry));
          return entry;
        })
      )
    );

    if (signal?.aborted) {
      this.log.info(
        { dispatched: entries.filter((entry) => entry !== null).length, candidates: candidates.length },
        'Run cancelled; undispatched hits skipped'
      );
    }
    return { entries, fetched };
  }

  private analyzeOutcome(outcome: FetchOutcome): ResultEntry {
    const { hit } = outcome;
    if (outcome.status.kind !== 'fetched' || !outcome.rawBytes) {
      return { hit, outcome: withoutBody(outcome), analysis: null };
    }

    let document: NormalizedDocument;
    try {
      document = this.deps.extractor.extract(outcome.rawBytes, hit, outcome.contentType);
    } catch (error) {
      this.log.info({ url: hit.url, rank: hit.rank, error: errorMessage(error) }, 'Content unparseable');
      return {
        hit,
        outcome: { ...withoutBody(outcome), status: { kind: 'failed', reason: 'unparseable' }, error: errorMessage(error) },
        analysis: null,
      };
    }

    const analysis = this.deps.analyzer.analyze(document, domainOf(hit.url));
    return { hit, outcome: withoutBody(outcome), analysis };
  }

  private notify(observer: PipelineObserver | undefined, event: keyof PipelineObserver, callback: () => void): void {
    if (!observer) return;
    try {
      callback();
    } catch (error) {
      this.log.warn({ event, error: errorMessage(error) }, 'Pipeline observer failed');
    }
  }
}

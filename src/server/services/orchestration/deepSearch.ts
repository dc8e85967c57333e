/**
 * DeepSearch entrypoints
 *
 * `createDeepSearch` wires the default collaborators from a configuration;
 * `deepSearch` runs one query with the environment's configuration.
 */

import type { AxiosInstance } from 'axios';
import type { Result } from '../../types/deep-search.js';
import { loadDeepSearchConfig, type DeepSearchConfig } from '../../config/deepSearchConfig.js';
import { createHttpClient } from '../../config/httpClient.js';
import { DuckDuckGoSearchProvider } from '../search/DuckDuckGoSearchProvider.js';
import type { SearchProvider } from '../search/SearchProvider.js';
import { HtmlExtractor } from '../../extraction/html/HtmlExtractor.js';
import { SignalAnalyzer } from '../analysis/SignalAnalyzer.js';
import { CredibilityScorer } from '../scoring/CredibilityScorer.js';
import { FileReputationTable } from '../scoring/ReputationTable.js';
import type { IReputationTable } from '../scoring/interfaces/IReputationTable.js';
import { InsightAggregator } from '../insights/InsightAggregator.js';
import type { Clock, CrawlPolicy } from '../scraping/PolitenessGate.js';
import { PipelineOrchestrator, type DeepSearchOptions } from './PipelineOrchestrator.js';

export interface DeepSearchOverrides {
  searchProvider?: SearchProvider;
  reputationTable?: IReputationTable;
  httpClient?: AxiosInstance;
  clock?: Clock;
  createCrawlPolicy?: () => CrawlPolicy;
}

export function createDeepSearch(
  config: DeepSearchConfig = loadDeepSearchConfig(),
  overrides: DeepSearchOverrides = {}
): PipelineOrchestrator {
  const httpClient = overrides.httpClient ?? createHttpClient({ timeout: config.fetch.timeoutMs });
  const searchProvider =
    overrides.searchProvider ??
    new DuckDuckGoSearchProvider({
      endpoint: config.search.endpoint,
      userAgent: config.userAgent,
      timeoutMs: config.search.timeoutMs,
      retryBackoffMs: config.search.retryBackoffMs,
      region: config.search.region,
      httpClient,
      sleep: overrides.clock?.sleep,
    });

  const reputationTable = overrides.reputationTable ?? new FileReputationTable(config.credibility.reputationFile);
  const credibility = new CredibilityScorer(reputationTable, {
    defaultReputation: config.credibility.defaultReputation,
    reputationWeight: config.credibility.reputationWeight,
    qualityWeight: config.credibility.qualityWeight,
    spamPhrases: config.credibility.spamPhrases,
  });

  return new PipelineOrchestrator({
    config,
    searchProvider,
    extractor: new HtmlExtractor({
      minWords: config.extraction.minWords,
      boilerplateSelectors: config.extraction.boilerplateSelectors,
    }),
    analyzer: new SignalAnalyzer({
      credibility,
      keyphraseCount: config.analysis.keyphraseCount,
      maxEntitiesPerType: config.analysis.maxEntitiesPerType,
      summaryLength: config.analysis.summaryLength,
    }),
    aggregator: new InsightAggregator({
      topTopics: config.insights.topTopics,
      topSources: config.insights.topSources,
      topEntities: config.insights.topEntities,
      minConsensusDocuments: config.insights.minConsensusDocuments,
    }),
    httpClient,
    clock: overrides.clock,
    createCrawlPolicy: overrides.createCrawlPolicy,
  });
}

/**
 * Run one deep search with the default collaborators.
 *
 * @throws InvalidSearchOptionsError for bad arguments
 * @throws ProviderUnavailableError when the search backend cannot be reached
 */
export async function deepSearch(query: string, options: DeepSearchOptions = {}): Promise<Result> {
  return createDeepSearch().run(query, options);
}

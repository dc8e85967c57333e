/**
 * DeepSearch - public exports
 */

// Entrypoints
export { deepSearch, createDeepSearch } from './services/orchestration/deepSearch.js';
export type { DeepSearchOverrides } from './services/orchestration/deepSearch.js';
export { PipelineOrchestrator, createSearchOptionsSchema } from './services/orchestration/PipelineOrchestrator.js';
export type {
  DeepSearchOptions,
  PipelineDependencies,
  PipelineObserver,
  SearchOptions,
  SearchOptionsInput,
} from './services/orchestration/PipelineOrchestrator.js';
export { PipelineStateMachine, isTerminalState } from './services/orchestration/PipelineStateMachine.js';

// Configuration
export { loadDeepSearchConfig } from './config/deepSearchConfig.js';
export type { DeepSearchConfig } from './config/deepSearchConfig.js';

// Search
export type { SearchProvider } from './services/search/SearchProvider.js';
export { DuckDuckGoSearchProvider, parseDuckDuckGoResults } from './services/search/DuckDuckGoSearchProvider.js';

// Fetching
export { PolitenessGate, systemClock } from './services/scraping/PolitenessGate.js';
export type { Clock, CrawlPolicy } from './services/scraping/PolitenessGate.js';
export { RobotsTxtParser, parseRobotsTxt } from './services/scraping/robotsTxtParser.js';
export { ContentFetcher } from './services/scraping/ContentFetcher.js';

// Extraction and analysis
export { HtmlExtractor } from './extraction/html/HtmlExtractor.js';
export type { ContentExtractor } from './extraction/html/HtmlExtractor.js';
export { SignalAnalyzer } from './services/analysis/SignalAnalyzer.js';
export { SentimentAnalyzer } from './services/analysis/SentimentAnalyzer.js';
export { EntityRecognizer } from './services/analysis/EntityRecognizer.js';
export { KeyphraseExtractor } from './services/analysis/KeyphraseExtractor.js';
export { ReadabilityAnalyzer } from './services/analysis/ReadabilityAnalyzer.js';
export { StopwordLanguageDetector } from './services/analysis/LanguageDetector.js';
export type { LanguageDetector } from './services/analysis/LanguageDetector.js';

// Scoring and insights
export * from './services/scoring/index.js';
export { InsightAggregator } from './services/insights/InsightAggregator.js';

// Output
export { toResultJson } from './services/export/ResultSerializer.js';
export type { ResultJson, ResultEntryJson, InsightsJson } from './services/export/ResultSerializer.js';
export { formatTextReport } from './services/export/TextReport.js';

// Types and errors
export * from './types/deep-search.js';
export * from './types/errors.js';

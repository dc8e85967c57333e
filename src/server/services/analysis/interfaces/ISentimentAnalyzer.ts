import type { SentimentSignal } from '../../../types/deep-search.js';

/**
 * Sentiment capability
 */
export interface ISentimentAnalyzer {
  analyze(text: string): SentimentSignal;
}

import type { ReadabilitySignal } from '../../../types/deep-search.js';

export interface IReadabilityAnalyzer {
  analyze(text: string): ReadabilitySignal;
}

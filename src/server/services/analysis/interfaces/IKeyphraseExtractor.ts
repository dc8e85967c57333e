import type { Keyphrase } from '../../../types/deep-search.js';

export interface IKeyphraseExtractor {
  /**
   * Top `topN` phrases, descending by frequency
   */
  extract(text: string, topN: number): Keyphrase[];
}

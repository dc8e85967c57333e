import stopwords from './data/stopwords-en.json' with { type: 'json' };
import type { IKeyphraseExtractor } from './interfaces/IKeyphraseExtractor.js';
import type { Keyphrase } from '../../types/deep-search.js';
import { tokenizeWords } from './textUtils.js';

const MIN_LENGTH = 4;

/**
 * Frequency keyphrases: lowercase alphabetic tokens of at least four letters,
 * stop words excluded. Ties keep first-occurrence order.
 */
export class KeyphraseExtractor implements IKeyphraseExtractor {
  private readonly stopwords: ReadonlySet<string>;

  constructor(stopwordList: readonly string[] = stopwords) {
    this.stopwords = new Set(stopwordList);
  }

  extract(text: string, topN: number): Keyphrase[] {
    if (topN <= 0) return [];

    // Map iteration order is first-occurrence order
    const counts = new Map<string, number>();
    for (const token of tokenizeWords(text)) {
      if (token.length < MIN_LENGTH || !/^\p{L}+$/u.test(token) || this.stopwords.has(token)) {
        continue;
      }
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }

    return [...counts.entries()]
      .map(([phrase, frequency]) => ({ phrase, frequency }))
      .sort((a, b) => b.frequency - a.frequency)
      .slice(0, topN);
  }
}

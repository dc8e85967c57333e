import type { IReadabilityAnalyzer } from './interfaces/IReadabilityAnalyzer.js';
import type { ReadabilitySignal } from '../../types/deep-search.js';
import { clamp, countSyllables, splitSentences, tokenizeWords } from './textUtils.js';

export const EMPTY_READABILITY: ReadabilitySignal = { averageSentenceLength: 0, readabilityScore: 0 };

/**
 * Flesch reading ease, clamped to [0, 100]:
 * 206.835 − 1.015 × (words / sentences) − 84.6 × (syllables / words)
 */
export class ReadabilityAnalyzer implements IReadabilityAnalyzer {
  analyze(text: string): ReadabilitySignal {
    const sentences = splitSentences(text);
    const words = tokenizeWords(text);
    if (sentences.length === 0 || words.length === 0) {
      return EMPTY_READABILITY;
    }

    const syllables = words.reduce((sum, word) => sum + countSyllables(word), 0);
    const averageSentenceLength = words.length / sentences.length;
    const syllablesPerWord = syllables / words.length;
    const ease = 206.835 - 1.015 * averageSentenceLength - 84.6 * syllablesPerWord;

    return { averageSentenceLength, readabilityScore: clamp(ease, 0, 100) };
  }
}

import profiles from './data/language-profiles.json' with { type: 'json' };
import { tokenizeWords } from './textUtils.js';

export interface LanguageDetector {
  /** ISO 639-1 code, or `unknown` */
  detect(text: string): string;
}

/**
 * Stop-word profile language detector.
 *
 * Counts occurrences of each language's most frequent function words and picks the
 * language with the most hits. Needs at least `minHits` hits to commit.
 */
export class StopwordLanguageDetector implements LanguageDetector {
  private readonly profiles: ReadonlyArray<{ language: string; words: ReadonlySet<string> }>;

  constructor(
    private readonly minHits: number = 3,
    languageProfiles: Record<string, readonly string[]> = profiles
  ) {
    this.profiles = Object.entries(languageProfiles).map(([language, words]) => ({
      language,
      words: new Set(words),
    }));
  }

  detect(text: string): string {
    if (!text || text.trim().length === 0) {
      return 'unknown';
    }

    const tokens = tokenizeWords(text);
    let best = { language: 'unknown', hits: 0 };

    for (const profile of this.profiles) {
      let hits = 0;
      for (const token of tokens) {
        if (profile.words.has(token)) hits++;
      }
      if (hits > best.hits) {
        best = { language: profile.language, hits };
      }
    }

    return best.hits >= this.minHits ? best.language : 'unknown';
  }
}

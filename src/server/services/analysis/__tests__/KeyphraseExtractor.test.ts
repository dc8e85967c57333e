import { describe, it, expect } from 'vitest';
import { KeyphraseExtractor } from '../KeyphraseExtractor.js';

describe('KeyphraseExtractor', () => {
  const extractor = new KeyphraseExtractor();
  const text = 'Ethics matters. Ethics guides research. Research needs funding and ethics.';

  it('ranks content words by frequency, then first occurrence', () => {
    expect(extractor.extract(text, 10)).toEqual([
      { phrase: 'ethics', frequency: 3 },
      { phrase: 'research', frequency: 2 },
      { phrase: 'matters', frequency: 1 },
      { phrase: 'guides', frequency: 1 },
      { phrase: 'funding', frequency: 1 },
    ]);
  });

  it('returns at most topN phrases', () => {
    expect(extractor.extract(text, 2).map((kp) => kp.phrase)).toEqual(['ethics', 'research']);
    expect(extractor.extract(text, 0)).toEqual([]);
  });

  it('skips short words, stop words and non-alphabetic tokens', () => {
    expect(extractor.extract('The cat and the dog would rather wait 2024 times', 10)).toEqual([
      { phrase: 'wait', frequency: 1 },
      { phrase: 'times', frequency: 1 },
    ]);
  });
});

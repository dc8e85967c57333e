import { describe, it, expect } from 'vitest';
import { SignalAnalyzer, computeTextStats, domainOf, summarize } from '../SignalAnalyzer.js';
import type { ICredibilityScorer } from '../../scoring/interfaces/ICredibilityScorer.js';
import type { NormalizedDocument } from '../../../types/deep-search.js';
import { CredibilityScorer } from '../../scoring/CredibilityScorer.js';
import { StaticReputationTable } from '../../scoring/ReputationTable.js';
import { HtmlExtractor } from '../../../extraction/html/HtmlExtractor.js';
import { articlePage, makeHit } from '../../../__tests__/helpers/fixtures.js';

const TEXT =
  'Research ethics guide every study. Good research protects participants and publishes honest results. ' +
  'Contact ethics@example.org for the review board guidance.';

function document(text: string = TEXT): NormalizedDocument {
  return {
    hit: makeHit(0, 'https://news.example.org/story'),
    text,
    wordCount: text.split(/\s+/).length,
    detectedLanguage: 'en',
    metadata: { headings: [] },
  };
}

const fixedScorer: ICredibilityScorer = {
  score: () => 0.8,
  reputationOf: () => 0.7,
};

function failing(): never {
  throw new Error('capability failed');
}

describe('SignalAnalyzer', () => {
  it('computes every signal', () => {
    const analyzer = new SignalAnalyzer({ credibility: fixedScorer, keyphraseCount: 2 });

    const analyzed = analyzer.analyze(document());

    expect(analyzed.credibility).toBe(0.8);
    expect(analyzed.keyphrases).toEqual([
      { phrase: 'research', frequency: 2 },
      { phrase: 'ethics', frequency: 2 },
    ]);
    expect(analyzed.entities.EMAIL).toEqual(['ethics@example.org']);
    expect(analyzed.sentiment.label).toBe('Positive');
    expect(analyzed.readability.averageSentenceLength).toBeGreaterThan(0);
    expect(analyzed.summary).toBe(TEXT);
    expect(analyzed.degradedSignals).toEqual([]);
  });

  it('passes the host and the recognized entities to the credibility scorer', () => {
    const seen: { domain: string; emails?: readonly string[] }[] = [];
    const analyzer = new SignalAnalyzer({
      credibility: {
        score: (_doc, domain, entities) => {
          seen.push({ domain, emails: entities?.EMAIL });
          return 0.5;
        },
        reputationOf: () => 0.5,
      },
    });

    analyzer.analyze(document());

    expect(seen).toEqual([{ domain: 'news.example.org', emails: ['ethics@example.org'] }]);
  });

  it('replaces failing capabilities with their fallbacks', () => {
    const analyzer = new SignalAnalyzer({
      credibility: { score: failing, reputationOf: () => 0.7 },
      sentiment: { analyze: failing },
      entities: { recognize: failing },
      keyphrases: { extract: failing },
      readability: { analyze: failing },
    });

    const analyzed = analyzer.analyze(document());

    expect(analyzed.credibility).toBe(0.7);
    expect(analyzed.sentiment).toEqual({ polarity: 0, subjectivity: 0, label: 'Neutral' });
    expect(analyzed.entities).toEqual({});
    expect(analyzed.keyphrases).toEqual([]);
    expect(analyzed.readability).toEqual({ averageSentenceLength: 0, readabilityScore: 0 });
    expect(analyzed.degradedSignals).toEqual(['entities', 'credibility', 'sentiment', 'keyphrases', 'readability']);
  });

  it('falls back to 0.5 credibility when the reputation lookup fails too', () => {
    const analyzer = new SignalAnalyzer({ credibility: { score: failing, reputationOf: failing } });
    expect(analyzer.analyze(document()).credibility).toBe(0.5);
  });
});

describe('extraction and analysis', () => {
  const page = Buffer.from(
    articlePage('Research ethics at the Example University', [
      'Barack Obama met Microsoft leaders in Paris to discuss research ethics and the new iPhone from Apple.',
      'The review board publishes honest results every year. Contact ethics@example.org or call +31 20 123 4567 😀.',
      'Good research protects participants, and careful research keeps the public informed about research ethics.',
    ])
  );
  const hit = makeHit(0, 'https://news.example.org/story');

  function run(): string {
    const extractor = new HtmlExtractor();
    const analyzer = new SignalAnalyzer({
      credibility: new CredibilityScorer(new StaticReputationTable({ 'example.org': 0.7 })),
      summaryLength: 40,
    });
    return JSON.stringify(analyzer.analyze(extractor.extract(page, hit, 'text/html; charset=utf-8')));
  }

  it('yields identical output for identical bytes', () => {
    expect(run()).toBe(run());
  });
});

describe('summarize', () => {
  it('keeps short text and cuts long text with an ellipsis', () => {
    expect(summarize('  short text  ', 500)).toBe('short text');
    expect(summarize('abcdefghij', 4)).toBe('abcd...');
  });

  it('cuts between code points, not inside a surrogate pair', () => {
    expect(summarize('abc😀def', 4)).toBe('abc😀...');
    expect(summarize('ab😀', 3)).toBe('ab😀');
    expect(summarize('𝒜𝒞𝒟', 1)).toBe('𝒜...');
  });
});

describe('computeTextStats', () => {
  it('counts characters, sentences and average word length', () => {
    expect(computeTextStats('Big cats run. Dogs bark!')).toEqual({
      charCount: 24,
      sentenceCount: 2,
      averageWordLength: 3.6,
    });
  });
});

describe('domainOf', () => {
  it('returns the lowercased host, or empty for invalid URLs', () => {
    expect(domainOf('https://News.Example.org:8080/x')).toBe('news.example.org');
    expect(domainOf('not a url')).toBe('');
  });
});

/**
 * Signal Analyzer
 *
 * Derives every per-document signal from a NormalizedDocument. Each signal is a
 * capability behind its own interface; a capability that throws is replaced by
 * its fallback value and recorded in `degradedSignals`, so analysis never fails
 * as a whole.
 *
 * Entities are computed before credibility, which uses them for entity density.
 */

import type { Logger } from 'pino';
import type { ISentimentAnalyzer } from './interfaces/ISentimentAnalyzer.js';
import type { IEntityRecognizer } from './interfaces/IEntityRecognizer.js';
import type { IKeyphraseExtractor } from './interfaces/IKeyphraseExtractor.js';
import type { IReadabilityAnalyzer } from './interfaces/IReadabilityAnalyzer.js';
import type { ICredibilityScorer } from '../scoring/interfaces/ICredibilityScorer.js';
import type {
  AnalyzedDocument,
  EntityMap,
  Keyphrase,
  NormalizedDocument,
  SignalName,
  TextStats,
} from '../../types/deep-search.js';
import { SentimentAnalyzer, NEUTRAL_SENTIMENT } from './SentimentAnalyzer.js';
import { EntityRecognizer } from './EntityRecognizer.js';
import { KeyphraseExtractor } from './KeyphraseExtractor.js';
import { ReadabilityAnalyzer, EMPTY_READABILITY } from './ReadabilityAnalyzer.js';
import { splitSentences, tokenizeWords } from './textUtils.js';
import { createChildLogger } from '../../utils/logger.js';
import { SignalAnalysisError, errorMessage } from '../../types/errors.js';

export interface SignalAnalyzerOptions {
  credibility: ICredibilityScorer;
  sentiment?: ISentimentAnalyzer;
  entities?: IEntityRecognizer;
  keyphrases?: IKeyphraseExtractor;
  readability?: IReadabilityAnalyzer;
  keyphraseCount?: number;
  maxEntitiesPerType?: number;
  summaryLength?: number;
}

const FALLBACK_CREDIBILITY = 0.5;

export function computeTextStats(text: string): TextStats {
  const words = tokenizeWords(text);
  const letters = words.reduce((sum, word) => sum + word.length, 0);
  return {
    charCount: text.length,
    sentenceCount: splitSentences(text).length,
    averageWordLength: words.length > 0 ? letters / words.length : 0,
  };
}

/**
 * First `length` code points of the text; a cut never splits a surrogate pair
 */
export function summarize(text: string, length: number): string {
  const trimmed = text.trim();
  const codePoints = Array.from(trimmed);
  return codePoints.length > length ? `${codePoints.slice(0, length).join('').trim()}...` : trimmed;
}

/**
 * Host of a URL, or the empty string when it does not parse
 */
export function domainOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return '';
  }
}

export class SignalAnalyzer {
  private readonly credibility: ICredibilityScorer;
  private readonly sentiment: ISentimentAnalyzer;
  private readonly entities: IEntityRecognizer;
  private readonly keyphrases: IKeyphraseExtractor;
  private readonly readability: IReadabilityAnalyzer;
  private readonly keyphraseCount: number;
  private readonly summaryLength: number;
  private readonly log: Logger;

  constructor(options: SignalAnalyzerOptions) {
    this.credibility = options.credibility;
    this.sentiment = options.sentiment ?? new SentimentAnalyzer();
    this.entities = options.entities ?? new EntityRecognizer(options.maxEntitiesPerType ?? 10);
    this.keyphrases = options.keyphrases ?? new KeyphraseExtractor();
    this.readability = options.readability ?? new ReadabilityAnalyzer();
    this.keyphraseCount = options.keyphraseCount ?? 6;
    this.summaryLength = options.summaryLength ?? 500;
    this.log = createChildLogger({ component: 'SignalAnalyzer' });
  }

  /**
   * @param domain - Host used for the reputation lookup; defaults to the hit's host
   */
  analyze(document: NormalizedDocument, domain: string = domainOf(document.hit.url)): AnalyzedDocument {
    const degradedSignals: SignalName[] = [];
    const run = <T>(signal: SignalName, compute: () => T, fallback: () => T): T => {
      try {
        return compute();
      } catch (cause) {
        const error = new SignalAnalysisError(signal, cause);
        this.log.warn({ url: document.hit.url, signal, error: error.message }, 'Signal degraded to fallback');
        degradedSignals.push(signal);
        return fallback();
      }
    };

    const text = document.text;
    const entities = run<EntityMap>('entities', () => this.entities.recognize(text), () => ({}));
    const credibility = run(
      'credibility',
      () => this.credibility.score(document, domain, entities),
      () => this.fallbackCredibility(domain)
    );
    const sentiment = run('sentiment', () => this.sentiment.analyze(text), () => NEUTRAL_SENTIMENT);
    const keyphrases = run<Keyphrase[]>('keyphrases', () => this.keyphrases.extract(text, this.keyphraseCount), () => []);
    const readability = run('readability', () => this.readability.analyze(text), () => EMPTY_READABILITY);

    return {
      document,
      credibility,
      sentiment,
      entities,
      keyphrases,
      readability,
      stats: computeTextStats(text),
      summary: summarize(text, this.summaryLength),
      degradedSignals,
    };
  }

  private fallbackCredibility(domain: string): number {
    try {
      return this.credibility.reputationOf(domain);
    } catch (error) {
      this.log.debug({ domain, error: errorMessage(error) }, 'Reputation lookup failed');
      return FALLBACK_CREDIBILITY;
    }
  }
}

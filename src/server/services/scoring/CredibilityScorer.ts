/**
 * Credibility Scorer
 *
 * credibility = clamp(w_rep × reputation + w_quality × quality − spamPenalty, 0, 1)
 *
 * - reputation: exact host, then each parent domain, then the bare suffix, else the default (0.5)
 * - quality: 0.7 × (1 − e^(−words/400)) + 0.3 × min(1, entityDensity / 2),
 *   entity density being entities per 100 words
 * - spamPenalty: 0.05 per spam phrase present (at most 0.3), plus 2 × the share of the
 *   most frequent content token above 8% (keyword stuffing); at most 0.5 in total
 */

import type { ICredibilityScorer, ScorableDocument } from './interfaces/ICredibilityScorer.js';
import type { IReputationTable } from './interfaces/IReputationTable.js';
import type { EntityMap } from '../../types/deep-search.js';
import { clamp, tokenizeWords } from '../analysis/textUtils.js';
import { DEFAULT_SPAM_PHRASES } from '../../config/deepSearchConfig.js';

export interface CredibilityScorerConfig {
  defaultReputation: number;
  reputationWeight: number;
  qualityWeight: number;
  spamPhrases: readonly string[];
}

export const DEFAULT_CREDIBILITY_CONFIG: CredibilityScorerConfig = {
  defaultReputation: 0.5,
  reputationWeight: 0.6,
  qualityWeight: 0.4,
  spamPhrases: DEFAULT_SPAM_PHRASES,
};

const LENGTH_SATURATION_WORDS = 400;
const ENTITY_DENSITY_SATURATION = 2;
const SPAM_PHRASE_PENALTY = 0.05;
const MAX_PHRASE_PENALTY = 0.3;
const STUFFING_THRESHOLD = 0.08;
const STUFFING_FACTOR = 2;
const MAX_SPAM_PENALTY = 0.5;
const CONTENT_TOKEN_MIN_LENGTH = 4;

/**
 * Candidate reputation keys for a host, most specific first:
 * `news.example.co.uk` → `news.example.co.uk`, `example.co.uk`, `co.uk`, `uk`
 */
export function reputationKeys(domain: string): string[] {
  const host = domain.trim().toLowerCase().replace(/\.$/, '').replace(/^www\./, '');
  if (!host) return [];
  const labels = host.split('.');
  return labels.map((_, index) => labels.slice(index).join('.'));
}

export function contentQuality(wordCount: number, entityCount: number): number {
  if (wordCount <= 0) return 0;
  const lengthScore = 1 - Math.exp(-wordCount / LENGTH_SATURATION_WORDS);
  const entityDensity = (entityCount / wordCount) * 100;
  return 0.7 * lengthScore + 0.3 * Math.min(1, entityDensity / ENTITY_DENSITY_SATURATION);
}

/**
 * Share of the most frequent token of four or more letters among all word tokens
 */
export function topTokenShare(text: string): number {
  const tokens = tokenizeWords(text);
  if (tokens.length === 0) return 0;
  const counts = new Map<string, number>();
  let top = 0;
  for (const token of tokens) {
    if (token.length < CONTENT_TOKEN_MIN_LENGTH) continue;
    const count = (counts.get(token) ?? 0) + 1;
    counts.set(token, count);
    top = Math.max(top, count);
  }
  return top / tokens.length;
}

export function spamPenalty(text: string, spamPhrases: readonly string[]): number {
  const lower = text.toLowerCase();
  const phraseHits = spamPhrases.filter((phrase) => lower.includes(phrase.toLowerCase())).length;
  const phrasePenalty = Math.min(MAX_PHRASE_PENALTY, phraseHits * SPAM_PHRASE_PENALTY);
  const stuffingPenalty = STUFFING_FACTOR * Math.max(0, topTokenShare(text) - STUFFING_THRESHOLD);
  return Math.min(MAX_SPAM_PENALTY, phrasePenalty + stuffingPenalty);
}

function countEntities(entities: EntityMap | undefined): number {
  if (!entities) return 0;
  return Object.values(entities).reduce((sum, values) => sum + (values?.length ?? 0), 0);
}

export class CredibilityScorer implements ICredibilityScorer {
  private readonly config: CredibilityScorerConfig;

  constructor(
    private readonly reputationTable: IReputationTable,
    config: Partial<CredibilityScorerConfig> = {}
  ) {
    this.config = { ...DEFAULT_CREDIBILITY_CONFIG, ...config };
  }

  reputationOf(domain: string): number {
    for (const key of reputationKeys(domain)) {
      const value = this.reputationTable.lookup(key);
      if (value !== undefined) {
        return value;
      }
    }
    return this.config.defaultReputation;
  }

  score(document: ScorableDocument, domain: string, entities?: EntityMap): number {
    const reputation = this.reputationOf(domain);
    const quality = contentQuality(document.wordCount, countEntities(entities));
    const penalty = spamPenalty(document.text, this.config.spamPhrases);

    return clamp(
      this.config.reputationWeight * reputation + this.config.qualityWeight * quality - penalty,
      0,
      1
    );
  }
}

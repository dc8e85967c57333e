/**
 * Insight Aggregator
 *
 * Pure fusion of per-document signals into one Insights record. Input order is
 * search rank order; every ordering below is total, so the output depends only
 * on the input.
 */

import type {
  AnalyzedDocument,
  EntityType,
  Insights,
  Keyphrase,
  SentimentLabel,
  TopEntity,
} from '../../types/deep-search.js';
import { ENTITY_TYPES } from '../../types/deep-search.js';

export interface InsightAggregatorConfig {
  topTopics: number;
  topSources: number;
  topEntities: number;
  minConsensusDocuments: number;
}

export const DEFAULT_INSIGHT_CONFIG: InsightAggregatorConfig = {
  topTopics: 10,
  topSources: 3,
  topEntities: 10,
  minConsensusDocuments: 2,
};

const byPhrase = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Word-count-weighted mean credibility; uniform weights when every word count is zero
 */
export function overallCredibility(documents: readonly AnalyzedDocument[]): number {
  if (documents.length === 0) return 0;
  const totalWords = documents.reduce((sum, doc) => sum + doc.document.wordCount, 0);
  if (totalWords === 0) {
    return documents.reduce((sum, doc) => sum + doc.credibility, 0) / documents.length;
  }
  return documents.reduce((sum, doc) => sum + doc.credibility * doc.document.wordCount, 0) / totalWords;
}

export function keyTopics(documents: readonly AnalyzedDocument[], topK: number): Keyphrase[] {
  const totals = new Map<string, number>();
  for (const doc of documents) {
    for (const { phrase, frequency } of doc.keyphrases) {
      const key = phrase.trim().toLowerCase();
      totals.set(key, (totals.get(key) ?? 0) + frequency);
    }
  }
  return [...totals.entries()]
    .map(([phrase, frequency]) => ({ phrase, frequency }))
    .sort((a, b) => b.frequency - a.frequency || byPhrase(a.phrase, b.phrase))
    .slice(0, Math.max(0, topK));
}

export function topSources(documents: readonly AnalyzedDocument[], limit: number): AnalyzedDocument[] {
  return [...documents]
    .sort((a, b) => b.credibility - a.credibility || a.document.hit.rank - b.document.hit.rank)
    .slice(0, Math.max(0, limit));
}

/**
 * Phrases (case-normalized) present in the keyphrase lists of at least `minDocuments` documents,
 * by document count descending, then phrase
 */
export function consensusThemes(documents: readonly AnalyzedDocument[], minDocuments: number): string[] {
  const documentCounts = new Map<string, number>();
  for (const doc of documents) {
    const phrases = new Set(doc.keyphrases.map(({ phrase }) => phrase.trim().toLowerCase()));
    for (const phrase of phrases) {
      documentCounts.set(phrase, (documentCounts.get(phrase) ?? 0) + 1);
    }
  }
  return [...documentCounts.entries()]
    .filter(([, count]) => count >= minDocuments)
    .sort((a, b) => b[1] - a[1] || byPhrase(a[0], b[0]))
    .map(([phrase]) => phrase);
}

export function languageDistribution(documents: readonly AnalyzedDocument[]): Record<string, number> {
  const distribution: Record<string, number> = {};
  for (const doc of documents) {
    const language = doc.document.detectedLanguage;
    distribution[language] = (distribution[language] ?? 0) + 1;
  }
  return distribution;
}

export function sentimentDistribution(documents: readonly AnalyzedDocument[]): Record<SentimentLabel, number> {
  const distribution: Record<SentimentLabel, number> = { Positive: 0, Neutral: 0, Negative: 0 };
  for (const doc of documents) {
    distribution[doc.sentiment.label]++;
  }
  return distribution;
}

/**
 * Entities by number of documents mentioning them; ties by type order, then text
 */
export function topEntities(documents: readonly AnalyzedDocument[], limit: number): TopEntity[] {
  const counts = new Map<string, TopEntity>();
  for (const doc of documents) {
    for (const type of ENTITY_TYPES) {
      for (const text of new Set(doc.entities[type] ?? [])) {
        const key = `${type}\u0000${text}`;
        const existing = counts.get(key);
        counts.set(key, { type, text, documents: (existing?.documents ?? 0) + 1 });
      }
    }
  }
  const typeOrder = (type: EntityType) => ENTITY_TYPES.indexOf(type);
  return [...counts.values()]
    .sort((a, b) => b.documents - a.documents || typeOrder(a.type) - typeOrder(b.type) || byPhrase(a.text, b.text))
    .slice(0, Math.max(0, limit));
}

export class InsightAggregator {
  private readonly config: InsightAggregatorConfig;

  constructor(config: Partial<InsightAggregatorConfig> = {}) {
    this.config = { ...DEFAULT_INSIGHT_CONFIG, ...config };
  }

  aggregate(documents: readonly AnalyzedDocument[]): Insights {
    return {
      overallCredibility: overallCredibility(documents),
      keyTopics: keyTopics(documents, this.config.topTopics),
      topSources: topSources(documents, this.config.topSources),
      languageDistribution: languageDistribution(documents),
      consensusThemes: consensusThemes(documents, this.config.minConsensusDocuments),
      sentimentDistribution: sentimentDistribution(documents),
      topEntities: topEntities(documents, this.config.topEntities),
    };
  }
}

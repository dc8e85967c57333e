/**
 * Result serializer
 *
 * Maps a Result to its snake_case JSON document. Scores are rounded to three
 * decimals; entries without analysis carry null analysis fields.
 */

import type { EntityType, Result, ResultEntry, SentimentLabel } from '../../types/deep-search.js';
import { ENTITY_TYPES } from '../../types/deep-search.js';
import { round } from '../analysis/textUtils.js';

export interface ResultEntryJson {
  rank: number;
  url: string;
  final_url: string | null;
  title: string;
  snippet: string;
  status: 'fetched' | 'skipped' | 'failed';
  reason: string | null;
  http_status: number | null;
  credibility: number | null;
  word_count: number | null;
  language: string | null;
  sentiment: { polarity: number; subjectivity: number; label: SentimentLabel } | null;
  keyphrases: [string, number][] | null;
  entities: Partial<Record<EntityType, string[]>> | null;
  readability: { average_sentence_length: number; readability_score: number } | null;
  summary: string | null;
  degraded_signals: string[] | null;
}

export interface InsightsJson {
  overall_credibility: number;
  key_topics: Record<string, number>;
  top_sources: string[];
  language_distribution: Record<string, number>;
  consensus_themes: string[];
  sentiment_distribution: Record<SentimentLabel, number>;
  top_entities: { type: EntityType; text: string; documents: number }[];
}

export interface ResultJson {
  query: string;
  timestamp: string;
  cancelled: boolean;
  results: ResultEntryJson[];
  insights: InsightsJson;
  stats: {
    hits_returned: number;
    fetch_attempted: number;
    fetched: number;
    analyzed: number;
    skipped: number;
    failed: number;
    duration_ms: number;
  };
}

function entryToJson(entry: ResultEntry): ResultEntryJson {
  const { hit, outcome, analysis } = entry;
  const status = outcome.status;

  const base = {
    rank: hit.rank,
    url: hit.url,
    final_url: outcome.finalUrl ?? null,
    title: hit.title,
    snippet: hit.snippet,
    status: status.kind,
    reason: status.kind === 'fetched' ? null : status.reason,
    http_status: outcome.httpStatus ?? null,
  };

  if (!analysis) {
    return {
      ...base,
      credibility: null,
      word_count: null,
      language: null,
      sentiment: null,
      keyphrases: null,
      entities: null,
      readability: null,
      summary: null,
      degraded_signals: null,
    };
  }

  const entities: Partial<Record<EntityType, string[]>> = {};
  for (const type of ENTITY_TYPES) {
    const values = analysis.entities[type];
    if (values && values.length > 0) {
      entities[type] = [...values];
    }
  }

  return {
    ...base,
    credibility: round(analysis.credibility),
    word_count: analysis.document.wordCount,
    language: analysis.document.detectedLanguage,
    sentiment: {
      polarity: round(analysis.sentiment.polarity),
      subjectivity: round(analysis.sentiment.subjectivity),
      label: analysis.sentiment.label,
    },
    keyphrases: analysis.keyphrases.map(({ phrase, frequency }): [string, number] => [phrase, frequency]),
    entities,
    readability: {
      average_sentence_length: round(analysis.readability.averageSentenceLength),
      readability_score: round(analysis.readability.readabilityScore),
    },
    summary: analysis.summary,
    degraded_signals: [...analysis.degradedSignals],
  };
}

export function toResultJson(result: Result): ResultJson {
  const { insights, stats } = result;
  return {
    query: result.query,
    timestamp: result.timestamp.toISOString(),
    cancelled: result.cancelled,
    results: result.results.map(entryToJson),
    insights: {
      overall_credibility: round(insights.overallCredibility),
      key_topics: Object.fromEntries(insights.keyTopics.map(({ phrase, frequency }) => [phrase, frequency])),
      top_sources: insights.topSources.map((doc) => doc.document.hit.url),
      language_distribution: { ...insights.languageDistribution },
      consensus_themes: [...insights.consensusThemes],
      sentiment_distribution: { ...insights.sentimentDistribution },
      top_entities: insights.topEntities.map(({ type, text, documents }) => ({ type, text, documents })),
    },
    stats: {
      hits_returned: stats.hitsReturned,
      fetch_attempted: stats.fetchAttempted,
      fetched: stats.fetched,
      analyzed: stats.analyzed,
      skipped: stats.skipped,
      failed: stats.failed,
      duration_ms: stats.durationMs,
    },
  };
}

import { describe, it, expect } from 'vitest';
import { toResultJson } from '../ResultSerializer.js';
import { formatTextReport } from '../TextReport.js';
import { InsightAggregator } from '../../insights/InsightAggregator.js';
import { makeAnalyzed, makeHit } from '../../../__tests__/helpers/fixtures.js';
import type { AnalyzedDocument, Result, ResultEntry } from '../../../types/deep-search.js';

const FETCHED_AT = new Date('2026-01-15T10:00:00.000Z');

function analyzedEntry(analysis: AnalyzedDocument): ResultEntry {
  const hit = analysis.document.hit;
  return {
    hit,
    outcome: {
      hit,
      status: { kind: 'fetched' },
      finalUrl: `${hit.url}?ref=final`,
      httpStatus: 200,
      contentType: 'text/html',
      fetchDurationMs: 120,
      fetchedAt: FETCHED_AT,
    },
    analysis,
  };
}

function buildResult(): Result {
  const analyzed = makeAnalyzed({
    rank: 0,
    credibility: 0.81234,
    wordCount: 250,
    label: 'Positive',
    keyphrases: [
      { phrase: 'climate', frequency: 4 },
      { phrase: 'flood', frequency: 2 },
    ],
    entities: { ORG: ['Example Agency'], EMAIL: [] },
  });
  const skippedHit = makeHit(1);
  const failedHit = makeHit(2);
  const results: ResultEntry[] = [
    analyzedEntry(analyzed),
    {
      hit: skippedHit,
      outcome: { hit: skippedHit, status: { kind: 'skipped', reason: 'robots' }, fetchDurationMs: 3, fetchedAt: FETCHED_AT },
      analysis: null,
    },
    {
      hit: failedHit,
      outcome: {
        hit: failedHit,
        status: { kind: 'failed', reason: 'http_404' },
        httpStatus: 404,
        fetchDurationMs: 40,
        fetchedAt: FETCHED_AT,
        error: 'HTTP 404',
      },
      analysis: null,
    },
  ];

  return {
    query: 'climate adaptation',
    timestamp: FETCHED_AT,
    state: 'done',
    cancelled: false,
    results,
    hits: [analyzed.document.hit, skippedHit, failedHit, makeHit(3)],
    insights: new InsightAggregator().aggregate([analyzed]),
    stats: { hitsReturned: 4, fetchAttempted: 3, fetched: 1, analyzed: 1, skipped: 1, failed: 1, durationMs: 950 },
  };
}

describe('toResultJson', () => {
  const json = toResultJson(buildResult());

  it('serializes analyzed entries with rounded scores', () => {
    expect(json.results[0]).toEqual({
      rank: 0,
      url: 'https://site0.example/page',
      final_url: 'https://site0.example/page?ref=final',
      title: 'Result 0',
      snippet: 'Snippet 0',
      status: 'fetched',
      reason: null,
      http_status: 200,
      credibility: 0.812,
      word_count: 250,
      language: 'en',
      sentiment: { polarity: 0, subjectivity: 0, label: 'Positive' },
      keyphrases: [
        ['climate', 4],
        ['flood', 2],
      ],
      entities: { ORG: ['Example Agency'] },
      readability: { average_sentence_length: 10, readability_score: 60 },
      summary: 'text',
      degraded_signals: [],
    });
  });

  it('nulls analysis fields for skipped and failed entries', () => {
    expect(json.results[1]).toMatchObject({ status: 'skipped', reason: 'robots', http_status: null, credibility: null });
    expect(json.results[2]).toMatchObject({
      status: 'failed',
      reason: 'http_404',
      http_status: 404,
      final_url: null,
      sentiment: null,
      keyphrases: null,
      summary: null,
    });
  });

  it('serializes insights and stats', () => {
    expect(json.query).toBe('climate adaptation');
    expect(json.timestamp).toBe('2026-01-15T10:00:00.000Z');
    expect(json.insights).toEqual({
      overall_credibility: 0.812,
      key_topics: { climate: 4, flood: 2 },
      top_sources: ['https://site0.example/page'],
      language_distribution: { en: 1 },
      consensus_themes: [],
      sentiment_distribution: { Positive: 1, Neutral: 0, Negative: 0 },
      top_entities: [{ type: 'ORG', text: 'Example Agency', documents: 1 }],
    });
    expect(json.stats).toEqual({
      hits_returned: 4,
      fetch_attempted: 3,
      fetched: 1,
      analyzed: 1,
      skipped: 1,
      failed: 1,
      duration_ms: 950,
    });
  });

  it('survives a JSON round trip', () => {
    expect(JSON.parse(JSON.stringify(json))).toEqual(json);
  });
});

describe('formatTextReport', () => {
  it('prints the insights and one block per entry', () => {
    const lines = formatTextReport(buildResult()).split('\n');

    expect(lines[1]).toBe('Query: climate adaptation');
    expect(lines).toContain('  Overall Credibility: 0.812');
    expect(lines).toContain('  Key Topics: climate, flood');
    expect(lines).toContain('  Languages: en (1)');
    expect(lines).toContain('  Fetched 1/3, skipped 1, failed 1');
    expect(lines).toContain('[1] Result 0');
    expect(lines).toContain('    Credibility: 0.812 | Words: 250');
    expect(lines).toContain('    Sentiment: Positive (polarity: 0)');
    expect(lines).toContain('    Status: skipped (robots)');
    expect(lines).toContain('    Status: failed (http_404)');
  });
});

/**
 * DeepSearch data model
 *
 * Records flowing through the pipeline, from provider hit to aggregated insights.
 * Everything here is treated as immutable once created.
 */

/**
 * A single candidate returned by the search provider, before any fetch.
 */
export interface SearchHit {
  /** 0-based provider relevance order */
  readonly rank: number;
  readonly url: string;
  readonly title: string;
  readonly snippet: string;
}

export type SkipReason = 'robots';

export type FetchStatus =
  | { readonly kind: 'fetched' }
  | { readonly kind: 'skipped'; readonly reason: SkipReason }
  | { readonly kind: 'failed'; readonly reason: string };

export interface FetchOutcome {
  readonly hit: SearchHit;
  readonly status: FetchStatus;
  /** Present only when status is `fetched` */
  readonly rawBytes?: Buffer;
  /** URL after redirects */
  readonly finalUrl?: string;
  readonly httpStatus?: number;
  readonly contentType?: string;
  readonly fetchDurationMs: number;
  readonly fetchedAt: Date;
  /** Why the hit was skipped, or the last error of a failed fetch */
  readonly error?: string;
}

export interface DocumentMetadata {
  readonly title?: string;
  readonly description?: string;
  readonly author?: string;
  readonly publishedAt?: string;
  readonly headings: readonly string[];
}

export interface NormalizedDocument {
  readonly hit: SearchHit;
  readonly text: string;
  readonly wordCount: number;
  /** ISO 639-1 code or `unknown` */
  readonly detectedLanguage: string;
  readonly metadata: DocumentMetadata;
}

export type SentimentLabel = 'Positive' | 'Negative' | 'Neutral';

export interface SentimentSignal {
  /** [-1, 1] */
  readonly polarity: number;
  /** [0, 1] */
  readonly subjectivity: number;
  readonly label: SentimentLabel;
}

export const ENTITY_TYPES = ['PERSON', 'ORG', 'GPE', 'PRODUCT', 'EMAIL', 'PHONE', 'URL'] as const;
export type EntityType = (typeof ENTITY_TYPES)[number];

/** Entity type -> deduplicated, sorted entity texts. Types without entities are omitted. */
export type EntityMap = Partial<Record<EntityType, readonly string[]>>;

export interface Keyphrase {
  readonly phrase: string;
  readonly frequency: number;
}

export interface ReadabilitySignal {
  /** Words per sentence */
  readonly averageSentenceLength: number;
  /** Flesch reading ease clamped to [0, 100]; higher reads easier */
  readonly readabilityScore: number;
}

export interface TextStats {
  readonly charCount: number;
  readonly sentenceCount: number;
  readonly averageWordLength: number;
}

export type SignalName = 'credibility' | 'sentiment' | 'entities' | 'keyphrases' | 'readability';

export interface AnalyzedDocument {
  readonly document: NormalizedDocument;
  /** [0, 1] */
  readonly credibility: number;
  readonly sentiment: SentimentSignal;
  readonly entities: EntityMap;
  /** Descending by frequency */
  readonly keyphrases: readonly Keyphrase[];
  readonly readability: ReadabilitySignal;
  readonly stats: TextStats;
  readonly summary: string;
  /** Signals that fell back to their default value */
  readonly degradedSignals: readonly SignalName[];
}

export interface TopEntity {
  readonly type: EntityType;
  readonly text: string;
  /** Number of documents mentioning the entity */
  readonly documents: number;
}

export interface Insights {
  readonly overallCredibility: number;
  /** Ordered by aggregate frequency descending */
  readonly keyTopics: readonly Keyphrase[];
  /** At most 3, credibility descending, rank ascending on ties */
  readonly topSources: readonly AnalyzedDocument[];
  readonly languageDistribution: Readonly<Record<string, number>>;
  readonly consensusThemes: readonly string[];
  readonly sentimentDistribution: Readonly<Record<SentimentLabel, number>>;
  readonly topEntities: readonly TopEntity[];
}

export type PipelineState = 'queried' | 'searching' | 'fetching' | 'analyzing' | 'aggregating' | 'done' | 'failed';

/** A fetch-attempted hit with its outcome; `analysis` is null unless the document was analyzed */
export interface ResultEntry {
  readonly hit: SearchHit;
  readonly outcome: Omit<FetchOutcome, 'rawBytes'>;
  readonly analysis: AnalyzedDocument | null;
}

export interface RunStats {
  readonly hitsReturned: number;
  readonly fetchAttempted: number;
  readonly fetched: number;
  readonly analyzed: number;
  readonly skipped: number;
  readonly failed: number;
  readonly durationMs: number;
}

export interface Result {
  readonly query: string;
  readonly timestamp: Date;
  readonly state: PipelineState;
  readonly cancelled: boolean;
  /** Search rank order; one entry per fetch-attempted hit */
  readonly results: readonly ResultEntry[];
  /** Every hit the provider returned, including those beyond the fetch cap */
  readonly hits: readonly SearchHit[];
  readonly insights: Insights;
  readonly stats: RunStats;
}

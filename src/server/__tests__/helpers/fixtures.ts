import type {
  AnalyzedDocument,
  EntityMap,
  Keyphrase,
  NormalizedDocument,
  SearchHit,
  SentimentLabel,
} from '../../types/deep-search.js';

export function makeHit(rank: number, url: string = `https://site${rank}.example/page`): SearchHit {
  return { rank, url, title: `Result ${rank}`, snippet: `Snippet ${rank}` };
}

/**
 * An article page whose main text is `paragraphs`, wrapped in navigation and footer boilerplate
 */
export function articlePage(title: string, paragraphs: readonly string[]): string {
  return `<!doctype html>
<html>
  <head>
    <title>${title}</title>
    <meta name="description" content="About ${title}">
    <script>var tracking = "should not appear";</script>
  </head>
  <body>
    <nav><a href="/">Home</a> <a href="/about">About us</a></nav>
    <article>
      <h1>${title}</h1>
      ${paragraphs.map((paragraph) => `<p>${paragraph}</p>`).join('\n      ')}
    </article>
    <footer>Copyright footer text</footer>
  </body>
</html>`;
}

export interface AnalyzedDocumentInit {
  rank: number;
  credibility?: number;
  wordCount?: number;
  language?: string;
  keyphrases?: Keyphrase[];
  label?: SentimentLabel;
  entities?: EntityMap;
}

export function makeAnalyzed(init: AnalyzedDocumentInit): AnalyzedDocument {
  const document: NormalizedDocument = {
    hit: makeHit(init.rank),
    text: 'text',
    wordCount: init.wordCount ?? 100,
    detectedLanguage: init.language ?? 'en',
    metadata: { headings: [] },
  };
  return {
    document,
    credibility: init.credibility ?? 0.5,
    sentiment: { polarity: 0, subjectivity: 0, label: init.label ?? 'Neutral' },
    entities: init.entities ?? {},
    keyphrases: init.keyphrases ?? [],
    readability: { averageSentenceLength: 10, readabilityScore: 60 },
    stats: { charCount: 4, sentenceCount: 1, averageWordLength: 4 },
    summary: 'text',
    degradedSignals: [],
  };
}

/**
 * HtmlExtractor - Turn fetched bytes into a NormalizedDocument
 *
 * Boilerplate removal, block-aware whitespace collapse, word count, page metadata
 * and language detection. Output depends only on the input bytes and configuration.
 */

import * as cheerio from 'cheerio';
import type { Logger } from 'pino';
import { createChildLogger } from '../../utils/logger.js';
import { UnparseableContentError, errorMessage } from '../../types/errors.js';
import type { DocumentMetadata, NormalizedDocument, SearchHit } from '../../types/deep-search.js';
import { DEFAULT_BOILERPLATE_SELECTORS } from '../../config/deepSearchConfig.js';
import { StopwordLanguageDetector, type LanguageDetector } from '../../services/analysis/LanguageDetector.js';
import { countWhitespaceTokens } from '../../services/analysis/textUtils.js';

export interface ContentExtractor {
  /**
   * @throws UnparseableContentError when the content type is not HTML or plain text,
   * or the text is below the minimum word count
   */
  extract(rawBytes: Buffer, hit: SearchHit, contentType?: string): NormalizedDocument;
}

export interface HtmlExtractorConfig {
  minWords?: number;
  boilerplateSelectors?: string[];
  languageDetector?: LanguageDetector;
}

const TEXT_CONTENT_TYPES = new Set(['text/html', 'application/xhtml+xml', 'text/plain']);
const SNIFF_BYTES = 1024;

// Elements whose end marks a text boundary
const BLOCK_ELEMENTS =
  'p, div, br, li, dt, dd, tr, td, th, h1, h2, h3, h4, h5, h6, section, article, main, blockquote, pre, figcaption, table, ul, ol';

export class HtmlExtractor implements ContentExtractor {
  private readonly minWords: number;
  private readonly boilerplateSelectors: string[];
  private readonly languageDetector: LanguageDetector;
  private readonly log: Logger;

  constructor(config: HtmlExtractorConfig = {}) {
    this.minWords = config.minWords ?? 20;
    this.boilerplateSelectors = config.boilerplateSelectors ?? DEFAULT_BOILERPLATE_SELECTORS;
    this.languageDetector = config.languageDetector ?? new StopwordLanguageDetector();
    this.log = createChildLogger({ component: 'HtmlExtractor' });
  }

  extract(rawBytes: Buffer, hit: SearchHit, contentType?: string): NormalizedDocument {
    const mediaType = contentType?.split(';')[0].trim().toLowerCase();
    if (mediaType ? !TEXT_CONTENT_TYPES.has(mediaType) : looksBinary(rawBytes)) {
      throw new UnparseableContentError(`Content type ${mediaType || 'unknown'} is not HTML or text`, {
        url: hit.url,
        contentType: mediaType ?? null,
      });
    }

    const decoded = decode(rawBytes, contentType);
    const isPlainText = mediaType === 'text/plain';

    const { text, metadata } = isPlainText
      ? { text: collapseWhitespace(decoded), metadata: { headings: [] } }
      : this.extractHtml(decoded);

    const wordCount = countWhitespaceTokens(text);
    if (wordCount < this.minWords) {
      throw new UnparseableContentError(
        `Extracted text has ${wordCount} words, below the minimum of ${this.minWords}`,
        { url: hit.url, wordCount, minWords: this.minWords }
      );
    }

    let detectedLanguage = 'unknown';
    try {
      detectedLanguage = this.languageDetector.detect(text);
    } catch (error) {
      this.log.debug({ url: hit.url, error: errorMessage(error) }, 'Language detection failed');
    }

    this.log.debug(
      { url: hit.url, wordCount, language: detectedLanguage, headingCount: metadata.headings.length },
      'Extraction completed'
    );

    return { hit, text, wordCount, detectedLanguage, metadata };
  }

  private extractHtml(html: string): { text: string; metadata: DocumentMetadata } {
    const $ = cheerio.load(html);

    // Metadata is read before boilerplate removal, since <header> often holds the title
    const title =
      $('title').first().text().trim() ||
      $('meta[property="og:title"]').attr('content')?.trim() ||
      $('h1').first().text().trim();
    const description =
      $('meta[name="description"]').attr('content')?.trim() ||
      $('meta[property="og:description"]').attr('content')?.trim();
    const author = $('meta[name="author"]').attr('content')?.trim();
    const publishedAt = parseDate(
      $('meta[property="article:published_time"]').attr('content') ||
        $('meta[name="publication-date"]').attr('content') ||
        $('time[datetime]').first().attr('datetime')
    );

    for (const selector of this.boilerplateSelectors) {
      $(selector).remove();
    }

    let contentElement = $('article').first();
    if (contentElement.length === 0) {
      contentElement = $('main').first();
    }
    if (contentElement.length === 0) {
      contentElement = $('body');
    }

    const headings: string[] = [];
    contentElement.find('h1, h2, h3, h4, h5, h6').each((_, el) => {
      const headingText = collapseWhitespace($(el).text());
      if (headingText.length > 0) {
        headings.push(headingText);
      }
    });

    contentElement.find(BLOCK_ELEMENTS).each((_, el) => {
      $(el).after('\n');
    });

    const rawText = contentElement.length > 0 ? contentElement.text() : $.root().text();
    const metadata: DocumentMetadata = {
      ...(title ? { title } : {}),
      ...(description ? { description } : {}),
      ...(author ? { author } : {}),
      ...(publishedAt ? { publishedAt } : {}),
      headings,
    };

    return { text: collapseWhitespace(rawText), metadata };
  }
}

/**
 * Collapse runs of spaces within lines and drop empty lines; one newline per block boundary remains.
 */
export function collapseWhitespace(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

function decode(rawBytes: Buffer, contentType?: string): string {
  const charset = contentType?.match(/charset=["']?([^"';\s]+)/i)?.[1];
  if (charset) {
    try {
      return new TextDecoder(charset).decode(rawBytes);
    } catch (error) {
      // Unknown encoding label
      if (!(error instanceof RangeError)) throw error;
    }
  }
  return new TextDecoder('utf-8').decode(rawBytes);
}

/**
 * Untyped bodies are treated as binary when they open with a PDF signature or
 * carry NUL bytes near the start
 */
function looksBinary(rawBytes: Buffer): boolean {
  const head = rawBytes.subarray(0, SNIFF_BYTES);
  return head.subarray(0, 5).toString('latin1') === '%PDF-' || head.includes(0);
}

function parseDate(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const date = new Date(raw);
  return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
}

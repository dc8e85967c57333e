/**
 * Lexicon sentiment (AFINN-165 via the `sentiment` package)
 *
 * polarity: mean AFINN score of the sentiment-bearing tokens, scaled from [-5, 5] to [-1, 1].
 * subjectivity: share of sentiment-bearing tokens, scaled so that one in four saturates.
 */

import Sentiment from 'sentiment';
import type { ISentimentAnalyzer } from './interfaces/ISentimentAnalyzer.js';
import type { SentimentLabel, SentimentSignal } from '../../types/deep-search.js';
import { clamp } from './textUtils.js';

export const NEUTRAL_SENTIMENT: SentimentSignal = { polarity: 0, subjectivity: 0, label: 'Neutral' };

const LABEL_THRESHOLD = 0.1;
const AFINN_MAX = 5;
const SUBJECTIVITY_SCALE = 4;

export function sentimentLabel(polarity: number): SentimentLabel {
  if (polarity > LABEL_THRESHOLD) return 'Positive';
  if (polarity < -LABEL_THRESHOLD) return 'Negative';
  return 'Neutral';
}

export class SentimentAnalyzer implements ISentimentAnalyzer {
  private readonly sentiment = new Sentiment();

  analyze(text: string): SentimentSignal {
    const result = this.sentiment.analyze(text);
    const scored = result.words.length;
    if (scored === 0 || result.tokens.length === 0) {
      return NEUTRAL_SENTIMENT;
    }

    const polarity = clamp(result.score / (AFINN_MAX * scored), -1, 1);
    const subjectivity = clamp((scored / result.tokens.length) * SUBJECTIVITY_SCALE, 0, 1);
    return { polarity, subjectivity, label: sentimentLabel(polarity) };
  }
}

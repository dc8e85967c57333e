import type { EntityMap, NormalizedDocument } from '../../../types/deep-search.js';

export type ScorableDocument = Pick<NormalizedDocument, 'text' | 'wordCount'>;

export interface ICredibilityScorer {
  /**
   * Credibility in [0, 1]; no I/O beyond the reputation table
   */
  score(document: ScorableDocument, domain: string, entities?: EntityMap): number;

  /**
   * Base reputation of a domain, with parent-domain and suffix fallback
   */
  reputationOf(domain: string): number;
}

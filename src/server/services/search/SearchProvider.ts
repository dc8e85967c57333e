import type { SearchHit } from '../../types/deep-search.js';

/**
 * Search backend contract.
 *
 * Implementations return at most `maxResults` HTTP(S) hits ranked contiguously from 0,
 * throw ProviderUnavailableError when the backend cannot be reached after their own
 * retry policy, and ProviderEmptyError when it answers with no hits.
 */
export interface SearchProvider {
  readonly name: string;
  search(query: string, maxResults: number): Promise<SearchHit[]>;
}

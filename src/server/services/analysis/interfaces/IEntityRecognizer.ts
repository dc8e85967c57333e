import type { EntityMap } from '../../../types/deep-search.js';

/**
 * Named-entity capability. Types without entities are omitted from the map.
 */
export interface IEntityRecognizer {
  recognize(text: string): EntityMap;
}

/**
 * Domain reputation source. Keys are host names, parent domains or bare suffixes (`edu`).
 */
export interface IReputationTable {
  /** Reputation in [0, 1] for an exact key, or undefined when the key is unknown */
  lookup(key: string): number | undefined;
}

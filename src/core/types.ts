/** Shared core types used by module contracts. */

export type Item = string;
/** Zero-based position of a transaction in its collection. */
export type TxId = number;
export type Support = number;

export interface Transaction {
  id: TxId;
  items: ReadonlySet<Item>;
}

/**
 * Canonical itemset: distinct items in strictly increasing order.
 * Build one with `toItemset()` so the invariant holds.
 */
export type Itemset = readonly Item[];

export interface FrequentItemset {
  items: Itemset;
  support: Support;
}

/** itemsetKey -> entry, for one itemset size. */
export type LevelMap = ReadonlyMap<string, FrequentItemset>;

/** size k -> level map. Only sizes with at least one frequent itemset appear. */
export type FrequentItemsetTable = ReadonlyMap<number, LevelMap>;

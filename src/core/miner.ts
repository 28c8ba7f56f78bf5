import type { FrequentItemsetTable } from "./types.js";
import type { TransactionStore } from "./transactionStore.js";

export interface MineOptions {
  /** Checked between seed branches; mining throws the signal's reason once aborted. */
  signal?: AbortSignal;
  /** Largest itemset size to explore, a positive integer. Unbounded when omitted. */
  maxSize?: number;
  /** Mining throws `ResultLimitError` once it finds more itemsets than this. */
  maxItemsets?: number;
  /** Forwarded to `TransactionStore.buildIndex`. */
  requireNonEmpty?: boolean;
}

/**
 * Enumerates every itemset whose support is at least `minSupport`, keyed by size.
 *
 * `minSupport` is an absolute transaction count, an integer >= 0.
 */
export interface FrequentItemsetMiner {
  mine(store: TransactionStore, minSupport: number, options?: MineOptions): FrequentItemsetTable;
}

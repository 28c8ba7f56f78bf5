import type { Itemset, Support } from "./types.js";
import type { InvertedIndex } from "./transactionStore.js";

/**
 * Counts the transactions that contain every item of an itemset.
 *
 * Contract notes:
 * - the empty itemset is supported by every transaction
 * - an item missing from the index makes the support 0
 * - must not mutate the index
 */
export interface SupportCounter {
  support(itemset: Itemset, index: InvertedIndex): Support;
}

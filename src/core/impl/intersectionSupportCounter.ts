import type { Itemset, Support, TxId } from "../types.js";
import type { InvertedIndex } from "../transactionStore.js";
import type { SupportCounter } from "../supportCounter.js";

const EMPTY: ReadonlySet<TxId> = new Set();

/**
 * Support by posting-set intersection:
 * - missing items contribute an empty set
 * - walks the smallest set, probing the others
 */
export class IntersectionSupportCounter implements SupportCounter {
  support(itemset: Itemset, index: InvertedIndex): Support {
    if (itemset.length === 0) return index.transactionCount;

    const lists: Array<ReadonlySet<TxId>> = itemset.map((item) => index.getPostings(item) ?? EMPTY);
    lists.sort((a, b) => a.size - b.size);

    const [smallest, ...rest] = lists;
    if (!smallest || smallest.size === 0) return 0;

    let count = 0;
    for (const txId of smallest) {
      if (rest.every((s) => s.has(txId))) count++;
    }
    return count;
  }
}

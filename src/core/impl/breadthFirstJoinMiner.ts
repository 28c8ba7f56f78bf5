import type { FrequentItemset, FrequentItemsetTable, Itemset } from "../types.js";
import type { TransactionStore } from "../transactionStore.js";
import type { SupportCounter } from "../supportCounter.js";
import type { FrequentItemsetMiner, MineOptions } from "../miner.js";
import { assertLimit, assertThreshold } from "../errors.js";
import { itemsetKey, sortTable, toItemset } from "../itemset.js";
import { getLogger } from "../../logging/logger.js";
import { IntersectionSupportCounter } from "./intersectionSupportCounter.js";
import { frequentItems } from "./depthFirstMiner.js";
import { ItemsetBudget } from "./itemsetBudget.js";

const logger = getLogger("BreadthFirstJoinMiner");

/**
 * Level-wise miner: candidates of size k+1 are the pairwise unions of
 * frequent k-itemsets that come out exactly one item larger.
 *
 * Slower than `DepthFirstMiner`; kept as an independent implementation of
 * the same contract to cross-check it.
 */
export class BreadthFirstJoinMiner implements FrequentItemsetMiner {
  constructor(private readonly counter: SupportCounter = new IntersectionSupportCounter()) {}

  mine(store: TransactionStore, minSupport: number, options?: MineOptions): FrequentItemsetTable {
    assertThreshold(minSupport);
    assertLimit("maxSize", options?.maxSize);
    assertLimit("maxItemsets", options?.maxItemsets);
    const budget = new ItemsetBudget(options?.maxItemsets);
    const maxSize = options?.maxSize ?? Number.POSITIVE_INFINITY;
    const index = store.buildIndex({ requireNonEmpty: options?.requireNonEmpty });

    const table = new Map<number, Map<string, FrequentItemset>>();
    let current = new Map<string, FrequentItemset>();
    for (const [item, support] of frequentItems(store, minSupport)) {
      const items = toItemset([item]);
      current.set(itemsetKey(items), { items, support });
    }

    let size = 1;
    while (current.size > 0 && size <= maxSize) {
      options?.signal?.throwIfAborted();
      budget.take(current.size);
      table.set(size, current);
      if (size + 1 > maxSize) break;

      const frequent = Array.from(current.values());
      const next = new Map<string, FrequentItemset>();
      const seen = new Set<string>();
      for (let i = 0; i < frequent.length; i++) {
        for (let j = i + 1; j < frequent.length; j++) {
          const candidate: Itemset = toItemset([...frequent[i]!.items, ...frequent[j]!.items]);
          if (candidate.length !== size + 1) continue;

          const key = itemsetKey(candidate);
          if (seen.has(key)) continue;
          seen.add(key);

          const support = this.counter.support(candidate, index);
          if (support >= minSupport) next.set(key, { items: candidate, support });
        }
      }

      current = next;
      size++;
    }

    logger.debug({ minSupport, transactions: store.size, levels: table.size }, "mined frequent itemsets level-wise");
    return sortTable(table);
  }
}

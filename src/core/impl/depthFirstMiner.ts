import type { FrequentItemset, FrequentItemsetTable, Item, Itemset } from "../types.js";
import type { InvertedIndex, TransactionStore } from "../transactionStore.js";
import type { SupportCounter } from "../supportCounter.js";
import type { FrequentItemsetMiner, MineOptions } from "../miner.js";
import { assertLimit, assertThreshold } from "../errors.js";
import { compareItems, itemsetKey, mergeTables, sortTable, toItemset, withItem } from "../itemset.js";
import { getLogger } from "../../logging/logger.js";
import { IntersectionSupportCounter } from "./intersectionSupportCounter.js";
import { ItemsetBudget } from "./itemsetBudget.js";

const logger = getLogger("DepthFirstMiner");

type MutableTable = Map<number, Map<string, FrequentItemset>>;

interface Frame {
  current: Itemset;
  /** candidates greater than every item of `current`, ascending */
  remaining: readonly Item[];
  size: number;
}

/** Fixed for one `mine` call; only the budget counts up. */
interface Search {
  index: InvertedIndex;
  minSupport: number;
  maxSize: number;
  budget: ItemsetBudget;
}

/**
 * Counts each item once per transaction. Returns survivors in item order.
 */
export function frequentItems(store: TransactionStore, minSupport: number): Array<[Item, number]> {
  const counts = new Map<Item, number>();
  for (const tx of store.transactions()) {
    for (const item of tx.items) counts.set(item, (counts.get(item) ?? 0) + 1);
  }
  return Array.from(counts.entries())
    .filter(([, count]) => count >= minSupport)
    .sort((a, b) => compareItems(a[0], b[0]));
}

/**
 * Depth-first miner over an inverted index:
 * - level 1 from a single counting pass
 * - each frequent itemset is extended only by items greater than its last,
 *   so every itemset is visited once
 * - infrequent itemsets are never extended
 */
export class DepthFirstMiner implements FrequentItemsetMiner {
  constructor(private readonly counter: SupportCounter = new IntersectionSupportCounter()) {}

  mine(store: TransactionStore, minSupport: number, options?: MineOptions): FrequentItemsetTable {
    assertThreshold(minSupport);
    assertLimit("maxSize", options?.maxSize);
    assertLimit("maxItemsets", options?.maxItemsets);
    const index = store.buildIndex({ requireNonEmpty: options?.requireNonEmpty });

    const seeds = frequentItems(store, minSupport);
    const table: MutableTable = new Map();
    if (seeds.length === 0) return table;

    const search: Search = {
      index,
      minSupport,
      maxSize: options?.maxSize ?? Number.POSITIVE_INFINITY,
      budget: new ItemsetBudget(options?.maxItemsets),
    };
    search.budget.take(seeds.length);

    const level1 = new Map<string, FrequentItemset>();
    for (const [item, support] of seeds) {
      const items = toItemset([item]);
      level1.set(itemsetKey(items), { items, support });
    }
    table.set(1, level1);

    const survivors = seeds.map(([item]) => item);
    for (let i = 0; i < survivors.length; i++) {
      options?.signal?.throwIfAborted();
      const remaining = survivors.slice(i + 1);
      if (remaining.length === 0 || search.maxSize < 2) continue;

      const seed = toItemset([survivors[i]!]);
      mergeTables(table, this.extend({ current: seed, remaining, size: 2 }, search));
    }

    logger.debug(
      { minSupport, transactions: store.size, levels: Array.from(table, ([k, level]) => [k, level.size]) },
      "mined frequent itemsets",
    );
    return sortTable(table);
  }

  /** Returns the frequent extensions of `frame.current` as a fresh table. */
  private extend(frame: Frame, search: Search): FrequentItemsetTable {
    const out: MutableTable = new Map();
    const level = new Map<string, FrequentItemset>();

    frame.remaining.forEach((x, j) => {
      const next = withItem(frame.current, x);
      const support = this.counter.support(next, search.index);
      if (support < search.minSupport) return;

      search.budget.take();
      level.set(itemsetKey(next), { items: next, support });

      const nextRemaining = frame.remaining.slice(j + 1);
      if (nextRemaining.length === 0 || frame.size + 1 > search.maxSize) return;
      mergeTables(out, this.extend({ current: next, remaining: nextRemaining, size: frame.size + 1 }, search));
    });

    if (level.size > 0) mergeTables(out, new Map([[frame.size, level]]));
    return out;
  }
}

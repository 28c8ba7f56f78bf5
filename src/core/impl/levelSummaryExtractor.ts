import type { FrequentItemset, FrequentItemsetTable } from "../types.js";
import type { ItemsetSummary, SummaryExtractor } from "../summary.js";
import { compareFrequent, immediateSubsets, itemsetKey, levelOf } from "../itemset.js";

/**
 * Compares each level only against the next one up. For a table with the
 * Apriori closure property that is exhaustive: any frequent superset two or
 * more levels up implies one exactly one level up, with support in between.
 *
 * Rather than testing every pair, each (k+1)-itemset strikes out its own
 * k-subsets.
 */
export class LevelSummaryExtractor implements SummaryExtractor {
  maximal(table: FrequentItemsetTable): FrequentItemset[] {
    return this.survivors(table, () => true);
  }

  closed(table: FrequentItemsetTable): FrequentItemset[] {
    return this.survivors(table, (subset, superset) => subset.support === superset.support);
  }

  summarize(table: FrequentItemsetTable): ItemsetSummary {
    return { maximal: this.maximal(table), closed: this.closed(table) };
  }

  /**
   * Entries of `table` not struck out by an immediate superset for which
   * `strikes(subset, superset)` holds.
   */
  private survivors(
    table: FrequentItemsetTable,
    strikes: (subset: FrequentItemset, superset: FrequentItemset) => boolean,
  ): FrequentItemset[] {
    const out: FrequentItemset[] = [];

    for (const [size, level] of table) {
      const struck = new Set<string>();
      for (const superset of levelOf(table, size + 1).values()) {
        for (const items of immediateSubsets(superset.items)) {
          const key = itemsetKey(items);
          const subset = level.get(key);
          if (subset && strikes(subset, superset)) struck.add(key);
        }
      }

      for (const [key, entry] of level) {
        if (!struck.has(key)) out.push(entry);
      }
    }

    return out.sort(compareFrequent);
  }
}

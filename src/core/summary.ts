import type { FrequentItemset, FrequentItemsetTable } from "./types.js";

export interface ItemsetSummary {
  maximal: FrequentItemset[];
  closed: FrequentItemset[];
}

/**
 * Derives maximal and closed itemsets from a finished table.
 * Results are ordered by size, then by items.
 */
export interface SummaryExtractor {
  /** Frequent itemsets with no frequent proper superset. */
  maximal(table: FrequentItemsetTable): FrequentItemset[];
  /** Frequent itemsets with no proper superset of equal support. */
  closed(table: FrequentItemsetTable): FrequentItemset[];
  summarize(table: FrequentItemsetTable): ItemsetSummary;
}

import type { FrequentItemset, FrequentItemsetTable } from "../../types.js";
import { flattenTable } from "../../itemset.js";
import { MemoryTransactionStore } from "../memoryTransactionStore.js";

/** Six baskets over A..E; D occurs once. */
export const BASKETS = ["ABCE", "ACD", "BCE", "ABCE", "BE", "ACE"];

export function charStore(...rows: string[]): MemoryTransactionStore {
  return new MemoryTransactionStore(rows.map((r) => [...r]));
}

/** [joined items, support] pairs, ordered by size then items. */
export function pairs(source: FrequentItemsetTable | FrequentItemset[]): Array<[string, number]> {
  const list = Array.isArray(source) ? source : flattenTable(source);
  return list.map((f) => [f.items.join(""), f.support]);
}

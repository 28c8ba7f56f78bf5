import type { FrequentItemset, FrequentItemsetTable, Item } from "../core/types.js";
import type { MiningResult } from "../core/impl/miningPipeline.js";
import { formatItemset } from "../core/itemset.js";

export function renderItemsets(itemsets: readonly FrequentItemset[]): string {
  return itemsets.map((f) => `${formatItemset(f.items)}: ${f.support}`).join("\n");
}

/** One "Level k" block per size, in ascending order. */
export function renderTable(table: FrequentItemsetTable): string {
  if (table.size === 0) return "(no frequent itemsets)";
  const blocks: string[] = [];
  for (const [size, level] of table) {
    blocks.push(`Level ${size}\n${renderItemsets(Array.from(level.values()))}`);
  }
  return blocks.join("\n\n");
}

export function renderResult(result: MiningResult): string {
  const section = (title: string, itemsets: readonly FrequentItemset[]) =>
    `${title}\n${itemsets.length ? renderItemsets(itemsets) : "(none)"}`;

  return [
    `Transactions: ${result.transactionCount}, minimum support: ${result.minSupport}`,
    `Frequent itemsets\n${renderTable(result.table)}`,
    section("Maximal itemsets", result.maximal),
    section("Closed itemsets", result.closed),
  ].join("\n\n");
}

export interface ItemsetJson {
  items: Item[];
  support: number;
}

export interface MiningResultJson {
  transactionCount: number;
  minSupport: number;
  levels: Array<{ size: number; itemsets: ItemsetJson[] }>;
  maximal: ItemsetJson[];
  closed: ItemsetJson[];
}

function itemsetJson(f: FrequentItemset): ItemsetJson {
  return { items: [...f.items], support: f.support };
}

export function toJson(result: MiningResult): MiningResultJson {
  return {
    transactionCount: result.transactionCount,
    minSupport: result.minSupport,
    levels: Array.from(result.table, ([size, level]) => ({
      size,
      itemsets: Array.from(level.values(), itemsetJson),
    })),
    maximal: result.maximal.map(itemsetJson),
    closed: result.closed.map(itemsetJson),
  };
}

import type { FrequentItemset, FrequentItemsetTable, Item, Itemset, LevelMap } from "./types.js";

export function compareItems(a: Item, b: Item): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function toItemset(items: Iterable<Item>): Itemset {
  const sorted = Array.from(new Set(items)).sort(compareItems);
  return Object.freeze(sorted);
}

/** Adds `item` to a canonical itemset, keeping it sorted. */
export function withItem(itemset: Itemset, item: Item): Itemset {
  return toItemset([...itemset, item]);
}

/**
 * Stable map key for an itemset. JSON keeps multi-character items unambiguous.
 */
export function itemsetKey(itemset: Itemset): string {
  return JSON.stringify(itemset);
}

/** Merge walk over two canonical itemsets. */
export function isSubset(a: Itemset, b: Itemset): boolean {
  if (a.length > b.length) return false;
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const cmp = compareItems(a[i]!, b[j]!);
    if (cmp < 0) return false;
    if (cmp > 0) j++;
    else {
      i++;
      j++;
    }
  }
  return i === a.length;
}

export function isProperSubset(a: Itemset, b: Itemset): boolean {
  return a.length < b.length && isSubset(a, b);
}

/** All subsets of size `itemset.length - 1`. */
export function* immediateSubsets(itemset: Itemset): Iterable<Itemset> {
  for (let i = 0; i < itemset.length; i++) {
    yield Object.freeze([...itemset.slice(0, i), ...itemset.slice(i + 1)]);
  }
}

export function compareFrequent(a: FrequentItemset, b: FrequentItemset): number {
  if (a.items.length !== b.items.length) return a.items.length - b.items.length;
  for (let i = 0; i < a.items.length; i++) {
    const cmp = compareItems(a.items[i]!, b.items[i]!);
    if (cmp !== 0) return cmp;
  }
  return 0;
}

/** Every entry of the table, ordered by size then items. */
export function flattenTable(table: FrequentItemsetTable): FrequentItemset[] {
  const out: FrequentItemset[] = [];
  for (const level of table.values()) out.push(...level.values());
  return out.sort(compareFrequent);
}

export function formatItemset(itemset: Itemset): string {
  return `{${itemset.join(", ")}}`;
}

/**
 * Merges `source` levels into `target`. Entries are keyed by itemset so
 * repeated keys overwrite with the same value.
 */
export function mergeTables(target: Map<number, Map<string, FrequentItemset>>, source: FrequentItemsetTable): void {
  for (const [size, level] of source) {
    let dest = target.get(size);
    if (!dest) {
      dest = new Map();
      target.set(size, dest);
    }
    for (const [key, entry] of level) dest.set(key, entry);
  }
}

export function levelOf(table: FrequentItemsetTable, size: number): LevelMap {
  return table.get(size) ?? new Map();
}

/** Copy of `table` with sizes ascending and each level ordered by items. */
export function sortTable(table: FrequentItemsetTable): FrequentItemsetTable {
  const out = new Map<number, LevelMap>();
  for (const size of Array.from(table.keys()).sort((a, b) => a - b)) {
    const entries = Array.from(levelOf(table, size).values()).sort(compareFrequent);
    out.set(size, new Map(entries.map((e) => [itemsetKey(e.items), e])));
  }
  return out;
}

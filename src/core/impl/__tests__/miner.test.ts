import { describe, expect, it } from "vitest";
import type { FrequentItemsetMiner } from "../../miner.js";
import { InvalidOptionError, InvalidThresholdError, ResultLimitError } from "../../errors.js";
import { flattenTable, immediateSubsets, itemsetKey } from "../../itemset.js";
import { BreadthFirstJoinMiner } from "../breadthFirstJoinMiner.js";
import { DepthFirstMiner } from "../depthFirstMiner.js";
import { MemoryTransactionStore } from "../memoryTransactionStore.js";
import { BASKETS, charStore, pairs } from "./fixtures.js";

const miners: Array<[string, FrequentItemsetMiner]> = [
  ["DepthFirstMiner", new DepthFirstMiner()],
  ["BreadthFirstJoinMiner", new BreadthFirstJoinMiner()],
];

describe.each(miners)("%s", (_name, miner) => {
  it("mines the two-item example level by level", () => {
    const table = miner.mine(charStore("AB", "AB", "A"), 2);

    expect(Array.from(table.keys())).toEqual([1, 2]);
    expect(pairs(table)).toEqual([
      ["A", 3],
      ["B", 2],
      ["AB", 2],
    ]);
  });

  it("mines every frequent itemset of the basket data", () => {
    const table = miner.mine(charStore(...BASKETS), 2);

    expect(pairs(table)).toEqual([
      ["A", 4],
      ["B", 4],
      ["C", 5],
      ["E", 5],
      ["AB", 2],
      ["AC", 4],
      ["AE", 3],
      ["BC", 3],
      ["BE", 4],
      ["CE", 4],
      ["ABC", 2],
      ["ABE", 2],
      ["ACE", 3],
      ["BCE", 3],
      ["ABCE", 2],
    ]);
  });

  it("keeps exactly k items at level k", () => {
    const table = miner.mine(charStore(...BASKETS), 2);
    for (const [size, level] of table) {
      for (const entry of level.values()) expect(entry.items).toHaveLength(size);
    }
  });

  it("holds the Apriori closure property", () => {
    const table = miner.mine(charStore(...BASKETS), 2);
    for (const [size, level] of table) {
      if (size < 2) continue;
      const below = table.get(size - 1);
      for (const entry of level.values()) {
        for (const subset of immediateSubsets(entry.items)) {
          const found = below?.get(itemsetKey(subset));
          expect(found).toBeDefined();
          expect(found?.support).toBeGreaterThanOrEqual(entry.support);
        }
      }
    }
  });

  it("emits every itemset once", () => {
    const keys = flattenTable(miner.mine(charStore(...BASKETS), 1)).map((f) => itemsetKey(f.items));
    expect(new Set(keys).size).toBe(keys.length);
  });

  it("returns an empty table for an empty collection", () => {
    expect(miner.mine(new MemoryTransactionStore([]), 1).size).toBe(0);
  });

  it("returns an empty table when the threshold exceeds the transaction count", () => {
    expect(miner.mine(charStore(...BASKETS), 7).size).toBe(0);
  });

  it("treats a zero threshold as every combination of the item universe", () => {
    const table = miner.mine(charStore("AB", "C"), 0);
    expect(pairs(table)).toEqual([
      ["A", 1],
      ["B", 1],
      ["C", 1],
      ["AB", 1],
      ["AC", 0],
      ["BC", 0],
      ["ABC", 0],
    ]);
  });

  it("rejects negative and fractional thresholds", () => {
    const store = charStore("AB");
    expect(() => miner.mine(store, -1)).toThrow(InvalidThresholdError);
    expect(() => miner.mine(store, 1.5)).toThrow(InvalidThresholdError);
    expect(() => miner.mine(store, Number.NaN)).toThrow(InvalidThresholdError);
  });

  it("stops at maxSize", () => {
    const table = miner.mine(charStore(...BASKETS), 2, { maxSize: 2 });
    expect(Array.from(table.keys())).toEqual([1, 2]);
    expect(table.get(2)?.size).toBe(6);
  });

  it.each([0, -1, 1.5, Number.NaN])("rejects maxSize %s", (maxSize) => {
    expect(() => miner.mine(charStore(...BASKETS), 2, { maxSize })).toThrow(InvalidOptionError);
  });

  it("treats an infinite maxSize as unbounded", () => {
    const store = charStore(...BASKETS);
    expect(pairs(miner.mine(store, 2, { maxSize: Number.POSITIVE_INFINITY }))).toEqual(pairs(miner.mine(store, 2)));
  });

  it("throws once the itemset count passes maxItemsets", () => {
    const store = charStore(...BASKETS);
    expect(() => miner.mine(store, 2, { maxItemsets: 14 })).toThrow(ResultLimitError);
    expect(flattenTable(miner.mine(store, 2, { maxItemsets: 15 }))).toHaveLength(15);
    expect(flattenTable(miner.mine(store, 2, { maxItemsets: 10, maxSize: 2 }))).toHaveLength(10);
    expect(() => miner.mine(store, 2, { maxItemsets: 0 })).toThrow("maxItemsets must be a positive integer, got 0");
  });

  it("bounds a single wide transaction at a zero threshold", () => {
    expect(() => miner.mine(charStore("ABCDEFGHIJKLMNOPQRST"), 0, { maxItemsets: 1000 })).toThrow(
      "more than 1000 frequent itemsets; raise minSupport or lower maxSize",
    );
  });

  it("throws the abort reason when cancelled", () => {
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));
    expect(() => miner.mine(charStore(...BASKETS), 2, { signal: controller.signal })).toThrow("cancelled");
  });

  it("passes requireNonEmpty through to the index", () => {
    expect(() => miner.mine(new MemoryTransactionStore([]), 1, { requireNonEmpty: true })).toThrow(/empty/);
  });
});

describe("DepthFirstMiner against BreadthFirstJoinMiner", () => {
  // deterministic pseudo-random baskets over A..H
  function randomBaskets(seed: number, count: number): string[] {
    let state = seed;
    const next = () => {
      state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
      return state / 4294967296;
    };
    const universe = "ABCDEFGH";
    return Array.from({ length: count }, () =>
      Array.from(universe)
        .filter(() => next() < 0.45)
        .join(""),
    );
  }

  it.each([
    [1, 20, 3],
    [7, 30, 5],
    [42, 15, 2],
    [99, 40, 8],
  ])("produce identical tables (seed %i, %i baskets, min support %i)", (seed, count, minSupport) => {
    const store = charStore(...randomBaskets(seed, count));
    const dfs = new DepthFirstMiner().mine(store, minSupport);
    const bfs = new BreadthFirstJoinMiner().mine(store, minSupport);
    expect(pairs(dfs)).toEqual(pairs(bfs));
  });
});

import { describe, expect, it } from "vitest";
import { EmptyInputError } from "../../errors.js";
import { MemoryTransactionStore } from "../memoryTransactionStore.js";
import { BASKETS, charStore } from "./fixtures.js";

describe("MemoryTransactionStore", () => {
  it("assigns ids by position and collapses duplicate items", () => {
    const store = new MemoryTransactionStore([["A", "A", "B"], ["C"]]);
    const txs = Array.from(store.transactions());

    expect(store.size).toBe(2);
    expect(txs.map((t) => t.id)).toEqual([0, 1]);
    expect(Array.from(txs[0]!.items)).toEqual(["A", "B"]);
  });

  it("builds postings containing exactly the transactions with each item", () => {
    const index = charStore(...BASKETS).buildIndex();

    expect(index.transactionCount).toBe(6);
    expect(index.items()).toEqual(["A", "B", "C", "D", "E"]);
    expect(Array.from(index.getPostings("A") ?? [])).toEqual([0, 1, 3, 5]);
    expect(Array.from(index.getPostings("D") ?? [])).toEqual([1]);
    expect(Array.from(index.getPostings("E") ?? [])).toEqual([0, 2, 3, 4, 5]);
  });

  it("leaves items that never occur out of the index", () => {
    const index = charStore("AB").buildIndex();
    expect(index.getPostings("Z")).toBeUndefined();
    expect(index.hasItem("Z")).toBe(false);
    expect(index.hasItem("A")).toBe(true);
  });

  it("yields an empty index for an empty collection", () => {
    const index = new MemoryTransactionStore([]).buildIndex();
    expect(index.transactionCount).toBe(0);
    expect(index.items()).toEqual([]);
  });

  it("rejects an empty collection only when asked to", () => {
    const store = new MemoryTransactionStore([]);
    expect(() => store.buildIndex({ requireNonEmpty: true })).toThrow(EmptyInputError);
    expect(() => charStore("A").buildIndex({ requireNonEmpty: true })).not.toThrow();
  });
});

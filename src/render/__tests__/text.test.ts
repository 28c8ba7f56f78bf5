import { describe, expect, it } from "vitest";
import { createPipeline } from "../../core/impl/index.js";
import { renderItemsets, renderResult, renderTable, toJson } from "../text.js";

describe("text rendering", () => {
  const result = createPipeline().run([["A", "B"], ["A", "B"], ["A"]], 2);

  it("renders one line per itemset", () => {
    expect(renderItemsets(result.maximal)).toBe("{A, B}: 2");
  });

  it("renders levels in ascending order", () => {
    expect(renderTable(result.table)).toBe("Level 1\n{A}: 3\n{B}: 2\n\nLevel 2\n{A, B}: 2");
  });

  it("renders the whole result", () => {
    expect(renderResult(result)).toBe(
      [
        "Transactions: 3, minimum support: 2",
        "Frequent itemsets\nLevel 1\n{A}: 3\n{B}: 2\n\nLevel 2\n{A, B}: 2",
        "Maximal itemsets\n{A, B}: 2",
        "Closed itemsets\n{A}: 3\n{A, B}: 2",
      ].join("\n\n"),
    );
  });

  it("marks empty results", () => {
    const empty = createPipeline().run([], 1);
    expect(renderResult(empty)).toBe(
      "Transactions: 0, minimum support: 1\n\nFrequent itemsets\n(no frequent itemsets)\n\nMaximal itemsets\n(none)\n\nClosed itemsets\n(none)",
    );
  });
});

describe("toJson", () => {
  it("serializes levels and summaries", () => {
    const result = createPipeline().run([["A", "B"], ["A", "B"], ["A"]], 2);
    expect(toJson(result)).toEqual({
      transactionCount: 3,
      minSupport: 2,
      levels: [
        {
          size: 1,
          itemsets: [
            { items: ["A"], support: 3 },
            { items: ["B"], support: 2 },
          ],
        },
        { size: 2, itemsets: [{ items: ["A", "B"], support: 2 }] },
      ],
      maximal: [{ items: ["A", "B"], support: 2 }],
      closed: [
        { items: ["A"], support: 3 },
        { items: ["A", "B"], support: 2 },
      ],
    });
  });
});

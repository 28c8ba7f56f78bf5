import type { FrequentItemset, FrequentItemsetTable, Item } from "../types.js";
import type { FrequentItemsetMiner, MineOptions } from "../miner.js";
import type { SummaryExtractor } from "../summary.js";
import type { TransactionStore } from "../transactionStore.js";
import { MemoryTransactionStore } from "./memoryTransactionStore.js";

export interface PipelineDeps {
  miner: FrequentItemsetMiner;
  summary: SummaryExtractor;
}

export interface MiningResult {
  transactionCount: number;
  minSupport: number;
  table: FrequentItemsetTable;
  maximal: FrequentItemset[];
  closed: FrequentItemset[];
}

/**
 * Store -> miner -> summary. The table is complete before extraction starts.
 */
export class MiningPipeline {
  constructor(private readonly deps: PipelineDeps) {}

  run(transactions: Iterable<Iterable<Item>> | TransactionStore, minSupport: number, options?: MineOptions): MiningResult {
    const store = toStore(transactions);
    const table = this.deps.miner.mine(store, minSupport, options);
    const { maximal, closed } = this.deps.summary.summarize(table);
    return { transactionCount: store.size, minSupport, table, maximal, closed };
  }
}

function toStore(input: Iterable<Iterable<Item>> | TransactionStore): TransactionStore {
  if (isStore(input)) return input;
  return new MemoryTransactionStore(input);
}

function isStore(input: Iterable<Iterable<Item>> | TransactionStore): input is TransactionStore {
  return "buildIndex" in input && typeof input.buildIndex === "function";
}

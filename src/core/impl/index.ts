export { MemoryInvertedIndex, MemoryTransactionStore } from "./memoryTransactionStore.js";
export { IntersectionSupportCounter } from "./intersectionSupportCounter.js";
export { DepthFirstMiner, frequentItems } from "./depthFirstMiner.js";
export { BreadthFirstJoinMiner } from "./breadthFirstJoinMiner.js";
export { LevelSummaryExtractor } from "./levelSummaryExtractor.js";
export {
  CharacterItemExtractor,
  TokenItemExtractor,
  createItemExtractor,
  type TokenItemExtractorOptions,
} from "./itemExtractors.js";
export { MiningPipeline, type MiningResult, type PipelineDeps } from "./miningPipeline.js";

export type * from "../types.js";
export type { InvertedIndex, TransactionStore, BuildIndexOptions } from "../transactionStore.js";
export type { SupportCounter } from "../supportCounter.js";
export type { FrequentItemsetMiner, MineOptions } from "../miner.js";
export type { SummaryExtractor, ItemsetSummary } from "../summary.js";
export type { ItemExtractor, ItemMode } from "../itemExtractor.js";
export * from "../errors.js";
export * from "../itemset.js";

import { BreadthFirstJoinMiner } from "./breadthFirstJoinMiner.js";
import { DepthFirstMiner } from "./depthFirstMiner.js";
import { IntersectionSupportCounter } from "./intersectionSupportCounter.js";
import { LevelSummaryExtractor } from "./levelSummaryExtractor.js";
import { MiningPipeline } from "./miningPipeline.js";

export type Algorithm = "dfs" | "bfs";

export function createPipeline(algorithm: Algorithm = "dfs"): MiningPipeline {
  const counter = new IntersectionSupportCounter();
  const miner = algorithm === "bfs" ? new BreadthFirstJoinMiner(counter) : new DepthFirstMiner(counter);
  return new MiningPipeline({ miner, summary: new LevelSummaryExtractor() });
}

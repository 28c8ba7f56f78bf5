import {
  CharacterItemExtractor,
  TokenItemExtractor,
  createPipeline,
  type Algorithm,
  type Item,
  type ItemExtractor,
  type ItemMode,
} from "../core/impl/index.js";
import { toJson, type MiningResultJson } from "../render/text.js";

export interface MineRequest {
  /** A string is run through the extractor for `mode`; an array is taken as items. */
  transactions: Array<string | string[]>;
  minSupport: number;
  mode: ItemMode;
  algorithm: Algorithm;
  maxSize?: number;
  /** Refuse the request once mining finds more itemsets than this. */
  maxItemsets?: number;
  requireNonEmpty?: boolean;
}

export interface Engine {
  mine(req: MineRequest): MiningResultJson;
}

export function createMiningEngine(): Engine {
  const extractors: Record<ItemMode, ItemExtractor> = {
    characters: new CharacterItemExtractor(),
    tokens: new TokenItemExtractor(),
  };
  const pipelines = { dfs: createPipeline("dfs"), bfs: createPipeline("bfs") };

  return {
    mine(req) {
      const extractor = extractors[req.mode];
      const rows: Array<Iterable<Item>> = req.transactions.map((t) => (typeof t === "string" ? extractor.extract(t) : t));
      const result = pipelines[req.algorithm].run(rows, req.minSupport, {
        maxSize: req.maxSize,
        maxItemsets: req.maxItemsets,
        requireNonEmpty: req.requireNonEmpty,
      });
      return toJson(result);
    },
  };
}

import type { Item } from "./types.js";

export type ItemMode = "characters" | "tokens";

/**
 * Turns one raw cell of input into the items of a transaction.
 *
 * Contract notes:
 * - deterministic for a given input
 * - may yield duplicates; transactions collapse them
 */
export interface ItemExtractor {
  readonly mode: ItemMode;
  extract(value: string): Iterable<Item>;
}

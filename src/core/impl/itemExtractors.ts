import type { Item } from "../types.js";
import type { ItemExtractor, ItemMode } from "../itemExtractor.js";

/**
 * Every character (code point) of the cell is an item: "AAB" -> A, A, B.
 * Whitespace and punctuation are items too.
 */
export class CharacterItemExtractor implements ItemExtractor {
  readonly mode = "characters" as const;

  *extract(value: string): Iterable<Item> {
    for (const ch of value) yield ch;
  }
}

export interface TokenItemExtractorOptions {
  /** Default: runs of whitespace, commas or semicolons. */
  delimiter?: RegExp;
  /** If true, lowercase every token. */
  normalizeCase?: boolean;
}

const DEFAULT_DELIMITER = /[\s,;]+/;

/**
 * Word-level items:
 * - splits on the delimiter
 * - drops empty tokens
 * - optionally lowercases
 */
export class TokenItemExtractor implements ItemExtractor {
  readonly mode = "tokens" as const;
  private readonly delimiter: RegExp;
  private readonly normalizeCase: boolean;

  constructor(options: TokenItemExtractorOptions = {}) {
    this.delimiter = options.delimiter ?? DEFAULT_DELIMITER;
    this.normalizeCase = options.normalizeCase ?? false;
  }

  *extract(value: string): Iterable<Item> {
    for (const raw of value.split(this.delimiter)) {
      const token = raw.trim();
      if (!token.length) continue;
      yield this.normalizeCase ? token.toLowerCase() : token;
    }
  }
}

export function createItemExtractor(mode: ItemMode): ItemExtractor {
  switch (mode) {
    case "characters":
      return new CharacterItemExtractor();
    case "tokens":
      return new TokenItemExtractor();
  }
}

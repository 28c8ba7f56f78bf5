import type { Item, Transaction, TxId } from "./types.js";

export interface BuildIndexOptions {
  /** If true, an empty collection throws `EmptyInputError`. */
  requireNonEmpty?: boolean;
}

/**
 * Item -> set of transaction ids containing it.
 *
 * Contract notes:
 * - built once from a transaction collection, read-only afterwards
 * - an item that occurs in no transaction has no postings (`undefined`)
 */
export interface InvertedIndex {
  readonly transactionCount: number;

  getPostings(item: Item): ReadonlySet<TxId> | undefined;
  hasItem(item: Item): boolean;

  /** Indexed items in ascending item order. */
  items(): Item[];
}

/**
 * Holds a transaction collection. A transaction's position is its id for the
 * lifetime of the store.
 */
export interface TransactionStore {
  readonly size: number;
  transactions(): Iterable<Transaction>;
  buildIndex(options?: BuildIndexOptions): InvertedIndex;
}

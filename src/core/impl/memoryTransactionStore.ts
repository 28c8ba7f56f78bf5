import type { Item, Transaction, TxId } from "../types.js";
import type { BuildIndexOptions, InvertedIndex, TransactionStore } from "../transactionStore.js";
import { compareItems } from "../itemset.js";
import { EmptyInputError } from "../errors.js";

/**
 * Simple in-memory inverted index.
 *
 * Data structure:
 * - item -> Set<TxId>
 */
export class MemoryInvertedIndex implements InvertedIndex {
  constructor(
    private readonly itemToTxIds: ReadonlyMap<Item, ReadonlySet<TxId>>,
    readonly transactionCount: number,
  ) {}

  getPostings(item: Item): ReadonlySet<TxId> | undefined {
    return this.itemToTxIds.get(item);
  }

  hasItem(item: Item): boolean {
    const s = this.itemToTxIds.get(item);
    return !!s && s.size > 0;
  }

  items(): Item[] {
    return Array.from(this.itemToTxIds.keys()).sort(compareItems);
  }
}

export class MemoryTransactionStore implements TransactionStore {
  private readonly txs: readonly Transaction[];

  constructor(rows: Iterable<Iterable<Item>>) {
    const txs: Transaction[] = [];
    for (const row of rows) {
      txs.push({ id: txs.length, items: new Set(row) });
    }
    this.txs = txs;
  }

  get size(): number {
    return this.txs.length;
  }

  transactions(): Iterable<Transaction> {
    return this.txs;
  }

  buildIndex(options?: BuildIndexOptions): InvertedIndex {
    if (options?.requireNonEmpty && this.txs.length === 0) {
      throw new EmptyInputError();
    }

    const itemToTxIds = new Map<Item, Set<TxId>>();
    for (const tx of this.txs) {
      for (const item of tx.items) {
        let postings = itemToTxIds.get(item);
        if (!postings) {
          postings = new Set();
          itemToTxIds.set(item, postings);
        }
        postings.add(tx.id);
      }
    }

    return new MemoryInvertedIndex(itemToTxIds, this.txs.length);
  }
}

import { ResultLimitError } from "../errors.js";

/** Counts recorded itemsets against `MineOptions.maxItemsets`. */
export class ItemsetBudget {
  private used = 0;

  constructor(private readonly limit: number = Number.POSITIVE_INFINITY) {}

  take(count = 1): void {
    this.used += count;
    if (this.used > this.limit) throw new ResultLimitError(this.limit);
  }
}

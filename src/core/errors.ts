export type MiningErrorCode =
  | "INVALID_THRESHOLD"
  | "INVALID_OPTION"
  | "RESULT_LIMIT"
  | "EMPTY_INPUT"
  | "MALFORMED_ROW"
  | "INVALID_CONFIG";

export class MiningError extends Error {
  constructor(
    readonly code: MiningErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidThresholdError extends MiningError {
  constructor(readonly threshold: number) {
    super("INVALID_THRESHOLD", `minimum support must be an integer >= 0, got ${threshold}`);
  }
}

export class InvalidOptionError extends MiningError {
  constructor(
    readonly option: string,
    readonly value: number,
  ) {
    super("INVALID_OPTION", `${option} must be a positive integer, got ${value}`);
  }
}

/** Raised once a run finds more frequent itemsets than `maxItemsets` allows. */
export class ResultLimitError extends MiningError {
  constructor(readonly limit: number) {
    super("RESULT_LIMIT", `more than ${limit} frequent itemsets; raise minSupport or lower maxSize`);
  }
}

export class EmptyInputError extends MiningError {
  constructor() {
    super("EMPTY_INPUT", "transaction collection is empty");
  }
}

export class MalformedRowError extends MiningError {
  constructor(
    /** 1-based data row, header excluded. */
    readonly row: number,
    readonly column: string,
  ) {
    super("MALFORMED_ROW", `row ${row} has no "${column}" field`);
  }
}

export class ConfigError extends MiningError {
  constructor(readonly issues: string[]) {
    super("INVALID_CONFIG", `invalid configuration: ${issues.join("; ")}`);
  }
}

/** Throws `InvalidThresholdError` unless `minSupport` is a non-negative integer. */
export function assertThreshold(minSupport: number): void {
  if (!Number.isInteger(minSupport) || minSupport < 0) {
    throw new InvalidThresholdError(minSupport);
  }
}

/** Throws `InvalidOptionError` unless `value` is omitted, `Infinity` or a positive integer. */
export function assertLimit(option: string, value: number | undefined): void {
  if (value === undefined || value === Number.POSITIVE_INFINITY) return;
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidOptionError(option, value);
  }
}

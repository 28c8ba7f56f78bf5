import fs from "node:fs/promises";
import { parse } from "csv-parse/sync";

import type { Item } from "../core/types.js";
import type { ItemExtractor } from "../core/itemExtractor.js";
import { MalformedRowError } from "../core/errors.js";
import { CharacterItemExtractor } from "../core/impl/itemExtractors.js";
import { getLogger } from "../logging/logger.js";

const logger = getLogger("CsvTransactions");

export interface ReadTransactionsOptions {
  /** Header name of the column holding each transaction. Default "items". */
  column?: string;
  extractor?: ItemExtractor;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Parses CSV text with a header row into one item set per data row.
 * Cells are not trimmed: under character extraction a space is an item.
 */
export function parseTransactions(content: string, options: ReadTransactionsOptions = {}): Array<Set<Item>> {
  const column = options.column ?? "items";
  const extractor = options.extractor ?? new CharacterItemExtractor();

  const records: unknown = parse(content.replace(/^\uFEFF/, ""), {
    columns: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  if (!Array.isArray(records)) return [];

  return records.map((record: unknown, i) => {
    const cell = isRecord(record) ? record[column] : undefined;
    if (typeof cell !== "string") throw new MalformedRowError(i + 1, column);
    return new Set(extractor.extract(cell));
  });
}

export async function readTransactions(filePath: string, options: ReadTransactionsOptions = {}): Promise<Array<Set<Item>>> {
  const content = await fs.readFile(filePath, "utf-8");
  const rows = parseTransactions(content, options);
  logger.info({ filePath, rows: rows.length, mode: options.extractor?.mode ?? "characters" }, "read transactions");
  return rows;
}

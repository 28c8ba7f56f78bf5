import { Command, InvalidArgumentError, Option } from "commander";

import type { MinerConfig } from "../config/config.js";
import { createItemExtractor, createPipeline, type Algorithm, type ItemMode } from "../core/impl/index.js";
import { readTransactions } from "../ingest/csvTransactions.js";
import { getLogger } from "../logging/logger.js";
import { renderResult, toJson } from "../render/text.js";

const logger = getLogger("CLI");

export interface MineCommandOptions {
  minSupport?: number;
  mode?: ItemMode;
  column?: string;
  maxSize?: number;
  algorithm: Algorithm;
  json: boolean;
}

function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError("must be a non-negative integer");
  return Number.parseInt(value, 10);
}

function parseSize(value: string): number {
  if (!/^[1-9]\d*$/.test(value)) throw new InvalidArgumentError("must be a positive integer");
  return Number.parseInt(value, 10);
}

/** Reads, mines and prints. Returns the text written to stdout. */
export async function runMine(file: string | undefined, opts: MineCommandOptions, config: MinerConfig): Promise<string> {
  const filePath = file ?? config.dataFile;
  const minSupport = opts.minSupport ?? config.minSupport;
  const mode = opts.mode ?? config.itemMode;

  const rows = await readTransactions(filePath, {
    column: opts.column ?? config.itemsColumn,
    extractor: createItemExtractor(mode),
  });

  logger.info({ filePath, minSupport, mode, algorithm: opts.algorithm }, "mining");
  const result = createPipeline(opts.algorithm).run(rows, minSupport, { maxSize: opts.maxSize });

  return opts.json ? JSON.stringify(toJson(result), null, 2) : renderResult(result);
}

export function buildProgram(config: MinerConfig): Command {
  const program = new Command();

  program
    .name("itemset-miner")
    .description("Mine frequent, maximal and closed itemsets from a CSV of transactions")
    .version("0.1.0")
    .argument("[file]", `CSV file with an items column (default: ${config.dataFile})`)
    .option("-s, --min-support <count>", "absolute minimum support", parseCount)
    .addOption(new Option("-m, --mode <mode>", "item extraction").choices(["characters", "tokens"]))
    .option("-c, --column <name>", "items column header")
    .option("--max-size <size>", "largest itemset size to explore", parseSize)
    .addOption(new Option("-a, --algorithm <name>", "mining algorithm").choices(["dfs", "bfs"]).default("dfs"))
    .option("--json", "print JSON instead of text", false)
    .action(async (file: string | undefined, opts: MineCommandOptions) => {
      process.stdout.write(`${await runMine(file, opts, config)}\n`);
    });

  return program;
}

#!/usr/bin/env node
import { buildProgram } from "./cli/mineCommand.js";
import { loadConfig } from "./config/config.js";
import { getLogger } from "./logging/logger.js";

const logger = getLogger("CLI");

async function main(): Promise<void> {
  const config = loadConfig();
  await buildProgram(config).parseAsync();
}

main().catch((error: unknown) => {
  logger.error({ err: error }, `mining failed: ${String(error)}`);
  process.exit(1);
});

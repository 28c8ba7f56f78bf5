import { z } from "zod";

import { ConfigError } from "../core/errors.js";

const integerString = (name: string) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, { message: `${name} must be a non-negative integer` })
    .transform((value: string) => Number.parseInt(value, 10));

export const minerEnvSchema = z.object({
  DATA_FILE: z.string().trim().min(1, { message: "Invalid data file path" }).default("data/test.csv"),
  MIN_SUPPORT: integerString("MIN_SUPPORT").default("2"),
  ITEM_MODE: z.enum(["characters", "tokens"]).default("characters"),
  ITEMS_COLUMN: z.string().trim().min(1, { message: "Invalid items column name" }).default("items"),
  PORT: integerString("PORT")
    .refine((port: number) => port <= 65535, { message: "PORT must be <= 65535" })
    .default("3000"),
  MAX_ITEMSETS: integerString("MAX_ITEMSETS")
    .refine((limit: number) => limit >= 1, { message: "MAX_ITEMSETS must be >= 1" })
    .default("100000"),
});

export type MinerEnv = z.infer<typeof minerEnvSchema>;

/**
 * Explicit configuration handed to the ingestion, CLI and HTTP layers.
 * Logging reads its own variables; see `getLogger`.
 */
export interface MinerConfig {
  dataFile: string;
  minSupport: number;
  itemMode: MinerEnv["ITEM_MODE"];
  itemsColumn: string;
  port: number;
  /** Per-request ceiling for the HTTP layer. */
  maxItemsets: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MinerConfig {
  const parsed = minerEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }

  const e = parsed.data;
  return {
    dataFile: e.DATA_FILE,
    minSupport: e.MIN_SUPPORT,
    itemMode: e.ITEM_MODE,
    itemsColumn: e.ITEMS_COLUMN,
    port: e.PORT,
    maxItemsets: e.MAX_ITEMSETS,
  };
}

import { pino, type Logger } from "pino";
import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const loggerEnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  LOGGER_SERVICE_NAME: z.string().trim().min(1).default("itemset-miner"),
  NODE_ENV: z.enum(["production", "development", "test"]).default("development"),
});

export type LoggerEnv = z.infer<typeof loggerEnvSchema>;

/**
 * Formats a category label to a fixed width, truncating from the left with an
 * ellipsis when it is too long.
 */
function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

const loggerCache = new Map<string, Logger>();
let rootLogger: Logger | undefined;

// stdout carries command output (`itemset-miner --json`); logs go to stderr.
function createRootLogger(env: LoggerEnv): Logger {
  return pino(
    {
      base: {
        environment: env.NODE_ENV,
        pid: process.pid,
        service: env.LOGGER_SERVICE_NAME,
      },
      level: env.LOG_LEVEL,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    process.stderr,
  );
}

/**
 * Returns a cached child logger for `category`.
 * The root logger reads LOG_LEVEL, LOGGER_SERVICE_NAME and NODE_ENV once.
 */
export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger(loggerEnvSchema.parse(process.env));
  }

  const logger = rootLogger.child({ category, categoryLabel: formatLabel(category, 20) });
  loggerCache.set(category, logger);
  return logger;
}

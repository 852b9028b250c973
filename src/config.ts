import { z } from "zod";
import { InvalidArgumentError } from "./errors.js";

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

const flag = z.enum(["true", "false"]).transform((v) => v === "true");

const EnvSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default("info"),
  logPretty: flag.default("false"),
  expressionCacheSize: z.coerce.number().int().min(0).max(100_000).default(256),
});

export type LogLevelName = (typeof LOG_LEVELS)[number];

export interface QueryConfig {
  logLevel: LogLevelName;
  logPretty: boolean;
  /** Compiled expressions kept by the default evaluator; 0 disables the cache. */
  expressionCacheSize: number;
}

type Env = Record<string, string | undefined>;

function read(env: Env, ...names: string[]): string | undefined {
  for (const name of names) {
    const v = env[name]?.trim();
    if (v) return v;
  }
  return undefined;
}

/**
 * Build the configuration from environment variables.
 *
 * TABLEQUERY_LOG_LEVEL (or LOG_LEVEL), TABLEQUERY_LOG_PRETTY and
 * TABLEQUERY_EXPRESSION_CACHE_SIZE; unset variables take their defaults.
 */
export function loadConfig(env: Env = process.env): QueryConfig {
  const parsed = EnvSchema.safeParse({
    logLevel: read(env, "TABLEQUERY_LOG_LEVEL", "LOG_LEVEL")?.toLowerCase(),
    logPretty: read(env, "TABLEQUERY_LOG_PRETTY")?.toLowerCase(),
    expressionCacheSize: read(env, "TABLEQUERY_EXPRESSION_CACHE_SIZE"),
  });
  if (!parsed.success) {
    const keys = parsed.error.issues.map((i) => i.path.join(".")).join(", ");
    throw new InvalidArgumentError(`Invalid configuration: ${keys}`, { cause: parsed.error });
  }
  return parsed.data;
}

let current: QueryConfig | undefined;

/** Process-wide configuration, read once from process.env. */
export function getConfig(): QueryConfig {
  current ??= loadConfig();
  return current;
}

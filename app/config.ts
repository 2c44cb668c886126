import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "../host/logger";

export const BACKENDS = ["memory", "local", "sqlite"] as const;
export type Backend = (typeof BACKENDS)[number];

export type AcidConfig = {
  backend: Backend;
  /** Directory of the local backend. */
  dir: string;
  sqlitePath: string;
  batch: { size: number; intervalMs: number };
  retryAttempts: number;
  logLevel: LogLevel;
};

const envSchema = z.object({
  ACID_BACKEND: z.enum(BACKENDS).default("memory"),
  ACID_DIR: z.string().min(1).default("state"),
  ACID_SQLITE_PATH: z.string().min(1).default("state.db"),
  ACID_BATCH_SIZE: z.coerce.number().int().positive().default(128),
  ACID_BATCH_INTERVAL_MS: z.coerce.number().int().nonnegative().default(0),
  ACID_RETRY_ATTEMPTS: z.coerce.number().int().positive().default(5),
  ACID_LOG_LEVEL: z.enum(LOG_LEVELS).default("warn"),
});

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/** Read the configuration from environment variables. */
export function loadConfig(env: Record<string, string | undefined> = process.env): AcidConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    backend: e.ACID_BACKEND,
    dir: e.ACID_DIR,
    sqlitePath: e.ACID_SQLITE_PATH,
    batch: { size: e.ACID_BATCH_SIZE, intervalMs: e.ACID_BATCH_INTERVAL_MS },
    retryAttempts: e.ACID_RETRY_ATTEMPTS,
    logLevel: e.ACID_LOG_LEVEL,
  };
}

import type { AcidState, Acidic } from "@acid-handle/core";
import type { HostOptions } from "../host/acid-host";
import { createRootLogger, type Logger } from "../host/logger";
import type { Metrics } from "../host/metrics";
import { openLocalState } from "./backends/local";
import { openMemoryState } from "./backends/memory";
import { openSqliteState } from "./backends/sqlite";
import { loadConfig, type AcidConfig } from "./config";

export type BootstrapOptions = {
  logger?: Logger;
  metrics?: Metrics;
  clock?: () => string;
};

/** Open `acidic` on the backend the configuration names. */
export function openAcidState<S>(
  acidic: Acidic<S>,
  config: AcidConfig = loadConfig(),
  opts: BootstrapOptions = {},
): Promise<AcidState<S>> {
  const host: HostOptions = {
    logger: opts.logger ?? createRootLogger(config.logLevel),
    metrics: opts.metrics,
    clock: opts.clock,
    batch: config.batch,
    retry: { attempts: config.retryAttempts },
  };
  switch (config.backend) {
    case "memory":
      return openMemoryState(acidic, host);
    case "local":
      return openLocalState(acidic, config.dir, host);
    case "sqlite":
      return openSqliteState(acidic, config.sqlitePath, host);
    default: {
      const _exhaustive: never = config.backend;
      throw new Error(`unknown backend: ${String(_exhaustive)}`);
    }
  }
}

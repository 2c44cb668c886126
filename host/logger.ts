import pino, { type Logger } from "pino";

export type { Logger };
export const LOG_LEVELS = ["silent", "fatal", "error", "warn", "info", "debug", "trace"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Root logger: JSON lines on stderr with ISO timestamps.
 * Backends log through `child({ component })` loggers.
 */
export function createRootLogger(level: LogLevel = "warn"): Logger {
  return pino(
    {
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true }),
  );
}

let _root: Logger | null = null;

/** Process-wide logger used when a caller supplies none. */
export function getRootLogger(): Logger {
  if (!_root) {
    const level = process.env["ACID_LOG_LEVEL"]?.toLowerCase();
    _root = createRootLogger(LOG_LEVELS.find(l => l === level) ?? "warn");
  }
  return _root;
}

export const silentLogger: Logger = pino({ level: "silent" });

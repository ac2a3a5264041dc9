import { pino, type Logger } from "pino";

export type { Logger } from "pino";

export interface LoggingConfig {
  readonly level: "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";
  readonly pretty?: boolean;
}

export function createLogger(config: LoggingConfig): Logger {
  return pino({
    name: "corpus-index",
    level: config.level,
    ...(config.pretty === true ? { transport: { target: "pino-pretty" } } : {}),
  });
}

/**
 * Logger used when the caller supplies none
 */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

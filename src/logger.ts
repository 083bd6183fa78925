import { consola, LogLevels } from "consola";

/**
 * Shared logger. Rules log at debug level; the CLI raises or lowers the level.
 */
export const logger = consola.withTag("sqlterm");

export type LogLevelName = "silent" | "warn" | "info" | "debug";

export function setLogLevel(level: LogLevelName): void {
  logger.level = LogLevels[level];
}

/**
 * Logger factory
 *
 * pino-backed implementation of the core Logger interface.
 * Silent unless a level is configured, so library callers opt in.
 */

import pino from "pino";
import type { Logger } from "#/core";
import { LoggerConfigSchema, type LoggerConfig } from "#/schemas";

export function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  const { name, level } = LoggerConfigSchema.parse(config);
  return pino({ name, level });
}

/**
 * Logger that drops everything. Used when the caller injects none.
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
};

/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import type { LogFields, Logger } from "#/core";

export type LogLevelName = "debug" | "info" | "warn";

export interface RecordedLog {
  level: LogLevelName;
  fields: LogFields;
  message: string;
}

/**
 * Create a mock Logger that records every call in memory
 */
export function createMockLogger(): Logger & { entries: RecordedLog[] } {
  const entries: RecordedLog[] = [];

  const record = (level: LogLevelName) => (fields: LogFields, message: string): void => {
    entries.push({ level, fields, message });
  };

  return {
    entries,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
  };
}

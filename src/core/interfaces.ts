/**
 * Core interfaces for dependency injection.
 * The engine does no I/O of its own; anything with side effects is passed in.
 */

export type LogFields = Record<string, unknown>;

/**
 * Structured logger. A pino logger satisfies this interface.
 */
export interface Logger {
  debug(fields: LogFields, message: string): void;
  info(fields: LogFields, message: string): void;
  warn(fields: LogFields, message: string): void;
}

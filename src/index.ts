/**
 * dotver
 *
 * Dotted version parsing, ordering and wildcard compatibility matching.
 * Pure and synchronous; logging is injected.
 */

// Core interfaces
export * from '#/core';

// Version (parse, render, compare, match)
export * from '#/version';

// Friendly errors (result types, YAML + Zod parsing)
export * from '#/friendly-errors';

// Schemas (Zod validation)
export * from '#/schemas';

// Logger (pino)
export * from '#/logger';

// Requirements (resolution against catalogs)
export * from '#/requirements';

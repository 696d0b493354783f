/**
 * Requirements module types
 */

import type { Version, VersionPattern } from "#/version";

/**
 * Pattern each package must satisfy, keyed by package name
 */
export type Requirements = Record<string, VersionPattern>;

/**
 * Concrete versions available per package name
 */
export type VersionCatalog = Record<string, readonly Version[]>;

/**
 * Outcome of resolving a single requirement against the catalog
 */
export interface ResolutionResult {
  name: string;
  requirement: string;
  resolved: string | null; // null if nothing in the catalog is compatible
  candidates: number; // compatible catalog entries
}

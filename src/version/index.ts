/**
 * Version module
 *
 * Dotted version parsing, ordering and wildcard compatibility matching.
 */

export {
  parse,
  parseVersion,
  parsePattern,
  safeParse,
  safeParseVersion,
  safeParsePattern,
  createVersion,
  anyVersion,
  toPattern,
  asVersion,
  isVersion,
  isPattern,
  hasWildcards,
  isFullyWildcard,
  render,
  serialize,
  deserialize,
  compareVersions,
  equals,
  isGreaterThan,
  isLessThan,
  sortVersionsDesc,
  sortVersionsAsc,
  latestVersion,
} from "./version";
export { isCompatibleWith, latestCompatibleVersion, latestCompatible } from "./matching";
export { VersionParseError, VersionContractError } from "./version.errors";
export type {
  Component,
  Version,
  VersionPattern,
  VersionLike,
  VersionParseErrorReason,
} from "./version.types";

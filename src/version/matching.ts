/**
 * Compatibility matching
 *
 * Tests concrete versions against patterns and picks the best match
 * from a candidate list.
 */

import { asVersion, compareVersions, hasWildcards, safeParse, toPattern } from "./version";
import type { Version, VersionLike, VersionPattern } from "./version.types";

/**
 * Check if a concrete version satisfies a pattern.
 *
 * Positions are aligned from the most significant component. A "*" matches
 * anything. Positions past the end of the pattern always match ("1.2" accepts
 * "1.2.7"); positions past the end of the version compare as 0 ("1.2" satisfies
 * "1.2.0" but not "1.2.1").
 *
 * @example isCompatibleWith(parse("2.3.4"), parse("2.*.*")) → true
 * @example isCompatibleWith(parse("2.4.4"), parse("2.3.*")) → false
 */
export function isCompatibleWith(version: Version, pattern: VersionLike): boolean {
  const requirement: VersionPattern = pattern.kind === "version" ? toPattern(pattern) : pattern;

  for (let i = 0; i < requirement.parts.length; i++) {
    const part = requirement.parts[i];
    if (!part || part.type === "wildcard") continue;
    if ((version.parts[i] ?? 0) !== part.value) return false;
  }

  return true;
}

/**
 * Pick the highest candidate compatible with a pattern.
 * Candidates with a wildcard are skipped since they cannot be ordered;
 * wildcard-free patterns count as the version they spell out.
 * Among equal maxima the earliest candidate wins.
 * Returns null if nothing is compatible.
 */
export function latestCompatibleVersion(
  pattern: VersionLike,
  candidates: readonly VersionLike[]
): Version | null {
  let latest: Version | null = null;

  for (const candidate of candidates) {
    if (candidate.kind === "pattern" && hasWildcards(candidate)) continue;
    const version = asVersion(candidate);
    if (!isCompatibleWith(version, pattern)) continue;
    if (!latest || compareVersions(version, latest) > 0) {
      latest = version;
    }
  }

  return latest;
}

/**
 * String-list variant of latestCompatibleVersion().
 * Returns the original text of the best match. Entries that fail to parse
 * or contain wildcards are skipped.
 *
 * @example latestCompatible(parse("1.*"), ["1.0.1", "2.0.0", "1.1.0"]) → "1.1.0"
 */
export function latestCompatible(pattern: VersionLike, texts: readonly string[]): string | null {
  let latest: { text: string; version: Version } | null = null;

  for (const text of texts) {
    const result = safeParse(text);
    if (!result.success) continue;
    if (result.data.kind === "pattern" && hasWildcards(result.data)) continue;
    const version = asVersion(result.data);
    if (!isCompatibleWith(version, pattern)) continue;
    if (!latest || compareVersions(version, latest.version) > 0) {
      latest = { text, version };
    }
  }

  return latest?.text ?? null;
}

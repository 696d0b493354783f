/**
 * Version utilities
 *
 * Parsing, rendering and ordering of dotted versions ("1.2.3", "2.*").
 * Any number of components is allowed. Ordering pads the shorter version
 * with zeros, so "1.2" and "1.2.0" are equal.
 */

import {
  COMPONENT_SEPARATOR,
  DIGITS_REGEX,
  MAX_COMPONENT,
  SERIALIZED_SEPARATOR,
  WILDCARD,
} from "#/constants";
import type { FriendlyError, ParseResult } from "#/friendly-errors";
import { VersionContractError, VersionParseError } from "./version.errors";
import type { Component, Version, VersionLike, VersionPattern } from "./version.types";

function makeVersion(parts: number[]): Version {
  const version: Version = { kind: "version", parts: Object.freeze(parts) };
  return Object.freeze(version);
}

function makePattern(parts: Component[]): VersionPattern {
  const pattern: VersionPattern = { kind: "pattern", parts: Object.freeze(parts) };
  return Object.freeze(pattern);
}

function parseComponent(input: string, text: string, index: number): Component {
  if (text === WILDCARD) {
    return { type: "wildcard" };
  }

  if (!DIGITS_REGEX.test(text)) {
    throw new VersionParseError(input, { kind: "invalid-component", index, text });
  }

  const value = Number(text);
  if (value > MAX_COMPONENT) {
    throw new VersionParseError(input, { kind: "invalid-component", index, text });
  }

  return { type: "number", value };
}

function parseComponents(input: string, separator: string): Component[] {
  // "".split(".") yields [""], which is an empty version rather than a bad component
  if (input.length === 0) {
    throw new VersionParseError(input, { kind: "empty" });
  }

  return input.split(separator).map((text, index) => parseComponent(input, text, index));
}

function fromComponents(parts: Component[]): VersionLike {
  const numbers: number[] = [];
  for (const part of parts) {
    if (part.type === "wildcard") {
      return makePattern(parts);
    }
    numbers.push(part.value);
  }
  return makeVersion(numbers);
}

/**
 * Parse dotted text into a version, or a pattern when any component is "*".
 * Throws VersionParseError on malformed input.
 *
 * @example parse("1.2.3") → { kind: "version", parts: [1, 2, 3] }
 * @example parse("1.*") → { kind: "pattern", parts: [{ type: "number", value: 1 }, { type: "wildcard" }] }
 */
export function parse(text: string): VersionLike {
  return fromComponents(parseComponents(text, COMPONENT_SEPARATOR));
}

/**
 * Parse text that must be a concrete version. A "*" component is rejected
 * as an invalid component.
 */
export function parseVersion(text: string): Version {
  const parts = parseComponents(text, COMPONENT_SEPARATOR);
  const numbers = parts.map((part, index) => {
    if (part.type === "wildcard") {
      throw new VersionParseError(text, { kind: "invalid-component", index, text: WILDCARD });
    }
    return part.value;
  });
  return makeVersion(numbers);
}

/**
 * Parse text as a requirement pattern. Text without wildcards becomes
 * an exact-match pattern.
 */
export function parsePattern(text: string): VersionPattern {
  return makePattern(parseComponents(text, COMPONENT_SEPARATOR));
}

/**
 * Build a concrete version from numbers.
 *
 * @example render(createVersion([1, 0, 0])) → "1.0.0"
 */
export function createVersion(numbers: readonly number[]): Version {
  const input = numbers.join(COMPONENT_SEPARATOR);
  if (numbers.length === 0) {
    throw new VersionParseError(input, { kind: "empty" });
  }

  numbers.forEach((value, index) => {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new VersionParseError(input, { kind: "invalid-component", index, text: String(value) });
    }
  });

  return makeVersion([...numbers]);
}

/**
 * The pattern "*", compatible with every version.
 */
export function anyVersion(): VersionPattern {
  return makePattern([{ type: "wildcard" }]);
}

/**
 * Lift a concrete version into an exact-match pattern.
 */
export function toPattern(version: Version): VersionPattern {
  return makePattern(version.parts.map((value): Component => ({ type: "number", value })));
}

/**
 * Narrow a parsed value to a concrete version.
 * A pattern without wildcards converts; one with a wildcard cannot be ordered.
 */
export function asVersion(value: VersionLike): Version {
  if (value.kind === "version") {
    return value;
  }

  const numbers: number[] = [];
  for (const part of value.parts) {
    if (part.type === "wildcard") {
      throw new VersionContractError(
        `Pattern ${render(value)} contains a wildcard and cannot be used as a concrete version`
      );
    }
    numbers.push(part.value);
  }
  return makeVersion(numbers);
}

export function isVersion(value: VersionLike): value is Version {
  return value.kind === "version";
}

export function isPattern(value: VersionLike): value is VersionPattern {
  return value.kind === "pattern";
}

/**
 * Check if a pattern has at least one wildcard component.
 */
export function hasWildcards(pattern: VersionPattern): boolean {
  return pattern.parts.some((part) => part.type === "wildcard");
}

/**
 * Check if every component of a pattern is a wildcard ("*", "*.*").
 */
export function isFullyWildcard(pattern: VersionPattern): boolean {
  return pattern.parts.every((part) => part.type === "wildcard");
}

function renderParts(value: VersionLike, separator: string): string {
  if (value.kind === "version") {
    return value.parts.join(separator);
  }
  return value.parts
    .map((part) => (part.type === "wildcard" ? WILDCARD : String(part.value)))
    .join(separator);
}

/**
 * Render a version or pattern back to dotted text.
 *
 * @example render(parse("2.*.1")) → "2.*.1"
 */
export function render(value: VersionLike): string {
  return renderParts(value, COMPONENT_SEPARATOR);
}

/**
 * Render to the underscore-joined storage form.
 *
 * @example serialize(parse("0.1.2")) → "0_1_2"
 */
export function serialize(value: VersionLike): string {
  return renderParts(value, SERIALIZED_SEPARATOR);
}

/**
 * Parse the underscore-joined storage form produced by serialize().
 */
export function deserialize(text: string): VersionLike {
  return fromComponents(parseComponents(text, SERIALIZED_SEPARATOR));
}

/**
 * Compare two versions, padding the shorter one with zeros.
 * Returns -1 if a < b, 0 if a == b, 1 if a > b.
 */
export function compareVersions(a: Version, b: Version): -1 | 0 | 1 {
  const depth = Math.max(a.parts.length, b.parts.length);

  for (let i = 0; i < depth; i++) {
    const left = a.parts[i] ?? 0;
    const right = b.parts[i] ?? 0;
    if (left < right) return -1;
    if (left > right) return 1;
  }

  return 0;
}

export function equals(a: Version, b: Version): boolean {
  return compareVersions(a, b) === 0;
}

export function isGreaterThan(a: Version, b: Version): boolean {
  return compareVersions(a, b) > 0;
}

export function isLessThan(a: Version, b: Version): boolean {
  return compareVersions(a, b) < 0;
}

/**
 * Sort versions in descending order (highest first). Returns a new array.
 */
export function sortVersionsDesc(versions: readonly Version[]): Version[] {
  return [...versions].sort((a, b) => compareVersions(b, a));
}

/**
 * Sort versions in ascending order (lowest first). Returns a new array.
 */
export function sortVersionsAsc(versions: readonly Version[]): Version[] {
  return [...versions].sort(compareVersions);
}

/**
 * Get the highest version from a list of strings.
 * Unparseable entries and patterns are skipped.
 * Returns null if nothing usable remains.
 */
export function latestVersion(texts: readonly string[]): Version | null {
  let latest: Version | null = null;

  for (const text of texts) {
    const result = safeParse(text);
    if (!result.success || result.data.kind !== "version") continue;
    if (!latest || isGreaterThan(result.data, latest)) {
      latest = result.data;
    }
  }

  return latest;
}

function safely<T>(text: string, parser: (text: string) => T): ParseResult<T> {
  try {
    return { success: true, data: parser(text) };
  } catch (err) {
    if (!(err instanceof VersionParseError)) throw err;
    const error: FriendlyError = { type: "version", message: err.message };
    return { success: false, error };
  }
}

/**
 * Non-throwing variant of parse().
 */
export function safeParse(text: string): ParseResult<VersionLike> {
  return safely(text, parse);
}

/**
 * Non-throwing variant of parseVersion().
 */
export function safeParseVersion(text: string): ParseResult<Version> {
  return safely(text, parseVersion);
}

/**
 * Non-throwing variant of parsePattern().
 */
export function safeParsePattern(text: string): ParseResult<VersionPattern> {
  return safely(text, parsePattern);
}

/**
 * Version module types
 *
 * Concrete versions and patterns are separate types so that ordering
 * can only ever be applied to versions without wildcards.
 */

export type Component =
  | { type: "number"; value: number }
  | { type: "wildcard" };

/**
 * A concrete version: every component is a number.
 */
export interface Version {
  readonly kind: "version";
  readonly parts: readonly number[];
}

/**
 * A version requirement. May mix numbers and wildcards.
 */
export interface VersionPattern {
  readonly kind: "pattern";
  readonly parts: readonly Component[];
}

export type VersionLike = Version | VersionPattern;

export type VersionParseErrorReason =
  | { kind: "empty" }
  | { kind: "invalid-component"; index: number; text: string };

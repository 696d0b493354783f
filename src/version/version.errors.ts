import type { VersionParseErrorReason } from "./version.types";

/**
 * Thrown when text does not follow the dotted version grammar.
 */
export class VersionParseError extends Error {
  readonly input: string;
  readonly reason: VersionParseErrorReason;

  constructor(input: string, reason: VersionParseErrorReason) {
    super(describeReason(input, reason));
    this.name = "VersionParseError";
    this.input = input;
    this.reason = reason;
  }
}

/**
 * Thrown when a pattern is used where a concrete version is required.
 */
export class VersionContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VersionContractError";
  }
}

function describeReason(input: string, reason: VersionParseErrorReason): string {
  switch (reason.kind) {
    case "empty":
      return "Invalid version: input is empty";
    case "invalid-component":
      return `Invalid version "${input}": component ${reason.index} ("${reason.text}") is not a non-negative integer or "*"`;
  }
}

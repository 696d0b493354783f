/**
 * Friendly Errors
 *
 * Result types shared by every non-throwing parser in the engine, plus
 * YAML + Zod validation for requirement and catalog files.
 *
 * @example
 * ```ts
 * const result = safeParseYaml(content, RequirementsFileSchema, { filepath: "requirements.yaml" });
 * if (!result.success) {
 *   console.error(result.error.message);
 *   result.error.details?.forEach(d => console.error(`  ${d}`));
 *   return;
 * }
 * const data = result.data;
 * ```
 */

import { parse as parseYaml, YAMLParseError } from "yaml";
import type { ZodType, ZodTypeDef, ZodError } from "zod";

export type ParseErrorType = "yaml" | "validation" | "version";

export interface FriendlyError {
  type: ParseErrorType;
  message: string;
  details?: string[];
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: FriendlyError };

function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
}

function formatYamlError(error: YAMLParseError): string {
  // First line only; the rest is a code frame
  return error.message.split("\n")[0] ?? error.message;
}

/**
 * Where a YAML document came from, for error messages.
 */
export interface YamlSource {
  /** What the document is, e.g. "requirements file" */
  kind?: string;
  filepath?: string;
}

function readYaml(content: string, where: string): ParseResult<unknown> {
  try {
    return { success: true, data: parseYaml(content) };
  } catch (err) {
    if (err instanceof YAMLParseError) {
      return {
        success: false,
        error: { type: "yaml", message: `Invalid YAML syntax${where}`, details: [formatYamlError(err)] },
      };
    }
    return {
      success: false,
      error: {
        type: "yaml",
        message: `Failed to parse YAML${where}`,
        details: [err instanceof Error ? err.message : String(err)],
      },
    };
  }
}

/**
 * Parse YAML content and validate it against a Zod schema.
 * Syntax errors and schema issues come back as a FriendlyError, never thrown.
 *
 * @example safeParseYaml("version: 2", CatalogFileSchema, { kind: "catalog file" })
 * → { success: false, error: { type: "validation", message: "Invalid catalog file", details: [...] } }
 */
export function safeParseYaml<Output, Input = Output>(
  content: string,
  schema: ZodType<Output, ZodTypeDef, Input>,
  source: YamlSource = {}
): ParseResult<Output> {
  const where = source.filepath ? ` in ${source.filepath}` : "";

  const raw = readYaml(content, where);
  if (!raw.success) {
    return raw;
  }

  const result = schema.safeParse(raw.data);
  if (!result.success) {
    return {
      success: false,
      error: {
        type: "validation",
        message: `Invalid ${source.kind ?? "document"}${where}`,
        details: formatZodIssues(result.error),
      },
    };
  }

  return { success: true, data: result.data };
}

/**
 * Flatten a FriendlyError into printable lines, details indented.
 *
 * @example formatFriendlyError({ type: "validation", message: "Invalid catalog file", details: ["version: Required"] })
 * → ["Invalid catalog file", "  version: Required"]
 */
export function formatFriendlyError(error: FriendlyError): string[] {
  return [error.message, ...(error.details ?? []).map((detail) => `  ${detail}`)];
}

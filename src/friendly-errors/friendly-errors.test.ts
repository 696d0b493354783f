import { describe, test, expect } from "vitest";
import { z } from "zod";
import { formatFriendlyError, safeParseYaml } from "./friendly-errors";

const Schema = z.object({
  version: z.literal(1),
  name: z.string(),
});

describe("friendly-errors", () => {
  describe("safeParseYaml", () => {
    test("returns validated data", () => {
      const result = safeParseYaml("version: 1\nname: core\n", Schema);
      expect(result).toEqual({ success: true, data: { version: 1, name: "core" } });
    });

    test("reports YAML syntax errors with file context", () => {
      const result = safeParseYaml("name: [unclosed", Schema, { filepath: "requirements.yaml" });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe("yaml");
        expect(result.error.message).toBe("Invalid YAML syntax in requirements.yaml");
        expect(result.error.details).toHaveLength(1);
      }
    });

    test("reports validation issues with their paths", () => {
      const result = safeParseYaml("version: 1\nname: 5\n", Schema, {
        kind: "catalog file",
        filepath: "catalog.yaml",
      });
      expect(result).toEqual({
        success: false,
        error: {
          type: "validation",
          message: "Invalid catalog file in catalog.yaml",
          details: ["name: Expected string, received number"],
        },
      });
    });

    test("names an unlabelled document generically", () => {
      const result = safeParseYaml("version: 2\nname: core\n", Schema);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe("Invalid document");
      }
    });
  });

  describe("formatFriendlyError", () => {
    test("indents details under the message", () => {
      expect(
        formatFriendlyError({
          type: "validation",
          message: "Invalid catalog file",
          details: ["version: Required", "name: Required"],
        })
      ).toEqual(["Invalid catalog file", "  version: Required", "  name: Required"]);
    });

    test("returns only the message without details", () => {
      expect(formatFriendlyError({ type: "version", message: "Invalid version: input is empty" })).toEqual([
        "Invalid version: input is empty",
      ]);
    });
  });
});

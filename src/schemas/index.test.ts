import { describe, test, expect } from "vitest";
import {
  VersionSchema,
  VersionPatternSchema,
  RequirementsFileSchema,
  CatalogFileSchema,
  LogLevelSchema,
  LoggerConfigSchema,
} from "./index";
import { render } from "#/version";

describe("schemas", () => {
  describe("VersionSchema", () => {
    test("transforms text into a version", () => {
      expect(VersionSchema.parse("1.2.3")).toEqual({ kind: "version", parts: [1, 2, 3] });
    });

    test("rejects wildcards and malformed text", () => {
      expect(() => VersionSchema.parse("1.*")).toThrow();
      expect(() => VersionSchema.parse("1.2.")).toThrow();
      expect(() => VersionSchema.parse("")).toThrow();
    });

    test("reports the parse error as the issue message", () => {
      const result = VersionSchema.safeParse("1.a");
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0]?.message).toBe(
          'Invalid version "1.a": component 1 ("a") is not a non-negative integer or "*"'
        );
      }
    });
  });

  describe("VersionPatternSchema", () => {
    test("transforms text into a pattern", () => {
      const pattern = VersionPatternSchema.parse("2.*");
      expect(pattern.kind).toBe("pattern");
      expect(render(pattern)).toBe("2.*");
    });

    test("rejects non-string values", () => {
      expect(() => VersionPatternSchema.parse(1)).toThrow();
    });
  });

  describe("RequirementsFileSchema", () => {
    test("parses requirements", () => {
      const result = RequirementsFileSchema.parse({
        version: 1,
        requirements: { core: "2.*", plugin: "1.4" },
      });

      expect(Object.keys(result.requirements)).toEqual(["core", "plugin"]);
      expect(result.requirements.core && render(result.requirements.core)).toBe("2.*");
    });

    test("defaults requirements to empty", () => {
      expect(RequirementsFileSchema.parse({ version: 1 }).requirements).toEqual({});
    });

    test("rejects unknown file versions", () => {
      expect(() => RequirementsFileSchema.parse({ version: 2 })).toThrow();
    });
  });

  describe("CatalogFileSchema", () => {
    test("parses package versions", () => {
      const result = CatalogFileSchema.parse({
        version: 1,
        packages: { core: ["1.0.0", "2.0.0"] },
      });

      expect(result.packages.core?.map(render)).toEqual(["1.0.0", "2.0.0"]);
    });

    test("rejects patterns in the catalog", () => {
      expect(() =>
        CatalogFileSchema.parse({ version: 1, packages: { core: ["1.*"] } })
      ).toThrow();
    });
  });

  describe("LoggerConfigSchema", () => {
    test("defaults to a silent logger named dotver", () => {
      expect(LoggerConfigSchema.parse({})).toEqual({ name: "dotver", level: "silent" });
    });

    test("rejects unknown levels", () => {
      expect(LogLevelSchema.safeParse("verbose").success).toBe(false);
      expect(LogLevelSchema.parse("debug")).toBe("debug");
    });
  });
});

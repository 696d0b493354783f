import { z } from "zod";
import { safeParsePattern, safeParseVersion } from "#/version";

// Concrete version: "1.2.3" → Version
export const VersionSchema = z.string().transform((text, ctx) => {
  const result = safeParseVersion(text);
  if (!result.success) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error.message });
    return z.NEVER;
  }
  return result.data;
});

// Requirement pattern: "1.*", "2.3" → VersionPattern
export const VersionPatternSchema = z.string().transform((text, ctx) => {
  const result = safeParsePattern(text);
  if (!result.success) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error.message });
    return z.NEVER;
  }
  return result.data;
});

const PackageNameSchema = z.string().trim().min(1);

// Requirements file: which pattern each package must satisfy.
// Values must be quoted in YAML: a bare 1.10 is read as the number 1.1

export const RequirementsFileSchema = z.object({
  version: z.literal(1),
  requirements: z.record(PackageNameSchema, VersionPatternSchema).default({}),
});
export type RequirementsFile = z.infer<typeof RequirementsFileSchema>;

// Catalog file: concrete versions available per package
export const CatalogFileSchema = z.object({
  version: z.literal(1),
  packages: z.record(PackageNameSchema, z.array(VersionSchema)).default({}),
});
export type CatalogFile = z.infer<typeof CatalogFileSchema>;

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LoggerConfigSchema = z.object({
  name: z.string().default("dotver"),
  level: LogLevelSchema.default("silent"),
});
export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;

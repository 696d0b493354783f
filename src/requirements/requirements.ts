/**
 * Requirement resolution
 *
 * Loads requirement and catalog files and picks, for every requirement,
 * the latest compatible version the catalog offers.
 */

import type { Logger } from "#/core";
import { safeParseYaml, type ParseResult } from "#/friendly-errors";
import { silentLogger } from "#/logger";
import {
  CatalogFileSchema,
  RequirementsFileSchema,
  type CatalogFile,
  type RequirementsFile,
} from "#/schemas";
import { compareVersions, isCompatibleWith, render, type Version } from "#/version";
import type { Requirements, ResolutionResult, VersionCatalog } from "./requirements.types";

export function loadRequirements(content: string, filepath?: string): ParseResult<RequirementsFile> {
  return safeParseYaml(content, RequirementsFileSchema, { kind: "requirements file", filepath });
}

export function loadCatalog(content: string, filepath?: string): ParseResult<CatalogFile> {
  return safeParseYaml(content, CatalogFileSchema, { kind: "catalog file", filepath });
}

/**
 * Resolve every requirement against the catalog, in requirement order.
 * Packages missing from the catalog resolve to null.
 */
export function resolveRequirements(
  requirements: Requirements,
  catalog: VersionCatalog,
  logger: Logger = silentLogger
): ResolutionResult[] {
  return Object.entries(requirements).map(([name, pattern]) => {
    // Own keys only: a package named "constructor" must not read Object.prototype
    const available = Object.hasOwn(catalog, name) ? catalog[name] ?? [] : [];
    const requirement = render(pattern);

    let latest: Version | null = null;
    let compatible = 0;
    for (const version of available) {
      if (!isCompatibleWith(version, pattern)) continue;
      compatible += 1;
      if (!latest || compareVersions(version, latest) > 0) {
        latest = version;
      }
    }

    if (!latest) {
      logger.warn(
        { name, requirement, available: available.length },
        "No compatible version found"
      );
      return { name, requirement, resolved: null, candidates: 0 };
    }

    const resolved = render(latest);
    logger.debug(
      { name, requirement, resolved, candidates: compatible },
      "Resolved requirement"
    );
    return { name, requirement, resolved, candidates: compatible };
  });
}

/**
 * Format resolution results for display.
 */
export function formatResolutionResults(results: readonly ResolutionResult[]): string[] {
  const lines: string[] = [];

  for (const result of results) {
    if (result.resolved) {
      lines.push(
        `${result.name}: ${result.requirement} → ${result.resolved} (${result.candidates} compatible)`
      );
    } else {
      lines.push(`${result.name}: ${result.requirement} (no compatible version)`);
    }
  }

  return lines;
}

/**
 * Requirements module
 *
 * Resolution of requirement files against version catalogs.
 */

export * from "./requirements";
export * from "./requirements.types";

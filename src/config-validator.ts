import { existsSync, statSync } from "node:fs";
import type { LoaderSettings } from "./loader/loader-config.js";
import type { BatchMode, RunConfig } from "./loader/types.js";

/**
 * Validation result with errors (fatal) and warnings (non-fatal).
 */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

function isDir(p: string): boolean {
  return existsSync(p) && statSync(p).isDirectory();
}

/**
 * Validates the resolved run configuration before any loader is started.
 *
 * Checks:
 * - data dir exists (templates dir and retry dir too, when set)
 * - data and failed extensions differ
 * - delimiter is a single character
 * - at least one relationship marker is configured
 * - business key columns are 1-based
 * - loader config carries connection identity (warning)
 * - <delimiter> / <first_row> present in the loader config (warning)
 */
export function validateRunConfig(
  cfg: RunConfig,
  settings: LoaderSettings,
  mode: BatchMode,
): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isDir(cfg.dataDir)) {
    errors.push(`data dir not found: ${cfg.dataDir}`);
  }

  if (cfg.templatesDir && !isDir(cfg.templatesDir)) {
    errors.push(`templates dir not found: ${cfg.templatesDir}`);
  }

  if (mode === "retry" && cfg.retryDir && !isDir(cfg.retryDir)) {
    errors.push(`retry dir not found: ${cfg.retryDir}`);
  }

  if (cfg.dataExtension.toLowerCase() === cfg.failedExtension.toLowerCase()) {
    errors.push(`data extension and failed extension must differ, both are ${cfg.dataExtension}`);
  }

  if (cfg.delimiter.length !== 1) {
    errors.push(`delimiter must be a single character, got ${JSON.stringify(cfg.delimiter)}`);
  }

  if (cfg.relationshipMarkers.length === 0) {
    errors.push("at least one relationship marker is required");
  }

  for (const [itemType, key] of Object.entries(cfg.businessKeys)) {
    if (key.column !== undefined && (!Number.isInteger(key.column) || key.column < 1)) {
      errors.push(`delete key column for ${itemType} must be a positive integer, got ${key.column}`);
    }
  }

  const missingIdentity = (["server", "db", "user"] as const).filter((k) => !settings[k]);
  if (missingIdentity.length > 0) {
    warnings.push(`loader config has no ${missingIdentity.join(", ")}; the loader will likely fail to connect`);
  }

  if (mode === "delete") {
    if (settings.delimiter === null) {
      warnings.push("loader config has no <delimiter>; header rows are split on tab");
    }
    if (settings.firstRow === null) {
      warnings.push("loader config has no valid <first_row>; data files are treated as headerless (id = column 1)");
    }
  }

  return { errors, warnings };
}

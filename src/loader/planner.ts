/**
 * Batch Planner
 *
 * Turns a directory snapshot into the ordered list of WorkItems for a mode.
 * The whole plan is fixed before anything runs.
 *
 *   load    *.txt in the data dir, case-insensitive name order
 *   delete  same items, reversed (relationships go before the items they reference)
 *   retry   *.failed in the retry dir (default: data dir), same order rules as load
 */

import { readdirSync, existsSync, statSync } from "node:fs";
import path from "node:path";
import { EmptyBatchError, ConfigError } from "./errors.js";
import { findTemplate, stemOf } from "./template-resolver.js";
import type { BatchMode, BatchPlan, RunConfig, WorkItem } from "./types.js";
import { logPlanner } from "../logging.js";

export type PlannerConfig = Pick<
  RunConfig,
  "dataDir" | "templatesDir" | "retryDir" | "dataExtension" | "failedExtension"
>;

/** Case-insensitive lexicographic order; raw name breaks ties so the order is total. */
export function compareFileNames(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la !== lb) return la < lb ? -1 : 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Regular files directly under dir (non-recursive) with the given extension, sorted. */
export function listFiles(dir: string, extension: string): string[] {
  const ext = extension.toLowerCase();
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === ext)
    .map((entry) => entry.name)
    .sort(compareFileNames);
}

function requireDir(dir: string, what: string): void {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw new ConfigError(`${what} not found: ${dir}`);
  }
}

export function planBatch(mode: BatchMode, cfg: PlannerConfig): BatchPlan {
  const isRetry = mode === "retry";
  const sourceDir = isRetry ? cfg.retryDir ?? cfg.dataDir : cfg.dataDir;
  const extension = isRetry ? cfg.failedExtension : cfg.dataExtension;

  requireDir(sourceDir, isRetry ? "retry dir" : "data dir");

  const names = listFiles(sourceDir, extension);
  if (names.length === 0) {
    throw new EmptyBatchError(sourceDir, `*${extension}`);
  }

  // Failed files outside the data dir still pair with <dataDir>/<stem>_Template.xml
  const fallbackDir = isRetry ? cfg.dataDir : null;

  const items: WorkItem[] = names.map((name) => {
    const dataPath = path.join(sourceDir, name);
    return Object.freeze({
      stem: stemOf(name),
      dataPath,
      templatePath: findTemplate(dataPath, cfg.templatesDir, fallbackDir),
      mode,
    });
  });

  if (mode === "delete") items.reverse();

  logPlanner.info(
    {
      mode,
      sourceDir,
      total: items.length,
      withoutTemplate: items.filter((i) => i.templatePath === null).map((i) => i.stem),
    },
    "Batch planned",
  );

  return { mode, sourceDir, items: Object.freeze(items) };
}

import { logger } from "./logging.js";
import { detectIdColumn } from "./loader/id-column.js";
import { synthesizeDeleteTemplate } from "./loader/delete-template.js";
import type { SynthesisOptions, SynthesizedTemplate } from "./loader/delete-template.js";
import { HeaderReadError, MissingIdColumnError, TemplateSynthesisError } from "./loader/errors.js";
import { runLoader } from "./loader/executor.js";
import { planBatch } from "./loader/planner.js";
import { missingTemplateHint } from "./loader/template-resolver.js";
import type {
  BatchMode,
  BatchPlan,
  BatchSummary,
  LoaderRuntime,
  RunConfig,
  RunResult,
  SkipReason,
  WorkItem,
} from "./loader/types.js";

const log = logger.child({ module: "orchestrator" });

export interface OrchestratorDeps {
  readonly runLoader: (
    item: WorkItem,
    templatePath: string,
    runtime: LoaderRuntime,
    logsDir: string,
  ) => Promise<RunResult>;
  readonly detectIdColumn: (dataPath: string, opts: { delimiter: string; hasHeader: boolean }) => Promise<number>;
  readonly synthesizeDeleteTemplate: (
    insertTemplatePath: string,
    idColumn: number,
    opts: SynthesisOptions,
  ) => Promise<SynthesizedTemplate>;
}

const defaultDeps: OrchestratorDeps = {
  runLoader,
  detectIdColumn,
  synthesizeDeleteTemplate,
};

/** Operator-facing progress hooks; the CLI prints, tests collect. */
export interface BatchObserver {
  onStart?(item: WorkItem): void;
  onResult?(result: RunResult): void;
}

function skipped(item: WorkItem, reason: SkipReason, detail: string): RunResult {
  return { stem: item.stem, exitCode: null, logPath: null, outcome: { kind: "skipped", reason, detail } };
}

export function summarize(mode: BatchMode, results: readonly RunResult[]): BatchSummary {
  let succeeded = 0;
  let failed = 0;
  let skippedCount = 0;
  for (const r of results) {
    if (r.outcome.kind === "success") succeeded++;
    else if (r.outcome.kind === "non-zero-exit") failed++;
    else skippedCount++;
  }
  return { mode, results, succeeded, failed, skipped: skippedCount };
}

/**
 * Resolve the template the loader should run with. In delete mode this
 * synthesizes a delete template from the insert template; per-file failures
 * come back as a skip instead of throwing.
 */
async function resolveRunTemplate(
  item: WorkItem,
  insertTemplate: string,
  cfg: RunConfig,
  deps: OrchestratorDeps,
): Promise<{ templatePath: string } | { skip: RunResult }> {
  if (item.mode !== "delete") return { templatePath: insertTemplate };

  try {
    const idColumn = await deps.detectIdColumn(item.dataPath, {
      delimiter: cfg.delimiter,
      hasHeader: cfg.hasHeader,
    });
    if (!cfg.hasHeader) {
      log.warn({ stem: item.stem }, "No header row expected (first_row <= 1); assuming column 1 is the id");
    }
    const synthesized = await deps.synthesizeDeleteTemplate(insertTemplate, idColumn, {
      outDir: cfg.deleteTemplatesDir,
      stem: item.stem,
      relationshipMarkers: cfg.relationshipMarkers,
      businessKeys: cfg.businessKeys,
    });
    return { templatePath: synthesized.path };
  } catch (err) {
    if (err instanceof HeaderReadError) {
      return { skip: skipped(item, "data-unreadable", err.message) };
    }
    if (err instanceof MissingIdColumnError) {
      return { skip: skipped(item, "missing-id-column", err.message) };
    }
    if (err instanceof TemplateSynthesisError) {
      return { skip: skipped(item, "template-synthesis-failed", err.message) };
    }
    throw err;
  }
}

/** Execute an already-built plan, strictly in order. */
export async function executePlan(
  plan: BatchPlan,
  cfg: RunConfig,
  deps: OrchestratorDeps = defaultDeps,
  observer: BatchObserver = {},
): Promise<BatchSummary> {
  const results: RunResult[] = [];

  for (const item of plan.items) {
    let result: RunResult;

    if (item.templatePath === null) {
      result = skipped(item, "template-not-found", `missing template (${missingTemplateHint(item.stem, cfg.templatesDir)})`);
    } else {
      const resolved = await resolveRunTemplate(item, item.templatePath, cfg, deps);
      if ("skip" in resolved) {
        result = resolved.skip;
      } else {
        observer.onStart?.(item);
        // LoaderLaunchError propagates: the runtime is unusable for every remaining item
        result = await deps.runLoader(item, resolved.templatePath, cfg.runtime, cfg.logsDir);
      }
    }

    if (result.outcome.kind === "skipped") {
      log.warn({ stem: item.stem, reason: result.outcome.reason, detail: result.outcome.detail }, "Skipped");
    }
    results.push(result);
    observer.onResult?.(result);
  }

  const summary = summarize(plan.mode, results);
  log.info(
    { mode: plan.mode, succeeded: summary.succeeded, failed: summary.failed, skipped: summary.skipped },
    "Batch finished",
  );
  return summary;
}

/** Plan then run a batch for one mode. */
export async function runBatch(
  mode: BatchMode,
  cfg: RunConfig,
  deps: OrchestratorDeps = defaultDeps,
  observer: BatchObserver = {},
): Promise<BatchSummary> {
  const plan = planBatch(mode, cfg);
  return executePlan(plan, cfg, deps, observer);
}

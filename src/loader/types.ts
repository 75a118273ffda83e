// ── Batch Loader Domain Types ────────────────────────────────────────────

export type BatchMode = "load" | "delete" | "retry";

/** One planned invocation of the loader. Built by the planner, consumed once. */
export interface WorkItem {
  readonly stem: string;
  readonly dataPath: string;
  readonly templatePath: string | null;
  readonly mode: BatchMode;
}

export interface BatchPlan {
  readonly mode: BatchMode;
  readonly sourceDir: string;
  readonly items: readonly WorkItem[];
}

export type SkipReason =
  | "template-not-found"
  | "data-unreadable"
  | "missing-id-column"
  | "template-synthesis-failed";

export type RunOutcome =
  | { readonly kind: "success" }
  | { readonly kind: "non-zero-exit" }
  | { readonly kind: "skipped"; readonly reason: SkipReason; readonly detail: string };

export interface RunResult {
  readonly stem: string;
  readonly exitCode: number | null;
  readonly logPath: string | null;
  readonly outcome: RunOutcome;
}

export interface BatchSummary {
  readonly mode: BatchMode;
  readonly results: readonly RunResult[];
  readonly succeeded: number;
  readonly failed: number;
  readonly skipped: number;
}

/** Business key used to delete an item type by lookup instead of by id. */
export interface BusinessKey {
  readonly field: string;
  /** 1-based column holding the key; falls back to the detected id column */
  readonly column?: number;
}

export type BusinessKeyMap = Readonly<Record<string, BusinessKey>>;

/** Everything needed to launch BatchLoaderCmd.exe. */
export interface LoaderRuntime {
  readonly exePath: string;
  readonly runtimeDir: string;
  readonly configPath: string;
  readonly useWine: boolean;
}

/**
 * Explicit run configuration. Built once at startup from env + CLI flags
 * and handed to every component.
 */
export interface RunConfig {
  readonly runtime: LoaderRuntime;
  readonly dataDir: string;
  readonly templatesDir: string | null;
  readonly logsDir: string;
  readonly retryDir: string | null;
  readonly deleteTemplatesDir: string;
  readonly dataExtension: string;
  readonly failedExtension: string;
  readonly delimiter: string;
  readonly hasHeader: boolean;
  readonly relationshipMarkers: readonly string[];
  readonly businessKeys: BusinessKeyMap;
}

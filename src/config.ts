import dotenv from "dotenv";
import { z } from "zod";
import type { BusinessKey, BusinessKeyMap } from "./loader/types.js";
import type { WineSetting } from "./loader/runtime.js";
import { ConfigError } from "./loader/errors.js";

dotenv.config();

// ── Business keys ────────────────────────────────────────────────────────
// "Part=item_number;Document=item_number:2" → { Part: { field }, Document: { field, column: 2 } }

const BusinessKeyEntrySchema = z.object({
  type: z.string().trim().min(1, "item type is required"),
  field: z.string().trim().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "field must be a property name"),
  column: z.coerce.number().int().min(1).optional(),
});

export function parseBusinessKeyEntry(entry: string): [string, BusinessKey] {
  const eq = entry.indexOf("=");
  if (eq === -1) {
    throw new ConfigError(`Invalid delete key "${entry}" (expected Type=field or Type=field:column)`);
  }
  const [field, column] = entry.slice(eq + 1).split(":");
  const parsed = BusinessKeyEntrySchema.safeParse({
    type: entry.slice(0, eq),
    field,
    column: column === undefined || column.trim() === "" ? undefined : column,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid delete key "${entry}": ${issue ? issue.message : "unparseable"}`);
  }
  const { type, field: key, column: col } = parsed.data;
  return [type, col === undefined ? { field: key } : { field: key, column: col }];
}

export function parseBusinessKeys(entries: readonly string[]): BusinessKeyMap {
  const map: Record<string, BusinessKey> = {};
  for (const entry of entries) {
    if (!entry.trim()) continue;
    const [type, key] = parseBusinessKeyEntry(entry.trim());
    map[type] = key;
  }
  return map;
}

function splitList(raw: string | undefined, separator: string | RegExp): string[] {
  return (raw ?? "").split(separator).map((s) => s.trim()).filter(Boolean);
}

function parseWine(raw: string | undefined): WineSetting {
  const val = (raw ?? "auto").trim().toLowerCase();
  if (val === "true" || val === "1") return "true";
  if (val === "false" || val === "0") return "false";
  return "auto";
}

function normalizeExtension(raw: string | undefined, fallback: string): string {
  const val = (raw ?? "").trim();
  if (!val) return fallback;
  return val.startsWith(".") ? val : `.${val}`;
}

/** Environment defaults. CLI flags override every path here. */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env) {
  const markers = splitList(env.BL_RELATIONSHIP_MARKERS, ",");
  return {
    paths: {
      dataDir: env.BL_DATA_DIR || "./data",
      logsDir: env.BL_LOGS_DIR || "./logs",
      templatesDir: env.BL_TEMPLATES_DIR || null,
      deleteTemplatesDir: env.BL_DELETE_TEMPLATES_DIR || "./templates_delete",
      cliConfig: env.BL_CONFIG || null,
      runtimeDir: env.BL_DIR || null,
    },
    files: {
      dataExtension: normalizeExtension(env.BL_DATA_EXT, ".txt"),
      failedExtension: normalizeExtension(env.BL_FAILED_EXT, ".failed"),
    },
    deletes: {
      relationshipMarkers: markers.length > 0 ? markers : ["BOM", "Relationship"],
      businessKeys: splitList(env.BL_DELETE_KEYS, ";"),
    },
    runtime: {
      wine: parseWine(env.BL_USE_WINE),
    },
    logLevel: env.LOG_LEVEL ?? "info",
  };
}

export type EnvConfig = ReturnType<typeof loadEnvConfig>;

export const config: EnvConfig = loadEnvConfig();

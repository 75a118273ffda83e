/**
 * BatchLoader CLI config XML (CLIBatchLoaderConfig.xml).
 *
 * The loader itself reads this file through `-c`; the orchestrator only needs
 * a few values out of it (delimiter + first_row for delete-mode header
 * parsing, loader_dir for locating the runtime). It can also generate a
 * clean CLI config from the runtime's own BatchLoaderConfig.xml.
 */

import { existsSync, statSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const DEFAULT_CLI_CONFIG_NAME = "CLIBatchLoaderConfig.xml";
export const RUNTIME_CONFIG_NAME = "BatchLoaderConfig.xml";

/** Field order of a generated CLI config. */
export const CLI_CONFIG_FIELDS = [
  "server",
  "db",
  "user",
  "password",
  "max_processes",
  "delimiter",
  "threads",
  "encoding",
  "lines_per_process",
  "first_row",
  "log_level",
  "log_file",
] as const;

const XML_OPTIONS = {
  ignoreAttributes: true,
  parseTagValue: false,
  trimValues: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
} as const;

// ── Value normalisation ──────────────────────────────────────────────────

/**
 * Normalise <delimiter> text to one character. Accepts a literal tab, "\t",
 * "tab", "comma", "pipe" or any single character; everything else is a tab.
 */
export function normalizeDelimiter(raw: string | null | undefined): string | null {
  if (raw == null) return null;
  if (raw === "\t") return "\t";
  const val = raw.trim();
  if (!val) return "\t";
  const lower = val.toLowerCase();
  if (lower === "\\t" || lower === "tab") return "\t";
  if (lower === "," || lower === "comma") return ",";
  if (lower === "|" || lower === "pipe") return "|";
  if (val.length === 1) return val;
  return "\t";
}

function parseIntOrNull(raw: string): number | null {
  const val = raw.trim();
  if (!/^[+-]?\d+$/.test(val)) return null;
  return parseInt(val, 10);
}

/** First non-empty text among repeated elements, else the first element's text, else "". */
export function pickFirstText(value: unknown): string {
  const texts = (Array.isArray(value) ? value : [value]).map(textOf);
  return texts.find((t) => t.trim() !== "") ?? texts[0] ?? "";
}

function textOf(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (typeof value === "object" && value !== null && "#text" in value) {
    return textOf(value["#text"]);
  }
  return "";
}

// ── Schema ───────────────────────────────────────────────────────────────

const text = z.preprocess((v) => (v === undefined ? undefined : pickFirstText(v)), z.string().optional());

const RawLoaderConfigSchema = z.object({
  server: text,
  db: text,
  user: text,
  password: text,
  max_processes: text,
  delimiter: text,
  threads: text,
  encoding: text,
  lines_per_process: text,
  first_row: text,
  log_level: text,
  log_file: text,
  loader_dir: text,
});

export interface LoaderSettings {
  server: string;
  db: string;
  user: string;
  password: string;
  maxProcesses: number | null;
  threads: number | null;
  linesPerProcess: number | null;
  /** Normalised single character; null when the config has no <delimiter>. */
  delimiter: string | null;
  encoding: string;
  /** 1-based first data row; > 1 means the data files carry a header row. */
  firstRow: number | null;
  logLevel: string;
  logFile: string;
  /** Absolute runtime folder, resolved against the config file's folder. */
  loaderDir: string | null;
}

/** true when <first_row> says the data files start with a header row */
export function hasHeaderRow(settings: Pick<LoaderSettings, "firstRow">): boolean {
  return (settings.firstRow ?? 1) > 1;
}

// ── Reading ──────────────────────────────────────────────────────────────

function parseRoot(xml: string, source: string): Record<string, unknown> {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new ConfigError(`Invalid XML in ${source} at ${line}:${col}: ${msg}`);
  }
  const doc: unknown = new XMLParser(XML_OPTIONS).parse(xml);
  if (typeof doc !== "object" || doc === null) {
    throw new ConfigError(`Empty config document: ${source}`);
  }
  // Whitespace around the root element surfaces as a "#text" sibling
  for (const [key, value] of Object.entries(doc)) {
    if (key === "#text") continue;
    return typeof value === "object" && value !== null && !Array.isArray(value) ? { ...value } : {};
  }
  return {};
}

export function parseLoaderSettings(xml: string, configPath: string): LoaderSettings {
  const raw = RawLoaderConfigSchema.parse(parseRoot(xml, configPath));

  const loaderDirText = raw.loader_dir?.trim() ?? "";
  let loaderDir: string | null = null;
  if (loaderDirText) {
    loaderDir = path.isAbsolute(loaderDirText)
      ? loaderDirText
      : path.resolve(path.dirname(path.resolve(configPath)), loaderDirText);
  }

  return {
    server: raw.server?.trim() ?? "",
    db: raw.db?.trim() ?? "",
    user: raw.user?.trim() ?? "",
    password: raw.password ?? "",
    maxProcesses: raw.max_processes === undefined ? null : parseIntOrNull(raw.max_processes),
    threads: raw.threads === undefined ? null : parseIntOrNull(raw.threads),
    linesPerProcess: raw.lines_per_process === undefined ? null : parseIntOrNull(raw.lines_per_process),
    delimiter: normalizeDelimiter(raw.delimiter),
    encoding: raw.encoding?.trim() ?? "",
    firstRow: raw.first_row === undefined ? null : parseIntOrNull(raw.first_row),
    logLevel: raw.log_level?.trim() ?? "",
    logFile: raw.log_file?.trim() ?? "",
    loaderDir,
  };
}

export async function readLoaderSettings(configPath: string): Promise<LoaderSettings> {
  if (!existsSync(configPath)) {
    throw new ConfigError(`CLI config XML not found: ${configPath}`);
  }
  const xml = await readFile(configPath, "utf-8");
  return parseLoaderSettings(xml, configPath);
}

// ── Init from runtime ────────────────────────────────────────────────────

/** Target path for a generated CLI config; an existing directory gets the default file name. */
export function resolveInitTarget(configArg: string | null): string {
  const target = configArg ?? path.join(".", DEFAULT_CLI_CONFIG_NAME);
  if (existsSync(target) && statSync(target).isDirectory()) {
    return path.join(target, DEFAULT_CLI_CONFIG_NAME);
  }
  return target;
}

/** Build a minimal CLI config document from runtime config XML. */
export function buildCliConfigXml(runtimeXml: string, runtimeSource: string, loaderDir: string): string {
  const root = parseRoot(runtimeXml, runtimeSource);

  const children: Record<string, unknown>[] = CLI_CONFIG_FIELDS.map((field) => {
    const value = pickFirstText(root[field]).trim();
    return { [field]: value ? [{ "#text": value }] : [] };
  });
  children.push({ "#comment": [{ "#text": " Runtime folder used by the CLI script (absolute or relative to this file) " }] });
  children.push({ loader_dir: [{ "#text": loaderDir }] });

  const builder = new XMLBuilder({
    preserveOrder: true,
    commentPropName: "#comment",
    format: true,
    indentBy: "\t",
    suppressEmptyNode: false,
  });
  const body = String(builder.build([{ BatchLoaderConfig: children }])).trim();
  return `<?xml version="1.0" encoding="utf-8"?>\n${body}\n`;
}

/**
 * Copy the runtime's BatchLoaderConfig.xml values into a clean CLI config.
 * Returns the written path.
 */
export async function initCliConfigFromRuntime(runtimeDir: string, configArg: string | null): Promise<string> {
  const runtimeConfig = path.join(runtimeDir, RUNTIME_CONFIG_NAME);
  if (!existsSync(runtimeConfig)) {
    throw new ConfigError(`Runtime ${RUNTIME_CONFIG_NAME} not found: ${runtimeConfig}`);
  }
  const target = resolveInitTarget(configArg);
  const xml = buildCliConfigXml(await readFile(runtimeConfig, "utf-8"), runtimeConfig, runtimeDir);

  await mkdir(path.dirname(path.resolve(target)), { recursive: true });
  await writeFile(target, xml, "utf-8");
  return path.resolve(target);
}

import path from "node:path";
import yargs from "yargs";
import { parseBusinessKeys, type EnvConfig } from "./config.js";
import { ConfigError } from "./loader/errors.js";
import { DEFAULT_CLI_CONFIG_NAME, hasHeaderRow, type LoaderSettings } from "./loader/loader-config.js";
import type { BatchMode, LoaderRuntime, RunConfig } from "./loader/types.js";

export type CliArgs = {
  blDir: string | null;
  blConfig: string | null;
  dataDir: string;
  templatesDir: string | null;
  logsDir: string;
  retry: boolean;
  retryDir: string | null;
  delete: boolean;
  deleteTemplatesDir: string;
  deleteKeys: string[];
  initConfig: boolean;
  initFromRuntime: boolean;
};

export function parseCliArgs(argv: string[], env: EnvConfig): CliArgs {
  const args = yargs(argv)
    .scriptName("batchload")
    .usage("$0 [options]\n\nDrive BatchLoaderCmd.exe over a directory of data files (separate CLI config).")
    .option("bl-dir", {
      type: "string",
      describe: "Folder that contains BatchLoaderCmd.exe and DLLs (runtime).",
    })
    .option("bl-config", {
      type: "string",
      describe: `Path to your CLI config XML. If omitted, uses ./${DEFAULT_CLI_CONFIG_NAME}.`,
    })
    .option("data-dir", {
      type: "string",
      default: env.paths.dataDir,
      describe: `Directory containing *${env.files.dataExtension} data files`,
    })
    .option("templates-dir", {
      type: "string",
      describe: "Directory containing XML templates; fallback is next to each data file.",
    })
    .option("logs-dir", { type: "string", default: env.paths.logsDir })
    .option("retry", {
      type: "boolean",
      describe: `Retry mode: process *${env.files.failedExtension} files instead of data files.`,
    })
    .option("retry-dir", {
      type: "string",
      describe: `Directory to search for *${env.files.failedExtension} files (defaults to --data-dir).`,
    })
    .option("delete", {
      type: "boolean",
      describe: "Delete mode: process files in reverse order using generated delete-templates.",
    })
    .option("delete-templates-dir", {
      type: "string",
      default: env.paths.deleteTemplatesDir,
      describe: "Directory where delete-templates will be generated.",
    })
    .option("delete-key", {
      type: "string",
      array: true,
      describe: "Delete an item type by business key instead of id: Type=field or Type=field:column (repeatable).",
    })
    .option("init-config", {
      type: "boolean",
      default: false,
      describe: "Copy runtime BatchLoaderConfig.xml to a clean CLI config. Requires --init-from-runtime and --bl-dir.",
    })
    .option("init-from-runtime", {
      type: "boolean",
      default: false,
      describe: "Required with --init-config. Copies runtime's BatchLoaderConfig.xml.",
    })
    .conflicts("retry", "delete")
    .strict()
    .fail((msg, err) => {
      throw err instanceof Error ? err : new ConfigError(msg);
    })
    .help()
    .parseSync();

  return {
    blDir: args["bl-dir"] ?? env.paths.runtimeDir,
    blConfig: args["bl-config"] ?? env.paths.cliConfig,
    dataDir: args["data-dir"],
    templatesDir: args["templates-dir"] ?? env.paths.templatesDir,
    logsDir: args["logs-dir"],
    retry: args.retry ?? false,
    retryDir: args["retry-dir"] ?? null,
    delete: args.delete ?? false,
    deleteTemplatesDir: args["delete-templates-dir"],
    deleteKeys: [...env.deletes.businessKeys, ...(args["delete-key"] ?? [])],
    initConfig: args["init-config"],
    initFromRuntime: args["init-from-runtime"],
  };
}

export function modeOf(args: Pick<CliArgs, "retry" | "delete">): BatchMode {
  if (args.retry) return "retry";
  if (args.delete) return "delete";
  return "load";
}

export function cliConfigPath(args: Pick<CliArgs, "blConfig">): string {
  return args.blConfig ?? path.join(".", DEFAULT_CLI_CONFIG_NAME);
}

/** Assemble the single RunConfig value every component receives. */
export function buildRunConfig(
  args: CliArgs,
  env: EnvConfig,
  settings: LoaderSettings,
  runtime: LoaderRuntime,
): RunConfig {
  return {
    runtime,
    dataDir: path.resolve(args.dataDir),
    templatesDir: args.templatesDir ? path.resolve(args.templatesDir) : null,
    logsDir: path.resolve(args.logsDir),
    retryDir: args.retryDir ? path.resolve(args.retryDir) : null,
    deleteTemplatesDir: path.resolve(args.deleteTemplatesDir),
    dataExtension: env.files.dataExtension,
    failedExtension: env.files.failedExtension,
    delimiter: settings.delimiter ?? "\t",
    hasHeader: hasHeaderRow(settings),
    relationshipMarkers: env.deletes.relationshipMarkers,
    businessKeys: parseBusinessKeys(args.deleteKeys),
  };
}

const MODE_LABEL: Record<BatchMode, string> = { load: "NORMAL", delete: "DELETE", retry: "RETRY" };

/** Run header lines printed before the batch starts. */
export function formatHeader(cfg: RunConfig, mode: BatchMode): string[] {
  return [
    `Runtime  : ${cfg.runtime.runtimeDir}`,
    `Config   : ${cfg.runtime.configPath}`,
    `Data     : ${cfg.dataDir}`,
    `Templates: ${cfg.templatesDir ?? "(next to data)"}`,
    `Logs     : ${cfg.logsDir}`,
    `Mode     : ${MODE_LABEL[mode]}`,
  ];
}

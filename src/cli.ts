#!/usr/bin/env node
/**
 * CLI: drive BatchLoaderCmd.exe over a data directory.
 *
 * Usage:
 *   batchload --bl-dir C:\BatchLoader --data-dir ./data
 *   batchload --delete                      # reverse order, generated delete templates
 *   batchload --retry --retry-dir ./failed  # replay *.failed files
 *   batchload --init-config --init-from-runtime --bl-dir C:\BatchLoader
 */

import { hideBin } from "yargs/helpers";
import { config } from "./config.js";
import { validateRunConfig } from "./config-validator.js";
import { attachRunLog, logConfig, logger, pruneOldLogs } from "./logging.js";
import { ConfigError, EmptyBatchError, LoaderLaunchError } from "./loader/errors.js";
import { initCliConfigFromRuntime, readLoaderSettings } from "./loader/loader-config.js";
import { resolveLoaderRuntime } from "./loader/runtime.js";
import type { BatchMode, RunResult, WorkItem } from "./loader/types.js";
import { runBatch } from "./orchestrator.js";
import { buildRunConfig, cliConfigPath, formatHeader, modeOf, parseCliArgs } from "./run-config.js";

const ACTION_LABEL: Record<BatchMode, string> = { load: "LOAD", delete: "DELETE", retry: "RETRY" };

function printResult(result: RunResult): void {
  switch (result.outcome.kind) {
    case "skipped":
      console.log(`[SKIP] ${result.stem}: ${result.outcome.detail}`);
      break;
    case "non-zero-exit":
      console.log(`  -> non-zero exit (${result.exitCode ?? "signal"}); check ${result.logPath}`);
      break;
    case "success":
      break;
  }
}

async function main(): Promise<number> {
  const args = parseCliArgs(hideBin(process.argv), config);

  if (args.initConfig) {
    if (!args.initFromRuntime) throw new ConfigError("--init-config requires --init-from-runtime");
    if (!args.blDir) throw new ConfigError("--init-from-runtime requires --bl-dir to locate the runtime config");
    const written = await initCliConfigFromRuntime(args.blDir, args.blConfig);
    console.log(`Initialized clean CLI config from runtime: ${written}`);
    return 0;
  }

  const mode = modeOf(args);
  attachRunLog(args.logsDir);
  const configPath = cliConfigPath(args);
  const settings = await readLoaderSettings(configPath);
  const runtime = resolveLoaderRuntime({
    runtimeDirArg: args.blDir,
    configLoaderDir: settings.loaderDir,
    configPath,
    wine: config.runtime.wine,
  });
  const cfg = buildRunConfig(args, config, settings, runtime);

  const validation = validateRunConfig(cfg, settings, mode);
  for (const warning of validation.warnings) {
    logConfig.warn(warning);
  }
  if (validation.errors.length > 0) {
    for (const error of validation.errors) {
      console.error(`ERROR: ${error}`);
    }
    return 2;
  }

  pruneOldLogs(cfg.logsDir);

  for (const line of formatHeader(cfg, mode)) console.log(line);
  console.log("");

  const summary = await runBatch(mode, cfg, undefined, {
    onStart: (item: WorkItem) => console.log(`[${ACTION_LABEL[item.mode]}] ${item.stem}`),
    onResult: printResult,
  });

  console.log("\nDone.");
  console.log(
    `  Processed: ${summary.results.length}  Succeeded: ${summary.succeeded}  ` +
      `Failed: ${summary.failed}  Skipped: ${summary.skipped}`,
  );
  return summary.failed > 0 ? 1 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof ConfigError || err instanceof EmptyBatchError || err instanceof LoaderLaunchError) {
      console.error(`ERROR: ${err.message}`);
      logger.error({ err }, "Run aborted");
      process.exitCode = 2;
      return;
    }
    logger.fatal({ err }, "Unexpected failure");
    console.error(err);
    process.exitCode = 1;
  });

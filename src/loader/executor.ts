import { spawn } from "node:child_process";
import { createWriteStream, mkdirSync } from "node:fs";
import path from "node:path";
import { LoaderLaunchError } from "./errors.js";
import type { BatchMode, LoaderRuntime, RunResult, WorkItem } from "./types.js";
import { logExec } from "../logging.js";

export interface LoaderCommand {
  command: string;
  args: string[];
}

/** Per-mode log subdirectory: <logsDir>/load, <logsDir>/delete, <logsDir>/retry */
export function modeLogDir(logsDir: string, mode: BatchMode): string {
  return path.join(logsDir, mode);
}

export function logPathFor(logsDir: string, item: Pick<WorkItem, "stem" | "mode">): string {
  return path.join(modeLogDir(logsDir, item.mode), `${item.stem}.log`);
}

/** Loader stdout/stderr capture, beside the loader's own -l file. */
export function consoleLogPathFor(logsDir: string, item: Pick<WorkItem, "stem" | "mode">): string {
  return path.join(modeLogDir(logsDir, item.mode), `${item.stem}.console.log`);
}

/**
 * BatchLoaderCmd.exe -d <data> -c <config> -t <template> -l <log>
 * All paths absolute; prefixed with wine on non-Windows hosts.
 */
export function buildLoaderCommand(
  runtime: LoaderRuntime,
  dataPath: string,
  templatePath: string,
  logPath: string,
): LoaderCommand {
  const loaderArgs = [
    "-d", path.resolve(dataPath),
    "-c", path.resolve(runtime.configPath),
    "-t", path.resolve(templatePath),
    "-l", path.resolve(logPath),
  ];
  return runtime.useWine
    ? { command: "wine", args: [runtime.exePath, ...loaderArgs] }
    : { command: runtime.exePath, args: loaderArgs };
}

/**
 * Run the loader once for a WorkItem and wait for it to exit.
 *
 * Exit code 0 → success, anything else (including a signal) → non-zero-exit.
 * stdout and stderr go, in arrival order, to <stem>.console.log.
 * A process that cannot be started at all rejects with LoaderLaunchError.
 */
export async function runLoader(
  item: WorkItem,
  templatePath: string,
  runtime: LoaderRuntime,
  logsDir: string,
): Promise<RunResult> {
  const logPath = logPathFor(logsDir, item);
  mkdirSync(path.dirname(logPath), { recursive: true });

  const { command, args } = buildLoaderCommand(runtime, item.dataPath, templatePath, logPath);
  const startTime = Date.now();
  logExec.info({ stem: item.stem, mode: item.mode, command, args }, "Starting loader");

  const consolePath = consoleLogPathFor(logsDir, item);
  const consoleLog = createWriteStream(consolePath);
  consoleLog.on("error", (err) => {
    logExec.warn({ stem: item.stem, consolePath, err }, "Console capture failed");
  });

  return new Promise<RunResult>((resolve, reject) => {
    let settled = false;

    // Run from the runtime dir so BatchLoaderCmd.exe resolves its DLLs
    const proc = spawn(command, args, {
      cwd: runtime.runtimeDir,
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
    });

    proc.stdout?.on("data", (data: Buffer) => consoleLog.write(data));
    proc.stderr?.on("data", (data: Buffer) => consoleLog.write(data));

    proc.on("error", (err: NodeJS.ErrnoException) => {
      if (settled) return;
      settled = true;
      logExec.error({ stem: item.stem, command, err }, "Failed to spawn loader process");
      consoleLog.end(() => reject(new LoaderLaunchError(command, err)));
    });

    proc.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      const durationMs = Date.now() - startTime;

      consoleLog.end(() => {
        if (code === 0) {
          logExec.info({ stem: item.stem, durationMs, logPath }, "Loader completed");
          resolve({ stem: item.stem, exitCode: 0, logPath, outcome: { kind: "success" } });
          return;
        }

        logExec.warn({ stem: item.stem, exitCode: code, signal, durationMs, logPath, consolePath }, "Loader exited non-zero");
        resolve({ stem: item.stem, exitCode: code, logPath, outcome: { kind: "non-zero-exit" } });
      });
    });
  });
}

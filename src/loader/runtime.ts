import { existsSync } from "node:fs";
import path from "node:path";
import { ConfigError } from "./errors.js";
import type { LoaderRuntime } from "./types.js";

export const LOADER_EXE_NAME = "BatchLoaderCmd.exe";

export type WineSetting = "auto" | "true" | "false";

export function isWindows(platform: NodeJS.Platform = process.platform): boolean {
  return platform === "win32";
}

/** Look an executable up on PATH (no shell). */
export function which(command: string, envPath: string = process.env.PATH ?? ""): string | null {
  for (const dir of envPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, command);
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

/**
 * Decide whether the Windows executable must be launched through wine.
 * "auto": on non-Windows hosts only, and wine has to be on PATH.
 */
export function resolveUseWine(
  setting: WineSetting,
  platform: NodeJS.Platform = process.platform,
  findExecutable: (cmd: string) => string | null = which,
): boolean {
  if (setting === "false") return false;
  if (setting === "true") return true;
  if (isWindows(platform)) return false;
  if (!findExecutable("wine")) {
    throw new ConfigError(
      "Windows EXE detected and no 'wine' found. Run on Windows/WSL or install wine (or set BL_USE_WINE=false).",
    );
  }
  return true;
}

export interface RuntimeInput {
  /** --bl-dir, wins over <loader_dir> */
  runtimeDirArg: string | null;
  /** <loader_dir> from the CLI config */
  configLoaderDir: string | null;
  configPath: string;
  wine: WineSetting;
  platform?: NodeJS.Platform;
  findExecutable?: (cmd: string) => string | null;
}

/** Locate the loader runtime and check the executable is there. */
export function resolveLoaderRuntime(input: RuntimeInput): LoaderRuntime {
  const dir = input.runtimeDirArg ?? input.configLoaderDir;
  if (!dir) {
    throw new ConfigError("No runtime provided. Set --bl-dir or <loader_dir> in your CLI config");
  }
  const runtimeDir = path.resolve(dir);
  const exePath = path.join(runtimeDir, LOADER_EXE_NAME);
  if (!existsSync(exePath)) {
    throw new ConfigError(`${LOADER_EXE_NAME} not found: ${exePath}`);
  }

  return {
    exePath,
    runtimeDir,
    configPath: path.resolve(input.configPath),
    useWine: resolveUseWine(input.wine, input.platform, input.findExecutable),
  };
}

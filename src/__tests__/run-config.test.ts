import { describe, it, expect } from "vitest";
import { resolve } from "node:path";
import { loadEnvConfig } from "../config.js";
import { ConfigError } from "../loader/errors.js";
import type { LoaderSettings } from "../loader/loader-config.js";
import type { LoaderRuntime } from "../loader/types.js";
import { buildRunConfig, cliConfigPath, formatHeader, modeOf, parseCliArgs } from "../run-config.js";

const env = loadEnvConfig({ BL_DIR: "/opt/bl", BL_DELETE_KEYS: "Part=item_number" });

const settings: LoaderSettings = {
  server: "http://plm.local/InnovatorServer",
  db: "PLM",
  user: "admin",
  password: "test-secret",
  maxProcesses: null,
  threads: null,
  linesPerProcess: null,
  delimiter: null,
  encoding: "",
  firstRow: 2,
  logLevel: "",
  logFile: "",
  loaderDir: null,
};

const runtime: LoaderRuntime = {
  exePath: "/opt/bl/BatchLoaderCmd.exe",
  runtimeDir: "/opt/bl",
  configPath: "/cfg/CLIBatchLoaderConfig.xml",
  useWine: false,
};

describe("run config", () => {
  describe("parseCliArgs()", () => {
    it("falls back to environment defaults", () => {
      expect(parseCliArgs([], env)).toEqual({
        blDir: "/opt/bl",
        blConfig: null,
        dataDir: "./data",
        templatesDir: null,
        logsDir: "./logs",
        retry: false,
        retryDir: null,
        delete: false,
        deleteTemplatesDir: "./templates_delete",
        deleteKeys: ["Part=item_number"],
        initConfig: false,
        initFromRuntime: false,
      });
    });

    it("lets flags override the environment", () => {
      const args = parseCliArgs(
        [
          "--bl-dir", "/mnt/bl",
          "--bl-config", "cfg.xml",
          "--data-dir", "in",
          "--templates-dir", "tpl",
          "--delete",
          "--delete-key", "Document=item_number:2",
          "--delete-key", "CAD=item_number",
        ],
        env,
      );

      expect(args.blDir).toBe("/mnt/bl");
      expect(args.blConfig).toBe("cfg.xml");
      expect(args.dataDir).toBe("in");
      expect(args.templatesDir).toBe("tpl");
      expect(args.delete).toBe(true);
      expect(args.deleteKeys).toEqual(["Part=item_number", "Document=item_number:2", "CAD=item_number"]);
    });

    it("rejects --retry together with --delete", () => {
      expect(() => parseCliArgs(["--retry", "--delete"], env)).toThrow(ConfigError);
    });

    it("rejects unknown flags", () => {
      expect(() => parseCliArgs(["--dry-run"], env)).toThrow(ConfigError);
    });
  });

  it("modeOf() picks the batch mode", () => {
    expect(modeOf({ retry: false, delete: false })).toBe("load");
    expect(modeOf({ retry: false, delete: true })).toBe("delete");
    expect(modeOf({ retry: true, delete: false })).toBe("retry");
  });

  it("cliConfigPath() defaults to the working directory", () => {
    expect(cliConfigPath({ blConfig: null })).toBe("CLIBatchLoaderConfig.xml");
    expect(cliConfigPath({ blConfig: "/cfg/x.xml" })).toBe("/cfg/x.xml");
  });

  it("buildRunConfig() resolves paths and loader settings", () => {
    const args = parseCliArgs(["--retry", "--retry-dir", "failed"], env);

    const cfg = buildRunConfig(args, env, settings, runtime);

    expect(cfg).toEqual({
      runtime,
      dataDir: resolve("./data"),
      templatesDir: null,
      logsDir: resolve("./logs"),
      retryDir: resolve("failed"),
      deleteTemplatesDir: resolve("./templates_delete"),
      dataExtension: ".txt",
      failedExtension: ".failed",
      delimiter: "\t",
      hasHeader: true,
      relationshipMarkers: ["BOM", "Relationship"],
      businessKeys: { Part: { field: "item_number" } },
    });
  });

  it("formatHeader() lists the run settings", () => {
    const cfg = buildRunConfig(parseCliArgs(["--delete"], env), env, { ...settings, delimiter: "," }, runtime);

    expect(formatHeader(cfg, "delete")).toEqual([
      "Runtime  : /opt/bl",
      "Config   : /cfg/CLIBatchLoaderConfig.xml",
      `Data     : ${resolve("./data")}`,
      "Templates: (next to data)",
      `Logs     : ${resolve("./logs")}`,
      "Mode     : DELETE",
    ]);
    expect(cfg.delimiter).toBe(",");
  });
});

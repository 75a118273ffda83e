import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { validateRunConfig } from "../config-validator.js";
import type { LoaderSettings } from "../loader/loader-config.js";
import type { RunConfig } from "../loader/types.js";
import { mkdirSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

describe("validateRunConfig", () => {
  let root: string;
  let cfg: RunConfig;

  const settings: LoaderSettings = {
    server: "http://plm.local/InnovatorServer",
    db: "PLM",
    user: "admin",
    password: "test-secret",
    maxProcesses: null,
    threads: null,
    linesPerProcess: null,
    delimiter: "\t",
    encoding: "utf-8",
    firstRow: 2,
    logLevel: "",
    logFile: "",
    loaderDir: null,
  };

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "validator-test-"));
    mkdirSync(join(root, "data"));
    cfg = {
      runtime: { exePath: join(root, "BatchLoaderCmd.exe"), runtimeDir: root, configPath: join(root, "cli.xml"), useWine: false },
      dataDir: join(root, "data"),
      templatesDir: null,
      logsDir: join(root, "logs"),
      retryDir: null,
      deleteTemplatesDir: join(root, "templates_delete"),
      dataExtension: ".txt",
      failedExtension: ".failed",
      delimiter: "\t",
      hasHeader: true,
      relationshipMarkers: ["BOM", "Relationship"],
      businessKeys: {},
    };
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("should pass validation for a valid config", () => {
    const result = validateRunConfig(cfg, settings, "load");
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it("should report missing directories", () => {
    const result = validateRunConfig(
      { ...cfg, dataDir: join(root, "nope"), templatesDir: join(root, "tpl"), retryDir: join(root, "failed") },
      settings,
      "retry",
    );
    expect(result.errors).toEqual([
      `data dir not found: ${join(root, "nope")}`,
      `templates dir not found: ${join(root, "tpl")}`,
      `retry dir not found: ${join(root, "failed")}`,
    ]);
  });

  it("should ignore the retry dir outside retry mode", () => {
    const result = validateRunConfig({ ...cfg, retryDir: join(root, "failed") }, settings, "load");
    expect(result.errors).toEqual([]);
  });

  it("should reject identical data and failed extensions", () => {
    const result = validateRunConfig({ ...cfg, failedExtension: ".TXT" }, settings, "load");
    expect(result.errors).toEqual(["data extension and failed extension must differ, both are .txt"]);
  });

  it("should reject a multi-character delimiter", () => {
    const result = validateRunConfig({ ...cfg, delimiter: "||" }, settings, "load");
    expect(result.errors).toEqual(['delimiter must be a single character, got "||"']);
  });

  it("should require a relationship marker", () => {
    const result = validateRunConfig({ ...cfg, relationshipMarkers: [] }, settings, "delete");
    expect(result.errors).toEqual(["at least one relationship marker is required"]);
  });

  it("should reject a non-positive business key column", () => {
    const result = validateRunConfig(
      { ...cfg, businessKeys: { Part: { field: "item_number", column: 0 } } },
      settings,
      "delete",
    );
    expect(result.errors).toEqual(["delete key column for Part must be a positive integer, got 0"]);
  });

  it("should warn when connection fields are missing", () => {
    const result = validateRunConfig(cfg, { ...settings, server: "", user: "" }, "load");
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual(["loader config has no server, user; the loader will likely fail to connect"]);
  });

  it("should warn in delete mode when header settings are missing", () => {
    const partial = { ...settings, delimiter: null, firstRow: null };
    expect(validateRunConfig(cfg, partial, "load").warnings).toEqual([]);
    expect(validateRunConfig(cfg, partial, "delete").warnings).toEqual([
      "loader config has no <delimiter>; header rows are split on tab",
      "loader config has no valid <first_row>; data files are treated as headerless (id = column 1)",
    ]);
  });
});

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { loadEnvConfig, parseBusinessKeyEntry, parseBusinessKeys } from "../config.js";
import { ConfigError } from "../loader/errors.js";

const clearEnv = () => {
  const keys = [
    "BL_DIR",
    "BL_CONFIG",
    "BL_DATA_DIR",
    "BL_TEMPLATES_DIR",
    "BL_LOGS_DIR",
    "BL_DELETE_TEMPLATES_DIR",
    "BL_DATA_EXT",
    "BL_FAILED_EXT",
    "BL_RELATIONSHIP_MARKERS",
    "BL_DELETE_KEYS",
    "BL_USE_WINE",
    "LOG_LEVEL",
  ];
  for (const key of keys) {
    delete process.env[key];
  }
};

const loadConfig = async () => {
  const module = await import("../config.js");
  return module.config;
};

describe("config", () => {
  beforeEach(() => {
    vi.resetModules();
    vi.unstubAllEnvs();
    clearEnv();
  });

  afterEach(() => {
    vi.resetModules();
    vi.unstubAllEnvs();
    clearEnv();
  });

  it("uses defaults when nothing is set", () => {
    expect(loadEnvConfig({})).toEqual({
      paths: {
        dataDir: "./data",
        logsDir: "./logs",
        templatesDir: null,
        deleteTemplatesDir: "./templates_delete",
        cliConfig: null,
        runtimeDir: null,
      },
      files: { dataExtension: ".txt", failedExtension: ".failed" },
      deletes: { relationshipMarkers: ["BOM", "Relationship"], businessKeys: [] },
      runtime: { wine: "auto" },
      logLevel: "info",
    });
  });

  it("reads BL_* variables from process.env", async () => {
    vi.stubEnv("BL_DIR", "C:/BatchLoader");
    vi.stubEnv("BL_DATA_DIR", "/srv/loads");
    vi.stubEnv("BL_USE_WINE", "false");
    const cfg = await loadConfig();
    expect(cfg.paths.runtimeDir).toBe("C:/BatchLoader");
    expect(cfg.paths.dataDir).toBe("/srv/loads");
    expect(cfg.runtime.wine).toBe("false");
  });

  it("adds the leading dot to extensions", () => {
    const cfg = loadEnvConfig({ BL_DATA_EXT: "csv", BL_FAILED_EXT: ".err" });
    expect(cfg.files).toEqual({ dataExtension: ".csv", failedExtension: ".err" });
  });

  it("splits relationship markers and delete keys", () => {
    const cfg = loadEnvConfig({
      BL_RELATIONSHIP_MARKERS: "BOM, Relationship ,Link",
      BL_DELETE_KEYS: "Part=item_number; ;Document=item_number:3",
    });
    expect(cfg.deletes.relationshipMarkers).toEqual(["BOM", "Relationship", "Link"]);
    expect(cfg.deletes.businessKeys).toEqual(["Part=item_number", "Document=item_number:3"]);
  });

  it("maps BL_USE_WINE values", () => {
    expect(loadEnvConfig({ BL_USE_WINE: "1" }).runtime.wine).toBe("true");
    expect(loadEnvConfig({ BL_USE_WINE: "TRUE" }).runtime.wine).toBe("true");
    expect(loadEnvConfig({ BL_USE_WINE: "0" }).runtime.wine).toBe("false");
    expect(loadEnvConfig({ BL_USE_WINE: "maybe" }).runtime.wine).toBe("auto");
  });

  describe("business keys", () => {
    it("parses Type=field and Type=field:column", () => {
      expect(parseBusinessKeyEntry("Part=item_number")).toEqual(["Part", { field: "item_number" }]);
      expect(parseBusinessKeyEntry("Manufacturer Part=item_number:2")).toEqual([
        "Manufacturer Part",
        { field: "item_number", column: 2 },
      ]);
    });

    it("rejects malformed entries", () => {
      expect(() => parseBusinessKeyEntry("Part")).toThrow(ConfigError);
      expect(() => parseBusinessKeyEntry("=item_number")).toThrow("item type is required");
      expect(() => parseBusinessKeyEntry("Part=item number")).toThrow("field must be a property name");
      expect(() => parseBusinessKeyEntry("Part=item_number:0")).toThrow(ConfigError);
    });

    it("builds a map, later entries winning", () => {
      expect(parseBusinessKeys(["Part=item_number", "", "Part=keyed_name:4"])).toEqual({
        Part: { field: "keyed_name", column: 4 },
      });
    });
  });
});

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { findTemplate, missingTemplateHint, stemOf, templateCandidates } from "../template-resolver.js";

describe("template resolver", () => {
  let root: string;
  let dataDir: string;
  let templatesDir: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "resolver-test-"));
    dataDir = join(root, "data");
    templatesDir = join(root, "templates");
    mkdirSync(dataDir);
    mkdirSync(templatesDir);
    writeFileSync(join(dataDir, "001-User.txt"), "id\tname\n");
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("derives stems by stripping the last extension", () => {
    expect(stemOf("/x/001-User.txt")).toBe("001-User");
    expect(stemOf("001-User.failed")).toBe("001-User");
    expect(stemOf("README")).toBe("README");
  });

  it("prefers <templatesDir>/<stem>.xml over the sibling template", () => {
    writeFileSync(join(templatesDir, "001-User.xml"), "<AML/>");
    writeFileSync(join(dataDir, "001-User_Template.xml"), "<AML/>");

    expect(findTemplate(join(dataDir, "001-User.txt"), templatesDir)).toBe(join(templatesDir, "001-User.xml"));
  });

  it("falls back to <stem>_Template.xml next to the data file when the templates dir misses", () => {
    writeFileSync(join(dataDir, "001-User_Template.xml"), "<AML/>");

    expect(findTemplate(join(dataDir, "001-User.txt"), templatesDir)).toBe(join(dataDir, "001-User_Template.xml"));
  });

  it("uses only the sibling template when no templates dir is configured", () => {
    writeFileSync(join(templatesDir, "001-User.xml"), "<AML/>");

    expect(findTemplate(join(dataDir, "001-User.txt"), null)).toBeNull();
  });

  it("returns null when no candidate exists", () => {
    expect(findTemplate(join(dataDir, "001-User.txt"), templatesDir)).toBeNull();
  });

  it("is deterministic across repeated calls on an unchanged directory", () => {
    writeFileSync(join(dataDir, "001-User_Template.xml"), "<AML/>");
    const first = findTemplate(join(dataDir, "001-User.txt"), templatesDir);
    const second = findTemplate(join(dataDir, "001-User.txt"), templatesDir);
    expect(second).toBe(first);
  });

  it("checks an extra fallback directory last (retry files outside the data dir)", () => {
    const retryDir = join(root, "failed");
    mkdirSync(retryDir);
    writeFileSync(join(dataDir, "001-User_Template.xml"), "<AML/>");

    const failed = join(retryDir, "001-User.failed");
    expect(templateCandidates(failed, templatesDir, dataDir)).toEqual([
      join(templatesDir, "001-User.xml"),
      join(retryDir, "001-User_Template.xml"),
      join(dataDir, "001-User_Template.xml"),
    ]);
    expect(findTemplate(failed, templatesDir, dataDir)).toBe(join(dataDir, "001-User_Template.xml"));
  });

  it("does not list the fallback twice when it is the data file's own directory", () => {
    const candidates = templateCandidates(join(dataDir, "001-User.failed"), null, dataDir);
    expect(candidates).toEqual([join(dataDir, "001-User_Template.xml")]);
  });

  it("formats a skip hint naming both locations", () => {
    expect(missingTemplateHint("001-User", null)).toBe("001-User_Template.xml");
    expect(missingTemplateHint("001-User", "/t")).toBe(`${join("/t", "001-User.xml")} or 001-User_Template.xml`);
  });
});

import { existsSync } from "node:fs";
import path from "node:path";

/** File name without its (last) extension: "001-User.failed" → "001-User". */
export function stemOf(filePath: string): string {
  const base = path.basename(filePath);
  const ext = path.extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}

/**
 * Candidate template paths for a data file, in resolution order:
 *   1. <templatesDir>/<stem>.xml           (central templates directory, if configured)
 *   2. <dir of data file>/<stem>_Template.xml
 *   3. <fallbackDir>/<stem>_Template.xml   (retry: failed files may live outside the data dir)
 */
export function templateCandidates(
  dataPath: string,
  templatesDir: string | null,
  fallbackDir: string | null = null,
): string[] {
  const stem = stemOf(dataPath);
  const candidates: string[] = [];
  if (templatesDir) candidates.push(path.join(templatesDir, `${stem}.xml`));
  candidates.push(path.join(path.dirname(dataPath), `${stem}_Template.xml`));
  if (fallbackDir) {
    const extra = path.join(fallbackDir, `${stem}_Template.xml`);
    if (!candidates.includes(extra)) candidates.push(extra);
  }
  return candidates;
}

/**
 * Resolve the load template for a data file. First existing candidate wins.
 * Returns null when nothing matches; the caller skips the file.
 */
export function findTemplate(
  dataPath: string,
  templatesDir: string | null,
  fallbackDir: string | null = null,
): string | null {
  for (const candidate of templateCandidates(dataPath, templatesDir, fallbackDir)) {
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

/** Human-readable list of where a template was looked for, for skip notices. */
export function missingTemplateHint(stem: string, templatesDir: string | null): string {
  return templatesDir ? `${path.join(templatesDir, `${stem}.xml`)} or ${stem}_Template.xml` : `${stem}_Template.xml`;
}

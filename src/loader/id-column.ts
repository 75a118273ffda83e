/**
 * ID column detection for delete mode.
 *
 * With a header row, the first line of the data file is parsed with the
 * configured delimiter and matched (case-insensitive) against the accepted
 * id column names. Without a header, column 1 is the id by convention and
 * the file is never opened.
 */

import { open } from "node:fs/promises";
import { CsvError, parse } from "csv-parse/sync";
import { HeaderReadError, MissingIdColumnError } from "./errors.js";

export const ACCEPTED_ID_NAMES = ["id", "rel_id", "relationship_id"] as const;

export interface IdColumnOptions {
  delimiter: string;
  hasHeader: boolean;
}

const READ_CHUNK_BYTES = 4096;

/** Bytes up to the first line break (or EOF). */
export async function readFirstLine(filePath: string): Promise<string> {
  const handle = await open(filePath, "r");
  try {
    const chunks: Buffer[] = [];
    let position = 0;
    for (;;) {
      const buf = Buffer.alloc(READ_CHUNK_BYTES);
      const { bytesRead } = await handle.read(buf, 0, READ_CHUNK_BYTES, position);
      if (bytesRead === 0) break;
      const slice = buf.subarray(0, bytesRead);
      const newline = slice.indexOf(0x0a);
      if (newline !== -1) {
        chunks.push(slice.subarray(0, newline));
        break;
      }
      chunks.push(slice);
      position += bytesRead;
    }
    return Buffer.concat(chunks).toString("utf-8").replace(/\r$/, "");
  } finally {
    await handle.close();
  }
}

/**
 * Split a header line into trimmed column names, keeping column positions.
 * A line csv-parse rejects (an unclosed quote) is split on the raw delimiter.
 */
export function parseHeaderLine(line: string, delimiter: string): string[] {
  const clean = line.replace(/^\uFEFF/, "");
  if (!clean.trim()) return [];
  let cells: string[];
  try {
    const rows: string[][] = parse(clean, {
      delimiter,
      bom: true,
      relax_quotes: true,
      relax_column_count: true,
      to_line: 1,
    });
    cells = rows[0] ?? [];
  } catch (err) {
    if (!(err instanceof CsvError)) throw err;
    cells = clean.split(delimiter);
  }
  // csv-parse's `trim` treats a tab delimiter as whitespace, so names are trimmed here
  return cells.map((name) => name.trim());
}

/** Lowercased column name → first 1-based index at which it appears. */
export function buildHeaderIndex(headers: readonly string[]): Map<string, number> {
  const index = new Map<string, number>();
  headers.forEach((name, i) => {
    const key = name.toLowerCase();
    if (key && !index.has(key)) index.set(key, i + 1);
  });
  return index;
}

/**
 * Pick the id column from parsed headers. Leftmost accepted name wins when
 * several are present.
 */
export function findIdColumn(headers: readonly string[]): number | null {
  const index = buildHeaderIndex(headers);
  let best: number | null = null;
  for (const name of ACCEPTED_ID_NAMES) {
    const col = index.get(name);
    if (col !== undefined && (best === null || col < best)) best = col;
  }
  return best;
}

/**
 * Resolve the 1-based id column for a data file. Problems with one file
 * (unreadable, no id column) throw errors scoped to that file.
 */
export async function detectIdColumn(dataPath: string, opts: IdColumnOptions): Promise<number> {
  if (!opts.hasHeader) return 1;

  let line: string;
  try {
    line = await readFirstLine(dataPath);
  } catch (err) {
    if (err instanceof Error) throw new HeaderReadError(dataPath, err);
    throw err;
  }
  const headers = parseHeaderLine(line, opts.delimiter);
  const col = findIdColumn(headers);
  if (col === null) {
    throw new MissingIdColumnError(dataPath, headers, ACCEPTED_ID_NAMES);
  }
  return col;
}

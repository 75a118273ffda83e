/**
 * Delete Template Synthesizer
 *
 * Turns an add/merge AML template into a delete template:
 *   <Item type="Part" action="add"><item_number>@1</item_number>…</Item>
 * becomes
 *   <Item type="Part" action="delete" id="@N"></Item>
 * where N is the id column of the paired data file. Item types with a
 * configured business key are deleted by lookup instead:
 *   <Item type="Part" action="delete" where="[Part].item_number='@N'"></Item>
 *
 * Output lands in the delete-templates directory as <stem>.xml and is
 * regenerated on every run, byte-for-byte identical for the same input.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { TemplateSynthesisError } from "./errors.js";
import type { BusinessKeyMap } from "./types.js";
import { logTemplates } from "../logging.js";

export const DEFAULT_RELATIONSHIP_MARKERS = ["BOM", "Relationship"] as const;

const ATTR = ":@";
const ATTR_PREFIX = "@_";

const XML_OPTIONS = {
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  commentPropName: "#comment",
} as const;

const BUILDER_OPTIONS = {
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  commentPropName: "#comment",
  format: true,
  indentBy: "\t",
  suppressEmptyNode: false,
} as const;

const XML_DECLARATION = `<?xml version="1.0" encoding="utf-8"?>`;

// ── Ordered XML tree helpers ─────────────────────────────────────────────
// preserveOrder output: [{ Tag: [children…], ":@": { "@_attr": "v" } }, { "#text": "…" }]

type OrderedNode = Record<string, unknown>;

function isNode(value: unknown): value is OrderedNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nodeList(value: unknown): OrderedNode[] {
  return Array.isArray(value) ? value.filter(isNode) : [];
}

function tagOf(node: OrderedNode): string | null {
  return Object.keys(node).find((k) => k !== ATTR) ?? null;
}

function attributesOf(node: OrderedNode): Record<string, string> {
  const raw = node[ATTR];
  const attrs: Record<string, string> = {};
  if (!isNode(raw)) return attrs;
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === "string") attrs[key] = value;
  }
  return attrs;
}

/** First <Item> in document order (depth-first). */
function findFirstItem(nodes: OrderedNode[]): OrderedNode | null {
  for (const node of nodes) {
    const tag = tagOf(node);
    if (tag === null || tag.startsWith("#")) continue;
    if (tag === "Item") return node;
    const nested = findFirstItem(nodeList(node[tag]));
    if (nested) return nested;
  }
  return null;
}

// ── Subject classification ───────────────────────────────────────────────

export type TemplateSubject =
  | { readonly kind: "relationship"; readonly itemType: string }
  | { readonly kind: "item"; readonly itemType: string };

/** Relationship-like when any token of the type, split on spaces and underscores, is a marker ("Part BOM", "Part_BOM"). */
export function classifySubject(itemType: string, markers: readonly string[]): TemplateSubject {
  const tokens = itemType.split(/[\s_]+/).filter(Boolean);
  const isRelationship = tokens.some((t) => markers.includes(t));
  return isRelationship ? { kind: "relationship", itemType } : { kind: "item", itemType };
}

/** AML where-clause table name: spaces become underscores. */
function tableName(itemType: string): string {
  return itemType.trim().replace(/\s+/g, "_");
}

/** Attributes that key the delete, per subject kind. */
export function deleteKeyAttributes(
  subject: TemplateSubject,
  idColumn: number,
  businessKeys: BusinessKeyMap,
): { id: string } | { where: string } {
  switch (subject.kind) {
    case "relationship":
      return { id: `@${idColumn}` };
    case "item": {
      const key = businessKeys[subject.itemType];
      if (!key) return { id: `@${idColumn}` };
      const column = key.column ?? idColumn;
      return { where: `[${tableName(subject.itemType)}].${key.field}='@${column}'` };
    }
  }
}

// ── Synthesis ────────────────────────────────────────────────────────────

export interface SynthesisOptions {
  outDir: string;
  stem: string;
  relationshipMarkers?: readonly string[];
  businessKeys?: BusinessKeyMap;
}

export interface SynthesizedTemplate {
  path: string;
  subject: TemplateSubject;
  xml: string;
}

/** Pure transformation: insert template XML → delete template XML. */
export function buildDeleteTemplateXml(
  insertXml: string,
  idColumn: number,
  opts: { sourcePath: string; relationshipMarkers?: readonly string[]; businessKeys?: BusinessKeyMap },
): { xml: string; subject: TemplateSubject } {
  const validation = XMLValidator.validate(insertXml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new TemplateSynthesisError(opts.sourcePath, `malformed XML at ${line}:${col}: ${msg}`);
  }

  const tree = nodeList(new XMLParser(XML_OPTIONS).parse(insertXml));
  const item = findFirstItem(tree);
  if (!item) {
    throw new TemplateSynthesisError(opts.sourcePath, "no <Item> element found");
  }

  const attrs = attributesOf(item);
  const subject = classifySubject(
    attrs[`${ATTR_PREFIX}type`] ?? "",
    opts.relationshipMarkers ?? DEFAULT_RELATIONSHIP_MARKERS,
  );
  const key = deleteKeyAttributes(subject, idColumn, opts.businessKeys ?? {});

  // Keep the remaining attributes in their original order; the delete key replaces id/where.
  const next: Record<string, string> = {};
  for (const [name, value] of Object.entries(attrs)) {
    if (name === `${ATTR_PREFIX}id` || name === `${ATTR_PREFIX}where`) continue;
    next[name] = value;
  }
  next[`${ATTR_PREFIX}action`] = "delete";
  if ("id" in key) next[`${ATTR_PREFIX}id`] = key.id;
  else next[`${ATTR_PREFIX}where`] = key.where;

  item[ATTR] = next;
  item["Item"] = [];

  const body = String(new XMLBuilder(BUILDER_OPTIONS).build(tree)).trim();
  return { xml: `${XML_DECLARATION}\n${body}\n`, subject };
}

/**
 * Build and persist the delete template for one data file. The insert
 * template on disk is never modified.
 */
export async function synthesizeDeleteTemplate(
  insertTemplatePath: string,
  idColumn: number,
  opts: SynthesisOptions,
): Promise<SynthesizedTemplate> {
  let insertXml: string;
  try {
    insertXml = await readFile(insertTemplatePath, "utf-8");
  } catch (err) {
    throw new TemplateSynthesisError(insertTemplatePath, err instanceof Error ? err.message : String(err));
  }

  const { xml, subject } = buildDeleteTemplateXml(insertXml, idColumn, {
    sourcePath: insertTemplatePath,
    relationshipMarkers: opts.relationshipMarkers,
    businessKeys: opts.businessKeys,
  });

  await mkdir(opts.outDir, { recursive: true });
  const outPath = path.join(opts.outDir, `${opts.stem}.xml`);
  await writeFile(outPath, xml, "utf-8");

  logTemplates.debug(
    { stem: opts.stem, subject: subject.kind, itemType: subject.itemType, idColumn, outPath },
    "Delete template written",
  );
  return { path: outPath, subject, xml };
}

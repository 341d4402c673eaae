/**
 * XML Utilities
 * Artifact merging and in-place attribute rewriting on cheerio's XML mode
 */

import { load, type CheerioAPI } from "cheerio";
import { readFile, writeFile } from "fs/promises";
import { XmlStructureError } from "../types";

/**
 * Entities are left as written, so untouched text round-trips unchanged
 */
export function parseXml(content: string): CheerioAPI {
  return load(content, { xml: { xmlMode: true, decodeEntities: false } });
}

function rootOf($: CheerioAPI, source: string) {
  const root = $.root().children().first();
  if (root.length === 0) {
    throw new XmlStructureError(source, "document has no root element");
  }
  return root;
}

export interface MergeResult {
  xml: string;
  appended: number; // Top-level elements taken from the second document
}

/**
 * Append every top-level child element of the second document's root to the
 * first document's root, in original order. Root attributes of the first
 * document are kept; nothing is de-duplicated.
 */
export function mergeXmlDocuments(
  base: string,
  extra: string,
  sources: { base: string; extra: string } = { base: "base", extra: "extra" },
): MergeResult {
  const $base = parseXml(base);
  const $extra = parseXml(extra);

  const baseRoot = rootOf($base, sources.base);
  const extraChildren = rootOf($extra, sources.extra).children().toArray();

  baseRoot.append(extraChildren);

  return { xml: $base.xml(), appended: extraChildren.length };
}

/**
 * Merge two XML files into a new file; neither input is modified
 */
export async function mergeXmlFiles(
  basePath: string,
  extraPath: string,
  outputPath: string,
): Promise<MergeResult> {
  const [base, extra] = await Promise.all([
    readFile(basePath, "utf-8"),
    readFile(extraPath, "utf-8"),
  ]);

  const result = mergeXmlDocuments(base, extra, {
    base: basePath,
    extra: extraPath,
  });
  await writeFile(outputPath, result.xml, "utf-8");
  return result;
}

export interface RewriteResult {
  xml: string;
  updated: number; // Elements whose attribute was set
}

/**
 * Set attribute to value on every element named tag
 */
export function setAttributeOnTag(
  content: string,
  tag: string,
  attribute: string,
  value: string,
  source = "document",
): RewriteResult {
  const $ = parseXml(content);
  rootOf($, source);

  const matches = $("*").filter((_, el) => el.name === tag);
  matches.attr(attribute, value);

  return { xml: $.xml(), updated: matches.length };
}

/**
 * Rewrite an XML file in place; the file is untouched when no element matches
 */
export async function setAttributeInFile(
  filePath: string,
  tag: string,
  attribute: string,
  value: string,
): Promise<number> {
  const content = await readFile(filePath, "utf-8");
  const { xml, updated } = setAttributeOnTag(
    content,
    tag,
    attribute,
    value,
    filePath,
  );

  if (updated > 0) {
    await writeFile(filePath, xml, "utf-8");
  }
  return updated;
}

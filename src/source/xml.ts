/**
 * Helpers over xml2js output (explicitArray mode): every child element is
 * an array, text lives under `_` when an element also has attributes, and
 * attributes live under `$`.
 */

import { parseStringPromise } from "xml2js";
import { PayloadParseError } from "./errors.js";

export type XmlNode = { readonly [key: string]: unknown };

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse an XML payload. Unparsable input (often an HTML error page)
 * becomes a PayloadParseError, which is retryable.
 */
export async function parseXml(text: string, url: string): Promise<XmlNode> {
  let parsed: unknown;
  try {
    parsed = await parseStringPromise(text, { explicitArray: true, trim: true });
  } catch (err) {
    throw new PayloadParseError(`Unparsable XML from ${url}`, { url, cause: err });
  }
  if (!isNode(parsed)) {
    throw new PayloadParseError(`Empty XML document from ${url}`, { url });
  }
  return parsed;
}

/**
 * Direct child elements named `tag`.
 */
export function children(node: unknown, tag: string): unknown[] {
  if (!isNode(node)) {
    return [];
  }
  const value = node[tag];
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

export function child(node: unknown, tag: string): unknown {
  return children(node, tag)[0];
}

/**
 * Every element named `tag` at any depth, in document order.
 */
export function descendants(node: unknown, tag: string): unknown[] {
  const out: unknown[] = [];
  const visit = (current: unknown): void => {
    if (Array.isArray(current)) {
      current.forEach(visit);
      return;
    }
    if (!isNode(current)) {
      return;
    }
    for (const [key, value] of Object.entries(current)) {
      if (key === "$") {
        continue;
      }
      if (key === tag) {
        out.push(...(Array.isArray(value) ? value : [value]));
      }
      visit(value);
    }
  };
  visit(node);
  return out;
}

/**
 * Trimmed text content of an element ("" when it has none).
 */
export function textOf(node: unknown): string {
  if (typeof node === "string") {
    return node.trim();
  }
  const text = isNode(node) ? node["_"] : undefined;
  return typeof text === "string" ? text.trim() : "";
}

export function attrOf(node: unknown, name: string): string {
  if (!isNode(node)) {
    return "";
  }
  const attrs = node["$"];
  if (!isNode(attrs)) {
    return "";
  }
  const value = attrs[name];
  return typeof value === "string" ? value.trim() : "";
}

/**
 * Path lookup through first children, e.g. `pathText(doc, "Project", "Title")`.
 */
export function pathText(node: unknown, ...path: string[]): string {
  let current = node;
  for (const tag of path) {
    current = child(current, tag);
  }
  return textOf(current);
}

/**
 * All text and attribute values under a node, space-joined. Used when the
 * caller only needs to pattern-match the whole document.
 */
export function flattenText(node: unknown): string {
  const parts: string[] = [];
  const visit = (current: unknown): void => {
    if (typeof current === "string") {
      if (current.trim()) parts.push(current.trim());
      return;
    }
    if (Array.isArray(current)) {
      current.forEach(visit);
      return;
    }
    if (!isNode(current)) {
      return;
    }
    for (const value of Object.values(current)) {
      visit(value);
    }
  };
  visit(node);
  return parts.join(" ");
}

/**
 * Single-key edits of the shared params YAML document.
 * Everything except the edited value (other keys, comments, order) is kept.
 */

import { isMap, isScalar, parseDocument, stringify, type Document } from "yaml";
import { InvalidInputError } from "../utils/errors.js";

export interface PatchedDocument {
  content: string;
  previous: string | undefined;
  changed: boolean;
}

function load(content: string, source: string): Document {
  const doc = parseDocument(content);

  if (doc.errors.length > 0) {
    throw new InvalidInputError(`${source} is not valid YAML: ${doc.errors[0]?.message ?? ""}`, {
      code: "MALFORMED_PARAMS",
      context: { source },
    });
  }
  if (doc.contents !== null && !isMap(doc.contents)) {
    throw new InvalidInputError(`${source} must be a YAML mapping of repository keys`, {
      code: "MALFORMED_PARAMS",
      context: { source },
    });
  }
  return doc;
}

function scalarValue(doc: Document, key: string, source: string): string | undefined {
  const value: unknown = doc.get(key);
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);

  throw new InvalidInputError(`${source}: '${key}' must hold a single tag value`, {
    code: "MALFORMED_PARAMS",
    context: { source, key },
  });
}

export function readParamValue(content: string, key: string, source = "params file"): string | undefined {
  return scalarValue(load(content, source), key, source);
}

/**
 * Set `key` to `value`. When the value is already there the original text is
 * returned untouched.
 */
export function patchParamValue(
  content: string,
  key: string,
  value: string,
  source = "params file",
): PatchedDocument {
  const doc = load(content, source);
  const previous = scalarValue(doc, key, source);

  if (previous === value) {
    return { content, previous, changed: false };
  }

  const spliced = splice(doc, content, key, value);
  // block scalars, flow maps and the like: let the library write it
  if (spliced === undefined || !holds(spliced, key, value)) {
    doc.set(key, value);
    return { content: doc.toString(), previous, changed: true };
  }
  return { content: spliced, previous, changed: true };
}

function holds(content: string, key: string, value: string): boolean {
  const doc = parseDocument(content);
  return doc.errors.length === 0 && doc.get(key) === value;
}

function renderScalar(value: string, type?: string | null): string {
  if (type === "QUOTE_DOUBLE") return JSON.stringify(value);
  if (type === "QUOTE_SINGLE") return `'${value.replaceAll("'", "''")}'`;
  return stringify(value, { lineWidth: 0 }).trimEnd();
}

/**
 * Rewrite only the characters of the edited value, or append one line for a
 * new key. Returns undefined when the document has no place to do that.
 */
function splice(doc: Document, content: string, key: string, value: string): string | undefined {
  if (doc.contents === null) {
    return appendLine(content, key, value);
  }
  if (!isMap(doc.contents) || doc.contents.flow) return undefined;

  const pair = doc.contents.items.find((item) => isScalar(item.key) && String(item.key.value) === key);
  if (pair === undefined) {
    return appendLine(content, key, value);
  }

  const node = pair.value;
  if (isScalar(node) && node.value !== null && node.range && node.range[1] > node.range[0]) {
    const [start, end] = node.range;
    return content.slice(0, start) + renderScalar(value, node.type) + content.slice(end);
  }

  // "key:" with nothing after the colon
  const keyEnd = isScalar(pair.key) ? pair.key.range?.[1] : undefined;
  if (keyEnd === undefined) return undefined;
  const colon = content.indexOf(":", keyEnd);
  if (colon === -1) return undefined;
  return `${content.slice(0, colon + 1)} ${renderScalar(value)}${content.slice(colon + 1)}`;
}

function appendLine(content: string, key: string, value: string): string {
  const separator = content === "" || content.endsWith("\n") ? "" : "\n";
  return `${content}${separator}${renderScalar(key)}: ${renderScalar(value)}\n`;
}

/**
 * Key of a repository inside the params file, e.g. "{repo}-release"
 */
export function paramsKeyFor(template: string, repo: string): string {
  return template.replaceAll("{repo}", repo);
}

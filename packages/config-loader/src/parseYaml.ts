import { isAlias, isMap, isScalar, isSeq, parseDocument, type Document } from "yaml";

import { IncludeDirective, includeTag } from "./directives.js";
import { ParseError } from "./errors.js";
import { createMapping, type UnresolvedNode } from "./nodes.js";
import { formatPath, type PathSegment } from "./paths.js";

export interface ParsedYaml {
  readonly value: UnresolvedNode;
  readonly warnings: readonly string[];
}

/** Cap on `*alias` expansions per document. */
export const MAX_ALIAS_EXPANSIONS = 100;

interface Walk {
  readonly doc: Document.Parsed;
  readonly sourceName: string;
  aliases: number;
}

function unsupported(walk: Walk, segments: readonly PathSegment[], what: string): ParseError {
  return new ParseError(
    walk.sourceName,
    `unsupported YAML value at ${formatPath(segments)} (got ${what})`,
  );
}

function expandAlias(node: unknown, walk: Walk, segments: readonly PathSegment[]): unknown {
  if (!isAlias(node)) return node;

  walk.aliases += 1;
  if (walk.aliases > MAX_ALIAS_EXPANSIONS) {
    throw new ParseError(
      walk.sourceName,
      `invalid YAML: more than ${MAX_ALIAS_EXPANSIONS} alias expansions`,
    );
  }

  const target = node.resolve(walk.doc);
  if (target === undefined) {
    throw new ParseError(walk.sourceName, `unresolved alias *${node.source} at ${formatPath(segments)}`);
  }
  return target;
}

function toScalar(value: unknown, walk: Walk, segments: readonly PathSegment[]): UnresolvedNode {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "boolean" || typeof value === "number") {
    return value;
  }
  if (value instanceof IncludeDirective) return value;
  throw unsupported(walk, segments, Object.prototype.toString.call(value));
}

function toKey(key: unknown, walk: Walk, segments: readonly PathSegment[]): string {
  const node = expandAlias(key, walk, segments);
  if (node === null || node === undefined) return "";
  if (isScalar(node)) {
    const { value } = node;
    if (value === null) return "";
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      return String(value);
    }
  }
  throw new ParseError(walk.sourceName, `unsupported mapping key under ${formatPath(segments)}`);
}

function toUnresolvedNode(
  node: unknown,
  walk: Walk,
  segments: readonly PathSegment[],
): UnresolvedNode {
  const target = expandAlias(node, walk, segments);

  if (target === null || target === undefined) return null;
  if (isScalar(target)) return toScalar(target.value, walk, segments);

  if (isSeq(target)) {
    return target.items.map((item, i) => toUnresolvedNode(item, walk, [...segments, i]));
  }

  if (isMap(target)) {
    const entries: Array<[string, UnresolvedNode]> = [];
    const seen = new Set<string>();
    const duplicates: string[] = [];

    for (const pair of target.items) {
      const key = toKey(pair.key, walk, segments);
      if (seen.has(key)) duplicates.push(key);
      seen.add(key);
      entries.push([key, toUnresolvedNode(pair.value, walk, [...segments, key])]);
    }
    return createMapping(entries, duplicates);
  }

  throw unsupported(walk, segments, Object.prototype.toString.call(target));
}

/**
 * Parse one YAML document into an unresolved tree.
 *
 * `!include` scalars become {@link IncludeDirective} values; nothing is read
 * from disk here. Mappings keep their document key order, and a key written
 * twice keeps its last value and is listed by `duplicateKeys` so callers
 * decide how strict to be.
 */
export function parseYaml(yamlText: string, options: { sourceName: string }): ParsedYaml {
  const doc = parseDocument(yamlText, {
    customTags: [includeTag],
    merge: false,
    uniqueKeys: false,
    prettyErrors: true,
  });

  const [firstError] = doc.errors;
  if (firstError !== undefined) {
    throw new ParseError(options.sourceName, `invalid YAML: ${firstError.message}`);
  }

  const walk: Walk = { doc, sourceName: options.sourceName, aliases: 0 };
  return {
    value: toUnresolvedNode(doc.contents, walk, []),
    warnings: doc.warnings.map((w) => `${options.sourceName}: ${w.message}`),
  };
}

/** Parse a JSON payload pulled in through an opaque include. */
export function parseJson(jsonText: string, options: { sourceName: string }): UnresolvedNode {
  try {
    JSON.parse(jsonText);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ParseError(options.sourceName, `invalid JSON: ${message}`);
  }

  // Valid JSON is valid YAML; going through the YAML tree keeps key order.
  const doc = parseDocument(jsonText, { schema: "json", uniqueKeys: false });
  const walk: Walk = { doc, sourceName: options.sourceName, aliases: 0 };
  return toUnresolvedNode(doc.contents, walk, []);
}

import { IncludeDirective } from "./directives.js";
import type { PathSegment } from "./paths.js";

export type RawScalar = string | number | boolean;

/** A fully resolved YAML value: no directive left anywhere inside it. */
export type RawNode = null | RawScalar | RawNode[] | RawMapping;

export interface RawMapping {
  readonly [key: string]: RawNode;
}

/** A parsed YAML value that may still hold `!include` directives. */
export type UnresolvedNode =
  | null
  | RawScalar
  | IncludeDirective
  | UnresolvedNode[]
  | UnresolvedMapping;

export interface UnresolvedMapping {
  readonly [key: string]: UnresolvedNode;
}

/** Type guard for plain object records (non-null, non-array). */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isMapping(node: RawNode): node is RawMapping {
  return typeof node === "object" && node !== null && !Array.isArray(node);
}

export function isUnresolvedMapping(node: UnresolvedNode): node is UnresolvedMapping {
  return (
    typeof node === "object" &&
    node !== null &&
    !Array.isArray(node) &&
    !(node instanceof IncludeDirective)
  );
}

/** `Object.prototype.hasOwnProperty.call(...)` for resolved mappings. */
export function hasOwn(value: RawMapping, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(value, key);
}

interface MappingShape {
  /** Keys in document order. */
  readonly keys: readonly string[];
  /** Keys written more than once in the same mapping; the last value won. */
  readonly duplicates: readonly string[];
}

// Plain objects list integer-like keys ("2014") ahead of the rest, so the
// document order of every mapping built here is kept beside it.
const shapes = new WeakMap<object, MappingShape>();

/**
 * Build a mapping that remembers its key order. A repeated key keeps the
 * position of its first occurrence and the value of its last.
 */
export function createMapping<T>(
  entries: Iterable<readonly [string, T]>,
  duplicates: Iterable<string> = [],
): Record<string, T> {
  const values = new Map<string, T>();
  for (const [key, value] of entries) values.set(key, value);

  const out: Record<string, T> = {};
  for (const [key, value] of values) {
    Object.defineProperty(out, key, { value, enumerable: true, writable: true, configurable: true });
  }

  shapes.set(out, { keys: [...values.keys()], duplicates: [...new Set(duplicates)] });
  return out;
}

/** Keys of a mapping in document order. */
export function mappingKeys(mapping: object): string[] {
  const own = Object.keys(mapping);
  const shape = shapes.get(mapping);
  if (shape === undefined) return own;

  const ordered = shape.keys.filter((key) => Object.prototype.hasOwnProperty.call(mapping, key));
  const seen = new Set(ordered);
  return [...ordered, ...own.filter((key) => !seen.has(key))];
}

/** `Object.entries` in document order. */
export function mappingEntries<T>(mapping: { readonly [key: string]: T }): Array<[string, T]> {
  const entries: Array<[string, T]> = [];
  for (const key of mappingKeys(mapping)) {
    const value = mapping[key];
    if (value !== undefined) entries.push([key, value]);
  }
  return entries;
}

/** Keys that appeared more than once in this mapping's source text. */
export function duplicateKeys(mapping: object): readonly string[] {
  return shapes.get(mapping)?.duplicates ?? [];
}

/** Path of every repeated key anywhere under `node`, in document order. */
export function findDuplicateKeys(
  node: UnresolvedNode,
  segments: readonly PathSegment[] = [],
): PathSegment[][] {
  if (Array.isArray(node)) {
    return node.flatMap((item, i) => findDuplicateKeys(item, [...segments, i]));
  }
  if (!isUnresolvedMapping(node)) return [];

  const found: PathSegment[][] = duplicateKeys(node).map((key) => [...segments, key]);
  for (const [key, child] of mappingEntries(node)) {
    found.push(...findDuplicateKeys(child, [...segments, key]));
  }
  return found;
}

/** Recursively freeze a value in place and return it. */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) {
    return value;
  }

  for (const child of Object.values(value)) {
    deepFreeze(child);
  }

  Object.freeze(value);
  return value;
}

import path from "node:path";

export type PathSegment = string | number;

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * One step of a {@link formatPath} pointer. Sequence indices are bracketed
 * bare; mapping keys that look like integers (`'2014'`) stay quoted so they
 * never read as indices.
 */
export function formatSegment(segment: PathSegment): string {
  if (typeof segment === "number") return `[${segment}]`;
  if (IDENTIFIER_RE.test(segment)) return `.${segment}`;
  return `['${segment.replaceAll("\\", "\\\\").replaceAll("'", "\\'")}']`;
}

/** Format a document location as a JSONPath-like pointer (e.g. `$.datasets.a.exclude['100']`). */
export function formatPath(segments: readonly PathSegment[]): string {
  return `$${segments.map(formatSegment).join("")}`;
}

export function toPosixPath(p: string): string {
  return p.split(path.sep).join("/").replaceAll("\\", "/");
}

/**
 * Ordering used for glob matches: plain UTF-16 code-unit comparison of the
 * POSIX form, independent of locale and of directory enumeration order.
 */
export function compareMatchPaths(a: string, b: string): number {
  const left = toPosixPath(a);
  const right = toPosixPath(b);
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

import path from "node:path";

import fg from "fast-glob";
import type { ScalarTag } from "yaml";

export type DirectiveKind = "single" | "glob" | "opaque";

/** File extensions parsed as YAML documents when included. */
export const DOCUMENT_EXTENSIONS: ReadonlySet<string> = new Set([".yml", ".yaml"]);

export function isDocumentPath(p: string): boolean {
  return DOCUMENT_EXTENSIONS.has(path.extname(p).toLowerCase());
}

/**
 * An `!include` tag found while parsing.
 *
 * The kind is fixed here, from the target text alone:
 *
 * - `glob`: the target contains glob syntax (`*`, `?`, `[...]`, `{a,b}`, ...)
 * - `single`: a plain path to a `.yml` / `.yaml` document
 * - `opaque`: a plain path to anything else, surfaced as a value
 */
export class IncludeDirective {
  readonly kind: DirectiveKind;
  readonly target: string;

  constructor(kind: DirectiveKind, target: string) {
    this.kind = kind;
    this.target = target;
  }

  static fromTarget(target: string): IncludeDirective {
    if (fg.isDynamicPattern(target)) return new IncludeDirective("glob", target);
    if (isDocumentPath(target)) return new IncludeDirective("single", target);
    return new IncludeDirective("opaque", target);
  }

  describe(): string {
    return `!include ${JSON.stringify(this.target)}`;
  }
}

export const INCLUDE_TAG = "!include";

/** YAML tag definition turning `!include <target>` scalars into {@link IncludeDirective}s. */
export const includeTag: ScalarTag = {
  tag: INCLUDE_TAG,
  resolve(value, onError) {
    const target = value.trim();
    if (target.length === 0) {
      onError(`${INCLUDE_TAG} requires a path or glob pattern`);
      return null;
    }
    return IncludeDirective.fromTarget(target);
  },
};

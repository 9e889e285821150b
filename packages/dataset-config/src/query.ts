import type { IdentifierScheme } from "./identifiers.js";
import type { DatasetDescriptor, ExclusionRule, TimeSpan } from "./types.js";

export type RecordingId = string | number;

/** How much of a subject/session/run a descriptor excludes. */
export type ExclusionStatus =
  | { readonly kind: "none" }
  | { readonly kind: "all" }
  | { readonly kind: "spans"; readonly spans: readonly TimeSpan[] }
  /** Something below this node is excluded; ask about a deeper node. */
  | { readonly kind: "partial" };

const NONE: ExclusionStatus = { kind: "none" };
const ALL: ExclusionStatus = { kind: "all" };
const PARTIAL: ExclusionStatus = { kind: "partial" };

function lookup(children: Readonly<Record<string, ExclusionRule>>, key: string): ExclusionRule | undefined {
  return Object.prototype.hasOwnProperty.call(children, key) ? children[key] : undefined;
}

/**
 * Report what `descriptor` excludes for a subject, optionally narrowed to a
 * session-or-run key and then a run key.
 *
 * A fully excluded ancestor (including `exclude_people`) wins over anything
 * listed beneath it.
 */
export function exclusionFor(
  descriptor: DatasetDescriptor,
  scheme: IdentifierScheme,
  subject: RecordingId,
  ...path: readonly RecordingId[]
): ExclusionStatus {
  const subjectId = scheme.subject(String(subject));
  if (descriptor.excludePeople.includes(subjectId)) return ALL;

  let rule = lookup(descriptor.exclude, subjectId);
  const normalizers = [scheme.session, scheme.run];

  for (const [depth, id] of path.entries()) {
    if (rule === undefined) return NONE;
    if (rule.kind !== "nested") break;

    const normalize = normalizers[depth] ?? scheme.run;
    rule = lookup(rule.children, normalize(String(id)));
  }

  if (rule === undefined) return NONE;

  switch (rule.kind) {
    case "all":
      return ALL;
    case "spans":
      return { kind: "spans", spans: rule.spans };
    case "nested":
      return Object.keys(rule.children).length === 0 ? NONE : PARTIAL;
  }
}

/** Whether a recording file carries one of the descriptor's accepted extensions. */
export function isAcceptedFile(descriptor: DatasetDescriptor, filePath: string): boolean {
  const lower = filePath.toLowerCase();
  return descriptor.fileExtensions.some((ext) => lower.endsWith(ext));
}

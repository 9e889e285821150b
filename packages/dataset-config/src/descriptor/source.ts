import path from "node:path";

import {
  createMapping,
  hasOwn,
  isMapping,
  mappingEntries,
  type PathSegment,
  type RawMapping,
  type RawNode,
  type ValidationIssue,
} from "@eegconf/config-loader";

import type { DatasetSource } from "../types.js";
import { describeValue, pushIssue } from "./issues.js";

export const TOPLEVEL_KEY = "toplevel";

function readExternal(
  provider: string,
  spec: RawNode | undefined,
  issues: ValidationIssue[],
  segments: readonly PathSegment[],
): DatasetSource | null {
  // Shorthand: `moabb: PhysionetMI`
  if (typeof spec === "string" && spec.trim().length > 0) {
    return { kind: "external", provider, name: spec.trim(), options: {} };
  }

  if (spec === undefined || !isMapping(spec)) {
    pushIssue(
      issues,
      segments,
      `Expected a provider dataset name or a mapping with 'name' (got ${describeValue(spec)}).`,
    );
    return null;
  }

  const name = hasOwn(spec, "name") ? spec["name"] : undefined;
  if (typeof name !== "string" || name.trim().length === 0) {
    pushIssue(issues, [...segments, "name"], "External source 'name' must be a non-empty string.");
    return null;
  }

  const options = createMapping(mappingEntries(spec).filter(([key]) => key !== "name"));
  return { kind: "external", provider, name: name.trim(), options };
}

/**
 * Read the dataset's location: a `toplevel` directory or exactly one external
 * provider block. A key set to `~` counts as absent, so a dataset can drop a
 * source inherited from the defaults.
 */
export function readSource(
  record: RawMapping,
  providers: readonly string[],
  baseDir: string,
  issues: ValidationIssue[],
  segments: readonly PathSegment[],
): DatasetSource | null {
  const present = [TOPLEVEL_KEY, ...providers].filter(
    (key) => hasOwn(record, key) && record[key] !== null,
  );

  if (present.length === 0) {
    pushIssue(
      issues,
      segments,
      `Exactly one of '${TOPLEVEL_KEY}' or an external source (${providers.join(", ")}) is required.`,
    );
    return null;
  }

  if (present.length > 1) {
    pushIssue(
      issues,
      segments,
      `${present.map((key) => `'${key}'`).join(" and ")} are mutually exclusive; keep exactly one.`,
    );
    return null;
  }

  const [key] = present;
  if (key === undefined) return null;
  const value = record[key];

  if (key !== TOPLEVEL_KEY) {
    return readExternal(key, value, issues, [...segments, key]);
  }

  if (typeof value !== "string" || value.trim().length === 0) {
    pushIssue(
      issues,
      [...segments, key],
      `'${TOPLEVEL_KEY}' must be a non-empty path string (got ${describeValue(value)}).`,
    );
    return null;
  }

  return { kind: "toplevel", path: value, resolvedPath: path.resolve(baseDir, value) };
}

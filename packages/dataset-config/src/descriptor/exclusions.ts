import {
  createMapping,
  isMapping,
  mappingEntries,
  type PathSegment,
  type RawNode,
  type ValidationIssue,
} from "@eegconf/config-loader";

import type { IdentifierScheme } from "../identifiers.js";
import type { ExclusionRule, ExclusionTree } from "../types.js";
import { readTimeSpans } from "./bounds.js";
import { describeValue, pushIssue } from "./issues.js";

const LEVELS = ["subject", "session", "run"] as const;

type Level = (typeof LEVELS)[number];

function readRule(
  value: RawNode,
  depth: number,
  scheme: IdentifierScheme,
  issues: ValidationIssue[],
  segments: readonly PathSegment[],
): ExclusionRule | null {
  if (value === null) return { kind: "all" };

  if (Array.isArray(value)) {
    if (depth === 0) {
      pushIssue(
        issues,
        segments,
        "Time spans cannot apply to a whole subject; nest them under a session or run.",
      );
      return null;
    }
    return { kind: "spans", spans: readTimeSpans(value, issues, segments) };
  }

  if (isMapping(value)) {
    if (depth + 1 >= LEVELS.length) {
      pushIssue(issues, segments, "Exclusions nest at most subject -> session -> run.");
      return null;
    }
    return { kind: "nested", children: readLevel(value, depth + 1, scheme, issues, segments) };
  }

  pushIssue(
    issues,
    segments,
    `Expected ~ (exclude entirely), a list of [start, end] spans, or a nested mapping (got ${describeValue(value)}).`,
  );
  return null;
}

function normalizeKey(scheme: IdentifierScheme, level: Level, key: string): string {
  return scheme[level](key);
}

function readLevel(
  mapping: Readonly<Record<string, RawNode>>,
  depth: number,
  scheme: IdentifierScheme,
  issues: ValidationIssue[],
  segments: readonly PathSegment[],
): ExclusionTree {
  const level = LEVELS[depth] ?? "run";
  const tree: Array<[string, ExclusionRule]> = [];
  const rawKeyFor = new Map<string, string>();

  for (const [rawKey, child] of mappingEntries(mapping)) {
    const keyPath = [...segments, rawKey];
    const key = normalizeKey(scheme, level, rawKey);

    if (key.length === 0) {
      pushIssue(issues, keyPath, `Empty ${level} identifier.`);
      continue;
    }

    const previous = rawKeyFor.get(key);
    if (previous !== undefined) {
      pushIssue(
        issues,
        keyPath,
        `${level} '${rawKey}' normalizes to '${key}', which '${previous}' already uses.`,
      );
      continue;
    }
    rawKeyFor.set(key, rawKey);

    const rule = readRule(child, depth, scheme, issues, keyPath);
    if (rule !== null) tree.push([key, rule]);
  }

  return createMapping(tree);
}

/**
 * Normalize the `exclude` hierarchy: subject -> session-or-run -> run.
 *
 * `~` excludes a whole node; a list of `[start, end]` spans excludes only
 * those parts of a recording. Keys are normalized per level.
 */
export function normalizeExclusions(
  value: RawNode | undefined,
  scheme: IdentifierScheme,
  issues: ValidationIssue[],
  segments: readonly PathSegment[],
): ExclusionTree {
  if (value === undefined || value === null) return {};

  if (!isMapping(value)) {
    pushIssue(issues, segments, `Expected a mapping of subject to exclusions (got ${describeValue(value)}).`);
    return {};
  }

  return readLevel(value, 0, scheme, issues, segments);
}

/** Normalize `exclude_people` into de-duplicated subject ids. */
export function normalizeExcludedPeople(
  value: RawNode | undefined,
  scheme: IdentifierScheme,
  issues: ValidationIssue[],
  segments: readonly PathSegment[],
): string[] {
  if (value === undefined || value === null) return [];

  if (!Array.isArray(value)) {
    pushIssue(issues, segments, `Expected a list of subject ids (got ${describeValue(value)}).`);
    return [];
  }

  const people: string[] = [];
  value.forEach((item, i) => {
    if (typeof item !== "string" && typeof item !== "number") {
      pushIssue(issues, [...segments, i], `Subject ids must be strings or numbers (got ${describeValue(item)}).`);
      return;
    }

    const id = scheme.subject(String(item));
    if (id.length === 0) {
      pushIssue(issues, [...segments, i], "Empty subject identifier.");
      return;
    }
    if (!people.includes(id)) people.push(id);
  });

  return people;
}

import {
  createMapping,
  duplicateKeys,
  isMapping,
  mappingEntries,
  type PathSegment,
  type RawNode,
  type ValidationIssue,
} from "@eegconf/config-loader";

import { describeValue, pushIssue } from "./issues.js";

/**
 * Normalize `events` into a label -> code mapping.
 *
 * A list is numbered by position (`[T1, T2]` -> `{T1: 0, T2: 1}`); a mapping
 * is kept as written once its labels and codes are known to be unique.
 * Labels keep their written order.
 */
export function normalizeEvents(
  value: RawNode | undefined,
  issues: ValidationIssue[],
  segments: readonly PathSegment[],
): Record<string, number> {
  const events = new Map<string, number>();
  if (value === undefined || value === null) return {};

  if (Array.isArray(value)) {
    value.forEach((item, i) => {
      if ((typeof item !== "string" && typeof item !== "number") || String(item).trim() === "") {
        pushIssue(issues, [...segments, i], "Event labels must be non-empty strings or numbers.");
        return;
      }

      const label = String(item).trim();
      if (events.has(label)) {
        pushIssue(issues, [...segments, i], `Duplicate event label '${label}'.`);
        return;
      }
      events.set(label, i);
    });
    return createMapping(events);
  }

  if (!isMapping(value)) {
    pushIssue(
      issues,
      segments,
      `Expected a list of event labels or a mapping of label to integer code (got ${describeValue(value)}).`,
    );
    return {};
  }

  for (const label of duplicateKeys(value)) {
    pushIssue(issues, [...segments, label], `Duplicate event label '${label}'.`);
  }

  const labelsByCode = new Map<number, string>();
  for (const [label, code] of mappingEntries(value)) {
    if (typeof code !== "number" || !Number.isSafeInteger(code)) {
      pushIssue(issues, [...segments, label], `Event code must be an integer (got ${describeValue(code)}).`);
      continue;
    }

    const existing = labelsByCode.get(code);
    if (existing !== undefined) {
      pushIssue(
        issues,
        [...segments, label],
        `Duplicate event code ${code}: already used by '${existing}'.`,
      );
      continue;
    }

    labelsByCode.set(code, label);
    events.set(label, code);
  }

  return createMapping(events);
}

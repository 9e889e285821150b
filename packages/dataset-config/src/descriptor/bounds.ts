import type { PathSegment, RawNode, ValidationIssue } from "@eegconf/config-loader";

import type { Bound, BoundPair, TimeSpan } from "../types.js";
import { describeValue, isFiniteNumber, pushIssue } from "./issues.js";

function readPair(
  value: RawNode,
  issues: ValidationIssue[],
  segments: readonly PathSegment[],
): readonly [Bound, Bound] | null {
  if (!Array.isArray(value) || value.length !== 2) {
    pushIssue(
      issues,
      segments,
      `Expected a two-element [low, high] list; use ~ for an open bound (got ${describeValue(value)}).`,
    );
    return null;
  }

  const [low, high] = value;
  let ok = true;
  for (const [i, bound] of [low, high].entries()) {
    if (bound !== null && !isFiniteNumber(bound)) {
      pushIssue(issues, [...segments, i], `Bound must be a number or ~ (got ${describeValue(bound)}).`);
      ok = false;
    }
  }
  if (!ok) return null;

  return [isFiniteNumber(low) ? low : null, isFiniteNumber(high) ? high : null];
}

export interface BoundPairOptions {
  /** Reject negative concrete bounds (frequencies). */
  readonly nonNegative?: boolean;
}

/**
 * Read an optional `[low, high]` pair such as `baseline` or `bandpass`.
 *
 * Absent or `~` yields `null` (the feature is off); `~` inside the pair is an
 * open bound.
 */
export function readBoundPair(
  value: RawNode | undefined,
  issues: ValidationIssue[],
  segments: readonly PathSegment[],
  options: BoundPairOptions = {},
): BoundPair | null {
  if (value === undefined || value === null) return null;

  const pair = readPair(value, issues, segments);
  if (pair === null) return null;

  const [low, high] = pair;
  if (options.nonNegative === true) {
    for (const [i, bound] of pair.entries()) {
      if (bound !== null && bound < 0) {
        pushIssue(issues, [...segments, i], `Bound must not be negative (got ${bound}).`);
      }
    }
  }

  if (low !== null && high !== null && low > high) {
    pushIssue(issues, segments, `Low bound ${low} is greater than high bound ${high}.`);
  }

  return { low, high };
}

/** Read the `[start, end]` spans of a partial exclusion. */
export function readTimeSpans(
  value: RawNode[],
  issues: ValidationIssue[],
  segments: readonly PathSegment[],
): TimeSpan[] {
  const spans: TimeSpan[] = [];

  value.forEach((item, i) => {
    const spanPath = [...segments, i];
    const pair = readPair(item, issues, spanPath);
    if (pair === null) return;

    const [start, end] = pair;
    if (start === null && end === null) {
      pushIssue(issues, spanPath, "Span [~, ~] covers the whole recording; use ~ on the node instead.");
      return;
    }
    if (start !== null && end !== null && start >= end) {
      pushIssue(issues, spanPath, `Span start ${start} must be before its end ${end}.`);
      return;
    }

    spans.push({ start, end });
  });

  return spans;
}

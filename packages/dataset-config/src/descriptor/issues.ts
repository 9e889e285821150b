import {
  formatPath,
  type PathSegment,
  type RawNode,
  type ValidationIssue,
} from "@eegconf/config-loader";

export const DATASETS_KEY = "datasets";

/** Path of a dataset entry, or of a field inside it. */
export function datasetPath(key: string, ...rest: readonly PathSegment[]): PathSegment[] {
  return [DATASETS_KEY, key, ...rest];
}

export function pushIssue(
  issues: ValidationIssue[],
  segments: readonly PathSegment[],
  message: string,
): void {
  issues.push({ path: formatPath(segments), message });
}

export function describeValue(value: RawNode | undefined): string {
  return value === undefined ? "nothing" : JSON.stringify(value);
}

export function isFiniteNumber(value: RawNode | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/** Read an optional finite number; `null`/absent become `null`. */
export function readOptionalNumber(
  value: RawNode | undefined,
  issues: ValidationIssue[],
  segments: readonly PathSegment[],
): number | null {
  if (value === undefined || value === null) return null;
  if (isFiniteNumber(value)) return value;

  pushIssue(issues, segments, `Expected a number (got ${describeValue(value)}).`);
  return null;
}

/** Read an optional list of non-empty strings, de-duplicated in first-seen order. */
export function readStringSet(
  value: RawNode | undefined,
  issues: ValidationIssue[],
  segments: readonly PathSegment[],
  itemLabel: string,
): string[] | undefined {
  if (value === undefined || value === null) return undefined;

  if (!Array.isArray(value)) {
    pushIssue(issues, segments, `Expected a list of ${itemLabel}s (got ${describeValue(value)}).`);
    return undefined;
  }

  const out: string[] = [];
  value.forEach((item, i) => {
    if (typeof item !== "string" || item.trim().length === 0) {
      pushIssue(issues, [...segments, i], `Each ${itemLabel} must be a non-empty string.`);
      return;
    }
    const trimmed = item.trim();
    if (!out.includes(trimmed)) out.push(trimmed);
  });

  return out;
}

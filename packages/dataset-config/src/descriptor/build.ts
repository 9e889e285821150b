import {
  createMapping,
  deepFreeze,
  findDuplicateKeys,
  hasOwn,
  isMapping,
  mappingEntries,
  mergeMappings,
  type PathSegment,
  type RawMapping,
  type RawNode,
  type ValidationIssue,
  type ValidationResult,
} from "@eegconf/config-loader";

import { compileFilenameFormat } from "../filenameFormat.js";
import { defaultSchemeName, type IdentifierScheme } from "../identifiers.js";
import type { DatasetDescriptor, EpochWindow, FilenameFormat } from "../types.js";
import { readBoundPair } from "./bounds.js";
import { normalizeEvents } from "./events.js";
import { normalizeExcludedPeople, normalizeExclusions } from "./exclusions.js";
import {
  datasetPath,
  describeValue,
  isFiniteNumber,
  pushIssue,
  readOptionalNumber,
  readStringSet,
} from "./issues.js";
import { readSource, TOPLEVEL_KEY } from "./source.js";

/** Accepted recording suffixes when a dataset does not set `file_extensions`. */
export const DEFAULT_FILE_EXTENSIONS: readonly string[] = [
  ".edf",
  ".bdf",
  ".gdf",
  ".fif",
  ".fif.gz",
  ".set",
  ".vhdr",
  ".cnt",
];

/** External source providers recognised when none are configured. */
export const DEFAULT_EXTERNAL_PROVIDERS: readonly string[] = ["moabb"];

export const DATASET_FIELDS: ReadonlySet<string> = new Set([
  "name",
  TOPLEVEL_KEY,
  "tmin",
  "tlen",
  "stride",
  "events",
  "picks",
  "exclude_people",
  "exclude",
  "decimate",
  "baseline",
  "bandpass",
  "drop_bad",
  "min",
  "max",
  "file_extensions",
  "filename_format",
  "identifier_scheme",
]);

/** Everything the builder needs besides the dataset entry itself. */
export interface DescriptorContext {
  /** The registry's `defaults` section, overlaid under every dataset. */
  readonly defaults: RawMapping;
  /** Directory relative `toplevel` paths resolve against. */
  readonly baseDir: string;
  readonly identifierSchemes: Readonly<Record<string, IdentifierScheme>>;
  readonly externalProviders: readonly string[];
  readonly defaultFileExtensions: readonly string[];
}

function readName(value: RawNode | undefined, key: string, issues: ValidationIssue[], segments: readonly PathSegment[]): string {
  if (value === undefined || value === null) return key;
  if (typeof value === "string" && value.trim().length > 0) return value;

  pushIssue(issues, segments, `'name' must be a non-empty string (got ${describeValue(value)}).`);
  return key;
}

function readWindow(
  field: (name: string) => RawNode | undefined,
  issues: ValidationIssue[],
  segments: readonly PathSegment[],
): EpochWindow {
  const tmin = readOptionalNumber(field("tmin"), issues, [...segments, "tmin"]) ?? 0;

  const tlenValue = field("tlen");
  let tlen = 0;
  if (tlenValue === undefined || tlenValue === null) {
    pushIssue(issues, segments, "Missing required field 'tlen' (epoch length in seconds).");
  } else if (!isFiniteNumber(tlenValue) || tlenValue <= 0) {
    pushIssue(issues, [...segments, "tlen"], `'tlen' must be a positive number (got ${describeValue(tlenValue)}).`);
  } else {
    tlen = tlenValue;
  }

  const stride = readOptionalNumber(field("stride"), issues, [...segments, "stride"]);
  if (stride !== null && stride <= 0) {
    pushIssue(issues, [...segments, "stride"], `'stride' must be positive (got ${stride}).`);
  }

  return { tmin, tlen, stride };
}

function readDecimate(value: RawNode | undefined, issues: ValidationIssue[], segments: readonly PathSegment[]): number {
  if (value === undefined || value === null) return 1;
  if (typeof value === "number" && Number.isSafeInteger(value) && value >= 1) return value;

  pushIssue(issues, segments, `'decimate' must be a positive integer (got ${describeValue(value)}).`);
  return 1;
}

function readDropBad(value: RawNode | undefined, issues: ValidationIssue[], segments: readonly PathSegment[]): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === "boolean") return value;

  pushIssue(issues, segments, `'drop_bad' must be true or false (got ${describeValue(value)}).`);
  return false;
}

function readFileExtensions(
  value: RawNode | undefined,
  defaults: readonly string[],
  issues: ValidationIssue[],
  segments: readonly PathSegment[],
): readonly string[] {
  const listed = readStringSet(value, issues, segments, "file extension");
  if (listed === undefined) return [...defaults];

  const normalized: string[] = [];
  for (const ext of listed) {
    const lower = ext.toLowerCase();
    const dotted = lower.startsWith(".") ? lower : `.${lower}`;
    if (!normalized.includes(dotted)) normalized.push(dotted);
  }

  if (Array.isArray(value) && value.length === 0) {
    pushIssue(issues, segments, "'file_extensions' must list at least one extension.");
  }
  return normalized;
}

function readFilenameFormat(
  value: RawNode | undefined,
  issues: ValidationIssue[],
  segments: readonly PathSegment[],
): FilenameFormat | null {
  if (value === undefined || value === null) return null;

  if (typeof value !== "string") {
    pushIssue(issues, segments, `'filename_format' must be a template string (got ${describeValue(value)}).`);
    return null;
  }

  const compiled = compileFilenameFormat(value);
  if (!compiled.ok) {
    pushIssue(issues, segments, compiled.message);
    return null;
  }
  return compiled.value;
}

/**
 * Validate one `datasets` entry, overlaid on the registry defaults, and
 * materialize it as a frozen {@link DatasetDescriptor}.
 *
 * Every problem found is reported; a descriptor is only returned when there
 * are none.
 */
export function buildDatasetDescriptor(
  key: string,
  raw: RawNode,
  ctx: DescriptorContext,
): ValidationResult<DatasetDescriptor> {
  const segments = datasetPath(key);
  const issues: ValidationIssue[] = [];

  if (raw !== null && !isMapping(raw)) {
    pushIssue(issues, segments, `Expected a mapping of dataset fields (got ${describeValue(raw)}).`);
    return { ok: false, issues };
  }

  // Repeated event labels are reported by normalizeEvents.
  for (const duplicate of findDuplicateKeys(raw)) {
    if (duplicate.length === 2 && duplicate[0] === "events") continue;
    pushIssue(issues, [...segments, ...duplicate], `Duplicate key '${String(duplicate.at(-1))}'.`);
  }

  const record = mergeMappings(ctx.defaults, raw ?? {});
  const field = (name: string): RawNode | undefined => (hasOwn(record, name) ? record[name] : undefined);
  const at = (name: string): PathSegment[] => [...segments, name];

  const source = readSource(record, ctx.externalProviders, ctx.baseDir, issues, segments);

  const schemeValue = field("identifier_scheme");
  let identifierScheme = defaultSchemeName(source?.kind ?? "toplevel");
  if (
    typeof schemeValue === "string" &&
    Object.prototype.hasOwnProperty.call(ctx.identifierSchemes, schemeValue)
  ) {
    identifierScheme = schemeValue;
  } else if (schemeValue !== undefined && schemeValue !== null) {
    pushIssue(
      issues,
      at("identifier_scheme"),
      `Unknown identifier scheme ${describeValue(schemeValue)}; expected one of ${Object.keys(ctx.identifierSchemes).join(", ")}.`,
    );
  }
  const scheme = ctx.identifierSchemes[identifierScheme];
  if (scheme === undefined) {
    pushIssue(issues, segments, `Identifier scheme '${identifierScheme}' is not registered.`);
    return { ok: false, issues };
  }

  const min = readOptionalNumber(field("min"), issues, at("min"));
  const max = readOptionalNumber(field("max"), issues, at("max"));
  if (min !== null && max !== null && min >= max) {
    pushIssue(issues, segments, `'min' (${min}) must be less than 'max' (${max}).`);
  }

  const extras = createMapping(
    mappingEntries(record).filter(
      ([name]) => !DATASET_FIELDS.has(name) && !ctx.externalProviders.includes(name),
    ),
  );

  const descriptor = {
    key,
    name: readName(field("name"), key, issues, at("name")),
    window: readWindow(field, issues, segments),
    events: normalizeEvents(field("events"), issues, at("events")),
    picks: readStringSet(field("picks"), issues, at("picks"), "channel selector") ?? [],
    excludePeople: normalizeExcludedPeople(field("exclude_people"), scheme, issues, at("exclude_people")),
    exclude: normalizeExclusions(field("exclude"), scheme, issues, at("exclude")),
    decimate: readDecimate(field("decimate"), issues, at("decimate")),
    baseline: readBoundPair(field("baseline"), issues, at("baseline")),
    bandpass: readBoundPair(field("bandpass"), issues, at("bandpass"), { nonNegative: true }),
    dropBad: readDropBad(field("drop_bad"), issues, at("drop_bad")),
    min,
    max,
    fileExtensions: readFileExtensions(field("file_extensions"), ctx.defaultFileExtensions, issues, at("file_extensions")),
    filenameFormat: readFilenameFormat(field("filename_format"), issues, at("filename_format")),
    identifierScheme,
    extras,
  };

  if (source === null || issues.length > 0) {
    return { ok: false, issues };
  }

  return { ok: true, value: deepFreeze<DatasetDescriptor>({ ...descriptor, source }) };
}

import path from "node:path";

import {
  createMapping,
  deepFreeze,
  findDuplicateKeys,
  formatPath,
  hasOwn,
  isMapping,
  mappingEntries,
  mappingKeys,
  resolveDocumentFile,
  resolveDocumentText,
  resolveLoaderOptions,
  ValidationError,
  warn,
  type LoaderOptions,
  type PathSegment,
  type RawMapping,
  type RawNode,
  type ResolvedDocument,
  type TextSource,
  type ValidationIssue,
} from "@eegconf/config-loader";

import {
  buildDatasetDescriptor,
  DEFAULT_EXTERNAL_PROVIDERS,
  DEFAULT_FILE_EXTENSIONS,
  type DescriptorContext,
} from "./descriptor/build.js";
import { DATASETS_KEY, datasetPath } from "./descriptor/issues.js";
import { BUILTIN_IDENTIFIER_SCHEMES, type IdentifierScheme } from "./identifiers.js";
import { ConfigurationRegistry } from "./registry.js";
import type { DatasetDescriptor } from "./types.js";

export const GLOBAL_DEFAULTS_KEY = "global_defaults";
/** Shorter spelling of {@link GLOBAL_DEFAULTS_KEY}; a document may use one or the other. */
export const DEFAULTS_ALIAS = "defaults";

export interface ResolveConfigurationOptions extends LoaderOptions {
  /** Extra identifier schemes, by name; merged over the built-in ones. */
  readonly identifierSchemes?: Readonly<Record<string, IdentifierScheme>>;
  /** Keys recognised as external sources. Defaults to `["moabb"]`. */
  readonly externalProviders?: readonly string[];
  /** Accepted suffixes for datasets that do not set `file_extensions`. */
  readonly defaultFileExtensions?: readonly string[];
}

/** A dataset left out of the registry, with the reason. */
export interface SkippedDataset {
  readonly key: string;
  readonly error: ValidationError;
}

export interface ResolutionResult {
  readonly registry: ConfigurationRegistry;
  readonly skipped: readonly SkippedDataset[];
  /** `true` when every declared dataset made it into the registry. */
  readonly complete: boolean;
}

function readSection(
  document: RawMapping,
  key: string,
  issues: ValidationIssue[],
): RawMapping {
  const value: RawNode | undefined = hasOwn(document, key) ? document[key] : undefined;
  if (value === undefined || value === null) return {};
  if (isMapping(value)) return value;

  issues.push({ path: formatPath([key]), message: `'${key}' must be a mapping.` });
  return {};
}

function readDefaults(document: RawMapping, issues: ValidationIssue[]): RawMapping {
  if (hasOwn(document, DEFAULTS_ALIAS) && hasOwn(document, GLOBAL_DEFAULTS_KEY)) {
    issues.push({
      path: formatPath([DEFAULTS_ALIAS]),
      message: `'${DEFAULTS_ALIAS}' is an alias of '${GLOBAL_DEFAULTS_KEY}'; set only one of them.`,
    });
    return {};
  }
  const key = hasOwn(document, DEFAULTS_ALIAS) ? DEFAULTS_ALIAS : GLOBAL_DEFAULTS_KEY;
  return readSection(document, key, issues);
}

// A repeated key inside one dataset only invalidates that dataset.
function isInsideDataset(duplicate: readonly PathSegment[]): boolean {
  return duplicate.length > 2 && duplicate[0] === DATASETS_KEY;
}

/**
 * Build the registry from an already resolved document.
 *
 * Root problems throw a {@link ValidationError}: `datasets` or
 * `global_defaults` not a mapping, both `global_defaults` and `defaults` set,
 * or a key repeated outside a dataset entry. Per-dataset problems are
 * collected into `skipped`.
 */
export function buildConfiguration(
  resolved: ResolvedDocument,
  baseDir: string,
  options: ResolveConfigurationOptions = {},
): ResolutionResult {
  const { stderr } = resolveLoaderOptions(options);
  const { document } = resolved;

  const rootIssues: ValidationIssue[] = [];
  for (const duplicate of findDuplicateKeys(document)) {
    if (isInsideDataset(duplicate)) continue;
    rootIssues.push({
      path: formatPath(duplicate),
      message: `Duplicate key '${String(duplicate.at(-1))}'.`,
    });
  }
  const datasets = readSection(document, DATASETS_KEY, rootIssues);
  const defaults = readDefaults(document, rootIssues);
  if (rootIssues.length > 0) {
    throw new ValidationError("configuration root", rootIssues);
  }

  const identifierSchemes = { ...BUILTIN_IDENTIFIER_SCHEMES, ...options.identifierSchemes };
  const ctx: DescriptorContext = {
    defaults,
    baseDir,
    identifierSchemes,
    externalProviders: options.externalProviders ?? DEFAULT_EXTERNAL_PROVIDERS,
    defaultFileExtensions: options.defaultFileExtensions ?? DEFAULT_FILE_EXTENSIONS,
  };

  const descriptors: DatasetDescriptor[] = [];
  const skipped: SkippedDataset[] = [];

  for (const [key, raw] of mappingEntries(datasets)) {
    const built = buildDatasetDescriptor(key, raw, ctx);
    if (!built.ok) {
      const error = new ValidationError(`dataset ${JSON.stringify(key)}`, built.issues);
      skipped.push({ key, error });
      warn(stderr, `skipping dataset ${JSON.stringify(key)} (${built.issues.length} issue(s))`);
      continue;
    }

    const unknown = mappingKeys(built.value.extras);
    if (unknown.length > 0) {
      warn(
        stderr,
        `${formatPath(datasetPath(key))}: unrecognised field(s) kept as extras: ${unknown.join(", ")}`,
      );
    }
    descriptors.push(built.value);
  }

  const extras = createMapping(
    mappingEntries(document).filter(
      ([key]) => key !== DATASETS_KEY && key !== GLOBAL_DEFAULTS_KEY && key !== DEFAULTS_ALIAS,
    ),
  );

  const registry = new ConfigurationRegistry({
    descriptors,
    globalDefaults: deepFreeze(defaults),
    extras: deepFreeze(extras),
    sources: resolved.sources,
    identifierSchemes,
  });

  return { registry, skipped, complete: skipped.length === 0 };
}

/**
 * Resolve a configuration file: expand includes, validate every dataset and
 * assemble the registry. Relative `toplevel` paths resolve against the
 * file's directory.
 */
export function resolveConfigurationFile(
  filePath: string,
  options: ResolveConfigurationOptions = {},
): ResolutionResult {
  const resolved = resolveDocumentFile(filePath, options);
  return buildConfiguration(resolved, path.dirname(path.resolve(filePath)), options);
}

/** Like {@link resolveConfigurationFile}, for a document already held in memory. */
export function resolveConfigurationText(
  yamlText: string,
  source: TextSource,
  options: ResolveConfigurationOptions = {},
): ResolutionResult {
  const resolved = resolveDocumentText(yamlText, source, options);
  const sourcePath = path.resolve(source.baseDir ?? process.cwd(), source.sourceName);
  return buildConfiguration(resolved, path.dirname(sourcePath), options);
}

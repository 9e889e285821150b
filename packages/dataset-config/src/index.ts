export type {
  Bound,
  BoundPair,
  DatasetDescriptor,
  DatasetSource,
  EpochWindow,
  ExclusionRule,
  ExclusionTree,
  FilenameField,
  FilenameFormat,
  FilenamePlaceholder,
  TimeSpan,
} from "./types.js";
export type { DescriptorContext } from "./descriptor/build.js";
export type { CompileFilenameFormatResult } from "./filenameFormat.js";
export type { IdentifierScheme } from "./identifiers.js";
export type { ExclusionStatus, RecordingId } from "./query.js";
export type { ConfigurationRegistryInit } from "./registry.js";
export type {
  ResolutionResult,
  ResolveConfigurationOptions,
  SkippedDataset,
} from "./resolveConfiguration.js";

export {
  buildDatasetDescriptor,
  DATASET_FIELDS,
  DEFAULT_EXTERNAL_PROVIDERS,
  DEFAULT_FILE_EXTENSIONS,
} from "./descriptor/build.js";
export { DATASETS_KEY, datasetPath } from "./descriptor/issues.js";
export { compileFilenameFormat, FILENAME_PLACEHOLDERS, parseFilename } from "./filenameFormat.js";
export {
  BUILTIN_IDENTIFIER_SCHEMES,
  createPrefixedScheme,
  defaultSchemeName,
  numericScheme,
  verbatimScheme,
} from "./identifiers.js";
export { exclusionFor, isAcceptedFile } from "./query.js";
export { ConfigurationRegistry, DatasetNotFoundError } from "./registry.js";
export {
  buildConfiguration,
  DEFAULTS_ALIAS,
  GLOBAL_DEFAULTS_KEY,
  resolveConfigurationFile,
  resolveConfigurationText,
} from "./resolveConfiguration.js";

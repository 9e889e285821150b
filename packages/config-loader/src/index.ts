export type { DirectiveKind } from "./directives.js";
export type {
  RawMapping,
  RawNode,
  RawScalar,
  UnresolvedMapping,
  UnresolvedNode,
} from "./nodes.js";
export type { ParsedYaml } from "./parseYaml.js";
export type { PathSegment } from "./paths.js";
export type { EffectiveLoaderOptions, LoaderOptions } from "./options.js";
export type { ResolvedDocument, TextSource } from "./resolve.js";
export type { ValidationIssue, ValidationResult } from "./errors.js";

export {
  DOCUMENT_EXTENSIONS,
  INCLUDE_TAG,
  IncludeDirective,
  includeTag,
  isDocumentPath,
} from "./directives.js";
export {
  ConfigurationError,
  CyclicIncludeError,
  IncludeNotFoundError,
  ParseError,
  ValidationError,
} from "./errors.js";
export { mergeFragments, mergeMappings, mergeNodes } from "./merge.js";
export {
  createMapping,
  deepFreeze,
  duplicateKeys,
  findDuplicateKeys,
  hasOwn,
  isMapping,
  isRecord,
  isUnresolvedMapping,
  mappingEntries,
  mappingKeys,
} from "./nodes.js";
export {
  DEFAULT_MAX_INCLUDE_DEPTH,
  MAX_INCLUDE_DEPTH_ENV,
  resolveLoaderOptions,
  warn,
} from "./options.js";
export { MAX_ALIAS_EXPANSIONS, parseJson, parseYaml } from "./parseYaml.js";
export { compareMatchPaths, formatPath, formatSegment, toPosixPath } from "./paths.js";
export { MERGE_KEY, resolveDocumentFile, resolveDocumentText } from "./resolve.js";

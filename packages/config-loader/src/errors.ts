/** Base class for every error raised while loading dataset configuration. */
export class ConfigurationError extends Error {
  override name = "ConfigurationError";
}

/** Malformed YAML/JSON, or a document whose shape cannot be resolved. */
export class ParseError extends ConfigurationError {
  override name = "ParseError";

  readonly sourcePath: string;

  constructor(sourcePath: string, message: string) {
    super(message.includes(sourcePath) ? message : `${sourcePath}: ${message}`);
    this.sourcePath = sourcePath;
  }
}

/** An explicit `!include` target (or the root document) does not exist. */
export class IncludeNotFoundError extends ConfigurationError {
  override name = "IncludeNotFoundError";

  readonly target: string;
  readonly resolvedPath: string;
  readonly includedFrom: string | undefined;

  constructor(target: string, resolvedPath: string, includedFrom?: string) {
    super(
      includedFrom === undefined
        ? `config not found: ${resolvedPath}`
        : `include target not found: ${JSON.stringify(target)} (resolved to ${resolvedPath}, included from ${includedFrom})`,
    );
    this.target = target;
    this.resolvedPath = resolvedPath;
    this.includedFrom = includedFrom;
  }
}

/** The include chain loops back on itself or exceeds the depth guard. */
export class CyclicIncludeError extends ConfigurationError {
  override name = "CyclicIncludeError";

  readonly chain: readonly string[];

  constructor(chain: readonly string[], message: string) {
    super(`${message}: ${chain.join(" -> ")}`);
    this.chain = chain;
  }
}

/** Structured validation issue (JSONPath-like `path` + human message). */
export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export type ValidationResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly issues: readonly ValidationIssue[] };

/** One or more validation issues for a single configuration unit. */
export class ValidationError extends ConfigurationError {
  override name = "ValidationError";

  readonly issues: readonly ValidationIssue[];

  constructor(subject: string, issues: readonly ValidationIssue[]) {
    super(
      `${subject} is invalid:\n` +
        issues.map((issue) => `- ${issue.path}: ${issue.message}`).join("\n"),
    );
    this.issues = issues;
  }
}

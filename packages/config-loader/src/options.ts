import process from "node:process";

import { ConfigurationError } from "./errors.js";

export const DEFAULT_MAX_INCLUDE_DEPTH = 16;

export const MAX_INCLUDE_DEPTH_ENV = "EEGCONF_MAX_INCLUDE_DEPTH";

/** Options shared by every resolution entry point. */
export interface LoaderOptions {
  /**
   * Maximum nesting of `!include` directives below the root document.
   *
   * Defaults to `EEGCONF_MAX_INCLUDE_DEPTH` when set, otherwise
   * {@link DEFAULT_MAX_INCLUDE_DEPTH}.
   */
  readonly maxIncludeDepth?: number;

  /** Where `warning: ...` lines go. Defaults to `process.stderr`. */
  readonly stderr?: NodeJS.WritableStream;

  /** Environment used for defaults. Defaults to `process.env`. */
  readonly env?: NodeJS.ProcessEnv;
}

export interface EffectiveLoaderOptions {
  readonly maxIncludeDepth: number;
  readonly stderr: NodeJS.WritableStream;
}

function parseDepth(raw: string, label: string): number {
  const trimmed = raw.trim();
  const depth = /^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
  if (!Number.isSafeInteger(depth) || depth < 1) {
    throw new ConfigurationError(`${label} must be a positive integer (got ${JSON.stringify(raw)})`);
  }
  return depth;
}

export function resolveLoaderOptions(options: LoaderOptions = {}): EffectiveLoaderOptions {
  const env = options.env ?? process.env;
  const stderr = options.stderr ?? process.stderr;

  if (options.maxIncludeDepth !== undefined) {
    return {
      maxIncludeDepth: parseDepth(String(options.maxIncludeDepth), "maxIncludeDepth"),
      stderr,
    };
  }

  const fromEnv = env[MAX_INCLUDE_DEPTH_ENV];
  if (fromEnv !== undefined && fromEnv.trim() !== "") {
    return { maxIncludeDepth: parseDepth(fromEnv, MAX_INCLUDE_DEPTH_ENV), stderr };
  }

  return { maxIncludeDepth: DEFAULT_MAX_INCLUDE_DEPTH, stderr };
}

export function warn(stderr: NodeJS.WritableStream, message: string): void {
  stderr.write(`warning: ${message}\n`);
}

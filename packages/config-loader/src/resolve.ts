import fs from "node:fs";
import path from "node:path";

import fg from "fast-glob";

import { IncludeDirective, isDocumentPath } from "./directives.js";
import { CyclicIncludeError, IncludeNotFoundError, ParseError } from "./errors.js";
import { mergeFragments } from "./merge.js";
import {
  createMapping,
  duplicateKeys,
  isMapping,
  isUnresolvedMapping,
  mappingEntries,
  type RawMapping,
  type RawNode,
  type UnresolvedNode,
} from "./nodes.js";
import {
  resolveLoaderOptions,
  warn,
  type EffectiveLoaderOptions,
  type LoaderOptions,
} from "./options.js";
import { parseJson, parseYaml } from "./parseYaml.js";
import { compareMatchPaths, formatPath, type PathSegment } from "./paths.js";

/** Mapping key whose `!include` fragments are merged over the enclosing mapping. */
export const MERGE_KEY = "<<";

/** Result of resolving one root document. */
export interface ResolvedDocument {
  /** The root mapping with every directive expanded and merged. */
  readonly document: RawMapping;
  /** Absolute paths of every file read, in read order. */
  readonly sources: readonly string[];
}

interface ResolveContext {
  readonly options: EffectiveLoaderOptions;
  readonly sources: string[];
}

interface Frame {
  readonly sourcePath: string;
  /** Absolute paths of the documents currently being resolved, root first. */
  readonly chain: readonly string[];
}

function errorCode(err: unknown): string | null {
  return typeof err === "object" && err !== null && "code" in err && typeof err.code === "string"
    ? err.code
    : null;
}

function readText(absPath: string, target: string, includedFrom: string | undefined): string {
  try {
    return fs.readFileSync(absPath, "utf8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      throw new IncludeNotFoundError(target, absPath, includedFrom);
    }

    const message = err instanceof Error ? err.message : String(err);
    throw new ParseError(absPath, `failed to read: ${message}`);
  }
}

function loadDocument(
  absPath: string,
  parentChain: readonly string[],
  ctx: ResolveContext,
  target: string,
  includedFrom?: string,
): RawNode {
  if (parentChain.includes(absPath)) {
    throw new CyclicIncludeError([...parentChain, absPath], "include cycle detected");
  }

  if (parentChain.length > ctx.options.maxIncludeDepth) {
    throw new CyclicIncludeError(
      [...parentChain, absPath],
      `include chain too deep (max ${ctx.options.maxIncludeDepth})`,
    );
  }

  const text = readText(absPath, target, includedFrom);
  ctx.sources.push(absPath);

  const parsed = parseYaml(text, { sourceName: absPath });
  for (const message of parsed.warnings) {
    warn(ctx.options.stderr, message);
  }

  return resolveNode(parsed.value, { sourcePath: absPath, chain: [...parentChain, absPath] }, ctx, []);
}

function loadOpaque(absPath: string, ctx: ResolveContext, target: string, includedFrom: string): RawNode {
  const text = readText(absPath, target, includedFrom);
  ctx.sources.push(absPath);

  if (path.extname(absPath).toLowerCase() === ".json") {
    // JSON has no tags, so the tree is already free of directives.
    return resolveNode(parseJson(text, { sourceName: absPath }), { sourcePath: absPath, chain: [] }, ctx, []);
  }

  return text;
}

function expandGlob(directive: IncludeDirective, frame: Frame, ctx: ResolveContext): RawNode {
  const cwd = path.dirname(frame.sourcePath);
  const matches = fg
    .sync(directive.target, { cwd, absolute: true, onlyFiles: true, unique: true })
    .map((match) => path.resolve(match))
    .filter((match) => match !== frame.sourcePath)
    .sort(compareMatchPaths);

  if (matches.length === 0) {
    warn(ctx.options.stderr, `${frame.sourcePath}: ${directive.describe()} matched no files`);
    return {};
  }

  const fragments = matches.map((match) => {
    if (!isDocumentPath(match)) {
      throw new ParseError(
        match,
        `${directive.describe()} matched a file that is not a YAML document; only .yml/.yaml files can be merged`,
      );
    }
    return loadDocument(match, frame.chain, ctx, directive.target, frame.sourcePath);
  });

  return mergeFragments(fragments);
}

function resolveDirective(directive: IncludeDirective, frame: Frame, ctx: ResolveContext): RawNode {
  const absPath = path.resolve(path.dirname(frame.sourcePath), directive.target);

  switch (directive.kind) {
    case "single":
      return loadDocument(absPath, frame.chain, ctx, directive.target, frame.sourcePath);
    case "opaque":
      return loadOpaque(absPath, ctx, directive.target, frame.sourcePath);
    case "glob":
      return expandGlob(directive, frame, ctx);
  }
}

function resolveMergeFragments(
  value: UnresolvedNode,
  frame: Frame,
  ctx: ResolveContext,
  segments: readonly PathSegment[],
): RawMapping[] {
  const items = Array.isArray(value) ? value : [value];

  return items.map((item, i) => {
    const itemPath = Array.isArray(value) ? [...segments, i] : segments;

    if (!(item instanceof IncludeDirective) || item.kind === "opaque") {
      throw new ParseError(
        frame.sourcePath,
        `${formatPath(itemPath)} must be a YAML !include (or a list of them) to merge into its mapping`,
      );
    }

    const fragment = resolveDirective(item, frame, ctx);
    if (fragment === null) return {};
    if (!isMapping(fragment)) {
      throw new ParseError(
        frame.sourcePath,
        `${formatPath(itemPath)}: ${item.describe()} did not resolve to a mapping and cannot be merged`,
      );
    }
    return fragment;
  });
}

function resolveNode(
  node: UnresolvedNode,
  frame: Frame,
  ctx: ResolveContext,
  segments: readonly PathSegment[],
): RawNode {
  if (node instanceof IncludeDirective) {
    return resolveDirective(node, frame, ctx);
  }

  if (Array.isArray(node)) {
    return node.map((item, i) => resolveNode(item, frame, ctx, [...segments, i]));
  }

  if (!isUnresolvedMapping(node)) {
    return node;
  }

  const entries: Array<[string, RawNode]> = [];
  let overlays: RawMapping[] = [];

  for (const [key, child] of mappingEntries(node)) {
    if (key === MERGE_KEY) {
      overlays = resolveMergeFragments(child, frame, ctx, [...segments, key]);
      continue;
    }
    entries.push([key, resolveNode(child, frame, ctx, [...segments, key])]);
  }

  const own = createMapping(entries, duplicateKeys(node));
  return overlays.length === 0 ? own : mergeFragments([own, ...overlays]);
}

function asRootMapping(value: RawNode, sourcePath: string): RawMapping {
  if (value === null) return {};
  if (!isMapping(value)) {
    throw new ParseError(sourcePath, "config root must be a mapping");
  }
  return value;
}

/**
 * Load a YAML document from disk and expand every `!include` in it.
 *
 * Reads are synchronous and glob matches are visited in sorted order, so the
 * same file tree always resolves to the same document. Keys repeated within
 * one mapping are not an error here; {@link findDuplicateKeys} lists them.
 */
export function resolveDocumentFile(filePath: string, options: LoaderOptions = {}): ResolvedDocument {
  const ctx: ResolveContext = { options: resolveLoaderOptions(options), sources: [] };
  const absPath = path.resolve(filePath);

  const value = loadDocument(absPath, [], ctx, filePath);
  return { document: asRootMapping(value, absPath), sources: ctx.sources };
}

/** Source identity for {@link resolveDocumentText}. */
export interface TextSource {
  /** Name used in messages and for cycle detection. */
  readonly sourceName: string;
  /** Directory that relative includes resolve against. Defaults to the cwd. */
  readonly baseDir?: string;
}

/** Like {@link resolveDocumentFile}, for a document already held in memory. */
export function resolveDocumentText(
  yamlText: string,
  source: TextSource,
  options: LoaderOptions = {},
): ResolvedDocument {
  const ctx: ResolveContext = { options: resolveLoaderOptions(options), sources: [] };
  const sourcePath = path.resolve(source.baseDir ?? process.cwd(), source.sourceName);

  const parsed = parseYaml(yamlText, { sourceName: sourcePath });
  for (const message of parsed.warnings) {
    warn(ctx.options.stderr, message);
  }

  const value = resolveNode(parsed.value, { sourcePath, chain: [sourcePath] }, ctx, []);
  return { document: asRootMapping(value, sourcePath), sources: ctx.sources };
}

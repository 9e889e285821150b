import path from "node:path";

import type { FilenameField, FilenameFormat, FilenamePlaceholder } from "./types.js";

export const FILENAME_PLACEHOLDERS: readonly FilenamePlaceholder[] = [
  "subject",
  "session",
  "run",
  "task",
  "acquisition",
];

const FIELD_RE = /^([A-Za-z_]+)(?::\.(\d+))?$/;

function isPlaceholder(name: string): name is FilenamePlaceholder {
  return FILENAME_PLACEHOLDERS.some((p) => p === name);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export type CompileFilenameFormatResult =
  | { readonly ok: true; readonly value: FilenameFormat }
  | { readonly ok: false; readonly message: string };

/**
 * Compile a `filename_format` template such as `{subject:.4}{session:.3}.edf`.
 *
 * `{name}` matches as few characters as possible, `{name:.N}` exactly N.
 * `{{` and `}}` stand for literal braces.
 */
export function compileFilenameFormat(template: string): CompileFilenameFormatResult {
  const fields: FilenameField[] = [];
  let pattern = "^";
  let literal = "";
  let i = 0;

  while (i < template.length) {
    const ch = template.charAt(i);
    const next = template.charAt(i + 1);

    if ((ch === "{" && next === "{") || (ch === "}" && next === "}")) {
      literal += ch;
      i += 2;
      continue;
    }

    if (ch === "}") {
      return { ok: false, message: `Unmatched '}' at position ${i} in ${JSON.stringify(template)}.` };
    }

    if (ch !== "{") {
      literal += ch;
      i += 1;
      continue;
    }

    const close = template.indexOf("}", i + 1);
    if (close === -1) {
      return { ok: false, message: `Unclosed '{' at position ${i} in ${JSON.stringify(template)}.` };
    }

    const spec = template.slice(i + 1, close);
    const match = FIELD_RE.exec(spec);
    const name = match?.[1];
    if (match === null || name === undefined) {
      return {
        ok: false,
        message: `Unsupported placeholder {${spec}}; expected {name} or {name:.N}.`,
      };
    }

    if (!isPlaceholder(name)) {
      return {
        ok: false,
        message: `Unknown placeholder '${name}'; expected one of ${FILENAME_PLACEHOLDERS.join(", ")}.`,
      };
    }

    if (fields.some((f) => f.name === name)) {
      return { ok: false, message: `Placeholder '${name}' appears more than once.` };
    }

    const widthText = match[2];
    const width = widthText === undefined ? null : Number(widthText);
    if (width !== null && width < 1) {
      return { ok: false, message: `Placeholder '${name}' width must be at least 1.` };
    }

    pattern += escapeRegExp(literal);
    literal = "";
    pattern += width === null ? `(?<${name}>.+?)` : `(?<${name}>.{${width}})`;
    fields.push({ name, width });
    i = close + 1;
  }

  pattern += `${escapeRegExp(literal)}$`;
  return { ok: true, value: { template, fields, pattern } };
}

/**
 * Pull the placeholder values out of a recording's file name.
 *
 * Only the base name is matched. Returns `null` when it does not fit the format.
 */
export function parseFilename(
  format: FilenameFormat,
  filePath: string,
): Partial<Record<FilenamePlaceholder, string>> | null {
  const match = new RegExp(format.pattern).exec(path.basename(filePath));
  if (match === null) return null;

  const groups = match.groups ?? {};
  const out: Partial<Record<FilenamePlaceholder, string>> = {};
  for (const field of format.fields) {
    const value = groups[field.name];
    if (value !== undefined) out[field.name] = value;
  }
  return out;
}

/**
 * Normalization of subject/session/run identifiers.
 *
 * Datasets name their recordings differently (`S088`, `88`, `088`), so the
 * exclusion rules and `exclude_people` entries are compared only after
 * passing through the dataset's scheme.
 */
export interface IdentifierScheme {
  readonly subject: (id: string) => string;
  readonly session: (id: string) => string;
  readonly run: (id: string) => string;
}

const NUMBERED_ID_RE = /^\D*?0*(\d+)$/;

const trim = (id: string): string => id.trim();

/** Compare identifiers exactly as written (whitespace trimmed). */
export const verbatimScheme: IdentifierScheme = {
  subject: trim,
  session: trim,
  run: trim,
};

/**
 * Reduce numbered subject ids to their bare number: `S088`, `088` and `88`
 * all become `88`. Ids without a trailing number are kept as written.
 */
export const numericScheme: IdentifierScheme = {
  subject: (id) => NUMBERED_ID_RE.exec(id.trim())?.[1] ?? id.trim(),
  session: trim,
  run: trim,
};

/** Rewrite numbered subject ids as `<prefix><zero-padded number>` (e.g. `S088`). */
export function createPrefixedScheme(prefix: string, width: number): IdentifierScheme {
  return {
    subject: (id) => {
      const digits = NUMBERED_ID_RE.exec(id.trim())?.[1];
      return digits === undefined ? id.trim() : `${prefix}${digits.padStart(width, "0")}`;
    },
    session: trim,
    run: trim,
  };
}

export const BUILTIN_IDENTIFIER_SCHEMES: Readonly<Record<string, IdentifierScheme>> = {
  verbatim: verbatimScheme,
  numeric: numericScheme,
};

/** Scheme used when a dataset does not set `identifier_scheme`. */
export function defaultSchemeName(sourceKind: "toplevel" | "external"): string {
  return sourceKind === "external" ? "numeric" : "verbatim";
}

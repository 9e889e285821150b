import type { RawMapping } from "@eegconf/config-loader";

/** A range bound; `null` is the explicit "unbounded" sentinel. */
export type Bound = number | null;

/** `[low, high]` pair as used by `baseline` and `bandpass`. */
export interface BoundPair {
  readonly low: Bound;
  readonly high: Bound;
}

/**
 * A time span (seconds from recording start) to exclude.
 *
 * `start: null` means "from recording start", `end: null` "to recording end".
 */
export interface TimeSpan {
  readonly start: Bound;
  readonly end: Bound;
}

export type DatasetSource =
  | {
      readonly kind: "toplevel";
      /** The path as written in the configuration. */
      readonly path: string;
      /** `path` resolved against the root document's directory. */
      readonly resolvedPath: string;
    }
  | {
      readonly kind: "external";
      /** Provider key used in the configuration (e.g. `moabb`). */
      readonly provider: string;
      /** Provider-side dataset name (e.g. `PhysionetMI`). */
      readonly name: string;
      /** Remaining provider flags, passed through as written. */
      readonly options: RawMapping;
    };

/** Epoch extraction window, relative to an event onset (seconds). */
export interface EpochWindow {
  readonly tmin: number;
  readonly tlen: number;
  /** Sliding-window step used when no discrete events are configured. */
  readonly stride: number | null;
}

export type ExclusionRule =
  | { readonly kind: "all" }
  | { readonly kind: "spans"; readonly spans: readonly TimeSpan[] }
  | { readonly kind: "nested"; readonly children: ExclusionTree };

/** Subject -> session-or-run -> run exclusion hierarchy, keyed by normalized ids. */
export type ExclusionTree = Readonly<Record<string, ExclusionRule>>;

export type FilenamePlaceholder = "subject" | "session" | "run" | "task" | "acquisition";

export interface FilenameField {
  readonly name: FilenamePlaceholder;
  /** Exact character count (`{subject:.4}`), or `null` for "as few as needed". */
  readonly width: number | null;
}

export interface FilenameFormat {
  readonly template: string;
  readonly fields: readonly FilenameField[];
  /** Anchored regular expression source with one named group per field. */
  readonly pattern: string;
}

/** A fully resolved and validated dataset entry. */
export interface DatasetDescriptor {
  /** Key of the entry under `datasets`. */
  readonly key: string;
  /** Display name; defaults to `key`. */
  readonly name: string;
  readonly source: DatasetSource;
  readonly window: EpochWindow;
  /** Event label -> integer code. */
  readonly events: Readonly<Record<string, number>>;
  readonly picks: readonly string[];
  /** Normalized ids of subjects dropped entirely. */
  readonly excludePeople: readonly string[];
  readonly exclude: ExclusionTree;
  readonly decimate: number;
  readonly baseline: BoundPair | null;
  readonly bandpass: BoundPair | null;
  readonly dropBad: boolean;
  readonly min: number | null;
  readonly max: number | null;
  readonly fileExtensions: readonly string[];
  readonly filenameFormat: FilenameFormat | null;
  /** Name of the identifier scheme used to normalize subject/session ids. */
  readonly identifierScheme: string;
  /** Unrecognised fields, passed through unvalidated. */
  readonly extras: RawMapping;
}

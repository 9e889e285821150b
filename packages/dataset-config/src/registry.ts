import { ConfigurationError, type RawMapping } from "@eegconf/config-loader";

import type { IdentifierScheme } from "./identifiers.js";
import { exclusionFor, type ExclusionStatus, type RecordingId } from "./query.js";
import type { DatasetDescriptor } from "./types.js";

/** `get()` was asked for a dataset the registry does not hold. */
export class DatasetNotFoundError extends ConfigurationError {
  override name = "DatasetNotFoundError";

  readonly key: string;

  constructor(key: string, known: readonly string[]) {
    super(
      `unknown dataset ${JSON.stringify(key)}` +
        (known.length > 0 ? ` (known: ${known.join(", ")})` : " (registry is empty)"),
    );
    this.key = key;
  }
}

export interface ConfigurationRegistryInit {
  readonly descriptors: readonly DatasetDescriptor[];
  readonly globalDefaults: RawMapping;
  readonly extras: RawMapping;
  readonly sources: readonly string[];
  readonly identifierSchemes: Readonly<Record<string, IdentifierScheme>>;
}

/**
 * Immutable, ordered collection of resolved dataset descriptors.
 *
 * Built once by `resolveConfiguration*`; reloading means resolving again.
 */
export class ConfigurationRegistry {
  readonly #descriptors: ReadonlyMap<string, DatasetDescriptor>;
  readonly #schemes: Readonly<Record<string, IdentifierScheme>>;

  /** The document's `defaults` section, as overlaid under every dataset. */
  readonly globalDefaults: RawMapping;
  /** Top-level keys other than `datasets` and `defaults`, unvalidated. */
  readonly extras: RawMapping;
  /** Every file read while resolving, in read order. */
  readonly sources: readonly string[];

  constructor(init: ConfigurationRegistryInit) {
    const descriptors = new Map<string, DatasetDescriptor>();
    for (const descriptor of init.descriptors) {
      if (descriptors.has(descriptor.key)) {
        throw new ConfigurationError(`duplicate dataset key ${JSON.stringify(descriptor.key)}`);
      }
      descriptors.set(descriptor.key, descriptor);
    }

    this.#descriptors = descriptors;
    this.#schemes = init.identifierSchemes;
    this.globalDefaults = init.globalDefaults;
    this.extras = init.extras;
    this.sources = Object.freeze([...init.sources]);
    Object.freeze(this);
  }

  get size(): number {
    return this.#descriptors.size;
  }

  has(key: string): boolean {
    return this.#descriptors.has(key);
  }

  /** @throws DatasetNotFoundError */
  get(key: string): DatasetDescriptor {
    const descriptor = this.#descriptors.get(key);
    if (descriptor === undefined) {
      throw new DatasetNotFoundError(key, this.keys());
    }
    return descriptor;
  }

  /** Dataset keys in declaration order. */
  keys(): string[] {
    return [...this.#descriptors.keys()];
  }

  /** `[key, descriptor]` pairs in declaration order. */
  all(): Array<readonly [string, DatasetDescriptor]> {
    return [...this.#descriptors.entries()];
  }

  /** The identifier scheme a dataset's exclusions were normalized with. */
  schemeFor(key: string): IdentifierScheme {
    const descriptor = this.get(key);
    const scheme = this.#schemes[descriptor.identifierScheme];
    if (scheme === undefined) {
      throw new ConfigurationError(
        `dataset ${JSON.stringify(key)} uses unregistered identifier scheme '${descriptor.identifierScheme}'`,
      );
    }
    return scheme;
  }

  /**
   * What dataset `key` excludes for `subject`, optionally narrowed to a
   * session-or-run and then a run. Ids go through the dataset's scheme first.
   */
  exclusionFor(key: string, subject: RecordingId, ...path: readonly RecordingId[]): ExclusionStatus {
    return exclusionFor(this.get(key), this.schemeFor(key), subject, ...path);
  }
}

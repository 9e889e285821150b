import path from "node:path";

import { createMapping, type RawMapping, type RawNode } from "@eegconf/config-loader";
import { describe, expect, it } from "vitest";

import {
  buildDatasetDescriptor,
  DEFAULT_EXTERNAL_PROVIDERS,
  DEFAULT_FILE_EXTENSIONS,
  type DescriptorContext,
} from "../src/descriptor/build.js";
import { BUILTIN_IDENTIFIER_SCHEMES } from "../src/identifiers.js";
import type { DatasetDescriptor } from "../src/types.js";

const BASE_DIR = path.resolve("/configs");

function context(defaults: RawMapping = {}): DescriptorContext {
  return {
    defaults,
    baseDir: BASE_DIR,
    identifierSchemes: BUILTIN_IDENTIFIER_SCHEMES,
    externalProviders: DEFAULT_EXTERNAL_PROVIDERS,
    defaultFileExtensions: DEFAULT_FILE_EXTENSIONS,
  };
}

function build(raw: RawNode, defaults?: RawMapping): DatasetDescriptor {
  const result = buildDatasetDescriptor("a", raw, context(defaults));
  if (!result.ok) {
    throw new Error(result.issues.map((i) => `${i.path}: ${i.message}`).join("\n"));
  }
  return result.value;
}

function issues(raw: RawNode, defaults?: RawMapping) {
  const result = buildDatasetDescriptor("a", raw, context(defaults));
  return result.ok ? [] : result.issues;
}

describe("buildDatasetDescriptor", () => {
  it("fills every default for a minimal dataset", () => {
    const descriptor = build({ toplevel: "./x", tlen: 3, stride: 300 });

    expect(descriptor).toEqual({
      key: "a",
      name: "a",
      source: { kind: "toplevel", path: "./x", resolvedPath: path.resolve(BASE_DIR, "x") },
      window: { tmin: 0, tlen: 3, stride: 300 },
      events: {},
      picks: [],
      excludePeople: [],
      exclude: {},
      decimate: 1,
      baseline: null,
      bandpass: null,
      dropBad: false,
      min: null,
      max: null,
      fileExtensions: [...DEFAULT_FILE_EXTENSIONS],
      filenameFormat: null,
      identifierScheme: "verbatim",
      extras: {},
    });
  });

  it("returns a deeply frozen descriptor", () => {
    const descriptor = build({ toplevel: "./x", tlen: 3, events: ["T1"] });

    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor.window)).toBe(true);
    expect(Object.isFrozen(descriptor.events)).toBe(true);
    expect(Object.isFrozen(DEFAULT_FILE_EXTENSIONS)).toBe(false);
  });

  it("rejects both a toplevel path and an external source", () => {
    expect(issues({ toplevel: "./x", moabb: { name: "MotorImageryDemo" }, tlen: 1 })).toEqual([
      {
        path: "$.datasets.a",
        message: "'toplevel' and 'moabb' are mutually exclusive; keep exactly one.",
      },
    ]);
  });

  it("rejects a dataset with no source", () => {
    expect(issues({ tlen: 1 })).toEqual([
      {
        path: "$.datasets.a",
        message: "Exactly one of 'toplevel' or an external source (moabb) is required.",
      },
    ]);
  });

  it("treats a ~ entry as an empty dataset", () => {
    expect(issues(null)).toEqual([
      {
        path: "$.datasets.a",
        message: "Exactly one of 'toplevel' or an external source (moabb) is required.",
      },
      { path: "$.datasets.a", message: "Missing required field 'tlen' (epoch length in seconds)." },
    ]);
  });

  it("rejects an entry that is not a mapping", () => {
    expect(issues([1])).toEqual([
      { path: "$.datasets.a", message: "Expected a mapping of dataset fields (got [1])." },
    ]);
  });

  it("reads the external shorthand and defaults to numeric ids", () => {
    const descriptor = build({ moabb: "MotorImageryDemo", tlen: 2, exclude_people: ["S088"] });

    expect(descriptor.source).toEqual({
      kind: "external",
      provider: "moabb",
      name: "MotorImageryDemo",
      options: {},
    });
    expect(descriptor.identifierScheme).toBe("numeric");
    expect(descriptor.excludePeople).toEqual(["88"]);
  });

  it("passes external flags through as options", () => {
    const descriptor = build({
      moabb: { name: "MotorImageryDemo", imagined: true, executed: false },
      tlen: 2,
    });

    expect(descriptor.source).toEqual({
      kind: "external",
      provider: "moabb",
      name: "MotorImageryDemo",
      options: { imagined: true, executed: false },
    });
  });

  it("overlays the dataset on the defaults", () => {
    const descriptor = build(
      { toplevel: "d", decimate: 2 },
      { tlen: 2, decimate: 4, picks: ["eeg"] },
    );

    expect(descriptor.window.tlen).toBe(2);
    expect(descriptor.decimate).toBe(2);
    expect(descriptor.picks).toEqual(["eeg"]);
  });

  it("lets ~ drop a source inherited from the defaults", () => {
    const descriptor = build({ moabb: null, toplevel: "d", tlen: 1 }, { moabb: "MotorImageryDemo" });

    expect(descriptor.source.kind).toBe("toplevel");
    expect(descriptor.identifierScheme).toBe("verbatim");
  });

  it("collects every problem in one pass", () => {
    expect(
      issues({ toplevel: "d", tlen: -1, decimate: 0, bandpass: [30, 1], min: 5, max: 5 }),
    ).toEqual([
      { path: "$.datasets.a", message: "'min' (5) must be less than 'max' (5)." },
      { path: "$.datasets.a.tlen", message: "'tlen' must be a positive number (got -1)." },
      { path: "$.datasets.a.decimate", message: "'decimate' must be a positive integer (got 0)." },
      { path: "$.datasets.a.bandpass", message: "Low bound 30 is greater than high bound 1." },
    ]);
  });

  it("keeps open bounds as null", () => {
    const descriptor = build({ toplevel: "d", tlen: 1, baseline: [null, 0], bandpass: [null, 40] });

    expect(descriptor.baseline).toEqual({ low: null, high: 0 });
    expect(descriptor.bandpass).toEqual({ low: null, high: 40 });
  });

  it("normalizes file extensions", () => {
    const descriptor = build({ toplevel: "d", tlen: 1, file_extensions: ["EDF", ".Fif", "edf"] });
    expect(descriptor.fileExtensions).toEqual([".edf", ".fif"]);
  });

  it("rejects an empty extension list", () => {
    expect(issues({ toplevel: "d", tlen: 1, file_extensions: [] })).toEqual([
      {
        path: "$.datasets.a.file_extensions",
        message: "'file_extensions' must list at least one extension.",
      },
    ]);
  });

  it("compiles filename_format and reports bad templates at its path", () => {
    const descriptor = build({ toplevel: "d", tlen: 1, filename_format: "{subject}.edf" });
    expect(descriptor.filenameFormat?.fields).toEqual([{ name: "subject", width: null }]);

    expect(issues({ toplevel: "d", tlen: 1, filename_format: "{patient}.edf" })).toEqual([
      {
        path: "$.datasets.a.filename_format",
        message:
          "Unknown placeholder 'patient'; expected one of subject, session, run, task, acquisition.",
      },
    ]);
  });

  it("selects an identifier scheme by name", () => {
    const descriptor = build({
      toplevel: "d",
      tlen: 1,
      identifier_scheme: "numeric",
      exclude_people: ["S088", "088"],
    });

    expect(descriptor.identifierScheme).toBe("numeric");
    expect(descriptor.excludePeople).toEqual(["88"]);

    expect(issues({ toplevel: "d", tlen: 1, identifier_scheme: "bogus" })).toEqual([
      {
        path: "$.datasets.a.identifier_scheme",
        message: 'Unknown identifier scheme "bogus"; expected one of verbatim, numeric.',
      },
    ]);
  });

  it("quotes integer-like dataset keys in issue paths", () => {
    const result = buildDatasetDescriptor("2014", { tlen: 1, toplevel: "d", decimate: 0 }, context());

    expect(result.ok ? [] : result.issues).toEqual([
      {
        path: "$.datasets['2014'].decimate",
        message: "'decimate' must be a positive integer (got 0).",
      },
    ]);
  });

  it("reports a key written twice in the dataset entry", () => {
    const raw = createMapping<RawNode>([["toplevel", "d"], ["tlen", 1], ["tlen", 2]], ["tlen"]);
    expect(issues(raw)).toEqual([
      { path: "$.datasets.a.tlen", message: "Duplicate key 'tlen'." },
    ]);
  });

  it("keeps unknown keys as extras", () => {
    expect(build({ toplevel: "d", tlen: 1, custom_flag: true }).extras).toEqual({
      custom_flag: true,
    });
  });
});

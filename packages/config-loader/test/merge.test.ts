import { describe, expect, it } from "vitest";

import { mergeFragments, mergeNodes } from "../src/merge.js";
import { createMapping, duplicateKeys, isMapping, mappingKeys } from "../src/nodes.js";

describe("mergeNodes", () => {
  it("recurses into mappings and lets the override win on scalars", () => {
    const merged = mergeNodes(
      { window: { tmin: 0, tlen: 2 }, name: "base", drop_bad: false },
      { window: { tlen: 3 }, drop_bad: true },
    );

    expect(merged).toEqual({
      window: { tmin: 0, tlen: 3 },
      name: "base",
      drop_bad: true,
    });
  });

  it("replaces sequences wholesale instead of concatenating", () => {
    expect(mergeNodes({ picks: ["eeg", "eog"] }, { picks: ["meg"] })).toEqual({ picks: ["meg"] });
  });

  it("replaces on shape mismatch in either direction", () => {
    expect(mergeNodes({ events: ["T1", "T2"] }, { events: { T1: 8 } })).toEqual({
      events: { T1: 8 },
    });
    expect(mergeNodes({ events: { T1: 8 } }, { events: ["T1"] })).toEqual({ events: ["T1"] });
    expect(mergeNodes({ exclude: { S001: null } }, { exclude: null })).toEqual({ exclude: null });
    expect(mergeNodes({ a: 1 }, 5)).toBe(5);
    expect(mergeNodes(null, { a: 1 })).toEqual({ a: 1 });
  });

  it("keeps base key order and appends new override keys", () => {
    const merged = mergeNodes({ b: 1, a: 2 }, { c: 3, b: 4 });
    expect(Object.keys(merged ?? {})).toEqual(["b", "a", "c"]);
  });

  it("keeps key order when keys look like integers", () => {
    const base = createMapping<number>([["b", 1], ["2014", 2], ["2008", 3]]);
    const merged = mergeNodes(base, createMapping<number>([["10", 4], ["2014", 5]]));

    if (!isMapping(merged)) throw new Error("expected a mapping");
    expect(mappingKeys(merged)).toEqual(["b", "2014", "2008", "10"]);
    expect(merged["2014"]).toBe(5);
  });

  it("carries repeated keys from both sides", () => {
    const merged = mergeNodes(
      createMapping([["a", 1]], ["a"]),
      createMapping([["b", 2]], ["b"]),
    );

    if (!isMapping(merged)) throw new Error("expected a mapping");
    expect(duplicateKeys(merged)).toEqual(["a", "b"]);
  });

  it("does not mutate its inputs", () => {
    const base = { nested: { x: 1 } };
    const override = { nested: { y: 2 } };
    mergeNodes(base, override);

    expect(base).toEqual({ nested: { x: 1 } });
    expect(override).toEqual({ nested: { y: 2 } });
  });

  it("is idempotent", () => {
    const doc = {
      datasets: { a: { toplevel: "./x", events: ["T1"], exclude: { S1: { R1: [[0, 1]] } } } },
    };

    expect(mergeNodes(doc, doc)).toEqual(doc);
    expect(mergeNodes(mergeNodes(doc, doc), doc)).toEqual(doc);
  });
});

describe("mergeFragments", () => {
  it("merges to an empty mapping when there is nothing to merge", () => {
    expect(mergeFragments([])).toEqual({});
  });

  it("applies fragments in order, last writer wins", () => {
    expect(
      mergeFragments([{ order: "a", a: true }, { order: "b", b: true }, { order: "c" }]),
    ).toEqual({ order: "c", a: true, b: true });
  });
});

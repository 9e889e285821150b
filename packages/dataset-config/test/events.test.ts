import { createMapping, mappingKeys, type ValidationIssue } from "@eegconf/config-loader";
import { describe, expect, it } from "vitest";

import { normalizeEvents } from "../src/descriptor/events.js";

function run(value: Parameters<typeof normalizeEvents>[0]) {
  const issues: ValidationIssue[] = [];
  const events = normalizeEvents(value, issues, ["events"]);
  return { events, issues };
}

describe("normalizeEvents", () => {
  it("numbers a list of labels by position", () => {
    expect(run(["T1", "T2"])).toEqual({ events: { T1: 0, T2: 1 }, issues: [] });
  });

  it("keeps an explicit mapping as written", () => {
    expect(run({ T1: 8, T2: 5 })).toEqual({ events: { T1: 8, T2: 5 }, issues: [] });
  });

  it("treats absent and ~ as no events", () => {
    expect(run(undefined)).toEqual({ events: {}, issues: [] });
    expect(run(null)).toEqual({ events: {}, issues: [] });
  });

  it("accepts numeric labels in a list", () => {
    expect(run([769, 770]).events).toEqual({ "769": 0, "770": 1 });
  });

  it("rejects a duplicate code and names the label that holds it", () => {
    expect(run({ T1: 8, T2: 8 }).issues).toEqual([
      { path: "$.events.T2", message: "Duplicate event code 8: already used by 'T1'." },
    ]);
  });

  it("rejects a label written twice in a mapping", () => {
    expect(run(createMapping([["T1", 1], ["T1", 2], ["T2", 3]], ["T1"]))).toEqual({
      events: { T1: 2, T2: 3 },
      issues: [{ path: "$.events.T1", message: "Duplicate event label 'T1'." }],
    });
  });

  it("keeps the written order of numeric labels", () => {
    const { events } = run(createMapping([["770", 2], ["769", 1]]));
    expect(mappingKeys(events)).toEqual(["770", "769"]);
  });

  it("rejects a duplicate label in a list", () => {
    expect(run(["T1", "T1"]).issues).toEqual([
      { path: "$.events[1]", message: "Duplicate event label 'T1'." },
    ]);
  });

  it("rejects non-integer codes", () => {
    expect(run({ T1: 1.5 }).issues).toEqual([
      { path: "$.events.T1", message: "Event code must be an integer (got 1.5)." },
    ]);
  });

  it("rejects a scalar", () => {
    expect(run("T1").issues).toEqual([
      {
        path: "$.events",
        message:
          'Expected a list of event labels or a mapping of label to integer code (got "T1").',
      },
    ]);
  });
});

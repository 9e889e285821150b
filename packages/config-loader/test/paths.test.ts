import { describe, expect, it } from "vitest";

import { compareMatchPaths, formatPath, formatSegment } from "../src/paths.js";

describe("formatPath", () => {
  it("writes identifiers with dots and indices in brackets", () => {
    expect(formatPath([])).toBe("$");
    expect(formatPath(["datasets", "motor_full", "bandpass", 1])).toBe(
      "$.datasets.motor_full.bandpass[1]",
    );
  });

  it("quotes keys that look like integers so they differ from indices", () => {
    expect(formatPath(["datasets", "2014", "exclude", "100"])).toBe(
      "$.datasets['2014'].exclude['100']",
    );
    expect(formatSegment(3)).toBe("[3]");
    expect(formatSegment("3")).toBe("['3']");
  });

  it("escapes quotes and backslashes in keys", () => {
    expect(formatSegment("it's")).toBe("['it\\'s']");
    expect(formatSegment("a\\b")).toBe("['a\\\\b']");
  });
});

describe("compareMatchPaths", () => {
  it("orders by code unit, uppercase before lowercase", () => {
    expect(["b.yml", "B.yml", "a.yml", "10.yml", "9.yml"].sort(compareMatchPaths)).toEqual([
      "10.yml",
      "9.yml",
      "B.yml",
      "a.yml",
      "b.yml",
    ]);
  });
});

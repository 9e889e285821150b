import { describe, expect, it } from "vitest";

import { compileFilenameFormat, parseFilename } from "../src/filenameFormat.js";
import type { FilenameFormat } from "../src/types.js";

function compile(template: string): FilenameFormat {
  const result = compileFilenameFormat(template);
  if (!result.ok) throw new Error(result.message);
  return result.value;
}

function compileError(template: string): string | null {
  const result = compileFilenameFormat(template);
  return result.ok ? null : result.message;
}

describe("compileFilenameFormat", () => {
  it("compiles fixed-width placeholders into an anchored pattern", () => {
    const format = compile("{subject:.4}{session:.3}.edf");

    expect(format.fields).toEqual([
      { name: "subject", width: 4 },
      { name: "session", width: 3 },
    ]);
    expect(format.pattern).toBe("^(?<subject>.{4})(?<session>.{3})\\.edf$");
  });

  it("treats doubled braces as literal braces", () => {
    expect(compile("{{x}}_{run}").pattern).toBe("^\\{x\\}_(?<run>.+?)$");
  });

  it("reports malformed templates", () => {
    expect(compileError("{subject")).toBe(`Unclosed '{' at position 0 in "{subject".`);
    expect(compileError("a}b")).toBe(`Unmatched '}' at position 1 in "a}b".`);
    expect(compileError("{subject:4}")).toBe(
      "Unsupported placeholder {subject:4}; expected {name} or {name:.N}.",
    );
    expect(compileError("{subject:.0}")).toBe("Placeholder 'subject' width must be at least 1.");
    expect(compileError("{subject}{subject}")).toBe("Placeholder 'subject' appears more than once.");
  });

  it("rejects unknown placeholder names", () => {
    expect(compileError("{patient}.edf")).toBe(
      "Unknown placeholder 'patient'; expected one of subject, session, run, task, acquisition.",
    );
  });
});

describe("parseFilename", () => {
  it("reads fixed-width fields from the base name", () => {
    const format = compile("{subject:.4}{session:.3}.edf");
    expect(parseFilename(format, "/data/S001/S001R03.edf")).toEqual({
      subject: "S001",
      session: "R03",
    });
  });

  it("matches free-width fields lazily", () => {
    const format = compile("{subject}_{run}.edf");
    expect(parseFilename(format, "sub12_run3.edf")).toEqual({ subject: "sub12", run: "run3" });
  });

  it("returns null when the name does not fit", () => {
    const format = compile("{subject:.4}{session:.3}.edf");
    expect(parseFilename(format, "S001R03.bdf")).toBeNull();
    expect(parseFilename(format, "S01R03.edf")).toBeNull();
  });
});

import chalk from "chalk";
import { beforeAll, describe, expect, it } from "vitest";
import { createDiffReporter, createUnifiedDiff, highlightChanges } from "../diff.js";

const ORIGINAL = "def f(x):\n    return x - 1\n";
const PATCHED = "def f(x):\n    return x + 1\n";

describe("Diff Reporting", () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it("should yield no changes for identical code", () => {
    expect(createUnifiedDiff(ORIGINAL, ORIGINAL, "inc.py")).toBe("");
  });

  it("should label both sides and show the changed line", () => {
    const lines = createUnifiedDiff(ORIGINAL, PATCHED, "inc.py").split("\n");
    expect(lines[0]).toBe("--- inc.py (original)");
    expect(lines[1]).toBe("+++ inc.py (patched)");
    expect(lines[2]).toBe("@@ -1,2 +1,2 @@");
    expect(lines).toContain(" def f(x):");
    expect(lines).toContain("-    return x - 1");
    expect(lines).toContain("+    return x + 1");
  });

  it("should be exposed through the reporter", () => {
    expect(createDiffReporter().diff(ORIGINAL, ORIGINAL, "inc.py")).toBe("");
  });

  it("should leave text unchanged without colour support", () => {
    const diff = createUnifiedDiff(ORIGINAL, PATCHED, "inc.py");
    expect(highlightChanges(diff)).toBe(diff);
  });
});

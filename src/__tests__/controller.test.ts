import { describe, expect, it, vi } from "vitest";
import { createSession, runRepair } from "../controller.js";
import { createDiffReporter } from "../diff.js";
import { SourceNotFoundError } from "../errors.js";
import { Complete, createPatchOracleClient } from "../fix.js";
import { replaceLine } from "../patch.js";
import { RepairDependencies } from "../types.js";

const FILE = "programs/inc.py";
const CODE = "def f(x):\n    return x - 1\n";
const FAILING = [
  "FAIL: test_inc",
  "Traceback (most recent call last):",
  '  File "inc.py", line 2, in f',
  "AssertionError: 1 != 3",
].join("\n");
const PASSING = "Ran 4 tests\nOK";

function fakeDependencies(
  overrides: Partial<RepairDependencies> = {}
): RepairDependencies {
  return {
    source: {
      load: async (filePath) => {
        if (filePath !== FILE) throw new SourceNotFoundError(filePath);
        return CODE;
      },
    },
    tests: { run: vi.fn().mockResolvedValue(FAILING) },
    oracle: { generate: vi.fn().mockResolvedValue("return x + 1") },
    applier: {
      apply: vi.fn(async (_filePath: string, code: string, lineNo: number, line: string) =>
        replaceLine(code, lineNo, line)
      ),
    },
    differ: createDiffReporter(),
    logger: { output: vi.fn(), info: vi.fn(), state: vi.fn() },
    ...overrides,
  };
}

describe("Repair Controller", () => {
  it("should start sessions empty", () => {
    expect(createSession(FILE, 3)).toEqual({
      filePath: FILE,
      originalCode: "",
      currentCode: "",
      errorLineNo: 1,
      patchLine: "",
      testOutput: "",
      testsPassed: false,
      attempts: 0,
      maxAttempts: 3,
      success: false,
      errorMessage: "",
    });
  });

  it("should succeed when the first patch makes the tests pass", async () => {
    const tests = {
      run: vi.fn().mockResolvedValueOnce(FAILING).mockResolvedValueOnce(PASSING),
    };
    const deps = fakeDependencies({ tests });

    const { session, diff } = await runRepair(FILE, deps, { maxAttempts: 3 });

    expect(session.success).toBe(true);
    expect(session.attempts).toBe(1);
    expect(session.errorLineNo).toBe(2);
    expect(session.patchLine).toBe("return x + 1");
    expect(session.currentCode).toBe("def f(x):\n    return x + 1\n");
    expect(session.originalCode).toBe(CODE);
    expect(session.functionContext?.functionName).toBe("f");
    expect(session.testOutput).toBe(PASSING);
    expect(diff?.split("\n")).toContain("+    return x + 1");
    expect(deps.applier.apply).toHaveBeenCalledWith(FILE, CODE, 2, "return x + 1");
    expect(tests.run).toHaveBeenCalledTimes(2);
  });

  it("should stop at the attempt budget when patches never pass", async () => {
    const deps = fakeDependencies();

    const result = await runRepair(FILE, deps, { maxAttempts: 3 });

    expect(result.session.success).toBe(false);
    expect(result.session.attempts).toBe(3);
    expect(result.session.errorMessage).toBe("");
    expect(result.category).toBe("logic");
    expect(result.diff).toBeUndefined();
    expect(deps.oracle.generate).toHaveBeenCalledTimes(3);
    expect(deps.applier.apply).toHaveBeenCalledTimes(3);
    expect(deps.tests.run).toHaveBeenCalledTimes(4);
  });

  it("should hand each attempt its number and the patched code", async () => {
    const deps = fakeDependencies();
    await runRepair(FILE, deps, { maxAttempts: 2 });

    const calls = vi.mocked(deps.oracle.generate).mock.calls;
    expect(calls.map(([session]) => session.attempts)).toEqual([1, 2]);
    expect(calls[1][0].currentCode).toBe("def f(x):\n    return x + 1\n");
  });

  it("should show later attempts the line earlier ones wrote", async () => {
    const complete = vi.fn<Complete>().mockResolvedValue("return x + 2");
    const deps = fakeDependencies({ oracle: createPatchOracleClient(complete) });

    const { session } = await runRepair(FILE, deps, { maxAttempts: 2 });

    const prompts = complete.mock.calls.map(([messages]) => messages[1].content);
    expect(prompts[0].split("\n")).toContain(">>>   2:     return x - 1");
    expect(prompts[1].split("\n")).toContain(">>>   2:     return x + 2");
    expect(session.functionContext?.contextLines).toEqual([
      "def f(x):",
      "    return x + 2",
    ]);
  });

  it("should report every state it enters", async () => {
    const tests = {
      run: vi.fn().mockResolvedValueOnce(FAILING).mockResolvedValueOnce(PASSING),
    };
    const deps = fakeDependencies({ tests });

    await runRepair(FILE, deps, { maxAttempts: 3 });

    const entered = vi.mocked(deps.logger.state).mock.calls.map(([, state]) => state);
    expect(entered).toEqual([
      "load",
      "localize",
      "generate",
      "apply",
      "validate",
      "success",
    ]);
  });

  it("should fail without attempts when the file is missing", async () => {
    const deps = fakeDependencies();

    const { session } = await runRepair("programs/missing.py", deps, {
      maxAttempts: 3,
    });

    expect(session.success).toBe(false);
    expect(session.attempts).toBe(0);
    expect(session.errorMessage).toBe(
      "Failed to load code: Could not find file: programs/missing.py"
    );
    expect(deps.tests.run).not.toHaveBeenCalled();
  });

  it("should abort the remaining budget when the oracle fails", async () => {
    const oracle = {
      generate: vi
        .fn()
        .mockResolvedValueOnce("return x + 2")
        .mockRejectedValueOnce(new Error("quota exceeded")),
    };
    const deps = fakeDependencies({ oracle });

    const { session } = await runRepair(FILE, deps, { maxAttempts: 5 });

    expect(session.success).toBe(false);
    expect(session.attempts).toBe(2);
    expect(session.errorMessage).toBe("Failed to generate patch: quota exceeded");
    expect(deps.applier.apply).toHaveBeenCalledTimes(1);
  });

  it("should fail on a fault line outside the file", async () => {
    const tests = { run: vi.fn().mockResolvedValue("FAIL at line 9") };
    const deps = fakeDependencies({ tests });

    const { session } = await runRepair(FILE, deps, { maxAttempts: 3 });

    expect(session.attempts).toBe(1);
    expect(session.errorMessage).toBe(
      "Failed to apply patch: Line number 9 is out of range (1-2)"
    );
    expect(session.currentCode).toBe(CODE);
  });

  it("should count an empty candidate as a failed attempt", async () => {
    const oracle = { generate: vi.fn().mockResolvedValue("") };
    const deps = fakeDependencies({ oracle });

    const { session } = await runRepair(FILE, deps, { maxAttempts: 2 });

    expect(session.attempts).toBe(2);
    expect(session.errorMessage).toBe("");
    expect(deps.applier.apply).not.toHaveBeenCalled();
    expect(deps.tests.run).toHaveBeenCalledTimes(3);
  });

  it("should skip the write when the review declines", async () => {
    const review = vi.fn().mockResolvedValue(false);
    const deps = fakeDependencies({ review });

    const { session } = await runRepair(FILE, deps, { maxAttempts: 1 });

    expect(review).toHaveBeenCalledWith(FILE, "    return x - 1", "return x + 1");
    expect(deps.applier.apply).not.toHaveBeenCalled();
    expect(session.currentCode).toBe(CODE);
    expect(session.attempts).toBe(1);
  });

  it("should refuse an empty attempt budget", async () => {
    const deps = fakeDependencies();

    const { session } = await runRepair(FILE, deps, { maxAttempts: 0 });

    expect(session.attempts).toBe(0);
    expect(session.errorMessage).toBe("Invalid attempt budget: 0");
    expect(deps.tests.run).not.toHaveBeenCalled();
  });

  it("should freeze the session once terminal", async () => {
    const { session } = await runRepair(FILE, fakeDependencies(), {
      maxAttempts: 1,
    });
    expect(Object.isFrozen(session)).toBe(true);
  });
});

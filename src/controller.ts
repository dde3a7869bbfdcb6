import path from "node:path";
import { testsPassed } from "./commands.js";
import { errorMessage } from "./errors.js";
import {
  classifyError,
  extractErrorLine,
  getFunctionContext,
  splitLines,
} from "./localize.js";
import {
  RepairDependencies,
  RepairResult,
  RepairSession,
  RepairState,
  StageOutcome,
} from "./types.js";

type ActiveState = Exclude<RepairState, "success" | "failure">;
type Stage = (
  session: RepairSession,
  deps: RepairDependencies
) => Promise<StageOutcome>;

export function createSession(
  filePath: string,
  maxAttempts: number
): RepairSession {
  return {
    filePath,
    originalCode: "",
    currentCode: "",
    errorLineNo: 1,
    patchLine: "",
    testOutput: "",
    testsPassed: false,
    attempts: 0,
    maxAttempts,
    success: false,
    errorMessage: "",
  };
}

/**
 * Runs body and turns anything it throws into a fault carrying the given session
 */
async function guard(
  failure: string,
  session: RepairSession,
  body: () => Promise<RepairSession>
): Promise<StageOutcome> {
  try {
    return { ok: true, session: await body() };
  } catch (error) {
    return { ok: false, session, error: `${failure}: ${errorMessage(error)}` };
  }
}

const load: Stage = (session, { source }) =>
  guard("Failed to load code", session, async () => {
    const code = await source.load(session.filePath);
    return { ...session, originalCode: code, currentCode: code };
  });

const localize: Stage = (session, { tests }) =>
  guard("Failed to localize defect", session, async () => {
    const testOutput = await tests.run(session.filePath);
    const errorLineNo = extractErrorLine(
      testOutput,
      path.basename(session.filePath)
    );
    return {
      ...session,
      testOutput,
      testsPassed: testsPassed(testOutput),
      errorLineNo,
      functionContext: getFunctionContext(session.currentCode, errorLineNo),
    };
  });

const generate: Stage = (session, { oracle }) => {
  const attempt = { ...session, attempts: session.attempts + 1 };
  return guard("Failed to generate patch", attempt, async () => ({
    ...attempt,
    patchLine: await oracle.generate(attempt),
  }));
};

const apply: Stage = (session, { applier, review, logger }) =>
  guard("Failed to apply patch", session, async () => {
    const { filePath, currentCode, errorLineNo, patchLine } = session;

    if (!patchLine.trim()) {
      logger.info("Oracle returned no usable line, nothing written\n");
      return session;
    }

    const lines = splitLines(currentCode);
    if (review && errorLineNo >= 1 && errorLineNo <= lines.length) {
      const accepted = await review(filePath, lines[errorLineNo - 1], patchLine);
      if (!accepted) {
        logger.info("Candidate declined, nothing written\n");
        return session;
      }
    }

    const patched = await applier.apply(filePath, currentCode, errorLineNo, patchLine);
    return {
      ...session,
      currentCode: patched,
      functionContext: getFunctionContext(patched, errorLineNo),
    };
  });

const validate: Stage = (session, { tests }) =>
  guard("Failed to validate patch", session, async () => {
    const testOutput = await tests.run(session.filePath);
    return { ...session, testOutput, testsPassed: testsPassed(testOutput) };
  });

const STAGES: Record<ActiveState, Stage> = {
  load,
  localize,
  generate,
  apply,
  validate,
};

function afterValidate(session: RepairSession): RepairState {
  if (session.errorMessage) return "failure";
  if (session.testsPassed) return "success";
  if (session.attempts >= session.maxAttempts) return "failure";
  return "generate";
}

/**
 * Next state after a stage finished without a system fault
 */
const TRANSITIONS: Record<ActiveState, (session: RepairSession) => RepairState> =
  {
    load: () => "localize",
    localize: () => "generate",
    generate: () => "apply",
    apply: () => "validate",
    validate: afterValidate,
  };

function isActive(state: RepairState): state is ActiveState {
  return state !== "success" && state !== "failure";
}

/**
 * Drives one program through Load → Localize → Generate → Apply → Validate,
 * looping Generate → Apply → Validate until the tests pass or the attempt
 * budget is spent. System faults end the run in Failure immediately.
 */
export async function runRepair(
  filePath: string,
  deps: RepairDependencies,
  options: { maxAttempts: number }
): Promise<RepairResult> {
  let session = createSession(filePath, options.maxAttempts);
  let state: RepairState = "load";

  if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
    session = {
      ...session,
      errorMessage: `Invalid attempt budget: ${options.maxAttempts}`,
    };
    state = "failure";
  }

  while (isActive(state)) {
    deps.logger.state(session, state);
    const outcome = await STAGES[state](session, deps);

    if (outcome.ok) {
      session = outcome.session;
      state = TRANSITIONS[state](session);
    } else {
      session = { ...outcome.session, errorMessage: outcome.error };
      deps.logger.info(`${outcome.error}\n`);
      state = "failure";
    }

    if (state === "apply") {
      deps.logger.info(
        `Candidate for line ${session.errorLineNo}: ${session.patchLine.trim()}\n`
      );
    }
  }

  deps.logger.state(session, state);

  if (state === "success") {
    const diff = deps.differ.diff(
      session.originalCode,
      session.currentCode,
      path.basename(filePath)
    );
    return {
      session: Object.freeze({ ...session, success: true }),
      diff,
      category: classifyError(session.testOutput),
    };
  }

  return {
    session: Object.freeze({ ...session, success: false }),
    category: classifyError(session.testOutput),
  };
}

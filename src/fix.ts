import path from "node:path";
import { apis, requestCompletion } from "./api.js";
import {
  ERROR_CATEGORY_LABELS,
  LANGUAGES,
  PROMPT_OUTPUT_BUDGET,
  REPAIR_INSTRUCTIONS,
  UNKNOWN_LANGUAGE,
  repairSystemPrompt,
} from "./constants.js";
import { classifyError, getFunctionContext, renderCodeContext } from "./localize.js";
import {
  Config,
  Message,
  PatchOracleClient,
  RepairLogger,
  RepairSession,
} from "./types.js";

export type Complete = (messages: Message[]) => Promise<string>;

const FENCE = "```";

export function languageFor(filePath: string): string {
  return LANGUAGES[path.extname(filePath).toLowerCase()] ?? UNKNOWN_LANGUAGE;
}

function fenceTag(language: string): string {
  return language === UNKNOWN_LANGUAGE ? "" : language.toLowerCase();
}

/**
 * The code window always comes from the current code, so later attempts see
 * what earlier ones wrote.
 */
export function buildRepairPrompt(session: RepairSession): string {
  const context = getFunctionContext(session.currentCode, session.errorLineNo);
  const category = classifyError(session.testOutput);

  return [
    "CONTEXT:",
    `- Function: ${
      context.functionName ? `Function '${context.functionName}'` : "Code section"
    }`,
    `- Error Type: ${ERROR_CATEGORY_LABELS[category]}`,
    `- This is attempt #${session.attempts}`,
    "",
    `FAULTY CODE (line ${session.errorLineNo} marked with >>>):`,
    `${FENCE}${fenceTag(languageFor(session.filePath))}`,
    renderCodeContext(context),
    FENCE,
    "",
    "TEST FAILURE OUTPUT:",
    FENCE,
    session.testOutput.slice(-PROMPT_OUTPUT_BUDGET),
    FENCE,
    "",
    REPAIR_INSTRUCTIONS,
    "",
    "RESPONSE FORMAT:",
    `Provide ONLY the corrected line ${session.errorLineNo} with proper indentation:`,
  ].join("\n");
}

/**
 * Reduces a free-form reply to one candidate line: the first usable line
 * inside a code fence, or the first line of the trimmed reply.
 */
export function sanitizePatchLine(response: string): string {
  const trimmed = response.trim();
  const lines = trimmed.split(/\r?\n/);

  if (trimmed.includes(FENCE)) {
    const opening = lines.findIndex((line) => line.trim().startsWith(FENCE));
    return (
      lines
        .slice(opening + 1)
        .find((line) => line.trim() && !line.trim().startsWith(FENCE)) ?? ""
    );
  }

  return lines[0].trimEnd();
}

export function createPatchOracleClient(complete: Complete): PatchOracleClient {
  return {
    async generate(session) {
      const reply = await complete([
        { role: "system", content: repairSystemPrompt(languageFor(session.filePath)) },
        { role: "user", content: buildRepairPrompt(session) },
      ]);
      return sanitizePatchLine(reply);
    },
  };
}

/**
 * Completion backed by DeepSeek, streaming the reply into the repair log
 */
export function createDeepSeekCompletion(
  config: Pick<Config, "timeout" | "debug">,
  logger: RepairLogger
): Complete {
  return async (messages) => {
    logger.info(
      `Asking ${apis.DEEPSEEK.provider}(${apis.DEEPSEEK.model}) for a replacement line...\n`
    );
    const reply = await requestCompletion({
      api: apis.DEEPSEEK,
      config,
      messages,
      onToken: (text) => logger.info(text),
      log: (text) => logger.info(text),
    });
    logger.info("\n");
    return reply;
  };
}

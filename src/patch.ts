import fs from "node:fs";
import chalk from "chalk";
import prompts from "prompts";
import { PatchRangeError } from "./errors.js";
import { PatchApplier, PatchReview } from "./types.js";

/**
 * Lines of the file with their terminators kept
 */
function splitKeepEnds(code: string): string[] {
  return code.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

export function leadingWhitespace(line: string): string {
  return /^[ \t]*/.exec(line)?.[0] ?? "";
}

/**
 * Replaces line lineNo (1-based) of code with newLine. A candidate that does
 * not already start with the target line's indentation gets it prepended to
 * its trimmed text. The result always ends the line with one terminator.
 */
export function replaceLine(code: string, lineNo: number, newLine: string): string {
  const lines = splitKeepEnds(code);
  if (!Number.isInteger(lineNo) || lineNo < 1 || lineNo > lines.length) {
    throw new PatchRangeError(lineNo, lines.length);
  }

  const originalLine = lines[lineNo - 1];
  const indent = leadingWhitespace(originalLine);
  const terminator = originalLine.endsWith("\r\n") ? "\r\n" : "\n";

  let replacement = newLine.replace(/[\r\n]+$/, "");
  if (replacement.trim() && !replacement.startsWith(indent)) {
    replacement = indent + replacement.trim();
  }

  lines[lineNo - 1] = replacement + terminator;
  return lines.join("");
}

export async function applyPatchLine(
  filePath: string,
  code: string,
  lineNo: number,
  newLine: string
): Promise<string> {
  const updated = replaceLine(code, lineNo, newLine);
  await fs.promises.writeFile(filePath, updated, "utf8");
  return updated;
}

export function createPatchApplier(): PatchApplier {
  return { apply: applyPatchLine };
}

/**
 * Shows the line change and asks before it is written
 */
export const confirmPatch: PatchReview = async (
  filePath,
  originalLine,
  candidateLine
) => {
  console.log(chalk.bold(filePath));
  console.log(chalk.red(`- ${originalLine}`));
  console.log(chalk.green(`+ ${candidateLine}`));
  const response = await prompts({
    type: "confirm",
    name: "confirm",
    message: chalk.bold(chalk.green("Apply change?")),
  });

  return response.confirm === true;
};

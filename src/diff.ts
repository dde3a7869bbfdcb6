import chalk from "chalk";
import { createTwoFilesPatch, structuredPatch } from "diff";
import { errorMessage } from "./errors.js";
import { DiffReporter } from "./types.js";

const SEPARATOR = /^=+\n/;

/**
 * Unified diff of two versions of a file, "" when nothing changed.
 * Never throws: a failure comes back as text.
 */
export function createUnifiedDiff(
  original: string,
  final: string,
  label: string
): string {
  try {
    const fromFile = `${label} (original)`;
    const toFile = `${label} (patched)`;
    if (structuredPatch(fromFile, toFile, original, final).hunks.length === 0) {
      return "";
    }
    return createTwoFilesPatch(fromFile, toFile, original, final).replace(
      SEPARATOR,
      ""
    );
  } catch (error) {
    return `Error generating diff: ${errorMessage(error)}`;
  }
}

export function highlightChanges(diff: string): string {
  return diff
    .split("\n")
    .map((line) => {
      if (line.startsWith("---") || line.startsWith("+++")) return chalk.bold(line);
      if (line.startsWith("-")) return chalk.red(line);
      if (line.startsWith("+")) return chalk.green(line);
      return line;
    })
    .join("\n");
}

export function createDiffReporter(): DiffReporter {
  return { diff: createUnifiedDiff };
}

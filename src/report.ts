import chalk from "chalk";
import {
  ERROR_CATEGORY_LABELS,
  MANUAL_INVESTIGATION_HINTS,
  REPORT_OUTPUT_BUDGET,
} from "./constants.js";
import { highlightChanges } from "./diff.js";
import { BatchEntry, RepairResult, RepairSession } from "./types.js";

const RULE = "=".repeat(60);

export function formatSuccessReport({ session, diff }: RepairResult): string {
  return [
    "",
    RULE,
    chalk.bold(chalk.green("REPAIR SUCCESSFUL")),
    RULE,
    `File: ${session.filePath}`,
    `Attempts: ${session.attempts}`,
    `Error Line: ${session.errorLineNo}`,
    "",
    "Final Patch Applied:",
    `  Line ${session.errorLineNo}: ${session.patchLine.trim()}`,
    "",
    "Unified Diff:",
    highlightChanges(diff ?? ""),
    RULE,
  ].join("\n");
}

export function formatFailureReport({ session, category }: RepairResult): string {
  return [
    "",
    RULE,
    chalk.bold(chalk.red("REPAIR FAILED")),
    RULE,
    `File: ${session.filePath}`,
    `Attempts: ${session.attempts}/${session.maxAttempts}`,
    `Error Line: ${session.errorLineNo}`,
    `Error Type: ${ERROR_CATEGORY_LABELS[category]}`,
    "",
    "Last Error Output:",
    session.testOutput.slice(-REPORT_OUTPUT_BUDGET),
    ...(session.errorMessage ? ["", `System Error: ${session.errorMessage}`] : []),
    "",
    chalk.bold("Suggested Manual Investigation:"),
    ...MANUAL_INVESTIGATION_HINTS.map((hint) => `- ${hint}`),
    RULE,
  ].join("\n");
}

export function formatReport(result: RepairResult): string {
  return result.session.success
    ? formatSuccessReport(result)
    : formatFailureReport(result);
}

export function formatStatusLine(session: RepairSession): string {
  return session.success
    ? `Repair completed successfully in ${session.attempts} attempts!`
    : `Repair failed after ${session.attempts} attempts.`;
}

export function formatBatchTable(entries: BatchEntry[]): string {
  const fileWidth = Math.max(4, ...entries.map((entry) => entry.file.length));
  const header = `${"file".padEnd(fileWidth)}  success  attempts`;
  const rows = entries.map(
    (entry) =>
      `${entry.file.padEnd(fileWidth)}  ${String(entry.success).padEnd(
        7
      )}  ${String(entry.attempts).padStart(8)}`
  );
  return [header, ...rows].join("\n");
}

/**
 * One horizontal bar per file, one block per attempt
 */
export function formatAttemptsChart(entries: BatchEntry[]): string {
  const fileWidth = Math.max(0, ...entries.map((entry) => entry.file.length));
  return entries
    .map(
      (entry) =>
        `${entry.file.padEnd(fileWidth)} | ${"#".repeat(entry.attempts)} ${
          entry.attempts
        }`
    )
    .join("\n");
}

export function successRatio(entries: BatchEntry[]): {
  success: number;
  failure: number;
} {
  if (entries.length === 0) return { success: 0, failure: 0 };
  const succeeded = entries.filter((entry) => entry.success).length;
  const success = (succeeded / entries.length) * 100;
  return { success, failure: 100 - success };
}

export function formatSuccessRatio(entries: BatchEntry[]): string {
  const succeeded = entries.filter((entry) => entry.success).length;
  const { success, failure } = successRatio(entries);
  return [
    `Success: ${succeeded}/${entries.length} (${success.toFixed(1)}%)`,
    `Failure: ${entries.length - succeeded}/${entries.length} (${failure.toFixed(1)}%)`,
  ].join("\n");
}

export function formatBatchSummary(entries: BatchEntry[]): string {
  return [
    chalk.bold("Repair Summary:"),
    formatBatchTable(entries),
    "",
    chalk.bold("Attempts per File:"),
    formatAttemptsChart(entries),
    "",
    chalk.bold("Success Rate:"),
    formatSuccessRatio(entries),
  ].join("\n");
}

function csvField(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsv(entries: BatchEntry[]): string {
  return [
    "file,success,attempts",
    ...entries.map(
      (entry) => `${csvField(entry.file)},${entry.success},${entry.attempts}`
    ),
  ].join("\n") + "\n";
}

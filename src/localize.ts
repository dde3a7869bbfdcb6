import {
  CONTEXT_RADIUS,
  ERROR_CATEGORIES,
  ERROR_LINE_MARKER,
  FUNCTION_HEADER_PATTERNS,
  LINE_PATTERNS,
} from "./constants.js";
import { ErrorCategory, FunctionContext } from "./types.js";

export function splitLines(code: string): string[] {
  const lines = code.split(/\r?\n/);
  if (lines.at(-1) === "") lines.pop();
  return lines;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Finds the line the test output blames. With a file name, the innermost
 * traceback frame inside that file is preferred; otherwise the first pattern
 * of LINE_PATTERNS that matches anywhere decides. Defaults to 1.
 */
export function extractErrorLine(output: string, fileName?: string): number {
  if (fileName) {
    const frame = new RegExp(
      `File "(?:[^"]*[\\\\/])?${escapeRegExp(fileName)}", line (\\d+)`,
      "gi"
    );
    const last = [...output.matchAll(frame)].at(-1);
    if (last) return Number.parseInt(last[1], 10);
  }

  for (const pattern of LINE_PATTERNS) {
    const match = pattern.exec(output);
    if (match) return Number.parseInt(match[1], 10);
  }

  return 1;
}

export function classifyError(output: string): ErrorCategory {
  const lower = output.toLowerCase();
  const found = ERROR_CATEGORIES.find(({ keywords }) =>
    keywords.some((keyword) => lower.includes(keyword))
  );
  return found?.category ?? "general";
}

export function getFunctionContext(
  code: string,
  lineNo: number
): FunctionContext {
  const lines = splitLines(code);
  let functionName: string | undefined;
  let functionStartLine: number | undefined;

  scan: for (let i = Math.min(lineNo, lines.length) - 1; i >= 0; i--) {
    for (const pattern of FUNCTION_HEADER_PATTERNS) {
      const match = pattern.exec(lines[i]);
      if (match) {
        functionName = match[1];
        functionStartLine = i + 1;
        break scan;
      }
    }
  }

  const contextStartLine = Math.max(1, lineNo - CONTEXT_RADIUS);
  const contextEndLine = Math.min(lines.length, lineNo + CONTEXT_RADIUS);

  return {
    functionName,
    functionStartLine,
    errorLine: lineNo,
    contextLines: lines.slice(contextStartLine - 1, contextEndLine),
    contextStartLine,
  };
}

/**
 * Numbers every line of the window and marks the error line with >>>
 */
export function renderCodeContext(context: FunctionContext): string {
  return context.contextLines
    .map((line, i) => {
      const lineNo = context.contextStartLine + i;
      const marker = lineNo === context.errorLine ? ERROR_LINE_MARKER : "    ";
      return `${marker}${String(lineNo).padStart(3)}: ${line}`;
    })
    .join("\n");
}

import { ErrorCategory } from "./types.js";

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_TEST_TIMEOUT_SECONDS = 30;
export const DEFAULT_TEST_COMMAND = "python3 tester.py";
export const DEFAULT_PROGRAMS_DIR = "programs";
export const DEFAULT_EXTENSION = ".py";

export const NO_TEST_OUTPUT = "No test output generated";

/** Characters of test output kept in the repair prompt */
export const PROMPT_OUTPUT_BUDGET = 500;
/** Characters of test output shown in the failure report */
export const REPORT_OUTPUT_BUDGET = 300;
export const CONTEXT_RADIUS = 5;
export const ERROR_LINE_MARKER = ">>> ";

export const FAILURE_MARKERS = /fail|error/i;

/**
 * Tried in order; the first pattern matching anywhere in the output wins
 */
export const LINE_PATTERNS: RegExp[] = [
  /File "[^"]+", line (\d+)/i,
  /Error on line (\d+)/i,
  /at line (\d+)/i,
  /Line (\d+):/i,
  /line (\d+)/i,
];

export const FUNCTION_HEADER_PATTERNS: RegExp[] = [
  /^\s*(?:async\s+)?def\s+([A-Za-z_]\w*)/,
  /^\s*(?:export\s+)?(?:async\s+)?function\s*\*?\s*([A-Za-z_$][\w$]*)/,
];

/**
 * Priority order matters: the first category with a keyword in the output wins
 */
export const ERROR_CATEGORIES: { category: ErrorCategory; keywords: string[] }[] =
  [
    { category: "index", keywords: ["indexerror", "index out of range"] },
    { category: "key", keywords: ["keyerror"] },
    { category: "type", keywords: ["typeerror"] },
    { category: "value", keywords: ["valueerror"] },
    { category: "name", keywords: ["nameerror", "is not defined"] },
    { category: "logic", keywords: ["assertion"] },
    { category: "timeout", keywords: ["infinite", "timeout", "timed out"] },
  ];

export const ERROR_CATEGORY_LABELS: Record<ErrorCategory, string> = {
  index: "Index Error (likely off-by-one or boundary issue)",
  key: "Key Error (missing dictionary key)",
  type: "Type Error (incorrect data type usage)",
  value: "Value Error (invalid value)",
  name: "Name Error (undefined variable)",
  logic: "Logic Error (incorrect algorithm behavior)",
  timeout: "Infinite Loop or Performance Issue",
  general: "General Error",
};

export const LANGUAGES: Record<string, string> = {
  ".py": "Python",
  ".js": "JavaScript",
  ".ts": "TypeScript",
  ".rb": "Ruby",
  ".java": "Java",
  ".go": "Go",
};

/** Used for extensions missing from LANGUAGES */
export const UNKNOWN_LANGUAGE = "source";

export const repairSystemPrompt = (language: string) =>
  [
    `You are an expert ${language} debugging assistant specializing in algorithmic bug fixes.`,
    "You answer with a single corrected line of code and nothing else.",
  ].join("\n");

export const REPAIR_INSTRUCTIONS = [
  "INSTRUCTIONS:",
  "1. Analyze the error carefully - this is likely a small algorithmic defect",
  "2. Common issues: off-by-one errors, wrong operators, incorrect boundary conditions, missing edge cases",
  "3. Focus on the EXACT line marked with >>> - provide only the corrected version of that line",
  "4. Maintain the same indentation and code style",
  "5. Do not add explanations, comments, or multiple lines",
].join("\n");

export const MANUAL_INVESTIGATION_HINTS = [
  "Check for off-by-one errors in loops and array access",
  "Verify boundary conditions and edge cases",
  "Look for incorrect operators (==, !=, <, <=, >, >=)",
  "Check variable initialization and scope",
];

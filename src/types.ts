/**
 * Diagnosis of where a failure sits inside the program under repair
 */
export interface FunctionContext {
  /** Name of the enclosing function, undefined at top level */
  functionName?: string;
  /** 1-based line of the enclosing function header */
  functionStartLine?: number;
  /** 1-based line the failure was localized to */
  errorLine: number;
  /** Source lines of the window around the error line */
  contextLines: string[];
  /** 1-based line number of the first entry in contextLines */
  contextStartLine: number;
}

/**
 * Record threaded through every stage of a repair
 */
export interface RepairSession {
  readonly filePath: string;
  /** Snapshot taken once at load time, only used for the final diff */
  readonly originalCode: string;
  readonly currentCode: string;
  /** 1-based fault line, 1 when the test output names none */
  readonly errorLineNo: number;
  readonly patchLine: string;
  readonly testOutput: string;
  readonly testsPassed: boolean;
  readonly attempts: number;
  readonly maxAttempts: number;
  readonly success: boolean;
  /** Sticky; once set the controller goes straight to Failure */
  readonly errorMessage: string;
  readonly functionContext?: FunctionContext;
}

export type ErrorCategory =
  | "index"
  | "key"
  | "type"
  | "value"
  | "name"
  | "logic"
  | "timeout"
  | "general";

export type RepairState =
  | "load"
  | "localize"
  | "generate"
  | "apply"
  | "validate"
  | "success"
  | "failure";

export type StageOutcome =
  | { ok: true; session: RepairSession }
  /** session carries whatever the stage recorded before it failed */
  | { ok: false; session: RepairSession; error: string };

export interface SourceStore {
  load(filePath: string): Promise<string>;
}

export interface TestOracle {
  run(filePath: string): Promise<string>;
}

export interface PatchOracleClient {
  generate(session: RepairSession): Promise<string>;
}

export interface PatchApplier {
  apply(
    filePath: string,
    code: string,
    lineNo: number,
    newLine: string
  ): Promise<string>;
}

export interface DiffReporter {
  diff(original: string, final: string, label: string): string;
}

/**
 * Asked before a candidate line is written; resolving false skips the write
 */
export type PatchReview = (
  filePath: string,
  originalLine: string,
  candidateLine: string
) => Promise<boolean>;

export interface RepairLogger {
  /** Raw text from the test harness */
  output(text: string): void;
  /** Progress of the repair itself */
  info(text: string): void;
  /** Called on entering every state, terminal ones included */
  state(session: RepairSession, state: RepairState): void;
}

/**
 * Collaborators handed to the controller, constructed once per process
 */
export interface RepairDependencies {
  source: SourceStore;
  tests: TestOracle;
  oracle: PatchOracleClient;
  applier: PatchApplier;
  differ: DiffReporter;
  logger: RepairLogger;
  review?: PatchReview;
}

export interface RepairResult {
  session: RepairSession;
  /** Unified diff of original against final code, set on success */
  diff?: string;
  category: ErrorCategory;
}

export interface BatchEntry {
  file: string;
  success: boolean;
  attempts: number;
}

/**
 * Configuration options for the application
 */
export interface Config {
  /** Enable debug logging */
  debug: boolean;
  /** Working directory the test harness runs in */
  root: string;
  /** Directory holding the programs, relative to root */
  programsDir: string;
  /** Suffix appended to targets given without one */
  extension: string;
  /** Harness command, the program's file name is appended */
  testCommand: string;
  /** Harness timeout in milliseconds */
  testTimeout: number;
  /** Oracle request timeout in milliseconds */
  timeout: number;
  maxAttempts: number;
  /** Ask before writing each candidate line */
  confirm: boolean;
  /** Repair every program in programsDir */
  all: boolean;
  /** Where batch results are written as CSV */
  csv?: string;
  hideUi: boolean;
}

/**
 * Represents a message in a conversation
 */
export interface Message {
  /** Role of the message sender */
  role: "system" | "user" | "assistant";
  /** Content of the message */
  content: string;
}

/**
 * System-level failures. Anything thrown as one of these aborts the repair
 * and ends the session in Failure, whatever budget is left.
 */
export class RepairError extends Error {
  public readonly code: string;

  constructor(code: string, message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = "RepairError";
    this.code = code;
  }
}

export class SourceNotFoundError extends RepairError {
  constructor(public readonly filePath: string) {
    super("SOURCE_NOT_FOUND", `Could not find file: ${filePath}`);
    this.name = "SourceNotFoundError";
  }
}

export class SourceReadError extends RepairError {
  constructor(filePath: string, cause: unknown) {
    super(
      "SOURCE_READ_ERROR",
      `Error reading file ${filePath}: ${errorMessage(cause)}`,
      { cause }
    );
    this.name = "SourceReadError";
  }
}

export class PatchRangeError extends RepairError {
  constructor(
    public readonly lineNo: number,
    public readonly totalLines: number
  ) {
    super(
      "PATCH_OUT_OF_RANGE",
      `Line number ${lineNo} is out of range (1-${totalLines})`
    );
    this.name = "PatchRangeError";
  }
}

export class OracleError extends RepairError {
  constructor(message: string, cause?: unknown) {
    super("ORACLE_ERROR", message, { cause });
    this.name = "OracleError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

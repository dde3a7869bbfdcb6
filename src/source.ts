import fs from "node:fs";
import { SourceNotFoundError, SourceReadError } from "./errors.js";
import { SourceStore } from "./types.js";

export async function loadSource(filePath: string): Promise<string> {
  try {
    return await fs.promises.readFile(filePath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new SourceNotFoundError(filePath);
    }
    throw new SourceReadError(filePath, error);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export function createSourceStore(): SourceStore {
  return { load: loadSource };
}

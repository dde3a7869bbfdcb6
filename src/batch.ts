import path from "node:path";
import { listPrograms, programsPath } from "./commands.js";
import { runRepair } from "./controller.js";
import { BatchEntry, Config, RepairDependencies, RepairResult } from "./types.js";

/**
 * Repairs every program in the programs directory, one session at a time,
 * sharing one set of collaborators across the runs.
 */
export async function runBatch(
  config: Pick<Config, "root" | "programsDir" | "extension" | "maxAttempts">,
  deps: RepairDependencies,
  onResult?: (result: RepairResult) => void
): Promise<BatchEntry[]> {
  const entries: BatchEntry[] = [];

  for (const file of listPrograms(config)) {
    deps.logger.info(`Running repair on ${file}...\n`);
    const result = await runRepair(path.join(programsPath(config), file), deps, {
      maxAttempts: config.maxAttempts,
    });
    onResult?.(result);
    entries.push({
      file,
      success: result.session.success,
      attempts: result.session.attempts,
    });
  }

  return entries;
}

import { spawn } from "node:child_process";
import path from "node:path";
import process from "node:process";
import fastGlob from "fast-glob";

import { FAILURE_MARKERS, NO_TEST_OUTPUT } from "./constants.js";
import { errorMessage } from "./errors.js";
import { Config, RepairLogger, TestOracle } from "./types.js";

export interface CliOptions {
  root: string;
  programsDir: string;
  extension: string;
  testCommand: string;
  /** seconds */
  testTimeout: number;
  /** seconds */
  timeout: number;
  maxAttempts: number;
  confirm: boolean;
  all: boolean;
  csv?: string;
  hideUi: boolean;
  debug: boolean;
}

export function loadConfig(options: CliOptions): Config {
  return {
    ...options,
    extension: options.extension.startsWith(".")
      ? options.extension
      : `.${options.extension}`,
    testTimeout: options.testTimeout * 1000,
    timeout: options.timeout * 1000,
  };
}

type ProgramsLayout = Pick<Config, "root" | "programsDir" | "extension">;

export function programsPath(config: ProgramsLayout): string {
  return path.join(config.root, config.programsDir);
}

export function resolveTarget(target: string, config: ProgramsLayout): string {
  const fileName = target.endsWith(config.extension)
    ? target
    : `${target}${config.extension}`;
  return path.join(programsPath(config), fileName);
}

export function listPrograms(config: ProgramsLayout): string[] {
  return fastGlob
    .sync(`*${config.extension}`, {
      cwd: programsPath(config),
      onlyFiles: true,
    })
    .sort();
}

export interface CommandResult {
  /** stdout and stderr interleaved as they arrived */
  output: string;
  exitCode: number | null;
  timedOut: boolean;
}

export async function executeCommand(
  command: string,
  args: string[],
  options: {
    shell: boolean;
    cwd?: string;
    /** milliseconds, the process is killed once it elapses */
    timeout?: number;
    onData?: (data: string) => void;
  } = {
    shell: true,
  }
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      shell: options.shell,
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
      env: process.env,
    });

    let output = "";
    let timedOut = false;
    const timer = options.timeout
      ? setTimeout(() => {
          timedOut = true;
          proc.kill("SIGKILL");
        }, options.timeout)
      : undefined;

    const handleData = (data: Buffer) => {
      const text = data.toString();
      output += text;
      options.onData?.(text);
    };

    proc.stdout.on("data", handleData);
    proc.stderr.on("data", handleData);

    proc.on("error", (error) => {
      clearTimeout(timer);
      reject(error);
    });

    proc.on("close", (code) => {
      clearTimeout(timer);
      resolve({ output, exitCode: code, timedOut });
    });
  });
}

/**
 * Absence of both failure markers counts as a pass
 */
export function testsPassed(output: string): boolean {
  return !FAILURE_MARKERS.test(output);
}

/**
 * Runs the harness with the program's file name. Never rejects: a hang or a
 * harness that cannot start comes back as failing output.
 */
export function createTestOracle(
  config: Pick<Config, "root" | "testCommand" | "testTimeout" | "debug">,
  logger: RepairLogger
): TestOracle {
  return {
    async run(filePath) {
      const fileName = path.basename(filePath);
      const [cmd, ...args] = config.testCommand.trim().split(/\s+/);

      if (config.debug) {
        logger.info(`Running test command: ${config.testCommand} ${fileName}\n`);
      }

      try {
        const result = await executeCommand(cmd, [...args, fileName], {
          shell: false,
          cwd: config.root,
          timeout: config.testTimeout,
          onData: (data) => logger.output(data),
        });

        if (result.timedOut) {
          return `ERROR: Test execution timed out after ${
            config.testTimeout / 1000
          } seconds`;
        }
        return result.output.trim() ? result.output : NO_TEST_OUTPUT;
      } catch (error) {
        return `ERROR: Failed to run tests - ${errorMessage(error)}`;
      }
    },
  };
}

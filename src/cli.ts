import { InvalidArgumentError, program } from "commander";

import { createRequire } from "module";

const require = createRequire(import.meta.url);

const packageJson: { name: string; version: string; description: string } =
  require("../package.json");

import {
  DEFAULT_EXTENSION,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_PROGRAMS_DIR,
  DEFAULT_TEST_COMMAND,
  DEFAULT_TEST_TIMEOUT_SECONDS,
} from "./constants.js";

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export const cli = program
  .name(packageJson.name)
  .version(packageJson.version)
  .description(packageJson.description)
  .argument("[target]", "Program to repair, the extension is optional")
  .option("--root <dir>", "Directory the test harness runs in", ".")
  .option(
    "--programs-dir <dir>",
    "Directory of programs, relative to --root",
    DEFAULT_PROGRAMS_DIR
  )
  .option("--extension <ext>", "Suffix of program files", DEFAULT_EXTENSION)
  .option(
    "--test-command <command>",
    "Test harness command, the program's file name is appended",
    DEFAULT_TEST_COMMAND
  )
  .option(
    "--test-timeout <seconds>",
    "Timeout for one test run",
    parsePositiveInt,
    DEFAULT_TEST_TIMEOUT_SECONDS
  )
  .option(
    "--max-attempts <n>",
    "Patches to try before giving up",
    parsePositiveInt,
    DEFAULT_MAX_ATTEMPTS
  )
  .option("--timeout <seconds>", "Timeout for AI response", parsePositiveInt, 120)
  .option("--confirm", "Ask before writing each candidate line", false)
  .option("--all", "Repair every program in the programs directory", false)
  .option("--csv <file>", "Write batch results as CSV")
  .option("--debug", "Enable debug mode", false)
  .option("--hide-ui", "Hide UI", false)
  .showHelpAfterError();

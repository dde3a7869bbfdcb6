#!/usr/bin/env node

import process from "node:process";
import fs from "node:fs";
import path from "node:path";
import chalk from "chalk";
import { apis } from "./api.js";
import { runBatch } from "./batch.js";
import { cli } from "./cli.js";
import {
  CliOptions,
  createTestOracle,
  listPrograms,
  loadConfig,
  programsPath,
  resolveTarget,
} from "./commands.js";
import { runRepair } from "./controller.js";
import { showBatchDashboard } from "./dashboard.js";
import { createDiffReporter } from "./diff.js";
import { errorMessage } from "./errors.js";
import { createDeepSeekCompletion, createPatchOracleClient } from "./fix.js";
import { confirmPatch, createPatchApplier } from "./patch.js";
import { formatBatchSummary, formatReport, formatStatusLine, toCsv } from "./report.js";
import { createSourceStore } from "./source.js";
import { Config, RepairDependencies } from "./types.js";
import { createUiLogger, ui } from "./ui.js";

process.on("SIGINT", () => {
  ui.destroy();
  process.exit(130);
});

function createDependencies(config: Config): RepairDependencies {
  const logger = createUiLogger(ui, config.debug);
  return {
    source: createSourceStore(),
    tests: createTestOracle(config, logger),
    oracle: createPatchOracleClient(createDeepSeekCompletion(config, logger)),
    applier: createPatchApplier(),
    differ: createDiffReporter(),
    logger,
    review: config.confirm ? confirmPatch : undefined,
  };
}

async function repairOne(target: string, config: Config): Promise<boolean> {
  const filePath = resolveTarget(target, config);

  if (!fs.existsSync(filePath)) {
    console.error(chalk.red(`Error: File not found: ${filePath}`));
    console.error(`Available files in ${programsPath(config)}:`);
    for (const file of listPrograms(config)) {
      console.error(`  - ${file}`);
    }
    return false;
  }

  console.log(chalk.bold(`Starting repair of ${path.basename(filePath)}`));
  console.log(`Full path: ${filePath}`);
  console.log("-".repeat(60));

  // prompts needs the plain terminal
  if (!config.hideUi && !config.confirm) {
    ui.initialize();
  }

  const result = await runRepair(filePath, createDependencies(config), {
    maxAttempts: config.maxAttempts,
  });
  ui.destroy();

  console.log(formatReport(result));
  console.log(`\n${formatStatusLine(result.session)}`);
  return result.session.success;
}

async function repairAll(config: Config): Promise<boolean> {
  if (!config.hideUi && !config.confirm) {
    ui.initialize();
  }

  const deps = createDependencies(config);
  const entries = await runBatch(config, deps, (result) => {
    deps.logger.info(`${formatReport(result)}\n`);
  });
  ui.destroy();

  if (entries.length === 0) {
    console.error(
      chalk.red(`No *${config.extension} programs found in ${programsPath(config)}`)
    );
    return false;
  }

  if (config.csv) {
    fs.writeFileSync(config.csv, toCsv(entries), "utf8");
  }

  console.log(`\n${formatBatchSummary(entries)}`);
  if (config.csv) {
    console.log(`Results saved to ${config.csv}`);
  }

  if (!config.hideUi && process.stdout.isTTY) {
    await showBatchDashboard(entries);
  }

  return entries.every((entry) => entry.success);
}

cli.action(async (target: string | undefined, options: CliOptions) => {
  const config = loadConfig(options);

  if (!target && !config.all) {
    cli.error("error: name a program to repair, or pass --all", { exitCode: 1 });
  }

  if (!apis.DEEPSEEK.apiKey) {
    console.error(
      chalk.red("Error: Please set the DEEPSEEK_API_KEY environment variable")
    );
    console.error("You can create an API key at https://platform.deepseek.com");
    process.exit(1);
  }

  try {
    const success =
      config.all || !target
        ? await repairAll(config)
        : await repairOne(target, config);
    process.exit(success ? 0 : 1);
  } catch (error) {
    ui.destroy();
    console.error(chalk.red(`Unexpected error during repair: ${errorMessage(error)}`));
    process.exit(1);
  }
});

await cli.parseAsync();

#!/usr/bin/env node
/**
 * Run examples:
 * - `npm run dev -- run --file ./MyProject/Main.lean`
 * - `npm run dev -- run --file ./MyProject/Main.lean --max-iters 10 --beam 2`
 * - `npm run dev -- run --file ./MyProject/Main.lean --updates 2 --theme "monotonicity lemmas"`
 * - `npm run dev -- run --file ./MyProject/Main.lean --repair-format diff --scratch-branch`
 *
 * Oracle env (optional; without a key the oracle declines every request):
 * - `export OPENAI_API_KEY=...` (or put the key in `openai_key.txt` at the Lake project root)
 * - `export OPENAI_BASE_URL=https://api.openai.com/v1`
 * - `export OPENAI_MODEL=gpt-4.1-mini`
 */
import { basename } from "node:path";
import process from "node:process";
import chalk from "chalk";
import { ZodError } from "zod";
import { CliUsageError, USAGE, parseArgs, type CliOptions } from "./cli/args.js";
import { createRepairUI } from "./cli/ui/repairUI.js";
import { loadConfig } from "./config/loadConfig.js";
import { loadEnvFile } from "./config/loadEnv.js";
import { DEFAULT_FIX_RULES, loadFixRules } from "./fixes/rules.js";
import { runRepairSession } from "./loop/repairLoop.js";
import { createOracle } from "./oracle/index.js";
import { LakeProject, discoverProjectRoot } from "./toolchain/lakeProject.js";
import { ensureScratchBranch } from "./vcs/git.js";

const printValidationErrors = (error: ZodError): void => {
  console.error("Invalid configuration:");
  error.issues.forEach((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    console.error(`- ${path}: ${issue.message}`);
  });
};

const runSession = async (options: CliOptions): Promise<void> => {
  if (!options.file) {
    throw new CliUsageError("--file is required");
  }

  loadEnvFile(options.envFile);
  const config = loadConfig({ projectRoot: discoverProjectRoot(options.file).root });
  const toolchain = LakeProject.fromFile(options.file, config.toolchain);

  if (options.scratchBranch) {
    const branch = await ensureScratchBranch({ root: toolchain.root });
    if (branch.status === "created") {
      console.log(chalk.cyan(`Scratch branch: ${branch.branch}`));
    } else if (branch.status === "skipped") {
      console.log(chalk.dim(`Scratch branch skipped: ${branch.reason}`));
    } else {
      console.log(chalk.yellow(`Scratch branch ${branch.branch} not created: ${branch.message}`));
    }
  }

  const rules = options.rulesPath ? [...DEFAULT_FIX_RULES, ...(await loadFixRules(options.rulesPath))] : DEFAULT_FIX_RULES;
  const ui = createRepairUI({ file: options.file, maxIters: options.maxIters });
  const oracle = createOracle({
    config: config.oracle,
    fileName: basename(options.file),
    repairFormat: options.repairFormat,
    onError: (operation, message) => ui.onEvent({ type: "oracle_error", operation, message })
  });
  if (!config.oracle.apiKey) {
    console.log(chalk.dim("No OPENAI_API_KEY configured; the oracle will decline every request."));
  }

  const result = await runRepairSession({
    target: options.file,
    toolchain,
    oracle,
    maxIters: options.maxIters,
    beam: options.beam,
    updates: options.updates,
    theme: options.theme,
    rules,
    markers: config.markers,
    runsDir: config.runsDir,
    onEvent: ui.onEvent
  }).finally(ui.close);

  if (result.ok) {
    console.log(chalk.green("Build OK"));
  } else {
    console.log(chalk.yellow("Stopped without full success"));
    result.errors.slice(0, 5).forEach((error) => console.log(chalk.dim(`- ${error.split("\n")[0]}`)));
  }
  console.log(`Status: ${result.status} (${result.reason}) after ${result.iterations} iterations`);
  console.log(`Snapshots: ${result.runDir}`);
  console.log(`Audit log: ${result.auditPath}`);

  process.exitCode = result.ok ? 0 : 1;
};

const main = async (): Promise<void> => {
  try {
    const options = parseArgs(process.argv.slice(2));
    if (options.command === "help") {
      console.log(USAGE);
      return;
    }
    await runSession(options);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      console.error(USAGE);
      process.exitCode = 1;
      return;
    }

    if (error instanceof ZodError) {
      printValidationErrors(error);
      process.exitCode = 1;
      return;
    }

    if (error instanceof Error) {
      console.error(error.message);
      process.exitCode = 1;
      return;
    }

    console.error("Unknown error");
    process.exitCode = 1;
  }
};

void main();

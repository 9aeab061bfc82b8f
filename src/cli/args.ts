import type { RepairFormat } from "../oracle/prompts.js";

export type CliOptions = {
  command: "run" | "help";
  file?: string;
  maxIters: number;
  beam: number;
  updates: number;
  theme: string;
  scratchBranch: boolean;
  rulesPath?: string;
  repairFormat: RepairFormat;
  envFile: string;
};

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = [
  "Usage:",
  "  leanmend run --file <path> [--max-iters N] [--beam N] [--updates N] [--theme TEXT]",
  "               [--scratch-branch | --no-scratch-branch] [--rules <rules.json>]",
  "               [--repair-format file|diff] [--env-file <path>]",
  "",
  "  --max-iters        iteration budget (default 20)",
  "  --beam             deterministic fix candidates tried per iteration (default 3)",
  "  --updates          extension cycles after the first clean build (default 0)",
  "  --theme            theme passed to extension requests",
  "  --scratch-branch   create agent/run-<timestamp> before editing (default off)",
  "  --rules            extra fix rules, JSON of the form { \"rules\": [...] }",
  "  --repair-format    ask the oracle for a full file or a unified diff (default file)",
  "  --env-file         dotenv file loaded before reading the environment (default .env)"
].join("\n");

const parseCount = (flag: string, raw: string | undefined, min: number): number => {
  const value = Number(raw);
  if (raw === undefined || !Number.isInteger(value) || value < min) {
    throw new CliUsageError(`${flag} expects an integer >= ${min}, got ${raw ?? "nothing"}`);
  }
  return value;
};

const requireValue = (flag: string, raw: string | undefined): string => {
  if (raw === undefined || raw.startsWith("--")) {
    throw new CliUsageError(`${flag} expects a value`);
  }
  return raw;
};

/** `run` may be omitted; a lone positional argument is taken as the file. */
export const parseArgs = (argv: string[]): CliOptions => {
  const options: CliOptions = {
    command: "run",
    maxIters: 20,
    beam: 3,
    updates: 0,
    theme: "",
    scratchBranch: false,
    repairFormat: "file",
    envFile: ".env"
  };

  const rest = argv[0] === "run" ? argv.slice(1) : argv;

  for (let i = 0; i < rest.length; i += 1) {
    const arg = rest[i];

    if (arg === "--help" || arg === "-h") {
      options.command = "help";
      continue;
    }
    if (arg === "--file") {
      options.file = requireValue(arg, rest[i + 1]);
      i += 1;
      continue;
    }
    if (arg === "--max-iters") {
      options.maxIters = parseCount(arg, rest[i + 1], 1);
      i += 1;
      continue;
    }
    if (arg === "--beam") {
      options.beam = parseCount(arg, rest[i + 1], 1);
      i += 1;
      continue;
    }
    if (arg === "--updates") {
      options.updates = parseCount(arg, rest[i + 1], 0);
      i += 1;
      continue;
    }
    if (arg === "--theme") {
      options.theme = rest[i + 1] ?? "";
      i += 1;
      continue;
    }
    if (arg === "--scratch-branch") {
      options.scratchBranch = true;
      continue;
    }
    if (arg === "--no-scratch-branch") {
      options.scratchBranch = false;
      continue;
    }
    if (arg === "--rules") {
      options.rulesPath = requireValue(arg, rest[i + 1]);
      i += 1;
      continue;
    }
    if (arg === "--repair-format") {
      const raw = requireValue(arg, rest[i + 1]);
      if (raw !== "file" && raw !== "diff") {
        throw new CliUsageError(`--repair-format expects file or diff, got ${raw}`);
      }
      options.repairFormat = raw;
      i += 1;
      continue;
    }
    if (arg === "--env-file") {
      options.envFile = requireValue(arg, rest[i + 1]);
      i += 1;
      continue;
    }

    if (!arg.startsWith("-") && !options.file) {
      options.file = arg;
      continue;
    }
    throw new CliUsageError(`Unknown argument: ${arg}`);
  }

  if (options.command === "run" && !options.file) {
    throw new CliUsageError("--file is required");
  }
  return options;
};

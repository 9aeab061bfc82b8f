import type { CmdResult, RunImpl } from "../runner/runCmd.js";
import type { CheckResult } from "./types.js";

export type CheckStrategy = {
  name: string;
  command: (file: string) => { cmd: string; args: string[] };
};

export const lakeEnvLean: CheckStrategy = {
  name: "lake env lean",
  command: (file) => ({ cmd: "lake", args: ["env", "lean", file] })
};

export const bareLean: CheckStrategy = {
  name: "lean",
  command: (file) => ({ cmd: "lean", args: [file] })
};

export const DEFAULT_CHECK_STRATEGIES: readonly CheckStrategy[] = [lakeEnvLean, bareLean];

/**
 * Tries each strategy in order. A later tier is only reached when the previous tier's
 * executable is missing; any result from a tier that actually ran is final and carries
 * that tier's name.
 */
export const runCheckStrategies = async (args: {
  strategies: readonly CheckStrategy[];
  file: string;
  cwd: string;
  timeoutMs: number;
  run: RunImpl;
}): Promise<CheckResult> => {
  const tried: string[] = [];
  const details: string[] = [];

  for (const strategy of args.strategies) {
    const { cmd, args: argv } = strategy.command(args.file);
    const result: CmdResult = await args.run(cmd, argv, args.cwd, { timeoutMs: args.timeoutMs });
    tried.push(strategy.name);
    if (result.missing) {
      details.push(`${strategy.name}: ${result.stderr || "executable not found"}`);
      continue;
    }
    return { ...result, status: "ran", tier: strategy.name };
  }

  return { status: "unavailable", tried, detail: details.join("\n") };
};

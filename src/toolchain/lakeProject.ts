import { existsSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { runCmd, type CmdResult, type RunImpl } from "../runner/runCmd.js";
import { DEFAULT_CHECK_STRATEGIES, runCheckStrategies, type CheckStrategy } from "./checkStrategies.js";
import type { CheckResult, Toolchain } from "./types.js";

const LAKEFILES = ["lakefile.lean", "lakefile.toml"];

export type LakeProjectOptions = {
  buildTimeoutMs?: number;
  checkTimeoutMs?: number;
  strategies?: readonly CheckStrategy[];
  runImpl?: RunImpl;
};

const findLakefile = (dir: string): string | null => {
  for (const name of LAKEFILES) {
    const candidate = join(dir, name);
    if (existsSync(candidate)) return candidate;
  }
  return null;
};

/** Walks up from the file's directory to the nearest lakefile; falls back to the file's directory. */
export const discoverProjectRoot = (file: string): { root: string; lakefile: string | null } => {
  const start = dirname(resolve(file));
  let current = start;

  while (true) {
    const lakefile = findLakefile(current);
    if (lakefile) return { root: current, lakefile };
    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return { root: start, lakefile: null };
};

export class LakeProject implements Toolchain {
  readonly root: string;
  readonly lakefile: string | null;
  private readonly run: RunImpl;
  private readonly buildTimeoutMs: number;
  private readonly checkTimeoutMs: number;
  private readonly strategies: readonly CheckStrategy[];

  constructor(root: string, lakefile: string | null, opts: LakeProjectOptions = {}) {
    this.root = root;
    this.lakefile = lakefile;
    this.run = opts.runImpl ?? runCmd;
    this.buildTimeoutMs = opts.buildTimeoutMs ?? 1_200_000;
    this.checkTimeoutMs = opts.checkTimeoutMs ?? 60_000;
    this.strategies = opts.strategies ?? DEFAULT_CHECK_STRATEGIES;
  }

  static fromFile(file: string, opts: LakeProjectOptions = {}): LakeProject {
    const { root, lakefile } = discoverProjectRoot(file);
    return new LakeProject(root, lakefile, opts);
  }

  build(): Promise<CmdResult> {
    return this.run("lake", ["build"], this.root, { timeoutMs: this.buildTimeoutMs });
  }

  check(file: string): Promise<CheckResult> {
    return runCheckStrategies({
      strategies: this.strategies,
      file,
      cwd: this.root,
      timeoutMs: this.checkTimeoutMs,
      run: this.run
    });
  }
}

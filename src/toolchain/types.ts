import type { CmdResult } from "../runner/runCmd.js";

export type CheckResult =
  | (CmdResult & { status: "ran"; tier: string })
  | { status: "unavailable"; tried: string[]; detail: string };

/**
 * What the repair loop needs from a build toolchain: a whole-project build and a
 * single-file check, both reporting exit code plus raw output.
 */
export interface Toolchain {
  readonly root: string;
  build(): Promise<CmdResult>;
  check(file: string): Promise<CheckResult>;
}

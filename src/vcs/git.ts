import { runCmd, type RunImpl } from "../runner/runCmd.js";
import { runStamp } from "../snapshots/snapshotStore.js";

export type BranchResult =
  | { status: "created"; branch: string }
  | { status: "skipped"; reason: string }
  | { status: "failed"; branch: string; message: string };

/**
 * Creates and checks out `<prefix>-<YYYYMMDD-HHMMSS>` when `root` is inside a git work
 * tree. Outside one, or without git, the step is skipped.
 */
export const ensureScratchBranch = async (args: {
  root: string;
  prefix?: string;
  now?: Date;
  runImpl?: RunImpl;
}): Promise<BranchResult> => {
  const run = args.runImpl ?? runCmd;
  const inside = await run("git", ["rev-parse", "--is-inside-work-tree"], args.root);
  if (inside.missing) {
    return { status: "skipped", reason: "git not installed" };
  }
  if (!inside.ok || inside.stdout.trim() !== "true") {
    return { status: "skipped", reason: "not a git repository" };
  }

  const branch = `${args.prefix ?? "agent/run"}-${runStamp(args.now ?? new Date())}`;
  const checkout = await run("git", ["checkout", "-b", branch], args.root);
  if (!checkout.ok) {
    return { status: "failed", branch, message: checkout.stderr.trim() || `exit code ${checkout.code}` };
  }
  return { status: "created", branch };
};

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { runCmd, type RunImpl } from "../runner/runCmd.js";

export type ApplyResult = {
  ok: boolean;
  noop: boolean;
  stdout: string;
  stderr: string;
};

/** Drops completely empty lines around the diff and ends it with exactly one newline. */
export const trimEmptyOuterLines = (raw: string): string => {
  const lines = raw.split("\n");
  const first = lines.findIndex((line) => line !== "");
  if (first === -1) return "";

  let last = lines.length - 1;
  while (last > first && lines[last] === "") last -= 1;

  return `${lines.slice(first, last + 1).join("\n")}\n`;
};

/** Headers present but no hunks and no +/- lines. */
export const isNoOpDiff = (diffText: string): boolean => {
  const lines = diffText.split("\n");
  const hasOld = lines.some((line) => line.startsWith("--- "));
  const hasNew = lines.some((line) => line.startsWith("+++ "));
  if (!(hasOld && hasNew)) return false;

  return !lines.some(
    (line) =>
      line.startsWith("@@ ") ||
      (line.startsWith("+") && !line.startsWith("+++")) ||
      (line.startsWith("-") && !line.startsWith("---"))
  );
};

/** `-p1` when every header uses git-style `a/` and `b/` prefixes, `-p0` otherwise. */
export const detectStripLevel = (diffText: string): 0 | 1 => {
  const oldHeaders = diffText.split("\n").filter((line) => line.startsWith("--- "));
  const newHeaders = diffText.split("\n").filter((line) => line.startsWith("+++ "));
  if (oldHeaders.length === 0 || newHeaders.length === 0) return 0;

  const prefixed = (lines: string[], prefix: string): boolean =>
    lines.every((line) => {
      const path = line.slice(4).trim();
      return path.startsWith(prefix) || path === "/dev/null";
    });

  return prefixed(oldHeaders, "a/") && prefixed(newHeaders, "b/") ? 1 : 0;
};

/** Exact context only, no `.orig`/backup files, never prompts. */
export const patchArgs = (strip: 0 | 1, patchPath: string, dryRun = false): string[] => [
  `-p${strip}`,
  "--fuzz=0",
  "--no-backup-if-mismatch",
  "--batch",
  ...(dryRun ? ["--dry-run"] : []),
  "-i",
  patchPath
];

/**
 * Applies a unified diff under `cwd` with the `patch` tool. A dry run goes first, so a
 * diff with any hunk that does not match exactly touches nothing. Returns `ok: false` on
 * any nonzero exit; past the dry run the tree is left as `patch` left it and
 * snapshotting beforehand is the caller's job.
 */
export const applyUnifiedDiff = async (
  diffText: string,
  cwd: string,
  opts: { runImpl?: RunImpl; timeoutMs?: number } = {}
): Promise<ApplyResult> => {
  const normalized = trimEmptyOuterLines(diffText);
  if (normalized.length === 0) {
    return { ok: false, noop: false, stdout: "", stderr: "empty patch" };
  }
  if (isNoOpDiff(normalized)) {
    return { ok: true, noop: true, stdout: "", stderr: "" };
  }

  const run = opts.runImpl ?? runCmd;
  const dir = await mkdtemp(join(tmpdir(), "leanmend-patch-"));
  const patchPath = join(dir, "change.patch");

  try {
    await writeFile(patchPath, normalized, "utf8");
    const strip = detectStripLevel(normalized);
    const timeoutMs = opts.timeoutMs ?? 60_000;
    const check = await run("patch", patchArgs(strip, patchPath, true), cwd, { timeoutMs });
    if (!check.ok) {
      return { ok: false, noop: false, stdout: check.stdout, stderr: check.stderr };
    }
    const result = await run("patch", patchArgs(strip, patchPath), cwd, { timeoutMs });
    return { ok: result.ok, noop: false, stdout: result.stdout, stderr: result.stderr };
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
};

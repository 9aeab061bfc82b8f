import { spawn } from "node:child_process";

export type CmdResult = {
  ok: boolean;
  code: number;
  stdout: string;
  stderr: string;
  /** The executable could not be spawned at all (ENOENT). */
  missing?: boolean;
  timedOut?: boolean;
};

export type RunOptions = {
  timeoutMs?: number;
};

export type RunImpl = (cmd: string, args: string[], cwd: string, opts?: RunOptions) => Promise<CmdResult>;

const clamp = (value: string, max = 200000): string =>
  value.length > max ? `${value.slice(0, max)}...<truncated>` : value;

const DEFAULT_TIMEOUT_MS = 120_000;

const isMissingBinary = (error: Error): boolean => "code" in error && error.code === "ENOENT";

export const runCmd: RunImpl = async (cmd, args, cwd, opts) =>
  new Promise((resolve) => {
    const timeoutMs = opts?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const child = spawn(cmd, args, { cwd, shell: false });
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;

    const settle = (result: CmdResult): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(result);
    };

    const timer = setTimeout(() => {
      timedOut = true;
      stderr += `\ncommand timed out after ${timeoutMs}ms`;
      child.kill("SIGKILL");
    }, timeoutMs);

    child.stdout.on("data", (chunk) => {
      stdout += String(chunk);
    });

    child.stderr.on("data", (chunk) => {
      stderr += String(chunk);
    });

    child.on("close", (code) => {
      const finalCode = timedOut ? 124 : code ?? 1;
      settle({
        ok: finalCode === 0,
        code: finalCode,
        stdout: clamp(stdout),
        stderr: clamp(stderr),
        ...(timedOut ? { timedOut: true } : {})
      });
    });

    child.on("error", (error) => {
      settle({
        ok: false,
        code: isMissingBinary(error) ? 127 : 1,
        stdout: clamp(stdout),
        stderr: clamp(`${stderr}\n${error.message}`.trim()),
        ...(isMissingBinary(error) ? { missing: true } : {})
      });
    });
  });

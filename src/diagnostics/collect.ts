import type { CmdResult } from "../runner/runCmd.js";
import type { CheckResult, Toolchain } from "../toolchain/types.js";
import type { Diagnostic, Severity } from "./types.js";

const HEADER = /^(.+?):(\d+):(\d+):\s+(error|warning|info)(?:\([^)]*\))?:\s?(.*)$/;

type Block = {
  severity: Severity | "info";
  file: string;
  line: number;
  column: number;
  lines: string[];
};

/**
 * Splits compiler output into one diagnostic per `path:line:col: severity: message`
 * header. Lines after a header belong to it until the next header. `info` blocks are
 * dropped; text before the first header is ignored.
 */
export const parseToolOutput = (text: string, tier?: string): Diagnostic[] => {
  const blocks: Block[] = [];
  let current: Block | null = null;

  for (const line of text.split(/\r?\n/)) {
    const match = HEADER.exec(line);
    if (match) {
      current = {
        severity: match[4] === "error" ? "error" : match[4] === "warning" ? "warning" : "info",
        file: match[1],
        line: Number(match[2]),
        column: Number(match[3]),
        lines: [match[5]]
      };
      blocks.push(current);
      continue;
    }
    if (current) current.lines.push(line);
  }

  const diagnostics: Diagnostic[] = [];
  for (const block of blocks) {
    if (block.severity === "info") continue;
    diagnostics.push({
      severity: block.severity,
      kind: "compile",
      message: block.lines.join("\n").trim(),
      file: block.file,
      pos: { line: block.line, column: block.column },
      ...(tier ? { tier } : {})
    });
  }
  return diagnostics;
};

export const toDiagnostics = (result: CmdResult & { tier?: string }, file: string): Diagnostic[] => {
  const stdout = result.stdout.trim();
  const stderr = result.stderr.trim();
  const combined = [stdout, stderr].filter((part) => part.length > 0).join("\n");
  const parsed = parseToolOutput(combined, result.tier);
  const tier = result.tier ? { tier: result.tier } : {};

  if (result.ok) {
    if (parsed.length > 0) return parsed;
    if (stderr.length === 0) return [];
    return [{ severity: "warning", kind: "compile", message: stderr, file, ...tier }];
  }

  if (parsed.some((diag) => diag.severity === "error")) return parsed;

  return [
    ...parsed,
    {
      severity: "error",
      kind: "compile",
      message: stderr || stdout || `exit code ${result.code}`,
      file,
      ...tier
    }
  ];
};

const unavailable = (result: Extract<CheckResult, { status: "unavailable" }>, file: string): Diagnostic => ({
  severity: "error",
  kind: "tool_unavailable",
  message: `toolchain unavailable (tried: ${result.tried.join(", ")})${result.detail ? `\n${result.detail}` : ""}`,
  file
});

/** Runs the toolchain's single-file check once and normalizes the outcome. */
export const collectDiagnostics = async (toolchain: Toolchain, file: string): Promise<Diagnostic[]> => {
  const result = await toolchain.check(file);
  if (result.status === "unavailable") return [unavailable(result, file)];
  return toDiagnostics(result, file);
};

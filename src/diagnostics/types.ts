export type Severity = "error" | "warning";

export type DiagnosticKind = "compile" | "tool_unavailable" | "marker";

export type Position = {
  line: number;
  column: number;
};

export type Diagnostic = {
  severity: Severity;
  kind: DiagnosticKind;
  message: string;
  file?: string;
  pos?: Position;
  endPos?: Position;
  /** Name of the check tier that produced this diagnostic, when one ran. */
  tier?: string;
};

export const errorMessages = (diagnostics: Diagnostic[]): string[] =>
  diagnostics.filter((diag) => diag.severity === "error").map((diag) => diag.message);

export const countErrors = (diagnostics: Diagnostic[]): number =>
  diagnostics.filter((diag) => diag.severity === "error").length;

export const isToolUnavailable = (diagnostics: Diagnostic[]): boolean =>
  diagnostics.some((diag) => diag.kind === "tool_unavailable");

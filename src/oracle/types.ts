export type OracleReply =
  | { kind: "file"; content: string }
  | { kind: "diff"; patch: string };

export type OracleOperation = "repair" | "extend" | "document";

/**
 * Boundary to the external generative fixer. Every call is single-shot and resolves to
 * `null` when the oracle declines, is not configured, or fails.
 */
export interface PatchOracle {
  readonly name: string;
  repair(fileText: string, errors: string[]): Promise<OracleReply | null>;
  extend(fileText: string, theme: string): Promise<OracleReply | null>;
  document(fileText: string): Promise<OracleReply | null>;
}

import type { OracleOperation } from "../oracle/types.js";
import type { LoopAction } from "./transitions.js";
import type { SessionStatus } from "./session.js";

export type BuildPhase = "iteration" | "document_verify";

export type RepairEvent =
  | {
      type: "session_start";
      file: string;
      root: string;
      maxIters: number;
      beam: number;
      extensions: number;
      oracle: string;
      runDir: string;
    }
  | { type: "iteration_start"; iteration: number; maxIters: number }
  | { type: "build_start"; iteration: number; phase: BuildPhase }
  | { type: "build_end"; iteration: number; phase: BuildPhase; ok: boolean; code: number }
  | { type: "decision"; iteration: number; action: LoopAction["type"] }
  | { type: "diagnostics"; iteration: number; errorCount: number; toolUnavailable: boolean; firstError?: string }
  | { type: "fix_trial"; iteration: number; note: string; errorCount: number; baseline: number }
  | { type: "fix_accepted"; iteration: number; note: string; errorCount: number }
  | { type: "oracle_request"; iteration: number; operation: OracleOperation }
  | { type: "oracle_reply"; iteration: number; operation: OracleOperation; reply: "file" | "diff" | "declined" }
  | { type: "oracle_error"; operation: OracleOperation; message: string }
  | { type: "patch_applied"; iteration: number; ok: boolean; noop: boolean; stderr?: string }
  | { type: "snapshot"; iteration: number; tag: string; path: string }
  | { type: "document_reverted"; iteration: number }
  | { type: "done"; status: SessionStatus; iterations: number; reason: string; auditPath?: string };

export type RepairEventHandler = (event: RepairEvent) => void;

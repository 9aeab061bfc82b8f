export { runRepairSession } from "./loop/repairLoop.js";
export type { ApplyPatchImpl, RepairSessionArgs, SessionResult } from "./loop/repairLoop.js";
export type { RepairEvent, RepairEventHandler } from "./loop/events.js";
export { createSession } from "./loop/session.js";
export type { Session, SessionStatus } from "./loop/session.js";
export { decideAfterBuild, decideAfterOracle } from "./loop/transitions.js";
export type { LoopAction, OracleStep } from "./loop/transitions.js";
export { collectDiagnostics, parseToolOutput } from "./diagnostics/collect.js";
export { DEFAULT_MARKERS, lintMarkers } from "./diagnostics/markers.js";
export { countErrors, errorMessages } from "./diagnostics/types.js";
export type { Diagnostic, DiagnosticKind } from "./diagnostics/types.js";
export { applyEdit, proposeFixes } from "./fixes/propose.js";
export type { Edit } from "./fixes/propose.js";
export { trialFixes } from "./fixes/beam.js";
export { DEFAULT_FIX_RULES, loadFixRules } from "./fixes/rules.js";
export type { FixRule } from "./fixes/rules.js";
export { createOracle } from "./oracle/index.js";
export { DecliningOracle } from "./oracle/decliningOracle.js";
export { LlmPatchOracle } from "./oracle/llmOracle.js";
export type { OracleReply, PatchOracle } from "./oracle/types.js";
export { applyUnifiedDiff } from "./patch/applyUnifiedDiff.js";
export type { ApplyResult } from "./patch/applyUnifiedDiff.js";
export { SnapshotStore } from "./snapshots/snapshotStore.js";
export type { Snapshot } from "./snapshots/snapshotStore.js";
export { LakeProject, discoverProjectRoot } from "./toolchain/lakeProject.js";
export type { CheckResult, Toolchain } from "./toolchain/types.js";
export { ensureScratchBranch } from "./vcs/git.js";
export { loadConfig } from "./config/loadConfig.js";
export type { AgentConfig, OracleConfig } from "./config/loadConfig.js";
export { loadEnvFile } from "./config/loadEnv.js";

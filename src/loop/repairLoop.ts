import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { collectDiagnostics } from "../diagnostics/collect.js";
import { DEFAULT_MARKERS, lintMarkers, markerDiagnostics } from "../diagnostics/markers.js";
import { errorMessages, isToolUnavailable, type Diagnostic } from "../diagnostics/types.js";
import { trialFixes } from "../fixes/beam.js";
import { proposeFixes } from "../fixes/propose.js";
import { DEFAULT_FIX_RULES, type FixRule } from "../fixes/rules.js";
import type { OracleOperation, OracleReply, PatchOracle } from "../oracle/types.js";
import { applyUnifiedDiff, type ApplyResult } from "../patch/applyUnifiedDiff.js";
import type { CmdResult } from "../runner/runCmd.js";
import { AuditCollector } from "../runtime/audit.js";
import { SnapshotStore, iterationTag, type Snapshot } from "../snapshots/snapshotStore.js";
import type { Toolchain } from "../toolchain/types.js";
import { readWorkingFile, touch, writeWorkingFile } from "../workspace/workingFile.js";
import type { BuildPhase, RepairEventHandler } from "./events.js";
import { createSession, type Session, type SessionStatus } from "./session.js";
import { decideAfterBuild, decideAfterOracle, type OracleStep } from "./transitions.js";

export type ApplyPatchImpl = (diffText: string, cwd: string) => Promise<ApplyResult>;

export type RepairSessionArgs = {
  target: string;
  toolchain: Toolchain;
  oracle: PatchOracle;
  maxIters?: number;
  beam?: number;
  updates?: number;
  theme?: string;
  rules?: readonly FixRule[];
  markers?: readonly string[];
  runsDir?: string;
  applyPatch?: ApplyPatchImpl;
  onEvent?: RepairEventHandler;
  now?: () => number;
};

export type SessionResult = {
  ok: boolean;
  status: SessionStatus;
  iterations: number;
  reason: string;
  errors: string[];
  documented: boolean;
  runDir: string;
  auditPath: string;
  snapshots: Snapshot[];
};

type StepOutcome = "continue" | "stop" | "declined";

const buildFailureText = (build: CmdResult): string =>
  build.stderr.trim() || build.stdout.trim() || `build failed with exit code ${build.code}`;

const replyKind = (reply: OracleReply | null): "file" | "diff" | "declined" => reply?.kind ?? "declined";

/**
 * Drives one file from its current state towards a clean build. Each iteration runs one
 * full build, then either repairs (deterministic beam first, oracle second), extends,
 * or documents. Returns when the file is finished, a step fails irrecoverably, or the
 * iteration budget runs out. Tool absence, compile failures, oracle refusals and budget
 * exhaustion come back as a status, never as an exception.
 */
export const runRepairSession = async (args: RepairSessionArgs): Promise<SessionResult> => {
  const target = resolve(args.target);
  if (!existsSync(target)) {
    throw new Error(`Target file does not exist: ${target}`);
  }

  const { toolchain, oracle } = args;
  const now = args.now ?? Date.now;
  const emit: RepairEventHandler = args.onEvent ?? (() => undefined);
  const rules = args.rules ?? DEFAULT_FIX_RULES;
  const markerList = args.markers ?? DEFAULT_MARKERS;
  const applyPatch: ApplyPatchImpl = args.applyPatch ?? ((diffText, cwd) => applyUnifiedDiff(diffText, cwd));
  const session: Session = createSession({
    file: target,
    maxIters: args.maxIters,
    beam: args.beam,
    updates: args.updates,
    theme: args.theme
  });

  const audit = new AuditCollector(now);
  const store = await SnapshotStore.create({ projectRoot: toolchain.root, target, runsDir: args.runsDir, now });

  emit({
    type: "session_start",
    file: target,
    root: toolchain.root,
    maxIters: session.maxIters,
    beam: session.beam,
    extensions: session.extensionsLeft,
    oracle: oracle.name,
    runDir: store.runDir
  });

  const snapshot = async (tag: string, content: string): Promise<void> => {
    const saved = await store.save(tag, content);
    audit.record("snapshot", session.iteration, { tag, path: saved.path });
    emit({ type: "snapshot", iteration: session.iteration, tag, path: saved.path });
  };

  const writeTarget = async (content: string, tag: string): Promise<void> => {
    await writeWorkingFile(target, content);
    audit.record("write", session.iteration, { tag, chars: content.length });
    await snapshot(tag, content);
  };

  const build = async (phase: BuildPhase): Promise<CmdResult> => {
    emit({ type: "build_start", iteration: session.iteration, phase });
    const result = await toolchain.build();
    audit.record("build", session.iteration, { phase, ok: result.ok, code: result.code, stderr: result.stderr });
    emit({ type: "build_end", iteration: session.iteration, phase, ok: result.ok, code: result.code });
    return result;
  };

  /** A build whose executable never started says nothing about the file itself. */
  const diagnose = async (built?: CmdResult): Promise<Diagnostic[]> => {
    const diagnostics: Diagnostic[] = built?.missing
      ? [{ severity: "error", kind: "tool_unavailable", message: `toolchain unavailable (lake build): ${buildFailureText(built)}` }]
      : await collectDiagnostics(toolchain, target);
    audit.record("diagnose", session.iteration, { diagnostics });
    return diagnostics;
  };

  const askOracle = async (
    operation: OracleOperation,
    call: () => Promise<OracleReply | null>
  ): Promise<OracleReply | null> => {
    emit({ type: "oracle_request", iteration: session.iteration, operation });
    const reply = await call();
    audit.record("oracle", session.iteration, { operation, oracle: oracle.name, reply: replyKind(reply) });
    emit({ type: "oracle_reply", iteration: session.iteration, operation, reply: replyKind(reply) });
    return reply;
  };

  /** The pre-patch content is always the latest snapshot, so no extra copy is taken here. */
  const patchTarget = async (patch: string, tag: string): Promise<boolean> => {
    const result = await applyPatch(patch, dirname(target));
    audit.record("apply", session.iteration, { tag, ok: result.ok, noop: result.noop, stdout: result.stdout, stderr: result.stderr });
    emit({
      type: "patch_applied",
      iteration: session.iteration,
      ok: result.ok,
      noop: result.noop,
      ...(result.ok ? {} : { stderr: result.stderr })
    });
    if (!result.ok) return false;
    await touch(target);
    await snapshot(tag, await readWorkingFile(target));
    return true;
  };

  const runOracleStep = async (step: OracleStep, tagSuffix: string): Promise<StepOutcome> => {
    switch (step.type) {
      case "write":
        await writeTarget(step.content, iterationTag(session.iteration, tagSuffix));
        session.status = "dirty";
        return "continue";
      case "apply":
        if (!(await patchTarget(step.patch, iterationTag(session.iteration, `${tagSuffix}_patch`)))) {
          session.status = "stuck";
          session.reason = "patch failed to apply";
          return "stop";
        }
        session.status = "dirty";
        return "continue";
      case "give_up":
        session.status = "stuck";
        session.reason = step.reason;
        return "stop";
      case "end_extensions":
        session.extensionsLeft = 0;
        return "declined";
    }
  };

  const repairStep = async (source: string, built: CmdResult, markers: string[]): Promise<StepOutcome> => {
    session.status = "dirty";
    const diagnostics = await diagnose(built);
    const toolUnavailable = isToolUnavailable(diagnostics);

    let errors = errorMessages(diagnostics);
    if (errors.length === 0) {
      errors = built.ok ? errorMessages(markerDiagnostics(target, markers)) : [buildFailureText(built)];
    }
    session.errors = errors;
    emit({
      type: "diagnostics",
      iteration: session.iteration,
      errorCount: errors.length,
      toolUnavailable,
      ...(errors.length > 0 ? { firstError: errors[0] } : {})
    });

    if (toolUnavailable) {
      session.status = "stuck";
      session.reason = errors[0] ?? "toolchain unavailable";
      return "stop";
    }

    const edits = proposeFixes(target, source, errors, rules);
    if (edits.length > 0) {
      const outcome = await trialFixes({
        source,
        edits,
        beam: session.beam,
        baselineErrors: errors.length,
        write: (content) => writeWorkingFile(target, content),
        diagnose,
        onTrial: (trial) => {
          audit.record("fix_trial", session.iteration, { rule: trial.edit.ruleId, errorCount: trial.errorCount });
          emit({
            type: "fix_trial",
            iteration: session.iteration,
            note: trial.edit.note,
            errorCount: trial.errorCount,
            baseline: errors.length
          });
        }
      });

      if (outcome.accepted) {
        const { accepted } = outcome;
        await writeTarget(accepted.text, iterationTag(session.iteration, "det"));
        session.errors = accepted.errors;
        emit({ type: "fix_accepted", iteration: session.iteration, note: accepted.edit.note, errorCount: accepted.errorCount });
        return "continue";
      }
    }

    const reply = await askOracle("repair", () => oracle.repair(source, errors));
    return runOracleStep(decideAfterOracle("repair", reply), "repair");
  };

  const extendStep = async (source: string): Promise<StepOutcome> => {
    session.extensionsLeft -= 1;
    const reply = await askOracle("extend", () => oracle.extend(source, session.theme));
    return runOracleStep(decideAfterOracle("extend", reply), "extend");
  };

  /** Runs at most once. A documented file that no longer builds is put back byte for byte. */
  const documentStep = async (): Promise<void> => {
    session.documented = true;
    const before = await readWorkingFile(target);
    const reply = await askOracle("document", () => oracle.document(before));
    if (!reply) {
      session.reason = "build ok; no documentation produced";
      return;
    }

    let applied = true;
    if (reply.kind === "file") {
      await writeTarget(reply.content, iterationTag(session.iteration, "docs"));
    } else {
      applied = await patchTarget(reply.patch, iterationTag(session.iteration, "docs_patch"));
    }
    const verified = applied && (await build("document_verify")).ok;

    if (!verified) {
      await writeTarget(before, iterationTag(session.iteration, "docs_revert"));
      emit({ type: "document_reverted", iteration: session.iteration });
      session.reason = "build ok; documentation reverted";
      return;
    }
    session.reason = "build ok; documentation added";
  };

  let auditPath = "";
  try {
    await snapshot(iterationTag(0), await readWorkingFile(target));

    for (let iteration = 1; iteration <= session.maxIters; iteration += 1) {
      session.iteration = iteration;
      emit({ type: "iteration_start", iteration, maxIters: session.maxIters });

      const built = await build("iteration");
      const source = await readWorkingFile(target);
      const markers = lintMarkers(source, markerList);
      let action = decideAfterBuild(session, { buildOk: built.ok, markers });
      audit.record("decision", iteration, { action: action.type, markers });
      emit({ type: "decision", iteration, action: action.type });

      if (action.type === "repair") {
        if ((await repairStep(source, built, markers)) === "stop") break;
        continue;
      }

      session.status = "ok";
      session.errors = [];

      if (action.type === "extend") {
        const outcome = await extendStep(source);
        if (outcome === "stop") break;
        if (outcome === "continue") continue;
        action = decideAfterBuild(session, { buildOk: true, markers: [] });
        audit.record("decision", iteration, { action: action.type, after: "extension declined" });
        emit({ type: "decision", iteration, action: action.type });
      }

      if (action.type === "document") {
        await documentStep();
      } else {
        session.reason = "build ok";
      }
      session.status = "ok";
      break;
    }

    if (session.status === "dirty") {
      session.reason = "iteration budget exhausted";
    }
  } finally {
    auditPath = await audit.flush(store.runDir);
  }

  emit({ type: "done", status: session.status, iterations: session.iteration, reason: session.reason, auditPath });

  return {
    ok: session.status === "ok",
    status: session.status,
    iterations: session.iteration,
    reason: session.reason,
    errors: [...session.errors],
    documented: session.documented,
    runDir: store.runDir,
    auditPath,
    snapshots: store.list()
  };
};

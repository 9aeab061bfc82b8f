import process from "node:process";
import chalk from "chalk";
import ora from "ora";
import logUpdate from "log-update";
import boxen from "boxen";
import type { OracleOperation } from "../../oracle/types.js";
import type { RepairEvent } from "../../loop/events.js";

const truncate = (value: string | undefined, max = 200): string | undefined => {
  if (!value) return value;
  const flat = value.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
};

/** One plain line per event, for logs and non-TTY output. */
export const formatEventLine = (event: RepairEvent): string | undefined => {
  switch (event.type) {
    case "session_start":
      return `session: ${event.file} (root ${event.root}, oracle ${event.oracle}, max ${event.maxIters} iterations, beam ${event.beam}, extensions ${event.extensions})`;
    case "iteration_start":
      return `iteration ${event.iteration}/${event.maxIters}`;
    case "build_end":
      return `build ${event.ok ? "ok" : `failed (exit ${event.code})`}${event.phase === "document_verify" ? " [documentation check]" : ""}`;
    case "decision":
      return `decision: ${event.action}`;
    case "diagnostics":
      return event.toolUnavailable
        ? `toolchain unavailable: ${truncate(event.firstError) ?? "-"}`
        : `errors: ${event.errorCount}${event.firstError ? ` (first: ${truncate(event.firstError, 160)})` : ""}`;
    case "fix_trial":
      return `trial ${event.note}: ${event.errorCount} errors (baseline ${event.baseline})`;
    case "fix_accepted":
      return `accepted deterministic fix: ${event.note}`;
    case "oracle_reply":
      return `oracle ${event.operation}: ${event.reply}`;
    case "oracle_error":
      return `oracle ${event.operation} error: ${truncate(event.message)}`;
    case "patch_applied":
      return event.ok ? `patch applied${event.noop ? " (no-op)" : ""}` : `patch failed: ${truncate(event.stderr) ?? "-"}`;
    case "snapshot":
      return `snapshot ${event.tag}`;
    case "document_reverted":
      return "documentation broke the build; reverted";
    case "done":
      return `done: ${event.status} after ${event.iterations} iterations (${event.reason})`;
    default:
      return undefined;
  }
};

const oracleLabel = (operation: OracleOperation): string =>
  operation === "repair" ? "asking oracle for a repair" : operation === "extend" ? "asking oracle to extend" : "asking oracle to document";

export const createRepairUI = (args: {
  file: string;
  maxIters: number;
  interactive?: boolean;
}): { onEvent: (event: RepairEvent) => void; close: () => void } => {
  const interactive = args.interactive ?? Boolean(process.stdout.isTTY);

  const panelState: {
    file: string;
    iteration: number;
    maxIters: number;
    status: string;
    extensionsLeft: number;
    lastSnapshot?: string;
    lastError?: string;
  } = {
    file: args.file,
    iteration: 0,
    maxIters: args.maxIters,
    status: "starting",
    extensionsLeft: 0
  };

  let activeSpinner: ReturnType<typeof ora> | undefined;

  const renderPanel = (): void => {
    const body = [
      `${chalk.bold("File")}: ${panelState.file}`,
      `${chalk.bold("Iteration")}: ${panelState.iteration}/${panelState.maxIters}`,
      `${chalk.bold("Status")}: ${panelState.status}`,
      `${chalk.bold("Extensions left")}: ${panelState.extensionsLeft}`,
      `${chalk.bold("Last snapshot")}: ${panelState.lastSnapshot ?? "-"}`,
      `${chalk.bold("Last error")}: ${panelState.lastError ?? "-"}`
    ].join("\n");

    logUpdate(
      boxen(body, {
        borderColor: "cyan",
        padding: { left: 1, right: 1, top: 0, bottom: 0 },
        margin: { top: 0, bottom: 1 },
        title: "leanmend",
        titleAlignment: "left"
      })
    );
  };

  const startSpinner = (text: string): void => {
    if (activeSpinner?.isSpinning) {
      activeSpinner.stop();
    }
    activeSpinner = ora(text).start();
  };

  const stopSpinner = (ok: boolean, text: string): void => {
    if (activeSpinner?.isSpinning) {
      if (ok) {
        activeSpinner.succeed(text);
      } else {
        activeSpinner.fail(text);
      }
      activeSpinner = undefined;
      return;
    }
    console.log(`${ok ? "✓" : "✗"} ${text}`);
  };

  const onInteractiveEvent = (event: RepairEvent): void => {
    switch (event.type) {
      case "session_start":
        panelState.extensionsLeft = event.extensions;
        panelState.maxIters = event.maxIters;
        break;
      case "iteration_start":
        panelState.iteration = event.iteration;
        panelState.status = "building";
        break;
      case "build_start":
        startSpinner(event.phase === "document_verify" ? "verifying documentation" : "lake build");
        break;
      case "build_end":
        stopSpinner(event.ok, event.ok ? "build ok" : `build failed (exit ${event.code})`);
        break;
      case "decision":
        panelState.status = event.action;
        if (event.action === "extend") panelState.extensionsLeft = Math.max(0, panelState.extensionsLeft - 1);
        break;
      case "diagnostics":
        panelState.lastError = truncate(event.firstError, 220);
        break;
      case "fix_trial":
        console.log(chalk.dim(`  trial ${event.note}: ${event.errorCount}/${event.baseline} errors`));
        break;
      case "fix_accepted":
        console.log(chalk.green(`  accepted ${event.note}`));
        break;
      case "oracle_request":
        startSpinner(oracleLabel(event.operation));
        break;
      case "oracle_reply":
        stopSpinner(event.reply !== "declined", `oracle ${event.operation}: ${event.reply}`);
        break;
      case "oracle_error":
        panelState.lastError = truncate(event.message, 220);
        break;
      case "patch_applied":
        if (!event.ok) panelState.lastError = truncate(event.stderr, 220);
        break;
      case "snapshot":
        panelState.lastSnapshot = event.tag;
        break;
      case "document_reverted":
        console.log(chalk.yellow("  documentation broke the build; reverted"));
        break;
      case "done":
        panelState.status = event.status;
        break;
      default:
        break;
    }
    renderPanel();
  };

  const onPlainEvent = (event: RepairEvent): void => {
    const line = formatEventLine(event);
    if (line) console.log(line);
  };

  if (interactive) {
    renderPanel();
  }

  return {
    onEvent: interactive ? onInteractiveEvent : onPlainEvent,
    close: () => {
      if (activeSpinner?.isSpinning) activeSpinner.stop();
      if (interactive) logUpdate.done();
    }
  };
};

import type { OracleReply } from "../oracle/types.js";
import type { Session } from "./session.js";

export type LoopAction =
  | { type: "repair"; cause: "build_failed" | "markers" }
  | { type: "extend" }
  | { type: "document" }
  | { type: "finish" };

export const decideAfterBuild = (
  session: Pick<Session, "extensionsLeft" | "documented">,
  observation: { buildOk: boolean; markers: string[] }
): LoopAction => {
  if (!observation.buildOk) return { type: "repair", cause: "build_failed" };
  if (observation.markers.length > 0) return { type: "repair", cause: "markers" };
  if (session.extensionsLeft > 0) return { type: "extend" };
  if (!session.documented) return { type: "document" };
  return { type: "finish" };
};

export type OracleStep =
  | { type: "write"; content: string }
  | { type: "apply"; patch: string }
  | { type: "give_up"; reason: string }
  | { type: "end_extensions" };

/** A declined repair ends the session; a declined extension only ends the extension phase. */
export const decideAfterOracle = (operation: "repair" | "extend", reply: OracleReply | null): OracleStep => {
  if (!reply) {
    return operation === "repair"
      ? { type: "give_up", reason: "oracle returned no repair" }
      : { type: "end_extensions" };
  }
  return reply.kind === "file" ? { type: "write", content: reply.content } : { type: "apply", patch: reply.patch };
};

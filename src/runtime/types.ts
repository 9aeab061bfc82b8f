export type AuditKind = "build" | "diagnose" | "fix_trial" | "oracle" | "apply" | "write" | "snapshot" | "decision";

export type AuditEvent = {
  kind: AuditKind;
  iteration: number;
  data: unknown;
  ts: number;
};

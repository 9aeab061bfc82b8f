export type SessionStatus = "dirty" | "ok" | "stuck";

export type Session = {
  file: string;
  iteration: number;
  maxIters: number;
  beam: number;
  status: SessionStatus;
  /** Error texts from the most recent diagnosis, in toolchain order. */
  errors: string[];
  extensionsLeft: number;
  theme: string;
  documented: boolean;
  reason: string;
};

export const createSession = (args: {
  file: string;
  maxIters?: number;
  beam?: number;
  updates?: number;
  theme?: string;
}): Session => ({
  file: args.file,
  iteration: 0,
  maxIters: Math.max(1, Math.floor(args.maxIters ?? 20)),
  beam: Math.max(1, Math.floor(args.beam ?? 3)),
  status: "dirty",
  errors: [],
  extensionsLeft: Math.max(0, Math.floor(args.updates ?? 0)),
  theme: args.theme ?? "",
  documented: false,
  reason: "not started"
});

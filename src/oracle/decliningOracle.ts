import type { OracleReply, PatchOracle } from "./types.js";

/** Used when no credential is configured: every request is declined. */
export class DecliningOracle implements PatchOracle {
  readonly name = "none";

  async repair(_fileText: string, _errors: string[]): Promise<OracleReply | null> {
    return null;
  }

  async extend(_fileText: string, _theme: string): Promise<OracleReply | null> {
    return null;
  }

  async document(_fileText: string): Promise<OracleReply | null> {
    return null;
  }
}

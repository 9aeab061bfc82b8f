import type { LlmMessage, LlmProvider } from "../llm/provider.js";
import { toOracleReply } from "./fences.js";
import { documentMessages, extendMessages, repairMessages, type RepairFormat } from "./prompts.js";
import type { OracleOperation, OracleReply, PatchOracle } from "./types.js";

export type OracleErrorHandler = (operation: OracleOperation, message: string) => void;

export class LlmPatchOracle implements PatchOracle {
  readonly name: string;
  private readonly provider: LlmProvider;
  private readonly fileName: string;
  private readonly repairFormat: RepairFormat;
  private readonly onError?: OracleErrorHandler;

  constructor(args: {
    provider: LlmProvider;
    fileName: string;
    repairFormat?: RepairFormat;
    onError?: OracleErrorHandler;
  }) {
    this.provider = args.provider;
    this.name = args.provider.name;
    this.fileName = args.fileName;
    this.repairFormat = args.repairFormat ?? "file";
    this.onError = args.onError;
  }

  private async ask(operation: OracleOperation, messages: LlmMessage[]): Promise<OracleReply | null> {
    try {
      const text = await this.provider.completeText(messages, { metadata: { operation } });
      return toOracleReply(text);
    } catch (error) {
      this.onError?.(operation, error instanceof Error ? error.message : String(error));
      return null;
    }
  }

  repair(fileText: string, errors: string[]): Promise<OracleReply | null> {
    return this.ask(
      "repair",
      repairMessages({ fileText, errors, fileName: this.fileName, format: this.repairFormat })
    );
  }

  extend(fileText: string, theme: string): Promise<OracleReply | null> {
    return this.ask("extend", extendMessages({ fileText, theme }));
  }

  document(fileText: string): Promise<OracleReply | null> {
    return this.ask("document", documentMessages({ fileText }));
  }
}

import { OpenAIResponsesProvider } from "../llm/providers/openai_responses.js";
import type { OracleConfig } from "../config/loadConfig.js";
import { DecliningOracle } from "./decliningOracle.js";
import { LlmPatchOracle, type OracleErrorHandler } from "./llmOracle.js";
import type { RepairFormat } from "./prompts.js";
import type { PatchOracle } from "./types.js";

export type { OracleReply, PatchOracle } from "./types.js";

/** Without an API key the oracle declines everything; the loop treats that as "no suggestion". */
export const createOracle = (args: {
  config: OracleConfig;
  fileName: string;
  repairFormat?: RepairFormat;
  onError?: OracleErrorHandler;
}): PatchOracle => {
  const { apiKey, baseUrl, model, timeoutMs } = args.config;
  if (!apiKey) {
    return new DecliningOracle();
  }

  return new LlmPatchOracle({
    provider: new OpenAIResponsesProvider({ apiKey, baseUrl, model, timeoutMs }),
    fileName: args.fileName,
    repairFormat: args.repairFormat,
    onError: args.onError
  });
};

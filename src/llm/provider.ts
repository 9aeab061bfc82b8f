export type LlmMessage = { role: "system" | "user"; content: string };

export type LlmCallOptions = {
  metadata?: Record<string, string>;
};

export type LlmResponse = {
  text: string;
  responseId?: string;
  refusals?: string[];
  raw: unknown;
  usage?: unknown;
};

export interface LlmProvider {
  name: string;
  complete(messages: LlmMessage[], opts?: LlmCallOptions): Promise<LlmResponse>;
  completeText(messages: LlmMessage[], opts?: LlmCallOptions): Promise<string>;
}

export class LlmRefusalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LlmRefusalError";
  }
}

export abstract class BaseLlmProvider implements LlmProvider {
  abstract name: string;
  abstract complete(messages: LlmMessage[], opts?: LlmCallOptions): Promise<LlmResponse>;

  async completeText(messages: LlmMessage[], opts?: LlmCallOptions): Promise<string> {
    const response = await this.complete(messages, opts);
    if ((response.refusals?.length ?? 0) > 0 && response.text.length === 0) {
      throw new LlmRefusalError(`Model refused: ${response.refusals?.join(" | ")}`);
    }
    return response.text;
  }
}

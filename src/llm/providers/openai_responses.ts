import { parseResponsesOutput } from "../responses/parse.js";
import { BaseLlmProvider, type LlmCallOptions, type LlmMessage, type LlmResponse } from "../provider.js";

export type OpenAIResponsesConfig = {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
};

type ResponseInputItem = {
  type: "message";
  role: LlmMessage["role"];
  content: Array<{ type: "input_text"; text: string }>;
};

const toInputItems = (messages: LlmMessage[]): ResponseInputItem[] =>
  messages.map((message) => ({
    type: "message",
    role: message.role,
    content: [{ type: "input_text", text: message.content }]
  }));

export class OpenAIResponsesProvider extends BaseLlmProvider {
  name = "openai_responses";
  private readonly config: OpenAIResponsesConfig;

  constructor(config: OpenAIResponsesConfig) {
    super();
    this.config = { ...config, baseUrl: config.baseUrl.replace(/\/$/, "") };
  }

  toRequestBody(messages: LlmMessage[], opts?: LlmCallOptions): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: this.config.model,
      input: toInputItems(messages)
    };
    if (opts?.metadata) body.metadata = opts.metadata;

    return body;
  }

  private async request(body: Record<string, unknown>): Promise<unknown> {
    const doFetch = this.config.fetchImpl ?? fetch;
    const response = await doFetch(`${this.config.baseUrl}/responses`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.config.apiKey}`,
        "Content-Type": "application/json"
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.config.timeoutMs)
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`OpenAI Responses API error ${response.status}: ${text}`);
    }

    return (await response.json()) as unknown;
  }

  async complete(messages: LlmMessage[], opts?: LlmCallOptions): Promise<LlmResponse> {
    const raw = await this.request(this.toRequestBody(messages, opts));
    const parsed = parseResponsesOutput(raw);

    return {
      text: parsed.text,
      responseId: parsed.responseId,
      refusals: parsed.refusals,
      raw,
      usage: parsed.usage
    };
  }
}

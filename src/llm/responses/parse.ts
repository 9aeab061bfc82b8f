import { z } from "zod";

const contentPartSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
    refusal: z.string().optional()
  })
  .passthrough();

const outputItemSchema = z
  .object({
    type: z.string(),
    content: z.array(contentPartSchema).optional(),
    refusal: z.string().optional(),
    text: z.string().optional()
  })
  .passthrough();

const responseSchema = z
  .object({
    id: z.string().optional(),
    output: z.array(outputItemSchema).optional(),
    output_text: z.string().optional(),
    usage: z.unknown().optional()
  })
  .passthrough();

export type ParsedResponsesOutput = {
  text: string;
  refusals: string[];
  responseId?: string;
  usage?: unknown;
};

/**
 * Collects `output_text` chunks and refusals from a Responses API payload. Unknown item
 * types are ignored; a payload that is not an object yields empty text.
 */
export const parseResponsesOutput = (raw: unknown): ParsedResponsesOutput => {
  const parsed = responseSchema.safeParse(raw);
  if (!parsed.success) {
    return { text: "", refusals: [] };
  }

  const textChunks: string[] = [];
  const refusals: string[] = [];

  for (const item of parsed.data.output ?? []) {
    if (item.type === "refusal") {
      const refusal = item.refusal ?? item.text ?? "";
      if (refusal.length > 0) refusals.push(refusal);
      continue;
    }
    if (item.type !== "message") continue;

    for (const part of item.content ?? []) {
      if (part.type === "output_text" && part.text) {
        textChunks.push(part.text);
        continue;
      }
      if (part.type === "refusal") {
        const refusal = part.refusal ?? part.text ?? "";
        if (refusal.length > 0) refusals.push(refusal);
      }
    }
  }

  const text = textChunks.join("").trim() || (parsed.data.output_text ?? "").trim();
  return {
    text,
    refusals,
    ...(parsed.data.id ? { responseId: parsed.data.id } : {}),
    ...(parsed.data.usage !== undefined ? { usage: parsed.data.usage } : {})
  };
};

import type { OracleReply } from "./types.js";

/** Removes a surrounding Markdown code fence (with optional language tag) from model output. */
export const stripCodeFence = (raw: string): string => {
  let text = raw.trim();
  if (text.startsWith("```")) {
    const newline = text.indexOf("\n");
    text = newline >= 0 ? text.slice(newline + 1) : "";
    if (text.trimEnd().endsWith("```")) {
      const body = text.trimEnd();
      text = body.slice(0, body.length - 3);
    }
  }
  return text.trim();
};

export const isUnifiedDiff = (text: string): boolean =>
  /^--- \S/m.test(text) && /^\+\+\+ \S/m.test(text) && /^@@ /m.test(text);

export const toOracleReply = (raw: string): OracleReply | null => {
  const text = stripCodeFence(raw);
  if (text.length === 0) return null;
  if (isUnifiedDiff(text)) return { kind: "diff", patch: `${text}\n` };
  return { kind: "file", content: `${text}\n` };
};

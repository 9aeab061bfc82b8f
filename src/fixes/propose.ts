import { DEFAULT_FIX_RULES, type FixRule } from "./rules.js";

export type Edit = {
  file: string;
  /** Half-open character range `[start, end)` replaced by `replacement`. */
  start: number;
  end: number;
  replacement: string;
  note: string;
  ruleId: string;
};

export const applyEdit = (text: string, edit: Edit): string =>
  text.slice(0, edit.start) + edit.replacement + text.slice(edit.end);

/**
 * One insert-at-top edit per known signature present in the errors, skipping rules
 * whose remedy is already in the source. Order is the table's declaration order.
 */
export const proposeFixes = (
  file: string,
  source: string,
  errors: string[],
  rules: readonly FixRule[] = DEFAULT_FIX_RULES
): Edit[] => {
  const errBlob = errors.join(" ");
  const edits: Edit[] = [];

  for (const rule of rules) {
    if (!errBlob.includes(rule.signature)) continue;
    const remedy = rule.remedy.trim();
    if (source.includes(rule.guard ?? remedy)) continue;
    edits.push({
      file,
      start: 0,
      end: 0,
      replacement: `${remedy}\n`,
      note: rule.note ?? rule.id,
      ruleId: rule.id
    });
  }

  return edits;
};

import { readFile } from "node:fs/promises";
import { z } from "zod";

export const fixRuleSchema = z.object({
  id: z.string().min(1),
  /** Substring searched for in the joined error text. */
  signature: z.string().min(1),
  /** Line inserted at the top of the file. */
  remedy: z.string().min(1),
  /** Text whose presence in the source means the remedy is already applied. Defaults to the remedy. */
  guard: z.string().min(1).optional(),
  note: z.string().optional()
});

export const fixRulesFileSchema = z.object({
  rules: z.array(fixRuleSchema)
});

export type FixRule = z.infer<typeof fixRuleSchema>;

export const DEFAULT_FIX_RULES: readonly FixRule[] = [
  {
    id: "import_real_log",
    signature: "unknown identifier 'Real.log'",
    remedy: "import Mathlib.Analysis.SpecialFunctions.Log.Basic",
    guard: "Mathlib.Analysis.SpecialFunctions.Log.Basic",
    note: "import log"
  },
  {
    id: "open_classical",
    signature: "unknown identifier 'Classical'",
    remedy: "open Classical",
    note: "open Classical"
  },
  {
    id: "import_real_exp",
    signature: "unknown identifier 'Real.exp'",
    remedy: "import Mathlib.Analysis.SpecialFunctions.Exp",
    guard: "Mathlib.Analysis.SpecialFunctions.Exp",
    note: "import exp"
  },
  {
    id: "import_real_sqrt",
    signature: "unknown identifier 'Real.sqrt'",
    remedy: "import Mathlib.Analysis.SpecialFunctions.Sqrt",
    guard: "Mathlib.Analysis.SpecialFunctions.Sqrt",
    note: "import sqrt"
  },
  {
    id: "import_real_pi",
    signature: "unknown identifier 'Real.pi'",
    remedy: "import Mathlib.Analysis.SpecialFunctions.Trigonometric.Basic",
    guard: "Mathlib.Analysis.SpecialFunctions.Trigonometric.Basic",
    note: "import pi"
  }
];

/** Reads extra rules from a JSON file of shape `{ "rules": [...] }`; throws a ZodError when malformed. */
export const loadFixRules = async (path: string): Promise<FixRule[]> => {
  const raw = JSON.parse(await readFile(path, "utf8")) as unknown;
  return fixRulesFileSchema.parse(raw).rules;
};

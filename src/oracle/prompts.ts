import type { LlmMessage } from "../llm/provider.js";

export const MAX_PROMPT_ERRORS = 20;

export type RepairFormat = "file" | "diff";

const fenced = (fileText: string): string => ["```lean", fileText.trimEnd(), "```"].join("\n");

export const repairMessages = (args: {
  fileText: string;
  errors: string[];
  fileName: string;
  format: RepairFormat;
}): LlmMessage[] => {
  const errBlob = args.errors.slice(0, MAX_PROMPT_ERRORS).join("\n\n").trim();
  const instruction =
    args.format === "diff"
      ? `Return a unified diff (patch) that modifies only '${args.fileName}' so that it compiles. Use '--- ${args.fileName}' and '+++ ${args.fileName}' headers. Output the diff only.`
      : "Return the complete corrected file so that it compiles with `lake build`. Respond with Lean code only, no explanations. Add imports if they are needed.";

  return [
    { role: "system", content: "You are a precise Lean 4 repair assistant." },
    {
      role: "user",
      content: [
        "The following Lean 4 file fails to compile with these errors:",
        "",
        errBlob || "(no diagnostics available)",
        "",
        instruction,
        "",
        fenced(args.fileText)
      ].join("\n")
    }
  ];
};

export const extendMessages = (args: { fileText: string; theme: string }): LlmMessage[] => [
  { role: "system", content: "You extend Lean 4 files with new results that fit their theme." },
  {
    role: "user",
    content: [
      `The file below compiles. Its theme is: "${args.theme || "(unspecified)"}".`,
      "Add one main new result or definition that is not already in the file, together with any",
      "lemmas it needs. Follow the order and intent suggested by the existing comments. Do not",
      "remove or rename anything that is already there. The file must still compile.",
      "Return the complete file as Lean code only.",
      "",
      fenced(args.fileText)
    ].join("\n")
  }
];

export const documentMessages = (args: { fileText: string }): LlmMessage[] => [
  { role: "system", content: "You add documentation to Lean 4 files without changing their meaning." },
  {
    role: "user",
    content: [
      "Add documentation to the Lean file below without changing its behavior:",
      "- a module docstring `/-! ... -/` at the top summarizing the theme and the main results;",
      "- a short `--` comment before each `def`, `lemma` and `theorem`;",
      "- a few `--` comments inside nontrivial `by` blocks explaining key steps.",
      "Do not rename identifiers or reorder imports. Return the complete file as Lean code only.",
      "",
      fenced(args.fileText)
    ].join("\n")
  }
];

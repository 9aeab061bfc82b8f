import { countErrors, errorMessages, type Diagnostic } from "../diagnostics/types.js";
import { applyEdit, type Edit } from "./propose.js";

export type FixTrial = {
  edit: Edit;
  text: string;
  errorCount: number;
  errors: string[];
};

export type BeamOutcome = {
  accepted: FixTrial | null;
  trials: FixTrial[];
};

/**
 * Tries up to `beam` edits one at a time against the original source. Each candidate is
 * written, re-diagnosed, and the original text is written back before the next one, so
 * trials never compound. The winner is the candidate with the fewest errors among those
 * that do not exceed `baselineErrors`; ties go to the earlier edit. The working file
 * always holds the original text when this returns.
 */
export const trialFixes = async (args: {
  source: string;
  edits: Edit[];
  beam: number;
  baselineErrors: number;
  write: (content: string) => Promise<void>;
  diagnose: () => Promise<Diagnostic[]>;
  onTrial?: (trial: FixTrial) => void;
}): Promise<BeamOutcome> => {
  const trials: FixTrial[] = [];
  let accepted: FixTrial | null = null;

  for (const edit of args.edits.slice(0, Math.max(1, args.beam))) {
    const text = applyEdit(args.source, edit);
    await args.write(text);
    const diagnostics = await args.diagnose();
    await args.write(args.source);

    const trial: FixTrial = {
      edit,
      text,
      errorCount: countErrors(diagnostics),
      errors: errorMessages(diagnostics)
    };
    trials.push(trial);
    args.onTrial?.(trial);

    if (trial.errorCount > args.baselineErrors) continue;
    if (!accepted || trial.errorCount < accepted.errorCount) {
      accepted = trial;
    }
  }

  return { accepted, trials };
};

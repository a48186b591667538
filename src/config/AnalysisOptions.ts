import { z } from "zod";
import { ReadabilityConfigError } from "../errors";

/**
 * How to count clauses in a sentence without a finite verb.
 * - "strict": no clause, so content words per clause is null and the
 *   sentence gets no score.
 * - "atLeastOne": count one clause.
 */
export type ClauseCountPolicy = "strict" | "atLeastOne";

export interface AnalysisOptions {
  /** Look up the frequency of a registered compound head instead of the compound */
  compoundFrequencyAdjustment: boolean;
  clauseCountPolicy: ClauseCountPolicy;
}

export const DEFAULT_ANALYSIS_OPTIONS: AnalysisOptions = {
  compoundFrequencyAdjustment: true,
  clauseCountPolicy: "strict",
};

const booleanLike = z.union([
  z.boolean(),
  z.enum(["true", "false"]).transform((v) => v === "true"),
]);

const analysisInputSchema = z
  .object({
    compoundFrequencyAdjustment: booleanLike,
    clauseCountPolicy: z.enum(["strict", "atLeastOne"]),
  })
  .partial()
  .strict();

export type AnalysisOptionsInput = z.input<typeof analysisInputSchema>;

/**
 * Overlay user options on the defaults. Accepts "true"/"false" strings for
 * the boolean, since runtime settings arrive as strings.
 */
export function mergeAnalysisOptions(input?: unknown): AnalysisOptions {
  if (input === undefined || input === null) return DEFAULT_ANALYSIS_OPTIONS;

  const parsed = analysisInputSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = ["analysis", ...(issue?.path ?? [])].join(".");
    throw ReadabilityConfigError.invalidField(field, issue?.message ?? "invalid value", input, {
      operation: "mergeAnalysisOptions",
    });
  }

  return {
    compoundFrequencyAdjustment:
      parsed.data.compoundFrequencyAdjustment ?? DEFAULT_ANALYSIS_OPTIONS.compoundFrequencyAdjustment,
    clauseCountPolicy: parsed.data.clauseCountPolicy ?? DEFAULT_ANALYSIS_OPTIONS.clauseCountPolicy,
  };
}

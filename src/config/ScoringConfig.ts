import { z } from "zod";
import { ReadabilityConfigError } from "../errors";

/**
 * Regression coefficients of the scoring formula:
 *   raw   = constant + freqLog*f + maxSdl*s + contentWordsPerClause*c + proportionConcrete*p
 *   score = clamp(100 - raw, 0, 100)
 * Recalibrated externally; override through settings, never derived here.
 */
export interface ScoringCoefficients {
  constant: number;
  freqLog: number;
  maxSdl: number;
  contentWordsPerClause: number;
  proportionConcrete: number;
}

export interface ScoringConfig {
  coefficients: ScoringCoefficients;
  /**
   * Lower-inclusive level boundaries [t1, t2, t3]:
   * score < t1 -> 1, < t2 -> 2, < t3 -> 3, otherwise 4.
   */
  thresholds: readonly [number, number, number];
}

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  coefficients: {
    constant: -7.83150696,
    freqLog: 17.05020517,
    maxSdl: -1.33286119,
    contentWordsPerClause: -2.38774819,
    proportionConcrete: 11.7213491,
  },
  thresholds: [34, 46, 60],
};

const finite = z.number().finite();

const scoringInputSchema = z
  .object({
    coefficients: z
      .object({
        constant: finite,
        freqLog: finite,
        maxSdl: finite,
        contentWordsPerClause: finite,
        proportionConcrete: finite,
      })
      .partial()
      .strict(),
    thresholds: z.tuple([finite, finite, finite]),
  })
  .partial()
  .strict();

export type ScoringConfigInput = z.infer<typeof scoringInputSchema>;

/**
 * Overlay user settings on the defaults. Unknown keys, non-numeric values and
 * thresholds that are not strictly increasing within [0, 100] are rejected.
 */
export function mergeScoringConfig(input?: unknown): ScoringConfig {
  if (input === undefined || input === null) return DEFAULT_SCORING_CONFIG;

  const parsed = scoringInputSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = ["scoring", ...(issue?.path ?? [])].join(".");
    throw ReadabilityConfigError.invalidField(field, issue?.message ?? "invalid value", input, {
      operation: "mergeScoringConfig",
    });
  }

  const merged: ScoringConfig = {
    coefficients: { ...DEFAULT_SCORING_CONFIG.coefficients, ...parsed.data.coefficients },
    thresholds: parsed.data.thresholds ?? DEFAULT_SCORING_CONFIG.thresholds,
  };

  const [t1, t2, t3] = merged.thresholds;
  if (!(t1 < t2 && t2 < t3)) {
    throw ReadabilityConfigError.invalidField(
      "scoring.thresholds",
      "thresholds must be strictly increasing",
      merged.thresholds,
      { operation: "mergeScoringConfig" }
    );
  }
  if (t1 < 0 || t3 > 100) {
    throw ReadabilityConfigError.invalidField(
      "scoring.thresholds",
      "thresholds must lie within [0, 100]",
      merged.thresholds,
      { operation: "mergeScoringConfig" }
    );
  }

  return merged;
}

/**
 * ReadabilityScorer: maps the four aggregate features to a score in [0, 100]
 * and a difficulty level 1 (easy) to 4 (hard).
 *
 * Used unchanged at sentence and document granularity. If any feature is
 * null, both score and level are null: there is no partial scoring.
 *
 * Default level bands (score, share of adults struggling to understand):
 *   1: below 34 (15%)   2: 34 to below 46 (31%)
 *   3: 46 to below 60 (55%)   4: 60 and up (82%)
 */

import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from "../config/ScoringConfig";
import type { DifficultyLevel, ScoreResult, ScoringFeatures } from "./ReadabilityAnalysis.types";

export function calculateScore(
  freqLog: number | null,
  maxSdl: number | null,
  contentWordsPerClause: number | null,
  proportionConcrete: number | null,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG
): number | null {
  if (freqLog === null || maxSdl === null || contentWordsPerClause === null || proportionConcrete === null) {
    return null;
  }

  const c = config.coefficients;
  const raw =
    c.constant +
    c.freqLog * freqLog +
    c.maxSdl * maxSdl +
    c.contentWordsPerClause * contentWordsPerClause +
    c.proportionConcrete * proportionConcrete;

  return Math.min(100, Math.max(0, 100 - raw));
}

export function difficultyLevel(
  score: number | null,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG
): DifficultyLevel | null {
  if (score === null) return null;
  const [t1, t2, t3] = config.thresholds;
  if (score < t1) return 1;
  if (score < t2) return 2;
  if (score < t3) return 3;
  return 4;
}

export function score(
  features: ScoringFeatures,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG
): ScoreResult {
  const value = calculateScore(
    features.meanLogFrequency,
    features.maxDependencyLength,
    features.contentWordsPerClause,
    features.proportionOfConcreteNouns,
    config
  );
  return { score: value, level: difficultyLevel(value, config) };
}

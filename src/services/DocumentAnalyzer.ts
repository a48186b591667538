/**
 * DocumentAnalyzer: document-level readability from sentence aggregates.
 *
 * Each document feature is the mean of the non-null sentence values. The
 * document score applies the formula to those means; it is not the mean of
 * the sentence scores (that mean is reported separately for reference).
 *
 * No database, no runtime dependency. Fully unit-testable.
 */

import { DEFAULT_ANALYSIS_OPTIONS } from "../config/AnalysisOptions";
import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from "../config/ScoringConfig";
import { Memo } from "../utils/memo";
import { score as scoreFeatures } from "./ReadabilityScorer";
import { SentenceAnalysis, type AnalyzerDependencies } from "./SentenceAnalyzer";
import type {
  AnnotatedSentence,
  DocumentFeatures,
  ScoreResult,
  ScoringFeatures,
} from "./ReadabilityAnalysis.types";

// Re-export types for convenience
export type { DocumentFeatures, SentenceFeatures } from "./ReadabilityAnalysis.types";

/** The slice of a sentence the document aggregates read. */
export type SentenceAggregate = ScoringFeatures & Pick<ScoreResult, "score">;

interface DocumentAggregates extends ScoringFeatures {
  scoreResult: ScoreResult;
  sentenceScores: number[];
}

function meanOfPresent(values: Array<number | null>): number | null {
  const present = values.filter((v): v is number => v !== null);
  if (present.length === 0) return null;
  return present.reduce((sum, v) => sum + v, 0) / present.length;
}

/**
 * Aggregates over any ordered list of sentence results. Works on full
 * SentenceAnalysis instances as well as plain precomputed aggregates.
 */
export class DocumentAnalysis<S extends SentenceAggregate = SentenceAggregate> {
  private readonly memo = new Memo<DocumentAggregates>();

  constructor(
    readonly sentences: readonly S[],
    private readonly scoring: ScoringConfig = DEFAULT_SCORING_CONFIG
  ) {}

  get sentenceCount(): number {
    return this.sentences.length;
  }

  get meanLogFrequency(): number | null {
    return this.memo.get("meanLogFrequency", () => meanOfPresent(this.sentences.map((s) => s.meanLogFrequency)));
  }

  get maxDependencyLength(): number | null {
    return this.memo.get("maxDependencyLength", () =>
      meanOfPresent(this.sentences.map((s) => s.maxDependencyLength))
    );
  }

  get contentWordsPerClause(): number | null {
    return this.memo.get("contentWordsPerClause", () =>
      meanOfPresent(this.sentences.map((s) => s.contentWordsPerClause))
    );
  }

  get proportionOfConcreteNouns(): number | null {
    return this.memo.get("proportionOfConcreteNouns", () =>
      meanOfPresent(this.sentences.map((s) => s.proportionOfConcreteNouns))
    );
  }

  private get sentenceScores(): number[] {
    return this.memo.get("sentenceScores", () =>
      this.sentences.map((s) => s.score).filter((v): v is number => v !== null)
    );
  }

  get minScore(): number | null {
    return this.sentenceScores.length > 0 ? Math.min(...this.sentenceScores) : null;
  }

  get maxScore(): number | null {
    return this.sentenceScores.length > 0 ? Math.max(...this.sentenceScores) : null;
  }

  get meanSentenceScore(): number | null {
    return meanOfPresent(this.sentenceScores);
  }

  get scoreResult(): ScoreResult {
    return this.memo.get("scoreResult", () => scoreFeatures(this, this.scoring));
  }

  get score(): number | null {
    return this.scoreResult.score;
  }

  get level(): ScoreResult["level"] {
    return this.scoreResult.level;
  }
}

/**
 * Analyze every sentence, then aggregate. Sentence indices are passed on so
 * contract errors name the offending sentence.
 */
export function analyzeDocument(
  sentences: readonly AnnotatedSentence[],
  deps: AnalyzerDependencies
): DocumentFeatures {
  const analyses = sentences.map((sentence, i) => new SentenceAnalysis(sentence, deps, i));
  const doc = new DocumentAnalysis(analyses, deps.scoring);
  const options = deps.options ?? DEFAULT_ANALYSIS_OPTIONS;

  return {
    sentenceCount: doc.sentenceCount,
    meanLogFrequency: doc.meanLogFrequency,
    maxDependencyLength: doc.maxDependencyLength,
    contentWordsPerClause: doc.contentWordsPerClause,
    proportionOfConcreteNouns: doc.proportionOfConcreteNouns,
    score: doc.score,
    level: doc.level,
    minScore: doc.minScore,
    maxScore: doc.maxScore,
    meanSentenceScore: doc.meanSentenceScore,
    compoundFrequencyAdjustment: options.compoundFrequencyAdjustment,
    sentences: analyses.map((s) => s.toFeatures()),
  };
}

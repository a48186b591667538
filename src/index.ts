import type { Plugin } from "@elizaos/core";

import { ReadabilityService } from "./services/ReadabilityService";
import { AnalyzeReadabilityAction } from "./actions/analyzeReadabilityAction";

export const readabilityPlugin: Plugin = {
  name: "dutch-readability",
  description:
    "Dutch readability scoring. Turns annotated sentences into a 0-100 readability score " +
    "and a difficulty level (1 = easy, 4 = very difficult), per sentence and per document.",
  config: {
    READABILITY_LEXICON_DIR: process.env.READABILITY_LEXICON_DIR ?? null,
    READABILITY_ANNOTATOR_URL: process.env.READABILITY_ANNOTATOR_URL ?? null,
    READABILITY_COMPOUND_ADJUSTMENT: process.env.READABILITY_COMPOUND_ADJUSTMENT ?? null,
    READABILITY_CLAUSE_POLICY: process.env.READABILITY_CLAUSE_POLICY ?? null,
  },
  services: [ReadabilityService],
  actions: [AnalyzeReadabilityAction],
};

export default readabilityPlugin;

// ============================================================================
// RE-EXPORTS (library use without an agent runtime)
// ============================================================================

export { analyzeSentence, SentenceAnalysis, type AnalyzerDependencies } from "./services/SentenceAnalyzer";
export { analyzeDocument, DocumentAnalysis, type SentenceAggregate } from "./services/DocumentAnalyzer";
export { score, calculateScore, difficultyLevel } from "./services/ReadabilityScorer";
export { TokenClassifier, SentenceGraph, type ClassifierOptions } from "./services/TokenClassifier";
export {
  InMemoryLexicon,
  loadLexicon,
  getLexicon,
  parseWordList,
  DEFAULT_LEXICON_DIR,
  LEXICON_FILES,
  type Lexicon,
  type LexiconData,
  type NounEntry,
} from "./services/Lexicon";
export { parseAnnotationResponse, type Annotator, type WireToken } from "./services/Annotator";
export { HttpAnnotator, type HttpAnnotatorOptions } from "./services/HttpAnnotator";
export {
  preprocessText,
  extractTextFromHtml,
  extractTextFromMarkdown,
  normalizeQuotemarks,
  type InputFormat,
} from "./services/TextPreprocessor";
export { ReadabilityService, resolveReadabilitySettings, type ReadabilitySettings } from "./services/ReadabilityService";
export {
  AnalyzeReadabilityAction,
  extractTextToAnalyze,
  summarizeDocument,
  hardestSentence,
} from "./actions/analyzeReadabilityAction";

export type {
  AnnotatedToken,
  AnnotatedSentence,
  SemanticType,
  LexiconSemanticType,
  DifficultyLevel,
  GrammaticalPerson,
  TokenFeatures,
  TokenSpan,
  DependencyEntry,
  PronounsByPerson,
  WordFrequencyEntry,
  ScoringFeatures,
  ScoreResult,
  SentenceFeatures,
  DocumentFeatures,
} from "./services/ReadabilityAnalysis.types";

// Configuration
export {
  DEFAULT_SCORING_CONFIG,
  mergeScoringConfig,
  type ScoringConfig,
  type ScoringCoefficients,
} from "./config/ScoringConfig";
export {
  DEFAULT_ANALYSIS_OPTIONS,
  mergeAnalysisOptions,
  type AnalysisOptions,
  type ClauseCountPolicy,
} from "./config/AnalysisOptions";

// Error types
export {
  ReadabilityError,
  ReadabilityConfigError,
  LexiconError,
  AnnotationContractError,
  AnnotatorNetworkError,
  ErrorCode,
  wrapError,
  isReadabilityError,
  getErrorCode,
  type ErrorContext,
  type SerializedError,
} from "./errors";

// Utilities
export { logger, createLogger, type LogLevel, type LogEntry } from "./utils/logger";
export { withRetry, RetryPresets, type RetryConfig } from "./utils/retry";

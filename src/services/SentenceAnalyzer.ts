/**
 * SentenceAnalyzer: aggregates token features of one sentence into the four
 * scoring features plus the categorized word lists and structural flags
 * (passive voice, subordinate clauses).
 *
 * Pure: no I/O, no shared mutable state. Aggregates are memoized per
 * SentenceAnalysis instance.
 */

import { DEFAULT_ANALYSIS_OPTIONS, type AnalysisOptions } from "../config/AnalysisOptions";
import { DEFAULT_SCORING_CONFIG, type ScoringConfig } from "../config/ScoringConfig";
import { DOCUMENT_DEFAULTS } from "../config/constants";
import { Memo } from "../utils/memo";
import type { Lexicon } from "./Lexicon";
import { score as scoreFeatures } from "./ReadabilityScorer";
import { SentenceGraph, TokenClassifier } from "./TokenClassifier";
import type {
  AnnotatedSentence,
  DependencyEntry,
  PronounsByPerson,
  ScoreResult,
  SemanticType,
  SentenceFeatures,
  TokenSpan,
  WordFrequencyEntry,
} from "./ReadabilityAnalysis.types";

export interface AnalyzerDependencies {
  lexicon: Lexicon;
  options?: AnalysisOptions;
  scoring?: ScoringConfig;
}

interface SentenceAggregates {
  classifiers: TokenClassifier[];
  meanLogFrequency: number | null;
  maxDependencyLength: number | null;
  contentWordsPerClause: number | null;
  proportionOfConcreteNouns: number | null;
  scoreResult: ScoreResult;
  passives: TokenSpan[];
  subordinateClauses: TokenSpan[];
}

function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export class SentenceAnalysis {
  readonly graph: SentenceGraph;
  readonly options: AnalysisOptions;
  readonly scoring: ScoringConfig;
  private readonly lexicon: Lexicon;
  private readonly memo = new Memo<SentenceAggregates>();

  constructor(sentence: AnnotatedSentence, deps: AnalyzerDependencies, sentenceIndex?: number) {
    this.graph = new SentenceGraph(sentence, sentenceIndex);
    this.lexicon = deps.lexicon;
    this.options = deps.options ?? DEFAULT_ANALYSIS_OPTIONS;
    this.scoring = deps.scoring ?? DEFAULT_SCORING_CONFIG;
  }

  get classifiers(): TokenClassifier[] {
    return this.memo.get("classifiers", () =>
      this.graph.tokens.map((token) => new TokenClassifier(this.graph, token.index, this.lexicon, this.options))
    );
  }

  get text(): string {
    return this.spanText(0, this.graph.length - 1);
  }

  get meanLogFrequency(): number | null {
    return this.memo.get("meanLogFrequency", () =>
      mean(
        this.classifiers
          .map((c) => c.wordFrequency)
          .filter((f): f is number => f !== null)
      )
    );
  }

  /** Null when the sentence has at most one non-punctuation token. */
  get maxDependencyLength(): number | null {
    return this.memo.get("maxDependencyLength", () => {
      const words = this.classifiers.filter((c) => !c.isPunct);
      if (words.length <= 1) return null;
      return Math.max(...this.classifiers.map((c) => c.dependencyLength));
    });
  }

  get contentWordsPerClause(): number | null {
    return this.memo.get("contentWordsPerClause", () => {
      const clauses = this.finiteVerbs.length;
      if (clauses === 0 && this.options.clauseCountPolicy === "strict") return null;
      return this.contentWords.length / Math.max(clauses, 1);
    });
  }

  /** concrete / (concrete + abstract + undefined); unknown nouns count nowhere. */
  get proportionOfConcreteNouns(): number | null {
    return this.memo.get("proportionOfConcreteNouns", () => {
      const concrete = this.concreteNouns.length;
      const denominator = concrete + this.abstractNouns.length + this.undefinedNouns.length;
      return denominator === 0 ? null : concrete / denominator;
    });
  }

  get concreteNouns(): string[] {
    return this.wordsOfType("concrete");
  }

  get abstractNouns(): string[] {
    return this.wordsOfType("abstract");
  }

  get undefinedNouns(): string[] {
    return this.wordsOfType("undefined");
  }

  get unknownNouns(): string[] {
    return this.wordsOfType("unknown");
  }

  get contentWords(): string[] {
    return this.classifiers.filter((c) => c.isContentWord).map((c) => c.word);
  }

  get finiteVerbs(): string[] {
    return this.classifiers.filter((c) => c.isFiniteVerb).map((c) => c.word);
  }

  get pronouns(): PronounsByPerson {
    const grouped: PronounsByPerson = { first: [], second: [], third: [] };
    for (const c of this.classifiers) {
      const person = c.pronounPerson;
      if (person) grouped[person].push(c.word);
    }
    return grouped;
  }

  /** One span per passive auxiliary, stretched over the auxiliary's heads. */
  get passives(): TokenSpan[] {
    return this.memo.get("passives", () =>
      this.classifiers
        .filter((c) => c.isPassiveAuxiliary)
        .map((c) => this.span([c.index, ...c.heads]))
    );
  }

  get hasPassive(): boolean {
    return this.passives.length > 0;
  }

  /** One span per clause head, stretched over its direct dependents. */
  get subordinateClauses(): TokenSpan[] {
    return this.memo.get("subordinateClauses", () =>
      this.classifiers
        .filter((c) => c.isSubordinateClauseHead)
        .map((c) => this.span([c.index, ...c.children]))
    );
  }

  get hasSubordinateClause(): boolean {
    return this.subordinateClauses.length > 0;
  }

  get dependencies(): DependencyEntry[] {
    return this.classifiers.map((c) => ({
      token: c.token.text,
      depLength: c.dependencyLength,
      heads: c.heads.map((h) => this.graph.token(h).text),
    }));
  }

  /** Rarest words first; ties keep sentence order; each word listed once. */
  leastFrequentWords(n: number = DOCUMENT_DEFAULTS.LEAST_FREQUENT_WORDS): WordFrequencyEntry[] {
    const seen = new Set<string>();
    const entries: WordFrequencyEntry[] = [];
    for (const c of this.classifiers) {
      const frequency = c.wordFrequency;
      if (frequency === null || seen.has(c.word)) continue;
      seen.add(c.word);
      entries.push({ word: c.word, frequency });
    }
    return entries.sort((a, b) => a.frequency - b.frequency).slice(0, Math.max(0, n));
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

  toFeatures(): SentenceFeatures {
    return {
      text: this.text,
      tokenCount: this.graph.length,
      meanLogFrequency: this.meanLogFrequency,
      maxDependencyLength: this.maxDependencyLength,
      contentWordsPerClause: this.contentWordsPerClause,
      proportionOfConcreteNouns: this.proportionOfConcreteNouns,
      score: this.score,
      level: this.level,
      concreteNouns: this.concreteNouns,
      abstractNouns: this.abstractNouns,
      undefinedNouns: this.undefinedNouns,
      unknownNouns: this.unknownNouns,
      contentWords: this.contentWords,
      finiteVerbs: this.finiteVerbs,
      pronouns: this.pronouns,
      hasPassive: this.hasPassive,
      passives: this.passives,
      hasSubordinateClause: this.hasSubordinateClause,
      subordinateClauses: this.subordinateClauses,
      dependencies: this.dependencies,
      leastFrequentWords: this.leastFrequentWords(),
    };
  }

  private wordsOfType(type: SemanticType): string[] {
    return this.classifiers.filter((c) => c.semanticType === type).map((c) => c.word);
  }

  private span(indices: number[]): TokenSpan {
    const start = Math.min(...indices);
    const end = Math.max(...indices);
    return { start, end, text: this.spanText(start, end) };
  }

  private spanText(start: number, end: number): string {
    let text = "";
    for (let i = start; i <= end; i++) {
      const token = this.graph.token(i);
      text += i < end ? token.text + token.whitespace : token.text;
    }
    return text.trim();
  }
}

export function analyzeSentence(sentence: AnnotatedSentence, deps: AnalyzerDependencies): SentenceFeatures {
  return new SentenceAnalysis(sentence, deps).toFeatures();
}

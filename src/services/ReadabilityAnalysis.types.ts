/**
 * Shapes flowing through the readability pipeline:
 * annotated tokens -> token features -> sentence features -> document features.
 *
 * Every nullable aggregate is null exactly when its contributing set is empty.
 */

/** One token as produced by the upstream annotation pipeline. Read-only. */
export interface AnnotatedToken {
  text: string;
  lemma: string;
  pos: string;            // coarse UD part of speech: NOUN, PROPN, VERB, ...
  tag: string;            // fine-grained tag, e.g. "WW|pv|tgw|ev"
  dep: string;            // dependency label, e.g. "nsubj", "conj", "aux:pass"
  index: number;          // 0-based position within the sentence
  head: number;           // sentence index of the head; the root points at itself
  entType: string | null; // named-entity label, null outside entities
  isPunct: boolean;
  whitespace: string;     // trailing whitespace, "" or " "
}

export interface AnnotatedSentence {
  tokens: AnnotatedToken[];
}

export type SemanticType = "concrete" | "abstract" | "undefined" | "unknown";

/** Semantic types a lexicon can assign; "unknown" only comes from classification. */
export type LexiconSemanticType = Exclude<SemanticType, "unknown">;

export type DifficultyLevel = 1 | 2 | 3 | 4;

export type GrammaticalPerson = "first" | "second" | "third";

export interface TokenFeatures {
  text: string;
  index: number;
  isNoun: boolean;
  isFiniteVerb: boolean;
  isContentWord: boolean;
  isContentWordExcludingProperNouns: boolean;
  heads: number[];
  dependencyLength: number;
  semanticType: SemanticType | null;
  wordFrequency: number | null;
  pronounPerson: GrammaticalPerson | null;
}

/** Inclusive token range within a sentence, with the covered text. */
export interface TokenSpan {
  start: number;
  end: number;
  text: string;
}

export interface DependencyEntry {
  token: string;
  depLength: number;
  heads: string[];
}

export interface PronounsByPerson {
  first: string[];
  second: string[];
  third: string[];
}

export interface WordFrequencyEntry {
  word: string;
  frequency: number;
}

/** The four features the scoring formula consumes. */
export interface ScoringFeatures {
  meanLogFrequency: number | null;
  maxDependencyLength: number | null;
  contentWordsPerClause: number | null;
  proportionOfConcreteNouns: number | null;
}

export interface ScoreResult {
  score: number | null;
  level: DifficultyLevel | null;
}

export interface SentenceFeatures extends ScoringFeatures, ScoreResult {
  text: string;
  tokenCount: number;
  concreteNouns: string[];
  abstractNouns: string[];
  undefinedNouns: string[];
  unknownNouns: string[];
  contentWords: string[];
  finiteVerbs: string[];
  pronouns: PronounsByPerson;
  hasPassive: boolean;
  passives: TokenSpan[];
  hasSubordinateClause: boolean;
  subordinateClauses: TokenSpan[];
  dependencies: DependencyEntry[];
  leastFrequentWords: WordFrequencyEntry[];
}

export interface DocumentFeatures extends ScoringFeatures, ScoreResult {
  sentenceCount: number;
  minScore: number | null;
  maxScore: number | null;
  meanSentenceScore: number | null;
  compoundFrequencyAdjustment: boolean;
  sentences: SentenceFeatures[];
}

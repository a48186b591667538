/**
 * TokenClassifier: derives per-token features in the context of the
 * token's sentence: content word, noun, finite verb, semantic type, word
 * frequency, effective heads and dependency length.
 *
 * Every feature is computed at most once per classifier instance.
 */

import {
  ABSTRACT_ENTITY_TYPES,
  CLASSIFIER_DEFAULTS,
  CONCRETE_ENTITY_TYPES,
  CONTENT_POS,
  DEP,
  NOMINAL_SUBJECT_DEPS,
  NOUN_POS,
  POS,
  SUBORDINATE_CLAUSE_DEPS,
} from "../config/constants";
import { DEFAULT_ANALYSIS_OPTIONS, type AnalysisOptions } from "../config/AnalysisOptions";
import { AnnotationContractError } from "../errors";
import { Memo } from "../utils/memo";
import type { Lexicon } from "./Lexicon";
import type {
  AnnotatedSentence,
  AnnotatedToken,
  GrammaticalPerson,
  SemanticType,
  TokenFeatures,
} from "./ReadabilityAnalysis.types";

export type ClassifierOptions = Pick<AnalysisOptions, "compoundFrequencyAdjustment">;

/**
 * Structural view of one sentence shared by its token classifiers:
 * children per token and the first member of every coordination chain.
 * Construction checks the head contract.
 */
export class SentenceGraph {
  readonly tokens: readonly AnnotatedToken[];
  private readonly childIndices: number[][];
  private readonly chainRoots: number[];

  constructor(sentence: AnnotatedSentence, sentenceIndex?: number) {
    this.tokens = sentence.tokens;
    const n = this.tokens.length;

    this.tokens.forEach((token, position) => {
      if (token.index !== position) {
        throw AnnotationContractError.indexMismatch(position, token.index, {
          operation: "SentenceGraph",
          sentenceIndex,
        });
      }
      if (!Number.isInteger(token.head) || token.head < 0 || token.head >= n) {
        throw AnnotationContractError.headOutOfRange(position, token.head, n, {
          operation: "SentenceGraph",
          sentenceIndex,
        });
      }
    });

    this.childIndices = this.tokens.map(() => []);
    for (const token of this.tokens) {
      if (token.head !== token.index) this.childIndices[token.head].push(token.index);
    }
    this.chainRoots = this.tokens.map((token) => this.walkToFirstConjunct(token.index));
  }

  get length(): number {
    return this.tokens.length;
  }

  token(index: number): AnnotatedToken {
    return this.tokens[index];
  }

  children(index: number): readonly number[] {
    return this.childIndices[index];
  }

  /** First member of the coordination the token belongs to (itself if none). */
  firstConjunct(index: number): number {
    return this.chainRoots[index];
  }

  /** Other members of the coordination headed by the same first conjunct, in sentence order. */
  conjuncts(index: number): number[] {
    const root = this.chainRoots[index];
    const members: number[] = [];
    for (const token of this.tokens) {
      if (token.index === index) continue;
      if (token.index === root || (token.dep === DEP.CONJ && this.chainRoots[token.index] === root)) {
        members.push(token.index);
      }
    }
    return members;
  }

  /** Walk up through "conj" relations; bounded so a malformed cycle cannot loop forever. */
  private walkToFirstConjunct(index: number): number {
    let current = index;
    for (let steps = 0; steps < this.tokens.length; steps++) {
      const token = this.tokens[current];
      if (token.dep !== DEP.CONJ || token.head === current) break;
      current = token.head;
    }
    return current;
  }
}

function nonPunctuationCount(graph: SentenceGraph, start: number, end: number): number {
  let count = 0;
  for (let i = start; i < end; i++) {
    if (!graph.token(i).isPunct) count++;
  }
  return count;
}

function personFromTag(tag: string): GrammaticalPerson | null {
  const segment = tag.split("|").slice(1).find((part) => /^[123]/.test(part));
  switch (segment?.charAt(0)) {
    case "1":
      return "first";
    case "2":
      return "second";
    case "3":
      return "third";
    default:
      return null;
  }
}

interface DerivedFeatures {
  isContentWord: boolean;
  heads: readonly number[];
  dependencyLength: number;
  semanticType: SemanticType | null;
  wordFrequency: number | null;
  isSubordinateClauseHead: boolean;
}

export class TokenClassifier {
  readonly token: AnnotatedToken;
  private readonly memo = new Memo<DerivedFeatures>();

  constructor(
    readonly graph: SentenceGraph,
    index: number,
    private readonly lexicon: Lexicon,
    private readonly options: ClassifierOptions = DEFAULT_ANALYSIS_OPTIONS
  ) {
    this.token = graph.token(index);
  }

  get index(): number {
    return this.token.index;
  }

  /** Lowercased surface form, used for lookups and reported word lists. */
  get word(): string {
    return this.token.text.toLowerCase();
  }

  get isPunct(): boolean {
    return this.token.isPunct;
  }

  get isNoun(): boolean {
    return NOUN_POS.has(this.token.pos);
  }

  get isFiniteVerb(): boolean {
    return this.token.tag.includes(CLASSIFIER_DEFAULTS.FINITE_VERB_TAG);
  }

  get isContentWord(): boolean {
    return this.memo.get("isContentWord", () => {
      const { pos, tag, dep } = this.token;
      if (tag.startsWith(CLASSIFIER_DEFAULTS.NUMERAL_TAG_PREFIX)) return false;
      if (dep === DEP.COPULA) return false;
      if (CONTENT_POS.has(pos)) return true;
      return pos === POS.ADV && this.lexicon.isMannerAdverb(this.word);
    });
  }

  get isContentWordExcludingProperNouns(): boolean {
    return this.isContentWord && this.token.pos !== POS.PROPN;
  }

  get isPassiveAuxiliary(): boolean {
    return this.token.dep === DEP.PASSIVE_AUX;
  }

  get pronounPerson(): GrammaticalPerson | null {
    return this.token.pos === POS.PRON ? personFromTag(this.token.tag) : null;
  }

  get children(): readonly number[] {
    return this.graph.children(this.index);
  }

  /**
   * Effective heads, never empty. A conjunct takes the head of the first
   * conjunct of its chain instead of its annotated head. A nominal subject
   * whose head is coordinated also depends on every coordinated predicate.
   */
  get heads(): readonly number[] {
    return this.memo.get("heads", () => {
      const head =
        this.token.dep === DEP.CONJ
          ? this.graph.token(this.graph.firstConjunct(this.index)).head
          : this.token.head;

      if (!NOMINAL_SUBJECT_DEPS.has(this.token.dep)) return [head];
      return [head, ...this.graph.conjuncts(head).filter((i) => i !== this.index)];
    });
  }

  /**
   * Non-punctuation tokens between this token and its head, maximised over
   * all effective heads. Adjacent tokens and punctuation score 0.
   */
  get dependencyLength(): number {
    return this.memo.get("dependencyLength", () => {
      if (this.isPunct) return 0;
      let longest = 0;
      for (const head of this.heads) {
        const start = Math.min(this.index, head);
        const end = Math.max(this.index, head);
        longest = Math.max(longest, nonPunctuationCount(this.graph, start, end) - 1);
      }
      return longest;
    });
  }

  /**
   * Nouns: word, then lemma, then entity type, else "unknown".
   * Unit symbols (SPEC tag): "concrete" when known, otherwise not applicable.
   */
  get semanticType(): SemanticType | null {
    return this.memo.get("semanticType", () => {
      if (this.isNoun) {
        const listed = this.lexicon.semanticType(this.token.text, this.token.lemma);
        if (listed) return listed;
        const ent = this.token.entType;
        if (ent && CONCRETE_ENTITY_TYPES.has(ent)) return "concrete";
        if (ent && ABSTRACT_ENTITY_TYPES.has(ent)) return "abstract";
        return "unknown";
      }
      if (this.token.tag.startsWith(CLASSIFIER_DEFAULTS.SPEC_TAG_PREFIX)) {
        return this.lexicon.isMeasurementUnit(this.token.text) ? "concrete" : null;
      }
      return null;
    });
  }

  /** Zipf frequency for non-proper content words outside the skip-list. */
  get wordFrequency(): number | null {
    return this.memo.get("wordFrequency", () => {
      if (!this.isContentWordExcludingProperNouns) return null;
      if (this.lexicon.isSkipped(this.word) || this.lexicon.isSkipped(this.token.lemma)) return null;

      const lookup = this.options.compoundFrequencyAdjustment
        ? this.lexicon.compoundHead(this.word) ?? this.word
        : this.word;
      return this.lexicon.frequency(lookup) ?? CLASSIFIER_DEFAULTS.UNKNOWN_WORD_FREQUENCY;
    });
  }

  /**
   * Relative, adverbial or complement clause; a generic clausal modifier
   * only when it or one of its direct dependents is a finite verb.
   */
  get isSubordinateClauseHead(): boolean {
    return this.memo.get("isSubordinateClauseHead", () => {
      const { dep } = this.token;
      if (SUBORDINATE_CLAUSE_DEPS.has(dep)) return true;
      if (dep !== DEP.CLAUSAL_MODIFIER) return false;
      if (this.isFiniteVerb) return true;
      return this.children.some((child) =>
        this.graph.token(child).tag.includes(CLASSIFIER_DEFAULTS.FINITE_VERB_TAG)
      );
    });
  }

  /** How often a memoized feature was computed; exposed for tests. */
  computeCount(feature: keyof DerivedFeatures): number {
    return this.memo.computeCount(feature);
  }

  toFeatures(): TokenFeatures {
    return {
      text: this.token.text,
      index: this.index,
      isNoun: this.isNoun,
      isFiniteVerb: this.isFiniteVerb,
      isContentWord: this.isContentWord,
      isContentWordExcludingProperNouns: this.isContentWordExcludingProperNouns,
      heads: [...this.heads],
      dependencyLength: this.dependencyLength,
      semanticType: this.semanticType,
      wordFrequency: this.wordFrequency,
      pronounPerson: this.pronounPerson,
    };
  }
}

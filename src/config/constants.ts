/**
 * Centralized constants for the readability plugin.
 * Linguistic label sets follow Universal Dependencies and the CGN/Alpino
 * tagset the Dutch annotation models emit.
 */

export const CLASSIFIER_DEFAULTS = {
  /** Zipf value assigned to content words absent from the frequency table */
  UNKNOWN_WORD_FREQUENCY: 1.3555,
  /** Fine-tag marker for finite verbs ("persoonsvorm") */
  FINITE_VERB_TAG: "WW|pv",
  /** Fine-tag prefix for numerals ("telwoord") */
  NUMERAL_TAG_PREFIX: "TW",
  /** Fine-tag prefix for special tokens such as unit symbols */
  SPEC_TAG_PREFIX: "SPEC",
} as const;

export const POS = {
  NOUN: "NOUN",
  PROPN: "PROPN",
  VERB: "VERB",
  ADJ: "ADJ",
  ADV: "ADV",
  PRON: "PRON",
} as const;

export const DEP = {
  CONJ: "conj",
  COPULA: "cop",
  PASSIVE_AUX: "aux:pass",
  CLAUSAL_MODIFIER: "acl",
} as const;

export const NOUN_POS: ReadonlySet<string> = new Set([POS.NOUN, POS.PROPN]);

export const CONTENT_POS: ReadonlySet<string> = new Set([POS.NOUN, POS.PROPN, POS.VERB, POS.ADJ]);

export const NOMINAL_SUBJECT_DEPS: ReadonlySet<string> = new Set(["nsubj", "nsubj:pass"]);

/** Relative, adverbial and complement clauses */
export const SUBORDINATE_CLAUSE_DEPS: ReadonlySet<string> = new Set(["acl:relcl", "advcl", "ccomp"]);

export const CONCRETE_ENTITY_TYPES: ReadonlySet<string> = new Set(["PERSON", "PER", "GPE", "LOC"]);

export const ABSTRACT_ENTITY_TYPES: ReadonlySet<string> = new Set(["ORG"]);

export const DOCUMENT_DEFAULTS = {
  /** Words listed per sentence by leastFrequentWords() */
  LEAST_FREQUENT_WORDS: 5,
} as const;

export const ANNOTATOR_DEFAULTS = {
  TIMEOUT_MS: 20_000,
  MAX_TEXT_CHARS: 200_000,
  USER_AGENT: "plugin-dutch-readability/0.x",
} as const;

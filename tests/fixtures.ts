import { InMemoryLexicon } from "../src/services/Lexicon";
import type { AnnotatedSentence, AnnotatedToken } from "../src/services/ReadabilityAnalysis.types";

/** [text, pos, tag, head, dep, extras] */
export type TokenSpec = [string, string, string, number, string, Partial<AnnotatedToken>?];

/**
 * Build an annotated sentence; indices follow position, lemma defaults to the
 * lowercased text and no whitespace is put before punctuation.
 */
export function sentence(...specs: TokenSpec[]): AnnotatedSentence {
  const tokens = specs.map(([text, pos, tag, head, dep, extras], index): AnnotatedToken => {
    const nextIsPunct = specs[index + 1]?.[1] === "PUNCT";
    return {
      text,
      lemma: text.toLowerCase(),
      pos,
      tag,
      dep,
      index,
      head,
      entType: null,
      isPunct: pos === "PUNCT",
      whitespace: nextIsPunct || index === specs.length - 1 ? "" : " ",
      ...extras,
    };
  });
  return { tokens };
}

export const FINITE = "WW|pv|tgw|ev";
export const NOUN_TAG = "N|soort|ev|basis|zijd|stan";
export const DET_TAG = "LID|bep|stan|rest";

export function testLexicon(): InMemoryLexicon {
  return new InMemoryLexicon({
    nouns: {
      kat: { type: "concrete" },
      mat: { type: "concrete" },
      huis: { type: "concrete" },
      hond: { type: "concrete" },
      veld: { type: "concrete" },
      voetbalveld: { type: "concrete", head: "veld" },
      idee: { type: "abstract" },
      besluit: { type: "abstract" },
      hart: { type: "undefined" },
      dag: { type: "undefined" },
    },
    frequencies: {
      kat: 4.52,
      zit: 5.47,
      mat: 3.64,
      veld: 4.57,
      voetbalveld: 3.05,
      huis: 5.62,
      mooie: 4.8,
      dag: 5.5,
    },
    skipList: ["hebben"],
    mannerAdverbs: ["snel"],
    measurementUnits: ["km"],
  });
}

/** "De kat zit op de mat." */
export function catOnMat(): AnnotatedSentence {
  return sentence(
    ["De", "DET", DET_TAG, 1, "det"],
    ["kat", "NOUN", NOUN_TAG, 2, "nsubj"],
    ["zit", "VERB", FINITE, 2, "root"],
    ["op", "ADP", "VZ|init", 5, "case"],
    ["de", "DET", DET_TAG, 5, "det"],
    ["mat", "NOUN", NOUN_TAG, 2, "obl"],
    [".", "PUNCT", "LET", 2, "punct"]
  );
}

/** "Het huis werd gebouwd en verkocht." */
export function passiveWithCoordination(): AnnotatedSentence {
  return sentence(
    ["Het", "DET", DET_TAG, 1, "det"],
    ["huis", "NOUN", NOUN_TAG, 3, "nsubj:pass"],
    ["werd", "AUX", "WW|pv|verl|ev", 3, "aux:pass"],
    ["gebouwd", "VERB", "WW|vd|vrij|zonder", 3, "root"],
    ["en", "CCONJ", "VG|neven", 5, "cc"],
    ["verkocht", "VERB", "WW|vd|vrij|zonder", 3, "conj"],
    [".", "PUNCT", "LET", 3, "punct"]
  );
}

/** "Ik denk dat jij gelijk hebt." */
export function complementClause(): AnnotatedSentence {
  return sentence(
    ["Ik", "PRON", "VNW|pers|pron|nomin|vol|1|ev", 1, "nsubj"],
    ["denk", "VERB", FINITE, 1, "root"],
    ["dat", "SCONJ", "VG|onder", 5, "mark"],
    ["jij", "PRON", "VNW|pers|pron|nomin|vol|2v|ev", 5, "nsubj"],
    ["gelijk", "ADJ", "ADJ|vrij|basis|zonder", 5, "obj"],
    ["hebt", "VERB", "WW|pv|tgw|met-t", 1, "ccomp", { lemma: "hebben" }],
    [".", "PUNCT", "LET", 1, "punct"]
  );
}

/** "Een mooie dag." */
export function verbless(): AnnotatedSentence {
  return sentence(
    ["Een", "DET", "LID|onbep|stan|agr", 2, "det"],
    ["mooie", "ADJ", "ADJ|prenom|basis|met-e|stan", 2, "amod"],
    ["dag", "NOUN", NOUN_TAG, 2, "root"],
    [".", "PUNCT", "LET", 2, "punct"]
  );
}

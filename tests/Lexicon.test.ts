import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  DEFAULT_LEXICON_DIR,
  InMemoryLexicon,
  LEXICON_FILES,
  getLexicon,
  loadLexicon,
  parseWordList,
} from "../src/services/Lexicon";
import { ErrorCode, LexiconError } from "../src/errors";

const VALID_FILES: Record<string, string> = {
  [LEXICON_FILES.nouns]: JSON.stringify({ Kat: { type: "concrete" }, voetbalveld: { type: "concrete", head: "veld" } }),
  [LEXICON_FILES.frequencies]: JSON.stringify({ kat: 4.52, veld: 4.57 }),
  [LEXICON_FILES.skipList]: "# skipped\nhebben\n\n",
  [LEXICON_FILES.mannerAdverbs]: "snel\n",
  [LEXICON_FILES.measurementUnits]: "km\n",
};

async function writeLexiconDir(dir: string, overrides: Record<string, string | null> = {}): Promise<void> {
  const files = { ...VALID_FILES, ...overrides };
  for (const [name, content] of Object.entries(files)) {
    if (content !== null) await writeFile(join(dir, name), content, "utf-8");
  }
}

async function lexiconErrorOf(promise: Promise<unknown>): Promise<LexiconError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof LexiconError) return err;
    throw err;
  }
  throw new Error("expected a LexiconError");
}

describe("InMemoryLexicon", () => {
  const lexicon = new InMemoryLexicon({
    nouns: { kat: { type: "concrete" }, Idee: { type: "abstract" }, voetbalveld: { type: "concrete", head: "veld" } },
    frequencies: { Kat: 4.52 },
    skipList: ["Hebben"],
    mannerAdverbs: ["snel"],
    measurementUnits: ["km"],
  });

  it("should look up semantic types case-insensitively", () => {
    expect(lexicon.semanticType("KAT", "")).toBe("concrete");
    expect(lexicon.semanticType("idee", "idee")).toBe("abstract");
  });

  it("should fall back to the lemma for semantic types", () => {
    expect(lexicon.semanticType("katten", "kat")).toBe("concrete");
    expect(lexicon.semanticType("honden", "hond")).toBeNull();
  });

  it("should return compound heads only for registered compounds", () => {
    expect(lexicon.compoundHead("voetbalveld")).toBe("veld");
    expect(lexicon.compoundHead("kat")).toBeNull();
  });

  it("should return frequencies or null", () => {
    expect(lexicon.frequency("kat")).toBe(4.52);
    expect(lexicon.frequency("muis")).toBeNull();
  });

  it("should answer list membership", () => {
    expect(lexicon.isSkipped("hebben")).toBe(true);
    expect(lexicon.isMannerAdverb("Snel")).toBe(true);
    expect(lexicon.isMeasurementUnit("km")).toBe(true);
    expect(lexicon.isMeasurementUnit("kat")).toBe(false);
  });
});

describe("parseWordList", () => {
  it("should skip blank lines and comments", () => {
    expect(parseWordList("# header\nsnel\r\n\n  rustig  \n#x\n")).toEqual(["snel", "rustig"]);
  });
});

describe("loadLexicon", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "lexicon-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should load all five tables", async () => {
    await writeLexiconDir(dir);
    const lexicon = await loadLexicon(dir);

    expect(lexicon.semanticType("kat", "kat")).toBe("concrete");
    expect(lexicon.compoundHead("voetbalveld")).toBe("veld");
    expect(lexicon.frequency("veld")).toBe(4.57);
    expect(lexicon.isSkipped("hebben")).toBe(true);
    expect(lexicon.isSkipped("# skipped")).toBe(false);
    expect(lexicon.isMannerAdverb("snel")).toBe(true);
    expect(lexicon.isMeasurementUnit("km")).toBe(true);
    expect(lexicon.size).toEqual({ nouns: 2, frequencies: 2 });
  });

  it("should fail on a missing file", async () => {
    await writeLexiconDir(dir, { [LEXICON_FILES.frequencies]: null });
    const err = await lexiconErrorOf(loadLexicon(dir));

    expect(err.code).toBe(ErrorCode.LEXICON_FILE_MISSING);
    expect(err.context.file).toBe(join(dir, LEXICON_FILES.frequencies));
    expect(err.isRetryable).toBe(false);
  });

  it("should fail on invalid JSON", async () => {
    await writeLexiconDir(dir, { [LEXICON_FILES.nouns]: "{ kat: concrete" });
    const err = await lexiconErrorOf(loadLexicon(dir));

    expect(err.code).toBe(ErrorCode.LEXICON_FILE_MALFORMED);
    expect(err.message).toBe(`Malformed lexicon file ${join(dir, LEXICON_FILES.nouns)}: invalid JSON`);
  });

  it("should fail on an unknown semantic type", async () => {
    await writeLexiconDir(dir, { [LEXICON_FILES.nouns]: JSON.stringify({ kat: { type: "vague" } }) });
    const err = await lexiconErrorOf(loadLexicon(dir));

    expect(err.code).toBe(ErrorCode.LEXICON_FILE_MALFORMED);
    expect(err.message).toContain('at "kat.type"');
  });

  it("should fail on a negative frequency", async () => {
    await writeLexiconDir(dir, { [LEXICON_FILES.frequencies]: JSON.stringify({ kat: -1 }) });
    const err = await lexiconErrorOf(loadLexicon(dir));

    expect(err.code).toBe(ErrorCode.LEXICON_FILE_MALFORMED);
    expect(err.context.file).toBe(join(dir, LEXICON_FILES.frequencies));
  });
});

describe("getLexicon", () => {
  it("should share one load per directory", async () => {
    const first = getLexicon(DEFAULT_LEXICON_DIR);
    const second = getLexicon(DEFAULT_LEXICON_DIR);
    expect(second).toBe(first);

    const lexicon = await first;
    expect(lexicon.semanticType("voetbalveld", "voetbalveld")).toBe("concrete");
    expect(lexicon.compoundHead("voetbalveld")).toBe("veld");
    expect(lexicon.frequency("kat")).toBe(4.52);
  });

  it("should retry a directory whose load failed", async () => {
    const dir = await mkdtemp(join(tmpdir(), "lexicon-"));
    try {
      await expect(getLexicon(dir)).rejects.toBeInstanceOf(LexiconError);

      await writeLexiconDir(dir);
      const lexicon = await getLexicon(dir);
      expect(lexicon.frequency("kat")).toBe(4.52);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

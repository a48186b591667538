/**
 * Lexicon. Read-only lookup tables the classifier consults:
 * noun semantic types (+ compound heads), word frequencies, the frequency
 * skip-list, manner adverbs and measurement units.
 *
 * Tables are loaded once per directory and never mutated afterwards.
 * A load either yields a complete lexicon or throws; callers never observe
 * a half-filled table.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { LexiconError } from "../errors";
import { createLogger } from "../utils/logger";
import type { LexiconSemanticType } from "./ReadabilityAnalysis.types";

const log = createLogger({ component: "lexicon" });

export interface Lexicon {
  /** Semantic type by surface word, falling back to the lemma. */
  semanticType(word: string, lemma: string): LexiconSemanticType | null;
  compoundHead(word: string): string | null;
  frequency(word: string): number | null;
  isSkipped(word: string): boolean;
  isMannerAdverb(word: string): boolean;
  isMeasurementUnit(word: string): boolean;
}

export const LEXICON_FILES = {
  nouns: "nouns.json",
  frequencies: "frequencies.json",
  skipList: "frequency-skiplist.txt",
  mannerAdverbs: "manner-adverbs.txt",
  measurementUnits: "measurement-units.txt",
} as const;

/** Bundled tables shipped in the package's data/ directory. */
export const DEFAULT_LEXICON_DIR = fileURLToPath(new URL("../../data", import.meta.url));

const nounEntrySchema = z.object({
  type: z.enum(["concrete", "abstract", "undefined"]),
  head: z.string().min(1).optional(),
});

const nounTableSchema = z.record(z.string(), nounEntrySchema);

const frequencyTableSchema = z.record(
  z.string(),
  z.number().finite().nonnegative()
);

export type NounEntry = z.infer<typeof nounEntrySchema>;

export interface LexiconData {
  nouns: Record<string, NounEntry>;
  frequencies: Record<string, number>;
  skipList: Iterable<string>;
  mannerAdverbs: Iterable<string>;
  measurementUnits: Iterable<string>;
}

const normalizeKey = (word: string): string => word.toLowerCase();

function toSet(words: Iterable<string>): ReadonlySet<string> {
  const set = new Set<string>();
  for (const word of words) set.add(normalizeKey(word));
  return set;
}

function toMap<V>(table: Record<string, V>): ReadonlyMap<string, V> {
  const map = new Map<string, V>();
  for (const [key, value] of Object.entries(table)) {
    map.set(normalizeKey(key), value);
  }
  return map;
}

/**
 * Lexicon over in-memory tables. Keys are matched case-insensitively.
 * Also the injection point for tests.
 */
export class InMemoryLexicon implements Lexicon {
  private readonly nouns: ReadonlyMap<string, NounEntry>;
  private readonly frequencies: ReadonlyMap<string, number>;
  private readonly skipList: ReadonlySet<string>;
  private readonly mannerAdverbs: ReadonlySet<string>;
  private readonly measurementUnits: ReadonlySet<string>;

  constructor(data: Partial<LexiconData> = {}) {
    this.nouns = toMap(data.nouns ?? {});
    this.frequencies = toMap(data.frequencies ?? {});
    this.skipList = toSet(data.skipList ?? []);
    this.mannerAdverbs = toSet(data.mannerAdverbs ?? []);
    this.measurementUnits = toSet(data.measurementUnits ?? []);
  }

  semanticType(word: string, lemma: string): LexiconSemanticType | null {
    return (
      this.nouns.get(normalizeKey(word))?.type ??
      this.nouns.get(normalizeKey(lemma))?.type ??
      null
    );
  }

  compoundHead(word: string): string | null {
    return this.nouns.get(normalizeKey(word))?.head ?? null;
  }

  frequency(word: string): number | null {
    return this.frequencies.get(normalizeKey(word)) ?? null;
  }

  isSkipped(word: string): boolean {
    return this.skipList.has(normalizeKey(word));
  }

  isMannerAdverb(word: string): boolean {
    return this.mannerAdverbs.has(normalizeKey(word));
  }

  isMeasurementUnit(word: string): boolean {
    return this.measurementUnits.has(normalizeKey(word));
  }

  get size(): { nouns: number; frequencies: number } {
    return { nouns: this.nouns.size, frequencies: this.frequencies.size };
  }
}

async function readLexiconFile(dir: string, file: string): Promise<string> {
  const path = join(dir, file);
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    throw LexiconError.fileMissing(path, err instanceof Error ? err : undefined, {
      operation: "loadLexicon",
    });
  }
}

async function readJsonTable<S extends z.ZodTypeAny>(
  dir: string,
  file: string,
  schema: S
): Promise<z.infer<S>> {
  const raw = await readLexiconFile(dir, file);
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw LexiconError.malformed(join(dir, file), "invalid JSON", err instanceof Error ? err : undefined, {
      operation: "loadLexicon",
    });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join(".")}"` : "";
    throw LexiconError.malformed(
      join(dir, file),
      `${issue?.message ?? "schema mismatch"}${where}`,
      undefined,
      { operation: "loadLexicon" }
    );
  }
  return result.data;
}

/** One entry per line; blank lines and lines starting with # are ignored. */
export function parseWordList(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

async function readWordList(dir: string, file: string): Promise<string[]> {
  return parseWordList(await readLexiconFile(dir, file));
}

/**
 * Read all five tables from a directory. Every file is read and validated
 * before the lexicon is constructed.
 */
export async function loadLexicon(dir: string = DEFAULT_LEXICON_DIR): Promise<InMemoryLexicon> {
  const started = Date.now();
  const [nouns, frequencies, skipList, mannerAdverbs, measurementUnits] = await Promise.all([
    readJsonTable(dir, LEXICON_FILES.nouns, nounTableSchema),
    readJsonTable(dir, LEXICON_FILES.frequencies, frequencyTableSchema),
    readWordList(dir, LEXICON_FILES.skipList),
    readWordList(dir, LEXICON_FILES.mannerAdverbs),
    readWordList(dir, LEXICON_FILES.measurementUnits),
  ]);

  const lexicon = new InMemoryLexicon({ nouns, frequencies, skipList, mannerAdverbs, measurementUnits });
  log.info("Lexicon loaded", {
    dir,
    nouns: lexicon.size.nouns,
    frequencies: lexicon.size.frequencies,
    ms: Date.now() - started,
  });
  return lexicon;
}

const loaded = new Map<string, Promise<InMemoryLexicon>>();

/**
 * Process-wide memoized load. Concurrent callers share one read; a failed
 * load is evicted so the next call reads the files again.
 */
export function getLexicon(dir: string = DEFAULT_LEXICON_DIR): Promise<InMemoryLexicon> {
  const cached = loaded.get(dir);
  if (cached) return cached;

  const pending = loadLexicon(dir);
  loaded.set(dir, pending);
  pending.catch((err: unknown) => {
    loaded.delete(dir);
    log.error("Lexicon load failed", { dir }, err);
  });
  return pending;
}

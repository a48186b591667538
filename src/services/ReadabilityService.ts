import { Service, type IAgentRuntime } from "@elizaos/core";
import { z } from "zod";

import { mergeAnalysisOptions, type AnalysisOptions } from "../config/AnalysisOptions";
import { mergeScoringConfig, type ScoringConfig } from "../config/ScoringConfig";
import { AnnotatorNetworkError, ErrorCode, ReadabilityConfigError, ReadabilityError } from "../errors";
import { createLogger } from "../utils/logger";
import type { Annotator } from "./Annotator";
import { analyzeDocument } from "./DocumentAnalyzer";
import { HttpAnnotator } from "./HttpAnnotator";
import { DEFAULT_LEXICON_DIR, getLexicon, type Lexicon } from "./Lexicon";
import { score } from "./ReadabilityScorer";
import { analyzeSentence, type AnalyzerDependencies } from "./SentenceAnalyzer";
import { preprocessText, type InputFormat } from "./TextPreprocessor";
import type {
  AnnotatedSentence,
  DocumentFeatures,
  ScoreResult,
  ScoringFeatures,
  SentenceFeatures,
} from "./ReadabilityAnalysis.types";

const log = createLogger({ component: "ReadabilityService" });

/** Block read from character.settings.readability */
const characterSettingsSchema = z
  .object({
    lexiconDir: z.string().min(1),
    annotatorUrl: z.string().url(),
    annotatorTimeoutMs: z.number().int().positive(),
    scoring: z.unknown(),
    analysis: z.unknown(),
  })
  .partial()
  .strict();

export interface ReadabilitySettings {
  lexiconDir: string;
  annotatorUrl: string | null;
  annotatorTimeoutMs?: number;
  scoring: ScoringConfig;
  analysis: AnalysisOptions;
}

function readStringSetting(runtime: IAgentRuntime, key: string): string | undefined {
  const value: unknown = runtime.getSetting?.(key);
  if (typeof value === "string" && value.trim().length > 0) return value.trim();
  if (typeof value === "boolean") return String(value);
  return undefined;
}

/**
 * Resolve settings: character.settings.readability first, READABILITY_*
 * runtime settings override the scalar options. Any malformed value is fatal.
 */
export function resolveReadabilitySettings(runtime: IAgentRuntime): ReadabilitySettings {
  const charSettings: Record<string, unknown> = runtime.character?.settings ?? {};
  const parsed = characterSettingsSchema.safeParse(charSettings.readability ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw ReadabilityConfigError.invalidField(
      ["readability", ...(issue?.path ?? [])].join("."),
      issue?.message ?? "invalid value",
      charSettings.readability,
      { operation: "resolveReadabilitySettings" }
    );
  }
  const block = parsed.data;

  const analysisOverrides: Record<string, unknown> = {};
  const compound = readStringSetting(runtime, "READABILITY_COMPOUND_ADJUSTMENT");
  if (compound !== undefined) analysisOverrides.compoundFrequencyAdjustment = compound;
  const clausePolicy = readStringSetting(runtime, "READABILITY_CLAUSE_POLICY");
  if (clausePolicy !== undefined) analysisOverrides.clauseCountPolicy = clausePolicy;

  const analysis =
    block.analysis === undefined
      ? analysisOverrides
      : typeof block.analysis === "object" && block.analysis !== null
        ? { ...block.analysis, ...analysisOverrides }
        : block.analysis;

  return {
    lexiconDir: readStringSetting(runtime, "READABILITY_LEXICON_DIR") ?? block.lexiconDir ?? DEFAULT_LEXICON_DIR,
    annotatorUrl: readStringSetting(runtime, "READABILITY_ANNOTATOR_URL") ?? block.annotatorUrl ?? null,
    annotatorTimeoutMs: block.annotatorTimeoutMs,
    scoring: mergeScoringConfig(block.scoring),
    analysis: mergeAnalysisOptions(analysis),
  };
}

/**
 * ReadabilityService
 * - Owns startup wiring: settings, lexicon load, annotation endpoint.
 * - Startup fails when the lexicon or configuration is unusable.
 * - Analysis itself is pure and safe to call concurrently.
 */
export class ReadabilityService extends Service {
  static override readonly serviceType = "readability";

  override capabilityDescription =
    "Scores the readability of Dutch text (0-100, level 1-4) from word frequency, dependency length, information density and noun concreteness.";

  private lexicon: Lexicon | null = null;
  private annotator: Annotator | null = null;
  private settings: ReadabilitySettings | null = null;

  /** Required by ElizaOS core (service registration). */
  static override async start(runtime: IAgentRuntime): Promise<ReadabilityService> {
    const svc = new ReadabilityService(runtime);
    await svc.initialize(runtime);
    return svc;
  }

  constructor(runtime: IAgentRuntime) {
    super(runtime);
  }

  override async stop(): Promise<void> {
    this.annotator = null;
  }

  async initialize(runtime: IAgentRuntime): Promise<void> {
    const settings = resolveReadabilitySettings(runtime);
    const lexicon = await getLexicon(settings.lexiconDir);

    this.settings = settings;
    this.lexicon = lexicon;
    if (settings.annotatorUrl) {
      this.annotator = new HttpAnnotator({
        endpoint: settings.annotatorUrl,
        timeoutMs: settings.annotatorTimeoutMs,
      });
    }

    log.info("Readability service ready", {
      lexiconDir: settings.lexiconDir,
      annotator: settings.annotatorUrl ?? "none",
      clauseCountPolicy: settings.analysis.clauseCountPolicy,
      compoundFrequencyAdjustment: settings.analysis.compoundFrequencyAdjustment,
    });
  }

  /** Replace the annotation pipeline, e.g. with an in-process parser. */
  setAnnotator(annotator: Annotator | null): void {
    this.annotator = annotator;
  }

  hasAnnotator(): boolean {
    return this.annotator !== null;
  }

  private dependencies(): AnalyzerDependencies {
    if (!this.lexicon || !this.settings) {
      throw new ReadabilityError(
        "Readability service used before initialization",
        ErrorCode.LEXICON_NOT_LOADED,
        { operation: "analyze" }
      );
    }
    return { lexicon: this.lexicon, options: this.settings.analysis, scoring: this.settings.scoring };
  }

  analyzeSentence(sentence: AnnotatedSentence): SentenceFeatures {
    return analyzeSentence(sentence, this.dependencies());
  }

  analyzeDocument(sentences: readonly AnnotatedSentence[]): DocumentFeatures {
    return analyzeDocument(sentences, this.dependencies());
  }

  score(features: ScoringFeatures): ScoreResult {
    return score(features, this.dependencies().scoring);
  }

  /** Preprocess, annotate and analyze raw text. */
  async analyzeText(text: string, opts: { format?: InputFormat } = {}): Promise<DocumentFeatures> {
    const deps = this.dependencies();
    if (!this.annotator) {
      throw AnnotatorNetworkError.notConfigured({ operation: "analyzeText" });
    }
    const clean = preprocessText(text, { format: opts.format });
    const sentences = await this.annotator.annotate(clean);
    return analyzeDocument(sentences, deps);
  }
}

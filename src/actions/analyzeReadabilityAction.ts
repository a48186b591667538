import type { Action, ActionResult, IAgentRuntime, Memory, State, HandlerCallback, HandlerOptions, Content } from "@elizaos/core";
import { getErrorCode, isReadabilityError } from "../errors";
import type { ReadabilityService } from "../services/ReadabilityService";
import type { DocumentFeatures, SentenceFeatures } from "../services/ReadabilityAnalysis.types";
import type { InputFormat } from "../services/TextPreprocessor";
import { createLogger } from "../utils/logger";

const log = createLogger({ component: "AnalyzeReadabilityAction" });

const ACTION_NAME = "ANALYZE_READABILITY";

const LEVEL_LABELS: Record<1 | 2 | 3 | 4, string> = {
  1: "easy",
  2: "fairly easy",
  3: "difficult",
  4: "very difficult",
};

/**
 * Text to analyze: an explicit `content.input` argument, else a quoted
 * passage, else everything after the first colon.
 */
export function extractTextToAnalyze(content: Content): string | null {
  const input: unknown = content.input;
  if (typeof input === "string" && input.trim()) return input.trim();

  const text = content.text ?? "";
  const quoted = text.match(/["“„](.+?)["”]/s);
  if (quoted?.[1]?.trim()) return quoted[1].trim();

  const colon = text.indexOf(":");
  if (colon >= 0) {
    const rest = text.slice(colon + 1).trim();
    if (rest) return rest;
  }
  return null;
}

function parseInputFormat(value: unknown): InputFormat {
  return value === "html" || value === "markdown" ? value : "plain";
}

function formatScore(value: number | null): string {
  return value === null ? "n/a" : value.toFixed(1);
}

/** Highest-scoring sentence; sentences without a score are never the hardest. */
export function hardestSentence(doc: DocumentFeatures): SentenceFeatures | null {
  let hardest: SentenceFeatures | null = null;
  for (const sentence of doc.sentences) {
    if (sentence.score === null) continue;
    if (hardest === null || hardest.score === null || sentence.score > hardest.score) {
      hardest = sentence;
    }
  }
  return hardest;
}

export function summarizeDocument(doc: DocumentFeatures): string {
  const lines: string[] = [];
  if (doc.score === null || doc.level === null) {
    lines.push(`Readability could not be scored (${doc.sentenceCount} sentence(s) analyzed).`);
  } else {
    lines.push(`Readability: ${formatScore(doc.score)}/100, level ${doc.level} (${LEVEL_LABELS[doc.level]}).`);
  }
  lines.push(
    `Sentences: ${doc.sentenceCount} | word frequency ${formatScore(doc.meanLogFrequency)}` +
      ` | dependency length ${formatScore(doc.maxDependencyLength)}` +
      ` | content words/clause ${formatScore(doc.contentWordsPerClause)}` +
      ` | concrete nouns ${formatScore(doc.proportionOfConcreteNouns)}`
  );

  const hardest = doc.sentenceCount > 1 ? hardestSentence(doc) : null;
  if (hardest) {
    lines.push(`Hardest sentence (${formatScore(hardest.score)}): "${hardest.text}"`);
    if (hardest.leastFrequentWords.length > 0) {
      lines.push(`Rare words: ${hardest.leastFrequentWords.map((w) => w.word).join(", ")}`);
    }
  }
  return lines.join("\n");
}

async function reply(callback: HandlerCallback | undefined, text: string): Promise<void> {
  if (callback) {
    await callback({ text, action: ACTION_NAME });
  }
}

export const AnalyzeReadabilityAction: Action = {
  name: ACTION_NAME,
  description: "Score the readability of a Dutch text (0-100) and report its difficulty level (1-4).",
  similes: ["CHECK_READABILITY", "READABILITY_SCORE", "LEESBAARHEID", "SCORE_TEXT_DIFFICULTY"],

  validate: async (_runtime: IAgentRuntime, message: Memory) => {
    const text = (message.content?.text || "").toLowerCase();
    return /\b(readability|readable|leesbaarheid|leesbaar|moeilijkheidsgraad)\b/i.test(text);
  },

  async handler(
    runtime: IAgentRuntime,
    message: Memory,
    _state: State | undefined,
    _options: HandlerOptions | undefined,
    callback: HandlerCallback | undefined
  ): Promise<ActionResult> {
    const service = runtime.getService<ReadabilityService>("readability");
    if (!service) {
      const text = "Readability service is not available.";
      await reply(callback, text);
      return { success: false, text };
    }

    const input = extractTextToAnalyze(message.content);
    if (!input) {
      const text = 'No text to analyze. Put the text in quotes or after a colon, e.g. readability: "De kat zit op de mat."';
      await reply(callback, text);
      return { success: false, text };
    }

    const format = parseInputFormat(message.content.format);

    try {
      const doc = await service.analyzeText(input, { format });
      const text = summarizeDocument(doc);
      await reply(callback, text);
      return {
        success: true,
        text,
        data: {
          score: doc.score,
          level: doc.level,
          sentenceCount: doc.sentenceCount,
          meanLogFrequency: doc.meanLogFrequency,
          maxDependencyLength: doc.maxDependencyLength,
          contentWordsPerClause: doc.contentWordsPerClause,
          proportionOfConcreteNouns: doc.proportionOfConcreteNouns,
          minScore: doc.minScore,
          maxScore: doc.maxScore,
        },
      };
    } catch (err) {
      if (!isReadabilityError(err)) throw err;
      log.warn("Readability analysis failed", { code: getErrorCode(err) }, err);
      const text = `Readability analysis failed: ${err.toUserMessage()}`;
      await reply(callback, text);
      return { success: false, text, data: { code: err.code } };
    }
  },
};

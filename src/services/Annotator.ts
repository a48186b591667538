/**
 * Annotator: the upstream pipeline that turns raw text into sentences of
 * annotated tokens. The engine never tokenizes or parses by itself.
 */

import { z } from "zod";
import { AnnotationContractError } from "../errors";
import type { AnnotatedSentence, AnnotatedToken } from "./ReadabilityAnalysis.types";

export interface Annotator {
  annotate(text: string): Promise<AnnotatedSentence[]>;
}

/**
 * Wire format of a spaCy-style annotation service. Heads are sentence-local
 * indices; an empty entity label means "no entity".
 */
export const wireTokenSchema = z.object({
  text: z.string(),
  lemma: z.string(),
  pos: z.string(),
  tag: z.string(),
  dep: z.string(),
  head: z.number().int().nonnegative(),
  ent_type: z.string().nullable().optional(),
  is_punct: z.boolean(),
  whitespace: z.string().default(""),
});

export const annotationResponseSchema = z.object({
  sentences: z.array(z.object({ tokens: z.array(wireTokenSchema) })),
});

export type WireToken = z.infer<typeof wireTokenSchema>;
export type AnnotationResponse = z.infer<typeof annotationResponseSchema>;

function toAnnotatedToken(wire: WireToken, index: number): AnnotatedToken {
  return {
    text: wire.text,
    lemma: wire.lemma,
    pos: wire.pos,
    tag: wire.tag,
    dep: wire.dep,
    index,
    head: wire.head,
    entType: wire.ent_type ? wire.ent_type : null,
    isPunct: wire.is_punct,
    whitespace: wire.whitespace,
  };
}

/**
 * Validate an untyped response body and map it to annotated sentences.
 * Empty sentences are dropped.
 */
export function parseAnnotationResponse(body: unknown, source: string): AnnotatedSentence[] {
  const parsed = annotationResponseSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join(".")}"` : "";
    throw AnnotationContractError.invalidResponse(source, `${issue?.message ?? "schema mismatch"}${where}`, {
      operation: "parseAnnotationResponse",
    });
  }

  return parsed.data.sentences
    .filter((sentence) => sentence.tokens.length > 0)
    .map((sentence) => ({ tokens: sentence.tokens.map(toAnnotatedToken) }));
}

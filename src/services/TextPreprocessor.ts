/**
 * TextPreprocessor: cleanup before annotation.
 * Uses linkedom for lightweight DOM parsing of HTML input and mdast for
 * Markdown input.
 *
 * Only running text counts toward readability: paragraphs, blockquotes and
 * list items. Headings, tables, code and navigation are dropped.
 */

import { parseHTML } from "linkedom";
import { fromMarkdown } from "mdast-util-from-markdown";
import type { Nodes } from "mdast";

export type InputFormat = "plain" | "html" | "markdown";

export interface PreprocessOptions {
  format?: InputFormat;
}

/** Elements whose text is kept; nested matches are read once via their outermost ancestor */
const TEXT_BLOCK_SELECTOR = "p, blockquote, li";

const QUOTEMARKS = /[«»‘’‛“”„‟‹›]/g;

/** Curly quotes, guillemets and low-9 quotes become straight double quotes. */
export function normalizeQuotemarks(text: string): string {
  return text.replace(QUOTEMARKS, '"');
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function extractTextFromHtml(html: string): string {
  const source = /<html[\s>]/i.test(html)
    ? html
    : `<!doctype html><html><head></head><body>${html}</body></html>`;
  const { document } = parseHTML(source);

  const blocks = Array.from(document.querySelectorAll(TEXT_BLOCK_SELECTOR)).filter(
    (el) => !el.parentElement?.closest(TEXT_BLOCK_SELECTOR)
  );

  if (blocks.length === 0) {
    return document.body?.textContent ?? "";
  }
  return blocks.map((el) => el.textContent ?? "").join(" ");
}

/** Top-level Markdown blocks whose text is kept */
const MARKDOWN_TEXT_BLOCKS: ReadonlySet<Nodes["type"]> = new Set(["paragraph", "blockquote", "list"]);

/** Text leaves of a Markdown node, space-joined. Inline code and images contribute nothing. */
function markdownText(node: Nodes): string {
  if (node.type === "text") return node.value;
  if (!("children" in node)) return "";
  const parts: string[] = [];
  for (const child of node.children) {
    parts.push(markdownText(child));
  }
  return parts.join(" ");
}

export function extractTextFromMarkdown(markdown: string): string {
  const root = fromMarkdown(markdown);
  return root.children
    .filter((node) => MARKDOWN_TEXT_BLOCKS.has(node.type))
    .map((node) => markdownText(node))
    .join(" ");
}

function extract(text: string, format: InputFormat): string {
  switch (format) {
    case "html":
      return extractTextFromHtml(text);
    case "markdown":
      return extractTextFromMarkdown(text);
    case "plain":
      return text;
  }
}

/**
 * Extract (HTML or Markdown), normalize quotemarks and collapse whitespace.
 */
export function preprocessText(text: string, opts: PreprocessOptions = {}): string {
  return collapseWhitespace(normalizeQuotemarks(extract(text, opts.format ?? "plain")));
}

import { ANNOTATOR_DEFAULTS } from "../config/constants";
import { AnnotationContractError, AnnotatorNetworkError } from "../errors";
import { createLogger } from "../utils/logger";
import { RetryPresets, withRetry, type RetryConfig } from "../utils/retry";
import { parseAnnotationResponse, type Annotator } from "./Annotator";
import type { AnnotatedSentence } from "./ReadabilityAnalysis.types";

const log = createLogger({ component: "HttpAnnotator" });

export interface HttpAnnotatorOptions {
  endpoint: string;
  timeoutMs?: number;
  /** Longer input is rejected, never cut */
  maxTextChars?: number;
  retry?: Partial<RetryConfig>;
  headers?: Record<string, string>;
}

/**
 * HttpAnnotator
 * - POSTs { text } to a spaCy-compatible annotation endpoint.
 * - Timeouts via AbortController; transient failures retried with backoff.
 * - Input over the size limit fails before any request is made.
 * - Response body validated before anything reaches the engine.
 */
export class HttpAnnotator implements Annotator {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly maxTextChars: number;
  private readonly retry: Partial<RetryConfig>;
  private readonly headers: Record<string, string>;

  constructor(opts: HttpAnnotatorOptions) {
    this.endpoint = opts.endpoint;
    this.timeoutMs = opts.timeoutMs ?? ANNOTATOR_DEFAULTS.TIMEOUT_MS;
    this.maxTextChars = opts.maxTextChars ?? ANNOTATOR_DEFAULTS.MAX_TEXT_CHARS;
    this.retry = opts.retry ?? RetryPresets.annotator;
    this.headers = opts.headers ?? {};
  }

  async annotate(text: string): Promise<AnnotatedSentence[]> {
    if (text.length > this.maxTextChars) {
      throw AnnotatorNetworkError.textTooLong(this.endpoint, text.length, this.maxTextChars, {
        operation: "annotate",
      });
    }

    const payload = await withRetry(() => this.post(text), this.retry, "annotate");
    const sentences = parseAnnotationResponse(payload, this.endpoint);
    log.debug("Annotated text", { sentences: sentences.length, chars: text.length });
    return sentences;
  }

  private async post(text: string): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let res: Response;
    try {
      res = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          accept: "application/json",
          "user-agent": ANNOTATOR_DEFAULTS.USER_AGENT,
          ...this.headers,
        },
        body: JSON.stringify({ text }),
        signal: controller.signal,
      });
    } catch (err) {
      if (controller.signal.aborted) {
        throw AnnotatorNetworkError.timeout(this.endpoint, this.timeoutMs, { operation: "annotate" });
      }
      throw AnnotatorNetworkError.connectionFailed(this.endpoint, err instanceof Error ? err : undefined, {
        operation: "annotate",
      });
    } finally {
      clearTimeout(timer);
    }

    if (!res.ok) {
      throw AnnotatorNetworkError.httpError(this.endpoint, res.status, res.statusText, { operation: "annotate" });
    }

    try {
      return await res.json();
    } catch {
      throw AnnotationContractError.invalidResponse(this.endpoint, "body is not JSON", { operation: "annotate" });
    }
  }
}

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { HttpAnnotator } from "../src/services/HttpAnnotator";
import { parseAnnotationResponse } from "../src/services/Annotator";
import { AnnotationContractError, AnnotatorNetworkError, ErrorCode } from "../src/errors";
import { RetryPresets } from "../src/utils/retry";

const ENDPOINT = "http://annotator.test/annotate";

const FAST_RETRY = { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 1, backoffMultiplier: 1 };

const wire = (text: string, pos: string, head: number, dep: string, extra: Record<string, unknown> = {}) => ({
  text,
  lemma: text.toLowerCase(),
  pos,
  tag: pos,
  dep,
  head,
  ent_type: "",
  is_punct: pos === "PUNCT",
  whitespace: " ",
  ...extra,
});

const VALID_BODY = {
  sentences: [
    {
      tokens: [
        wire("Jan", "PROPN", 1, "nsubj", { ent_type: "PERSON" }),
        wire("slaapt", "VERB", 1, "root", { whitespace: "" }),
        wire(".", "PUNCT", 1, "punct", { whitespace: undefined }),
      ],
    },
    { tokens: [] },
  ],
};

function jsonResponse(body: unknown, status = 200, statusText = "OK"): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { "content-type": "application/json" },
  });
}

describe("parseAnnotationResponse", () => {
  it("should map wire tokens and drop empty sentences", () => {
    const sentences = parseAnnotationResponse(VALID_BODY, "test");

    expect(sentences).toHaveLength(1);
    expect(sentences[0].tokens[0]).toEqual({
      text: "Jan",
      lemma: "jan",
      pos: "PROPN",
      tag: "PROPN",
      dep: "nsubj",
      index: 0,
      head: 1,
      entType: "PERSON",
      isPunct: false,
      whitespace: " ",
    });
    expect(sentences[0].tokens[1].entType).toBeNull();
    expect(sentences[0].tokens[2].whitespace).toBe("");
    expect(sentences[0].tokens[2].index).toBe(2);
  });

  it("should reject a token without required fields", () => {
    const body = { sentences: [{ tokens: [{ text: "x" }] }] };
    expect(() => parseAnnotationResponse(body, "test")).toThrow(AnnotationContractError);
  });

  it("should reject a negative head", () => {
    const body = { sentences: [{ tokens: [wire("x", "NOUN", -1, "root")] }] };
    expect(() => parseAnnotationResponse(body, "test")).toThrow('at "sentences.0.tokens.0.head"');
  });
});

describe("HttpAnnotator", () => {
  const mockFetch = vi.fn<typeof fetch>();

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should post the text and parse the response", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(VALID_BODY));
    const annotator = new HttpAnnotator({ endpoint: ENDPOINT, retry: FAST_RETRY });

    const sentences = await annotator.annotate("Jan slaapt.");

    expect(sentences).toHaveLength(1);
    expect(sentences[0].tokens.map((t) => t.text)).toEqual(["Jan", "slaapt", "."]);
    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe(ENDPOINT);
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(JSON.stringify({ text: "Jan slaapt." }));
  });

  it("should retry on 503", async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({}, 503, "Service Unavailable"))
      .mockResolvedValueOnce(jsonResponse(VALID_BODY));
    const annotator = new HttpAnnotator({ endpoint: ENDPOINT, retry: FAST_RETRY });

    await expect(annotator.annotate("Jan slaapt.")).resolves.toHaveLength(1);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it("should not retry on 400", async () => {
    mockFetch.mockResolvedValue(jsonResponse({}, 400, "Bad Request"));
    const annotator = new HttpAnnotator({ endpoint: ENDPOINT, retry: FAST_RETRY });

    const err = await annotator.annotate("x").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AnnotatorNetworkError);
    if (err instanceof AnnotatorNetworkError) {
      expect(err.statusCode).toBe(400);
      expect(err.message).toBe(`HTTP 400 (Bad Request) from ${ENDPOINT}`);
    }
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it("should not retry an invalid body", async () => {
    mockFetch.mockResolvedValue(jsonResponse({ sentences: "none" }));
    const annotator = new HttpAnnotator({ endpoint: ENDPOINT, retry: FAST_RETRY });

    await expect(annotator.annotate("x")).rejects.toBeInstanceOf(AnnotationContractError);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it("should reject a body that is not JSON", async () => {
    mockFetch.mockResolvedValue(new Response("<html>", { status: 200 }));
    const annotator = new HttpAnnotator({ endpoint: ENDPOINT, retry: FAST_RETRY });

    await expect(annotator.annotate("x")).rejects.toThrow(
      `Invalid annotation response from ${ENDPOINT}: body is not JSON`
    );
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it("should reject text over the size limit without a request", async () => {
    const annotator = new HttpAnnotator({ endpoint: ENDPOINT, retry: FAST_RETRY });

    const err = await annotator.annotate("a".repeat(200_001)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AnnotatorNetworkError);
    if (err instanceof AnnotatorNetworkError) {
      expect(err.code).toBe(ErrorCode.ANNOTATOR_TEXT_TOO_LONG);
      expect(err.isRetryable).toBe(false);
      expect(err.message).toBe("Text of 200001 characters exceeds the annotation limit of 200000");
    }
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("should send text at exactly the configured limit unchanged", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(VALID_BODY));
    const annotator = new HttpAnnotator({ endpoint: ENDPOINT, retry: FAST_RETRY, maxTextChars: 11 });

    await annotator.annotate("Jan slaapt.");
    await expect(annotator.annotate("Jan slaapt!!")).rejects.toThrow("exceeds the annotation limit of 11");

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch.mock.calls[0][1]?.body).toBe(JSON.stringify({ text: "Jan slaapt." }));
  });

  it("should retry connection failures up to the limit", async () => {
    mockFetch.mockRejectedValue(new TypeError("fetch failed"));
    const annotator = new HttpAnnotator({ endpoint: ENDPOINT, retry: FAST_RETRY });

    const err = await annotator.annotate("x").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AnnotatorNetworkError);
    if (err instanceof AnnotatorNetworkError) {
      expect(err.code).toBe(ErrorCode.ANNOTATOR_CONNECTION_FAILED);
    }
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it("should time out a hanging request", async () => {
    mockFetch.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );
    const annotator = new HttpAnnotator({ endpoint: ENDPOINT, timeoutMs: 5, retry: RetryPresets.none });

    const err = await annotator.annotate("x").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AnnotatorNetworkError);
    if (err instanceof AnnotatorNetworkError) {
      expect(err.code).toBe(ErrorCode.ANNOTATOR_TIMEOUT);
    }
  });
});

import { ReadabilityError, ErrorCode, type ErrorContext } from "./ReadabilityError";

/**
 * Error for annotation endpoint failures (HTTP, timeouts).
 */
export class AnnotatorNetworkError extends ReadabilityError {
  public readonly statusCode?: number;
  public readonly endpoint?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.ANNOTATOR_CONNECTION_FAILED,
    context: Partial<ErrorContext> & { statusCode?: number; endpoint?: string } = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message, code, context, {
      cause: options?.cause,
      isRetryable: options?.isRetryable ?? true,
    });
    this.name = "AnnotatorNetworkError";
    this.statusCode = context.statusCode;
    this.endpoint = context.endpoint;
  }

  static timeout(endpoint: string, timeoutMs: number, context: Partial<ErrorContext> = {}) {
    return new AnnotatorNetworkError(
      `Request to ${endpoint} timed out after ${timeoutMs}ms`,
      ErrorCode.ANNOTATOR_TIMEOUT,
      { ...context, endpoint },
      { isRetryable: true }
    );
  }

  static connectionFailed(endpoint: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new AnnotatorNetworkError(
      `Failed to connect to ${endpoint}`,
      ErrorCode.ANNOTATOR_CONNECTION_FAILED,
      { ...context, endpoint },
      { cause, isRetryable: true }
    );
  }

  /** 429 and 5xx are worth another attempt; other statuses are not. */
  static httpError(endpoint: string, statusCode: number, statusText: string, context: Partial<ErrorContext> = {}) {
    return new AnnotatorNetworkError(
      `HTTP ${statusCode} (${statusText}) from ${endpoint}`,
      ErrorCode.ANNOTATOR_HTTP_ERROR,
      { ...context, endpoint, statusCode },
      { isRetryable: statusCode === 429 || statusCode >= 500 }
    );
  }

  static textTooLong(endpoint: string, chars: number, limit: number, context: Partial<ErrorContext> = {}) {
    return new AnnotatorNetworkError(
      `Text of ${chars} characters exceeds the annotation limit of ${limit}`,
      ErrorCode.ANNOTATOR_TEXT_TOO_LONG,
      { ...context, endpoint, chars, limit },
      { isRetryable: false }
    );
  }

  static notConfigured(context: Partial<ErrorContext> = {}) {
    return new AnnotatorNetworkError(
      "No annotation endpoint configured. Set READABILITY_ANNOTATOR_URL.",
      ErrorCode.ANNOTATOR_NOT_CONFIGURED,
      { ...context, setting: "READABILITY_ANNOTATOR_URL" },
      { isRetryable: false }
    );
  }
}

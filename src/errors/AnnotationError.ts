import { ReadabilityError, ErrorCode, type ErrorContext } from "./ReadabilityError";

/**
 * Error for annotated input that breaks the token contract
 * (head outside the sentence, index out of order, unparseable response).
 */
export class AnnotationContractError extends ReadabilityError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.ANNOTATION_RESPONSE_INVALID,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, { ...options, isRetryable: false });
    this.name = "AnnotationContractError";
  }

  static headOutOfRange(tokenIndex: number, head: number, sentenceLength: number, context: Partial<ErrorContext> = {}) {
    return new AnnotationContractError(
      `Token ${tokenIndex} has head ${head} outside sentence of length ${sentenceLength}`,
      ErrorCode.ANNOTATION_HEAD_OUT_OF_RANGE,
      { ...context, tokenIndex }
    );
  }

  static indexMismatch(position: number, index: number, context: Partial<ErrorContext> = {}) {
    return new AnnotationContractError(
      `Token at position ${position} carries index ${index}`,
      ErrorCode.ANNOTATION_INDEX_MISMATCH,
      { ...context, tokenIndex: position }
    );
  }

  static invalidResponse(endpoint: string, detail: string, context: Partial<ErrorContext> = {}) {
    return new AnnotationContractError(
      `Invalid annotation response from ${endpoint}: ${detail}`,
      ErrorCode.ANNOTATION_RESPONSE_INVALID,
      { ...context, endpoint }
    );
  }
}

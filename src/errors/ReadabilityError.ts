/**
 * Base error class for all readability plugin errors.
 * Provides error codes, operation context, and structured metadata.
 */

export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_INVALID = 1001,
  CONFIG_MISSING = 1002,

  // Lexicon errors (2xxx)
  LEXICON_FILE_MISSING = 2001,
  LEXICON_FILE_MALFORMED = 2002,
  LEXICON_NOT_LOADED = 2003,

  // Annotation contract errors (3xxx)
  ANNOTATION_HEAD_OUT_OF_RANGE = 3001,
  ANNOTATION_INDEX_MISMATCH = 3002,
  ANNOTATION_RESPONSE_INVALID = 3003,

  // Annotator network errors (4xxx)
  ANNOTATOR_TIMEOUT = 4001,
  ANNOTATOR_CONNECTION_FAILED = 4002,
  ANNOTATOR_HTTP_ERROR = 4003,
  ANNOTATOR_NOT_CONFIGURED = 4004,
  ANNOTATOR_TEXT_TOO_LONG = 4005,

  // General errors (9xxx)
  UNKNOWN = 9999,
  INTERNAL = 9998,
}

export interface ErrorContext {
  operation: string;
  file?: string;
  endpoint?: string;
  sentenceIndex?: number;
  tokenIndex?: number;
  setting?: string;
  timestamp?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  code: ErrorCode;
  message: string;
  context: ErrorContext;
  cause?: string;
  stack?: string;
}

/**
 * Base error class for the readability plugin.
 * All plugin-specific errors should extend this class.
 */
export class ReadabilityError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;
  public readonly isRetryable: boolean;
  public readonly timestamp: string;
  public override readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message);
    this.name = "ReadabilityError";
    this.code = code;
    this.cause = options?.cause;
    this.timestamp = new Date().toISOString();
    this.isRetryable = options?.isRetryable ?? false;
    this.context = {
      ...context,
      operation: context.operation || "unknown",
      timestamp: this.timestamp,
    };

    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or transmission.
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
      stack: this.stack,
    };
  }

  toUserMessage(): string {
    return this.message;
  }

  /**
   * Create detailed error message for logging.
   */
  toLogMessage(): string {
    const parts = [
      `[${this.name}]`,
      `Code: ${this.code}`,
      `Op: ${this.context.operation}`,
      this.message,
    ];
    if (this.context.file) parts.push(`File: ${this.context.file}`);
    if (this.context.endpoint) parts.push(`Endpoint: ${this.context.endpoint}`);
    if (this.cause instanceof Error) parts.push(`Cause: ${this.cause.message}`);
    return parts.join(" | ");
  }
}

/**
 * Helper to wrap unknown errors in ReadabilityError.
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.UNKNOWN,
  context: Partial<ErrorContext> = {}
): ReadabilityError {
  if (error instanceof ReadabilityError) {
    return new ReadabilityError(error.message, error.code, {
      ...error.context,
      ...context,
    }, { cause: error.cause, isRetryable: error.isRetryable });
  }

  if (error instanceof Error) {
    return new ReadabilityError(error.message, code, context, { cause: error });
  }

  return new ReadabilityError(
    typeof error === "string" ? error : "An unknown error occurred",
    code,
    context
  );
}

export function isReadabilityError(error: unknown): error is ReadabilityError {
  return error instanceof ReadabilityError;
}

/**
 * Get error code from any error type.
 */
export function getErrorCode(error: unknown): ErrorCode {
  if (isReadabilityError(error)) return error.code;
  return ErrorCode.UNKNOWN;
}

import { ReadabilityError, ErrorCode, type ErrorContext } from "./ReadabilityError";

/**
 * Error for lexicon loading failures. Fatal: no partial lexicon is ever exposed.
 */
export class LexiconError extends ReadabilityError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.LEXICON_FILE_MALFORMED,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, { ...options, isRetryable: false });
    this.name = "LexiconError";
  }

  static fileMissing(file: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new LexiconError(
      `Lexicon file not found: ${file}`,
      ErrorCode.LEXICON_FILE_MISSING,
      { ...context, file },
      { cause }
    );
  }

  static malformed(file: string, detail: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new LexiconError(
      `Malformed lexicon file ${file}: ${detail}`,
      ErrorCode.LEXICON_FILE_MALFORMED,
      { ...context, file },
      { cause }
    );
  }
}

import { ReadabilityError, ErrorCode, type ErrorContext } from "./ReadabilityError";

/**
 * Error for invalid scoring or analysis configuration.
 * Raised at startup; the plugin must not run with a half-valid configuration.
 */
export class ReadabilityConfigError extends ReadabilityError {
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    context: Partial<ErrorContext> & { field?: string; value?: unknown } = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, { ...options, isRetryable: false });
    this.name = "ReadabilityConfigError";
    this.field = context.field;
    this.value = context.value;
  }

  static invalidField(field: string, reason: string, value: unknown, context: Partial<ErrorContext> = {}) {
    return new ReadabilityConfigError(
      `Invalid configuration for ${field}: ${reason}`,
      ErrorCode.CONFIG_INVALID,
      { ...context, field, value, setting: field }
    );
  }

  static missingSetting(setting: string, context: Partial<ErrorContext> = {}) {
    return new ReadabilityConfigError(
      `Missing required setting: ${setting}`,
      ErrorCode.CONFIG_MISSING,
      { ...context, field: setting, setting }
    );
  }
}

import { isReadabilityError } from "../errors";
import { logger } from "./logger";

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  retryableErrors?: number[]; // Error codes to retry
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 10_000,
  backoffMultiplier: 2,
};

/**
 * Execute a function with exponential backoff retry.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  config: Partial<RetryConfig> = {},
  operationName: string = "operation"
): Promise<T> {
  const cfg = { ...DEFAULT_RETRY_CONFIG, ...config };
  const attempts = Math.max(1, cfg.maxAttempts);
  let delay = cfg.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!shouldRetry(error, cfg.retryableErrors) || attempt >= attempts) {
        logger.error(`${operationName} failed after ${attempt} attempt(s)`, {
          attempt,
          maxAttempts: attempts,
        }, error);
        throw error;
      }

      logger.warn(`${operationName} failed, retrying in ${delay}ms`, {
        attempt,
        maxAttempts: attempts,
        delay,
      }, error);

      await sleep(delay);
      delay = Math.min(delay * cfg.backoffMultiplier, cfg.maxDelayMs);
    }
  }
}

/**
 * Plugin errors carry their own retry flag; plain errors are retried only on
 * transient network patterns.
 */
export function shouldRetry(error: unknown, retryableCodes?: number[]): boolean {
  if (isReadabilityError(error)) {
    if (error.isRetryable) return true;
    return retryableCodes?.includes(error.code) ?? false;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("socket hang up") ||
      message.includes("fetch failed")
    );
  }

  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const RetryPresets = {
  /** No retry: one attempt, errors surface immediately */
  none: {
    maxAttempts: 1,
    initialDelayMs: 0,
    maxDelayMs: 0,
    backoffMultiplier: 1,
  },

  /** Annotation endpoint: short backoff, the parser is usually local */
  annotator: {
    maxAttempts: 3,
    initialDelayMs: 250,
    maxDelayMs: 2_000,
    backoffMultiplier: 2,
  },
} satisfies Record<string, RetryConfig>;

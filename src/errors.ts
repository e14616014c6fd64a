/**
 * Error Types for the memory lifecycle engine
 *
 * Provides categorized errors plus retry and timeout helpers for
 * calls into persistence and the external scorer.
 */

/**
 * Base error class for all engine errors
 */
export class LifecycleError extends Error {
  constructor(message: string, public code: string, public category: ErrorCategory) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error categories for different failure types
 */
export type ErrorCategory = "persistence" | "validation" | "notFound" | "scorer";

/**
 * Store read/write failures (transient or permanent)
 */
export class PersistenceError extends LifecycleError {
  constructor(message: string, public isTransient: boolean = false, public cause?: unknown) {
    super(message, "PERSISTENCE_ERROR", "persistence");
  }
}

/**
 * Input validation errors
 */
export class ValidationError extends LifecycleError {
  constructor(message: string, public fieldName?: string) {
    super(message, "VALIDATION_ERROR", "validation");
  }
}

/**
 * Unknown memory or procedural memory id
 */
export class NotFoundError extends LifecycleError {
  constructor(message: string, public resourceType: string, public resourceId: string) {
    super(message, "NOT_FOUND", "notFound");
  }
}

/**
 * External scorer transport failures and timeouts
 */
export class ScorerError extends LifecycleError {
  constructor(message: string, public isTransient: boolean = true) {
    super(message, "SCORER_ERROR", "scorer");
  }
}

/**
 * Helper to determine if an error is transient (should retry)
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof PersistenceError || error instanceof ScorerError) {
    return error.isTransient;
  }

  // Check for common transient error patterns
  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();

  return (
    message.includes("timeout") ||
    message.includes("timed out") ||
    message.includes("network") ||
    message.includes("fetch failed") ||
    message.includes("connection refused") ||
    message.includes("econnrefused") ||
    message.includes("econnreset") ||
    message.includes("429") ||
    message.includes("503") ||
    message.includes("502")
  );
}

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
}

/**
 * Retry with exponential backoff for transient errors
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 100,
    maxDelayMs = 5000,
    shouldRetry = isTransientError,
  } = options;

  let lastError: unknown;
  let delay = initialDelayMs;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      // Don't retry on last attempt or if error is not retryable
      if (attempt === maxRetries || !shouldRetry(error)) {
        throw error;
      }

      // Exponential backoff with jitter
      const jitter = Math.random() * 0.3 * delay;
      const actualDelay = Math.min(delay + jitter, maxDelayMs);

      console.error(
        `Attempt ${attempt + 1}/${maxRetries + 1} failed, retrying in ${Math.round(actualDelay)}ms:`,
        error
      );

      await new Promise((resolve) => setTimeout(resolve, actualDelay));
      delay *= 2;
    }
  }

  throw lastError;
}

/**
 * Reject with a ScorerError if `promise` has not settled within `timeoutMs`.
 * The timer is always cleared, so nothing is left scheduled.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label = "operation"
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new ScorerError(`${label} timed out after ${timeoutMs}ms`)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

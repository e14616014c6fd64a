/**
 * Unit tests for error types and retry/timeout helpers
 */

import { describe, it, expect, vi } from "vitest";
import {
  LifecycleError,
  NotFoundError,
  PersistenceError,
  ScorerError,
  ValidationError,
  errorMessage,
  isTransientError,
  withRetry,
  withTimeout,
} from "../../src/errors.js";

describe("error types", () => {
  it("should carry a code and category", () => {
    const error = new NotFoundError("Memory not found: m1", "memory", "m1");

    expect(error).toBeInstanceOf(LifecycleError);
    expect(error.name).toBe("NotFoundError");
    expect(error.code).toBe("NOT_FOUND");
    expect(error.category).toBe("notFound");
    expect(error.resourceId).toBe("m1");
    expect(new ValidationError("bad", "name").fieldName).toBe("name");
  });
});

describe("isTransientError", () => {
  it("should trust the flag on engine errors", () => {
    expect(isTransientError(new PersistenceError("write failed"))).toBe(false);
    expect(isTransientError(new PersistenceError("write failed", true))).toBe(true);
    expect(isTransientError(new ScorerError("scorer down"))).toBe(true);
    expect(isTransientError(new ScorerError("bad key", false))).toBe(false);
  });

  it("should recognize transient messages", () => {
    expect(isTransientError(new Error("Request timed out"))).toBe(true);
    expect(isTransientError(new Error("HTTP 503 Service Unavailable"))).toBe(true);
    expect(isTransientError("connect ECONNREFUSED 127.0.0.1:8000")).toBe(true);
    expect(isTransientError(new Error("invalid api key"))).toBe(false);
  });
});

describe("withRetry", () => {
  it("should retry transient failures until one succeeds", async () => {
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("socket ECONNRESET"))
      .mockResolvedValue("ok");

    expect(await withRetry(fn, { initialDelayMs: 1 })).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("should not retry permanent failures", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("invalid api key"));

    await expect(withRetry(fn, { initialDelayMs: 1 })).rejects.toThrow("invalid api key");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should give up after maxRetries", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("network down"));

    await expect(withRetry(fn, { maxRetries: 2, initialDelayMs: 1 })).rejects.toThrow("network down");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("should honor a custom retry predicate", async () => {
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("try again"))
      .mockResolvedValue("ok");

    expect(await withRetry(fn, { initialDelayMs: 1, shouldRetry: () => true })).toBe("ok");
  });
});

describe("withTimeout", () => {
  it("should pass through a value that arrives in time", async () => {
    expect(await withTimeout(Promise.resolve(42), 1000)).toBe(42);
  });

  it("should reject with a ScorerError when time runs out", async () => {
    const never = new Promise<never>(() => {});
    const result = withTimeout(never, 5, "scoring");

    await expect(result).rejects.toThrow(ScorerError);
    await expect(result).rejects.toThrow("scoring timed out after 5ms");
  });
});

describe("errorMessage", () => {
  it("should read messages from errors and anything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(404)).toBe("404");
  });
});

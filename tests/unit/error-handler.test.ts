/**
 * Unit tests for tool response helpers
 */

import { describe, it, expect, vi } from "vitest";
import { NotFoundError, ValidationError } from "../../src/errors.js";
import { errorResponse, formatError, textResponse } from "../../src/tools/error-handler.js";

describe("Tool response helpers", () => {
  describe("textResponse", () => {
    it("should wrap text in a single content block", () => {
      expect(textResponse("done")).toEqual({ content: [{ type: "text", text: "done" }] });
    });
  });

  describe("formatError", () => {
    it("should append the code of engine errors", () => {
      expect(formatError(new ValidationError("Name must not be empty", "name"))).toBe(
        "Name must not be empty [VALIDATION_ERROR]"
      );
    });

    it("should use the message of other errors", () => {
      expect(formatError(new Error("boom"))).toBe("boom");
    });

    it("should stringify non-Error values", () => {
      expect(formatError("String error")).toBe("String error");
      expect(formatError(undefined)).toBe("undefined");
    });
  });

  describe("errorResponse", () => {
    it("should describe the failed operation", () => {
      const response = errorResponse("merging memories", new NotFoundError("Memory not found: m1", "memory", "m1"));
      expect(response.content[0]?.text).toBe("❌ Failed merging memories: Memory not found: m1 [NOT_FOUND]");
    });

    it("should log the error to stderr", () => {
      const spy = vi.spyOn(console, "error");
      const error = new Error("Logged error");

      errorResponse("reading engine status", error);

      expect(spy).toHaveBeenCalledWith("[tools] Error reading engine status:", error);
    });
  });
});

/**
 * Unit tests for config resolution
 */

import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, resolveConfig } from "../../src/config.js";

describe("resolveConfig", () => {
  it("should return the defaults for an empty object", () => {
    expect(resolveConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("should fall back to defaults for anything but an object", () => {
    expect(resolveConfig("chroma")).toBe(DEFAULT_CONFIG);
    expect(resolveConfig(null)).toBe(DEFAULT_CONFIG);
    expect(resolveConfig([1, 2])).toBe(DEFAULT_CONFIG);
  });

  it("should apply valid overrides", () => {
    const config = resolveConfig({
      memory_store: "file",
      merge_strategy: "simple",
      strict_contradictions: true,
      llm: { provider: "ollama", model: "llama3.1:8b" },
      characters: { alice: { name: "Alice", relationships: ["Bob"] } },
    });

    expect(config.memory_store).toBe("file");
    expect(config.merge_strategy).toBe("simple");
    expect(config.strict_contradictions).toBe(true);
    expect(config.llm).toEqual({ provider: "ollama", model: "llama3.1:8b" });
    expect(config.characters.alice?.relationships).toEqual(["Bob"]);
  });

  it("should keep valid fields when others are invalid", () => {
    const config = resolveConfig({ chroma_port: "eight thousand", merge_strategy: "simple", llm: { provider: "bogus" } });

    expect(config.chroma_port).toBe(DEFAULT_CONFIG.chroma_port);
    expect(config.merge_strategy).toBe("simple");
    expect(config.llm).toBeUndefined();
  });

  it("should replace nested sections as a whole", () => {
    const config = resolveConfig({
      consolidation: { batch_delay_ms: 0, scorer_timeout_ms: 5000, scorer_max_retries: 0, apply_adaptive_threshold: true },
      procedural: { learning_rate: 0.1 },
    });

    expect(config.consolidation).toEqual({
      batch_delay_ms: 0,
      scorer_timeout_ms: 5000,
      scorer_max_retries: 0,
      apply_adaptive_threshold: true,
    });
    expect(config.procedural).toEqual(DEFAULT_CONFIG.procedural);
  });

  it("should drop unknown keys", () => {
    expect(resolveConfig({ current_project: "bakery" })).toEqual(DEFAULT_CONFIG);
  });
});

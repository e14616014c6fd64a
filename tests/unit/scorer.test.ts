/**
 * Unit tests for the consolidation scorer
 */

import { describe, it, expect, vi } from "vitest";
import { ScorerError } from "../../src/errors.js";
import type { LLMOptions, LLMProvider } from "../../src/llm.js";
import {
  LLMConsolidationScorer,
  buildScoringPrompt,
  overallScore,
  parseScoringResponse,
  type ScoringContext,
} from "../../src/scorer.js";
import { FIXED_NOW, createMockProvider, createTestMemory } from "../utils.js";

const context: ScoringContext = {
  characterName: "Alice",
  characterSummary: "A baker",
  relatedMemories: [],
  relationships: ["Bob"],
  stats: { totalMemories: 2, longTermCount: 0, shortTermCount: 2, avgImportance: 0.5 },
};

const evaluation = (id: string | number, overrides: Record<string, unknown> = {}) => ({
  id,
  shouldConsolidate: true,
  confidence: 0.9,
  semanticValue: 1,
  emotionalDepth: 0,
  associationValue: 0,
  characterDevelopment: 0,
  practicalValue: 0,
  reasoning: "keeps a key fact",
  ...overrides,
});

const reply = (...entries: unknown[]) => JSON.stringify({ evaluations: entries });

describe("overallScore", () => {
  it("should weight the rubric dimensions", () => {
    expect(overallScore({ semanticValue: 1, emotionalDepth: 0, associationValue: 0, characterDevelopment: 0, practicalValue: 0 })).toBe(0.3);
    expect(overallScore({ semanticValue: 0, emotionalDepth: 1, associationValue: 0, characterDevelopment: 0, practicalValue: 1 })).toBeCloseTo(0.35, 10);
  });
});

describe("buildScoringPrompt", () => {
  it("should list every candidate with its id and age", () => {
    const memory = createTestMemory({ id: "m-42", content: "opened the bakery" });
    const prompt = buildScoringPrompt([memory], context, FIXED_NOW);

    expect(prompt).toContain('"id": "m-42"');
    expect(prompt).toContain('"content": "opened the bakery"');
    expect(prompt).toContain('"ageDays": 2');
    expect(prompt).toContain('"name": "Alice"');
  });
});

describe("parseScoringResponse", () => {
  const candidates = [createTestMemory({ id: "a" }), createTestMemory({ id: "b" })];

  it("should read JSON surrounded by prose", () => {
    const text = `Here are my ratings:\n${reply(evaluation("a"))}\nHope that helps.`;
    const [parsed] = parseScoringResponse(text, candidates);

    expect(parsed).toEqual({
      memoryId: "a",
      shouldConsolidate: true,
      confidence: 0.9,
      semanticValue: 1,
      emotionalDepth: 0,
      associationValue: 0,
      characterDevelopment: 0,
      practicalValue: 0,
      reasoning: "keeps a key fact",
      overallScore: 0.3,
    });
  });

  it("should return nothing for replies without usable JSON", () => {
    expect(parseScoringResponse("I cannot rate these.", candidates)).toEqual([]);
    expect(parseScoringResponse("{not json}", candidates)).toEqual([]);
    expect(parseScoringResponse('{"ratings": []}', candidates)).toEqual([]);
  });

  it("should match numeric ids by position", () => {
    const parsed = parseScoringResponse(reply(evaluation(1), evaluation("0")), candidates);
    expect(parsed.map((e) => e.memoryId)).toEqual(["b", "a"]);
  });

  it("should drop unknown, duplicate and malformed entries", () => {
    const parsed = parseScoringResponse(
      reply(
        evaluation("zzz"),
        evaluation("a"),
        evaluation("a", { confidence: 0.1 }),
        evaluation("b", { confidence: "high" }),
        "not an object"
      ),
      candidates
    );
    expect(parsed).toHaveLength(1);
    expect(parsed[0]?.confidence).toBe(0.9);
  });

  it("should clamp scores and default what it can", () => {
    const [parsed] = parseScoringResponse(
      reply(evaluation("a", { confidence: 1.4, semanticValue: -2, emotionalDepth: "lots", reasoning: undefined })),
      candidates
    );
    expect(parsed).toMatchObject({ confidence: 1, semanticValue: 0, emotionalDepth: 0, reasoning: "", overallScore: 0 });
  });
});

describe("LLMConsolidationScorer", () => {
  const memories = [createTestMemory({ id: "a" }), createTestMemory({ id: "b" })];

  it("should ask the provider for JSON and parse its reply", async () => {
    const { provider, complete } = createMockProvider(reply(evaluation("a"), evaluation("b", { shouldConsolidate: false })));
    const scorer = new LLMConsolidationScorer(provider);

    const evaluations = await scorer.evaluate(memories, context, FIXED_NOW);

    expect(scorer.name).toBe("mock:mock-model");
    expect(evaluations.map((e) => [e.memoryId, e.shouldConsolidate])).toEqual([["a", true], ["b", false]]);
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete.mock.calls[0]?.[1]).toMatchObject({ jsonMode: true, maxTokens: 800, temperature: 0.2 });
  });

  it("should retry transient failures", async () => {
    const { provider, complete } = createMockProvider(new Error("fetch failed"), reply(evaluation("a")));
    const scorer = new LLMConsolidationScorer(provider, { initialDelayMs: 1 });

    const evaluations = await scorer.evaluate(memories, context, FIXED_NOW);

    expect(complete).toHaveBeenCalledTimes(2);
    expect(evaluations).toHaveLength(1);
  });

  it("should wrap permanent failures in a ScorerError", async () => {
    const { provider, complete } = createMockProvider(new Error("bad request"));
    const scorer = new LLMConsolidationScorer(provider, { initialDelayMs: 1 });

    const failure = scorer.evaluate(memories, context, FIXED_NOW);

    await expect(failure).rejects.toThrow(ScorerError);
    await expect(failure).rejects.toThrow("Scorer mock:mock-model failed: bad request");
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it("should time out and abort a hanging request", async () => {
    const signals: Array<AbortSignal | undefined> = [];
    const provider: LLMProvider = {
      name: "slow",
      model: "m",
      isAvailable: async () => true,
      complete: vi.fn((_prompt: string, options?: LLMOptions) => {
        signals.push(options?.signal);
        return new Promise<never>(() => {});
      }),
    };
    const scorer = new LLMConsolidationScorer(provider, { timeoutMs: 10, maxRetries: 0 });

    await expect(scorer.evaluate(memories, context, FIXED_NOW)).rejects.toThrow("scorer slow:m timed out after 10ms");
    expect(signals).toHaveLength(1);
    expect(signals[0]?.aborted).toBe(true);
  });

  it("should report availability from its provider", async () => {
    const isAvailable = vi.fn(async () => false);
    const provider: LLMProvider = { name: "down", model: "m", isAvailable, complete: vi.fn() };
    const scorer = new LLMConsolidationScorer(provider);

    expect(await scorer.isAvailable()).toBe(false);
    expect(isAvailable).toHaveBeenCalledTimes(1);
  });
});

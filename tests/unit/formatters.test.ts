/**
 * Unit tests for formatting utilities
 */

import { describe, it, expect } from "vitest";
import type { ConsolidationResult } from "../../src/consolidation.js";
import type { ProceduralMemory } from "../../src/procedural.js";
import { createReconstructionRecord } from "../../src/records.js";
import {
  formatBar,
  formatCacheStats,
  formatConsolidationResult,
  formatDivider,
  formatHeader,
  formatList,
  formatMemory,
  formatPercent,
  formatProcedure,
  formatRecord,
  formatTable,
  truncate,
} from "../../src/tools/formatters.js";
import { FIXED_NOW, createTestMemory } from "../utils.js";

describe("Formatting Utilities", () => {
  describe("formatHeader", () => {
    it("should center the title in a box", () => {
      const lines = formatHeader("TEST", 20).split("\n");
      expect(lines).toEqual([
        `╔${"═".repeat(20)}╗`,
        `║${" ".repeat(8)}TEST${" ".repeat(8)}║`,
        `╚${"═".repeat(20)}╝`,
      ]);
    });

    it("should not pad titles wider than the box", () => {
      expect(formatHeader("ABCDEF", 4).split("\n")[1]).toBe("║ABCDEF║");
    });
  });

  describe("formatBar", () => {
    it("should fill in proportion", () => {
      expect(formatBar(0.7, 1)).toBe("███████░░░");
      expect(formatBar(3, 4, 4)).toBe("███░");
    });

    it("should pin out-of-range values", () => {
      expect(formatBar(2, 1, 4)).toBe("████");
      expect(formatBar(-1, 1, 4)).toBe("░░░░");
      expect(formatBar(1, 0, 4)).toBe("░░░░");
    });
  });

  describe("formatPercent", () => {
    it("should format with the requested decimals", () => {
      expect(formatPercent(0.333, 1)).toBe("33.3%");
      expect(formatPercent(0.5)).toBe("50%");
    });
  });

  describe("formatList", () => {
    it("should bullet each item", () => {
      expect(formatList(["content", "time"])).toBe("  • content\n  • time");
      expect(formatList(["a"], "-", 0)).toBe("- a");
    });
  });

  describe("formatTable", () => {
    it("should pad keys to a common width", () => {
      expect(formatTable({ hits: 3, misses: 10 })).toBe("hits  : 3\nmisses: 10");
    });

    it("should return an empty string for no rows", () => {
      expect(formatTable({})).toBe("");
    });
  });

  describe("formatDivider", () => {
    it("should repeat the divider character", () => {
      expect(formatDivider(3, "=")).toBe("===");
    });
  });

  describe("truncate", () => {
    it("should keep short text and cut long text to maxLength", () => {
      expect(truncate("hello", 8)).toBe("hello");
      expect(truncate("hello world", 8)).toBe("hello...");
    });
  });
});

describe("Domain renderers", () => {
  it("should render a memory", () => {
    const memory = createTestMemory({ id: "m1", content: "opened the bakery", tags: ["work", "milestone"], accessCount: 2 });
    expect(formatMemory(memory)).toBe(
      [
        "[m1] SHORT_TERM (alice)",
        "  opened the bakery",
        "  importance 50% · accessed 2x · reinforced 0x",
        "  tags: work, milestone",
      ].join("\n")
    );
  });

  it("should render a reconstruction record", () => {
    const record = createReconstructionRecord({
      sourceId: "m2",
      targetId: "m1",
      kind: "merge",
      reason: "Merged similar memory m2",
      before: "a | b",
      after: "a [supplement: b]",
      similarity: 0.65,
      confidence: 0.65,
      timestamp: FIXED_NOW,
    });

    expect(formatRecord(record)).toBe(
      [
        "2024-01-15T00:00:00.000Z MERGE m2 → m1 (impact: medium)",
        "  reason: Merged similar memory m2",
        "  similarity 0.65 · confidence 0.65",
        "  after: a [supplement: b]",
      ].join("\n")
    );
  });

  it("should render a consolidation result", () => {
    const result: ConsolidationResult = {
      characterId: "alice",
      totalEvaluated: 2,
      consolidated: 1,
      deferred: 0,
      rejected: 1,
      details: [
        { memoryId: "keep", excerpt: "opened the bakery", outcome: "consolidated", reasoning: "fallback", confidence: 0.3, score: null, source: "fallback" },
        { memoryId: "drop", excerpt: "bought flour", outcome: "rejected", reasoning: "dull", confidence: 0.9, score: 0.25, source: "scorer" },
      ],
      adjustment: { previous: 0.5, next: 0.55, direction: "increase", consolidatedRate: 0.9, avgScore: 0.8 },
    };

    const lines = formatConsolidationResult(result).split("\n");

    expect(lines[1]).toContain("CONSOLIDATION: alice");
    expect(lines.slice(3, 7)).toEqual([
      "Evaluated   : 2",
      "Consolidated: 1",
      "Deferred    : 0",
      "Rejected    : 1",
    ]);
    expect(lines.slice(8, 10)).toEqual([
      "  consolidated keep [fallback rule, conf 0.30] opened the bakery",
      "  rejected     drop [scorer 0.25, conf 0.90] bought flour",
    ]);
    expect(lines[lines.length - 1]).toBe("Threshold: 0.5 → 0.55 (increase)");
  });

  it("should render a procedure", () => {
    const procedure: ProceduralMemory = {
      id: "proc_1",
      name: "Knead dough",
      type: "skill",
      pattern: "",
      conditions: [],
      actions: [],
      proficiency: 0.75,
      executionCount: 3,
      successRate: 0.9,
      averageExecutionTime: 120.4,
      createdAt: FIXED_NOW,
      tags: [],
      relatedMemoryIds: [],
    };

    expect(formatProcedure(procedure)).toBe(
      [
        "[proc_1] Knead dough (skill)",
        "  proficiency ████████░░ 75%",
        "  success 90% · 3 runs · avg 120ms",
      ].join("\n")
    );
  });

  it("should render cache statistics", () => {
    expect(formatCacheStats(null, "Resolution cache")).toBe("Resolution cache: no cache");
    expect(
      formatCacheStats(
        { name: "similarity", size: 2, maxSize: 10, hits: 3, misses: 1, puts: 2, evictions: 0, hitRate: 0.75 },
        "Similarity cache"
      )
    ).toBe(
      [
        "Similarity cache:",
        "  size     : 2/10",
        "  hits     : 3",
        "  misses   : 1",
        "  puts     : 2",
        "  evictions: 0",
        "  hitRate  : 75.0%",
      ].join("\n")
    );
  });
});

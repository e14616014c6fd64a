/**
 * Unit tests for conflict detection and resolution
 */

import { describe, it, expect } from "vitest";
import {
  SimpleConflictResolver,
  SmartConflictResolver,
  createConflictResolver,
  detectConflicts,
  dominantConflict,
  negationContradiction,
  sharedOnly,
} from "../../src/conflict.js";
import { DAY_MS } from "../../src/types.js";
import { FIXED_NOW, createClock, createTestMemory, daysAgo } from "../utils.js";

describe("detectConflicts", () => {
  it("should flag disagreeing content", () => {
    const a = createTestMemory({ content: "likes tea" });
    const b = createTestMemory({ content: "enjoys coffee in the morning" });
    expect(detectConflicts(a, b)).toEqual(["content"]);
  });

  it("should report nothing for identical memories", () => {
    const a = createTestMemory({ content: "went to the market" });
    expect(detectConflicts(a, { ...a, id: "copy" })).toEqual([]);
  });

  it("should flag two same-day memories that both carry a relative time", () => {
    const a = createTestMemory({ content: "met Bob today at noon" });
    const b = createTestMemory({ content: "met Bob yesterday at noon" });
    // 4 of 6 distinct tokens shared, so content agrees
    expect(detectConflicts(a, b)).toEqual(["time"]);
  });

  it("should not flag relative times a week apart", () => {
    const a = createTestMemory({ content: "met Bob today at noon", createdAt: daysAgo(2) });
    const b = createTestMemory({ content: "met Bob yesterday at noon", createdAt: daysAgo(9) });
    expect(detectConflicts(a, b)).toEqual([]);
  });

  it("should flag an importance gap only when it exceeds 0.5", () => {
    const a = createTestMemory({ importance: 0.9 });
    expect(detectConflicts(a, createTestMemory({ importance: 0.3 }))).toEqual(["importance"]);
    expect(detectConflicts(a, createTestMemory({ importance: 0.45 }))).toEqual([]);
  });

  it("should flag opposite emotions more than 1.0 apart", () => {
    const a = createTestMemory({ emotionalValence: 0.6 });
    expect(detectConflicts(a, createTestMemory({ emotionalValence: -0.6 }))).toEqual(["emotion"]);
    expect(detectConflicts(createTestMemory({ emotionalValence: 0.4 }), createTestMemory({ emotionalValence: -0.4 }))).toEqual([]);
    expect(detectConflicts(createTestMemory({ emotionalValence: 0 }), createTestMemory({ emotionalValence: -1 }))).toEqual([]);
  });

  it("should treat any shared entity or tag as a conflict by default", () => {
    const a = createTestMemory({ relatedEntities: ["Bob"], tags: ["work"] });
    const b = createTestMemory({ relatedEntities: ["Bob", "Carol"], tags: ["work"] });
    expect(detectConflicts(a, b, sharedOnly)).toEqual(["entity", "tag"]);
  });

  it("should ask the predicate before flagging shared entities", () => {
    const a = createTestMemory({ content: "Alice likes tea", relatedEntities: ["tea"] });
    const agreeing = createTestMemory({ content: "Alice likes tea a lot", relatedEntities: ["tea"] });
    const opposing = createTestMemory({ content: "Alice hates tea", relatedEntities: ["tea"] });

    expect(detectConflicts(a, agreeing, negationContradiction)).toEqual([]);
    expect(detectConflicts(a, opposing, negationContradiction)).toEqual(["entity"]);
  });
});

describe("negationContradiction", () => {
  it("should match opposing statements in either order", () => {
    const open = createTestMemory({ content: "the door is open" });
    const closed = createTestMemory({ content: "the door is not open" });
    expect(negationContradiction(open, closed, [])).toBe(true);
    expect(negationContradiction(closed, open, [])).toBe(true);
  });

  it("should require the same subject", () => {
    const a = createTestMemory({ content: "Alice likes tea" });
    const b = createTestMemory({ content: "Alice hates coffee" });
    expect(negationContradiction(a, b, [])).toBe(false);
  });
});

describe("dominantConflict", () => {
  it("should pick the highest severity", () => {
    expect(dominantConflict(["tag", "importance"])).toBe("importance");
    expect(dominantConflict(["emotion", "content"])).toBe("content");
  });

  it("should break ties by detection order", () => {
    expect(dominantConflict(["entity", "time"])).toBe("time");
  });

  it("should return undefined for no conflicts", () => {
    expect(dominantConflict([])).toBeUndefined();
  });
});

describe("SmartConflictResolver", () => {
  it("should keep the clearly more important memory on content conflicts", () => {
    const a = createTestMemory({ importance: 0.4 });
    const b = createTestMemory({ importance: 0.9 });
    const resolution = new SmartConflictResolver().resolve(a, b, "content");

    expect(resolution.strategy).toBe("keep_more_important");
    expect(resolution.resolved).toBe(b);
    expect(resolution.confidence).toBe(0.8);
  });

  it("should keep the clearly newer memory on content conflicts", () => {
    const a = createTestMemory({ createdAt: daysAgo(12) });
    const b = createTestMemory({ createdAt: daysAgo(2) });
    const resolution = new SmartConflictResolver().resolve(a, b, "content");

    expect(resolution.strategy).toBe("keep_latest");
    expect(resolution.resolved).toBe(b);
    expect(resolution.confidence).toBe(0.7);
  });

  it("should keep both versions when there is no clear winner", () => {
    const clock = createClock(FIXED_NOW + DAY_MS);
    const a = createTestMemory({ content: "the car was red", importance: 0.5 });
    const b = createTestMemory({ content: "it was blue", importance: 0.7 });
    const resolution = new SmartConflictResolver({ now: clock.now }).resolve(a, b, "content");

    expect(resolution.strategy).toBe("create_combined");
    expect(resolution.confidence).toBe(0.6);
    expect(resolution.resolved.id).toBe(a.id);
    expect(resolution.resolved.content).toBe("[version 1] the car was red | [version 2] it was blue");
    expect(resolution.resolved.importance).toBe(0.7);
    expect(resolution.resolved.lastAccessedAt).toBe(FIXED_NOW + DAY_MS);
  });

  it("should align timestamps to the later record", () => {
    const a = createTestMemory({ createdAt: daysAgo(3) });
    const b = createTestMemory({ createdAt: daysAgo(2) });
    const resolution = new SmartConflictResolver().resolve(a, b, "time");

    expect(resolution.strategy).toBe("merge_smart");
    expect(resolution.resolved.createdAt).toBe(daysAgo(2));
    expect(resolution.confidence).toBe(0.9);
  });

  it("should union entities and tags", () => {
    const resolver = new SmartConflictResolver();
    const a = createTestMemory({ relatedEntities: ["Bob"], tags: ["work"] });
    const b = createTestMemory({ relatedEntities: ["Bob", "Carol"], tags: ["travel"] });

    expect(resolver.resolve(a, b, "entity").resolved.relatedEntities).toEqual(["Bob", "Carol"]);
    expect(resolver.resolve(a, b, "entity").confidence).toBe(0.85);
    expect(resolver.resolve(a, b, "tag").resolved.tags).toEqual(["work", "travel"]);
  });

  it("should prefer the first memory on an importance tie", () => {
    const a = createTestMemory({ importance: 0.6 });
    const b = createTestMemory({ importance: 0.6 });
    const resolution = new SmartConflictResolver().resolve(a, b, "importance");

    expect(resolution.strategy).toBe("keep_more_important");
    expect(resolution.resolved).toBe(a);
    expect(resolution.explanation).toBe(`Kept ${a.id} (importance 0.60)`);
  });

  it("should average emotional valence", () => {
    const a = createTestMemory({ emotionalValence: 0.6 });
    const b = createTestMemory({ emotionalValence: -0.8 });
    const resolution = new SmartConflictResolver().resolve(a, b, "emotion");

    expect(resolution.resolved.emotionalValence).toBeCloseTo(-0.1, 10);
    expect(resolution.explanation).toBe("Averaged emotional valence to -0.10");
    expect(resolution.confidence).toBe(0.75);
  });

  it("should memoize resolutions per record version and type", () => {
    const resolver = new SmartConflictResolver();
    const a = createTestMemory({ importance: 0.9 });
    const b = createTestMemory({ importance: 0.2 });

    const first = resolver.resolve(a, b, "importance");
    expect(resolver.resolve(a, b, "importance")).toEqual(first);
    resolver.resolve(a, b, "tag");

    expect(resolver.cacheStats()).toMatchObject({ name: "resolution", hits: 1, misses: 2, size: 2 });
  });

  it("should hand out copies that callers cannot use to alter cached resolutions", () => {
    const resolver = new SmartConflictResolver();
    const a = createTestMemory({ tags: ["x"] });
    const b = createTestMemory({ tags: ["y"] });

    const first = resolver.resolve(a, b, "tag");
    first.resolved.tags.push("changed");
    const second = resolver.resolve(a, b, "tag");
    second.resolved.relatedEntities.push("Bob");
    const third = resolver.resolve(a, b, "tag");

    expect(second).not.toBe(first);
    expect(second.resolved.tags).toEqual(["x", "y"]);
    expect(third.resolved.tags).toEqual(["x", "y"]);
    expect(third.resolved.relatedEntities).toEqual([]);
    expect(resolver.cacheStats()).toMatchObject({ hits: 2, misses: 1 });
  });

  it("should miss the cache when a memory is rewritten in place", () => {
    const resolver = new SmartConflictResolver();
    const a = createTestMemory({ content: "met on Monday", importance: 0.9 });
    const b = createTestMemory({ importance: 0.2 });

    resolver.resolve(a, b, "importance");
    const corrected = { ...a, content: "met on Tuesday" };

    expect(resolver.resolve(corrected, b, "importance").resolved.content).toBe("met on Tuesday");
    expect(resolver.cacheStats()).toMatchObject({ hits: 0, misses: 2 });
  });
});

describe("SimpleConflictResolver", () => {
  it("should keep the newer memory whatever the conflict", () => {
    const older = createTestMemory({ createdAt: daysAgo(5), importance: 1 });
    const newer = createTestMemory({ createdAt: daysAgo(2), importance: 0 });
    const resolution = new SimpleConflictResolver().resolve(older, newer);

    expect(resolution).toMatchObject({ strategy: "keep_latest", confidence: 0.5 });
    expect(resolution.resolved).toBe(newer);
  });

  it("should keep the first memory when both are equally new", () => {
    const a = createTestMemory();
    const b = createTestMemory();
    expect(new SimpleConflictResolver().resolve(a, b).resolved).toBe(a);
  });
});

describe("createConflictResolver", () => {
  it("should build the requested resolver", () => {
    expect(createConflictResolver("smart").name).toBe("smart");
    expect(createConflictResolver("simple").cacheStats()).toBeNull();
  });
});

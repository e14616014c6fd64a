/**
 * End-to-end flows through a fully wired in-process engine:
 * remember → recall → consolidate, then rewrite and reconcile.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { resolveConfig } from "../../src/config.js";
import { createLifecycleEngine, type LifecycleEngine } from "../../src/engine.js";
import { DAY_MS, type Memory } from "../../src/types.js";
import { createClock } from "../utils.js";

describe("Engine flow", () => {
  let clock: ReturnType<typeof createClock>;
  let engine: LifecycleEngine;

  beforeEach(() => {
    clock = createClock();
    engine = createLifecycleEngine(resolveConfig({ memory_store: "memory" }), {
      scorer: null,
      now: clock.now,
      sleep: async () => {},
    });
  });

  async function stored(id: string): Promise<Memory | undefined> {
    return engine.store.get(id);
  }

  it("should promote rehearsed important memories and leave the rest short-term", async () => {
    const bread = await engine.remember({
      characterId: "alice",
      content: "baked bread with grandma",
      importance: 0.9,
      tags: ["family", "baking"],
    });
    const flour = await engine.remember({
      characterId: "alice",
      content: "bought flour",
      importance: 0.3,
      tags: ["errand"],
    });
    for (let i = 0; i < 3; i++) {
      await engine.recall(bread.id);
    }

    // Too young on the first pass
    expect((await engine.consolidation.consolidate("alice")).totalEvaluated).toBe(0);

    clock.advance(2 * DAY_MS);
    const result = await engine.consolidation.consolidate("alice");

    expect(result.totalEvaluated).toBe(2);
    expect(result.consolidated).toBe(1);
    expect(result.rejected).toBe(1);
    expect(result.adjustment).toBeUndefined();
    expect((await stored(bread.id))?.category).toBe("LONG_TERM");
    expect((await stored(bread.id))?.lastAccessedAt).toBe(clock.now());
    expect((await stored(flour.id))?.category).toBe("SHORT_TERM");

    const status = await engine.consolidation.getStatus("alice");
    expect(status.threshold).toBe(0.5);
    expect(status.statistics?.totalDecisions).toBe(2);
    expect(status.statistics?.totalConsolidated).toBe(1);
    expect(status.statistics?.avgConfidence).toBeCloseTo(0.3, 10);
    expect(status.recentDecisions.map((d) => d.memoryId)).toEqual(
      expect.arrayContaining([bread.id, flour.id])
    );
  });

  it("should record rewrites and conflict resolutions in the history", async () => {
    const walk = await engine.remember({
      characterId: "alice",
      content: "walked the dog with mom",
      relatedEntities: ["mom"],
    });
    const slowWalk = await engine.remember({
      characterId: "alice",
      content: "walked the dog with mom slowly",
      relatedEntities: ["mom", "dog"],
    });

    const { memory } = await engine.reconstruction.reconstructMemory(
      walk.id,
      "append",
      "it was raining",
      "remembered the weather"
    );
    expect(memory.content).toBe("walked the dog with mom\n\nSupplement: it was raining");

    const analysis = await engine.reconstruction.detectConflict(walk.id, slowWalk.id);
    expect(analysis.conflicts).toEqual(["entity"]);

    const outcome = await engine.reconstruction.resolveConflict(walk.id, slowWalk.id);
    expect(outcome.conflictType).toBe("entity");
    expect(outcome.resolution.strategy).toBe("merge_smart");
    expect(outcome.record.kind).toBe("merge");
    expect(outcome.record.sourceId).toBe(slowWalk.id);
    expect(outcome.record.targetId).toBe(walk.id);
    expect((await stored(walk.id))?.relatedEntities).toEqual(["mom", "dog"]);

    const history = await engine.reconstruction.getReconstructionHistory(walk.id);
    expect(history.map((r) => r.kind)).toEqual(["append", "merge"]);
  });

  it("should leave the second memory of a merge in place", async () => {
    const first = await engine.remember({ characterId: "alice", content: "the cat sat on the mat", tags: ["cat"] });
    const second = await engine.remember({ characterId: "alice", content: "the cat sat on the mat", tags: ["cat"] });

    const outcome = await engine.reconstruction.mergeMemories(first.id, second.id);

    expect(outcome.success).toBe(true);
    expect(outcome.similarity).toBeCloseTo(1, 10);
    expect(await stored(second.id)).toBeDefined();

    const history = await engine.reconstruction.getReconstructionHistory(first.id);
    expect(history).toHaveLength(1);
    expect(history[0]?.metadata).toEqual({ merged: true, absorbedId: second.id });
  });
});

/**
 * Zod schemas for everything the engine reads back from disk or a store.
 */

import { z } from "zod";
import type { Memory, ReconstructionRecord } from "./types.js";

const score = z.number().min(0).max(1);

export const MemorySchema: z.ZodType<Memory> = z.object({
  id: z.string().min(1),
  characterId: z.string(),
  content: z.string(),
  category: z.enum(["SHORT_TERM", "LONG_TERM"]),
  tags: z.array(z.string()),
  relatedEntities: z.array(z.string()),
  importance: score,
  confidence: score,
  emotionalValence: z.number().min(-1).max(1),
  emotionTag: z.string().optional(),
  emotionIntensity: score.optional(),
  reinforcementCount: z.number().nonnegative(),
  recallDifficulty: score,
  contextRelevance: score,
  createdAt: z.number(),
  lastAccessedAt: z.number(),
  accessCount: z.number().int().nonnegative(),
});

export const ReconstructionRecordSchema: z.ZodType<ReconstructionRecord> = z.object({
  id: z.string(),
  sourceId: z.string(),
  targetId: z.string(),
  kind: z.enum(["append", "update", "replace", "correct", "reinterpret", "merge"]),
  reason: z.string(),
  before: z.string(),
  after: z.string(),
  similarity: score,
  confidence: score,
  metadata: z.record(z.union([z.string(), z.number(), z.boolean()])),
  timestamp: z.number(),
});

import { createHash } from "crypto";

// ============================================================================
// Episodic memories
// ============================================================================

export type MemoryCategory = "SHORT_TERM" | "LONG_TERM";

export interface Memory {
  id: string;
  characterId: string;
  content: string;
  category: MemoryCategory;
  tags: string[];              // set semantics
  relatedEntities: string[];   // set semantics
  importance: number;          // 0-1
  confidence: number;          // 0-1, how sure we are the memory is accurate
  emotionalValence: number;    // -1 (negative) to 1 (positive)
  emotionTag?: string;         // e.g. "joy", "anger"
  emotionIntensity?: number;   // 0-1
  reinforcementCount: number;
  recallDifficulty: number;    // 0-1
  contextRelevance: number;    // 0-1
  createdAt: number;           // epoch ms
  lastAccessedAt: number;      // epoch ms
  accessCount: number;
}

export type MemoryInput = Pick<Memory, "id" | "characterId" | "content"> & Partial<Omit<Memory, "id" | "characterId" | "content">>;

export const DAY_MS = 24 * 60 * 60 * 1000;

export function generateId(prefix: string, now: number = Date.now()): string {
  return `${prefix}_${now}_${Math.random().toString(36).slice(2, 8)}`;
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function uniqueStrings(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

/**
 * Build a Memory with defaults filled in and scores clamped to their ranges.
 */
export function createMemory(input: MemoryInput, now: number = Date.now()): Memory {
  const createdAt = input.createdAt ?? now;
  return {
    id: input.id,
    characterId: input.characterId,
    content: input.content,
    category: input.category ?? "SHORT_TERM",
    tags: uniqueStrings(input.tags ?? []),
    relatedEntities: uniqueStrings(input.relatedEntities ?? []),
    importance: clamp01(input.importance ?? 0.5),
    confidence: clamp01(input.confidence ?? 1),
    emotionalValence: Math.min(1, Math.max(-1, input.emotionalValence ?? 0)),
    emotionTag: input.emotionTag,
    emotionIntensity: input.emotionIntensity === undefined ? undefined : clamp01(input.emotionIntensity),
    reinforcementCount: Math.max(0, input.reinforcementCount ?? 0),
    recallDifficulty: clamp01(input.recallDifficulty ?? 0.5),
    contextRelevance: clamp01(input.contextRelevance ?? 0.5),
    createdAt,
    lastAccessedAt: input.lastAccessedAt ?? createdAt,
    accessCount: Math.max(0, input.accessCount ?? 0),
  };
}

/**
 * Key for memoizing results about a record. The digest covers every field,
 * so any rewrite changes the key, even within the same millisecond.
 */
export function memoryFingerprint(memory: Memory): string {
  const digest = createHash("sha256").update(JSON.stringify(memory)).digest("hex").slice(0, 16);
  return `${memory.id}#${digest}`;
}

// ============================================================================
// Reconstruction audit trail
// ============================================================================

export type ReconstructionKind = "append" | "update" | "replace" | "correct" | "reinterpret" | "merge";

export interface ReconstructionRecord {
  readonly id: string;
  readonly sourceId: string;
  readonly targetId: string;
  readonly kind: ReconstructionKind;
  readonly reason: string;
  readonly before: string;
  readonly after: string;
  readonly similarity: number;
  readonly confidence: number;
  readonly metadata: Readonly<Record<string, string | number | boolean>>;
  readonly timestamp: number;
}

// ============================================================================
// Conflicts
// ============================================================================

export type ConflictType = "content" | "emotion" | "time" | "entity" | "importance" | "tag";

export const CONFLICT_SEVERITY: Record<ConflictType, number> = {
  content: 5,
  emotion: 4,
  time: 3,
  entity: 3,
  importance: 2,
  tag: 1,
};

export type ResolveStrategy =
  | "keep_primary"
  | "keep_secondary"
  | "merge_smart"
  | "create_combined"
  | "requires_human"
  | "keep_latest"
  | "keep_more_important";

export interface ConflictResolution {
  strategy: ResolveStrategy;
  resolved: Memory;
  explanation: string;
  confidence: number;
}

/**
 * Memory merging
 *
 * Similarity = 0.4 content + 0.3 entities + 0.2 tags + 0.1 time proximity.
 * Pairs at or above MERGE.THRESHOLD are folded into the primary record.
 */

import { BoundedCache, type CacheStats } from "./cache.js";
import { createReconstructionRecord } from "./records.js";
import { jaccard, tokenize, wordJaccard } from "./text.js";
import {
  DAY_MS,
  memoryFingerprint,
  uniqueStrings,
  type Memory,
  type MemoryCategory,
  type ReconstructionRecord,
} from "./types.js";

export const MERGE = {
  THRESHOLD: 0.5,
  CONTENT_WEIGHT: 0.4,
  ENTITY_WEIGHT: 0.3,
  TAG_WEIGHT: 0.2,
  TIME_WEIGHT: 0.1,
  NEAR_DUPLICATE_CONTENT: 0.8,  // Above this, keep one version instead of concatenating
  SIMPLE_SIMILARITY: 0.5,
} as const;

export interface MergeResult {
  merged: Memory;
  record: ReconstructionRecord;
  wasMerged: boolean;
}

export interface MergeStrategy {
  readonly name: string;
  calculateSimilarity(a: Memory, b: Memory): number;
  shouldMerge(a: Memory, b: Memory): boolean;
  merge(primary: Memory, secondary: Memory): MergeResult;
  clearCache(): void;
  cacheStats(): CacheStats | null;
  logCacheStats(): void;
}

export interface MergeStrategyOptions {
  cacheSize?: number;
  cacheTtlMs?: number;
  now?: () => number;
}

export function timeSimilarity(a: Memory, b: Memory): number {
  const days = Math.abs(a.createdAt - b.createdAt) / DAY_MS;
  if (days <= 1) return 1.0;
  if (days <= 7) return 0.7;
  if (days <= 30) return 0.4;
  return 0.1;
}

function promotedCategory(a: Memory, b: Memory): MemoryCategory {
  return a.category === "LONG_TERM" || b.category === "LONG_TERM" ? "LONG_TERM" : "SHORT_TERM";
}

function longer(primary: string, secondary: string): string {
  return secondary.length > primary.length ? secondary : primary;
}

// ============================================================================
// Smart strategy
// ============================================================================

export class SmartMergeStrategy implements MergeStrategy {
  readonly name = "smart";
  private similarityCache: BoundedCache<string, number>;
  private now: () => number;

  constructor(options: MergeStrategyOptions = {}) {
    this.now = options.now ?? Date.now;
    this.similarityCache = new BoundedCache<string, number>({
      name: "similarity",
      maxSize: options.cacheSize ?? 1000,
      ttlMs: options.cacheTtlMs ?? 0,
      now: this.now,
    });
  }

  calculateSimilarity(a: Memory, b: Memory): number {
    const key = `${memoryFingerprint(a)}|${memoryFingerprint(b)}`;
    const cached = this.similarityCache.get(key);
    if (cached !== undefined) return cached;

    const similarity =
      MERGE.CONTENT_WEIGHT * wordJaccard(a.content, b.content) +
      MERGE.ENTITY_WEIGHT * jaccard(a.relatedEntities, b.relatedEntities) +
      MERGE.TAG_WEIGHT * jaccard(a.tags, b.tags) +
      MERGE.TIME_WEIGHT * timeSimilarity(a, b);

    this.similarityCache.put(key, similarity);
    return similarity;
  }

  shouldMerge(a: Memory, b: Memory): boolean {
    return this.calculateSimilarity(a, b) >= MERGE.THRESHOLD;
  }

  merge(primary: Memory, secondary: Memory): MergeResult {
    const similarity = this.calculateSimilarity(primary, secondary);
    const timestamp = this.now();

    if (similarity < MERGE.THRESHOLD) {
      return {
        merged: primary,
        wasMerged: false,
        record: createReconstructionRecord({
          sourceId: primary.id,
          targetId: primary.id,
          kind: "merge",
          reason: `Similarity ${similarity.toFixed(2)} below merge threshold ${MERGE.THRESHOLD}`,
          before: primary.content,
          after: primary.content,
          similarity,
          confidence: 0,
          metadata: { merged: false, absorbedId: secondary.id },
          timestamp,
        }),
      };
    }

    const merged: Memory = {
      ...primary,
      content: this.mergeContent(primary, secondary),
      category: promotedCategory(primary, secondary),
      importance: Math.max(primary.importance, secondary.importance),
      relatedEntities: uniqueStrings([...primary.relatedEntities, ...secondary.relatedEntities]),
      tags: uniqueStrings([...primary.tags, ...secondary.tags]),
      accessCount: Math.max(primary.accessCount, secondary.accessCount) + 1,
      lastAccessedAt: timestamp,
    };

    return {
      merged,
      wasMerged: true,
      record: createReconstructionRecord({
        sourceId: primary.id,
        targetId: merged.id,
        kind: "merge",
        reason: `Merged similar memory ${secondary.id}`,
        before: `${primary.content} | ${secondary.content}`,
        after: merged.content,
        similarity,
        confidence: similarity,
        metadata: { merged: true, absorbedId: secondary.id },
        timestamp,
      }),
    };
  }

  clearCache(): void {
    this.similarityCache.clear();
  }

  cacheStats(): CacheStats {
    return this.similarityCache.stats();
  }

  logCacheStats(): void {
    this.similarityCache.logStats();
  }

  private mergeContent(primary: Memory, secondary: Memory): string {
    const contentSim = wordJaccard(primary.content, secondary.content);
    if (contentSim > MERGE.NEAR_DUPLICATE_CONTENT) {
      return longer(primary.content, secondary.content);
    }
    if (tokenize(secondary.content).length === 0) {
      return primary.content;
    }
    return `${primary.content.trim()} [supplement: ${secondary.content.trim()}]`;
  }
}

// ============================================================================
// Simple strategy
// ============================================================================

/**
 * Always merges, keeping the longer content. No scoring, no cache.
 */
export class SimpleMergeStrategy implements MergeStrategy {
  readonly name = "simple";

  constructor(private now: () => number = Date.now) {}

  calculateSimilarity(): number {
    return MERGE.SIMPLE_SIMILARITY;
  }

  shouldMerge(): boolean {
    return true;
  }

  merge(primary: Memory, secondary: Memory): MergeResult {
    const timestamp = this.now();
    const merged: Memory = {
      ...primary,
      content: longer(primary.content, secondary.content),
      category: promotedCategory(primary, secondary),
      importance: Math.max(primary.importance, secondary.importance),
      relatedEntities: uniqueStrings([...primary.relatedEntities, ...secondary.relatedEntities]),
      tags: uniqueStrings([...primary.tags, ...secondary.tags]),
      accessCount: Math.max(primary.accessCount, secondary.accessCount) + 1,
      lastAccessedAt: timestamp,
    };

    return {
      merged,
      wasMerged: true,
      record: createReconstructionRecord({
        sourceId: primary.id,
        targetId: merged.id,
        kind: "merge",
        reason: `Kept longer content of ${primary.id} and ${secondary.id}`,
        before: `${primary.content} | ${secondary.content}`,
        after: merged.content,
        similarity: MERGE.SIMPLE_SIMILARITY,
        confidence: MERGE.SIMPLE_SIMILARITY,
        metadata: { merged: true, absorbedId: secondary.id },
        timestamp,
      }),
    };
  }

  clearCache(): void {}

  cacheStats(): null {
    return null;
  }

  logCacheStats(): void {}
}

export function createMergeStrategy(kind: "smart" | "simple", options: MergeStrategyOptions = {}): MergeStrategy {
  return kind === "simple" ? new SimpleMergeStrategy(options.now) : new SmartMergeStrategy(options);
}

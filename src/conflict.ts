/**
 * Conflict detection and resolution
 *
 * Detection yields every ConflictType that applies to a pair; resolution
 * handles the dominant (highest severity) one.
 */

import { BoundedCache, type CacheStats } from "./cache.js";
import { containsTimeReference, wordJaccard } from "./text.js";
import {
  CONFLICT_SEVERITY,
  DAY_MS,
  memoryFingerprint,
  uniqueStrings,
  type ConflictResolution,
  type ConflictType,
  type Memory,
} from "./types.js";

export const CONFLICT = {
  CONTENT_SIMILARITY_FLOOR: 0.3,     // Below this, contents disagree
  TIME_WINDOW_MS: DAY_MS,
  IMPORTANCE_GAP: 0.5,
  EMOTION_GAP: 1.0,
  IMPORTANCE_DECISIVE_GAP: 0.3,      // Content conflicts: clear importance winner
  RECENCY_DECISIVE_MS: 7 * DAY_MS,   // Content conflicts: clear recency winner
} as const;

// Detection order doubles as the tie-break order for equal severities
const DETECTION_ORDER: readonly ConflictType[] = ["content", "time", "entity", "importance", "tag", "emotion"];

/**
 * Decides whether two memories that share an entity or tag actually
 * contradict each other about it.
 */
export type ContradictionPredicate = (a: Memory, b: Memory, shared: string[]) => boolean;

/** Any shared entity or tag counts as a conflict. */
export const sharedOnly: ContradictionPredicate = () => true;

const NEGATION_PAIRS: Array<[RegExp, RegExp]> = [
  [/\buse\s+(\w+)\b/i, /\b(?:don't|do not|never)\s+use\s+(\w+)\b/i],
  [/\blikes?\s+(\w+)\b/i, /\b(?:dislikes?|hates?|doesn't like|does not like)\s+(\w+)\b/i],
  [/\balways\s+(\w+)\b/i, /\bnever\s+(\w+)\b/i],
  [/\bprefers?\s+(\w+)\b/i, /\bavoids?\s+(\w+)\b/i],
  [/\bis\s+(\w+)\b/i, /\bis\s+not\s+(\w+)\b/i],
];

/**
 * Flags opposing statements ("likes tea" / "hates tea") whose subject is
 * the same word in both memories.
 */
export const negationContradiction: ContradictionPredicate = (a, b) => {
  const opposes = (positive: string, negative: string): boolean =>
    NEGATION_PAIRS.some(([patternPos, patternNeg]) => {
      const neg = patternNeg.exec(negative);
      if (!neg) return false;
      const subject = neg[1]?.toLowerCase();
      const pos = patternPos.exec(positive);
      return pos !== null && pos[1]?.toLowerCase() === subject && !patternNeg.test(positive);
    });

  return opposes(a.content, b.content) || opposes(b.content, a.content);
};

export function detectConflicts(
  a: Memory,
  b: Memory,
  contradicts: ContradictionPredicate = sharedOnly
): ConflictType[] {
  const conflicts: ConflictType[] = [];

  if (wordJaccard(a.content, b.content) < CONFLICT.CONTENT_SIMILARITY_FLOOR) {
    conflicts.push("content");
  }

  if (
    Math.abs(a.createdAt - b.createdAt) < CONFLICT.TIME_WINDOW_MS &&
    containsTimeReference(a.content) &&
    containsTimeReference(b.content)
  ) {
    conflicts.push("time");
  }

  const sharedEntities = a.relatedEntities.filter((e) => b.relatedEntities.includes(e));
  if (sharedEntities.length > 0 && contradicts(a, b, sharedEntities)) {
    conflicts.push("entity");
  }

  if (Math.abs(a.importance - b.importance) > CONFLICT.IMPORTANCE_GAP) {
    conflicts.push("importance");
  }

  const sharedTags = a.tags.filter((t) => b.tags.includes(t));
  if (sharedTags.length > 0 && contradicts(a, b, sharedTags)) {
    conflicts.push("tag");
  }

  if (
    Math.sign(a.emotionalValence) * Math.sign(b.emotionalValence) < 0 &&
    Math.abs(a.emotionalValence - b.emotionalValence) > CONFLICT.EMOTION_GAP
  ) {
    conflicts.push("emotion");
  }

  return conflicts;
}

/** Highest-severity conflict; ties go to the earlier type in detection order. */
export function dominantConflict(types: readonly ConflictType[]): ConflictType | undefined {
  let dominant: ConflictType | undefined;
  for (const type of DETECTION_ORDER) {
    if (!types.includes(type)) continue;
    if (dominant === undefined || CONFLICT_SEVERITY[type] > CONFLICT_SEVERITY[dominant]) {
      dominant = type;
    }
  }
  return dominant;
}

export interface ConflictResolver {
  readonly name: string;
  resolve(a: Memory, b: Memory, type: ConflictType): ConflictResolution;
  clearCache(): void;
  cacheStats(): CacheStats | null;
  logCacheStats(): void;
}

export interface ConflictResolverOptions {
  cacheSize?: number;
  cacheTtlMs?: number;
  now?: () => number;
}

// ============================================================================
// Smart resolver
// ============================================================================

export class SmartConflictResolver implements ConflictResolver {
  readonly name = "smart";
  private resolutionCache: BoundedCache<string, ConflictResolution>;
  private now: () => number;

  constructor(options: ConflictResolverOptions = {}) {
    this.now = options.now ?? Date.now;
    this.resolutionCache = new BoundedCache<string, ConflictResolution>({
      name: "resolution",
      maxSize: options.cacheSize ?? 500,
      ttlMs: options.cacheTtlMs ?? 0,
      now: this.now,
    });
  }

  resolve(a: Memory, b: Memory, type: ConflictType): ConflictResolution {
    const key = `${memoryFingerprint(a)}|${memoryFingerprint(b)}|${type}`;
    const cached = this.resolutionCache.get(key);
    if (cached) return structuredClone(cached);

    const resolution = this.resolveUncached(a, b, type);
    this.resolutionCache.put(key, structuredClone(resolution));
    return resolution;
  }

  clearCache(): void {
    this.resolutionCache.clear();
  }

  cacheStats(): CacheStats {
    return this.resolutionCache.stats();
  }

  logCacheStats(): void {
    this.resolutionCache.logStats();
  }

  private resolveUncached(a: Memory, b: Memory, type: ConflictType): ConflictResolution {
    switch (type) {
      case "content":
        return this.resolveContent(a, b);

      case "time": {
        const createdAt = Math.max(a.createdAt, b.createdAt);
        return {
          strategy: "merge_smart",
          resolved: { ...a, createdAt, lastAccessedAt: Math.max(a.lastAccessedAt, b.lastAccessedAt) },
          explanation: `Aligned timestamps to the later record (${new Date(createdAt).toISOString()})`,
          confidence: 0.9,
        };
      }

      case "entity":
        return {
          strategy: "merge_smart",
          resolved: {
            ...a,
            relatedEntities: uniqueStrings([...a.relatedEntities, ...b.relatedEntities]),
            lastAccessedAt: this.now(),
          },
          explanation: "Combined related entities from both memories",
          confidence: 0.85,
        };

      case "importance": {
        const winner = a.importance >= b.importance ? a : b;
        return {
          strategy: "keep_more_important",
          resolved: winner,
          explanation: `Kept ${winner.id} (importance ${winner.importance.toFixed(2)})`,
          confidence: 0.9,
        };
      }

      case "tag":
        return {
          strategy: "merge_smart",
          resolved: {
            ...a,
            tags: uniqueStrings([...a.tags, ...b.tags]),
            lastAccessedAt: this.now(),
          },
          explanation: "Combined tags from both memories",
          confidence: 0.9,
        };

      case "emotion": {
        const valence = (a.emotionalValence + b.emotionalValence) / 2;
        return {
          strategy: "merge_smart",
          resolved: { ...a, emotionalValence: valence, lastAccessedAt: this.now() },
          explanation: `Averaged emotional valence to ${valence.toFixed(2)}`,
          confidence: 0.75,
        };
      }
    }
  }

  private resolveContent(a: Memory, b: Memory): ConflictResolution {
    if (Math.abs(a.importance - b.importance) > CONFLICT.IMPORTANCE_DECISIVE_GAP) {
      const winner = a.importance > b.importance ? a : b;
      return {
        strategy: "keep_more_important",
        resolved: winner,
        explanation: `Contents disagree; kept the more important memory ${winner.id}`,
        confidence: 0.8,
      };
    }

    if (Math.abs(a.createdAt - b.createdAt) > CONFLICT.RECENCY_DECISIVE_MS) {
      const winner = a.createdAt > b.createdAt ? a : b;
      return {
        strategy: "keep_latest",
        resolved: winner,
        explanation: `Contents disagree; kept the newer memory ${winner.id}`,
        confidence: 0.7,
      };
    }

    return {
      strategy: "create_combined",
      resolved: {
        ...a,
        content: `[version 1] ${a.content} | [version 2] ${b.content}`,
        importance: Math.max(a.importance, b.importance),
        lastAccessedAt: this.now(),
      },
      explanation: "Contents disagree with no clear winner; kept both versions",
      confidence: 0.6,
    };
  }
}

// ============================================================================
// Simple resolver
// ============================================================================

/** Newest record wins, whatever the conflict. */
export class SimpleConflictResolver implements ConflictResolver {
  readonly name = "simple";

  resolve(a: Memory, b: Memory): ConflictResolution {
    const winner = a.createdAt >= b.createdAt ? a : b;
    return {
      strategy: "keep_latest",
      resolved: winner,
      explanation: `Kept the newer memory ${winner.id}`,
      confidence: 0.5,
    };
  }

  clearCache(): void {}

  cacheStats(): null {
    return null;
  }

  logCacheStats(): void {}
}

export function createConflictResolver(
  kind: "smart" | "simple",
  options: ConflictResolverOptions = {}
): ConflictResolver {
  return kind === "simple" ? new SimpleConflictResolver() : new SmartConflictResolver(options);
}

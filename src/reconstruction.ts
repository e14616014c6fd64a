/**
 * Reconstruction Service
 *
 * Rewrites, merges and reconciles stored memories. Every mutation is
 * upserted through the MemoryStore and leaves a ReconstructionRecord in
 * the history.
 */

import {
  detectConflicts,
  dominantConflict,
  sharedOnly,
  type ConflictResolver,
  type ContradictionPredicate,
} from "./conflict.js";
import { NotFoundError, ValidationError } from "./errors.js";
import type { ReconstructionLog } from "./history.js";
import type { MergeStrategy } from "./merge.js";
import { createReconstructionRecord } from "./records.js";
import type { MemoryStore } from "./store.js";
import type {
  ConflictResolution,
  ConflictType,
  Memory,
  ReconstructionKind,
  ReconstructionRecord,
  ResolveStrategy,
} from "./types.js";

export type RewriteKind = Exclude<ReconstructionKind, "merge">;

interface RewriteRule {
  apply: (current: string, incoming: string) => string;
  similarity: number;
  confidence: number;
}

export const REWRITE_RULES: Record<RewriteKind, RewriteRule> = {
  append: { apply: (current, incoming) => `${current}\n\nSupplement: ${incoming}`, similarity: 1.0, confidence: 0.9 },
  update: { apply: (_, incoming) => incoming, similarity: 0.8, confidence: 0.8 },
  replace: { apply: (_, incoming) => incoming, similarity: 0.5, confidence: 0.7 },
  correct: { apply: (_, incoming) => incoming, similarity: 0.6, confidence: 0.85 },
  reinterpret: {
    apply: (current, incoming) => `${current}\n\nReinterpretation: ${incoming}`,
    similarity: 0.9,
    confidence: 0.75,
  },
};

export interface ReconstructionResult {
  memory: Memory;
  record: ReconstructionRecord;
}

export interface MergeOutcome {
  success: boolean;
  similarity: number;
  merged?: Memory;
  record: ReconstructionRecord;
  reason?: string;
}

export interface MergeCandidate {
  a: Memory;
  b: Memory;
  similarity: number;
}

export interface ConflictAnalysis {
  a: Memory;
  b: Memory;
  conflicts: ConflictType[];
  dominant?: ConflictType;
  similarity: number;
}

export interface ConflictOutcome {
  conflictType: ConflictType;
  resolution: ConflictResolution;
  record: ReconstructionRecord;
}

export interface ReconstructionDeps {
  store: MemoryStore;
  history: ReconstructionLog;
  mergeStrategy: MergeStrategy;
  conflictResolver: ConflictResolver;
  contradicts?: ContradictionPredicate;
  now?: () => number;
}

const COMBINING_STRATEGIES: readonly ResolveStrategy[] = ["merge_smart", "create_combined"];

export class ReconstructionService {
  private store: MemoryStore;
  private history: ReconstructionLog;
  private mergeStrategy: MergeStrategy;
  private conflictResolver: ConflictResolver;
  private contradicts: ContradictionPredicate;
  private now: () => number;

  constructor(deps: ReconstructionDeps) {
    this.store = deps.store;
    this.history = deps.history;
    this.mergeStrategy = deps.mergeStrategy;
    this.conflictResolver = deps.conflictResolver;
    this.contradicts = deps.contradicts ?? sharedOnly;
    this.now = deps.now ?? Date.now;
  }

  async reconstructMemory(
    memoryId: string,
    kind: ReconstructionKind,
    newContent: string,
    reason: string
  ): Promise<ReconstructionResult> {
    if (kind === "merge") {
      throw new ValidationError("Merges combine two memories; use mergeMemories()", "kind");
    }
    if (newContent.trim().length === 0) {
      throw new ValidationError("New content must not be empty", "newContent");
    }

    const current = await this.require(memoryId);
    const rule = REWRITE_RULES[kind];
    const timestamp = this.now();

    const memory: Memory = {
      ...current,
      content: rule.apply(current.content, newContent),
      accessCount: current.accessCount + 1,
      lastAccessedAt: timestamp,
    };

    const record = createReconstructionRecord({
      sourceId: current.id,
      targetId: memory.id,
      kind,
      reason,
      before: current.content,
      after: memory.content,
      similarity: rule.similarity,
      confidence: rule.confidence,
      timestamp,
    });

    await this.store.store(memory);
    await this.history.append(record);
    return { memory, record };
  }

  async mergeMemories(primaryId: string, secondaryId: string): Promise<MergeOutcome> {
    if (primaryId === secondaryId) {
      throw new ValidationError("Cannot merge a memory with itself", "secondaryId");
    }
    const primary = await this.require(primaryId);
    const secondary = await this.require(secondaryId);

    const { merged, record, wasMerged } = this.mergeStrategy.merge(primary, secondary);

    if (!wasMerged) {
      await this.history.append(record);
      return {
        success: false,
        similarity: record.similarity,
        record,
        reason: record.reason,
      };
    }

    await this.store.store(merged);
    await this.history.append(record);
    return { success: true, similarity: record.similarity, merged, record };
  }

  /**
   * Every pair at or above `threshold`, most similar first.
   */
  async findMergeCandidates(threshold = 0.5, characterId?: string): Promise<MergeCandidate[]> {
    const all = await this.store.getAll();
    const memories = characterId === undefined ? all : all.filter((m) => m.characterId === characterId);
    const candidates: MergeCandidate[] = [];

    for (let i = 0; i < memories.length; i++) {
      for (let j = i + 1; j < memories.length; j++) {
        const a = memories[i];
        const b = memories[j];
        if (!a || !b) continue;
        const similarity = this.mergeStrategy.calculateSimilarity(a, b);
        if (similarity >= threshold) {
          candidates.push({ a, b, similarity });
        }
      }
    }

    return candidates.sort((x, y) => y.similarity - x.similarity);
  }

  async detectConflict(firstId: string, secondId: string): Promise<ConflictAnalysis> {
    const a = await this.require(firstId);
    const b = await this.require(secondId);
    const conflicts = detectConflicts(a, b, this.contradicts);

    return {
      a,
      b,
      conflicts,
      dominant: dominantConflict(conflicts),
      similarity: this.mergeStrategy.calculateSimilarity(a, b),
    };
  }

  /**
   * Resolve the dominant conflict between two memories. Conflicts are
   * detected when not supplied.
   */
  async resolveConflict(firstId: string, secondId: string, types?: ConflictType[]): Promise<ConflictOutcome> {
    const a = await this.require(firstId);
    const b = await this.require(secondId);
    const conflicts = types ?? detectConflicts(a, b, this.contradicts);

    const conflictType = dominantConflict(conflicts);
    if (conflictType === undefined) {
      throw new ValidationError(`No conflicts to resolve between ${firstId} and ${secondId}`, "types");
    }

    const resolution = this.conflictResolver.resolve(a, b, conflictType);
    const loser = resolution.resolved.id === a.id ? b : a;

    const record = createReconstructionRecord({
      sourceId: loser.id,
      targetId: resolution.resolved.id,
      kind: COMBINING_STRATEGIES.includes(resolution.strategy) ? "merge" : "replace",
      reason: resolution.explanation,
      before: `${a.content} | ${b.content}`,
      after: resolution.resolved.content,
      similarity: this.mergeStrategy.calculateSimilarity(a, b),
      confidence: resolution.confidence,
      metadata: { conflictType, strategy: resolution.strategy, conflicts: conflicts.join(",") },
      timestamp: this.now(),
    });

    await this.store.store(resolution.resolved);
    await this.history.append(record);
    return { conflictType, resolution, record };
  }

  async getReconstructionHistory(memoryId: string): Promise<ReconstructionRecord[]> {
    return this.history.forMemory(memoryId);
  }

  clearCache(): void {
    this.mergeStrategy.clearCache();
    this.conflictResolver.clearCache();
  }

  private async require(memoryId: string): Promise<Memory> {
    const memory = await this.store.get(memoryId);
    if (!memory) {
      throw new NotFoundError(`Memory not found: ${memoryId}`, "memory", memoryId);
    }
    return memory;
  }
}

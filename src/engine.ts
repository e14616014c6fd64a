/**
 * Engine wiring
 *
 * Builds every collaborator from configuration and exposes the handful of
 * memory operations that sit above the services (remember, recall,
 * retention).
 */

import { StaticCharacterDirectory, type CharacterDirectory } from "./characters.js";
import { ChromaMemoryStore } from "./chroma-store.js";
import type { Config } from "./config.js";
import { negationContradiction, sharedOnly, createConflictResolver, type ConflictResolver } from "./conflict.js";
import { ConsolidationPipeline } from "./consolidation.js";
import type { CacheStats } from "./cache.js";
import { NotFoundError, ValidationError } from "./errors.js";
import { InMemoryReconstructionLog, JsonFileReconstructionLog, type ReconstructionLog } from "./history.js";
import { InMemoryConsolidationLedger, JsonFileConsolidationLedger, type ConsolidationLedger } from "./ledger.js";
import { createLLMProvider } from "./llm.js";
import { createMergeStrategy, type MergeStrategy } from "./merge.js";
import { ProceduralMemoryManager } from "./procedural.js";
import {
  InMemoryProceduralStorage,
  JsonFileProceduralStorage,
  type ProceduralMemoryStorage,
} from "./procedural-storage.js";
import { ReconstructionService } from "./reconstruction.js";
import { LLMConsolidationScorer, type ConsolidationScorer } from "./scorer.js";
import { InMemoryMemoryStore, JsonFileMemoryStore, type MemoryStore } from "./store.js";
import {
  classifyStrength,
  estimateRecallDifficulty,
  halfLifeDays,
  memoryRetention,
  STRENGTH_PRESETS,
  type StrengthClass,
  type StrengthConfig,
} from "./strength.js";
import { createMemory, DAY_MS, generateId, type Memory, type MemoryInput } from "./types.js";

/** Collaborators a caller may supply instead of the configured ones. */
export interface EngineOverrides {
  store?: MemoryStore;
  history?: ReconstructionLog;
  ledger?: ConsolidationLedger;
  characters?: CharacterDirectory;
  proceduralStorage?: ProceduralMemoryStorage;
  /** null disables the scorer; undefined builds one from `config.llm`. */
  scorer?: ConsolidationScorer | null;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export type RememberInput = Omit<MemoryInput, "id" | "createdAt" | "lastAccessedAt" | "accessCount">;

export interface RetentionReport {
  memoryId: string;
  retention: number;
  strength: StrengthClass;
  halfLifeDays: number;
  daysSinceAccess: number;
}

export interface EngineCacheStats {
  similarity: CacheStats | null;
  resolution: CacheStats | null;
}

export class LifecycleEngine {
  readonly strengthConfig: StrengthConfig;

  constructor(
    readonly store: MemoryStore,
    readonly reconstruction: ReconstructionService,
    readonly consolidation: ConsolidationPipeline,
    readonly procedural: ProceduralMemoryManager,
    private mergeStrategy: MergeStrategy,
    private conflictResolver: ConflictResolver,
    readonly scorer: ConsolidationScorer | null,
    config: Config,
    private now: () => number
  ) {
    this.strengthConfig = STRENGTH_PRESETS[config.strength_preset];
  }

  /**
   * Store a new short-term memory. Recall difficulty is estimated from the
   * content when not given.
   */
  async remember(input: RememberInput): Promise<Memory> {
    if (input.content.trim().length === 0) {
      throw new ValidationError("Memory content must not be empty", "content");
    }
    if (input.characterId.trim().length === 0) {
      throw new ValidationError("Character id must not be empty", "characterId");
    }

    const now = this.now();
    const memory = createMemory(
      {
        ...input,
        id: generateId("mem", now),
        recallDifficulty: input.recallDifficulty ?? estimateRecallDifficulty(input.content),
      },
      now
    );
    await this.store.store(memory);
    return memory;
  }

  /**
   * Read a memory back. Each recall reinforces it: access and
   * reinforcement counts go up and the decay clock restarts.
   */
  async recall(memoryId: string): Promise<Memory> {
    const memory = await this.require(memoryId);
    const recalled: Memory = {
      ...memory,
      accessCount: memory.accessCount + 1,
      reinforcementCount: memory.reinforcementCount + 1,
      lastAccessedAt: this.now(),
    };
    await this.store.store(recalled);
    return recalled;
  }

  async retention(memoryId: string): Promise<RetentionReport> {
    const memory = await this.require(memoryId);
    const now = this.now();
    const value = memoryRetention(memory, now, this.strengthConfig);
    return {
      memoryId,
      retention: value,
      strength: classifyStrength(value, this.strengthConfig),
      halfLifeDays: halfLifeDays(memory, this.strengthConfig),
      daysSinceAccess: Math.max(0, now - memory.lastAccessedAt) / DAY_MS,
    };
  }

  cacheStats(): EngineCacheStats {
    return {
      similarity: this.mergeStrategy.cacheStats(),
      resolution: this.conflictResolver.cacheStats(),
    };
  }

  logCacheStats(): void {
    this.mergeStrategy.logCacheStats();
    this.conflictResolver.logCacheStats();
  }

  private async require(memoryId: string): Promise<Memory> {
    const memory = await this.store.get(memoryId);
    if (!memory) {
      throw new NotFoundError(`Memory not found: ${memoryId}`, "memory", memoryId);
    }
    return memory;
  }
}

function createStore(config: Config): MemoryStore {
  switch (config.memory_store) {
    case "chroma":
      return new ChromaMemoryStore({
        host: config.chroma_host,
        port: config.chroma_port,
        collectionName: config.chroma_collection,
      });
    case "file":
      return new JsonFileMemoryStore(config.data_dir);
    case "memory":
      return new InMemoryMemoryStore();
  }
}

function createScorer(config: Config): ConsolidationScorer | null {
  const provider = createLLMProvider(config.llm);
  if (!provider) {
    console.error("[engine] No LLM configured, consolidation uses the rule-based fallback");
    return null;
  }
  return new LLMConsolidationScorer(provider, {
    timeoutMs: config.consolidation.scorer_timeout_ms,
    maxRetries: config.consolidation.scorer_max_retries,
  });
}

/**
 * Build an engine from configuration. The "memory" store keeps every
 * other collaborator in process too; the others persist under `data_dir`.
 */
export function createLifecycleEngine(config: Config, overrides: EngineOverrides = {}): LifecycleEngine {
  const now = overrides.now ?? Date.now;
  const inProcess = config.memory_store === "memory";

  const store = overrides.store ?? createStore(config);
  const history = overrides.history ??
    (inProcess ? new InMemoryReconstructionLog() : new JsonFileReconstructionLog(config.data_dir));
  const ledger = overrides.ledger ??
    (inProcess ? new InMemoryConsolidationLedger() : new JsonFileConsolidationLedger(config.data_dir));
  const proceduralStorage = overrides.proceduralStorage ??
    (inProcess ? new InMemoryProceduralStorage() : new JsonFileProceduralStorage(config.data_dir));
  const characters = overrides.characters ?? new StaticCharacterDirectory(config.characters);
  const scorer = overrides.scorer === undefined ? createScorer(config) : overrides.scorer;

  const mergeStrategy = createMergeStrategy(config.merge_strategy, {
    cacheSize: config.similarity_cache_size,
    cacheTtlMs: config.similarity_cache_ttl_ms,
    now,
  });
  const conflictResolver = createConflictResolver(config.conflict_resolver, {
    cacheSize: config.resolution_cache_size,
    cacheTtlMs: config.resolution_cache_ttl_ms,
    now,
  });

  const reconstruction = new ReconstructionService({
    store,
    history,
    mergeStrategy,
    conflictResolver,
    contradicts: config.strict_contradictions ? negationContradiction : sharedOnly,
    now,
  });

  const consolidation = new ConsolidationPipeline(
    { store, ledger, characters, scorer },
    {
      batchDelayMs: config.consolidation.batch_delay_ms,
      applyAdaptiveThreshold: config.consolidation.apply_adaptive_threshold,
      now,
      sleep: overrides.sleep,
    }
  );

  const procedural = new ProceduralMemoryManager(proceduralStorage, {
    learningRate: config.procedural.learning_rate,
    decayRate: config.procedural.decay_rate,
    historyLimit: config.procedural.history_limit,
    now,
  });

  return new LifecycleEngine(
    store,
    reconstruction,
    consolidation,
    procedural,
    mergeStrategy,
    conflictResolver,
    scorer,
    config,
    now
  );
}

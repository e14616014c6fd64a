/**
 * Procedural Memory
 *
 * "How-to" memories (skills, habits, rules, workflows, preference patterns)
 * that get better with successful use and fade with disuse.
 *
 * ProceduralMemoryManager owns all procedural state. Every operation runs
 * one at a time on a serial queue; writes to storage happen after the
 * in-memory update, outside the queue.
 */

import { randomUUID } from "crypto";
import { NotFoundError, ValidationError } from "./errors.js";
import { InMemoryProceduralStorage, type ProceduralMemoryStorage } from "./procedural-storage.js";
import { clamp01, DAY_MS, uniqueStrings } from "./types.js";

// ============================================================================
// Model
// ============================================================================

export const PROCEDURAL_TYPES = ["skill", "habit", "rule", "workflow", "preference_pattern"] as const;

export type ProceduralType = (typeof PROCEDURAL_TYPES)[number];

export type ConditionKind = "time" | "context" | "user_state" | "emotion" | "intent" | "custom";
export type ConditionOperator = "equals" | "not_equals" | "contains" | "greater_than" | "less_than" | "in_list";

export interface Condition {
  kind: ConditionKind;
  parameter: string;
  operator: ConditionOperator;
  value: string;
}

export type ActionKind = "suggest" | "execute" | "remember" | "notify" | "query" | "adjust" | "custom";

export interface ProceduralAction {
  kind: ActionKind;
  description: string;
  parameters: Record<string, string>;
}

export interface ProceduralMemory {
  id: string;
  name: string;
  type: ProceduralType;
  pattern: string;
  conditions: Condition[];
  actions: ProceduralAction[];
  proficiency: number;          // 0-1
  executionCount: number;
  successRate: number;          // 0-1
  averageExecutionTime: number; // ms
  lastExecutedAt?: number;
  createdAt: number;
  tags: string[];
  relatedMemoryIds: string[];
}

export type ExecutionContext = Record<string, string | number | boolean>;

export interface ExecutionRecord {
  procedureId: string;
  timestamp: number;
  success: boolean;
  durationMs: number;
  context: ExecutionContext;
  error?: string;
  proficiencyBefore: number;
  proficiencyAfter: number;
}

export interface LearningProgress {
  procedureId: string;
  initialProficiency: number;
  currentProficiency: number;
  totalImprovement: number;
  improvementRate: number;
  recentSuccessRate: number;   // over the last RECENT_WINDOW executions
  history: ExecutionRecord[];
}

export interface ProceduralStatistics {
  totalCount: number;
  byType: Record<ProceduralType, number>;
  automatedCount: number;
  proficientCount: number;
  reliableCount: number;
  avgProficiency: number;
  avgSuccessRate: number;
  totalExecutions: number;
}

export interface CreateProceduralInput {
  name: string;
  type: ProceduralType;
  pattern?: string;
  conditions?: Condition[];
  actions?: ProceduralAction[];
  tags?: string[];
  relatedMemoryIds?: string[];
}

export const PROCEDURAL = {
  LEARNING_RATE: 0.05,
  FAILURE_PENALTY_FACTOR: 0.2,   // Failure costs learningRate * this
  DECAY_RATE: 0.01,              // Per unused day
  SUCCESS_RATE_ALPHA: 0.1,
  HISTORY_LIMIT: 100,
  RECENT_WINDOW: 10,
  PROFICIENT: 0.7,
  RELIABLE_SUCCESS_RATE: 0.8,
  RELIABLE_MIN_EXECUTIONS: 3,
  AUTOMATED: 0.9,
  AUTOMATED_MIN_EXECUTIONS: 10,
  DEFAULT_MIN_PROFICIENCY: 0.3,
} as const;

export function isProficient(memory: ProceduralMemory): boolean {
  return memory.proficiency >= PROCEDURAL.PROFICIENT;
}

export function isReliable(memory: ProceduralMemory): boolean {
  return memory.successRate >= PROCEDURAL.RELIABLE_SUCCESS_RATE &&
    memory.executionCount >= PROCEDURAL.RELIABLE_MIN_EXECUTIONS;
}

export function isAutomated(memory: ProceduralMemory): boolean {
  return memory.proficiency >= PROCEDURAL.AUTOMATED &&
    memory.executionCount >= PROCEDURAL.AUTOMATED_MIN_EXECUTIONS;
}

export function summarizeProcedure(memory: ProceduralMemory): string {
  const status = isAutomated(memory) ? "automated" : isProficient(memory) ? "proficient" : "learning";
  return `${memory.name} [${memory.type}] proficiency ${(memory.proficiency * 100).toFixed(0)}%, ` +
    `success ${(memory.successRate * 100).toFixed(0)}% over ${memory.executionCount} runs (${status})`;
}

function parseNumber(value: string | number | boolean): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value !== "string" || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * A condition whose parameter is missing from the context never holds;
 * numeric operators fail closed when either side is not a number.
 */
export function evaluateCondition(condition: Condition, context: ExecutionContext): boolean {
  if (!(condition.parameter in context)) return false;
  const actual = context[condition.parameter];
  if (actual === undefined) return false;
  const actualText = String(actual);

  switch (condition.operator) {
    case "equals":
      return actualText === condition.value;
    case "not_equals":
      return actualText !== condition.value;
    case "contains":
      return actualText.toLowerCase().includes(condition.value.toLowerCase());
    case "greater_than":
    case "less_than": {
      const left = parseNumber(actual);
      const right = parseNumber(condition.value);
      if (left === undefined || right === undefined) return false;
      return condition.operator === "greater_than" ? left > right : left < right;
    }
    case "in_list":
      return condition.value.split(",").map((item) => item.trim()).includes(actualText);
  }
}

export function matchesAllConditions(memory: ProceduralMemory, context: ExecutionContext): boolean {
  return memory.conditions.every((condition) => evaluateCondition(condition, context));
}

// ============================================================================
// Manager
// ============================================================================

export interface ProceduralManagerOptions {
  learningRate?: number;
  decayRate?: number;
  historyLimit?: number;
  now?: () => number;
}

interface Mutation<T> {
  result: T;
  saved?: ProceduralMemory[];
  deleted?: string[];
}

const snapshot = (memory: ProceduralMemory): ProceduralMemory => structuredClone(memory);

export class ProceduralMemoryManager {
  private memories = new Map<string, ProceduralMemory>();
  private history = new Map<string, ExecutionRecord[]>();
  private loaded = false;
  private queue: Promise<void> = Promise.resolve();
  private writes = new Map<string, Promise<void>>();

  private readonly learningRate: number;
  private readonly decayRate: number;
  private readonly historyLimit: number;
  private readonly now: () => number;

  constructor(
    private storage: ProceduralMemoryStorage = new InMemoryProceduralStorage(),
    options: ProceduralManagerOptions = {}
  ) {
    this.learningRate = options.learningRate ?? PROCEDURAL.LEARNING_RATE;
    this.decayRate = options.decayRate ?? PROCEDURAL.DECAY_RATE;
    this.historyLimit = options.historyLimit ?? PROCEDURAL.HISTORY_LIMIT;
    this.now = options.now ?? Date.now;
  }

  async create(input: CreateProceduralInput): Promise<ProceduralMemory> {
    if (input.name.trim().length === 0) {
      throw new ValidationError("Procedural memory name must not be empty", "name");
    }

    return this.mutate(() => {
      const createdAt = this.now();
      const memory: ProceduralMemory = {
        id: `proc_${createdAt}_${randomUUID()}`,
        name: input.name.trim(),
        type: input.type,
        pattern: input.pattern ?? "",
        conditions: input.conditions ?? [],
        actions: input.actions ?? [],
        proficiency: 0,
        executionCount: 0,
        successRate: 1,
        averageExecutionTime: 0,
        createdAt,
        tags: uniqueStrings(input.tags ?? []),
        relatedMemoryIds: uniqueStrings(input.relatedMemoryIds ?? []),
      };
      this.memories.set(memory.id, memory);
      return { result: snapshot(memory), saved: [snapshot(memory)] };
    });
  }

  /**
   * Record one execution and update the learning curve.
   */
  async execute(
    id: string,
    success: boolean,
    durationMs: number,
    context: ExecutionContext = {},
    error?: string
  ): Promise<ProceduralMemory> {
    if (!Number.isFinite(durationMs) || durationMs < 0) {
      throw new ValidationError(`Execution time must be a non-negative number, got ${durationMs}`, "durationMs");
    }

    return this.mutate(() => {
      const memory = this.require(id);
      const timestamp = this.now();
      const before = memory.proficiency;

      memory.proficiency = success
        ? clamp01(before + this.learningRate * (1 - before))
        : clamp01(before - this.learningRate * PROCEDURAL.FAILURE_PENALTY_FACTOR);

      const outcome = success ? 1 : 0;
      memory.successRate = memory.executionCount === 0
        ? outcome
        : clamp01(PROCEDURAL.SUCCESS_RATE_ALPHA * outcome + (1 - PROCEDURAL.SUCCESS_RATE_ALPHA) * memory.successRate);

      memory.averageExecutionTime =
        (memory.averageExecutionTime * memory.executionCount + durationMs) / (memory.executionCount + 1);
      memory.executionCount++;
      memory.lastExecutedAt = timestamp;

      const records = this.history.get(id) ?? [];
      records.push({
        procedureId: id,
        timestamp,
        success,
        durationMs,
        context: { ...context },
        error,
        proficiencyBefore: before,
        proficiencyAfter: memory.proficiency,
      });
      this.history.set(id, records.slice(-this.historyLimit));

      return { result: snapshot(memory), saved: [snapshot(memory)] };
    });
  }

  /**
   * Procedures whose every condition holds in `context`, most proficient first.
   */
  async findMatching(
    context: ExecutionContext,
    type?: ProceduralType,
    minProficiency: number = PROCEDURAL.DEFAULT_MIN_PROFICIENCY
  ): Promise<ProceduralMemory[]> {
    return this.read(() =>
      [...this.memories.values()]
        .filter((m) => type === undefined || m.type === type)
        .filter((m) => m.proficiency >= minProficiency)
        .filter((m) => matchesAllConditions(m, context))
        .sort((a, b) => b.proficiency - a.proficiency)
        .map(snapshot)
    );
  }

  /**
   * Reduce proficiency of every procedure unused for at least `days` days
   * by decayRate * days. Returns how many changed.
   */
  async applyDecay(days = 1): Promise<number> {
    if (!Number.isFinite(days) || days <= 0) {
      throw new ValidationError(`Decay period must be positive, got ${days}`, "days");
    }

    return this.mutate(() => {
      const cutoff = this.now() - days * DAY_MS;
      const changed: ProceduralMemory[] = [];

      for (const memory of this.memories.values()) {
        const lastUsed = memory.lastExecutedAt ?? memory.createdAt;
        if (lastUsed > cutoff || memory.proficiency === 0) continue;
        memory.proficiency = Math.max(0, memory.proficiency - this.decayRate * days);
        changed.push(snapshot(memory));
      }

      if (changed.length > 0) {
        console.error(`[procedural] Decayed ${changed.length} procedure(s) unused for ${days} day(s)`);
      }
      return { result: changed.length, saved: changed };
    });
  }

  async get(id: string): Promise<ProceduralMemory> {
    return this.read(() => snapshot(this.require(id)));
  }

  async getAll(): Promise<ProceduralMemory[]> {
    return this.read(() => [...this.memories.values()].map(snapshot));
  }

  async getByType(type: ProceduralType): Promise<ProceduralMemory[]> {
    return this.read(() => [...this.memories.values()].filter((m) => m.type === type).map(snapshot));
  }

  async getByTag(tag: string): Promise<ProceduralMemory[]> {
    return this.read(() => [...this.memories.values()].filter((m) => m.tags.includes(tag)).map(snapshot));
  }

  async getAutomatedSkills(): Promise<ProceduralMemory[]> {
    return this.read(() =>
      [...this.memories.values()]
        .filter(isAutomated)
        .sort((a, b) => b.proficiency - a.proficiency)
        .map(snapshot)
    );
  }

  async getLearningProgress(id: string): Promise<LearningProgress> {
    return this.read(() => {
      const memory = this.require(id);
      const history = [...(this.history.get(id) ?? [])];
      const initialProficiency = history[0]?.proficiencyBefore ?? memory.proficiency;
      const successes = history.filter((r) => r.success).length;
      const recent = history.slice(-PROCEDURAL.RECENT_WINDOW);

      return {
        procedureId: id,
        initialProficiency,
        currentProficiency: memory.proficiency,
        totalImprovement: memory.proficiency - initialProficiency,
        improvementRate: history.length > 1 ? (successes / history.length) * this.learningRate : 0,
        recentSuccessRate: recent.length === 0 ? 0 : recent.filter((r) => r.success).length / recent.length,
        history,
      };
    });
  }

  async getStatistics(): Promise<ProceduralStatistics> {
    return this.read(() => {
      const all = [...this.memories.values()];
      const byType: Record<ProceduralType, number> = {
        skill: 0,
        habit: 0,
        rule: 0,
        workflow: 0,
        preference_pattern: 0,
      };
      for (const memory of all) {
        byType[memory.type]++;
      }
      const mean = (values: number[]) =>
        values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;

      return {
        totalCount: all.length,
        byType,
        automatedCount: all.filter(isAutomated).length,
        proficientCount: all.filter(isProficient).length,
        reliableCount: all.filter(isReliable).length,
        avgProficiency: mean(all.map((m) => m.proficiency)),
        avgSuccessRate: mean(all.map((m) => m.successRate)),
        totalExecutions: all.reduce((sum, m) => sum + m.executionCount, 0),
      };
    });
  }

  async delete(id: string): Promise<void> {
    return this.mutate(() => {
      this.require(id);
      this.memories.delete(id);
      this.history.delete(id);
      return { result: undefined, deleted: [id] };
    });
  }

  /** Wait for every pending storage write. */
  async flush(): Promise<void> {
    await Promise.allSettled([...this.writes.values()]);
  }

  // ==========================================================================
  // Serialization
  // ==========================================================================

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // The queue only orders work; each task's error goes to its own caller
    this.queue = run.then(() => undefined, () => undefined);
    return run;
  }

  private read<T>(fn: () => T): Promise<T> {
    return this.exclusive(async () => {
      await this.hydrate();
      return fn();
    });
  }

  private async mutate<T>(fn: () => Mutation<T>): Promise<T> {
    const { result, saved = [], deleted = [] } = await this.read(fn);
    await Promise.all([
      ...saved.map((memory) => this.persist(memory.id, memory)),
      ...deleted.map((id) => this.persist(id, null)),
    ]);
    return result;
  }

  /**
   * Chain storage writes per id so they land in mutation order.
   */
  private persist(id: string, memory: ProceduralMemory | null): Promise<void> {
    const previous = this.writes.get(id) ?? Promise.resolve();
    const settle = () => {
      if (this.writes.get(id) === write) this.writes.delete(id);
    };
    // An earlier failed write was already reported to its own caller
    const write: Promise<void> = previous
      .catch(() => undefined)
      .then(() => (memory ? this.storage.save(memory) : this.storage.delete(id)))
      .then(settle, (error: unknown) => {
        settle();
        throw error;
      });
    this.writes.set(id, write);
    return write;
  }

  private async hydrate(): Promise<void> {
    if (this.loaded) return;
    for (const memory of await this.storage.getAll()) {
      this.memories.set(memory.id, memory);
    }
    this.loaded = true;
  }

  private require(id: string): ProceduralMemory {
    const memory = this.memories.get(id);
    if (!memory) {
      throw new NotFoundError(`Procedural memory not found: ${id}`, "procedural_memory", id);
    }
    return memory;
  }
}

/**
 * Persistence for procedural memories.
 */

import { join } from "path";
import { z } from "zod";
import { JsonFile } from "./json-file.js";
import type { ProceduralMemory } from "./procedural.js";

export interface ProceduralMemoryStorage {
  save(memory: ProceduralMemory): Promise<void>;
  getById(id: string): Promise<ProceduralMemory | undefined>;
  getAll(): Promise<ProceduralMemory[]>;
  delete(id: string): Promise<void>;
}

function copy(memory: ProceduralMemory): ProceduralMemory {
  return structuredClone(memory);
}

export class InMemoryProceduralStorage implements ProceduralMemoryStorage {
  private memories = new Map<string, ProceduralMemory>();

  async save(memory: ProceduralMemory): Promise<void> {
    this.memories.set(memory.id, copy(memory));
  }

  async getById(id: string): Promise<ProceduralMemory | undefined> {
    const memory = this.memories.get(id);
    return memory ? copy(memory) : undefined;
  }

  async getAll(): Promise<ProceduralMemory[]> {
    return [...this.memories.values()].map(copy);
  }

  async delete(id: string): Promise<void> {
    this.memories.delete(id);
  }
}

const ConditionSchema = z.object({
  kind: z.enum(["time", "context", "user_state", "emotion", "intent", "custom"]),
  parameter: z.string(),
  operator: z.enum(["equals", "not_equals", "contains", "greater_than", "less_than", "in_list"]),
  value: z.string(),
});

const ActionSchema = z.object({
  kind: z.enum(["suggest", "execute", "remember", "notify", "query", "adjust", "custom"]),
  description: z.string(),
  parameters: z.record(z.string()),
});

export const ProceduralMemorySchema: z.ZodType<ProceduralMemory> = z.object({
  id: z.string(),
  name: z.string(),
  type: z.enum(["skill", "habit", "rule", "workflow", "preference_pattern"]),
  pattern: z.string(),
  conditions: z.array(ConditionSchema),
  actions: z.array(ActionSchema),
  proficiency: z.number().min(0).max(1),
  executionCount: z.number().int().nonnegative(),
  successRate: z.number().min(0).max(1),
  averageExecutionTime: z.number().nonnegative(),
  lastExecutedAt: z.number().optional(),
  createdAt: z.number(),
  tags: z.array(z.string()),
  relatedMemoryIds: z.array(z.string()),
});

const ProceduralFileSchema = z.object({
  version: z.literal(1),
  procedures: z.array(ProceduralMemorySchema),
});

type ProceduralFile = z.infer<typeof ProceduralFileSchema>;

export const PROCEDURAL_FILE = "procedural-memories.json";

export class JsonFileProceduralStorage implements ProceduralMemoryStorage {
  private file: JsonFile<ProceduralFile>;

  constructor(dataDir: string) {
    this.file = new JsonFile(
      join(dataDir, PROCEDURAL_FILE),
      ProceduralFileSchema,
      () => ({ version: 1, procedures: [] }),
      "procedural"
    );
  }

  async save(memory: ProceduralMemory): Promise<void> {
    const { procedures } = this.file.load();
    const index = procedures.findIndex((p) => p.id === memory.id);
    if (index >= 0) {
      procedures[index] = memory;
    } else {
      procedures.push(memory);
    }
    this.file.save({ version: 1, procedures });
  }

  async getById(id: string): Promise<ProceduralMemory | undefined> {
    return this.file.load().procedures.find((p) => p.id === id);
  }

  async getAll(): Promise<ProceduralMemory[]> {
    return this.file.load().procedures;
  }

  async delete(id: string): Promise<void> {
    const { procedures } = this.file.load();
    this.file.save({ version: 1, procedures: procedures.filter((p) => p.id !== id) });
  }
}

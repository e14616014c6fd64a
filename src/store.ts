/**
 * Persistence contract for episodic memories.
 *
 * The engine only ever reads one record, reads all records, or upserts.
 */

import { join } from "path";
import { z } from "zod";
import { JsonFile } from "./json-file.js";
import { MemorySchema } from "./schemas.js";
import type { Memory } from "./types.js";

export interface MemoryStore {
  get(id: string): Promise<Memory | undefined>;
  getAll(): Promise<Memory[]>;
  /** Upsert by id. */
  store(memory: Memory): Promise<void>;
}

function copy(memory: Memory): Memory {
  return { ...memory, tags: [...memory.tags], relatedEntities: [...memory.relatedEntities] };
}

/**
 * Process-local store. Copies on the way in and out so callers never
 * share a mutable record with the store.
 */
export class InMemoryMemoryStore implements MemoryStore {
  private memories = new Map<string, Memory>();

  constructor(initial: Memory[] = []) {
    for (const memory of initial) {
      this.memories.set(memory.id, copy(memory));
    }
  }

  async get(id: string): Promise<Memory | undefined> {
    const memory = this.memories.get(id);
    return memory ? copy(memory) : undefined;
  }

  async getAll(): Promise<Memory[]> {
    return [...this.memories.values()].map(copy);
  }

  async store(memory: Memory): Promise<void> {
    this.memories.set(memory.id, copy(memory));
  }
}

const MemoryFileSchema = z.object({
  version: z.literal(1),
  memories: z.array(MemorySchema),
});

type MemoryFile = z.infer<typeof MemoryFileSchema>;

export const MEMORY_FILE = "memories.json";

export class JsonFileMemoryStore implements MemoryStore {
  private file: JsonFile<MemoryFile>;

  constructor(dataDir: string) {
    this.file = new JsonFile(
      join(dataDir, MEMORY_FILE),
      MemoryFileSchema,
      () => ({ version: 1, memories: [] }),
      "memories"
    );
  }

  async get(id: string): Promise<Memory | undefined> {
    return this.file.load().memories.find((m) => m.id === id);
  }

  async getAll(): Promise<Memory[]> {
    return this.file.load().memories;
  }

  async store(memory: Memory): Promise<void> {
    const { memories } = this.file.load();
    const index = memories.findIndex((m) => m.id === memory.id);
    if (index >= 0) {
      memories[index] = memory;
    } else {
      memories.push(memory);
    }
    this.file.save({ version: 1, memories });
  }
}

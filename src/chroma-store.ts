import { ChromaClient, IncludeEnum } from "chromadb";
import { z } from "zod";
import { HashedLexicalEmbedding } from "./embedding.js";
import { PersistenceError, errorMessage, isTransientError, withRetry } from "./errors.js";
import type { MemoryStore } from "./store.js";
import { createMemory, type Memory } from "./types.js";

export type ChromaMetadata = Record<string, string | number | boolean>;

/**
 * The slice of a Chroma collection the store uses.
 */
export interface MemoryCollection {
  get(params: { ids?: string[]; include?: IncludeEnum[] }): Promise<{
    ids: string[];
    documents: (string | null)[];
    metadatas: (Record<string, unknown> | null)[];
  }>;
  upsert(params: { ids: string[]; documents: string[]; metadatas: ChromaMetadata[] }): Promise<unknown>;
}

export interface ChromaStoreOptions {
  host: string;
  port: number;
  collectionName: string;
  /** Override how the collection is obtained (tests pass an in-process fake). */
  connect?: () => Promise<MemoryCollection>;
}

const INCLUDE = [IncludeEnum.Documents, IncludeEnum.Metadatas];

const list = z.string().catch("").transform((s) => s.split(",").filter(Boolean));

const StoredMetadataSchema = z.object({
  characterId: z.string().catch(""),
  category: z.enum(["SHORT_TERM", "LONG_TERM"]).catch("SHORT_TERM"),
  tags: list,
  relatedEntities: list,
  importance: z.number().catch(0.5),
  confidence: z.number().catch(1),
  emotionalValence: z.number().catch(0),
  emotionTag: z.string().optional().catch(undefined),
  emotionIntensity: z.number().optional().catch(undefined),
  reinforcementCount: z.number().catch(0),
  recallDifficulty: z.number().catch(0.5),
  contextRelevance: z.number().catch(0.5),
  createdAt: z.number().catch(0),
  lastAccessedAt: z.number().catch(0),
  accessCount: z.number().int().catch(0),
});

export function memoryToMetadata(memory: Memory): ChromaMetadata {
  const metadata: ChromaMetadata = {
    characterId: memory.characterId,
    category: memory.category,
    tags: memory.tags.join(","),
    relatedEntities: memory.relatedEntities.join(","),
    importance: memory.importance,
    confidence: memory.confidence,
    emotionalValence: memory.emotionalValence,
    reinforcementCount: memory.reinforcementCount,
    recallDifficulty: memory.recallDifficulty,
    contextRelevance: memory.contextRelevance,
    createdAt: memory.createdAt,
    lastAccessedAt: memory.lastAccessedAt,
    accessCount: memory.accessCount,
  };
  // Chroma metadata has no null, so optional fields are omitted
  if (memory.emotionTag !== undefined) metadata.emotionTag = memory.emotionTag;
  if (memory.emotionIntensity !== undefined) metadata.emotionIntensity = memory.emotionIntensity;
  return metadata;
}

export function memoryFromChroma(id: string, document: string | null, metadata: Record<string, unknown> | null): Memory {
  const parsed = StoredMetadataSchema.parse(metadata ?? {});
  return createMemory({ id, content: document ?? "", ...parsed });
}

/**
 * Memories in a ChromaDB collection: content as the document, scalar
 * fields as metadata, tags and entities comma-joined.
 */
export class ChromaMemoryStore implements MemoryStore {
  private collection: MemoryCollection | null = null;
  private initPromise: Promise<MemoryCollection> | null = null;

  constructor(private options: ChromaStoreOptions) {}

  async get(id: string): Promise<Memory | undefined> {
    const collection = await this.init();
    const result = await this.run(`reading memory ${id}`, () => collection.get({ ids: [id], include: INCLUDE }));
    const index = result.ids.indexOf(id);
    if (index < 0) return undefined;
    return memoryFromChroma(id, result.documents[index] ?? null, result.metadatas[index] ?? null);
  }

  async getAll(): Promise<Memory[]> {
    const collection = await this.init();
    const result = await this.run("reading memories", () => collection.get({ include: INCLUDE }));
    return result.ids.map((id, i) =>
      memoryFromChroma(id, result.documents[i] ?? null, result.metadatas[i] ?? null)
    );
  }

  async store(memory: Memory): Promise<void> {
    const collection = await this.init();
    await this.run(`storing memory ${memory.id}`, () =>
      collection.upsert({
        ids: [memory.id],
        documents: [memory.content],
        metadatas: [memoryToMetadata(memory)],
      })
    );
  }

  /**
   * Connect once. Concurrent callers wait on the same connection attempt,
   * and a failed attempt is forgotten so the next call retries.
   */
  private async init(): Promise<MemoryCollection> {
    if (this.collection) return this.collection;
    if (this.initPromise) return this.initPromise;

    this.initPromise = (this.options.connect ?? (() => this.connect()))()
      .then((collection) => {
        this.collection = collection;
        return collection;
      })
      .catch((error: unknown) => {
        const transient = isTransientError(error) || errorMessage(error).includes("fetch");
        throw new PersistenceError(
          `Failed to initialize ChromaDB at ${this.options.host}:${this.options.port}: ${errorMessage(error)}`,
          transient,
          error
        );
      })
      .finally(() => {
        this.initPromise = null;
      });

    return this.initPromise;
  }

  private async connect(): Promise<MemoryCollection> {
    const client = new ChromaClient({ path: `http://${this.options.host}:${this.options.port}` });
    const collection = await client.getOrCreateCollection({
      name: this.options.collectionName,
      metadata: { description: "Agent episodic memories" },
      embeddingFunction: new HashedLexicalEmbedding(),
    });
    console.error(`[store] Connected to ChromaDB at ${this.options.host}:${this.options.port}`);
    return collection;
  }

  private async run<T>(context: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(fn, { maxRetries: 2 });
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError(`Failed ${context}: ${errorMessage(error)}`, isTransientError(error), error);
    }
  }
}

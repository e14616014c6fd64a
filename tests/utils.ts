/**
 * Test utilities: factories, a fixed clock and in-process fakes
 */

import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { vi } from 'vitest';
import type { ChromaMetadata, MemoryCollection } from '../src/chroma-store.js';
import type { LLMOptions, LLMProvider } from '../src/llm.js';
import type { ConsolidationScorer, MemoryEvaluation, ScoringContext } from '../src/scorer.js';
import { overallScore } from '../src/scorer.js';
import { createMemory, DAY_MS, type Memory, type MemoryInput } from '../src/types.js';

// ============ CLOCK ============

/** 2024-01-15T00:00:00.000Z */
export const FIXED_NOW = 1_705_276_800_000;

export const daysAgo = (days: number, now: number = FIXED_NOW): number => now - days * DAY_MS;

/**
 * A clock tests can move forward by hand.
 */
export function createClock(start: number = FIXED_NOW) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
    set: (value: number) => {
      current = value;
    },
  };
}

// ============ MOCK FACTORIES ============

let memoryCounter = 0;

/**
 * Create a Memory with sensible defaults: a 2-day-old short-term memory
 * of character "alice".
 */
export function createTestMemory(overrides: Partial<MemoryInput> = {}): Memory {
  memoryCounter++;
  return createMemory(
    {
      id: `mem_test_${memoryCounter}`,
      characterId: 'alice',
      content: 'Test memory content',
      createdAt: daysAgo(2),
      ...overrides,
    },
    FIXED_NOW
  );
}

/**
 * Build a scorer evaluation; overallScore is derived from the dimensions.
 */
export function createEvaluation(
  memoryId: string,
  overrides: Partial<Omit<MemoryEvaluation, 'memoryId' | 'overallScore'>> = {}
): MemoryEvaluation {
  const scores = {
    semanticValue: 0.8,
    emotionalDepth: 0.8,
    associationValue: 0.8,
    characterDevelopment: 0.8,
    practicalValue: 0.8,
  };
  const merged = {
    shouldConsolidate: true,
    confidence: 0.9,
    reasoning: 'worth keeping',
    ...scores,
    ...overrides,
  };
  return { ...merged, memoryId, overallScore: overallScore(merged) };
}

/**
 * Scorer fake. The handler decides per call; by default every candidate
 * is rated with createEvaluation.
 */
export function createStubScorer(
  handler: (candidates: Memory[]) => MemoryEvaluation[] | Promise<MemoryEvaluation[]> = (candidates) =>
    candidates.map((m) => createEvaluation(m.id))
) {
  const evaluate = vi.fn(async (candidates: Memory[], _context: ScoringContext, _now?: number) =>
    handler(candidates)
  );
  const scorer: ConsolidationScorer = { name: 'stub:scorer', evaluate, isAvailable: async () => true };
  return { scorer, evaluate };
}

/**
 * LLM provider fake returning canned completions in order; the last one repeats.
 */
export function createMockProvider(...replies: Array<string | Error>) {
  let call = 0;
  const complete = vi.fn(async (_prompt: string, _options?: LLMOptions) => {
    const reply = replies[Math.min(call, replies.length - 1)];
    call++;
    if (reply instanceof Error) throw reply;
    return { content: reply ?? '', model: 'mock-model' };
  });
  const provider: LLMProvider = {
    name: 'mock',
    model: 'mock-model',
    complete,
    isAvailable: async () => true,
  };
  return { provider, complete };
}

// ============ CHROMADB MOCKS ============

/**
 * In-process stand-in for a Chroma collection (get + upsert)
 */
export function createMockCollection() {
  const store = new Map<string, { document: string; metadata: ChromaMetadata }>();

  const get = vi.fn(async ({ ids }: { ids?: string[] }) => {
    const wanted = ids ?? [...store.keys()];
    const found = wanted.filter((id) => store.has(id));
    return {
      ids: found,
      documents: found.map((id) => store.get(id)?.document ?? null),
      metadatas: found.map((id) => store.get(id)?.metadata ?? null),
    };
  });

  const upsert = vi.fn(async ({ ids, documents, metadatas }: {
    ids: string[];
    documents: string[];
    metadatas: ChromaMetadata[];
  }) => {
    ids.forEach((id, i) => {
      store.set(id, { document: documents[i] ?? '', metadata: metadatas[i] ?? {} });
    });
  });

  const collection: MemoryCollection = { get, upsert };
  return { collection, get, upsert, store };
}

// ============ FILESYSTEM ============

export function createTempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), 'memory-lifecycle-'));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

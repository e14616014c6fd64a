/**
 * Consolidation scorer
 *
 * Asks an LLM to rate short-term memories on a five-dimension rubric and
 * parses its free-text reply. Parsing never throws: anything that cannot
 * be read is dropped, and the pipeline falls back for those memories.
 */

import { z } from "zod";
import { ScorerError, errorMessage, isTransientError, withRetry, withTimeout } from "./errors.js";
import type { LLMProvider } from "./llm.js";
import { clamp01, DAY_MS, type Memory } from "./types.js";

export const RUBRIC = {
  semanticValue: 0.3,
  emotionalDepth: 0.25,
  associationValue: 0.2,
  characterDevelopment: 0.15,
  practicalValue: 0.1,
} as const;

export type RubricDimension = keyof typeof RUBRIC;

export interface ScoringContext {
  characterName: string;
  characterSummary?: string;
  relatedMemories: Memory[];
  relationships: string[];
  stats: {
    totalMemories: number;
    longTermCount: number;
    shortTermCount: number;
    avgImportance: number;
  };
}

export interface MemoryEvaluation extends Record<RubricDimension, number> {
  memoryId: string;
  shouldConsolidate: boolean;
  confidence: number;
  overallScore: number;
  reasoning: string;
}

export interface ConsolidationScorer {
  readonly name: string;
  /**
   * Rate a group of candidates. Throws on transport failure or timeout;
   * returns whatever evaluations could be parsed otherwise.
   */
  evaluate(candidates: Memory[], context: ScoringContext, now?: number): Promise<MemoryEvaluation[]>;
  /** Whether the backend answers right now. */
  isAvailable(): Promise<boolean>;
}

export function overallScore(scores: Record<RubricDimension, number>): number {
  return clamp01(
    scores.semanticValue * RUBRIC.semanticValue +
    scores.emotionalDepth * RUBRIC.emotionalDepth +
    scores.associationValue * RUBRIC.associationValue +
    scores.characterDevelopment * RUBRIC.characterDevelopment +
    scores.practicalValue * RUBRIC.practicalValue
  );
}

// ============================================================================
// Prompt
// ============================================================================

const SYSTEM_PROMPT = `You evaluate which of a character's short-term memories deserve to become long-term memories.
Judge each memory on its own merits and answer only with JSON.`;

export function buildScoringPrompt(candidates: Memory[], context: ScoringContext, now: number = Date.now()): string {
  const payload = {
    character: {
      name: context.characterName,
      summary: context.characterSummary ?? "",
      relationships: context.relationships,
      stats: context.stats,
    },
    relatedLongTermMemories: context.relatedMemories.map((m) => ({
      content: m.content,
      importance: m.importance,
      tags: m.tags,
    })),
    candidates: candidates.map((m) => ({
      id: m.id,
      content: m.content,
      importance: m.importance,
      emotionIntensity: m.emotionIntensity ?? 0,
      accessCount: m.accessCount,
      tags: m.tags,
      createdAt: new Date(m.createdAt).toISOString(),
      ageDays: Number(((now - m.createdAt) / DAY_MS).toFixed(1)),
    })),
  };

  return `Evaluate these candidate memories for long-term consolidation.

${JSON.stringify(payload, null, 2)}

Score every candidate from 0.0 to 1.0 on:
- semanticValue: how much lasting information it carries (weight ${RUBRIC.semanticValue})
- emotionalDepth: emotional significance to the character (weight ${RUBRIC.emotionalDepth})
- associationValue: how well it connects to the related memories (weight ${RUBRIC.associationValue})
- characterDevelopment: what it contributes to the character's growth (weight ${RUBRIC.characterDevelopment})
- practicalValue: usefulness in future conversations (weight ${RUBRIC.practicalValue})

Respond with JSON, one entry per candidate, using the candidate's id:
{
  "evaluations": [
    {
      "id": "candidate id",
      "shouldConsolidate": true,
      "confidence": 0.0-1.0,
      "semanticValue": 0.0-1.0,
      "emotionalDepth": 0.0-1.0,
      "associationValue": 0.0-1.0,
      "characterDevelopment": 0.0-1.0,
      "practicalValue": 0.0-1.0,
      "reasoning": "brief explanation"
    }
  ]
}`;
}

// ============================================================================
// Response parsing
// ============================================================================

const dimension = z.number().catch(0).transform(clamp01);

const EvaluationSchema = z.object({
  id: z.union([z.string(), z.number()]),
  shouldConsolidate: z.boolean(),
  confidence: z.number().transform(clamp01),
  semanticValue: dimension,
  emotionalDepth: dimension,
  associationValue: dimension,
  characterDevelopment: dimension,
  practicalValue: dimension,
  reasoning: z.string().catch(""),
});

const EnvelopeSchema = z.object({ evaluations: z.array(z.unknown()) });

/** Match a reply id to a candidate: exact id first, then zero-based index. */
function resolveCandidate(id: string | number, candidates: Memory[]): Memory | undefined {
  const key = String(id).trim();
  const byId = candidates.find((m) => m.id === key);
  if (byId) return byId;

  if (/^\d+$/.test(key)) {
    return candidates[Number(key)];
  }
  return undefined;
}

export function parseScoringResponse(text: string, candidates: Memory[]): MemoryEvaluation[] {
  const jsonMatch = text.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    console.error("[scorer] No JSON found in scorer response");
    return [];
  }

  let raw: unknown;
  try {
    raw = JSON.parse(jsonMatch[0]);
  } catch (error) {
    console.error("[scorer] Unparsable scorer response:", errorMessage(error));
    return [];
  }

  const envelope = EnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    console.error("[scorer] Scorer response has no evaluations array");
    return [];
  }

  const evaluations: MemoryEvaluation[] = [];
  const seen = new Set<string>();

  for (const entry of envelope.data.evaluations) {
    const parsed = EvaluationSchema.safeParse(entry);
    if (!parsed.success) continue;

    const memory = resolveCandidate(parsed.data.id, candidates);
    if (!memory || seen.has(memory.id)) continue;
    seen.add(memory.id);

    const { id: _id, ...scores } = parsed.data;
    evaluations.push({
      ...scores,
      memoryId: memory.id,
      overallScore: overallScore(scores),
    });
  }

  return evaluations;
}

// ============================================================================
// LLM-backed scorer
// ============================================================================

export interface LLMScorerOptions {
  timeoutMs?: number;
  maxRetries?: number;
  initialDelayMs?: number;
}

export class LLMConsolidationScorer implements ConsolidationScorer {
  readonly name: string;
  private timeoutMs: number;
  private maxRetries: number;
  private initialDelayMs: number;

  constructor(private provider: LLMProvider, options: LLMScorerOptions = {}) {
    this.name = `${provider.name}:${provider.model}`;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxRetries = options.maxRetries ?? 2;
    this.initialDelayMs = options.initialDelayMs ?? 500;
  }

  async isAvailable(): Promise<boolean> {
    return this.provider.isAvailable();
  }

  async evaluate(candidates: Memory[], context: ScoringContext, now: number = Date.now()): Promise<MemoryEvaluation[]> {
    const prompt = buildScoringPrompt(candidates, context, now);

    const attempt = async (): Promise<string> => {
      const controller = new AbortController();
      try {
        const response = await withTimeout(
          this.provider.complete(prompt, {
            systemPrompt: SYSTEM_PROMPT,
            maxTokens: 400 + candidates.length * 200,
            temperature: 0.2,
            jsonMode: true,
            signal: controller.signal,
          }),
          this.timeoutMs,
          `scorer ${this.name}`
        );
        return response.content;
      } finally {
        // Cancels the request if the timeout won the race
        controller.abort();
      }
    };

    let content: string;
    try {
      content = await withRetry(attempt, {
        maxRetries: this.maxRetries,
        initialDelayMs: this.initialDelayMs,
        shouldRetry: isTransientError,
      });
    } catch (error) {
      if (error instanceof ScorerError) throw error;
      throw new ScorerError(`Scorer ${this.name} failed: ${errorMessage(error)}`, false);
    }

    return parseScoringResponse(content, candidates);
  }
}

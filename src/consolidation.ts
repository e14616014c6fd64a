/**
 * Consolidation Pipeline
 *
 * Promotes a character's short-term memories to long-term:
 * 1. Filter out memories too young, too trivial, or tagged as throwaway
 * 2. Group the survivors around anchor memories by relevance
 * 3. Score each group with the external scorer (rule-based fallback)
 * 4. Consolidate, defer or reject each memory
 * 5. Log decisions and adapt the character's evaluation threshold
 */

import type { CharacterDirectory } from "./characters.js";
import { errorMessage } from "./errors.js";
import type {
  ConsolidationLedger,
  ConsolidationStatistics,
  DecisionLogEntry,
  PatternAnalysis,
} from "./ledger.js";
import type { ConsolidationScorer, MemoryEvaluation, ScoringContext } from "./scorer.js";
import type { MemoryStore } from "./store.js";
import { excerpt, intersects, normalizedTextSimilarity, wordJaccard } from "./text.js";
import { DAY_MS, type Memory } from "./types.js";

export const CONSOLIDATION = {
  MIN_AGE_MS: DAY_MS,
  MIN_IMPORTANCE: 0.2,           // Exclusive
  GROUP_RELEVANCE_THRESHOLD: 0.3,
  MAX_GROUP_SIZE: 5,
  MAX_RELATED_MEMORIES: 5,
  RELATED_SIMILARITY: 0.3,       // Exclusive
  MAX_RELATIONSHIPS: 3,
  CONFIDENCE_BAR: 0.6,           // Exclusive
  FALLBACK_IMPORTANCE: 0.7,      // Exclusive
  FALLBACK_ACCESS_COUNT: 2,      // Exclusive
  FALLBACK_CONFIDENCE: 0.3,
  MIN_DECISIONS_FOR_ADAPTATION: 5,
  DEFAULT_THRESHOLD: 0.5,
  THRESHOLD_STEP: 0.05,
  THRESHOLD_MAX: 0.9,
  THRESHOLD_MIN: 0.1,
  RAISE_RATE: 0.8,               // consolidatedRate above this and...
  RAISE_SCORE: 0.7,              // ...avgScore above this raise the threshold
  LOWER_RATE: 0.3,               // consolidatedRate below this and...
  LOWER_SCORE: 0.4,              // ...avgScore below this lower it
  DEFAULT_CHARACTER_NAME: "Unknown character",
} as const;

// Memories carrying any of these tags are never promoted
const EXCLUDED_TAGS: readonly string[] = ["temporary", "system_generated"];

// Relevance weights for grouping
const RELEVANCE = {
  RECENCY: 0.2,
  TAGS: 0.3,
  EMOTION: 0.2,
  CONTENT: 0.3,
} as const;

export type ConsolidationOutcome = "consolidated" | "deferred" | "rejected";

export type EvaluationSource = "scorer" | "fallback";

/** A rated memory awaiting execution. */
export type Decision =
  | { source: "scorer"; memory: Memory; evaluation: MemoryEvaluation }
  | { source: "fallback"; memory: Memory; shouldConsolidate: boolean; confidence: number; reasoning: string };

export interface ConsolidationDetail {
  memoryId: string;
  excerpt: string;
  outcome: ConsolidationOutcome;
  reasoning: string;
  confidence: number;
  score: number | null;
  source: EvaluationSource;
}

export interface ThresholdAdjustment {
  previous: number;
  next: number;
  direction: "increase" | "decrease" | "unchanged";
  consolidatedRate: number;
  avgScore: number;
}

export interface ConsolidationResult {
  characterId: string;
  totalEvaluated: number;
  consolidated: number;
  deferred: number;
  rejected: number;
  details: ConsolidationDetail[];
  adjustment?: ThresholdAdjustment;
}

export interface ConsolidationStatus {
  characterId: string;
  threshold: number;
  statistics?: ConsolidationStatistics;
  recentDecisions: DecisionLogEntry[];
  lastAnalysis?: PatternAnalysis;
}

export interface ConsolidationDeps {
  store: MemoryStore;
  ledger: ConsolidationLedger;
  characters: CharacterDirectory;
  /** null runs every memory through the rule-based fallback. */
  scorer: ConsolidationScorer | null;
}

export interface ConsolidationOptions {
  batchDelayMs?: number;
  /** Use the character's adaptive threshold instead of the fixed bar in Stage 4. */
  applyAdaptiveThreshold?: boolean;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

// ============================================================================
// Scoring helpers (pure)
// ============================================================================

export function passesPreliminaryFilter(memory: Memory, now: number): boolean {
  if (now - memory.createdAt < CONSOLIDATION.MIN_AGE_MS) return false;
  if (!(memory.importance > CONSOLIDATION.MIN_IMPORTANCE || memory.accessCount > 0)) return false;
  return !memory.tags.some((tag) => EXCLUDED_TAGS.includes(tag));
}

export function recencyScore(a: Memory, b: Memory): number {
  const days = Math.abs(a.createdAt - b.createdAt) / DAY_MS;
  if (days <= 1) return 0.8;
  if (days <= 7) return 0.5;
  if (days <= 30) return 0.3;
  return 0.1;
}

/** Share of the anchor's tags the candidate also carries. */
export function tagOverlapRatio(anchor: Memory, candidate: Memory): number {
  if (anchor.tags.length === 0) return 0;
  const common = anchor.tags.filter((tag) => candidate.tags.includes(tag)).length;
  return common / anchor.tags.length;
}

export function emotionMatchScore(a: Memory, b: Memory): number {
  if (a.emotionTag !== undefined && a.emotionTag === b.emotionTag) return 0.6;
  if (a.emotionIntensity !== undefined && b.emotionIntensity !== undefined) {
    const diff = Math.abs(a.emotionIntensity - b.emotionIntensity);
    if (diff <= 0.1) return 0.5;
    if (diff <= 0.3) return 0.3;
    return 0.1;
  }
  return 0;
}

export function groupRelevance(anchor: Memory, candidate: Memory): number {
  return (
    RELEVANCE.RECENCY * recencyScore(anchor, candidate) +
    RELEVANCE.TAGS * tagOverlapRatio(anchor, candidate) +
    RELEVANCE.EMOTION * emotionMatchScore(anchor, candidate) +
    RELEVANCE.CONTENT * normalizedTextSimilarity(anchor.content, candidate.content)
  );
}

/**
 * Greedy grouping: the earliest unassigned memory anchors a group and pulls
 * in later memories relevant to it, up to MAX_GROUP_SIZE members.
 */
export function groupByContext(memories: Memory[]): Memory[][] {
  const remaining = [...memories].sort((a, b) => a.createdAt - b.createdAt);
  const groups: Memory[][] = [];

  while (remaining.length > 0) {
    const anchor = remaining.shift();
    if (!anchor) break;
    const group = [anchor];

    for (let i = 0; i < remaining.length && group.length < CONSOLIDATION.MAX_GROUP_SIZE; ) {
      const candidate = remaining[i];
      if (candidate && groupRelevance(anchor, candidate) >= CONSOLIDATION.GROUP_RELEVANCE_THRESHOLD) {
        group.push(candidate);
        remaining.splice(i, 1);
      } else {
        i++;
      }
    }
    groups.push(group);
  }

  return groups;
}

export function fallbackDecision(memory: Memory): Decision {
  const shouldConsolidate =
    memory.importance > CONSOLIDATION.FALLBACK_IMPORTANCE &&
    memory.accessCount > CONSOLIDATION.FALLBACK_ACCESS_COUNT;
  return {
    source: "fallback",
    memory,
    shouldConsolidate,
    confidence: CONSOLIDATION.FALLBACK_CONFIDENCE,
    reasoning: "fallback",
  };
}

/**
 * Stage 4 rule. Scorer decisions must clear the confidence bar; fallback
 * decisions apply the rule's verdict directly.
 */
export function decideOutcome(decision: Decision, confidenceBar: number = CONSOLIDATION.CONFIDENCE_BAR): ConsolidationOutcome {
  switch (decision.source) {
    case "fallback":
      return decision.shouldConsolidate ? "consolidated" : "rejected";
    case "scorer": {
      const { shouldConsolidate, confidence } = decision.evaluation;
      if (!shouldConsolidate) return "rejected";
      return confidence > confidenceBar ? "consolidated" : "deferred";
    }
  }
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function average(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Next threshold given a batch of decisions, or the same value when the
 * batch shows no clear over- or under-consolidation.
 */
export function adjustThreshold(previous: number, consolidatedRate: number, avgScore: number): number {
  if (consolidatedRate > CONSOLIDATION.RAISE_RATE && avgScore > CONSOLIDATION.RAISE_SCORE) {
    return roundTo(Math.min(CONSOLIDATION.THRESHOLD_MAX, previous + CONSOLIDATION.THRESHOLD_STEP), 2);
  }
  if (consolidatedRate < CONSOLIDATION.LOWER_RATE && avgScore < CONSOLIDATION.LOWER_SCORE) {
    return roundTo(Math.max(CONSOLIDATION.THRESHOLD_MIN, previous - CONSOLIDATION.THRESHOLD_STEP), 2);
  }
  return previous;
}

// ============================================================================
// Pipeline
// ============================================================================

export class ConsolidationPipeline {
  private readonly batchDelayMs: number;
  private readonly applyAdaptiveThreshold: boolean;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private deps: ConsolidationDeps, options: ConsolidationOptions = {}) {
    this.batchDelayMs = options.batchDelayMs ?? 100;
    this.applyAdaptiveThreshold = options.applyAdaptiveThreshold ?? false;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  async consolidate(characterId: string): Promise<ConsolidationResult> {
    const now = this.now();
    const all = (await this.deps.store.getAll()).filter((m) => m.characterId === characterId);
    const shortTerm = all.filter((m) => m.category === "SHORT_TERM");

    const result: ConsolidationResult = {
      characterId,
      totalEvaluated: 0,
      consolidated: 0,
      deferred: 0,
      rejected: 0,
      details: [],
    };

    // Stage 1
    const candidates = shortTerm.filter((m) => passesPreliminaryFilter(m, now));
    console.error(
      `[consolidation] ${characterId}: ${candidates.length}/${shortTerm.length} short-term memories passed the filter`
    );
    if (candidates.length === 0) {
      return result;
    }

    // Stage 2
    const groups = groupByContext(candidates);
    const confidenceBar = await this.confidenceBar(characterId);
    const logEntries: DecisionLogEntry[] = [];

    // Stages 3 and 4, one group at a time
    for (const group of groups) {
      const context = await this.buildContext(characterId, group, all);
      const decisions = await this.evaluateGroup(group, context, now);

      for (const decision of decisions) {
        const detail = await this.execute(decision, confidenceBar, now);
        result.details.push(detail);
        result.totalEvaluated++;
        result[detail.outcome]++;
        logEntries.push(this.logEntry(characterId, decision, detail, now));
      }
    }

    // Stage 5
    try {
      await this.recordDecisions(characterId, logEntries, now);
      result.adjustment = await this.analyzeDecisionPatterns(characterId, logEntries);
    } catch (error) {
      console.error(`[consolidation] Failed to record decisions for ${characterId}:`, error);
    }

    console.error(
      `[consolidation] ${characterId}: evaluated=${result.totalEvaluated} consolidated=${result.consolidated} ` +
      `deferred=${result.deferred} rejected=${result.rejected}`
    );
    return result;
  }

  /**
   * Adapt the character's threshold from a batch of decisions. Batches
   * smaller than MIN_DECISIONS_FOR_ADAPTATION are ignored.
   */
  async analyzeDecisionPatterns(
    characterId: string,
    decisions: DecisionLogEntry[]
  ): Promise<ThresholdAdjustment | undefined> {
    if (decisions.length < CONSOLIDATION.MIN_DECISIONS_FOR_ADAPTATION) {
      return undefined;
    }

    const consolidated = decisions.filter((d) => d.wasConsolidated);
    const others = decisions.filter((d) => !d.wasConsolidated);
    const consolidatedRate = consolidated.length / decisions.length;
    const avgScore = average(decisions.map((d) => d.score));
    const importanceGap = average(consolidated.map((d) => d.importance)) - average(others.map((d) => d.importance));

    const previous = (await this.deps.ledger.getThreshold(characterId)) ?? CONSOLIDATION.DEFAULT_THRESHOLD;
    const next = adjustThreshold(previous, consolidatedRate, avgScore);

    if (next !== previous) {
      await this.deps.ledger.saveThreshold(characterId, next);
      console.error(`[consolidation] ${characterId}: threshold ${previous} -> ${next}`);
    }

    await this.deps.ledger.savePatternAnalysis({
      characterId,
      decisionCount: decisions.length,
      consolidatedRate,
      avgScore,
      importanceGap,
      previousThreshold: previous,
      threshold: next,
      timestamp: this.now(),
    });

    return {
      previous,
      next,
      direction: next > previous ? "increase" : next < previous ? "decrease" : "unchanged",
      consolidatedRate,
      avgScore,
    };
  }

  async getStatus(characterId: string, recentLimit = 10): Promise<ConsolidationStatus> {
    const { ledger } = this.deps;
    const analyses = await ledger.getPatternAnalyses(characterId);
    return {
      characterId,
      threshold: (await ledger.getThreshold(characterId)) ?? CONSOLIDATION.DEFAULT_THRESHOLD,
      statistics: await ledger.getStatistics(characterId),
      recentDecisions: await ledger.getDecisionLog(characterId, recentLimit),
      lastAnalysis: analyses[analyses.length - 1],
    };
  }

  // ==========================================================================
  // Stages
  // ==========================================================================

  private async confidenceBar(characterId: string): Promise<number> {
    if (!this.applyAdaptiveThreshold) return CONSOLIDATION.CONFIDENCE_BAR;
    return (await this.deps.ledger.getThreshold(characterId)) ?? CONSOLIDATION.CONFIDENCE_BAR;
  }

  private async buildContext(characterId: string, group: Memory[], all: Memory[]): Promise<ScoringContext> {
    const profile = await this.deps.characters.getProfile(characterId);
    const relationships = await this.deps.characters.getRelationships(characterId);
    const longTerm = all.filter((m) => m.category === "LONG_TERM");

    const related = longTerm
      .filter((lt) =>
        group.some(
          (m) => wordJaccard(m.content, lt.content) > CONSOLIDATION.RELATED_SIMILARITY || intersects(m.tags, lt.tags)
        )
      )
      .slice(0, CONSOLIDATION.MAX_RELATED_MEMORIES);

    return {
      characterName: profile?.name ?? CONSOLIDATION.DEFAULT_CHARACTER_NAME,
      characterSummary: profile?.summary,
      relatedMemories: related,
      relationships: relationships.slice(0, CONSOLIDATION.MAX_RELATIONSHIPS),
      stats: {
        totalMemories: all.length,
        longTermCount: longTerm.length,
        shortTermCount: all.length - longTerm.length,
        avgImportance: average(all.map((m) => m.importance)),
      },
    };
  }

  /**
   * One decision per group member. Members the scorer did not rate (or
   * every member, when the scorer is absent or fails) use the fallback rule.
   */
  private async evaluateGroup(group: Memory[], context: ScoringContext, now: number): Promise<Decision[]> {
    const { scorer } = this.deps;
    if (!scorer) {
      return group.map(fallbackDecision);
    }

    let evaluations: MemoryEvaluation[];
    try {
      evaluations = await scorer.evaluate(group, context, now);
    } catch (error) {
      console.error(`[consolidation] Scorer ${scorer.name} failed, using fallback rule:`, errorMessage(error));
      return group.map(fallbackDecision);
    } finally {
      // Throttle between scorer calls, failed ones included
      if (this.batchDelayMs > 0) {
        await this.sleep(this.batchDelayMs);
      }
    }

    const byId = new Map(evaluations.map((e) => [e.memoryId, e]));
    return group.map((memory): Decision => {
      const evaluation = byId.get(memory.id);
      return evaluation ? { source: "scorer", memory, evaluation } : fallbackDecision(memory);
    });
  }

  private async execute(decision: Decision, confidenceBar: number, now: number): Promise<ConsolidationDetail> {
    const { memory } = decision;
    const outcome = decideOutcome(decision, confidenceBar);
    const detail: ConsolidationDetail = {
      memoryId: memory.id,
      excerpt: excerpt(memory.content),
      outcome,
      reasoning: decision.source === "scorer" ? decision.evaluation.reasoning : decision.reasoning,
      confidence: decision.source === "scorer" ? decision.evaluation.confidence : decision.confidence,
      score: decision.source === "scorer" ? decision.evaluation.overallScore : null,
      source: decision.source,
    };

    if (outcome !== "consolidated") {
      return detail;
    }

    try {
      await this.deps.store.store({ ...memory, category: "LONG_TERM", lastAccessedAt: now });
      return detail;
    } catch (error) {
      // The memory stays short-term and is picked up again next pass
      console.error(`[consolidation] Failed to promote ${memory.id}:`, error);
      return {
        ...detail,
        outcome: "deferred",
        reasoning: `${detail.reasoning} (persistence failed: ${errorMessage(error)})`,
      };
    }
  }

  private logEntry(
    characterId: string,
    decision: Decision,
    detail: ConsolidationDetail,
    now: number
  ): DecisionLogEntry {
    const { memory } = decision;
    return {
      characterId,
      memoryId: memory.id,
      wasConsolidated: detail.outcome === "consolidated",
      score: detail.score ?? 0,
      confidence: detail.confidence,
      importance: memory.importance,
      accessCount: memory.accessCount,
      ageDays: (now - memory.createdAt) / DAY_MS,
      reasoning: detail.reasoning,
      timestamp: now,
    };
  }

  private async recordDecisions(characterId: string, entries: DecisionLogEntry[], now: number): Promise<void> {
    if (entries.length === 0) return;
    const { ledger } = this.deps;

    await ledger.appendDecisionLog(entries);

    const previous = await ledger.getStatistics(characterId);
    const priorCount = previous?.totalDecisions ?? 0;
    const totalDecisions = priorCount + entries.length;
    const weighted = (prior: number, values: number[]) =>
      (prior * priorCount + values.reduce((sum, v) => sum + v, 0)) / totalDecisions;

    await ledger.saveStatistics({
      characterId,
      totalDecisions,
      totalConsolidated: (previous?.totalConsolidated ?? 0) + entries.filter((e) => e.wasConsolidated).length,
      avgScore: weighted(previous?.avgScore ?? 0, entries.map((e) => e.score)),
      avgConfidence: weighted(previous?.avgConfidence ?? 0, entries.map((e) => e.confidence)),
      lastUpdated: now,
    });
  }
}

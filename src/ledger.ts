/**
 * Consolidation ledger: per-character evaluation thresholds, running
 * statistics, the decision log and pattern analyses.
 */

import { join } from "path";
import { z } from "zod";
import { JsonFile } from "./json-file.js";

export interface ConsolidationStatistics {
  characterId: string;
  totalDecisions: number;
  totalConsolidated: number;
  avgScore: number;
  avgConfidence: number;
  lastUpdated: number;
}

export interface DecisionLogEntry {
  characterId: string;
  memoryId: string;
  wasConsolidated: boolean;
  score: number;           // scorer overall score, 0 for fallback decisions
  confidence: number;
  importance: number;
  accessCount: number;
  ageDays: number;
  reasoning: string;
  timestamp: number;
}

export interface PatternAnalysis {
  characterId: string;
  decisionCount: number;
  consolidatedRate: number;
  avgScore: number;
  importanceGap: number;   // mean importance of consolidated minus the rest
  previousThreshold: number;
  threshold: number;
  timestamp: number;
}

export interface ConsolidationLedger {
  getThreshold(characterId: string): Promise<number | undefined>;
  saveThreshold(characterId: string, value: number): Promise<void>;
  getStatistics(characterId: string): Promise<ConsolidationStatistics | undefined>;
  saveStatistics(statistics: ConsolidationStatistics): Promise<void>;
  appendDecisionLog(entries: DecisionLogEntry[]): Promise<void>;
  /** Most recent entries last. */
  getDecisionLog(characterId: string, limit?: number): Promise<DecisionLogEntry[]>;
  savePatternAnalysis(analysis: PatternAnalysis): Promise<void>;
  getPatternAnalyses(characterId: string): Promise<PatternAnalysis[]>;
}

const StatisticsSchema = z.object({
  characterId: z.string(),
  totalDecisions: z.number().int().nonnegative(),
  totalConsolidated: z.number().int().nonnegative(),
  avgScore: z.number(),
  avgConfidence: z.number(),
  lastUpdated: z.number(),
});

const DecisionLogEntrySchema = z.object({
  characterId: z.string(),
  memoryId: z.string(),
  wasConsolidated: z.boolean(),
  score: z.number(),
  confidence: z.number(),
  importance: z.number(),
  accessCount: z.number(),
  ageDays: z.number(),
  reasoning: z.string(),
  timestamp: z.number(),
});

const PatternAnalysisSchema = z.object({
  characterId: z.string(),
  decisionCount: z.number().int(),
  consolidatedRate: z.number(),
  avgScore: z.number(),
  importanceGap: z.number(),
  previousThreshold: z.number(),
  threshold: z.number(),
  timestamp: z.number(),
});

const LedgerFileSchema = z.object({
  version: z.literal(1),
  thresholds: z.record(z.number().min(0).max(1)),
  statistics: z.record(StatisticsSchema),
  decisions: z.array(DecisionLogEntrySchema),
  analyses: z.array(PatternAnalysisSchema),
});

type LedgerData = z.infer<typeof LedgerFileSchema>;

const MAX_DECISIONS = 2000;
const MAX_ANALYSES = 200;

function emptyLedger(): LedgerData {
  return { version: 1, thresholds: {}, statistics: {}, decisions: [], analyses: [] };
}

function lastN<T>(items: T[], limit?: number): T[] {
  return limit === undefined ? items : items.slice(-limit);
}

/**
 * Ledger held in memory; also the base for the file-backed ledger, which
 * loads before and saves after each call.
 */
export class InMemoryConsolidationLedger implements ConsolidationLedger {
  protected data: LedgerData = emptyLedger();

  async getThreshold(characterId: string): Promise<number | undefined> {
    return this.read().thresholds[characterId];
  }

  async saveThreshold(characterId: string, value: number): Promise<void> {
    this.update((data) => {
      data.thresholds[characterId] = value;
    });
  }

  async getStatistics(characterId: string): Promise<ConsolidationStatistics | undefined> {
    return this.read().statistics[characterId];
  }

  async saveStatistics(statistics: ConsolidationStatistics): Promise<void> {
    this.update((data) => {
      data.statistics[statistics.characterId] = statistics;
    });
  }

  async appendDecisionLog(entries: DecisionLogEntry[]): Promise<void> {
    this.update((data) => {
      data.decisions = [...data.decisions, ...entries].slice(-MAX_DECISIONS);
    });
  }

  async getDecisionLog(characterId: string, limit?: number): Promise<DecisionLogEntry[]> {
    return lastN(this.read().decisions.filter((d) => d.characterId === characterId), limit);
  }

  async savePatternAnalysis(analysis: PatternAnalysis): Promise<void> {
    this.update((data) => {
      data.analyses = [...data.analyses, analysis].slice(-MAX_ANALYSES);
    });
  }

  async getPatternAnalyses(characterId: string): Promise<PatternAnalysis[]> {
    return this.read().analyses.filter((a) => a.characterId === characterId);
  }

  protected read(): LedgerData {
    return this.data;
  }

  protected update(mutate: (data: LedgerData) => void): void {
    mutate(this.data);
  }
}

export const LEDGER_FILE = "consolidation-ledger.json";

export class JsonFileConsolidationLedger extends InMemoryConsolidationLedger {
  private file: JsonFile<LedgerData>;

  constructor(dataDir: string) {
    super();
    this.file = new JsonFile(join(dataDir, LEDGER_FILE), LedgerFileSchema, emptyLedger, "ledger");
  }

  protected override read(): LedgerData {
    return this.file.load();
  }

  protected override update(mutate: (data: LedgerData) => void): void {
    const data = this.file.load();
    mutate(data);
    this.file.save(data);
  }
}

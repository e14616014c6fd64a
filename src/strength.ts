/**
 * Memory strength and retention
 *
 * Exponential forgetting curve: retention = exp(-days / strength) scaled by
 * how confident we are in the memory. Strength grows with reinforcement,
 * emotion, importance and context, and shrinks with recall difficulty.
 */

import { clamp01, DAY_MS, type Memory } from "./types.js";
import type { StrengthPresetName } from "./config.js";

export interface StrengthConfig {
  baseStrengthMultiplier: number;
  emotionBonusMultiplier: number;
  importanceBonusMultiplier: number;
  difficultyPenaltyMultiplier: number;
  contextBonusMultiplier: number;
  confidenceBaseWeight: number;
  confidenceMultiplier: number;
  minEffectiveStrength: number;
  strongThreshold: number;
  weakThreshold: number;
}

export type StrengthInputs = Pick<
  Memory,
  "reinforcementCount" | "emotionIntensity" | "importance" | "recallDifficulty" | "contextRelevance"
>;

export type StrengthClass = "strong" | "moderate" | "weak";

const SHARED = {
  confidenceBaseWeight: 0.5,
  confidenceMultiplier: 0.5,
  minEffectiveStrength: 1,
  strongThreshold: 0.7,
  weakThreshold: 0.3,
} as const;

export const STRENGTH_PRESETS: Record<StrengthPresetName, StrengthConfig> = {
  default: {
    ...SHARED,
    baseStrengthMultiplier: 10,
    emotionBonusMultiplier: 5,
    importanceBonusMultiplier: 3,
    difficultyPenaltyMultiplier: 2,
    contextBonusMultiplier: 2,
  },
  // Memories fade slowly
  conservative: {
    ...SHARED,
    baseStrengthMultiplier: 15,
    emotionBonusMultiplier: 7,
    importanceBonusMultiplier: 5,
    difficultyPenaltyMultiplier: 1,
    contextBonusMultiplier: 3,
  },
  // Memories fade quickly
  aggressive: {
    ...SHARED,
    baseStrengthMultiplier: 7,
    emotionBonusMultiplier: 3,
    importanceBonusMultiplier: 2,
    difficultyPenaltyMultiplier: 3,
    contextBonusMultiplier: 1,
  },
};

export function effectiveStrength(
  inputs: StrengthInputs,
  config: StrengthConfig = STRENGTH_PRESETS.default
): number {
  const base = Math.log(1 + inputs.reinforcementCount) * config.baseStrengthMultiplier;
  const emotionBonus = (inputs.emotionIntensity ?? 0) * config.emotionBonusMultiplier;
  const importanceBonus = inputs.importance * config.importanceBonusMultiplier;
  const difficultyPenalty = inputs.recallDifficulty * config.difficultyPenaltyMultiplier;
  const contextBonus = inputs.contextRelevance * config.contextBonusMultiplier;

  return Math.max(
    config.minEffectiveStrength,
    base + emotionBonus + importanceBonus - difficultyPenalty + contextBonus
  );
}

/**
 * Unclamped retention. At elapsedDays = 0 this is exactly
 * confidenceBaseWeight + confidence * confidenceMultiplier.
 */
export function retention(
  inputs: StrengthInputs,
  elapsedDays: number,
  confidence: number,
  config: StrengthConfig = STRENGTH_PRESETS.default
): number {
  const strength = effectiveStrength(inputs, config);
  const decay = Math.exp(-Math.max(0, elapsedDays) / strength);
  return decay * (config.confidenceBaseWeight + confidence * config.confidenceMultiplier);
}

/**
 * Retention of a stored memory as of `now`, measured from its last access.
 */
export function memoryRetention(
  memory: Memory,
  now: number = Date.now(),
  config: StrengthConfig = STRENGTH_PRESETS.default
): number {
  const elapsedDays = Math.max(0, now - memory.lastAccessedAt) / DAY_MS;
  return clamp01(retention(memory, elapsedDays, memory.confidence, config));
}

export function classifyStrength(value: number, config: StrengthConfig = STRENGTH_PRESETS.default): StrengthClass {
  if (value >= config.strongThreshold) return "strong";
  if (value < config.weakThreshold) return "weak";
  return "moderate";
}

/** Days until the decay factor halves. */
export function halfLifeDays(inputs: StrengthInputs, config: StrengthConfig = STRENGTH_PRESETS.default): number {
  return effectiveStrength(inputs, config) * Math.LN2;
}

/**
 * Heuristic recall difficulty: long, number-heavy, long-word text is harder to recall.
 */
export function estimateRecallDifficulty(content: string): number {
  if (content.length === 0) return 0;

  const lengthFactor = Math.min(content.length / 500, 1);
  const digits = content.split("").filter((c) => c >= "0" && c <= "9").length;
  const digitRatio = digits / content.length;
  const words = content.split(/\s+/);
  const complexWordRatio = words.filter((w) => w.length > 8).length / words.length;

  return clamp01(lengthFactor * 0.5 + digitRatio * 0.3 + complexWordRatio * 0.2);
}

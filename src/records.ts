/**
 * Reconstruction records: the immutable audit entries written for every
 * memory mutation (reconstruct, merge, conflict resolution).
 */

import { clamp01, generateId, type ReconstructionKind, type ReconstructionRecord } from "./types.js";

export type RecordInput = Omit<ReconstructionRecord, "id" | "timestamp" | "metadata"> & {
  metadata?: Record<string, string | number | boolean>;
  timestamp?: number;
};

export const RECONSTRUCTION_KINDS: Record<ReconstructionKind, { label: string; description: string }> = {
  append: { label: "Append", description: "Add new detail after the existing content" },
  update: { label: "Update", description: "Refresh the content with newer information" },
  replace: { label: "Replace", description: "Swap the content out entirely" },
  correct: { label: "Correct", description: "Fix an error in the content" },
  reinterpret: { label: "Reinterpret", description: "Attach a new reading of the same events" },
  merge: { label: "Merge", description: "Fold another memory into this one" },
};

export type ImpactLevel = "high" | "medium" | "low";

export function createReconstructionRecord(input: RecordInput): ReconstructionRecord {
  const timestamp = input.timestamp ?? Date.now();
  return Object.freeze({
    id: generateId("rec", timestamp),
    sourceId: input.sourceId,
    targetId: input.targetId,
    kind: input.kind,
    reason: input.reason,
    before: input.before,
    after: input.after,
    similarity: clamp01(input.similarity),
    confidence: clamp01(input.confidence),
    metadata: Object.freeze({ ...(input.metadata ?? {}) }),
    timestamp,
  });
}

export function isHighConfidence(record: ReconstructionRecord): boolean {
  return record.confidence >= 0.8;
}

export function isHighSimilarity(record: ReconstructionRecord): boolean {
  return record.similarity >= 0.7;
}

export function impactLevel(record: ReconstructionRecord): ImpactLevel {
  if (record.kind === "replace" || record.kind === "correct" || record.similarity < 0.5) {
    return "high";
  }
  if (record.kind === "update" || record.kind === "merge" || record.kind === "reinterpret") {
    return "medium";
  }
  return "low";
}

export function summarizeRecord(record: ReconstructionRecord): string {
  const label = RECONSTRUCTION_KINDS[record.kind].label;
  return (
    `${label} ${record.sourceId} -> ${record.targetId} ` +
    `(similarity ${record.similarity.toFixed(2)}, confidence ${record.confidence.toFixed(2)}, ` +
    `impact ${impactLevel(record)}): ${record.reason}`
  );
}

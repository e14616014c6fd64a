/**
 * Reconstruction Tools - rewrite, merge and reconcile memories
 *
 * Every mutating tool leaves a record in the reconstruction history;
 * reconstruction_history reads it back.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { LifecycleEngine } from "../engine.js";
import { RECONSTRUCTION_KINDS } from "../records.js";
import { CONFLICT_SEVERITY } from "../types.js";
import { errorResponse, textResponse } from "./error-handler.js";
import { formatList, formatMemory, formatRecord, truncate } from "./formatters.js";

const REWRITE_KINDS = ["append", "update", "replace", "correct", "reinterpret"] as const;
const CONFLICT_TYPES = ["content", "emotion", "time", "entity", "importance", "tag"] as const;

export function registerReconstructionTools(server: McpServer, engine: LifecycleEngine): void {
  const service = engine.reconstruction;

  server.tool(
    "reconstruct_memory",
    "Rewrite a memory's content and record why",
    {
      id: z.string().min(1).describe("Memory id"),
      kind: z.enum(REWRITE_KINDS).describe("append, update, replace, correct or reinterpret"),
      content: z.string().min(1).describe("New or additional content"),
      reason: z.string().min(1).describe("Why the memory changes"),
    },
    async ({ id, kind, content, reason }) => {
      try {
        const { memory, record } = await service.reconstructMemory(id, kind, content, reason);
        return textResponse(
          `✓ ${RECONSTRUCTION_KINDS[kind].label}\n\n${formatMemory(memory)}\n\n${formatRecord(record)}`
        );
      } catch (error) {
        return errorResponse("reconstructing memory", error);
      }
    }
  );

  server.tool(
    "merge_memories",
    "Merge a secondary memory into a primary one when they are similar enough",
    {
      primary_id: z.string().min(1),
      secondary_id: z.string().min(1),
    },
    async ({ primary_id, secondary_id }) => {
      try {
        const outcome = await service.mergeMemories(primary_id, secondary_id);
        if (!outcome.success || !outcome.merged) {
          return textResponse(`Not merged (similarity ${outcome.similarity.toFixed(2)}): ${outcome.reason ?? "below threshold"}`);
        }
        return textResponse(
          `✓ Merged (similarity ${outcome.similarity.toFixed(2)})\n\n${formatMemory(outcome.merged)}`
        );
      } catch (error) {
        return errorResponse("merging memories", error);
      }
    }
  );

  server.tool(
    "find_merge_candidates",
    "List memory pairs similar enough to merge",
    {
      threshold: z.number().min(0).max(1).optional().describe("Minimum similarity (default 0.5)"),
      character_id: z.string().optional().describe("Only this character's memories"),
      limit: z.number().int().positive().optional().describe("Max pairs to show (default 20)"),
    },
    async ({ threshold, character_id, limit }) => {
      try {
        const candidates = await service.findMergeCandidates(threshold ?? 0.5, character_id);
        if (candidates.length === 0) {
          return textResponse("No merge candidates found.");
        }
        const shown = candidates.slice(0, limit ?? 20);
        const lines = shown.map(({ a, b, similarity }) =>
          `${similarity.toFixed(2)}  ${a.id} ↔ ${b.id}\n    "${truncate(a.content, 60)}" / "${truncate(b.content, 60)}"`
        );
        return textResponse(`Found ${candidates.length} candidate pair(s):\n\n${lines.join("\n")}`);
      } catch (error) {
        return errorResponse("finding merge candidates", error);
      }
    }
  );

  server.tool(
    "detect_conflicts",
    "Detect conflicts between two memories",
    {
      first_id: z.string().min(1),
      second_id: z.string().min(1),
    },
    async ({ first_id, second_id }) => {
      try {
        const analysis = await service.detectConflict(first_id, second_id);
        if (analysis.conflicts.length === 0) {
          return textResponse(`No conflicts (similarity ${analysis.similarity.toFixed(2)}).`);
        }
        const items = analysis.conflicts.map((type) => `${type} (severity ${CONFLICT_SEVERITY[type]})`);
        return textResponse(
          `Conflicts between ${first_id} and ${second_id}:\n${formatList(items)}\n\nDominant: ${analysis.dominant}`
        );
      } catch (error) {
        return errorResponse("detecting conflicts", error);
      }
    }
  );

  server.tool(
    "resolve_conflict",
    "Resolve the most severe conflict between two memories",
    {
      first_id: z.string().min(1),
      second_id: z.string().min(1),
      types: z.array(z.enum(CONFLICT_TYPES)).optional().describe("Conflict types (detected when omitted)"),
    },
    async ({ first_id, second_id, types }) => {
      try {
        const { conflictType, resolution } = await service.resolveConflict(first_id, second_id, types);
        return textResponse(
          `✓ Resolved ${conflictType} conflict with ${resolution.strategy} ` +
          `(confidence ${resolution.confidence.toFixed(2)})\n${resolution.explanation}\n\n${formatMemory(resolution.resolved)}`
        );
      } catch (error) {
        return errorResponse("resolving conflict", error);
      }
    }
  );

  server.tool(
    "reconstruction_history",
    "Show every recorded change involving a memory",
    {
      id: z.string().min(1).describe("Memory id"),
    },
    async ({ id }) => {
      try {
        const records = await service.getReconstructionHistory(id);
        if (records.length === 0) {
          return textResponse(`No reconstruction history for ${id}.`);
        }
        return textResponse(records.map(formatRecord).join("\n\n"));
      } catch (error) {
        return errorResponse("reading reconstruction history", error);
      }
    }
  );
}

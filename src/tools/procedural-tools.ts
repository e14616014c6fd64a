/**
 * Procedural Tools - skills, habits and rules that improve with practice
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { LifecycleEngine } from "../engine.js";
import { PROCEDURAL_TYPES, summarizeProcedure } from "../procedural.js";
import { errorResponse, textResponse } from "./error-handler.js";
import { formatHeader, formatPercent, formatProcedure, formatTable } from "./formatters.js";

const PROCEDURAL_TYPE = z.enum(PROCEDURAL_TYPES);

const ConditionInput = z.object({
  kind: z.enum(["time", "context", "user_state", "emotion", "intent", "custom"]).default("context"),
  parameter: z.string().min(1),
  operator: z.enum(["equals", "not_equals", "contains", "greater_than", "less_than", "in_list"]),
  value: z.string().describe("Comparison value; comma-separated for in_list"),
});

const ActionInput = z.object({
  kind: z.enum(["suggest", "execute", "remember", "notify", "query", "adjust", "custom"]),
  description: z.string().min(1),
  parameters: z.record(z.string()).default({}),
});

const ContextInput = z.record(z.union([z.string(), z.number(), z.boolean()]));

export function registerProceduralTools(server: McpServer, engine: LifecycleEngine): void {
  const manager = engine.procedural;

  server.tool(
    "procedure_create",
    "Create a procedural memory",
    {
      name: z.string().min(1),
      type: PROCEDURAL_TYPE,
      pattern: z.string().optional().describe("Free-text description of when it applies"),
      conditions: z.array(ConditionInput).optional(),
      actions: z.array(ActionInput).optional(),
      tags: z.array(z.string()).optional(),
      related_memory_ids: z.array(z.string()).optional(),
    },
    async ({ name, type, pattern, conditions, actions, tags, related_memory_ids }) => {
      try {
        const memory = await manager.create({
          name,
          type,
          pattern,
          conditions,
          actions,
          tags,
          relatedMemoryIds: related_memory_ids,
        });
        return textResponse(`✓ Created\n\n${formatProcedure(memory)}`);
      } catch (error) {
        return errorResponse("creating procedure", error);
      }
    }
  );

  server.tool(
    "procedure_execute",
    "Record one execution of a procedure and update its proficiency",
    {
      id: z.string().min(1),
      success: z.boolean(),
      duration_ms: z.number().nonnegative(),
      context: ContextInput.optional(),
      error: z.string().optional().describe("What went wrong, for failed runs"),
    },
    async ({ id, success, duration_ms, context, error }) => {
      try {
        const memory = await manager.execute(id, success, duration_ms, context, error);
        return textResponse(`${success ? "✓" : "✗"} Recorded\n\n${formatProcedure(memory)}`);
      } catch (err) {
        return errorResponse("recording execution", err);
      }
    }
  );

  server.tool(
    "procedure_match",
    "Find procedures whose conditions all hold in a context",
    {
      context: ContextInput.describe("Parameter values to test conditions against"),
      type: PROCEDURAL_TYPE.optional(),
      min_proficiency: z.number().min(0).max(1).optional().describe("Default 0.3"),
    },
    async ({ context, type, min_proficiency }) => {
      try {
        const matches = await manager.findMatching(context, type, min_proficiency);
        if (matches.length === 0) {
          return textResponse("No matching procedures.");
        }
        return textResponse(matches.map(formatProcedure).join("\n\n"));
      } catch (error) {
        return errorResponse("matching procedures", error);
      }
    }
  );

  server.tool(
    "procedure_progress",
    "Show a procedure's learning curve",
    {
      id: z.string().min(1),
    },
    async ({ id }) => {
      try {
        const memory = await manager.get(id);
        const progress = await manager.getLearningProgress(id);
        return textResponse([
          summarizeProcedure(memory),
          "",
          formatTable({
            Initial: formatPercent(progress.initialProficiency, 1),
            Current: formatPercent(progress.currentProficiency, 1),
            Improvement: formatPercent(progress.totalImprovement, 1),
            "Improvement rate": progress.improvementRate.toFixed(4),
            "Recent success": formatPercent(progress.recentSuccessRate),
            "Recorded runs": progress.history.length,
          }),
        ].join("\n"));
      } catch (error) {
        return errorResponse("reading learning progress", error);
      }
    }
  );

  server.tool(
    "procedure_stats",
    "Summarize all procedural memories",
    {},
    async () => {
      try {
        const stats = await manager.getStatistics();
        const byType = Object.entries(stats.byType)
          .filter(([, count]) => count > 0)
          .map(([type, count]) => `${type}: ${count}`)
          .join(", ");
        return textResponse([
          formatHeader("PROCEDURAL MEMORY"),
          formatTable({
            Total: stats.totalCount,
            "By type": byType || "none",
            Automated: stats.automatedCount,
            Proficient: stats.proficientCount,
            Reliable: stats.reliableCount,
            "Avg proficiency": formatPercent(stats.avgProficiency, 1),
            "Avg success": formatPercent(stats.avgSuccessRate, 1),
            Executions: stats.totalExecutions,
          }),
        ].join("\n"));
      } catch (error) {
        return errorResponse("reading procedural statistics", error);
      }
    }
  );

  server.tool(
    "procedure_decay",
    "Fade procedures that have not been used for a number of days",
    {
      days: z.number().positive().optional().describe("Idle days (default 1)"),
    },
    async ({ days }) => {
      try {
        const changed = await manager.applyDecay(days ?? 1);
        return textResponse(`Decayed ${changed} procedure(s).`);
      } catch (error) {
        return errorResponse("decaying procedures", error);
      }
    }
  );

  server.tool(
    "procedure_delete",
    "Delete a procedural memory and its execution history",
    {
      id: z.string().min(1),
    },
    async ({ id }) => {
      try {
        await manager.delete(id);
        return textResponse(`✓ Deleted ${id}`);
      } catch (error) {
        return errorResponse("deleting procedure", error);
      }
    }
  );
}

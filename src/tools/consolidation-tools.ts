/**
 * Consolidation Tools - promote short-term memories to long-term
 *
 * consolidate_memories runs one full pipeline pass for a character:
 * filter, group, score (LLM or rule-based fallback), execute, and adapt
 * the character's threshold. consolidation_status reads back what the
 * ledger has learned.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { LifecycleEngine } from "../engine.js";
import { errorResponse, textResponse } from "./error-handler.js";
import { formatConsolidationResult, formatHeader, formatPercent, formatTable } from "./formatters.js";

export function registerConsolidationTools(server: McpServer, engine: LifecycleEngine): void {
  server.tool(
    "consolidate_memories",
    "Run a consolidation pass over a character's short-term memories",
    {
      character_id: z.string().min(1).describe("Character whose memories to consolidate"),
    },
    async ({ character_id }) => {
      try {
        const result = await engine.consolidation.consolidate(character_id);
        if (result.totalEvaluated === 0) {
          return textResponse(`No short-term memories of ${character_id} are ready for consolidation.`);
        }
        return textResponse(formatConsolidationResult(result));
      } catch (error) {
        return errorResponse("consolidating memories", error);
      }
    }
  );

  server.tool(
    "consolidation_status",
    "Show a character's consolidation threshold, statistics and recent decisions",
    {
      character_id: z.string().min(1),
      recent: z.number().int().positive().max(100).optional().describe("Recent decisions to show (default 10)"),
    },
    async ({ character_id, recent }) => {
      try {
        const status = await engine.consolidation.getStatus(character_id, recent ?? 10);
        const lines = [formatHeader(`CONSOLIDATION STATUS: ${character_id}`)];

        const stats = status.statistics;
        lines.push(formatTable({
          Threshold: status.threshold,
          Scorer: engine.scorer?.name ?? "rule-based fallback",
          Decisions: stats?.totalDecisions ?? 0,
          Consolidated: stats?.totalConsolidated ?? 0,
          "Avg score": (stats?.avgScore ?? 0).toFixed(2),
          "Avg confidence": (stats?.avgConfidence ?? 0).toFixed(2),
        }));

        if (status.lastAnalysis) {
          const a = status.lastAnalysis;
          lines.push(
            "",
            `Last analysis: ${a.decisionCount} decisions, ${formatPercent(a.consolidatedRate)} consolidated, ` +
            `avg score ${a.avgScore.toFixed(2)}, threshold ${a.previousThreshold} → ${a.threshold}`
          );
        }

        if (status.recentDecisions.length > 0) {
          lines.push("", "Recent decisions:");
          for (const d of status.recentDecisions) {
            const verdict = d.wasConsolidated ? "✓" : "✗";
            lines.push(`  ${verdict} ${d.memoryId} score ${d.score.toFixed(2)} conf ${d.confidence.toFixed(2)} - ${d.reasoning}`);
          }
        }

        return textResponse(lines.join("\n"));
      } catch (error) {
        return errorResponse("reading consolidation status", error);
      }
    }
  );
}

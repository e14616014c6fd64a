/**
 * Status Tools - engine health dashboard
 *
 * Sections:
 * - memory: stored memories by category
 * - caches: similarity and resolution memo cache counters
 * - scorer: which consolidation scorer is active
 * - procedural: procedural memory totals
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { LifecycleEngine } from "../engine.js";
import { errorResponse, textResponse } from "./error-handler.js";
import { formatCacheStats, formatDivider, formatHeader, formatTable } from "./formatters.js";

const SECTIONS = ["memory", "caches", "scorer", "procedural"] as const;
type Section = (typeof SECTIONS)[number];

export async function describeScorer(engine: LifecycleEngine): Promise<string> {
  const { scorer } = engine;
  if (!scorer) {
    return "Scorer: rule-based fallback";
  }
  const reachable = await scorer.isAvailable();
  return `Scorer: ${scorer.name} (${reachable ? "reachable" : "unreachable"})`;
}

export function registerStatusTools(server: McpServer, engine: LifecycleEngine): void {
  server.tool(
    "engine_status",
    "Show engine status: memory counts, cache statistics, scorer and procedures",
    {
      sections: z.array(z.enum(SECTIONS)).optional().describe("Sections to include (default: all)"),
      clear_caches: z.boolean().optional().describe("Empty the similarity and resolution caches afterwards"),
    },
    async ({ sections, clear_caches }) => {
      try {
        const include = (section: Section) => !sections || sections.includes(section);
        const parts = [formatHeader("MEMORY LIFECYCLE ENGINE")];

        if (include("memory")) {
          const all = await engine.store.getAll();
          const longTerm = all.filter((m) => m.category === "LONG_TERM").length;
          const characters = new Set(all.map((m) => m.characterId)).size;
          parts.push(formatTable({
            Memories: all.length,
            "Short-term": all.length - longTerm,
            "Long-term": longTerm,
            Characters: characters,
          }));
        }

        if (include("caches")) {
          const stats = engine.cacheStats();
          parts.push(formatCacheStats(stats.similarity, "Similarity cache"));
          parts.push(formatCacheStats(stats.resolution, "Resolution cache"));
        }

        if (include("scorer")) {
          parts.push(await describeScorer(engine));
        }

        if (include("procedural")) {
          const stats = await engine.procedural.getStatistics();
          parts.push(formatTable({
            Procedures: stats.totalCount,
            Automated: stats.automatedCount,
            Executions: stats.totalExecutions,
          }));
        }

        if (clear_caches) {
          engine.reconstruction.clearCache();
          parts.push("Caches cleared.");
        }

        return textResponse(parts.join(`\n${formatDivider()}\n`));
      } catch (error) {
        return errorResponse("reading engine status", error);
      }
    }
  );
}

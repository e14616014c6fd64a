/**
 * Memory Tools - store, recall and inspect episodic memories
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { LifecycleEngine } from "../engine.js";
import { errorResponse, textResponse } from "./error-handler.js";
import { formatBar, formatMemory, formatPercent, formatTable } from "./formatters.js";

export function registerMemoryTools(server: McpServer, engine: LifecycleEngine): void {
  server.tool(
    "remember",
    "Store a new short-term memory for a character",
    {
      character_id: z.string().min(1).describe("Character the memory belongs to"),
      content: z.string().min(1).describe("What happened"),
      tags: z.array(z.string()).optional().describe("Topic tags"),
      entities: z.array(z.string()).optional().describe("People, places or things involved"),
      importance: z.number().min(0).max(1).optional().describe("Importance 0-1 (default 0.5)"),
      emotional_valence: z.number().min(-1).max(1).optional().describe("-1 negative to 1 positive"),
      emotion_tag: z.string().optional().describe("Dominant emotion, e.g. joy"),
      emotion_intensity: z.number().min(0).max(1).optional(),
      context_relevance: z.number().min(0).max(1).optional(),
    },
    async ({ character_id, content, tags, entities, importance, emotional_valence, emotion_tag, emotion_intensity, context_relevance }) => {
      try {
        const memory = await engine.remember({
          characterId: character_id,
          content,
          tags,
          relatedEntities: entities,
          importance,
          emotionalValence: emotional_valence,
          emotionTag: emotion_tag,
          emotionIntensity: emotion_intensity,
          contextRelevance: context_relevance,
        });
        return textResponse(`✓ Remembered\n\n${formatMemory(memory)}`);
      } catch (error) {
        return errorResponse("storing memory", error);
      }
    }
  );

  server.tool(
    "recall_memory",
    "Read a memory by id; recalling reinforces it",
    {
      id: z.string().min(1).describe("Memory id"),
    },
    async ({ id }) => {
      try {
        const memory = await engine.recall(id);
        return textResponse(formatMemory(memory));
      } catch (error) {
        return errorResponse("recalling memory", error);
      }
    }
  );

  server.tool(
    "memory_retention",
    "Show how well a memory is retained right now",
    {
      id: z.string().min(1).describe("Memory id"),
    },
    async ({ id }) => {
      try {
        const report = await engine.retention(id);
        const text = formatTable({
          Retention: `${formatBar(report.retention, 1)} ${formatPercent(report.retention, 1)}`,
          Strength: report.strength,
          "Half-life": `${report.halfLifeDays.toFixed(1)} days`,
          "Since access": `${report.daysSinceAccess.toFixed(1)} days`,
        });
        return textResponse(`Memory ${id}\n${text}`);
      } catch (error) {
        return errorResponse("computing retention", error);
      }
    }
  );
}

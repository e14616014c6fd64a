/**
 * Formatters - Shared formatting for tool and CLI output
 *
 * Generic layout helpers (headers, bars, tables) plus renderers for the
 * engine's own records.
 */

import type { CacheStats } from "../cache.js";
import type { ConsolidationResult } from "../consolidation.js";
import type { ProceduralMemory } from "../procedural.js";
import { impactLevel } from "../records.js";
import type { Memory, ReconstructionRecord } from "../types.js";

/**
 * Format a bordered header box
 *
 * @example
 * ```typescript
 * formatHeader("CONSOLIDATION", 20)
 * // ╔════════════════════╗
 * // ║   CONSOLIDATION    ║
 * // ╚════════════════════╝
 * ```
 */
export function formatHeader(title: string, width: number = 62): string {
  const padding = Math.max(0, width - title.length);
  const leftPad = Math.floor(padding / 2);
  const rightPad = Math.ceil(padding / 2);

  const top = `╔${"═".repeat(width)}╗`;
  const middle = `║${" ".repeat(leftPad)}${title}${" ".repeat(rightPad)}║`;
  const bottom = `╚${"═".repeat(width)}╝`;

  return `${top}\n${middle}\n${bottom}`;
}

/**
 * Format a progress bar for a value in [0, max]. Out-of-range values are
 * pinned to the ends of the bar.
 *
 * @example
 * ```typescript
 * formatBar(0.7, 1)  // "███████░░░"
 * ```
 */
export function formatBar(
  current: number,
  max: number,
  width: number = 10,
  filledChar: string = "█",
  emptyChar: string = "░"
): string {
  const ratio = max > 0 ? Math.min(1, Math.max(0, current / max)) : 0;
  const filled = Math.round(ratio * width);
  return filledChar.repeat(filled) + emptyChar.repeat(width - filled);
}

/**
 * @example formatPercent(0.333, 1)  // "33.3%"
 */
export function formatPercent(value: number, decimals: number = 0): string {
  return `${(value * 100).toFixed(decimals)}%`;
}

export function formatList(items: string[], bullet: string = "•", indent: number = 2): string {
  const prefix = " ".repeat(indent);
  return items.map((item) => `${prefix}${bullet} ${item}`).join("\n");
}

/**
 * Key-value lines with keys padded to a common width
 *
 * @example
 * ```typescript
 * formatTable({ hits: 3, misses: 10 })
 * // hits  : 3
 * // misses: 10
 * ```
 */
export function formatTable(data: Record<string, string | number | boolean>, separator: string = ": "): string {
  const keys = Object.keys(data);
  if (keys.length === 0) return "";
  const keyWidth = Math.max(...keys.map((k) => k.length));
  return Object.entries(data)
    .map(([key, value]) => `${key.padEnd(keyWidth)}${separator}${value}`)
    .join("\n");
}

export function formatDivider(width: number = 60, char: string = "─"): string {
  return char.repeat(width);
}

/**
 * Truncate text with ellipsis; the result is at most maxLength characters.
 */
export function truncate(text: string, maxLength: number, ellipsis: string = "..."): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, Math.max(0, maxLength - ellipsis.length)) + ellipsis;
}

// ============================================================================
// Domain renderers
// ============================================================================

export function formatMemory(memory: Memory): string {
  const lines = [
    `[${memory.id}] ${memory.category} (${memory.characterId})`,
    `  ${truncate(memory.content, 200)}`,
    `  importance ${formatPercent(memory.importance)} · accessed ${memory.accessCount}x · reinforced ${memory.reinforcementCount}x`,
  ];
  if (memory.tags.length > 0) {
    lines.push(`  tags: ${memory.tags.join(", ")}`);
  }
  if (memory.relatedEntities.length > 0) {
    lines.push(`  entities: ${memory.relatedEntities.join(", ")}`);
  }
  return lines.join("\n");
}

export function formatRecord(record: ReconstructionRecord): string {
  const when = new Date(record.timestamp).toISOString();
  return [
    `${when} ${record.kind.toUpperCase()} ${record.sourceId} → ${record.targetId} (impact: ${impactLevel(record)})`,
    `  reason: ${record.reason}`,
    `  similarity ${record.similarity.toFixed(2)} · confidence ${record.confidence.toFixed(2)}`,
    `  after: ${truncate(record.after, 120)}`,
  ].join("\n");
}

export function formatConsolidationResult(result: ConsolidationResult): string {
  const lines = [
    formatHeader(`CONSOLIDATION: ${result.characterId}`),
    formatTable({
      Evaluated: result.totalEvaluated,
      Consolidated: result.consolidated,
      Deferred: result.deferred,
      Rejected: result.rejected,
    }),
  ];

  if (result.details.length > 0) {
    lines.push("", ...result.details.map((d) => {
      const score = d.score === null ? "rule" : d.score.toFixed(2);
      return `  ${d.outcome.padEnd(12)} ${d.memoryId} [${d.source} ${score}, conf ${d.confidence.toFixed(2)}] ${d.excerpt}`;
    }));
  }

  if (result.adjustment) {
    const { previous, next, direction } = result.adjustment;
    lines.push("", `Threshold: ${previous} → ${next} (${direction})`);
  }
  return lines.join("\n");
}

export function formatProcedure(memory: ProceduralMemory): string {
  return [
    `[${memory.id}] ${memory.name} (${memory.type})`,
    `  proficiency ${formatBar(memory.proficiency, 1)} ${formatPercent(memory.proficiency)}`,
    `  success ${formatPercent(memory.successRate)} · ${memory.executionCount} runs · avg ${memory.averageExecutionTime.toFixed(0)}ms`,
  ].join("\n");
}

export function formatCacheStats(stats: CacheStats | null, label: string): string {
  if (!stats) {
    return `${label}: no cache`;
  }
  return `${label}:\n` + formatTable({
    size: `${stats.size}/${stats.maxSize}`,
    hits: stats.hits,
    misses: stats.misses,
    puts: stats.puts,
    evictions: stats.evictions,
    hitRate: formatPercent(stats.hitRate, 1),
  }).split("\n").map((line) => `  ${line}`).join("\n");
}

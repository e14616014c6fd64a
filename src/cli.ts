#!/usr/bin/env node

/**
 * CLI for running maintenance passes outside of MCP
 * Usage: memory-lifecycle <command> [options]
 */

import { CONFIG_PATH, config, saveConfig } from "./config.js";
import { createLifecycleEngine, type LifecycleEngine } from "./engine.js";
import { summarizeProcedure } from "./procedural.js";
import { describeScorer } from "./tools/status-tools.js";
import {
  formatCacheStats,
  formatConsolidationResult,
  formatList,
  formatPercent,
  formatRecord,
  formatTable,
  truncate,
} from "./tools/formatters.js";

const args = process.argv.slice(2);
const command = args[0];

async function main() {
  const engine = createLifecycleEngine(config);

  switch (command) {
    case "consolidate":
      await cmdConsolidate(engine, requireArg(args[1], "consolidate <characterId>"));
      break;

    case "candidates":
      await cmdCandidates(engine, args[1] ? parseFloat(args[1]) : 0.5);
      break;

    case "conflicts":
      await cmdConflicts(
        engine,
        requireArg(args[1], "conflicts <id1> <id2>"),
        requireArg(args[2], "conflicts <id1> <id2>")
      );
      break;

    case "resolve":
      await cmdResolve(
        engine,
        requireArg(args[1], "resolve <id1> <id2>"),
        requireArg(args[2], "resolve <id1> <id2>")
      );
      break;

    case "history":
      await cmdHistory(engine, requireArg(args[1], "history <memoryId>"));
      break;

    case "retention":
      await cmdRetention(engine, requireArg(args[1], "retention <memoryId>"));
      break;

    case "procedures":
      await cmdProcedures(engine);
      break;

    case "decay":
      await cmdDecay(engine, args[1] ? parseFloat(args[1]) : 1);
      break;

    case "status":
      await cmdStatus(engine, requireArg(args[1], "status <characterId>"));
      break;

    case "config":
      cmdConfig(args[1]);
      break;

    case "help":
    default:
      printHelp();
  }
}

function requireArg(value: string | undefined, usage: string): string {
  if (!value) {
    console.error(`Usage: ${usage}`);
    process.exit(1);
  }
  return value;
}

async function cmdConsolidate(engine: LifecycleEngine, characterId: string) {
  const result = await engine.consolidation.consolidate(characterId);
  if (result.totalEvaluated === 0) {
    console.log(`No short-term memories of ${characterId} are ready for consolidation.`);
    return;
  }
  console.log(formatConsolidationResult(result));
}

async function cmdCandidates(engine: LifecycleEngine, threshold: number) {
  if (Number.isNaN(threshold)) {
    console.error("Threshold must be a number between 0 and 1.");
    process.exit(1);
  }

  const candidates = await engine.reconstruction.findMergeCandidates(threshold);
  if (candidates.length === 0) {
    console.log(`No pairs at or above ${threshold}.`);
    return;
  }

  console.log(`Merge candidates (${candidates.length}):\n`);
  for (const { a, b, similarity } of candidates) {
    console.log(`${similarity.toFixed(2)}  ${a.id} ↔ ${b.id}`);
    console.log(`  ${truncate(a.content, 80)}`);
    console.log(`  ${truncate(b.content, 80)}`);
    console.log();
  }
}

async function cmdConflicts(engine: LifecycleEngine, first: string, second: string) {
  const analysis = await engine.reconstruction.detectConflict(first, second);
  if (analysis.conflicts.length === 0) {
    console.log(`No conflicts (similarity ${analysis.similarity.toFixed(2)}).`);
    return;
  }
  console.log(`Conflicts (dominant: ${analysis.dominant}):`);
  console.log(formatList(analysis.conflicts));
}

async function cmdResolve(engine: LifecycleEngine, first: string, second: string) {
  const { conflictType, resolution, record } = await engine.reconstruction.resolveConflict(first, second);
  console.log(`Resolved ${conflictType} conflict with ${resolution.strategy}: ${resolution.explanation}\n`);
  console.log(formatRecord(record));
}

async function cmdHistory(engine: LifecycleEngine, memoryId: string) {
  const records = await engine.reconstruction.getReconstructionHistory(memoryId);
  if (records.length === 0) {
    console.log(`No reconstruction history for ${memoryId}.`);
    return;
  }
  for (const record of records) {
    console.log(formatRecord(record));
    console.log();
  }
}

async function cmdRetention(engine: LifecycleEngine, memoryId: string) {
  const report = await engine.retention(memoryId);
  console.log(formatTable({
    Retention: formatPercent(report.retention, 1),
    Strength: report.strength,
    "Half-life": `${report.halfLifeDays.toFixed(1)} days`,
    "Since access": `${report.daysSinceAccess.toFixed(1)} days`,
  }));
}

async function cmdProcedures(engine: LifecycleEngine) {
  const procedures = await engine.procedural.getAll();
  if (procedures.length === 0) {
    console.log("No procedural memories.");
    return;
  }
  for (const procedure of procedures.sort((a, b) => b.proficiency - a.proficiency)) {
    console.log(`[${procedure.id}] ${summarizeProcedure(procedure)}`);
  }
}

async function cmdDecay(engine: LifecycleEngine, days: number) {
  const changed = await engine.procedural.applyDecay(days);
  await engine.procedural.flush();
  console.log(`Decayed ${changed} procedure(s) unused for ${days} day(s).`);
}

async function cmdStatus(engine: LifecycleEngine, characterId: string) {
  const status = await engine.consolidation.getStatus(characterId);
  console.log(`Consolidation status: ${characterId}`);
  console.log("=".repeat(22 + characterId.length) + "\n");
  console.log(formatTable({
    Threshold: status.threshold,
    Decisions: status.statistics?.totalDecisions ?? 0,
    Consolidated: status.statistics?.totalConsolidated ?? 0,
  }));
  console.log(await describeScorer(engine));

  const caches = engine.cacheStats();
  console.log();
  console.log(formatCacheStats(caches.similarity, "Similarity cache"));
  console.log(formatCacheStats(caches.resolution, "Resolution cache"));
}

function cmdConfig(action: string | undefined) {
  if (action === "init") {
    saveConfig(config);
    console.log(`Wrote ${CONFIG_PATH}`);
    return;
  }
  const shown = config.llm?.apiKey ? { ...config, llm: { ...config.llm, apiKey: "***" } } : config;
  console.log(`Config: ${CONFIG_PATH}\n`);
  console.log(JSON.stringify(shown, null, 2));
}

function printHelp() {
  console.log(`
Memory Lifecycle CLI
====================

CONSOLIDATION:
  consolidate <characterId>  Promote ready short-term memories to long-term
  status <characterId>       Show threshold, statistics and cache counters

RECONSTRUCTION:
  candidates [threshold]     List memory pairs similar enough to merge (default: 0.5)
  conflicts <id1> <id2>      Detect conflicts between two memories
  resolve <id1> <id2>        Resolve the most severe conflict
  history <memoryId>         Show a memory's reconstruction history
  retention <memoryId>       Show current retention and strength

PROCEDURAL:
  procedures                 List procedural memories
  decay [days]               Fade procedures unused for [days] days (default: 1)

  config                     Print the resolved configuration
  config init                Write the resolved configuration to the config file
  help                       Show this help

Configuration is read from $MEMORY_LIFECYCLE_HOME/config.json (default ~/.memory-lifecycle).

EXAMPLES:
  memory-lifecycle consolidate alice
  memory-lifecycle candidates 0.7
  memory-lifecycle decay 7
`);
}

main().catch((error) => {
  console.error("Error:", error instanceof Error ? error.message : error);
  process.exit(1);
});

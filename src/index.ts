#!/usr/bin/env node

/**
 * MCP server for the memory lifecycle engine (stdio transport).
 * stdout belongs to the protocol; all diagnostics go to stderr.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { config } from "./config.js";
import { createLifecycleEngine } from "./engine.js";
import { registerAllTools } from "./tools/index.js";

const server = new McpServer({
  name: "memory-lifecycle",
  version: "0.1.0",
});

const engine = createLifecycleEngine(config);
registerAllTools(server, engine);

async function shutdown(): Promise<void> {
  await engine.procedural.flush();
  engine.logCacheStats();
}

async function main() {
  console.error("Initializing memory lifecycle MCP server...");
  console.error(
    `Store: ${config.memory_store} · merge: ${config.merge_strategy} · resolver: ${config.conflict_resolver} · ` +
    `scorer: ${engine.scorer?.name ?? "rule-based fallback"}`
  );

  const transport = new StdioServerTransport();
  await server.connect(transport);

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      void shutdown()
        .catch((error: unknown) => console.error("Error during shutdown:", error))
        .finally(() => process.exit(0));
    });
  }

  console.error("Memory lifecycle MCP server running.");
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});

/**
 * Tool Registration Barrel
 *
 * Call registerAllTools with the MCP server and an engine, or the
 * individual register functions for a subset.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { LifecycleEngine } from "../engine.js";
import { registerConsolidationTools } from "./consolidation-tools.js";
import { registerMemoryTools } from "./memory-tools.js";
import { registerProceduralTools } from "./procedural-tools.js";
import { registerReconstructionTools } from "./reconstruction-tools.js";
import { registerStatusTools } from "./status-tools.js";

export {
  registerConsolidationTools,
  registerMemoryTools,
  registerProceduralTools,
  registerReconstructionTools,
  registerStatusTools,
};

export function registerAllTools(server: McpServer, engine: LifecycleEngine): void {
  registerMemoryTools(server, engine);
  registerReconstructionTools(server, engine);
  registerConsolidationTools(server, engine);
  registerProceduralTools(server, engine);
  registerStatusTools(server, engine);
}

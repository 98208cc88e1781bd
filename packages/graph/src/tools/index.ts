/**
 * MCP tool registration for the graph package.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Logger } from "@depmap/core";
import type { GraphConfig } from "../config.js";
import type { GraphEngine } from "../infrastructure/GraphEngine.js";
import type { NodeSourceWalker } from "../infrastructure/NodeSourceWalker.js";

import { registerSync } from "./sync.js";
import { registerFindCycles } from "./findCycles.js";
import { registerImpact } from "./impact.js";
import { registerSymbolsIn } from "./symbolsIn.js";
import { registerGetSymbol } from "./getSymbol.js";
import { registerFindOrphans } from "./findOrphans.js";
import { registerUncertainEdges } from "./uncertainEdges.js";
import { registerGetStats } from "./getStats.js";

export interface Services {
  config: GraphConfig;
  engine: GraphEngine;
  walker: NodeSourceWalker;
  logger: Logger;
}

export function registerAllTools(server: McpServer, services: Services): void {
  registerSync(server, services);
  registerFindCycles(server, services);
  registerImpact(server, services);
  registerSymbolsIn(server, services);
  registerGetSymbol(server, services);
  registerFindOrphans(server, services);
  registerUncertainEdges(server, services);
  registerGetStats(server, services);
}

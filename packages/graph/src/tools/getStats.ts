/**
 * graph_stats - Size of the graph by confidence and relation kind.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { guardTool, successResponse } from "@depmap/core";
import type { Services } from "./index.js";
import { formatStats } from "./format.js";

export function registerGetStats(server: McpServer, services: Services): void {
  const { engine } = services;

  server.registerTool(
    "graph_stats",
    {
      title: "Graph stats",
      description: "Count live files, symbols and edges, with edges broken down by confidence and kind.",
      inputSchema: {},
    },
    () =>
      guardTool(async () => {
        const stats = await engine.stats();
        return successResponse(formatStats(stats), { stats, state: engine.syncState });
      })
  );
}

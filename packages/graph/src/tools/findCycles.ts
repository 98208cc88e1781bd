/**
 * graph_find_cycles - Circular dependencies among statically visible edges.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { guardTool, successResponse } from "@depmap/core";
import type { Services } from "./index.js";
import { formatCycles } from "./format.js";

export function registerFindCycles(server: McpServer, services: Services): void {
  const { engine } = services;

  server.registerTool(
    "graph_find_cycles",
    {
      title: "Find cycles",
      description:
        "List every elementary dependency cycle over resolved and conditional edges. Dynamic and external edges are ignored.",
      inputSchema: {},
    },
    () =>
      guardTool(async () => {
        const report = await engine.cycleReport();
        return successResponse(formatCycles(report), {
          cycles: report.cycles,
          truncated: report.truncated,
        });
      })
  );
}

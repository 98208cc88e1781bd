/**
 * graph_uncertain_edges - References the scanner could not pin down.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { guardTool, successResponse } from "@depmap/core";
import type { Services } from "./index.js";
import { formatUncertainEdges } from "./format.js";

export function registerUncertainEdges(server: McpServer, services: Services): void {
  const { engine } = services;

  server.registerTool(
    "graph_uncertain_edges",
    {
      title: "Uncertain edges",
      description:
        "List dynamic edges: reflection, string-based dispatch, calls through parameters and ambiguous names.",
      inputSchema: {},
    },
    () =>
      guardTool(async () => {
        const views = await engine.uncertainEdges();
        return successResponse(formatUncertainEdges(views), {
          edges: views.map(({ edge, source, path }) => ({ ...edge, sourceName: source.name, path })),
        });
      })
  );
}

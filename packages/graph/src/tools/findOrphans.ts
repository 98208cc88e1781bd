/**
 * graph_find_orphans - Functions and methods nothing refers to.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { guardTool, successResponse } from "@depmap/core";
import type { Services } from "./index.js";
import { formatSymbolList } from "./format.js";

export function registerFindOrphans(server: McpServer, services: Services): void {
  const { engine } = services;

  server.registerTool(
    "graph_find_orphans",
    {
      title: "Find orphans",
      description: `List functions and methods with no incoming edges of any confidence.

Entry points, exported API and framework callbacks show up here too; treat the
list as candidates, not as dead code.`,
      inputSchema: {},
    },
    () =>
      guardTool(async () => {
        const [orphans, paths] = await Promise.all([engine.findOrphans(), engine.filePaths()]);
        return successResponse(formatSymbolList("Orphans", orphans, paths), {
          orphans: orphans.map((symbol) => ({ id: symbol.id, name: symbol.name, path: paths.get(symbol.fileId) ?? null })),
        });
      })
  );
}

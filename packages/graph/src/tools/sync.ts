/**
 * graph_sync - Bring the graph in line with the working tree.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { guardTool, successResponse } from "@depmap/core";
import { normalizePath } from "../core/paths.js";
import type { Services } from "./index.js";
import { formatSyncReport } from "./format.js";

const InputSchema = {
  paths: z
    .array(z.string())
    .optional()
    .describe("Only re-sync these files (relative to the root). Files missing from the list are left alone."),
  prune: z
    .boolean()
    .optional()
    .describe("Tombstone files that no longer exist (default: true; ignored when paths is given)"),
};

export function registerSync(server: McpServer, services: Services): void {
  const { engine, walker } = services;

  server.registerTool(
    "graph_sync",
    {
      title: "Sync graph",
      description: `Scan the source tree and update the dependency graph incrementally.

Unchanged files are skipped by content digest. Files that fail to scan keep
their previous symbols and are listed as failures; the rest of the tree still
syncs.`,
      inputSchema: InputSchema,
    },
    ({ paths, prune }) =>
      guardTool(async () => {
        const inputs = await walker.walk();
        let selected = inputs;
        if (paths) {
          const wanted = new Set(paths.map(normalizePath));
          selected = inputs.filter((input) => wanted.has(normalizePath(input.path)));
        }
        const report = await engine.sync(selected, { prune: paths ? false : (prune ?? true) });
        return successResponse(formatSyncReport(report), { report });
      })
  );
}

/**
 * graph_impact - What breaks if a symbol changes.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { guardTool, resultToResponse, successResponse } from "@depmap/core";
import type { Services } from "./index.js";
import { formatImpact } from "./format.js";

const InputSchema = {
  symbolId: z.string().min(1).describe("Symbol id (from graph_symbols_in or graph_get_symbol)"),
  maxDepth: z.number().int().min(1).max(50).optional().describe("Levels of dependents to follow (default: 5)"),
  maxFanOut: z.number().int().positive().optional().describe("Dependents followed per symbol, strongest first"),
  limit: z.number().int().positive().optional().describe("Maximum entries returned"),
};

export function registerImpact(server: McpServer, services: Services): void {
  const { engine } = services;

  server.registerTool(
    "graph_impact",
    {
      title: "Impact analysis",
      description: `Find every symbol that depends on the given one, nearest first.

Each entry is "certain" when reached through resolved edges only, otherwise
"possible".`,
      inputSchema: InputSchema,
    },
    ({ symbolId, maxDepth, maxFanOut, limit }) =>
      guardTool(async () => {
        const result = await engine.impactReport(symbolId, { maxDepth, maxFanOut, limit });
        return resultToResponse(result, (impact) =>
          successResponse(formatImpact(symbolId, impact), {
            entries: impact.entries.map((entry) => ({
              symbolId: entry.symbol.id,
              name: entry.symbol.name,
              depth: entry.depth,
              certainty: entry.certainty,
              via: entry.via,
            })),
            truncated: impact.truncated,
          })
        );
      })
  );
}

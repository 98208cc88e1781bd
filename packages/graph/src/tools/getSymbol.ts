/**
 * graph_get_symbol - One symbol with its incoming and outgoing edges.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorResponse, guardTool, resultToResponse, successResponse } from "@depmap/core";
import type { Services } from "./index.js";
import { formatSymbolDetail, formatSymbolList } from "./format.js";

const InputSchema = {
  symbolId: z.string().optional().describe("Symbol id"),
  name: z.string().optional().describe("Symbol name; `save` also matches `Repo.save`"),
};

export function registerGetSymbol(server: McpServer, services: Services): void {
  const { engine } = services;

  server.registerTool(
    "graph_get_symbol",
    {
      title: "Get symbol",
      description:
        "Look a symbol up by id or by name. A name with several matches returns the candidates instead of one symbol.",
      inputSchema: InputSchema,
    },
    ({ symbolId, name }) =>
      guardTool(async () => {
        let id = symbolId;
        if (id === undefined) {
          if (name === undefined) return errorResponse("Provide symbolId or name");
          const matches = await engine.findSymbols(name);
          if (matches.length === 0) return errorResponse(`No symbol named ${name}`);
          if (matches.length > 1) {
            const paths = await engine.filePaths();
            return successResponse(formatSymbolList(`Symbols named ${name}`, matches, paths), { matches });
          }
          id = matches[0].id;
        }
        const detail = await engine.getSymbol(id);
        return resultToResponse(detail, (value) =>
          successResponse(formatSymbolDetail(value), {
            symbol: value.symbol,
            path: value.file?.path ?? null,
            incoming: value.incoming,
            outgoing: value.outgoing,
          })
        );
      })
  );
}

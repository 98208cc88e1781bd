/**
 * graph_symbols_in - Symbols declared in one file.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorResponse, guardTool, successResponse } from "@depmap/core";
import type { Services } from "./index.js";
import { formatSymbolList } from "./format.js";

const InputSchema = {
  file: z.string().min(1).describe("File path relative to the root, or a file id"),
};

export function registerSymbolsIn(server: McpServer, services: Services): void {
  const { engine } = services;

  server.registerTool(
    "graph_symbols_in",
    {
      title: "Symbols in file",
      description: "List the live symbols of a file, in source order.",
      inputSchema: InputSchema,
    },
    ({ file }) =>
      guardTool(async () => {
        const record = await engine.getFile(file);
        if (!record) return errorResponse(`File not in graph: ${file}`);
        const symbols = await engine.symbolsIn(record.id);
        const text = formatSymbolList(`Symbols in ${record.path}`, symbols, new Map());
        return successResponse(record.lastError ? `${text}\n\n**Last scan failed:** ${record.lastError}` : text, {
          file: record,
          symbols,
        });
      })
  );
}

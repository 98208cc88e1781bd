import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { silentLogger } from "@depmap/core";
import { loadConfig } from "../src/config.js";
import { GraphEngine } from "../src/infrastructure/GraphEngine.js";
import { NodeSourceWalker } from "../src/infrastructure/NodeSourceWalker.js";
import { InMemoryGraphStore } from "../src/infrastructure/memory/InMemoryGraphStore.js";
import { registerAllTools } from "../src/tools/index.js";

describe("graph tools", () => {
  let root: string;
  let engine: GraphEngine;
  let client: Client;

  beforeAll(async () => {
    root = await mkdtemp(join(tmpdir(), "depmap-tools-"));
    await mkdir(join(root, "src"));
    await writeFile(join(root, "src/util.ts"), "export function helper() {\n  return 1;\n}\n");
    await writeFile(
      join(root, "src/app.ts"),
      'import { helper } from "./util";\nexport function run() {\n  return helper();\n}\n'
    );

    const loaded = loadConfig({ DEPMAP_DB_PATH: ":memory:" }, root);
    if (!loaded.ok) throw loaded.error;
    engine = GraphEngine.create({ store: new InMemoryGraphStore(), logger: silentLogger });
    const walker = new NodeSourceWalker({ root, extensions: engine.registry.extensions() });

    const server = new McpServer({ name: "depmap:graph", version: "0.0.0" });
    registerAllTools(server, { config: loaded.value, engine, walker, logger: silentLogger });
    client = new Client({ name: "graph-tools-test", version: "0.0.0" });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);

    const synced = await client.callTool({ name: "graph_sync", arguments: {} });
    expect(synced).toMatchObject({ structuredContent: { success: true, report: { added: 2, failed: 0 } } });
  });

  afterAll(async () => {
    await client.close();
    await rm(root, { recursive: true, force: true });
  });

  it("lists every tool", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "graph_find_cycles",
      "graph_find_orphans",
      "graph_get_symbol",
      "graph_impact",
      "graph_stats",
      "graph_symbols_in",
      "graph_sync",
      "graph_uncertain_edges",
    ]);
  });

  it("re-syncs only the named paths without pruning", async () => {
    const result = await client.callTool({ name: "graph_sync", arguments: { paths: ["./src/app.ts"] } });
    expect(result).toMatchObject({ structuredContent: { report: { unchanged: 1, removed: 0 } } });
    expect((await engine.stats()).files).toBe(2);
  });

  it("looks a symbol up by name", async () => {
    const result = await client.callTool({ name: "graph_get_symbol", arguments: { name: "helper" } });
    expect(result).toMatchObject({ structuredContent: { path: "src/util.ts", symbol: { name: "helper" } } });
  });

  it("rejects a lookup without an id or a name", async () => {
    const result = await client.callTool({ name: "graph_get_symbol", arguments: {} });
    expect(result).toMatchObject({
      isError: true,
      content: [{ type: "text", text: "Error: Provide symbolId or name" }],
    });
  });

  it("reports the impact of a symbol", async () => {
    const [helper] = await engine.findSymbols("helper");
    const result = await client.callTool({ name: "graph_impact", arguments: { symbolId: helper.id } });
    expect(result).toMatchObject({
      structuredContent: {
        entries: [
          { name: "<module>", depth: 1, certainty: "certain", via: "resolved" },
          { name: "run", depth: 1, certainty: "certain", via: "resolved" },
        ],
        truncated: false,
      },
    });
  });

  it("reports an unknown symbol as an error", async () => {
    const result = await client.callTool({ name: "graph_impact", arguments: { symbolId: "nope" } });
    expect(result).toMatchObject({ isError: true, content: [{ type: "text", text: "Error: Unknown symbol: nope" }] });
  });

  it("reports a file outside the graph as an error", async () => {
    const result = await client.callTool({ name: "graph_symbols_in", arguments: { file: "src/missing.ts" } });
    expect(result).toMatchObject({ isError: true, content: [{ type: "text", text: "Error: File not in graph: src/missing.ts" }] });
  });

  it("finds orphans and cycles", async () => {
    const orphans = await client.callTool({ name: "graph_find_orphans", arguments: {} });
    expect(orphans).toMatchObject({ structuredContent: { orphans: [{ name: "run", path: "src/app.ts" }] } });

    const cycles = await client.callTool({ name: "graph_find_cycles", arguments: {} });
    expect(cycles).toMatchObject({ content: [{ type: "text", text: "No cycles found." }] });
  });

  it("reports graph stats and the sync state", async () => {
    const result = await client.callTool({ name: "graph_stats", arguments: {} });
    expect(result).toMatchObject({ structuredContent: { stats: { files: 2, symbols: 4, edges: 2 }, state: "idle" } });
  });
});

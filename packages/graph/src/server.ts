#!/usr/bin/env node
/**
 * MCP server for the dependency graph.
 */

import { createLogger, runServer } from "@depmap/core";
import { loadConfig } from "./config.js";
import { GraphEngine } from "./infrastructure/GraphEngine.js";
import { NodeSourceWalker } from "./infrastructure/NodeSourceWalker.js";
import { SqliteGraphStore } from "./infrastructure/sqlite/SqliteGraphStore.js";
import { registerAllTools, type Services } from "./tools/index.js";

const loaded = loadConfig();
if (!loaded.ok) {
  createLogger("depmap:graph").error(loaded.error.message);
  process.exit(1);
}
const config = loaded.value;
const logger = createLogger("depmap:graph", { level: config.logLevel });

runServer<Services>({
  config: {
    name: "depmap:graph",
    version: "0.1.0",
  },
  logger,
  createServices: () => {
    const engine = GraphEngine.create({
      store: new SqliteGraphStore({ dbPath: config.dbPath }),
      logger: logger.child("engine"),
      concurrency: config.concurrency,
      maxDepth: config.maxDepth,
      cycleStepsPerNode: config.cycleStepsPerNode,
    });
    const walker = new NodeSourceWalker({
      root: config.root,
      extensions: engine.registry.extensions(),
      concurrency: config.concurrency,
    });
    return { config, engine, walker, logger };
  },
  registerTools: registerAllTools,
  onStartup: async ({ engine, walker }) => {
    logger.info("Initial sync", { root: config.root });
    try {
      const report = await engine.sync(await walker.walk());
      const stats = await engine.stats();
      logger.info("Graph ready", { files: stats.files, symbols: stats.symbols, edges: stats.edges, failed: report.failed });
    } catch (error) {
      logger.warn("Initial sync failed; run graph_sync to retry", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  },
  onShutdown: ({ engine }) => engine.close(),
});

/**
 * Stdio bootstrap shared by the package servers.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createLogger, type Logger } from "./logger.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;
  createServices: () => S | Promise<S>;
  registerTools: (server: McpServer, services: S) => void;
  /** Runs after the tools are registered and before the transport connects. */
  onStartup?: (services: S) => Promise<void> | void;
  /** Runs once, on a signal or when the client closes stdin. */
  onShutdown?: (services: S) => Promise<void> | void;
  /** Defaults to a logger scoped to `config.name`. */
  logger?: Logger;
}

/**
 * Build the services, register the tools and serve them over stdio.
 *
 * @example
 * ```typescript
 * await bootstrapServer({
 *   config: { name: "depmap:graph", version: "0.1.0" },
 *   createServices: () => ({ engine: GraphEngine.create({ store }) }),
 *   registerTools: registerAllTools,
 *   onShutdown: ({ engine }) => engine.close(),
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, onStartup, onShutdown } = options;
  const logger = options.logger ?? createLogger(config.name);

  const services = await options.createServices();
  const server = new McpServer({ name: config.name, version: config.version });
  options.registerTools(server, services);

  let closing: Promise<void> | null = null;
  const shutdown = (reason: string): Promise<void> => {
    closing ??= (async () => {
      logger.info("Shutting down", { reason });
      let code = 0;
      try {
        await onShutdown?.(services);
        await server.close();
      } catch (error) {
        logger.error("Shutdown failed", { error: error instanceof Error ? error.message : String(error) });
        code = 1;
      }
      process.exit(code);
    })();
    return closing;
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => void shutdown(signal));
  }
  process.stdin.once("end", () => void shutdown("stdin closed"));

  await onStartup?.(services);
  await server.connect(new StdioServerTransport());
  logger.info("Listening on stdio", { version: config.version });
}

/** `bootstrapServer`, exiting with status 1 on a startup failure. */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  const logger = options.logger ?? createLogger(options.config.name);
  bootstrapServer({ ...options, logger }).catch((error: unknown) => {
    logger.error("Startup failed", { error: error instanceof Error ? (error.stack ?? error.message) : String(error) });
    process.exit(1);
  });
}

export { McpServer };

export { Ok, Err, map, toError } from "./result.js";
export type { Result } from "./result.js";

export {
  createLogger,
  parseLogLevel,
  silentLogger,
} from "./logger.js";
export type { Logger, LogLevel, LogContext, LogSink, LoggerOptions } from "./logger.js";

export {
  errorResponse,
  successResponse,
  resultToResponse,
  guardTool,
} from "./mcp.js";
export type { TextContent, ToolResponse } from "./mcp.js";

export { bootstrapServer, runServer, McpServer } from "./server.js";
export type { ServerConfig, ServerBootstrapOptions } from "./server.js";

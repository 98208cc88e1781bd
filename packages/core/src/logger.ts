/**
 * Leveled logger for MCP servers.
 *
 * Everything goes to stderr: stdout carries the stdio transport, so a stray
 * `console.log` would corrupt the protocol stream.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogContext = Record<string, unknown>;

/** Receives one formatted line per emitted record. */
export type LogSink = (level: Exclude<LogLevel, "silent">, line: string, context?: LogContext) => void;

export interface Logger {
  readonly scope: string;
  readonly level: LogLevel;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger for a sub-component, e.g. `graph` → `graph:builder`. */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVELS = Object.keys(LEVEL_RANK);

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.includes(value);
}

/**
 * Parse a level name, falling back when the value is missing or unknown.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

const consoleSink: LogSink = (level, line, context) => {
  const write = level === "warn" ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    write(line, context);
  } else {
    write(line);
  }
};

class ConsoleLogger implements Logger {
  constructor(
    readonly scope: string,
    readonly level: LogLevel,
    private readonly sink: LogSink
  ) {}

  debug(message: string, context?: LogContext): void {
    this.emit("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.emit("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.emit("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.emit("error", message, context);
  }

  child(scope: string): Logger {
    return new ConsoleLogger(`${this.scope}:${scope}`, this.level, this.sink);
  }

  private emit(level: Exclude<LogLevel, "silent">, message: string, context?: LogContext): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;
    this.sink(level, `[${this.scope}] ${message}`, context);
  }
}

/**
 * Create a logger. The level defaults to `DEPMAP_LOG_LEVEL`, then `info`.
 *
 * @example
 * ```typescript
 * const log = createLogger("graph");
 * log.warn("Scan failed", { path: "src/a.ts" });
 * // stderr: [graph] Scan failed { path: 'src/a.ts' }
 * ```
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? parseLogLevel(process.env.DEPMAP_LOG_LEVEL);
  return new ConsoleLogger(scope, level, options.sink ?? consoleSink);
}

/** Logger that drops everything; handy for tests and embedding. */
export const silentLogger: Logger = createLogger("silent", { level: "silent" });

/**
 * Scoped stderr logger.
 * stdout is reserved for the MCP stdio transport, so everything goes to stderr.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  readonly scope: string;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(scope: string): Logger;
}

export type LogSink = (line: string, ...details: unknown[]) => void;

let globalLevel: LogLevel = parseLogLevel(process.env.WAYPOINT_LOG_LEVEL) ?? "info";

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

/**
 * Create a logger that prefixes every line with `[scope]`.
 * The sink defaults to console.error; tests pass their own.
 */
export function createLogger(scope: string, sink: LogSink = console.error): Logger {
  const write = (level: Exclude<LogLevel, "silent">, message: string, details: unknown[]): void => {
    if (SEVERITY[level] < SEVERITY[globalLevel]) return;
    const prefix = level === "info" ? `[${scope}]` : `[${scope}] ${level}:`;
    sink(`${prefix} ${message}`, ...details);
  };

  return {
    scope,
    debug: (message, ...details) => write("debug", message, details),
    info: (message, ...details) => write("info", message, details),
    warn: (message, ...details) => write("warn", message, details),
    error: (message, ...details) => write("error", message, details),
    child: (sub) => createLogger(`${scope}:${sub}`, sink),
  };
}

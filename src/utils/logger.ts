/**
 * Leveled diagnostics for the inventory pipeline.
 *
 * Everything goes to stderr by default: stdout carries the MCP stdio
 * channel (or the JSON printed by `--list`).
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface LogEntry {
  level: Exclude<LogLevel, "silent">;
  message: string;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Receives every entry at or above `level`. Defaults to stderr. */
  sink?: (entry: LogEntry) => void;
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function stderrSink(entry: LogEntry): void {
  console.error(`[pci-inventory] ${entry.level.toUpperCase()} ${entry.message}`);
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = RANK[options.level ?? "warn"];
  const sink = options.sink ?? stderrSink;

  const emit = (level: LogEntry["level"], message: string) => {
    if (RANK[level] >= threshold) {
      sink({ level, message });
    }
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}

export const silentLogger: Logger = createLogger({ level: "silent" });

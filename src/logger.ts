/**
 * Structured JSON-line logger.
 *
 * One JSON object per line on stderr, so stdout stays free for the stdio
 * MCP transport and log aggregators can ingest the stream as-is.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export interface LogSink {
  write(line: string): unknown;
}

export function createLogger(
  level: LogLevel = "info",
  sink: LogSink = process.stderr,
): Logger {
  const threshold = LEVEL_ORDER[level];

  const emit = (entryLevel: LogLevel, message: string, fields?: LogFields) => {
    if (LEVEL_ORDER[entryLevel] < threshold) return;
    sink.write(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level: entryLevel,
        message,
        ...fields,
      }) + "\n",
    );
  };

  return {
    debug: (message, fields) => emit("debug", message, fields),
    info: (message, fields) => emit("info", message, fields),
    warn: (message, fields) => emit("warn", message, fields),
    error: (message, fields) => emit("error", message, fields),
  };
}

/** Error message for logs and tool results. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

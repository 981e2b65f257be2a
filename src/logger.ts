export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/** Where the session and builders send their diagnostics. */
export interface DiagnosticSink {
  log(level: LogLevel, message: string): void;
}

export const silentSink: DiagnosticSink = {
  log() {},
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * JSON-lines sink on stderr. stdout stays reserved for command output
 * (and for the MCP stdio transport).
 */
export function createStderrSink(minLevel: LogLevel = "warn"): DiagnosticSink {
  const threshold = LOG_LEVELS.indexOf(minLevel);
  return {
    log(level, message) {
      if (LOG_LEVELS.indexOf(level) < threshold) return;
      console.error(JSON.stringify({ level, message }));
    },
  };
}

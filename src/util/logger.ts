export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = "json" | "pretty";

import {
  initTracing as initTracingInternal,
  isTracingEnabled,
  shutdownTracing as shutdownTracingInternal,
} from "./tracing.js";

export type LogSink = (line: string) => void;

const writeToStderr: LogSink = (msg: string): void => {
  process.stderr.write(msg + "\n");
};

function safeStringify(obj: Record<string, unknown>): string {
  try {
    return JSON.stringify(obj);
  } catch {
    return "[circular or unstringifiable]";
  }
}

function extractErrorMeta(
  meta?: Record<string, unknown>,
): Record<string, unknown> | undefined {
  if (!meta) return undefined;
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (value instanceof Error) {
      result[key] = value.message;
      if (value.stack) {
        result[`${key}Stack`] = value.stack;
      }
    } else {
      result[key] = value;
    }
  }
  return result;
}

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

class Logger {
  private level: LogLevel;
  private format: LogFormat = "pretty";
  private sink: LogSink = writeToStderr;

  constructor(level: LogLevel = "info") {
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setFormat(format: LogFormat): void {
    this.format = format;
  }

  /**
   * Redirects log lines, e.g. to capture them in tests. Pass nothing to
   * restore stderr.
   */
  setSink(sink?: LogSink): void {
    this.sink = sink ?? writeToStderr;
  }

  private write(
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>,
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }
    const processed = extractErrorMeta(meta);

    if (this.format === "json") {
      this.sink(
        safeStringify({
          timestamp: new Date().toISOString(),
          level,
          message,
          ...processed,
        }),
      );
      return;
    }

    const metaStr = processed ? " " + safeStringify(processed) : "";
    this.sink(`[${level.toUpperCase()}] ${message}${metaStr}`);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write("error", message, meta);
  }
}

export const logger = new Logger();

export {
  initTracingInternal as initTracing,
  isTracingEnabled,
  shutdownTracingInternal as shutdownTracing,
};

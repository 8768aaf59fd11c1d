import type { Writable } from "stream";

export type LogLevel = "info" | "warn" | "error";
export type LogFormat = "pretty" | "json";

export interface Logger {
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  format?: LogFormat;
  stream?: Writable;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const format = options.format ?? "pretty";
  const stream = options.stream ?? process.stdout;

  function write(level: LogLevel, message: string, details?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    if (format === "json") {
      stream.write(JSON.stringify({ timestamp, level, message, ...details }) + "\n");
      return;
    }
    const suffix = details && Object.keys(details).length > 0 ? ` ${JSON.stringify(details)}` : "";
    stream.write(`[${timestamp}] ${level.toUpperCase()} ${message}${suffix}\n`);
  }

  return {
    info: (message, details) => write("info", message, details),
    warn: (message, details) => write("warn", message, details),
    error: (message, details) => write("error", message, details),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

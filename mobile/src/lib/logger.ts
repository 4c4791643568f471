/* eslint-disable no-console -- this IS the logger module; it owns console output for the app */
import os from "node:os";
import { env } from "@/config/env";

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  fatal(message: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
}

export interface LoggerOptions {
  level: LogLevel;
  format: "json" | "text";
  bindings?: LogContext;
}

export const LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const SENSITIVE_KEY_PARTS = ["password", "secret", "token", "authorization", "cookie"];
const SENSITIVE_KEYS = new Set(["email", "apikey"]);
const REDACTED = "***";
const MAX_DEPTH = 5;

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEYS.has(lower) || SENSITIVE_KEY_PARTS.some((part) => lower.includes(part));
}

function serializeError(error: Error): LogContext {
  const serialized: LogContext = { name: error.name, message: error.message };
  if ("code" in error && typeof error.code === "string") serialized.code = error.code;
  if (error.stack) serialized.stack = error.stack;
  return serialized;
}

/** Strip sensitive values and make errors and dates printable. */
export function redact(value: unknown, depth = 0): unknown {
  if (value instanceof Error) return serializeError(value);
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Uint8Array) return `<${value.byteLength} bytes>`;
  if (depth >= MAX_DEPTH) return "[Truncated]";
  if (Array.isArray(value)) return value.map((item) => redact(item, depth + 1));
  if (value !== null && typeof value === "object") {
    const out: LogContext = {};
    for (const [key, entry] of Object.entries(value)) {
      out[key] = isSensitiveKey(key) ? REDACTED : redact(entry, depth + 1);
    }
    return out;
  }
  return value;
}

const consoleMethods: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
  fatal: (line) => console.error(line),
};

export function createLogger(options: LoggerOptions): Logger {
  const threshold = LEVEL_VALUES[options.level];
  const bindings = options.bindings ?? {};

  const write = (level: LogLevel, message: string, context?: LogContext) => {
    if (LEVEL_VALUES[level] < threshold) return;

    const timestamp = new Date().toISOString();
    const fields = redact({ ...bindings, ...context });
    const data: LogContext = fields !== null && typeof fields === "object" ? { ...fields } : {};

    if (options.format === "json") {
      consoleMethods[level](
        JSON.stringify({
          ...data,
          timestamp,
          level: LEVEL_VALUES[level],
          levelName: level,
          message,
          hostname: os.hostname(),
          pid: process.pid,
        })
      );
      return;
    }

    const suffix = Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : "";
    consoleMethods[level](`[${timestamp}] [${level.toUpperCase()}] ${message}${suffix}`);
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
    fatal: (message, context) => write("fatal", message, context),
    child: (childBindings) =>
      createLogger({ ...options, bindings: { ...bindings, ...childBindings } }),
  };
}

const logger = createLogger({
  level: env.LOG_LEVEL,
  format: env.NODE_ENV === "production" ? "json" : "text",
});

export default logger;

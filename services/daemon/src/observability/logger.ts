import pino, { type LoggerOptions, stdTimeFunctions, type Logger as PinoLogger } from "pino";

export type AppLogger = PinoLogger;

export type NormalizedError = {
  message: string;
  name?: string;
  stack?: string;
  code?: string | number;
  cause?: unknown;
  details?: Record<string, unknown>;
};

const DEFAULT_SERVICE_NAME = "reelbridge-daemon";

function envOrDefault(name: string, fallback: string): string {
  const value = process.env[name]?.trim();
  return value && value.length > 0 ? value : fallback;
}

function buildLoggerOptions(): LoggerOptions {
  return {
    level: envOrDefault("LOG_LEVEL", "info"),
    base: { service: envOrDefault("SERVICE_NAME", DEFAULT_SERVICE_NAME) },
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
}

/** Process logger for one subsystem; LOG_LEVEL and SERVICE_NAME are read once, here. */
export function createLogger(subsystem: string): AppLogger {
  return pino(buildLoggerOptions()).child({ subsystem });
}

export const appLogger: AppLogger = createLogger("config");

function extractCode(error: object): string | number | undefined {
  const candidate: unknown = Reflect.get(error, "code");
  if (typeof candidate === "string" || typeof candidate === "number") {
    return candidate;
  }
  return undefined;
}

function extractDetails(error: object): Record<string, unknown> | undefined {
  const details: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(error)) {
    if (key === "message" || key === "name" || key === "stack" || key === "code" || key === "cause") {
      continue;
    }
    details[key] = value;
  }
  return Object.keys(details).length > 0 ? details : undefined;
}

function readCause(value: object): unknown {
  return "cause" in value ? Reflect.get(value, "cause") : undefined;
}

export function normalizeError(error: unknown): NormalizedError {
  if (error instanceof Error) {
    const normalized: NormalizedError = {
      message: error.message,
      name: error.name,
    };
    if (error.stack) {
      normalized.stack = error.stack;
    }
    const code = extractCode(error);
    if (code !== undefined) {
      normalized.code = code;
    }
    const cause = readCause(error);
    if (cause !== undefined) {
      normalized.cause = cause instanceof Error ? normalizeError(cause) : cause;
    }
    const details = extractDetails(error);
    if (details) {
      normalized.details = details;
    }
    return normalized;
  }

  if (typeof error === "string") {
    return { message: error };
  }

  if (typeof error === "object" && error !== null) {
    const message: unknown = Reflect.get(error, "message");
    const normalized: NormalizedError = {
      message: typeof message === "string" && message.trim().length > 0
        ? message
        : safeStringify(error) ?? "Unknown error",
    };
    const name: unknown = Reflect.get(error, "name");
    if (typeof name === "string") {
      normalized.name = name;
    }
    const code = extractCode(error);
    if (code !== undefined) {
      normalized.code = code;
    }
    const cause = readCause(error);
    if (cause !== undefined) {
      normalized.cause = cause instanceof Error ? normalizeError(cause) : cause;
    }
    return normalized;
  }

  return { message: safeStringify(error) ?? String(error) };
}

function safeStringify(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}

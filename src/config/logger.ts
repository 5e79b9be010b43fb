export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const FREE_TEXT_KEYS = new Set(["text", "improvedtext", "body", "jobtext"]);

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

interface CreateLoggerOptions {
  minLevel?: LogLevel;
  write?: (line: string) => void;
}

export interface LoggerContext {
  request_id?: string;
  route?: string;
  method?: string;
  sector?: string;
  text_length?: number;
  latency_ms?: number;
  bias_score?: number;
  flagged_terms?: number;
  ok?: boolean;
  error_code?: string;
}

function log(
  level: LogLevel,
  message: string,
  meta: Record<string, unknown> | undefined,
  write: (line: string) => void,
): void {
  const payload: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };
  if (meta) {
    payload.meta = redactMeta(meta);
  }
  write(`${safeJson(payload)}\n`);
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const minLevel = options?.minLevel ?? "info";
  const write = options?.write ?? ((line: string) => process.stdout.write(line));
  const emit = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[minLevel]) {
      return;
    }
    log(level, message, meta, write);
  };
  return {
    debug(message, meta) {
      emit("debug", message, meta);
    },
    info(message, meta) {
      emit("info", message, meta);
    },
    warn(message, meta) {
      emit("warn", message, meta);
    },
    error(message, meta) {
      emit("error", message, meta);
    },
  };
}

export function logContext(
  logger: Logger,
  level: LogLevel,
  message: string,
  context: LoggerContext,
  fields?: Record<string, unknown>,
): void {
  const meta: Record<string, unknown> = {
    ...context,
    ...(fields ?? {}),
  };

  if (level === "debug") {
    logger.debug(message, meta);
    return;
  }
  if (level === "warn") {
    logger.warn(message, meta);
    return;
  }
  if (level === "error") {
    logger.error(message, meta);
    return;
  }
  logger.info(message, meta);
}

// Submitted advertisements are never written to the log, only their size.
export function redactMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const output: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    const lowerKey = key.toLowerCase();
    if (
      lowerKey.includes("token") ||
      lowerKey.includes("secret") ||
      lowerKey.includes("apikey") ||
      lowerKey.includes("api_key") ||
      lowerKey.includes("authorization")
    ) {
      output[key] = "[REDACTED]";
      continue;
    }
    if (FREE_TEXT_KEYS.has(lowerKey) && typeof value === "string") {
      output[key] = `[text:${value.length} chars]`;
      continue;
    }
    if (typeof value === "string" && value.length > 500) {
      output[key] = `${value.slice(0, 500)}...`;
      continue;
    }
    output[key] = value;
  }
  return output;
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return "\"[unserializable]\"";
  }
}

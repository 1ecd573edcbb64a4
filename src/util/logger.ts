/**
 * JSON-line console logger. Nothing that looks like analyzed text is ever written:
 * fields named like text/content/pseudonym and long strings are replaced before output.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMetadata = Record<string, unknown>;

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const REDACT_KEYS = [/text$/i, /content/i, /pseudonym/i, /original/i, /value$/i, /body/i];

const MAX_PLAIN_LENGTH = 120;

export function redactValue(value: unknown): unknown {
  if (typeof value === "string") {
    if (value.length > MAX_PLAIN_LENGTH || value.includes("\n")) return "[REDACTED]";
    return value;
  }
  if (Array.isArray(value)) return value.map((v) => redactValue(v));
  if (value && typeof value === "object") return redactFields(value);
  return value;
}

export function redactFields(fields: object): LogMetadata {
  const out: LogMetadata = {};
  for (const [k, v] of Object.entries(fields)) {
    out[k] = REDACT_KEYS.some((re) => re.test(k)) ? "[REDACTED]" : redactValue(v);
  }
  return out;
}

export function createLogger(level: LogLevel = "info", scope?: string): Logger {
  const min = LEVEL_ORDER[level];

  const emit = (lvl: LogLevel, message: string, metadata?: LogMetadata): void => {
    if (LEVEL_ORDER[lvl] < min) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level: lvl,
      ...(scope ? { scope } : {}),
      message,
      ...(metadata ? redactFields(metadata) : {}),
    };
    const line = JSON.stringify(entry);
    if (lvl === "error") console.error(line);
    else if (lvl === "warn") console.warn(line);
    else if (lvl === "info") console.info(line);
    else console.log(line);
  };

  return {
    debug: (message, metadata) => emit("debug", message, metadata),
    info: (message, metadata) => emit("info", message, metadata),
    warn: (message, metadata) => emit("warn", message, metadata),
    error: (message, metadata) => emit("error", message, metadata),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

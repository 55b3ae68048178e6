/**
 * Structured logging utility
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

function formatMeta(meta: unknown): string {
  if (meta === undefined) {
    return "";
  }
  return JSON.stringify(meta, (_key, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value,
  );
}

export class Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(config: LoggerConfig = { level: "info" }) {
    this.level = config.level;
    this.prefix = config.prefix || "xmltab";
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
  }

  error(message: string, meta?: unknown): void {
    if (this.shouldLog("error")) {
      console.error(`[${this.prefix}] ERROR:`, message, formatMeta(meta));
    }
  }

  warn(message: string, meta?: unknown): void {
    if (this.shouldLog("warn")) {
      console.warn(`[${this.prefix}] WARN:`, message, formatMeta(meta));
    }
  }

  info(message: string, meta?: unknown): void {
    if (this.shouldLog("info")) {
      // Write to stderr to avoid clobbering stdout (used for piped JSON/NDJSON output)
      process.stderr.write(`[${this.prefix}] INFO: ${message} ${formatMeta(meta)}\n`);
    }
  }

  debug(message: string, meta?: unknown): void {
    if (this.shouldLog("debug")) {
      process.stderr.write(`[${this.prefix}] DEBUG: ${message} ${formatMeta(meta)}\n`);
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

const envLevel = process.env.XMLTAB_LOG_LEVEL;

// Default logger instance
export const logger = new Logger({ level: isLogLevel(envLevel) ? envLevel : "info" });

// Factory function for custom loggers
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}

import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";

/** Placeholder written in place of redacted values. */
const REDACTION_TOKEN = "[REDACTED]";

/** Payload keys whose values are redacted when redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "api_key",
  "apikey",
  "token",
  "access_token",
  "refresh_token",
  "password",
  "secret",
]);

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** Optional file receiving a copy of every JSON line. */
  readonly logFile?: string | null;
  /** Entries below this level are discarded. Defaults to `debug`. */
  readonly minLevel?: LogLevel;
  /**
   * Explicit toggle for payload redaction. When omitted, the logger honours
   * the `CANOPY_LOG_REDACT` environment variable.
   */
  readonly redactionEnabled?: boolean;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
  /** Line sink, stdout by default. */
  readonly write?: (line: string) => void;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Structured logger that emits JSON lines on stdout and optionally mirrors
 * them to a file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly logFile?: string;
  private readonly minLevel: LogLevel;
  private readonly redactionEnabled: boolean;
  private readonly entryListener?: (entry: LogEntry) => void;
  private readonly write: (line: string) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.minLevel = options.minLevel ?? "debug";
    this.entryListener = options.onEntry;
    this.write = options.write ?? ((line) => process.stdout.write(line));
    const directive = process.env.CANOPY_LOG_REDACT?.trim().toLowerCase();
    this.redactionEnabled =
      options.redactionEnabled ?? (directive === "on" || directive === "true" || directive === "1");
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  /**
   * Waits for all pending file writes. Tests rely on this to assert mirrored
   * log content deterministically.
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) {
      return;
    }
    const safePayload = payload !== undefined && this.redactionEnabled ? this.redact(payload) : payload;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.write(line);
    this.entryListener?.(entry);
    const target = this.logFile;
    if (!target) {
      return;
    }
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        if (!this.logDirectoryReady) {
          await mkdir(dirname(target), { recursive: true });
          this.logDirectoryReady = true;
        }
        await appendFile(target, line, "utf8");
      } catch (error) {
        const failure: LogEntry = {
          timestamp: new Date().toISOString(),
          level: "error",
          message: "log_file_write_failed",
          payload: { message: error instanceof Error ? error.message : String(error) },
        };
        process.stderr.write(`${JSON.stringify(failure)}\n`);
        // Retry directory creation on the next write.
        this.logDirectoryReady = false;
      }
    });
  }

  private redact(value: unknown, depth = 0): unknown {
    if (depth > 8) {
      return value;
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.redact(item, depth + 1));
    }
    if (!isPlainRecord(value)) {
      return value;
    }
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.redact(entry, depth + 1);
    }
    return result;
  }
}

/** Logger used when a component is constructed without one: warnings and errors only. */
export function createDefaultLogger(): StructuredLogger {
  return new StructuredLogger({ minLevel: "warn" });
}

import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import process from "node:process";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { readBool, readOptionalString } from "./config/env.js";
import type { PluginEnv } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

/** Sink receiving serialised log lines. Defaults to stderr. */
export type LogSink = (line: string) => void;

export interface LoggerOptions {
  /** Optional file mirroring every emitted line. */
  readonly logFile?: string | null;
  /** Entries below this level are dropped. Defaults to `warn`. */
  readonly level?: LogLevel;
  /** Destination of the JSON lines. Defaults to `process.stderr`. */
  readonly sink?: LogSink;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Structured logger that emits JSON lines on stderr and optionally mirrors
 * them to a file. Stdout is reserved for the protocol consumed by the daemon,
 * so nothing here ever writes to it. File writes are queued sequentially to
 * guarantee ordering.
 */
export class StructuredLogger {
  private readonly logFile: string | undefined;
  private readonly threshold: number;
  private readonly sink: LogSink;
  private readonly entryListener: ((entry: LogEntry) => void) | undefined;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.threshold = LEVEL_WEIGHT[options.level ?? "warn"];
    this.sink = options.sink ?? ((line: string) => process.stderr.write(line));
    this.entryListener = options.onEntry;
  }

  /**
   * Builds a logger from the plugin environment: `MUNIN_DEBUG` lowers the
   * threshold to `debug` and `PLUGIN_LOG_FILE` enables file mirroring.
   */
  static fromEnv(env: PluginEnv, overrides: Omit<LoggerOptions, "level" | "logFile"> = {}): StructuredLogger {
    return new StructuredLogger({
      ...overrides,
      level: readBool(env, "MUNIN_DEBUG", false) ? "debug" : "warn",
      logFile: readOptionalString(env, "PLUGIN_LOG_FILE") ?? null,
    });
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

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_WEIGHT[level] >= this.threshold;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(payload !== undefined ? { payload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.sink(line);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue
      .then(async () => {
        try {
          await this.ensureLogDestination(logFile);
          await appendFile(logFile, line, "utf8");
        } catch (err) {
          const errorEntry: LogEntry = {
            timestamp: new Date().toISOString(),
            level: "error",
            message: "log_file_write_failed",
            payload: err instanceof Error ? { message: err.message } : { error: String(err) },
          };
          this.sink(`${JSON.stringify(errorEntry)}\n`);
          // Allow future attempts to retry directory creation after a failure.
          this.logDirectoryReady = false;
        }
      })
      .catch(() => {
        // Errors already reported; reset queue to avoid unhandled rejections.
        this.writeQueue = Promise.resolve();
      });
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /** Waits for all pending log writes to be flushed. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }
}

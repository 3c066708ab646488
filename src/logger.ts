import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/**
 * Default maximum size (in bytes) of the primary log file before a rotation is
 * triggered.
 */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB

/** Default number of historical log files retained during rotation. */
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Numeric rank of every level, used to apply the configured threshold. */
const LEVEL_RANK: Record<LogLevel, number> = {
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

/** Minimal writable surface the logger mirrors entries to. */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Entries below this level are dropped. Defaults to `debug`. */
  readonly level?: LogLevel;
  /**
   * Stream receiving the JSON lines. Defaults to stdout; the CLI routes logs
   * to stderr so JSON traces printed on stdout stay parseable.
   */
  readonly sink?: LogSink | null;
  /** Maximum size in bytes before the active log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of historical log files to retain (including the active one). */
  readonly maxFileCount?: number;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Structured logger that emits JSON lines and optionally mirrors them to a
 * file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly logFile?: string;
  private readonly threshold: number;
  private readonly sink: LogSink | null;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private writeQueue: Promise<void> = Promise.resolve();
  /** Tracks whether the directory containing {@link logFile} already exists. */
  private logDirectoryReady = false;
  private readonly entryListener?: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.threshold = LEVEL_RANK[options.level ?? "debug"];
    this.sink = options.sink === undefined ? process.stdout : options.sink;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    this.entryListener = options.onEntry;
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

  /** Returns true when entries at {@link level} would be emitted. */
  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.threshold;
  }

  private async ensureLogDestination(file: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(file), { recursive: true });
    this.logDirectoryReady = true;
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
    const line = `${JSON.stringify(entry, serialiseNonFinite)}\n`;
    this.sink?.write(line);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    const file = this.logFile;
    if (!file) {
      return;
    }
    this.writeQueue = this.writeQueue
      .then(async () => {
        try {
          await this.ensureLogDestination(file);
          await this.rotateIfNeeded(file, Buffer.byteLength(line, "utf8"));
          await appendFile(file, line, "utf8");
        } catch (err) {
          reportInternalFailure("log_file_write_failed", err);
          // Allow future attempts to retry directory creation after a failure.
          this.logDirectoryReady = false;
        }
      });
  }

  /**
   * Waits for all pending log writes to be flushed. Tests rely on this helper
   * to deterministically assert the content of mirrored log files.
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  /**
   * Rotates the active log file when appending the provided payload would
   * exceed the configured size limit.
   */
  private async rotateIfNeeded(file: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      const stats = await stat(file);
      currentSize = stats.size;
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return;
      }
      throw error;
    }

    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    try {
      await this.performRotation(file);
    } catch (error) {
      reportInternalFailure("log_file_rotation_failed", error);
    }
  }

  /** Executes the rotation sequence while honouring {@link maxFileCount}. */
  private async performRotation(file: string): Promise<void> {
    const keep = this.maxFileCount;
    if (keep === 1) {
      await rm(file, { force: true });
      return;
    }

    await rm(`${file}.${keep - 1}`, { force: true });

    for (let index = keep - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${file}.${index}`, `${file}.${index + 1}`);
    }
    await renameIfPresent(file, `${file}.1`);
  }
}

/** JSON replacer keeping `Infinity` distances readable in log payloads. */
export function serialiseNonFinite(_key: string, value: unknown): unknown {
  if (typeof value === "number" && !Number.isFinite(value)) {
    return Number.isNaN(value) ? "NaN" : value > 0 ? "Infinity" : "-Infinity";
  }
  return value;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "ENOENT") {
      throw error;
    }
  }
}

function reportInternalFailure(message: string, error: unknown): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level: "error",
    message,
    payload: error instanceof Error ? { message: error.message } : { error: String(error) },
  };
  process.stderr.write(`${JSON.stringify(entry)}\n`);
}

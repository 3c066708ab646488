import { StructuredLogger, type LogLevel } from "../../src/logger.js";

/**
 * Logger tailored for tests that need to observe structured entries without
 * polluting stdout. It subclasses the production {@link StructuredLogger} so it
 * exposes the exact same surface while capturing calls in memory.
 */
export class RecordingLogger extends StructuredLogger {
  /** Entries emitted via `debug`/`info`/`warn`/`error` during the test. */
  public readonly entries: Array<{ level: LogLevel; message: string; payload?: unknown }> = [];

  constructor() {
    super({ logFile: null, sink: null });
  }

  private record(level: LogLevel, message: string, payload?: unknown): void {
    this.entries.push({ level, message, payload });
  }

  override debug(message: string, payload?: unknown): void {
    this.record("debug", message, payload);
  }

  override info(message: string, payload?: unknown): void {
    this.record("info", message, payload);
  }

  override warn(message: string, payload?: unknown): void {
    this.record("warn", message, payload);
  }

  override error(message: string, payload?: unknown): void {
    this.record("error", message, payload);
  }
}

import type { LogTransport, LogEntry, LogLevel } from "../types.js";

/**
 * Keeps entries in an array. Used by tests to assert on what was logged.
 */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: LogEntry[] = [];

  constructor(public minLevel: LogLevel = "trace") {}

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter(e => level === undefined || e.level === level)
      .map(e => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

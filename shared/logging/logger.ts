/**
 * Core Logger Implementation
 *
 * Structured logging fanned out to any number of transports.
 * Child loggers share the parent's transports and ring buffer.
 */

import { LOG_LEVELS, DEFAULT_REDACT_PATTERNS } from "./types.js";
import type { LogLevel, LogEntry, LoggerConfig, ILogger } from "./types.js";

// ============================================
// RING BUFFER
// ============================================

export class RingBuffer<T> {
  private buffer: T[] = [];
  private head = 0;

  constructor(private capacity: number) {}

  push(item: T): void {
    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return;
    }
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
  }

  getAll(): T[] {
    // Once full, head points at the oldest entry
    return [
      ...this.buffer.slice(this.head),
      ...this.buffer.slice(0, this.head)
    ];
  }

  getLast(n: number): T[] {
    return this.getAll().slice(-n);
  }
}

// ============================================
// LOGGER IMPLEMENTATION
// ============================================

interface ResolvedConfig extends LoggerConfig {
  redactPatterns: RegExp[];
}

export class Logger implements ILogger {
  private config: ResolvedConfig;
  private ringBuffer: RingBuffer<LogEntry>;

  constructor(config: LoggerConfig, sharedBuffer?: RingBuffer<LogEntry>) {
    this.config = {
      ...config,
      redactPatterns: config.redactPatterns || DEFAULT_REDACT_PATTERNS,
    };
    this.ringBuffer = sharedBuffer || new RingBuffer(config.ringBufferSize || 1000);
  }

  // ----------------------------------------
  // Log Methods
  // ----------------------------------------

  trace(message: string, data?: Record<string, unknown>): void {
    this.write("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("error", message, data, error);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("fatal", message, data, error);
  }

  // ----------------------------------------
  // Core Logging
  // ----------------------------------------

  private write(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
    };

    if (this.config.runId) {
      entry.runId = this.config.runId;
    }

    if (data) {
      entry.data = this.redact(data);
    }

    if (error !== undefined) {
      entry.error = error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : { name: "Unknown", message: String(error) };
    }

    this.ringBuffer.push(entry);

    for (const transport of this.config.transports) {
      if (LOG_LEVELS[level] < LOG_LEVELS[transport.minLevel]) continue;
      try {
        transport.log(entry);
      } catch (e) {
        // A broken transport must not take the caller down with it
        console.error(`[Logger] Transport ${transport.name} failed:`, e);
      }
    }
  }

  // ----------------------------------------
  // Redaction
  // ----------------------------------------

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      if (this.config.redactPatterns.some(pattern => pattern.test(key))) {
        result[key] = "[REDACTED]";
      } else if (isPlainRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  // ----------------------------------------
  // Context
  // ----------------------------------------

  child(context: { component?: string; runId?: string }): ILogger {
    return new Logger({
      ...this.config,
      component: context.component || this.config.component,
      runId: context.runId || this.config.runId,
    }, this.ringBuffer);
  }

  getRecentLogs(count: number = 100): LogEntry[] {
    return this.ringBuffer.getLast(count);
  }

  close(): void {
    for (const transport of this.config.transports) {
      transport.close?.();
    }
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

// ============================================
// GLOBAL LOGGER SINGLETON
// ============================================

let globalLogger: Logger | null = null;

export function initLogger(config: LoggerConfig): Logger {
  globalLogger?.close();
  globalLogger = new Logger(config);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    throw new Error("Logger not initialized. Call initLogger() first.");
  }
  return globalLogger;
}

export function hasLogger(): boolean {
  return globalLogger !== null;
}

export function log(): Logger {
  return getLogger();
}

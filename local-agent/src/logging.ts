/**
 * Logging Setup for the Local Agent
 *
 * Initializes the shared logging system with console and file transports.
 */

import * as path from "path";
import {
  initLogger,
  hasLogger,
  getLogger,
  log,
  ConsoleTransport,
  FileTransport,
} from "@idlewise/shared/logging";
import type { Logger, ILogger, LogLevel, LogTransport } from "@idlewise/shared/logging";

export interface LoggingOptions {
  /** Minimum level to log (default: "debug" in dev, "info" in prod) */
  minLevel?: LogLevel;
  /** Directory for rotated JSONL logs; file output is off without it */
  logDir?: string;
  /** Enable console output (default: true) */
  console?: boolean;
  /** Console colors (default: auto-detect) */
  colors?: boolean;
}

// ============================================
// INITIALIZATION
// ============================================

/**
 * Initialize the logging system for the local agent.
 */
export function initAgentLogging(options: LoggingOptions = {}): Logger {
  const isDev = process.env.NODE_ENV !== "production";
  const minLevel = options.minLevel || (isDev ? "debug" : "info");

  const transports: LogTransport[] = [];

  if (options.console !== false) {
    transports.push(new ConsoleTransport({
      minLevel,
      colors: options.colors,
    }));
  }

  if (options.logDir) {
    transports.push(new FileTransport({
      minLevel: "debug", // Always keep debug+ on disk
      logDir: options.logDir,
      filename: "local-agent",
      maxSize: 5 * 1024 * 1024,
      maxFiles: 5,
    }));
  }

  return initLogger({
    minLevel,
    component: "local-agent",
    transports,
    ringBufferSize: 500,
  });
}

/**
 * Get the agent logger. Falls back to a console-only logger at "warn"
 * when nothing has been initialized (library use, tests).
 */
export function getAgentLogger(): Logger {
  if (!hasLogger()) {
    return initAgentLogging({ minLevel: "warn" });
  }
  return getLogger();
}

export { log };

/**
 * Create a namespaced logger for a specific component.
 *
 * ```typescript
 * const schedLog = createComponentLogger("scheduler");
 * schedLog.info("Queue built"); // logs as [local-agent.scheduler]
 * ```
 */
export function createComponentLogger(component: string): ILogger {
  return getAgentLogger().child({ component: `local-agent.${component}` });
}

export function logDirFor(cacheDir: string): string {
  return path.join(cacheDir, "logs");
}

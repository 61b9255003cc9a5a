/**
 * Centralized Logging System
 *
 * Usage:
 *
 * ```typescript
 * import { initLogger, log, ConsoleTransport, FileTransport } from "@idlewise/shared/logging";
 *
 * initLogger({
 *   minLevel: "debug",
 *   component: "local-agent",
 *   transports: [
 *     new ConsoleTransport({ colors: true }),
 *     new FileTransport({ logDir: "~/.idlewise/logs" })
 *   ]
 * });
 *
 * log().info("Starting up", { items: 4 });
 * const schedLog = log().child({ component: "local-agent.scheduler" });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type ILogger,
} from "./types.js";

export {
  Logger,
  RingBuffer,
  initLogger,
  getLogger,
  hasLogger,
  log
} from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  MemoryTransport,
  type ConsoleTransportOptions,
  type FileTransportOptions,
} from "./transports/index.js";

/**
 * Configuration: IDLEWISE_* environment variables into a typed AgentConfig.
 *
 * Pure function of the environment it is given. Call loadAgentEnv() first
 * to merge `<cacheDir>/.env` into process.env.
 */

import * as os from "os";
import * as path from "path";
import { isLogLevel } from "@idlewise/shared/logging";
import type { LogLevel } from "@idlewise/shared/logging";
import { ConfigError } from "../errors.js";
import type { IdleProbeKind } from "../idle/probes.js";
import {
  DEFAULT_IDLE_INTERVAL_MS,
  DEFAULT_LONG_IDLE_SEC,
  DEFAULT_PRESENT_INTERVAL_MS,
  DEFAULT_SHORT_IDLE_SEC,
} from "../idle/monitor.js";
import { DEFAULT_EXCURSION_TIMEOUT_MS } from "../scheduler/run-item.js";

export interface AgentConfig {
  cacheDir: string;
  shortIdleSec: number;
  longIdleSec: number;
  presentIntervalMs: number;
  idleIntervalMs: number;
  excursionTimeoutMs: number;
  subtractThreshold: boolean;
  idleProbe: IdleProbeKind;
  logLevel: LogLevel;
  highPrecision: boolean;
}

export const ITEMS_FILENAME = "items.json";
export const PID_FILENAME = "agent.pid";

const IDLE_PROBES: readonly IdleProbeKind[] = ["auto", "x11", "activity", "off"];

export function defaultCacheDir(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env.IDLEWISE_CACHE_DIR?.trim();
  return configured ? path.resolve(configured) : path.join(os.homedir(), ".idlewise");
}

// ============================================
// PARSERS
// ============================================

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(key, `expected a positive number, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new ConfigError(key, `expected a boolean, got "${raw}"`);
}

function readProbe(env: NodeJS.ProcessEnv): IdleProbeKind {
  const raw = env.IDLEWISE_IDLE_PROBE?.trim().toLowerCase();
  if (!raw) return "auto";
  const match = IDLE_PROBES.find(kind => kind === raw);
  if (!match) {
    throw new ConfigError("IDLEWISE_IDLE_PROBE", `expected one of ${IDLE_PROBES.join(", ")}, got "${raw}"`);
  }
  return match;
}

function readLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const raw = env.IDLEWISE_LOG_LEVEL?.trim().toLowerCase();
  if (!raw) return "info";
  if (!isLogLevel(raw)) {
    throw new ConfigError("IDLEWISE_LOG_LEVEL", `unknown level "${raw}"`);
  }
  return raw;
}

// ============================================
// LOAD
// ============================================

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  const shortIdleSec = readNumber(env, "IDLEWISE_SHORT_IDLE_SEC", DEFAULT_SHORT_IDLE_SEC);
  const longIdleSec = readNumber(env, "IDLEWISE_LONG_IDLE_SEC", DEFAULT_LONG_IDLE_SEC);
  if (longIdleSec < shortIdleSec) {
    throw new ConfigError(
      "IDLEWISE_LONG_IDLE_SEC",
      `must not be shorter than IDLEWISE_SHORT_IDLE_SEC (${longIdleSec} < ${shortIdleSec})`,
    );
  }

  // A present poll gap longer than the short threshold reads as a suspend.
  const presentIntervalMs = readNumber(env, "IDLEWISE_PRESENT_INTERVAL_MS", DEFAULT_PRESENT_INTERVAL_MS);
  if (presentIntervalMs >= shortIdleSec * 1000) {
    throw new ConfigError(
      "IDLEWISE_PRESENT_INTERVAL_MS",
      `must be shorter than IDLEWISE_SHORT_IDLE_SEC (${presentIntervalMs}ms >= ${shortIdleSec}s)`,
    );
  }

  return {
    cacheDir: defaultCacheDir(env),
    shortIdleSec,
    longIdleSec,
    presentIntervalMs,
    idleIntervalMs: readNumber(env, "IDLEWISE_IDLE_INTERVAL_MS", DEFAULT_IDLE_INTERVAL_MS),
    excursionTimeoutMs: readNumber(env, "IDLEWISE_EXCURSION_TIMEOUT_MS", DEFAULT_EXCURSION_TIMEOUT_MS),
    subtractThreshold: readBoolean(env, "IDLEWISE_SUBTRACT_THRESHOLD", false),
    idleProbe: readProbe(env),
    logLevel: readLogLevel(env),
    highPrecision: readBoolean(env, "IDLEWISE_HIGH_PRECISION", false),
  };
}

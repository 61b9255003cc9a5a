/**
 * Instance Marker
 *
 * `<cacheDir>/agent.pid` holds the PID of the running agent. Two agents
 * sharing one cache directory would interleave writes to the same logs,
 * so a live PID in the marker makes acquisition fail.
 */

import * as fs from "fs";
import * as path from "path";

export interface PidRecord {
  pid: number;
  startedAt: number;
  cacheDir: string;
}

export type AcquireResult =
  | { acquired: true; record: PidRecord; replacedStale: boolean }
  | { acquired: false; holder: PidRecord };

export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) {
    return false;
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to another user
    return err instanceof Error && "code" in err && err.code === "EPERM";
  }
}

export function readPidRecord(pidFilePath: string): PidRecord | undefined {
  let text: string;
  try {
    text = fs.readFileSync(pidFilePath, "utf-8");
  } catch {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  if (typeof parsed !== "object" || parsed === null) return undefined;

  const pid: unknown = Reflect.get(parsed, "pid");
  const startedAt: unknown = Reflect.get(parsed, "startedAt");
  const cacheDir: unknown = Reflect.get(parsed, "cacheDir");
  if (typeof pid !== "number" || typeof startedAt !== "number") return undefined;

  return {
    pid,
    startedAt,
    cacheDir: typeof cacheDir === "string" ? cacheDir : path.dirname(pidFilePath),
  };
}

/**
 * Claim the marker for this process. A record left behind by a dead
 * process is overwritten.
 */
export function acquirePidMarker(pidFilePath: string, pid: number = process.pid): AcquireResult {
  fs.mkdirSync(path.dirname(pidFilePath), { recursive: true });

  const existing = readPidRecord(pidFilePath);
  if (existing && existing.pid !== pid && isProcessAlive(existing.pid)) {
    return { acquired: false, holder: existing };
  }

  const record: PidRecord = { pid, startedAt: Date.now(), cacheDir: path.dirname(pidFilePath) };
  fs.writeFileSync(pidFilePath, JSON.stringify(record, null, 2), "utf-8");
  return { acquired: true, record, replacedStale: existing !== undefined && existing.pid !== pid };
}

/** Remove the marker if it still names `pid` */
export function releasePidMarker(pidFilePath: string, pid: number = process.pid): boolean {
  const existing = readPidRecord(pidFilePath);
  if (!existing || existing.pid !== pid) return false;
  fs.rmSync(pidFilePath, { force: true });
  return true;
}

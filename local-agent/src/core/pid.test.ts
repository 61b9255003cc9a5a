import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { acquirePidMarker, isProcessAlive, readPidRecord, releasePidMarker } from "./pid.js";

const NOW = new Date(2026, 9, 18, 9, 0, 0).getTime();
/** Far above any pid_max, so never a live process */
const DEAD_PID = 2_000_000_000;

let dir: string;
let marker: string;

function writeMarker(pid: number): void {
  fs.writeFileSync(marker, JSON.stringify({ pid, startedAt: NOW - 1000, cacheDir: dir }));
}

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(NOW);
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "idlewise-pid-test-"));
  marker = path.join(dir, "agent.pid");
});

afterEach(() => {
  vi.useRealTimers();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("isProcessAlive", () => {
  it("knows this process is alive", () => {
    expect(isProcessAlive(process.pid)).toBe(true);
  });

  it("rejects dead and invalid pids", () => {
    expect(isProcessAlive(DEAD_PID)).toBe(false);
    expect(isProcessAlive(0)).toBe(false);
    expect(isProcessAlive(1.5)).toBe(false);
  });
});

describe("acquirePidMarker", () => {
  it("claims a free marker", () => {
    const result = acquirePidMarker(marker);

    expect(result).toEqual({
      acquired: true,
      record: { pid: process.pid, startedAt: NOW, cacheDir: dir },
      replacedStale: false,
    });
    expect(readPidRecord(marker)).toEqual({ pid: process.pid, startedAt: NOW, cacheDir: dir });
  });

  it("refuses while another live process holds it", () => {
    writeMarker(process.ppid);

    expect(acquirePidMarker(marker)).toEqual({
      acquired: false,
      holder: { pid: process.ppid, startedAt: NOW - 1000, cacheDir: dir },
    });
  });

  it("replaces a marker left by a dead process", () => {
    writeMarker(DEAD_PID);

    expect(acquirePidMarker(marker)).toMatchObject({ acquired: true, replacedStale: true });
    expect(readPidRecord(marker)?.pid).toBe(process.pid);
  });

  it("overwrites an unreadable marker", () => {
    fs.writeFileSync(marker, "not json");

    expect(acquirePidMarker(marker)).toMatchObject({ acquired: true, replacedStale: false });
  });
});

describe("releasePidMarker", () => {
  it("only removes a marker naming the given pid", () => {
    writeMarker(DEAD_PID);

    expect(releasePidMarker(marker)).toBe(false);
    expect(fs.existsSync(marker)).toBe(true);

    expect(releasePidMarker(marker, DEAD_PID)).toBe(true);
    expect(fs.existsSync(marker)).toBe(false);
  });
});

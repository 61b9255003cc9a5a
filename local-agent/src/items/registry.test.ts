/**
 * Item Registry Tests
 *
 * Covers:
 * - Registration: duplicates rejected, unknown ids rejected
 * - Disabled set and enabledIds ordering
 * - Call/success bookkeeping and the internal logs behind it
 * - Daily counts for dataset and dataset-less items
 * - Persistence bindings: shape of snapshots, validation on restore
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { readRows } from "../eventlog/index.js";
import { DuplicateItemError, StateNotRecoveredError, UnregisteredItemError } from "../errors.js";
import { DISABLED_VAR, DISMISSALS_VAR, ItemRegistry, LAST_CALLED_VAR, resolveDatasetPath } from "./registry.js";
import { SUCCESS } from "./types.js";
import type { QueryItemDef } from "./types.js";

const NOW = new Date(2026, 9, 18, 9, 0, 0);
const NOW_SEC = Math.floor(NOW.getTime() / 1000);

let cacheDir: string;

function query(fn: string, extra: Partial<QueryItemDef> = {}): QueryItemDef {
  return { kind: "query", fn, run: async () => SUCCESS, ...extra };
}

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(NOW);
  cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), "idlewise-registry-test-"));
});

afterEach(() => {
  vi.useRealTimers();
  fs.rmSync(cacheDir, { recursive: true, force: true });
});

// ============================================
// REGISTRATION
// ============================================

describe("registration", () => {
  it("rejects duplicate ids", () => {
    expect(() => new ItemRegistry([query("water"), query("water")], cacheDir)).toThrow(DuplicateItemError);
  });

  it("rejects lookups of unregistered ids", () => {
    const registry = new ItemRegistry([query("water")], cacheDir);

    expect(registry.byId("tea")).toBeUndefined();
    expect(() => registry.require("tea")).toThrow(UnregisteredItemError);
    expect(() => registry.disable("tea")).toThrow(UnregisteredItemError);
  });

  it("resolves relative dataset paths under the cache directory", () => {
    expect(resolveDatasetPath("/cache", "water.tsv")).toBe(path.join("/cache", "water.tsv"));
    expect(resolveDatasetPath("/cache", "/data/water.tsv")).toBe("/data/water.tsv");
  });
});

// ============================================
// DISABLED SET
// ============================================

describe("disabled set", () => {
  it("keeps registration order for enabled ids", () => {
    const registry = new ItemRegistry([query("a"), query("b"), query("c")], cacheDir);

    registry.disable("b");

    expect(registry.enabledIds()).toEqual(["a", "c"]);
    expect(registry.isDisabled("b")).toBe(true);
  });

  it("resets dismissals when an item is enabled again", () => {
    const registry = new ItemRegistry([query("a")], cacheDir);
    registry.markDismissed("a");
    registry.markDismissed("a");
    registry.disable("a");

    registry.enable("a");

    expect(registry.enabledIds()).toEqual(["a"]);
    expect(registry.require("a").state.dismissals).toBe(0);
  });
});

// ============================================
// BOOKKEEPING
// ============================================

describe("bookkeeping", () => {
  it("records calls with their logical date", () => {
    const registry = new ItemRegistry([query("a")], cacheDir);

    registry.markCalled("a", NOW.getTime());

    expect(registry.require("a").state.lastCalled).toBe(NOW_SEC);
    expect(readRows(registry.callLogPath("a"))).toEqual([[String(NOW_SEC), "2026-10-18"]]);
    expect(registry.countCallsToday("a", NOW.getTime())).toBe(1);
  });

  it("logs successes of dataset-less items and resets dismissals", () => {
    const registry = new ItemRegistry([query("a")], cacheDir);
    registry.markDismissed("a");

    registry.markSucceeded("a", NOW.getTime());

    expect(registry.require("a").state.dismissals).toBe(0);
    expect(readRows(registry.successLogPath("a"))).toEqual([[String(NOW_SEC), "2026-10-18"]]);
    expect(registry.countSuccessesToday("a", NOW.getTime())).toBe(1);
  });

  it("leaves success logging to the dataset writer when a dataset exists", () => {
    const registry = new ItemRegistry([query("water", { dataset: "water.tsv" })], cacheDir);

    registry.markSucceeded("water", NOW.getTime());

    expect(fs.existsSync(registry.successLogPath("water"))).toBe(false);
  });

  it("counts dataset rows carrying today's logical date", () => {
    const registry = new ItemRegistry([query("water", { dataset: "water.tsv" })], cacheDir);
    fs.writeFileSync(
      path.join(cacheDir, "water.tsv"),
      "100\t2026-10-17\t1\n200\t2026-10-18\t2\n300\t2026-10-18 08:00\t3\n",
    );

    expect(registry.countSuccessesToday("water", NOW.getTime())).toBe(2);
  });

  it("counts nothing for a missing dataset", () => {
    const registry = new ItemRegistry([query("water", { dataset: "water.tsv" })], cacheDir);

    expect(registry.countSuccessesToday("water", NOW.getTime())).toBe(0);
  });

  it("does not count yesterday's calls", () => {
    const registry = new ItemRegistry([query("a")], cacheDir);
    registry.markCalled("a", NOW.getTime());

    const tomorrow = NOW.getTime() + 24 * 3600 * 1000;
    expect(registry.countCallsToday("a", tomorrow)).toBe(0);
  });
});

// ============================================
// RECOVERY GUARD
// ============================================

describe("recovery guard", () => {
  it("refuses until state has been recovered", () => {
    const registry = new ItemRegistry([query("a")], cacheDir);

    expect(() => registry.assertRecovered()).toThrow(StateNotRecoveredError);
    registry.markRecovered();
    expect(() => registry.assertRecovered()).not.toThrow();
  });
});

// ============================================
// PERSISTENCE BINDINGS
// ============================================

describe("stateVariables", () => {
  it("exposes only non-zero dismissals, call times and the sorted disabled set", () => {
    const registry = new ItemRegistry([query("b"), query("a"), query("c")], cacheDir);
    registry.markDismissed("b");
    registry.markCalled("a", NOW.getTime());
    registry.disable("c");
    registry.disable("a");

    const vars = registry.stateVariables();

    expect(vars[DISMISSALS_VAR].get()).toEqual({ b: 1 });
    expect(vars[LAST_CALLED_VAR].get()).toEqual({ a: NOW_SEC });
    expect(vars[DISABLED_VAR].get()).toEqual(["a", "c"]);
  });

  it("restores valid entries and ignores the rest", () => {
    const registry = new ItemRegistry([query("a"), query("b")], cacheDir);
    const vars = registry.stateVariables();

    vars[DISMISSALS_VAR].set({ a: 2, b: "many", gone: 5 });
    vars[LAST_CALLED_VAR].set({ b: 1_700_000_000 });
    vars[DISABLED_VAR].set(["b", "gone", 7]);

    expect(registry.require("a").state.dismissals).toBe(2);
    expect(registry.require("b").state.dismissals).toBe(0);
    expect(registry.require("b").state.lastCalled).toBe(1_700_000_000);
    expect(registry.disabledIds()).toEqual(["b"]);
  });

  it("ignores values of the wrong shape", () => {
    const registry = new ItemRegistry([query("a")], cacheDir);
    const vars = registry.stateVariables();

    vars[DISMISSALS_VAR].set([1, 2]);
    vars[DISABLED_VAR].set("a");

    expect(registry.require("a").state.dismissals).toBe(0);
    expect(registry.disabledIds()).toEqual([]);
  });
});

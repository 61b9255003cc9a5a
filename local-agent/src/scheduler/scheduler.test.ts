/**
 * Scheduler Tests
 *
 * Covers:
 * - Queue building from the pending policy across several sessions
 * - Outcome handling: success, cancel with immediate retry, skip, failure, timeout
 * - Disable prompt after repeated dismissals, within one run or across runs
 * - Busy guard, abort, after-run hooks, status
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Mock } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { Logger, MemoryTransport } from "@idlewise/shared/logging";
import { SchedulerBusyError, StateNotRecoveredError } from "../errors.js";
import { ItemRegistry } from "../items/registry.js";
import { CANCELLED, SKIPPED, SUCCESS } from "../items/types.js";
import type { ItemDef, PromptResult } from "../items/types.js";
import { Scheduler } from "./scheduler.js";
import type { RunSummary } from "./types.js";

const T0 = new Date(2026, 9, 18, 9, 0, 0).getTime();
const T0_SEC = Math.floor(T0 / 1000);
const HOUR = 3600 * 1000;

let cacheDir: string;

interface Fixture {
  registry: ItemRegistry;
  scheduler: Scheduler;
  confirm: Mock<[string], Promise<boolean>>;
  mem: MemoryTransport;
}

function setup(defs: ItemDef[], options: { confirmAnswer?: boolean; excursionTimeoutMs?: number } = {}): Fixture {
  const mem = new MemoryTransport();
  const log = new Logger({ minLevel: "trace", component: "test", transports: [mem] });
  const registry = new ItemRegistry(defs, cacheDir);
  registry.markRecovered();
  const confirm = vi.fn<[string], Promise<boolean>>(async () => options.confirmAnswer ?? false);
  const scheduler = new Scheduler({ registry, confirm, log, excursionTimeoutMs: options.excursionTimeoutMs });
  return { registry, scheduler, confirm, mem };
}

/** A query item answering from a script, repeating the last answer */
function scripted(fn: string, answers: PromptResult[]): ItemDef {
  let call = 0;
  return {
    kind: "query",
    fn,
    run: async () => answers[Math.min(call++, answers.length - 1)],
  };
}

function never(fn: string): ItemDef {
  return { kind: "query", fn, run: () => new Promise<PromptResult>(() => undefined) };
}

async function flushMicrotasks(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await Promise.resolve();
  }
}

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(T0);
  cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), "idlewise-scheduler-test-"));
});

afterEach(() => {
  vi.useRealTimers();
  fs.rmSync(cacheDir, { recursive: true, force: true });
});

// ============================================
// SESSIONS
// ============================================

describe("sessions over a morning", () => {
  it("queues only what is pending at each session", async () => {
    const { scheduler, registry } = setup([
      scripted("water", [SUCCESS]),
      { ...scripted("mood", [CANCELLED, SUCCESS]), minHoursWait: 1 },
    ]);

    expect(scheduler.buildQueue()).toEqual(["water", "mood"]);
    const first = await scheduler.runQueue();
    expect(first).toMatchObject({
      status: "completed",
      succeeded: ["water", "mood"],
      dismissed: ["mood"],
      remaining: [],
    });
    expect(registry.require("mood").state.dismissals).toBe(0);

    vi.setSystemTime(T0 + 2 * HOUR);
    expect(scheduler.buildQueue()).toEqual(["mood"]);
    const second = await scheduler.runQueue();
    expect(second).toMatchObject({ status: "completed", succeeded: ["mood"], remaining: [] });

    vi.setSystemTime(T0 + 4 * HOUR);
    expect(scheduler.buildQueue()).toEqual(["water", "mood"]);
  });

  it("queues every enabled item when forced", async () => {
    const { scheduler, registry } = setup([scripted("water", [SUCCESS]), scripted("mood", [SUCCESS])]);
    scheduler.buildQueue();
    await scheduler.runQueue();
    registry.disable("mood");

    expect(scheduler.buildQueue()).toEqual([]);
    expect(scheduler.buildQueue(true)).toEqual(["water"]);
  });

  it("reports an empty run", async () => {
    const { scheduler } = setup([]);
    scheduler.buildQueue();

    await expect(scheduler.runQueue()).resolves.toMatchObject({ status: "empty", remaining: [] });
  });

  it("refuses to build a queue before state is recovered", () => {
    const registry = new ItemRegistry([scripted("water", [SUCCESS])], cacheDir);
    const scheduler = new Scheduler({ registry, confirm: async () => false, log: new Logger({
      minLevel: "trace",
      component: "test",
      transports: [new MemoryTransport()],
    }) });

    expect(() => scheduler.buildQueue()).toThrow(StateNotRecoveredError);
  });

  it("leaves out items whose pending check throws", () => {
    fs.mkdirSync(path.join(cacheDir, "broken.tsv"));
    const { scheduler, mem } = setup([
      { kind: "query", fn: "broken", dataset: "broken.tsv", run: async () => SUCCESS },
      scripted("water", [SUCCESS]),
    ]);

    expect(scheduler.buildQueue()).toEqual(["water"]);
    expect(mem.messages("error")).toEqual(['Pending check for "broken" failed, leaving it out']);
  });
});

// ============================================
// OUTCOMES
// ============================================

describe("outcomes", () => {
  it("asks a cancelled item again before moving on", async () => {
    const body = vi.fn<[], Promise<PromptResult>>()
      .mockResolvedValueOnce(CANCELLED)
      .mockResolvedValueOnce(SUCCESS);
    const { scheduler, registry } = setup([{ kind: "query", fn: "a", run: body }, scripted("b", [SUCCESS])]);
    scheduler.buildQueue();

    const summary = await scheduler.runQueue();

    expect(summary).toMatchObject({ status: "completed", dismissed: ["a"], succeeded: ["a", "b"], remaining: [] });
    expect(body).toHaveBeenCalledTimes(2);
    expect(registry.require("a").state.dismissals).toBe(0);
  });

  it("moves on past a skipped item without counting a dismissal", async () => {
    const { scheduler, registry } = setup([scripted("a", [SKIPPED]), scripted("b", [SUCCESS])]);
    scheduler.buildQueue();

    const summary = await scheduler.runQueue();

    expect(summary).toMatchObject({ status: "completed", skipped: ["a"], succeeded: ["b"], remaining: [] });
    expect(registry.require("a").state.dismissals).toBe(0);
  });

  it("treats skipping the only queued item as a cancel", async () => {
    const { scheduler, registry } = setup([scripted("a", [SKIPPED])]);
    scheduler.buildQueue();

    const summary = await scheduler.runQueue();

    expect(summary).toMatchObject({ status: "cancelled", dismissed: ["a"], skipped: [], remaining: ["a"] });
    expect(registry.require("a").state.dismissals).toBe(1);
  });

  it("resumes a run that ended on a lone skip", async () => {
    const { scheduler, registry } = setup([scripted("a", [SKIPPED, SUCCESS])]);
    scheduler.buildQueue();
    await scheduler.runQueue();

    const resumed = await scheduler.resume();

    expect(resumed).toMatchObject({ status: "completed", succeeded: ["a"], remaining: [] });
    expect(registry.require("a").state.dismissals).toBe(0);
  });

  it("drops a failing item and carries on", async () => {
    const { scheduler, mem } = setup([
      { kind: "query", fn: "a", run: async () => { throw new Error("boom"); } },
      scripted("b", [SUCCESS]),
    ]);
    scheduler.buildQueue();

    const summary = await scheduler.runQueue();

    expect(summary).toMatchObject({ status: "completed", failed: ["a"], succeeded: ["b"], remaining: [] });
    expect(mem.messages("error")).toEqual(['Item "a" failed']);
  });

  it("drops an excursion that times out", async () => {
    const { scheduler } = setup([
      { kind: "excursion", fn: "notes", run: async ctx => { ctx.open("editor"); } },
      scripted("b", [SUCCESS]),
    ], { excursionTimeoutMs: 1_000 });
    scheduler.buildQueue();

    const run = scheduler.runQueue();
    await vi.advanceTimersByTimeAsync(1_000);

    await expect(run).resolves.toMatchObject({ status: "completed", timedOut: ["notes"], succeeded: ["b"] });
  });

  it("records the call before invoking the item", async () => {
    const { scheduler, registry } = setup([scripted("a", [SUCCESS])]);
    scheduler.buildQueue();

    await scheduler.runQueue();

    expect(registry.require("a").state.lastCalled).toBe(T0_SEC);
    expect(registry.countCallsToday("a", T0)).toBe(1);
  });
});

// ============================================
// DISMISSAL PROMPT
// ============================================

describe("disable prompt", () => {
  it("disables an item the user agrees to drop", async () => {
    const body = vi.fn(async () => SUCCESS);
    const { scheduler, registry, confirm } = setup([{ kind: "query", fn: "a", run: body }], { confirmAnswer: true });
    registry.require("a").state.dismissals = 3;
    scheduler.buildQueue();

    const summary = await scheduler.runQueue();

    expect(confirm).toHaveBeenCalledWith('"a" was dismissed 3 times in a row. Disable it?');
    expect(summary).toMatchObject({ status: "completed", disabled: ["a"], remaining: [] });
    expect(registry.isDisabled("a")).toBe(true);
    expect(body).not.toHaveBeenCalled();
  });

  it("resets the count and asks the item when the user declines", async () => {
    const { scheduler, registry } = setup([scripted("a", [SUCCESS])], { confirmAnswer: false });
    registry.require("a").state.dismissals = 3;
    scheduler.buildQueue();

    const summary = await scheduler.runQueue();

    expect(summary).toMatchObject({ succeeded: ["a"], disabled: [] });
    expect(registry.isDisabled("a")).toBe(false);
    expect(registry.require("a").state.dismissals).toBe(0);
  });

  it("asks within the run once an item is cancelled three times", async () => {
    const body = vi.fn(async () => CANCELLED);
    const { scheduler, registry, confirm } = setup(
      [{ kind: "query", fn: "a", run: body }, scripted("b", [SUCCESS])],
      { confirmAnswer: true },
    );
    scheduler.buildQueue();

    const summary = await scheduler.runQueue();

    expect(body).toHaveBeenCalledTimes(3);
    expect(confirm).toHaveBeenCalledTimes(1);
    expect(confirm).toHaveBeenCalledWith('"a" was dismissed 3 times in a row. Disable it?');
    expect(summary).toMatchObject({
      status: "completed",
      dismissed: ["a"],
      disabled: ["a"],
      succeeded: ["b"],
      remaining: [],
    });
    expect(registry.enabledIds()).toEqual(["b"]);
  });

  it("leaves the item untouched when the run is aborted at the question", async () => {
    const body = vi.fn(async () => SUCCESS);
    const { scheduler, registry, confirm } = setup([{ kind: "query", fn: "a", run: body }]);
    confirm.mockImplementation(async () => {
      scheduler.abort();
      return false;
    });
    registry.require("a").state.dismissals = 3;
    scheduler.buildQueue();

    const summary = await scheduler.runQueue();

    expect(summary).toMatchObject({ status: "aborted", disabled: [], remaining: ["a"] });
    expect(body).not.toHaveBeenCalled();
    expect(registry.require("a").state.dismissals).toBe(3);
    expect(registry.require("a").state.lastCalled).toBeUndefined();
    expect(registry.countCallsToday("a", T0)).toBe(0);
  });

  it("does not ask below the threshold", async () => {
    const { scheduler, registry, confirm } = setup([scripted("a", [SUCCESS])]);
    registry.require("a").state.dismissals = 2;
    scheduler.buildQueue(true);

    await scheduler.runQueue();

    expect(confirm).not.toHaveBeenCalled();
  });
});

// ============================================
// CONCURRENCY
// ============================================

describe("running state", () => {
  it("refuses a second run or a rebuild while running", async () => {
    let answer: (result: PromptResult) => void = () => undefined;
    const { scheduler } = setup([{
      kind: "query",
      fn: "a",
      run: () => new Promise<PromptResult>(resolve => { answer = resolve; }),
    }]);
    scheduler.buildQueue();

    const first = scheduler.runQueue();
    expect(scheduler.isRunning()).toBe(true);
    expect(scheduler.getState().current).toBe("a");
    expect(() => scheduler.buildQueue()).toThrow(SchedulerBusyError);
    await expect(scheduler.runQueue()).rejects.toThrow(SchedulerBusyError);

    answer(SUCCESS);
    await expect(first).resolves.toMatchObject({ status: "completed", succeeded: ["a"] });
    expect(scheduler.isRunning()).toBe(false);
    expect(scheduler.getState().current).toBeNull();
  });

  it("aborts a run without counting a dismissal", async () => {
    const { scheduler, registry } = setup([never("a"), scripted("b", [SUCCESS])]);
    scheduler.buildQueue();
    expect(scheduler.abort()).toBe(false);

    const run = scheduler.runQueue();
    await flushMicrotasks();
    expect(scheduler.abort()).toBe(true);

    await expect(run).resolves.toMatchObject({ status: "aborted", remaining: ["a", "b"], dismissed: [] });
    expect(registry.require("a").state.dismissals).toBe(0);
    expect(scheduler.getQueue()).toEqual(["a", "b"]);
  });

  it("runs after-run hooks once per run with the summary", async () => {
    const { scheduler } = setup([scripted("a", [SUCCESS])]);
    const summaries: RunSummary[] = [];
    scheduler.afterRun.add("record", summary => { summaries.push(summary); });
    scheduler.buildQueue();

    const summary = await scheduler.runQueue();

    expect(summaries).toEqual([summary]);
    expect(summary.runId).toMatch(/^run_/);
  });
});

// ============================================
// STATUS
// ============================================

describe("status", () => {
  it("reports each item with its verdict", async () => {
    const { scheduler, registry } = setup([scripted("water", [SUCCESS]), scripted("mood", [CANCELLED, SKIPPED])]);
    scheduler.buildQueue();
    await scheduler.runQueue();
    registry.disable("water");

    const status = scheduler.status(T0);

    expect(status).toMatchObject({ running: false, current: null, queue: ["mood"], asOf: T0 });
    expect(status.items).toEqual([
      {
        fn: "water",
        kind: "query",
        enabled: false,
        dismissals: 0,
        lastCalled: T0_SEC,
        verdict: { pending: false, reason: "recently-logged" },
      },
      {
        fn: "mood",
        kind: "query",
        enabled: true,
        dismissals: 2,
        lastCalled: T0_SEC,
        verdict: { pending: false, reason: "dismissal-backoff" },
      },
    ]);
  });
});

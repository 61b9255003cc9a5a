/**
 * Item Invocation Tests
 *
 * Covers:
 * - Query results mapped to outcomes, thrown bodies as failures
 * - Excursions completing only once every opened resource is closed
 * - Excursion watchdog, cancel, early result, failure
 * - Abort through the run's signal for both kinds
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger, MemoryTransport } from "@idlewise/shared/logging";
import { CANCELLED, SKIPPED, SUCCESS } from "../items/types.js";
import type { AuxResource, ExcursionItemDef, Item, PromptResult, QueryItemDef } from "../items/types.js";
import { runItem } from "./run-item.js";
import type { ItemOutcome } from "./types.js";

function makeLog(): { log: Logger; mem: MemoryTransport } {
  const mem = new MemoryTransport();
  return { log: new Logger({ minLevel: "trace", component: "test", transports: [mem] }), mem };
}

function queryItem(run: QueryItemDef["run"]): Item {
  return { def: { kind: "query", fn: "mood", run }, state: { dismissals: 0 } };
}

function excursionItem(run: ExcursionItemDef["run"]): Item {
  return { def: { kind: "excursion", fn: "notes", run }, state: { dismissals: 0 } };
}

async function flushMicrotasks(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await Promise.resolve();
  }
}

/** Start an invocation and expose its outcome once it settles */
function track(promise: Promise<ItemOutcome>): { outcome: () => ItemOutcome | undefined } {
  let outcome: ItemOutcome | undefined;
  promise.then(result => { outcome = result; }, () => { outcome = undefined; });
  return { outcome: () => outcome };
}

function run(item: Item, controller = new AbortController(), excursionTimeoutMs?: number): Promise<ItemOutcome> {
  return runItem(item, { runId: "run_test", signal: controller.signal, log: makeLog().log, excursionTimeoutMs });
}

afterEach(() => {
  vi.useRealTimers();
});

// ============================================
// QUERY
// ============================================

describe("query items", () => {
  it.each<[PromptResult, ItemOutcome["kind"]]>([
    [SUCCESS, "success"],
    [CANCELLED, "cancelled"],
    [SKIPPED, "skipped"],
  ])("maps %o to %s", async (result, kind) => {
    await expect(run(queryItem(async () => result))).resolves.toEqual({ kind });
  });

  it("reports a throwing body as failed", async () => {
    const error = new Error("prompt broke");

    await expect(run(queryItem(async () => { throw error; }))).resolves.toEqual({ kind: "failed", error });
  });

  it("passes the run id and a per-item logger to the body", async () => {
    const { log, mem } = makeLog();
    const item = queryItem(async ctx => {
      ctx.log.info(`asked in ${ctx.runId}`);
      return SUCCESS;
    });

    await runItem(item, { runId: "run_abc", signal: new AbortController().signal, log });

    expect(mem.entries.map(e => [e.component, e.message])).toEqual([["local-agent.item.mood", "asked in run_abc"]]);
  });

  it("resolves aborted when the run is abandoned mid-question", async () => {
    const controller = new AbortController();
    const pending = run(queryItem(() => new Promise<PromptResult>(() => undefined)), controller);

    controller.abort();

    await expect(pending).resolves.toEqual({ kind: "aborted" });
  });

  it("does not start the body once already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const body = vi.fn(async () => SUCCESS);

    await expect(run(queryItem(body), controller)).resolves.toEqual({ kind: "aborted" });
    expect(body).not.toHaveBeenCalled();
  });
});

// ============================================
// EXCURSION
// ============================================

describe("excursion items", () => {
  it("succeeds only after every opened resource is closed", async () => {
    const opened: AuxResource[] = [];
    const tracked = track(run(excursionItem(async ctx => {
      opened.push(ctx.open("editor"), ctx.open("viewer"));
    })));

    await flushMicrotasks();
    expect(opened.map(r => r.id)).toEqual([expect.stringMatching(/^aux_/), expect.stringMatching(/^aux_/)]);
    expect(tracked.outcome()).toBeUndefined();

    opened[0].close();
    await flushMicrotasks();
    expect(tracked.outcome()).toBeUndefined();

    opened[1].close();
    await flushMicrotasks();
    expect(tracked.outcome()).toEqual({ kind: "success" });
  });

  it("succeeds straight away when nothing was opened", async () => {
    await expect(run(excursionItem(async () => undefined))).resolves.toEqual({ kind: "success" });
  });

  it("succeeds when resources close before the body returns", async () => {
    await expect(run(excursionItem(async ctx => {
      ctx.open("quick").close();
    }))).resolves.toEqual({ kind: "success" });
  });

  it("takes a result returned by the body as final", async () => {
    await expect(run(excursionItem(async ctx => {
      ctx.open("never closed");
      return SKIPPED;
    }))).resolves.toEqual({ kind: "skipped" });
  });

  it("resolves cancelled when the user backs out", async () => {
    await expect(run(excursionItem(async ctx => {
      ctx.open("editor");
      ctx.cancel();
    }))).resolves.toEqual({ kind: "cancelled" });
  });

  it("reports a rejected body as failed", async () => {
    const error = new Error("could not open");

    await expect(run(excursionItem(async () => { throw error; }))).resolves.toEqual({ kind: "failed", error });
  });

  it("times out when a resource stays open", async () => {
    vi.useFakeTimers();
    const { log, mem } = makeLog();
    const tracked = track(runItem(
      excursionItem(async ctx => { ctx.open("editor"); }),
      { runId: "run_test", signal: new AbortController().signal, log, excursionTimeoutMs: 1_000 },
    ));

    await vi.advanceTimersByTimeAsync(999);
    expect(tracked.outcome()).toBeUndefined();

    await vi.advanceTimersByTimeAsync(1);
    expect(tracked.outcome()).toEqual({ kind: "timed-out" });
    expect(mem.messages("warn")).toEqual(['Excursion "notes" timed out']);
  });

  it("resolves aborted and ignores later closes", async () => {
    const controller = new AbortController();
    const opened: AuxResource[] = [];
    const tracked = track(run(excursionItem(async ctx => {
      opened.push(ctx.open("editor"));
    }), controller));
    await flushMicrotasks();

    controller.abort();
    await flushMicrotasks();
    opened[0].close();
    await flushMicrotasks();

    expect(tracked.outcome()).toEqual({ kind: "aborted" });
    expect(opened[0].closed).toBe(true);
  });
});

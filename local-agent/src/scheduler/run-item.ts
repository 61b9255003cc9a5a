/**
 * Item Invocation
 *
 * One entry point for both execution kinds:
 *
 * - query:     await the body, map its PromptResult to an outcome
 * - excursion: the body opens auxiliary resources and returns; the
 *              excursion succeeds once every resource it opened has been
 *              closed. A watchdog abandons it after excursionTimeoutMs.
 *
 * Either kind resolves "aborted" as soon as the run's AbortSignal fires.
 * Bookkeeping (dismissals, success logs) is the scheduler's job.
 */

import { nanoid } from "nanoid";
import type { ILogger } from "@idlewise/shared/logging";
import type {
  AuxResource,
  ExcursionContext,
  ExcursionItemDef,
  Item,
  PromptResult,
  QueryContext,
  QueryItemDef,
} from "../items/types.js";
import type { ItemOutcome } from "./types.js";

export const DEFAULT_EXCURSION_TIMEOUT_MS = 5 * 60 * 1000;

export interface RunItemOptions {
  runId: string;
  signal: AbortSignal;
  log: ILogger;
  excursionTimeoutMs?: number;
}

const ABORTED: ItemOutcome = { kind: "aborted" };

export function outcomeFromPrompt(result: PromptResult): ItemOutcome {
  switch (result.status) {
    case "success":
      return { kind: "success" };
    case "cancelled":
      return { kind: "cancelled" };
    case "skipped":
      return { kind: "skipped" };
  }
}

// ============================================
// DISPATCH
// ============================================

export function runItem(item: Item, options: RunItemOptions): Promise<ItemOutcome> {
  const def = item.def;
  const base: QueryContext = {
    fn: def.fn,
    runId: options.runId,
    signal: options.signal,
    log: options.log.child({ component: `local-agent.item.${def.fn}` }),
  };

  switch (def.kind) {
    case "query":
      return runQuery(def, base);
    case "excursion":
      return runExcursion(def, base, options.excursionTimeoutMs ?? DEFAULT_EXCURSION_TIMEOUT_MS);
  }
}

// ============================================
// QUERY
// ============================================

async function runQuery(def: QueryItemDef, ctx: QueryContext): Promise<ItemOutcome> {
  if (ctx.signal.aborted) return ABORTED;

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<ItemOutcome>(resolve => {
    onAbort = () => resolve(ABORTED);
    ctx.signal.addEventListener("abort", onAbort, { once: true });
  });

  try {
    return await Promise.race([def.run(ctx).then(outcomeFromPrompt), aborted]);
  } catch (error) {
    return { kind: "failed", error };
  } finally {
    if (onAbort) ctx.signal.removeEventListener("abort", onAbort);
  }
}

// ============================================
// EXCURSION
// ============================================

function runExcursion(def: ExcursionItemDef, base: QueryContext, timeoutMs: number): Promise<ItemOutcome> {
  return new Promise<ItemOutcome>(resolve => {
    const resources = new Map<string, AuxResource>();
    let watchdog: NodeJS.Timeout | undefined;
    let bodyReturned = false;
    let settled = false;

    const onAbort = (): void => settle(ABORTED);

    function settle(outcome: ItemOutcome): void {
      if (settled) return;
      settled = true;
      if (watchdog) clearTimeout(watchdog);
      base.signal.removeEventListener("abort", onAbort);
      resolve(outcome);
    }

    function checkComplete(): void {
      if (!bodyReturned) return;
      for (const resource of resources.values()) {
        if (!resource.closed) return;
      }
      settle({ kind: "success" });
    }

    const ctx: ExcursionContext = {
      ...base,
      open(label: string): AuxResource {
        const id = `aux_${nanoid(8)}`;
        let closed = false;
        const resource: AuxResource = {
          id,
          label,
          get closed() {
            return closed;
          },
          close() {
            if (closed) return;
            closed = true;
            base.log.debug(`Closed ${label}`, { id });
            checkComplete();
          },
        };
        resources.set(id, resource);
        return resource;
      },
      cancel() {
        settle({ kind: "cancelled" });
      },
    };

    if (base.signal.aborted) {
      settle(ABORTED);
      return;
    }
    base.signal.addEventListener("abort", onAbort, { once: true });

    watchdog = setTimeout(() => {
      const open = [...resources.values()].filter(r => !r.closed).map(r => r.label);
      base.log.warn(`Excursion "${def.fn}" timed out`, { timeoutMs, open });
      settle({ kind: "timed-out" });
    }, timeoutMs);

    def.run(ctx).then(
      result => {
        if (result) {
          settle(outcomeFromPrompt(result));
          return;
        }
        bodyReturned = true;
        checkComplete();
      },
      error => settle({ kind: "failed", error }),
    );
  });
}

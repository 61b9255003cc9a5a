/**
 * Scheduler
 *
 * Builds a queue of pending items and runs it head first, one item at a
 * time. The queue, current item and running flag live in a single
 * SchedulerState owned by this class; nothing else mutates them.
 *
 * Outcome handling:
 *   success    dequeue, reset dismissals, record the success
 *   cancelled  count a dismissal, keep the item at the front, stop the run
 *   skipped    dequeue and carry on; as the only item it is a cancel
 *   timed-out  dequeue, no bookkeeping
 *   failed     dequeue, no bookkeeping
 *   aborted    stop the run, item stays queued, no dismissal
 *   disabled   dequeue (user agreed to disable it at the prompt)
 */

import { nanoid } from "nanoid";
import type { ILogger } from "@idlewise/shared/logging";
import { HookList } from "../core/hooks.js";
import { SchedulerBusyError, UnregisteredItemError } from "../errors.js";
import { createComponentLogger } from "../logging.js";
import { DISMISSALS_BEFORE_DISABLE_PROMPT } from "../items/types.js";
import type { ItemRegistry } from "../items/registry.js";
import { evaluatePending } from "../pending/policy.js";
import type { PendingVerdict } from "../pending/policy.js";
import { runItem, DEFAULT_EXCURSION_TIMEOUT_MS } from "./run-item.js";
import type {
  Confirm,
  ItemOutcome,
  RunStatus,
  RunSummary,
  SchedulerState,
} from "./types.js";

// ============================================
// TYPES
// ============================================

export interface SchedulerOptions {
  registry: ItemRegistry;
  /** Yes/no prompt used before disabling a repeatedly dismissed item */
  confirm: Confirm;
  excursionTimeoutMs?: number;
  log?: ILogger;
}

export interface ItemStatus {
  fn: string;
  kind: "query" | "excursion";
  enabled: boolean;
  dismissals: number;
  lastCalled: number | null;
  /** null until the registry has been recovered */
  verdict: PendingVerdict | null;
}

export interface SchedulerStatus {
  running: boolean;
  runId: string | null;
  current: string | null;
  queue: string[];
  asOf: number | null;
  items: ItemStatus[];
}

// ============================================
// SCHEDULER
// ============================================

export class Scheduler {
  /** Runs once after every run, whatever its status */
  readonly afterRun: HookList<RunSummary>;

  private registry: ItemRegistry;
  private confirm: Confirm;
  private excursionTimeoutMs: number;
  private log: ILogger;
  private controller: AbortController | null = null;

  private state: SchedulerState = {
    queue: [],
    current: null,
    running: false,
    runId: null,
    asOf: null,
  };

  constructor(options: SchedulerOptions) {
    this.registry = options.registry;
    this.confirm = options.confirm;
    this.excursionTimeoutMs = options.excursionTimeoutMs ?? DEFAULT_EXCURSION_TIMEOUT_MS;
    this.log = options.log ?? createComponentLogger("scheduler");
    this.afterRun = new HookList("after-run", this.log);
  }

  // ----------------------------------------
  // Queue
  // ----------------------------------------

  /**
   * Replace the queue with the enabled items that are pending now, or with
   * every enabled item when forceAll is set. Items whose pending check
   * throws are logged and left out.
   */
  buildQueue(forceAll = false, nowMs: number = Date.now()): string[] {
    if (this.state.running) {
      throw new SchedulerBusyError(this.state.runId ?? "unknown");
    }
    this.registry.assertRecovered();

    const queue: string[] = [];
    for (const fn of this.registry.enabledIds()) {
      if (forceAll) {
        queue.push(fn);
        continue;
      }
      try {
        const verdict = evaluatePending(this.registry.require(fn), this.registry, nowMs);
        if (verdict.pending) {
          queue.push(fn);
        } else {
          this.log.debug(`"${fn}" not pending`, { reason: verdict.reason });
        }
      } catch (err) {
        this.log.error(`Pending check for "${fn}" failed, leaving it out`, err);
      }
    }

    this.state.queue = queue;
    this.state.asOf = nowMs;
    this.log.info(`Queue built with ${queue.length} item(s)`, { forceAll, queue });
    return [...queue];
  }

  getQueue(): string[] {
    return [...this.state.queue];
  }

  getState(): Readonly<SchedulerState> {
    return { ...this.state, queue: [...this.state.queue] };
  }

  isRunning(): boolean {
    return this.state.running;
  }

  // ----------------------------------------
  // Running
  // ----------------------------------------

  /**
   * Run the queue until it drains or abort() is called. A cancelled item
   * goes back to the front and is asked again straight away; skipping the
   * only queued item ends the run as cancelled.
   */
  async runQueue(): Promise<RunSummary> {
    if (this.state.running) {
      throw new SchedulerBusyError(this.state.runId ?? "unknown");
    }

    const runId = `run_${nanoid(8)}`;
    const controller = new AbortController();
    const log = this.log.child({ runId });

    this.controller = controller;
    this.state.running = true;
    this.state.runId = runId;

    const summary: RunSummary = {
      runId,
      status: this.state.queue.length === 0 ? "empty" : "completed",
      succeeded: [],
      dismissed: [],
      skipped: [],
      timedOut: [],
      failed: [],
      disabled: [],
      remaining: [],
    };

    log.info(`Run started with ${this.state.queue.length} item(s)`);

    try {
      while (this.state.queue.length > 0) {
        if (controller.signal.aborted) {
          summary.status = "aborted";
          break;
        }
        const fn = this.state.queue[0];
        this.state.current = fn;

        let outcome: ItemOutcome;
        try {
          outcome = await this.callWithDismissalCheck(fn, runId, controller.signal, log);
        } catch (err) {
          if (err instanceof UnregisteredItemError) this.dequeue(fn);
          throw err;
        }

        const stop = this.applyOutcome(fn, outcome, summary, log);
        if (stop) {
          summary.status = stop;
          break;
        }
      }
    } finally {
      this.state.current = null;
      this.state.running = false;
      this.controller = null;
      summary.remaining = [...this.state.queue];
    }

    log.info(`Run ${summary.status}`, {
      succeeded: summary.succeeded.length,
      remaining: summary.remaining.length,
    });
    await this.afterRun.run(summary);
    return summary;
  }

  /** Continue with whatever a cancelled or aborted run left queued */
  resume(): Promise<RunSummary> {
    this.log.info(`Resuming with ${this.state.queue.length} queued item(s)`);
    return this.runQueue();
  }

  /** Abandon the current run. Returns false when nothing is running. */
  abort(): boolean {
    if (!this.state.running || !this.controller) return false;
    this.log.info("Aborting run", { runId: this.state.runId, current: this.state.current });
    this.controller.abort();
    return true;
  }

  /**
   * Invoke one item. After DISMISSALS_BEFORE_DISABLE_PROMPT consecutive
   * dismissals the user is asked whether to disable it first: yes disables
   * and skips the call, no resets the count and calls it anyway.
   */
  async callWithDismissalCheck(
    fn: string,
    runId: string,
    signal: AbortSignal,
    log: ILogger = this.log,
  ): Promise<ItemOutcome> {
    const item = this.registry.require(fn);

    if (item.state.dismissals >= DISMISSALS_BEFORE_DISABLE_PROMPT) {
      const disable = await this.confirm(
        `"${fn}" was dismissed ${item.state.dismissals} times in a row. Disable it?`,
      );
      // An abort typed at the question reads as "no"; leave the item untouched.
      if (signal.aborted) return { kind: "aborted" };
      if (disable) {
        this.registry.disable(fn);
        return { kind: "disabled" };
      }
      this.registry.resetDismissals(fn);
    }

    this.registry.markCalled(fn, Date.now());
    log.debug(`Calling "${fn}"`, { kind: item.def.kind });

    return runItem(item, {
      runId,
      signal,
      log,
      excursionTimeoutMs: this.excursionTimeoutMs,
    });
  }

  // ----------------------------------------
  // Outcomes
  // ----------------------------------------

  /** Apply bookkeeping for one outcome; returns a status when the run must stop */
  private applyOutcome(
    fn: string,
    outcome: ItemOutcome,
    summary: RunSummary,
    log: ILogger,
  ): RunStatus | undefined {
    switch (outcome.kind) {
      case "success":
        this.dequeue(fn);
        this.registry.markSucceeded(fn, Date.now());
        summary.succeeded.push(fn);
        return undefined;

      case "skipped":
        if (this.state.queue.length > 1) {
          this.dequeue(fn);
          summary.skipped.push(fn);
          log.debug(`Skipped "${fn}"`);
          return undefined;
        }
        log.debug(`Skip of the last item "${fn}" cancels the run`);
        this.dismiss(fn, summary, log);
        return "cancelled";

      case "cancelled":
        this.dismiss(fn, summary, log);
        return undefined;

      case "timed-out":
        this.dequeue(fn);
        summary.timedOut.push(fn);
        return undefined;

      case "failed":
        this.dequeue(fn);
        summary.failed.push(fn);
        log.error(`Item "${fn}" failed`, outcome.error);
        return undefined;

      case "aborted":
        return "aborted";

      case "disabled":
        this.dequeue(fn);
        summary.disabled.push(fn);
        return undefined;
    }
  }

  private dismiss(fn: string, summary: RunSummary, log: ILogger): void {
    const dismissals = this.registry.markDismissed(fn);
    if (!summary.dismissed.includes(fn)) summary.dismissed.push(fn);
    this.moveToFront(fn);
    log.info(`"${fn}" cancelled`, { dismissals });
  }

  private dequeue(fn: string): void {
    const index = this.state.queue.indexOf(fn);
    if (index !== -1) this.state.queue.splice(index, 1);
  }

  private moveToFront(fn: string): void {
    this.dequeue(fn);
    this.state.queue.unshift(fn);
  }

  // ----------------------------------------
  // Status
  // ----------------------------------------

  status(nowMs: number = Date.now()): SchedulerStatus {
    const recovered = this.registry.isRecovered();
    const items = this.registry.allIds().map((fn): ItemStatus => {
      const item = this.registry.require(fn);
      let verdict: PendingVerdict | null = null;
      if (recovered) {
        try {
          verdict = evaluatePending(item, this.registry, nowMs);
        } catch (err) {
          this.log.warn(`Pending check for "${fn}" failed`, {
            error: err instanceof Error ? err.message : String(err),
          });
        }
      }
      return {
        fn,
        kind: item.def.kind,
        enabled: !this.registry.isDisabled(fn),
        dismissals: item.state.dismissals,
        lastCalled: item.state.lastCalled ?? null,
        verdict,
      };
    });

    return {
      running: this.state.running,
      runId: this.state.runId,
      current: this.state.current,
      queue: [...this.state.queue],
      asOf: this.state.asOf,
      items,
    };
  }
}

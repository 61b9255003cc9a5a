/**
 * Engine
 *
 * Wires the pieces together for one cache directory:
 *
 *   PID marker → MemoryStore.recover → registry recovered
 *   → IdleMonitor (if a probe is available) → Scheduler
 *
 * Triggers:
 * - startSession():  queue the pending items and run them
 * - forceSession():  queue every enabled item and run them
 * - resume():        continue a cancelled or aborted run
 * - a long return from idle starts a session when none is running
 *
 * State is snapshotted on every present tick and after every run.
 */

import * as path from "path";
import type { ILogger, LogEntry } from "@idlewise/shared/logging";
import type { AgentConfig } from "./core/config.js";
import { PID_FILENAME } from "./core/config.js";
import { acquirePidMarker, releasePidMarker } from "./core/pid.js";
import type { PidRecord } from "./core/pid.js";
import { IdleMonitor } from "./idle/monitor.js";
import type { IdleMonitorStatus } from "./idle/monitor.js";
import { selectIdleProbe } from "./idle/probes.js";
import type { IdleProbe } from "./idle/probes.js";
import { ItemRegistry } from "./items/registry.js";
import type { ItemDef } from "./items/types.js";
import { createComponentLogger } from "./logging.js";
import { Scheduler } from "./scheduler/index.js";
import type { Confirm, RunSummary, SchedulerStatus } from "./scheduler/index.js";
import { MemoryStore } from "./state/memory-store.js";

export const LAST_ONLINE_VAR = "last-online";

// ============================================
// TYPES
// ============================================

export interface EngineOptions {
  config: AgentConfig;
  items: ItemDef[];
  confirm: Confirm;
  /**
   * Idle probe override. Undefined selects one from config.idleProbe;
   * null runs without idle tracking.
   */
  probe?: IdleProbe | null;
  log?: ILogger;
}

export type StartResult =
  | { started: true; recovered: string[] }
  | { started: false; reason: "already-running"; holder: PidRecord };

export interface EngineStatus {
  scheduler: SchedulerStatus;
  idle: IdleMonitorStatus | null;
}

// ============================================
// ENGINE
// ============================================

export class Engine {
  readonly registry: ItemRegistry;
  readonly store: MemoryStore;
  readonly scheduler: Scheduler;
  readonly monitor: IdleMonitor | null;
  readonly pidPath: string;

  private log: ILogger;
  private started = false;
  private activeRun: Promise<RunSummary | null> | null = null;
  private activityNotifier: (() => void) | null = null;

  constructor(options: EngineOptions) {
    const { config } = options;
    this.log = options.log ?? createComponentLogger("engine");
    this.pidPath = path.join(config.cacheDir, PID_FILENAME);

    this.registry = new ItemRegistry(options.items, config.cacheDir);
    this.store = new MemoryStore({ cacheDir: config.cacheDir, highPrecision: config.highPrecision });
    this.store.registerAll(this.registry.stateVariables());

    this.scheduler = new Scheduler({
      registry: this.registry,
      confirm: options.confirm,
      excursionTimeoutMs: config.excursionTimeoutMs,
    });
    this.scheduler.afterRun.add("snapshot", () => {
      this.snapshot();
    });

    let probe: IdleProbe | null;
    if (options.probe !== undefined) {
      probe = options.probe;
    } else {
      const selected = config.idleProbe === "off" ? null : selectIdleProbe(config.idleProbe);
      probe = selected && selected.kind !== "none" ? selected.probe : null;
      if (selected?.kind === "activity") this.activityNotifier = selected.notifyActivity;
    }
    this.monitor = probe
      ? new IdleMonitor({
          probe,
          shortIdleSec: config.shortIdleSec,
          longIdleSec: config.longIdleSec,
          presentIntervalMs: config.presentIntervalMs,
          idleIntervalMs: config.idleIntervalMs,
          subtractThreshold: config.subtractThreshold,
        })
      : null;

    if (this.monitor) {
      this.wireMonitor(this.monitor);
    } else {
      this.log.info("No idle probe available, sessions start only on request");
    }
  }

  private wireMonitor(monitor: IdleMonitor): void {
    this.store.register(LAST_ONLINE_VAR, {
      get: () => new Date(monitor.getLastOnline()),
      set: value => {
        if (value instanceof Date) monitor.restoreLastOnline(value.getTime());
      },
      timestamp: true,
    });

    monitor.onPresent.add("snapshot", () => {
      this.snapshot();
    });
    monitor.onReturn.add("session-after-long-idle", event => {
      if (!event.long) return;
      if (this.scheduler.isRunning()) {
        this.log.debug("Long return while a run is active, not starting another");
        return;
      }
      this.log.info(`Starting session after ${Math.round(event.lengthSec / 60)} min away`);
      this.launch(false);
    });
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  /**
   * Claim the cache directory, restore persisted state and start idle
   * tracking. Refuses (and logs) when another live agent holds the marker.
   */
  start(): StartResult {
    if (this.started) return { started: true, recovered: [] };

    const claim = acquirePidMarker(this.pidPath);
    if (!claim.acquired) {
      this.log.warn("Another agent is already running on this cache directory", {
        pid: claim.holder.pid,
        since: new Date(claim.holder.startedAt).toISOString(),
      });
      return { started: false, reason: "already-running", holder: claim.holder };
    }
    if (claim.replacedStale) {
      this.log.info("Replaced stale PID marker");
    }

    const recovered = this.store.recover();
    this.registry.markRecovered();
    this.monitor?.start();
    this.started = true;

    this.log.info("Engine started", {
      items: this.registry.allIds().length,
      disabled: this.registry.disabledIds().length,
      idleTracking: this.monitor !== null,
    });
    return { started: true, recovered };
  }

  /** Abort any run, persist state, stop timers and release the marker */
  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;

    this.scheduler.abort();
    if (this.activeRun) {
      await this.activeRun;
    }
    this.monitor?.stop();

    try {
      this.snapshot();
    } finally {
      releasePidMarker(this.pidPath);
      this.log.info("Engine stopped");
    }
  }

  isStarted(): boolean {
    return this.started;
  }

  // ----------------------------------------
  // Triggers
  // ----------------------------------------

  async startSession(): Promise<RunSummary> {
    this.scheduler.buildQueue(false);
    return this.track(this.scheduler.runQueue());
  }

  async forceSession(): Promise<RunSummary> {
    this.scheduler.buildQueue(true);
    return this.track(this.scheduler.runQueue());
  }

  async resume(): Promise<RunSummary> {
    return this.track(this.scheduler.resume());
  }

  abort(): boolean {
    return this.scheduler.abort();
  }

  /** Feed operator input to the activity probe, when that probe is in use */
  notifyActivity(): void {
    this.activityNotifier?.();
  }

  /** Wait for a session started in the background (long return) */
  async settled(): Promise<RunSummary | null> {
    return this.activeRun ? this.activeRun : null;
  }

  private launch(forceAll: boolean): void {
    try {
      this.scheduler.buildQueue(forceAll);
    } catch (err) {
      this.log.error("Could not build queue", err);
      return;
    }
    this.track(this.scheduler.runQueue()).catch(err => {
      this.log.error("Background session failed", err);
    });
  }

  private track(run: Promise<RunSummary>): Promise<RunSummary> {
    const release = (): void => {
      if (this.activeRun === tracked) this.activeRun = null;
    };
    const tracked: Promise<RunSummary | null> = run.then(
      summary => {
        release();
        return summary;
      },
      () => {
        release();
        return null;
      },
    );
    this.activeRun = tracked;
    return run;
  }

  // ----------------------------------------
  // Administration
  // ----------------------------------------

  disable(fn: string): void {
    this.registry.disable(fn);
    this.snapshot();
  }

  enable(fn: string): void {
    this.registry.enable(fn);
    this.snapshot();
  }

  forget(name: string): number {
    return this.store.forget(name);
  }

  snapshot(): string[] {
    return this.store.snapshot();
  }

  /** Latest entries kept in the logger's ring buffer, oldest first */
  recentLogs(count: number): LogEntry[] {
    return this.log.getRecentLogs(count);
  }

  status(): EngineStatus {
    return {
      scheduler: this.scheduler.status(),
      idle: this.monitor ? this.monitor.status() : null,
    };
  }
}

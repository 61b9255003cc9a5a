/**
 * Idle Monitor
 *
 * Two-state machine (present / idle) driven by a chain of setTimeout
 * ticks and an injected probe reporting how many seconds the user has
 * been idle.
 *
 * present: slow poll. A wall-clock gap larger than the short threshold
 *          between two ticks means the process itself was suspended
 *          (machine slept), which counts as idle straight away.
 * idle:    fast poll. The first sample below the threshold ends the
 *          episode and fires onReturn exactly once.
 *
 * The monitor only observes; what a return from idle triggers is up to
 * the hooks registered on it.
 */

import type { ILogger } from "@idlewise/shared/logging";
import { HookList } from "../core/hooks.js";
import { createComponentLogger } from "../logging.js";
import type { IdleProbe } from "./probes.js";

// ============================================
// TYPES
// ============================================

export type IdleState = "present" | "idle";

export interface IdleEntered {
  /** Epoch ms the user was last seen present */
  since: number;
  reason: "probe" | "suspend";
}

export interface ReturnFromIdle {
  /** Length of the idle episode in seconds */
  lengthSec: number;
  /** lengthSec reached the long threshold */
  long: boolean;
  idleBeganAt: number;
  returnedAt: number;
}

export interface IdleMonitorOptions {
  probe: IdleProbe;
  /** Idle seconds after which the user counts as away (default 600) */
  shortIdleSec?: number;
  /** Idle episodes at least this long are "long" (default 5400) */
  longIdleSec?: number;
  /** Poll interval while present (default 111s) */
  presentIntervalMs?: number;
  /** Poll interval while idle (default 2s) */
  idleIntervalMs?: number;
  /** Subtract the short threshold from episode lengths, floored at 0 */
  subtractThreshold?: boolean;
  log?: ILogger;
}

export interface IdleMonitorStatus {
  running: boolean;
  state: IdleState;
  lastOnline: number;
  idleBeginning: number;
  lengthOfLastIdle: number | null;
}

// ============================================
// CONSTANTS
// ============================================

export const DEFAULT_SHORT_IDLE_SEC = 600;
export const DEFAULT_LONG_IDLE_SEC = 90 * 60;
export const DEFAULT_PRESENT_INTERVAL_MS = 111_000;
export const DEFAULT_IDLE_INTERVAL_MS = 2_000;

// ============================================
// MONITOR
// ============================================

export class IdleMonitor {
  readonly onPresent: HookList<void>;
  readonly onIdle: HookList<IdleEntered>;
  readonly onReturn: HookList<ReturnFromIdle>;

  private probe: IdleProbe;
  private shortIdleSec: number;
  private longIdleSec: number;
  private presentIntervalMs: number;
  private idleIntervalMs: number;
  private subtractThreshold: boolean;
  private log: ILogger;

  private state: IdleState = "present";
  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private lastPollAt = Date.now();
  private lastOnline = Date.now();
  private idleBeginning = Date.now();
  private lengthOfLastIdle: number | null = null;
  private restoredLastOnline: number | null = null;

  constructor(options: IdleMonitorOptions) {
    this.probe = options.probe;
    this.shortIdleSec = options.shortIdleSec ?? DEFAULT_SHORT_IDLE_SEC;
    this.longIdleSec = options.longIdleSec ?? DEFAULT_LONG_IDLE_SEC;
    this.presentIntervalMs = options.presentIntervalMs ?? DEFAULT_PRESENT_INTERVAL_MS;
    this.idleIntervalMs = options.idleIntervalMs ?? DEFAULT_IDLE_INTERVAL_MS;
    this.subtractThreshold = options.subtractThreshold ?? false;
    this.log = options.log ?? createComponentLogger("idle");

    this.onPresent = new HookList("present", this.log);
    this.onIdle = new HookList("idle", this.log);
    this.onReturn = new HookList("return-from-idle", this.log);
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  /**
   * Start polling. If a last-online time recovered from a previous process
   * is older than the short threshold, the downtime is treated as an idle
   * episode that ends at the first present sample.
   */
  start(): void {
    if (this.running) return;
    this.running = true;

    const now = Date.now();
    this.lastPollAt = now;
    this.lengthOfLastIdle = null;

    const restored = this.restoredLastOnline;
    if (restored !== null && now - restored > this.shortIdleSec * 1000) {
      this.lastOnline = restored;
      this.idleBeginning = restored;
      this.state = "idle";
      this.log.info("Resuming after downtime, starting idle", { since: new Date(restored).toISOString() });
      this.schedule(this.idleIntervalMs);
      return;
    }

    this.lastOnline = now;
    this.idleBeginning = now;
    this.state = "present";
    this.schedule(this.presentIntervalMs);
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /** Seed the last-online time recovered from the variable log (before start) */
  restoreLastOnline(ms: number): void {
    this.restoredLastOnline = ms;
  }

  // ----------------------------------------
  // Status
  // ----------------------------------------

  getState(): IdleState {
    return this.state;
  }

  getLastOnline(): number {
    return this.lastOnline;
  }

  getLengthOfLastIdle(): number | null {
    return this.lengthOfLastIdle;
  }

  isRunning(): boolean {
    return this.running;
  }

  status(): IdleMonitorStatus {
    return {
      running: this.running,
      state: this.state,
      lastOnline: this.lastOnline,
      idleBeginning: this.idleBeginning,
      lengthOfLastIdle: this.lengthOfLastIdle,
    };
  }

  // ----------------------------------------
  // Ticks
  // ----------------------------------------

  private schedule(delayMs: number): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick().catch(err => {
        this.log.error("Idle tick failed", err);
        this.schedule(this.state === "idle" ? this.idleIntervalMs : this.presentIntervalMs);
      });
    }, delayMs);
  }

  private async tick(): Promise<void> {
    if (!this.running) return;
    if (this.state === "present") {
      await this.presentTick();
    } else {
      await this.idleTick();
    }
  }

  private async presentTick(): Promise<void> {
    const now = Date.now();
    const gapMs = now - this.lastPollAt;
    this.lastPollAt = now;

    if (gapMs > this.shortIdleSec * 1000) {
      await this.enterIdle("suspend");
      return;
    }

    const idleSec = await this.sample();
    if (!this.running) return;

    if (idleSec > this.shortIdleSec) {
      await this.enterIdle("probe");
      return;
    }

    this.lastOnline = now;
    this.idleBeginning = now;
    await this.onPresent.run();
    this.schedule(this.presentIntervalMs);
  }

  private async idleTick(): Promise<void> {
    const now = Date.now();
    this.lastPollAt = now;

    const idleSec = await this.sample();
    if (!this.running) return;

    if (idleSec >= this.shortIdleSec) {
      this.schedule(this.idleIntervalMs);
      return;
    }

    let lengthSec = (now - this.idleBeginning) / 1000;
    if (this.subtractThreshold) {
      lengthSec = Math.max(0, lengthSec - this.shortIdleSec);
    }

    const event: ReturnFromIdle = {
      lengthSec,
      long: lengthSec >= this.longIdleSec,
      idleBeganAt: this.idleBeginning,
      returnedAt: now,
    };

    // Flip state before hooks run so a slow hook cannot see a second return
    this.state = "present";
    this.lengthOfLastIdle = lengthSec;
    this.idleBeginning = now;
    this.lastOnline = now;

    this.log.info(`Back from idle after ${Math.round(lengthSec)}s`, { long: event.long });
    await this.onReturn.run(event);
    this.schedule(this.presentIntervalMs);
  }

  private async enterIdle(reason: IdleEntered["reason"]): Promise<void> {
    this.state = "idle";
    this.log.debug("User idle", { reason, since: new Date(this.idleBeginning).toISOString() });
    await this.onIdle.run({ since: this.idleBeginning, reason });
    this.schedule(this.idleIntervalMs);
  }

  /** Probe failures count as "present" for that tick */
  private async sample(): Promise<number> {
    try {
      const seconds = await this.probe();
      if (!Number.isFinite(seconds) || seconds < 0) {
        this.log.warn("Idle probe returned an invalid value", { seconds });
        return 0;
      }
      return seconds;
    } catch (err) {
      this.log.warn("Idle probe failed", { error: err instanceof Error ? err.message : String(err) });
      return 0;
    }
  }
}

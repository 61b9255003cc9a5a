/**
 * Item Registry
 *
 * Static table of item definitions plus their mutable runtime state
 * (last call, dismissals, disabled membership). Items are registered once
 * at startup and never removed.
 *
 * Internal logs kept per item under the cache directory:
 *   successes-<fn>  one row per successful run of a dataset-less item
 *   calls-<fn>      one row per invocation (for maxCallsPerDay)
 */

import * as path from "path";
import {
  appendRecord,
  readRows,
  rowsMatchingDate,
  logExists,
  parsePosted,
  logicalDate,
  isSameLogicalDay,
} from "../eventlog/index.js";
import {
  DuplicateItemError,
  StateNotRecoveredError,
  UnregisteredItemError,
} from "../errors.js";
import { createComponentLogger } from "../logging.js";
import type { ILogger } from "@idlewise/shared/logging";
import type { VariableBinding } from "../state/types.js";
import type { Item, ItemDef, ItemState } from "./types.js";

export const DISMISSALS_VAR = "item-dismissals";
export const LAST_CALLED_VAR = "item-last-called";
export const DISABLED_VAR = "disabled-items";

/** Relative dataset paths live under the cache directory */
export function resolveDatasetPath(cacheDir: string, dataset: string): string {
  return path.isAbsolute(dataset) ? dataset : path.join(cacheDir, dataset);
}

export class ItemRegistry {
  private items = new Map<string, Item>();
  private disabled = new Set<string>();
  private recovered = false;
  private log: ILogger;

  constructor(defs: ItemDef[], private cacheDir: string) {
    this.log = createComponentLogger("registry");
    for (const def of defs) {
      if (this.items.has(def.fn)) {
        throw new DuplicateItemError(def.fn);
      }
      this.items.set(def.fn, { def, state: { dismissals: 0 } });
    }
  }

  // ----------------------------------------
  // Lookup
  // ----------------------------------------

  byId(fn: string): Item | undefined {
    return this.items.get(fn);
  }

  require(fn: string): Item {
    const item = this.items.get(fn);
    if (!item) throw new UnregisteredItemError(fn);
    return item;
  }

  allIds(): string[] {
    return [...this.items.keys()];
  }

  /** Registered ids minus the disabled set, in registration order */
  enabledIds(): string[] {
    return this.allIds().filter(fn => !this.disabled.has(fn));
  }

  // ----------------------------------------
  // Disabled set
  // ----------------------------------------

  isDisabled(fn: string): boolean {
    return this.disabled.has(fn);
  }

  disable(fn: string): void {
    this.require(fn);
    this.disabled.add(fn);
    this.log.info(`Disabled item "${fn}"`);
  }

  enable(fn: string): void {
    const item = this.require(fn);
    this.disabled.delete(fn);
    item.state.dismissals = 0;
    this.log.info(`Enabled item "${fn}"`);
  }

  disabledIds(): string[] {
    return [...this.disabled];
  }

  // ----------------------------------------
  // Runtime state
  // ----------------------------------------

  markCalled(fn: string, nowMs: number = Date.now()): void {
    const item = this.require(fn);
    item.state.lastCalled = Math.floor(nowMs / 1000);
    appendRecord(this.callLogPath(fn), [logicalDate(nowMs)]);
  }

  /** Success bookkeeping: reset dismissals, log dataset-less successes */
  markSucceeded(fn: string, nowMs: number = Date.now()): void {
    const item = this.require(fn);
    item.state.dismissals = 0;
    if (!item.def.dataset) {
      appendRecord(this.successLogPath(fn), [logicalDate(nowMs)]);
    }
  }

  markDismissed(fn: string): number {
    const item = this.require(fn);
    item.state.dismissals += 1;
    return item.state.dismissals;
  }

  resetDismissals(fn: string): void {
    this.require(fn).state.dismissals = 0;
  }

  // ----------------------------------------
  // Paths
  // ----------------------------------------

  successLogPath(fn: string): string {
    return path.join(this.cacheDir, `successes-${fn}`);
  }

  callLogPath(fn: string): string {
    return path.join(this.cacheDir, `calls-${fn}`);
  }

  datasetPath(item: Item): string | undefined {
    const dataset = item.def.dataset;
    if (!dataset) return undefined;
    return resolveDatasetPath(this.cacheDir, dataset);
  }

  /** Where the item's outcomes are recorded: its dataset, else its success log */
  itemLogPath(item: Item): string {
    return this.datasetPath(item) ?? this.successLogPath(item.def.fn);
  }

  // ----------------------------------------
  // Counting
  // ----------------------------------------

  /**
   * Successes in today's logical day. Dataset items count dataset rows
   * carrying today's datestamp; dataset-less items count success-log rows
   * by their posted time, which also covers rows written without a
   * datestamp field.
   */
  countSuccessesToday(fn: string, nowMs: number = Date.now()): number {
    const item = this.require(fn);
    const dataset = this.datasetPath(item);
    if (dataset) {
      if (!logExists(dataset)) return 0;
      return rowsMatchingDate(dataset, logicalDate(nowMs)).length;
    }
    return this.countPostedToday(this.successLogPath(fn), nowMs);
  }

  countCallsToday(fn: string, nowMs: number = Date.now()): number {
    this.require(fn);
    return this.countPostedToday(this.callLogPath(fn), nowMs);
  }

  private countPostedToday(filePath: string, nowMs: number): number {
    if (!logExists(filePath)) return 0;
    return readRows(filePath).filter(row => {
      const posted = parsePosted(row);
      return posted !== undefined && isSameLogicalDay(posted * 1000, nowMs);
    }).length;
  }

  // ----------------------------------------
  // Recovery guard
  // ----------------------------------------

  markRecovered(): void {
    this.recovered = true;
  }

  isRecovered(): boolean {
    return this.recovered;
  }

  assertRecovered(): void {
    if (!this.recovered) throw new StateNotRecoveredError();
  }

  // ----------------------------------------
  // Persistence bindings
  // ----------------------------------------

  /** Variables the MemoryStore snapshots and restores for this registry */
  stateVariables(): Record<string, VariableBinding> {
    return {
      [DISMISSALS_VAR]: {
        get: () => this.collect(state => state.dismissals > 0 ? state.dismissals : undefined),
        set: value => this.restoreNumbers(DISMISSALS_VAR, value, (state, n) => {
          state.dismissals = Math.max(0, Math.floor(n));
        }),
      },
      [LAST_CALLED_VAR]: {
        get: () => this.collect(state => state.lastCalled),
        set: value => this.restoreNumbers(LAST_CALLED_VAR, value, (state, n) => {
          state.lastCalled = n;
        }),
      },
      [DISABLED_VAR]: {
        get: () => [...this.disabled].sort(),
        set: value => this.restoreDisabled(value),
      },
    };
  }

  private collect(pick: (state: ItemState) => number | undefined): Record<string, number> {
    const out: Record<string, number> = {};
    for (const fn of [...this.items.keys()].sort()) {
      const item = this.items.get(fn);
      const value = item ? pick(item.state) : undefined;
      if (value !== undefined) out[fn] = value;
    }
    return out;
  }

  private restoreNumbers(
    name: string,
    value: unknown,
    apply: (state: ItemState, n: number) => void,
  ): void {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
      this.log.warn(`Ignoring recovered ${name}: not an object`);
      return;
    }
    for (const [fn, n] of Object.entries(value)) {
      const item = this.items.get(fn);
      if (!item) {
        this.log.debug(`Recovered ${name} for unregistered item "${fn}"`);
        continue;
      }
      if (typeof n !== "number" || !Number.isFinite(n)) {
        this.log.warn(`Ignoring recovered ${name} for "${fn}": not a number`);
        continue;
      }
      apply(item.state, n);
    }
  }

  private restoreDisabled(value: unknown): void {
    if (!Array.isArray(value)) {
      this.log.warn(`Ignoring recovered ${DISABLED_VAR}: not an array`);
      return;
    }
    this.disabled.clear();
    for (const fn of value) {
      if (typeof fn === "string" && this.items.has(fn)) {
        this.disabled.add(fn);
      }
    }
  }
}

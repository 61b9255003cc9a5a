/**
 * Pending Policy
 *
 * Decides whether an item is due in the current scheduling pass. Every
 * check must pass; missing files count as "nothing logged yet" so an item
 * can never be blocked forever by absent data.
 */

import {
  lastRow,
  logExists,
  parsePosted,
  parseDatestamp,
  rowsMatchingDate,
  logicalDate,
  isSameLogicalDay,
} from "../eventlog/index.js";
import { DEFAULT_MIN_HOURS_WAIT } from "../items/types.js";
import type { Item } from "../items/types.js";
import type { ItemRegistry } from "../items/registry.js";

// ============================================
// TYPES
// ============================================

export type NotPendingReason =
  | "recently-logged"
  | "satisfied-today"
  | "dismissal-backoff"
  | "success-cap"
  | "call-cap";

export type PendingVerdict =
  | { pending: true }
  | { pending: false; reason: NotPendingReason };

const PENDING: PendingVerdict = { pending: true };

function notPending(reason: NotPendingReason): PendingVerdict {
  return { pending: false, reason };
}

// ============================================
// HELPERS
// ============================================

/** maxEntriesPerDay and maxSuccessesPerDay are one cap; entries wins */
export function effectiveDailyCap(item: Item): number | undefined {
  return item.def.maxEntriesPerDay ?? item.def.maxSuccessesPerDay;
}

/**
 * Unix seconds of the item's last logged outcome, or undefined when there
 * is nothing usable. The internal success log only has meaningful posted
 * times, so it is always read by field 0.
 */
export function lastLoggedAt(item: Item, registry: ItemRegistry): number | undefined {
  const logPath = registry.itemLogPath(item);
  if (!logExists(logPath)) return undefined;

  const row = lastRow(logPath);
  if (row.length === 0) return undefined;

  const usePosted = item.def.lookupPostedTime || !registry.datasetPath(item);
  if (usePosted) {
    return parsePosted(row);
  }

  for (const field of row.slice(1)) {
    const ms = parseDatestamp(field);
    if (ms !== undefined) return ms / 1000;
  }
  return undefined;
}

// ============================================
// CHECKS
// ============================================

function recentlyLogged(item: Item, registry: ItemRegistry, nowMs: number): boolean {
  const loggedAt = lastLoggedAt(item, registry);
  if (loggedAt === undefined) return false;
  const minHours = item.def.minHoursWait ?? DEFAULT_MIN_HOURS_WAIT;
  return nowMs / 1000 - loggedAt < minHours * 3600;
}

function satisfiedToday(item: Item, registry: ItemRegistry, nowMs: number): boolean {
  const { lastCalled } = item.state;
  if (lastCalled === undefined || !isSameLogicalDay(lastCalled * 1000, nowMs)) return false;

  const dataset = registry.datasetPath(item);
  if (!dataset || !logExists(dataset)) return false;

  const cap = effectiveDailyCap(item);
  if (cap === undefined) return false;

  return rowsMatchingDate(dataset, logicalDate(nowMs)).length >= cap;
}

function inDismissalBackoff(item: Item, nowMs: number): boolean {
  const { lastCalled, dismissals } = item.state;
  if (lastCalled === undefined || dismissals === 0) return false;
  return nowMs / 1000 - lastCalled < dismissals * 3600;
}

function successCapReached(item: Item, registry: ItemRegistry, nowMs: number): boolean {
  const cap = effectiveDailyCap(item);
  if (cap === undefined) return false;
  return registry.countSuccessesToday(item.def.fn, nowMs) >= cap;
}

function callCapReached(item: Item, registry: ItemRegistry, nowMs: number): boolean {
  const cap = item.def.maxCallsPerDay;
  if (cap === undefined) return false;
  return registry.countCallsToday(item.def.fn, nowMs) >= cap;
}

// ============================================
// POLICY
// ============================================

/**
 * Evaluate all checks, cheapest first. Throws StateNotRecoveredError when
 * the registry has not been populated from the variable log.
 */
export function evaluatePending(item: Item, registry: ItemRegistry, nowMs: number = Date.now()): PendingVerdict {
  registry.assertRecovered();

  if (inDismissalBackoff(item, nowMs)) return notPending("dismissal-backoff");
  if (recentlyLogged(item, registry, nowMs)) return notPending("recently-logged");
  if (satisfiedToday(item, registry, nowMs)) return notPending("satisfied-today");
  if (successCapReached(item, registry, nowMs)) return notPending("success-cap");
  if (callCapReached(item, registry, nowMs)) return notPending("call-cap");

  return PENDING;
}

export function isPending(item: Item, registry: ItemRegistry, nowMs: number = Date.now()): boolean {
  return evaluatePending(item, registry, nowMs).pending;
}

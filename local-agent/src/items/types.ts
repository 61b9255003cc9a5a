/**
 * Item Types
 *
 * An item is a statically registered recurring prompt. Its definition
 * never changes at runtime; only its ItemState does.
 */

import type { ILogger } from "@idlewise/shared/logging";

// ============================================
// PROMPT BOUNDARY
// ============================================

/** What an item body reports back once the user is done with it */
export type PromptResult =
  | { status: "success" }
  | { status: "cancelled" }
  | { status: "skipped" };

export const SUCCESS: PromptResult = { status: "success" };
export const CANCELLED: PromptResult = { status: "cancelled" };
export const SKIPPED: PromptResult = { status: "skipped" };

export interface QueryContext {
  fn: string;
  runId: string;
  /** Aborted when the scheduler abandons the run */
  signal: AbortSignal;
  log: ILogger;
}

/** Something an excursion opened (a buffer, a helper process) */
export interface AuxResource {
  readonly id: string;
  readonly label: string;
  readonly closed: boolean;
  close(): void;
}

export interface ExcursionContext extends QueryContext {
  /** Register an auxiliary resource; the excursion completes when all are closed */
  open(label: string): AuxResource;
  /** User backed out of the excursion */
  cancel(): void;
}

// ============================================
// DEFINITIONS
// ============================================

interface ItemDefBase {
  /** Unique identifier */
  fn: string;
  /** Minimum hours between invocations (default 3) */
  minHoursWait?: number;
  maxCallsPerDay?: number;
  /** Alias of maxSuccessesPerDay; wins when both are set */
  maxEntriesPerDay?: number;
  maxSuccessesPerDay?: number;
  /** Read recency from field 0 of the last row instead of its datestamp */
  lookupPostedTime?: boolean;
  /** EventLog written by the item's dataset writer */
  dataset?: string;
  description?: string;
}

export interface QueryItemDef extends ItemDefBase {
  kind: "query";
  run: (ctx: QueryContext) => Promise<PromptResult>;
}

export interface ExcursionItemDef extends ItemDefBase {
  kind: "excursion";
  /** Resolving without a result means "wait for the opened resources" */
  run: (ctx: ExcursionContext) => Promise<PromptResult | void>;
}

export type ItemDef = QueryItemDef | ExcursionItemDef;
export type ItemKind = ItemDef["kind"];

// ============================================
// RUNTIME STATE
// ============================================

export interface ItemState {
  /** Unix seconds of the last invocation start */
  lastCalled?: number;
  /** Consecutive cancellations since the last success */
  dismissals: number;
}

export interface Item {
  readonly def: ItemDef;
  readonly state: ItemState;
}

export const DEFAULT_MIN_HOURS_WAIT = 3;
export const DISMISSALS_BEFORE_DISABLE_PROMPT = 3;

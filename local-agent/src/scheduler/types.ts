/**
 * Scheduler Types
 */

/** How one invocation of an item ended */
export type ItemOutcome =
  | { kind: "success" }
  | { kind: "cancelled" }
  | { kind: "skipped" }
  | { kind: "timed-out" }
  | { kind: "aborted" }
  | { kind: "failed"; error: unknown }
  | { kind: "disabled" };

export type OutcomeKind = ItemOutcome["kind"];

/** Asks the user a yes/no question (disable prompts) */
export type Confirm = (question: string) => Promise<boolean>;

/** Everything the scheduler mutates, in one place */
export interface SchedulerState {
  queue: string[];
  current: string | null;
  running: boolean;
  runId: string | null;
  /** Epoch ms the current queue was built for */
  asOf: number | null;
}

export type RunStatus = "completed" | "cancelled" | "aborted" | "empty";

export interface RunSummary {
  runId: string;
  status: RunStatus;
  succeeded: string[];
  dismissed: string[];
  skipped: string[];
  timedOut: string[];
  failed: string[];
  disabled: string[];
  /** Queue left behind for resume() */
  remaining: string[];
}

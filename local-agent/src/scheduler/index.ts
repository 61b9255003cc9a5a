export { Scheduler } from "./scheduler.js";
export type { SchedulerOptions, SchedulerStatus, ItemStatus } from "./scheduler.js";
export { runItem, outcomeFromPrompt, DEFAULT_EXCURSION_TIMEOUT_MS } from "./run-item.js";
export type { RunItemOptions } from "./run-item.js";
export type {
  Confirm,
  ItemOutcome,
  OutcomeKind,
  RunStatus,
  RunSummary,
  SchedulerState,
} from "./types.js";

/**
 * Memory Store Types
 */

/** A named piece of volatile state the store snapshots and restores */
export interface VariableBinding {
  get(): unknown;
  /** Receives the recovered value; must validate it, the log is untyped */
  set(value: unknown): void;
  /** Stored as unix seconds, recovered as a Date */
  timestamp?: boolean;
}

export type MemorySnapshot = Map<string, unknown>;

/**
 * Error Types
 *
 * Structural failures that are raised to the caller. Anything that is
 * merely "no data yet" (missing files, unparseable rows on read) is
 * logged as a warning instead and never reaches these classes.
 */

export class ConfigError extends Error {
  public key: string;

  constructor(key: string, message: string) {
    super(`Invalid configuration for ${key}: ${message}`);
    this.name = "ConfigError";
    this.key = key;
  }
}

export class EventLogError extends Error {
  public filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super(`${message} (${filePath})`, options);
    this.name = "EventLogError";
    this.filePath = filePath;
  }
}

export class CorruptLogError extends Error {
  public filePath: string;
  public lineNumber: number;
  public fieldCount: number;

  constructor(filePath: string, lineNumber: number, fieldCount: number) {
    super(`Corrupt variable log ${filePath}: line ${lineNumber} has ${fieldCount} fields, expected 3`);
    this.name = "CorruptLogError";
    this.filePath = filePath;
    this.lineNumber = lineNumber;
    this.fieldCount = fieldCount;
  }
}

export class UnregisteredItemError extends Error {
  public fn: string;

  constructor(fn: string) {
    super(`No item registered under "${fn}"`);
    this.name = "UnregisteredItemError";
    this.fn = fn;
  }
}

export class DuplicateItemError extends Error {
  public fn: string;

  constructor(fn: string) {
    super(`Item "${fn}" is registered more than once`);
    this.name = "DuplicateItemError";
    this.fn = fn;
  }
}

export class StateNotRecoveredError extends Error {
  constructor() {
    super("Item state has not been recovered from the variable log yet; refusing to schedule from blank state");
    this.name = "StateNotRecoveredError";
  }
}

export class SchedulerBusyError extends Error {
  public runId: string;

  constructor(runId: string) {
    super(`A queue run is already in progress (${runId}); finish or abort it first`);
    this.name = "SchedulerBusyError";
    this.runId = runId;
  }
}

/**
 * Memory Store
 *
 * Persists registered variables to a single EventLog so volatile state
 * survives restarts. Each row is `posted \t name \t JSON value`; the
 * latest row for a name wins on recovery.
 *
 * Snapshots are idempotent: a value identical to the last one logged for
 * its name is not written again.
 */

import * as path from "path";
import type { ILogger } from "@idlewise/shared/logging";
import { appendRecord, logExists, purgeLines, readRows } from "../eventlog/index.js";
import type { Row } from "../eventlog/index.js";
import { CorruptLogError } from "../errors.js";
import { createComponentLogger } from "../logging.js";
import type { MemorySnapshot, VariableBinding } from "./types.js";

export const MEMORY_LOG_FILENAME = "memory.tsv";

const FIELDS_PER_ROW = 3;

export interface MemoryStoreOptions {
  cacheDir: string;
  highPrecision?: boolean;
  log?: ILogger;
}

export class MemoryStore {
  readonly logPath: string;

  private bindings = new Map<string, VariableBinding>();
  private highPrecision: boolean;
  private log: ILogger;

  constructor(options: MemoryStoreOptions) {
    this.logPath = path.join(options.cacheDir, MEMORY_LOG_FILENAME);
    this.highPrecision = options.highPrecision ?? false;
    this.log = options.log ?? createComponentLogger("memory");
  }

  register(name: string, binding: VariableBinding): this {
    if (this.bindings.has(name)) {
      throw new Error(`Variable "${name}" is already registered`);
    }
    this.bindings.set(name, binding);
    return this;
  }

  registerAll(bindings: Record<string, VariableBinding>): this {
    for (const [name, binding] of Object.entries(bindings)) {
      this.register(name, binding);
    }
    return this;
  }

  names(): string[] {
    return [...this.bindings.keys()];
  }

  // ----------------------------------------
  // Snapshot
  // ----------------------------------------

  /**
   * Append the current value of each registered variable (or of `only`)
   * whose serialized form differs from its latest logged value. Refuses
   * to touch a log with malformed rows. Returns the names written.
   */
  snapshot(only?: string[]): string[] {
    const latest = this.latestSerialized(this.readChecked());
    const written: string[] = [];

    for (const name of only ?? this.names()) {
      const binding = this.bindings.get(name);
      if (!binding) {
        this.log.warn(`Snapshot of unregistered variable "${name}" skipped`);
        continue;
      }

      const serialized = this.serialize(name, binding);
      if (serialized === undefined || latest.get(name) === serialized) continue;

      const result = appendRecord(this.logPath, [name, serialized], { highPrecision: this.highPrecision });
      if (result.ok) {
        written.push(name);
      }
    }

    if (written.length > 0) {
      this.log.debug(`Snapshot wrote ${written.length} variable(s)`, { written });
    }
    return written;
  }

  // ----------------------------------------
  // Recover
  // ----------------------------------------

  /**
   * Read the log and hand each registered variable its latest value.
   * Malformed rows are skipped with a warning. Returns the names restored.
   */
  recover(): string[] {
    const values = this.readValues();
    const restored: string[] = [];

    for (const [name, value] of values) {
      const binding = this.bindings.get(name);
      if (!binding) {
        this.log.debug(`Recovered value for unregistered variable "${name}" ignored`);
        continue;
      }
      const decoded = binding.timestamp ? toDate(value) : value;
      if (decoded === undefined) {
        this.log.warn(`Recovered "${name}" is not a timestamp, ignored`);
        continue;
      }
      binding.set(decoded);
      restored.push(name);
    }

    this.log.info(`Recovered ${restored.length} variable(s)`, { restored });
    return restored;
  }

  /** Latest logged value of one variable, decoded */
  lastValueOf(name: string): unknown {
    const value = this.readValues().get(name);
    if (value === undefined) return undefined;
    return this.bindings.get(name)?.timestamp ? toDate(value) : value;
  }

  /** Drop every logged value of `name`. Returns the rows removed. */
  forget(name: string): number {
    if (!logExists(this.logPath)) return 0;
    const removed = purgeLines(this.logPath, row => row[1] === name);
    this.log.info(`Forgot "${name}"`, { removed });
    return removed;
  }

  // ----------------------------------------
  // Internals
  // ----------------------------------------

  private readChecked(): Row[] {
    if (!logExists(this.logPath)) return [];
    const rows = readRows(this.logPath);
    rows.forEach((row, index) => {
      if (row.length !== FIELDS_PER_ROW) {
        throw new CorruptLogError(this.logPath, index + 1, row.length);
      }
    });
    return rows;
  }

  private latestSerialized(rows: Row[]): Map<string, string> {
    const latest = new Map<string, string>();
    for (const [, name, serialized] of rows) {
      latest.set(name, serialized);
    }
    return latest;
  }

  private readValues(): MemorySnapshot {
    const values: MemorySnapshot = new Map();
    if (!logExists(this.logPath)) return values;

    readRows(this.logPath).forEach((row, index) => {
      if (row.length !== FIELDS_PER_ROW) {
        this.log.warn("Skipping malformed memory row", { line: index + 1, fields: row.length });
        return;
      }
      const [, name, serialized] = row;
      try {
        values.set(name, JSON.parse(serialized));
      } catch {
        this.log.warn("Skipping unparseable memory value", { line: index + 1, name });
      }
    });
    return values;
  }

  private serialize(name: string, binding: VariableBinding): string | undefined {
    const value = binding.get();
    if (value === undefined) return undefined;

    if (binding.timestamp) {
      if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
        this.log.warn(`Timestamp variable "${name}" does not hold a valid Date`);
        return undefined;
      }
      return JSON.stringify(Math.floor(value.getTime() / 1000));
    }
    return JSON.stringify(value);
  }
}

function toDate(value: unknown): Date | undefined {
  if (typeof value !== "number" || !Number.isFinite(value)) return undefined;
  return new Date(value * 1000);
}

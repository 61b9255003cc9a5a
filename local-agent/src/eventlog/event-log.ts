/**
 * EventLog: append-only, tab-separated record files
 *
 * Format: UTF-8, one record per "\n"-terminated line, fields separated by
 * a single tab, field 0 always the posted time (unix seconds, or seconds
 * with 7 fractional digits in high-precision mode). No header row.
 *
 * Used for item datasets, the internal success/call logs, and the
 * MemoryStore variable log. Every call opens, reads or appends, and
 * closes; nothing is held open between calls.
 */

import * as fs from "fs";
import * as path from "path";
import { createComponentLogger } from "../logging.js";
import { EventLogError } from "../errors.js";
import { logicalDate, lastDateIn } from "./dates.js";

// ============================================
// TYPES
// ============================================

export type Field = string | number;
export type Row = string[];

export interface AppendOptions {
  /** Posted time as seconds with 7 fractional digits instead of an integer */
  highPrecision?: boolean;
}

export type AppendResult =
  | { ok: true; filePath: string; line: string }
  | { ok: false; reason: "malformed"; errorPath: string; line: string };

export interface ChronologyAnomaly {
  lineNumber: number;
  posted: number;
  kind: "out-of-order" | "future";
}

// ============================================
// HELPERS
// ============================================

export function errorsPathFor(filePath: string): string {
  return `${filePath}_errors`;
}

export function postedNow(highPrecision = false): string {
  const seconds = Date.now() / 1000;
  return highPrecision ? seconds.toFixed(7) : String(Math.floor(seconds));
}

function readText(filePath: string): string | undefined {
  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    if (isMissing(err)) {
      createComponentLogger("eventlog").warn("Log file not found, treating as empty", { filePath });
      return undefined;
    }
    throw new EventLogError(filePath, "Failed to read log", { cause: err });
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function nonBlankLines(text: string): string[] {
  return text.split("\n").filter(line => line.trim() !== "");
}

/** True when appending must first terminate an unterminated last line */
function needsLeadingNewline(filePath: string): boolean {
  let size: number;
  try {
    size = fs.statSync(filePath).size;
  } catch {
    return false;
  }
  if (size === 0) return false;

  const fd = fs.openSync(filePath, "r");
  try {
    const last = Buffer.alloc(1);
    fs.readSync(fd, last, 0, 1, size - 1);
    return last.toString("utf-8") !== "\n";
  } finally {
    fs.closeSync(fd);
  }
}

function ensureParentDir(filePath: string): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  } catch (err) {
    throw new EventLogError(filePath, "Cannot create parent directory", { cause: err });
  }
}

function appendLine(filePath: string, line: string): void {
  const prefix = needsLeadingNewline(filePath) ? "\n" : "";
  fs.appendFileSync(filePath, `${prefix}${line}\n`, "utf-8");
}

// ============================================
// WRITE
// ============================================

/**
 * Append a record. The posted time is prepended as field 0.
 *
 * A field holding a tab, or a record holding a newline, would shift the
 * columns of every later reader, so such records go to `<path>_errors`
 * verbatim and the primary file is left alone.
 */
export function appendRecord(filePath: string, fields: Field[], options: AppendOptions = {}): AppendResult {
  ensureParentDir(filePath);

  const values = fields.map(f => String(f));
  const line = [postedNow(options.highPrecision), ...values].join("\t");

  const hasTab = values.some(v => v.includes("\t"));
  const hasNewline = line.includes("\n") || line.includes("\r");

  if (hasTab || hasNewline) {
    const errorPath = errorsPathFor(filePath);
    appendLine(errorPath, line);
    createComponentLogger("eventlog").warn("Malformed record diverted to errors file", {
      filePath,
      errorPath,
      hasTab,
      hasNewline,
    });
    return { ok: false, reason: "malformed", errorPath, line };
  }

  appendLine(filePath, line);
  return { ok: true, filePath, line };
}

// ============================================
// READ
// ============================================

export function logExists(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/** All non-blank lines split on tabs. Missing file → [] plus a warning. */
export function readRows(filePath: string): Row[] {
  const text = readText(filePath);
  if (text === undefined) return [];
  return nonBlankLines(text).map(line => line.split("\t"));
}

/** Rows whose line contains the literal date (default: today's logical date) */
export function rowsMatchingDate(filePath: string, date: string = logicalDate()): Row[] {
  const text = readText(filePath);
  if (text === undefined) return [];
  return nonBlankLines(text)
    .filter(line => line.includes(date))
    .map(line => line.split("\t"));
}

export function lastRow(filePath: string): Row {
  const text = readText(filePath);
  if (text === undefined) return [];
  const lines = nonBlankLines(text);
  return lines.length > 0 ? lines[lines.length - 1].split("\t") : [];
}

export function lastValue(filePath: string): string | undefined {
  const row = lastRow(filePath);
  return row.length > 0 ? row[row.length - 1] : undefined;
}

/** Last YYYY-MM-DD appearing anywhere in the file */
export function lastDatestamp(filePath: string): string | undefined {
  const text = readText(filePath);
  if (text === undefined) return undefined;
  return lastDateIn(text);
}

export function parsePosted(row: Row): number | undefined {
  if (row.length === 0) return undefined;
  const posted = Number(row[0]);
  return row[0].trim() !== "" && Number.isFinite(posted) ? posted : undefined;
}

/**
 * Report rows whose posted time goes backwards or lies in the future.
 * The file is flagged, never rejected.
 */
export function checkChronology(filePath: string, nowMs: number = Date.now()): ChronologyAnomaly[] {
  const nowSec = nowMs / 1000;
  const anomalies: ChronologyAnomaly[] = [];
  let previous = -Infinity;

  readRows(filePath).forEach((row, index) => {
    const posted = parsePosted(row);
    if (posted === undefined) return;
    if (posted < previous) {
      anomalies.push({ lineNumber: index + 1, posted, kind: "out-of-order" });
    }
    if (posted > nowSec) {
      anomalies.push({ lineNumber: index + 1, posted, kind: "future" });
    }
    previous = Math.max(previous, posted);
  });

  if (anomalies.length > 0) {
    createComponentLogger("eventlog").warn("Log has non-monotonic posted times", {
      filePath,
      anomalies: anomalies.length,
    });
  }
  return anomalies;
}

// ============================================
// MAINTENANCE
// ============================================

/**
 * Rewrite the whole file without the rows matching `predicate`.
 * Administrative only; everything else treats logs as append-only.
 */
export function purgeLines(filePath: string, predicate: (row: Row) => boolean): number {
  const text = readText(filePath);
  if (text === undefined) return 0;

  const lines = nonBlankLines(text);
  const kept = lines.filter(line => !predicate(line.split("\t")));
  const removed = lines.length - kept.length;

  if (removed > 0) {
    const tmpPath = `${filePath}.tmp_${Date.now()}`;
    fs.writeFileSync(tmpPath, kept.map(l => l + "\n").join(""), "utf-8");
    fs.renameSync(tmpPath, filePath);
  }
  return removed;
}

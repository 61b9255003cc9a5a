/**
 * EventLog Module
 *
 * Append-only tab-separated record files and the logical-day helpers
 * used to query them.
 */

export {
  appendRecord,
  readRows,
  rowsMatchingDate,
  lastRow,
  lastValue,
  lastDatestamp,
  logExists,
  parsePosted,
  checkChronology,
  purgeLines,
  errorsPathFor,
  postedNow,
  type Field,
  type Row,
  type AppendOptions,
  type AppendResult,
  type ChronologyAnomaly,
} from "./event-log.js";

export {
  DAY_BOUNDARY_HOUR,
  formatDate,
  formatTimestamp,
  logicalDate,
  startOfLogicalDay,
  isSameLogicalDay,
  containsDate,
  lastDateIn,
  parseDatestamp,
} from "./dates.js";

/**
 * Logical-day helpers.
 *
 * A day starts at 05:00 local time, not midnight: a session that runs
 * past midnight still belongs to "yesterday" until the boundary.
 */

export const DAY_BOUNDARY_HOUR = 5;

const DATE_RE = /\d{4}-\d{2}-\d{2}/;
const DATE_GLOBAL_RE = /\d{4}-\d{2}-\d{2}/g;
const STAMP_RE = /(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?/;

/** YYYY-MM-DD of the local calendar date */
export function formatDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

/** YYYY-MM-DD HH:MM in local time */
export function formatTimestamp(ms: number): string {
  const d = new Date(ms);
  const hh = String(d.getHours()).padStart(2, "0");
  const mm = String(d.getMinutes()).padStart(2, "0");
  return `${formatDate(d)} ${hh}:${mm}`;
}

/** Calendar date the timestamp counts towards, honouring the 05:00 boundary */
export function logicalDate(ms: number = Date.now()): string {
  const d = new Date(ms);
  if (d.getHours() < DAY_BOUNDARY_HOUR) {
    return formatDate(new Date(d.getFullYear(), d.getMonth(), d.getDate() - 1));
  }
  return formatDate(d);
}

/** Epoch ms at which the logical day containing `ms` began */
export function startOfLogicalDay(ms: number = Date.now()): number {
  const d = new Date(ms);
  const dayOffset = d.getHours() < DAY_BOUNDARY_HOUR ? -1 : 0;
  return new Date(d.getFullYear(), d.getMonth(), d.getDate() + dayOffset, DAY_BOUNDARY_HOUR).getTime();
}

export function isSameLogicalDay(aMs: number, bMs: number): boolean {
  return logicalDate(aMs) === logicalDate(bMs);
}

export function containsDate(text: string): boolean {
  return DATE_RE.test(text);
}

/** Last YYYY-MM-DD occurring in the text */
export function lastDateIn(text: string): string | undefined {
  const matches = text.match(DATE_GLOBAL_RE);
  return matches ? matches[matches.length - 1] : undefined;
}

/**
 * Parse the first "YYYY-MM-DD", "YYYY-MM-DD HH:MM" or "YYYY-MM-DDTHH:MM:SS"
 * found in `text` as local time. Returns epoch ms.
 */
export function parseDatestamp(text: string): number | undefined {
  const match = text.match(STAMP_RE);
  if (!match) return undefined;

  const [, y, mo, d, hh, mm, ss] = match;
  const month = Number(mo);
  const day = Number(d);
  if (month < 1 || month > 12 || day < 1 || day > 31) return undefined;

  const ms = new Date(
    Number(y),
    month - 1,
    day,
    hh === undefined ? 0 : Number(hh),
    mm === undefined ? 0 : Number(mm),
    ss === undefined ? 0 : Number(ss),
  ).getTime();

  return Number.isNaN(ms) ? undefined : ms;
}

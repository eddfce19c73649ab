/**
 * timestamp.ts - Nullable timestamp values for log entries and stored state
 *
 * Workgraph logs and the automation state file are written by several tools,
 * so timestamps arrive as anything from a well-formed ISO string to garbage.
 * Parsing never throws: a value is either valid, missing, or unparseable, and
 * callers decide what each case means.
 */

import type { ISODateTime } from "./domain.js";

export type ParsedTimestamp =
  | { kind: "valid"; iso: ISODateTime; epochMs: number }
  | { kind: "missing" }
  | { kind: "unparseable"; raw: string };

const ISO_PATTERN =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?)?$/i;

/**
 * Parse an ISO-8601 date or date-time. Date-times without an offset are read
 * as UTC. Anything that is not an ISO string (including locale formats that
 * `Date.parse` would accept) is unparseable.
 */
export function parseTimestamp(value: unknown): ParsedTimestamp {
  if (value === undefined || value === null) return { kind: "missing" };
  if (typeof value !== "string") return { kind: "unparseable", raw: String(value) };

  const raw = value.trim();
  if (!raw) return { kind: "missing" };

  const match = raw.match(ISO_PATTERN);
  if (!match) return { kind: "unparseable", raw };

  const [, date, time, offset] = match;
  if (!isCalendarDate(date)) return { kind: "unparseable", raw };

  let normalized = date;
  if (time) {
    normalized = `${date}T${time}${offset ? normalizeOffset(offset) : "Z"}`;
  }

  const epochMs = Date.parse(normalized);
  if (Number.isNaN(epochMs)) return { kind: "unparseable", raw };

  return { kind: "valid", iso: new Date(epochMs).toISOString(), epochMs };
}

// Date.parse rolls impossible days (02-30) over into the next month.
function isCalendarDate(date: string): boolean {
  const [year, month, day] = date.split("-").map(Number);
  const utc = new Date(0);
  utc.setUTCFullYear(year, month - 1, day);
  return utc.getUTCFullYear() === year && utc.getUTCMonth() === month - 1 && utc.getUTCDate() === day;
}

function normalizeOffset(offset: string): string {
  if (offset.toUpperCase() === "Z") return "Z";
  // +0530 -> +05:30
  return offset.includes(":") ? offset : `${offset.slice(0, 3)}:${offset.slice(3)}`;
}

/** Epoch milliseconds for a valid timestamp, null otherwise. */
export function toEpochMs(value: unknown): number | null {
  const parsed = parseTimestamp(value);
  return parsed.kind === "valid" ? parsed.epochMs : null;
}

/**
 * Strict ordering between two timestamps. Returns null when either side is
 * missing or unparseable; an unknown ordering is not "not after".
 */
export function isStrictlyAfter(candidate: unknown, reference: unknown): boolean | null {
  const a = toEpochMs(candidate);
  const b = toEpochMs(reference);
  if (a === null || b === null) return null;
  return a > b;
}

/** Keep the valid timestamps of a list, dropping the rest. */
export function validEpochs(values: readonly unknown[]): number[] {
  const epochs: number[] = [];
  for (const value of values) {
    const ms = toEpochMs(value);
    if (ms !== null) epochs.push(ms);
  }
  return epochs;
}

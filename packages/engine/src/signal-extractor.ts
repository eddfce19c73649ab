/**
 * signal-extractor.ts - Drift signals from a task's event log
 *
 * Other drift checkers report into the task log with a category prefix
 * ("Speedrift: yellow (...)"). This module counts those messages, drops the
 * ones this tool wrote itself, and splits the rest into new vs. already seen
 * relative to the latest signal timestamp recorded at the previous check.
 */

import type { DriftSignal, ISODateTime, TaskLogEntry } from "@therapydrift/architecture";
import { isStrictlyAfter, parseTimestamp } from "@therapydrift/architecture";

export const DRIFT_SIGNAL_PREFIXES = [
  "Coredrift:",
  "Speedrift:",
  "Specdrift:",
  "Datadrift:",
  "Depsdrift:",
  "Uxdrift:",
  "Therapydrift:",
] as const;

export interface SignalExtraction {
  signals: DriftSignal[];
  newSignalCount: number;
  ignoredSelfSignals: number;
  latestSignalTs: ISODateTime | null;
}

function startsWithAny(message: string, prefixes: readonly string[]): boolean {
  return prefixes.some((prefix) => prefix.length > 0 && message.startsWith(prefix));
}

export function isDriftSignal(message: string): boolean {
  return startsWithAny(message, DRIFT_SIGNAL_PREFIXES);
}

/**
 * Extract drift signals from log entries.
 *
 * A signal is new when its timestamp is strictly after `previousLatestSignalTs`.
 * With no usable previous timestamp every signal is new; otherwise signals
 * without a parseable timestamp are counted but never new.
 */
export function extractDriftSignals(
  log: readonly TaskLogEntry[],
  ignoreSignalPrefixes: readonly string[],
  previousLatestSignalTs?: string | null,
): SignalExtraction {
  const signals: DriftSignal[] = [];
  let ignoredSelfSignals = 0;
  let latestMs: number | null = null;

  for (const entry of log) {
    const message = entry.message;
    if (!isDriftSignal(message)) continue;
    if (startsWithAny(message, ignoreSignalPrefixes)) {
      ignoredSelfSignals++;
      continue;
    }

    const ts = parseTimestamp(entry.timestamp);
    if (ts.kind === "valid") {
      signals.push({ message, timestamp: ts.iso });
      if (latestMs === null || ts.epochMs > latestMs) latestMs = ts.epochMs;
    } else {
      signals.push({ message, timestamp: null });
    }
  }

  const previous = parseTimestamp(previousLatestSignalTs);
  let newSignalCount: number;
  if (previous.kind !== "valid") {
    newSignalCount = signals.length;
  } else {
    newSignalCount = signals.filter(
      (signal) => isStrictlyAfter(signal.timestamp, previous.iso) === true,
    ).length;
  }

  return {
    signals,
    newSignalCount,
    ignoredSelfSignals,
    latestSignalTs: latestMs === null ? null : new Date(latestMs).toISOString(),
  };
}

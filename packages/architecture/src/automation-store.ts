/**
 * automation-store.ts - Per-task automation history for the auto-action policy
 *
 * Stored at .workgraph/.therapydrift/state.json (runtime state, not task data).
 * A missing, unreadable or malformed file reads as an empty store; entries are
 * normalized one field at a time so a single bad field does not discard the
 * rest of a task's history.
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import type { AutomationStateFile, AutomationTaskState, CheckReport, ID } from "./domain.js";
import { writeFileAtomic } from "./file-lock.js";
import type { AutomationStateStore, ReportSink } from "./ports.js";

export const STATE_DIR = ".therapydrift";

export function stateDir(wgDir: string): string {
  return join(wgDir, STATE_DIR);
}

export function automationStatePath(wgDir: string): string {
  return join(stateDir(wgDir), "state.json");
}

export function lastReportPath(wgDir: string): string {
  return join(stateDir(wgDir), "last.json");
}

export function emptyAutomationState(): AutomationStateFile {
  return { version: 1, tasks: {} };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function asCount(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return Math.max(0, Math.trunc(value));
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? Math.max(0, Math.trunc(parsed)) : undefined;
  }
  return undefined;
}

function asStringArray(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === "string");
}

/** Reads `camelKey`, falling back to the snake_case spelling older state files use. */
function field(raw: Record<string, unknown>, camelKey: string, snakeKey: string): unknown {
  return raw[camelKey] !== undefined ? raw[camelKey] : raw[snakeKey];
}

export function normalizeAutomationTaskState(value: unknown): AutomationTaskState {
  if (!isRecord(value)) return {};
  const state: AutomationTaskState = {};

  const lastCheckTs = field(value, "lastCheckTs", "last_check_ts");
  if (typeof lastCheckTs === "string") state.lastCheckTs = lastCheckTs;
  const latestSignalTs = field(value, "latestSignalTs", "latest_signal_ts");
  if (typeof latestSignalTs === "string" && latestSignalTs) {
    state.latestSignalTs = latestSignalTs;
  }

  const signalCount = asCount(field(value, "driftSignalCount", "drift_signal_count"));
  if (signalCount !== undefined) state.driftSignalCount = signalCount;

  const followups = asStringArray(field(value, "openFollowupIds", "open_followup_ids"));
  if (followups) state.openFollowupIds = followups;

  // Kept raw: the policy drops unparseable entries itself.
  const actions = asStringArray(field(value, "autoActionTimestamps", "auto_action_timestamps"));
  if (actions) state.autoActionTimestamps = actions;

  const total = asCount(field(value, "autoActionTotal", "auto_action_total"));
  if (total !== undefined) state.autoActionTotal = total;

  const breaker = field(value, "circuitBreakerOpen", "circuit_breaker_open");
  if (typeof breaker === "boolean") state.circuitBreakerOpen = breaker;

  return state;
}

export function normalizeAutomationState(value: unknown): AutomationStateFile {
  if (!isRecord(value) || !isRecord(value.tasks)) return emptyAutomationState();

  const tasks: Record<ID, AutomationTaskState> = {};
  for (const [taskId, entry] of Object.entries(value.tasks)) {
    tasks[taskId] = normalizeAutomationTaskState(entry);
  }
  return { version: 1, tasks };
}

export function readAutomationState(wgDir: string): AutomationStateFile {
  const path = automationStatePath(wgDir);
  if (!existsSync(path)) return emptyAutomationState();
  try {
    return normalizeAutomationState(JSON.parse(readFileSync(path, "utf-8")));
  } catch {
    return emptyAutomationState();
  }
}

export function writeAutomationState(wgDir: string, state: AutomationStateFile): void {
  writeFileAtomic(automationStatePath(wgDir), `${JSON.stringify(state, null, 2)}\n`);
}

/** The stored history for one task; an absent entry starts empty. */
export function getTaskAutomationState(state: AutomationStateFile, taskId: ID): AutomationTaskState {
  return state.tasks[taskId] ?? {};
}

export class FileAutomationStateStore implements AutomationStateStore, ReportSink {
  constructor(readonly wgDir: string) {}

  read(): AutomationStateFile {
    return readAutomationState(this.wgDir);
  }

  write(state: AutomationStateFile): void {
    writeAutomationState(this.wgDir, state);
  }

  writeLastReport(report: CheckReport): void {
    writeFileAtomic(lastReportPath(this.wgDir), `${JSON.stringify(report, null, 2)}\n`);
  }
}

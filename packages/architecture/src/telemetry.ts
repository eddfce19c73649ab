/**
 * telemetry.ts - structured telemetry for check-to-decision-to-action chains
 *
 * Lightweight, append-only JSONL telemetry. Every emission is fire-and-forget:
 * telemetry must NEVER throw or block the calling code path.
 */

import { appendFileSync, mkdirSync } from "fs";
import { dirname, join } from "path";
import type { AutoActionReason, DriftScore, FindingKind, ID } from "./domain.js";

export type TelemetryEventType =
  | "drift_check"
  | "spec_invalid"
  | "auto_action_decided"
  | "followup_created";

interface TelemetryEventBase<T extends TelemetryEventType, D> {
  timestamp: string;
  type: T;
  taskId: ID;
  data: D;
}

export interface DriftCheckTelemetryData {
  score: DriftScore;
  findingKinds: FindingKind[];
  driftSignalCount: number;
  newSignalCount: number;
  ignoredSelfSignals: number;
  openDriftFollowups: number;
}

export interface SpecInvalidTelemetryData {
  error: string;
}

export interface AutoActionDecidedTelemetryData {
  allowed: boolean;
  reason: AutoActionReason;
  recentActionCount1h: number;
  circuitBreakerOpen: boolean;
}

export interface FollowupCreatedTelemetryData {
  followupId: ID;
  created: boolean;
}

export type DriftCheckTelemetryEvent = TelemetryEventBase<"drift_check", DriftCheckTelemetryData>;
export type SpecInvalidTelemetryEvent = TelemetryEventBase<"spec_invalid", SpecInvalidTelemetryData>;
export type AutoActionDecidedTelemetryEvent = TelemetryEventBase<
  "auto_action_decided",
  AutoActionDecidedTelemetryData
>;
export type FollowupCreatedTelemetryEvent = TelemetryEventBase<
  "followup_created",
  FollowupCreatedTelemetryData
>;

export type TelemetryEvent =
  | DriftCheckTelemetryEvent
  | SpecInvalidTelemetryEvent
  | AutoActionDecidedTelemetryEvent
  | FollowupCreatedTelemetryEvent;

// Distributes over the union so each member keeps its own data shape.
type WithoutTimestamp<E> = E extends TelemetryEvent ? Omit<E, "timestamp"> : never;
export type EmittableTelemetryEvent = WithoutTimestamp<TelemetryEvent>;

const ALL_EVENT_TYPES: ReadonlySet<TelemetryEventType> = new Set<TelemetryEventType>([
  "drift_check",
  "spec_invalid",
  "auto_action_decided",
  "followup_created",
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export function isTelemetryEventType(value: unknown): value is TelemetryEventType {
  return typeof value === "string" && ALL_EVENT_TYPES.has(value as TelemetryEventType);
}

export function telemetryPath(stateDir: string): string {
  return join(stateDir, "telemetry.jsonl");
}

export function coerceTelemetryEvent(value: unknown): TelemetryEvent | null {
  if (!isRecord(value)) return null;
  if (typeof value.timestamp !== "string") return null;
  if (!isTelemetryEventType(value.type)) return null;
  if (typeof value.taskId !== "string") return null;
  if (!isRecord(value.data)) return null;

  return value as unknown as TelemetryEvent;
}

export function emitTelemetry(
  stateDir: string,
  event: EmittableTelemetryEvent,
  now: Date = new Date(),
): void {
  try {
    const fullEvent = { ...event, timestamp: now.toISOString() };
    const filePath = telemetryPath(stateDir);
    mkdirSync(dirname(filePath), { recursive: true });
    appendFileSync(filePath, JSON.stringify(fullEvent) + "\n");
  } catch {
    // Telemetry must NEVER throw or block
  }
}

export class JsonlTelemetrySink {
  constructor(private readonly stateDir: string) {}

  emit(event: EmittableTelemetryEvent): void {
    emitTelemetry(this.stateDir, event);
  }
}

/**
 * auto-action-policy.ts - Loop safety for self-healing auto-actions
 *
 * An auto-action creates a recovery task; activity on that task can show up
 * as drift again, which would trigger another action. This policy breaks the
 * loop with, in order of precedence:
 *
 *   1. circuit breaker    lifetime action count reached the threshold
 *   2. hourly budget      disabled, or used up within the last hour
 *   3. cooldown           too soon after the previous action
 *   4. new evidence       no new signals and no change in open follow-ups
 *
 * Pure: the caller supplies the prior state and the clock, and persists the
 * outcome through updateAutomationState().
 */

import type {
  AutoActionDecision,
  AutoActionReason,
  AutomationTaskState,
  DriftTelemetry,
  Finding,
  FindingKind,
  TherapyDriftSpec,
} from "@therapydrift/architecture";
import { validEpochs } from "@therapydrift/architecture";

const HOUR_MS = 3_600_000;

export const ACTIONABLE_KINDS: ReadonlySet<FindingKind> = new Set<FindingKind>([
  "repeated_drift_signals",
  "unresolved_drift_followups",
  "missing_recovery_plan",
]);

export interface PolicyInput {
  spec: TherapyDriftSpec;
  findings: readonly Pick<Finding, "kind">[];
  telemetry: Pick<DriftTelemetry, "newSignalCount" | "openFollowupIds">;
  taskState: AutomationTaskState;
  now: Date;
}

/** Intermediate facts every rule reads from. */
export interface PolicyFacts {
  hasActionableFindings: boolean;
  recentActionCount1h: number;
  lastActionMs: number | null;
  circuitBreakerOpen: boolean;
  cooldownActive: boolean;
  openFollowupsChanged: boolean;
  newSignalCount: number;
  hasNewEvidence: boolean;
}

export interface DenyRule {
  reason: Exclude<AutoActionReason, "allowed" | "no_actionable_findings">;
  denies(facts: PolicyFacts, spec: TherapyDriftSpec): boolean;
}

export const DENY_RULES: readonly DenyRule[] = [
  { reason: "circuit_breaker_open", denies: (facts) => facts.circuitBreakerOpen },
  { reason: "hourly_budget_disabled", denies: (_facts, spec) => spec.maxAutoActionsPerHour === 0 },
  {
    reason: "hourly_budget_exhausted",
    denies: (facts, spec) => facts.recentActionCount1h >= spec.maxAutoActionsPerHour,
  },
  { reason: "cooldown_active", denies: (facts) => facts.cooldownActive },
  { reason: "no_new_evidence", denies: (facts) => !facts.hasNewEvidence },
];

function sameIdSet(a: readonly string[], b: readonly string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  if (left.size !== right.size) return false;
  for (const id of left) {
    if (!right.has(id)) return false;
  }
  return true;
}

export function collectPolicyFacts(input: PolicyInput): PolicyFacts {
  const { spec, findings, telemetry, taskState, now } = input;
  const nowMs = now.getTime();

  const hasActionableFindings = findings.some((f) => ACTIONABLE_KINDS.has(f.kind));

  const actionEpochs = validEpochs(taskState.autoActionTimestamps ?? []);
  const recentActionCount1h = actionEpochs.filter((ms) => ms >= nowMs - HOUR_MS).length;
  const lastActionMs = actionEpochs.length > 0 ? Math.max(...actionEpochs) : null;

  const circuitBreakerOpen = (taskState.autoActionTotal ?? 0) >= spec.circuitBreakerAfter;
  const cooldownActive =
    lastActionMs !== null &&
    spec.cooldownSeconds > 0 &&
    nowMs - lastActionMs < spec.cooldownSeconds * 1000;

  const openFollowupsChanged = !sameIdSet(
    telemetry.openFollowupIds ?? [],
    taskState.openFollowupIds ?? [],
  );
  const newSignalCount = telemetry.newSignalCount ?? 0;
  const hasNewEvidence = newSignalCount >= spec.minNewSignals || openFollowupsChanged;

  return {
    hasActionableFindings,
    recentActionCount1h,
    lastActionMs,
    circuitBreakerOpen,
    cooldownActive,
    openFollowupsChanged,
    newSignalCount,
    hasNewEvidence,
  };
}

export function decideReason(facts: PolicyFacts, spec: TherapyDriftSpec): AutoActionReason {
  if (!facts.hasActionableFindings) return "no_actionable_findings";
  const denied = DENY_RULES.find((rule) => rule.denies(facts, spec));
  return denied ? denied.reason : "allowed";
}

export function evaluateAutoActionPolicy(input: PolicyInput): AutoActionDecision {
  const facts = collectPolicyFacts(input);
  const reason = decideReason(facts, input.spec);

  return {
    allowAutoAction: reason === "allowed",
    reason,
    hasActionableFindings: facts.hasActionableFindings,
    newSignalCount: facts.newSignalCount,
    openFollowupsChanged: facts.openFollowupsChanged,
    recentActionCount1h: facts.recentActionCount1h,
    cooldownActive: facts.cooldownActive,
    circuitBreakerOpen: facts.circuitBreakerOpen,
    lastActionTs: facts.lastActionMs === null ? null : new Date(facts.lastActionMs).toISOString(),
  };
}

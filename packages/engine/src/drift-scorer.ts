/**
 * drift-scorer.ts - Findings, score and recommendations for one task
 *
 * Pure function of the drift settings, the task, the task graph and the previously
 * seen latest signal timestamp. Each rule fires independently; the recovery
 * plan rule only fires when some other rule already did.
 */

import type {
  DriftReport,
  DriftScore,
  DriftTelemetry,
  Finding,
  ID,
  TaskMap,
  TaskRecord,
  TherapyDriftSpec,
} from "@therapydrift/architecture";
import { extractDriftSignals } from "./signal-extractor.js";
import { findOpenFollowups } from "./followup-tracker.js";
import { recommend, therapyTaskId } from "./recommendations.js";

export const SUPPORTED_SCHEMA = 1;

const RECENT_SIGNALS_IN_DETAILS = 5;
const FOLLOWUPS_IN_DETAILS = 20;
const RECOVERY_STATUSES: ReadonlySet<string> = new Set(["open", "in-progress", "done"]);

export interface DriftInput {
  taskId: ID;
  taskTitle: string;
  spec: TherapyDriftSpec;
  task: TaskRecord;
  tasks: TaskMap;
  previousLatestSignalTs?: string | null;
}

export function scoreFindings(findings: readonly Finding[]): DriftScore {
  if (findings.some((f) => f.severity === "error")) return "red";
  if (findings.some((f) => f.severity === "warn")) return "yellow";
  return "green";
}

export function computeTherapyDrift(input: DriftInput): DriftReport {
  const { taskId, taskTitle, spec, task, tasks } = input;
  const findings: Finding[] = [];

  const extraction = extractDriftSignals(
    task.log,
    spec.ignoreSignalPrefixes,
    input.previousLatestSignalTs,
  );
  const followups = findOpenFollowups(tasks, taskId, spec.followupPrefixes);

  const recoveryId = therapyTaskId(taskId);
  const recoveryTask = tasks[recoveryId];
  const therapyTaskExists = !!recoveryTask && RECOVERY_STATUSES.has(recoveryTask.status);

  const telemetry: DriftTelemetry = {
    driftSignalCount: extraction.signals.length,
    newSignalCount: extraction.newSignalCount,
    ignoredSelfSignals: extraction.ignoredSelfSignals,
    openDriftFollowups: followups.total,
    openFollowupIds: followups.ids,
    latestSignalTs: extraction.latestSignalTs,
    therapyTaskExists,
  };

  if (spec.schema !== SUPPORTED_SCHEMA) {
    findings.push({
      kind: "unsupported_schema",
      severity: "warn",
      summary: `Unsupported therapydrift schema: ${spec.schema} (expected ${SUPPORTED_SCHEMA})`,
    });
  }

  const signalCount = extraction.signals.length;
  if (signalCount >= spec.minSignalCount) {
    findings.push({
      kind: "repeated_drift_signals",
      severity: "warn",
      summary: `Task has repeated drift signals (${signalCount} >= ${spec.minSignalCount})`,
      details: {
        recentSignals: extraction.signals.slice(-RECENT_SIGNALS_IN_DETAILS).map((s) => s.message),
      },
    });
  }

  if (followups.total > 0) {
    findings.push({
      kind: "unresolved_drift_followups",
      severity: "warn",
      summary: `Task has unresolved drift follow-up tasks (${followups.total})`,
      details: { tasks: followups.ids.slice(0, FOLLOWUPS_IN_DETAILS) },
    });
  }

  if (spec.requireRecoveryPlan && findings.length > 0 && !therapyTaskExists) {
    findings.push({
      kind: "missing_recovery_plan",
      severity: "warn",
      summary: "No therapy recovery task exists for this drifting task",
      details: { expectedTaskId: recoveryId },
    });
  }

  return {
    taskId,
    taskTitle,
    score: scoreFindings(findings),
    spec,
    telemetry,
    findings,
    recommendations: recommend(findings, taskId),
  };
}

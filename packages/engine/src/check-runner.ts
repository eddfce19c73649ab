/**
 * check-runner.ts - One drift check against a workgraph task
 *
 *   1. load the task (TaskNotFoundError when missing)
 *   2. no therapydrift block        -> green report, nothing persisted
 *   3. block does not parse         -> invalid_spec report, policy skipped
 *   4. score, decide, log, act, fold the decision into automation history
 */

import type {
  AutomationStateFile,
  AutoActionDecision,
  CheckReport,
  DriftCheckContext,
  DriftReport,
  ID,
  TherapyDriftSpec,
  UnevaluatedReport,
} from "@therapydrift/architecture";
import {
  extractSpecBlock,
  formatSpecFence,
  getTaskAutomationState,
  parseSpecBlock,
  SpecParseError,
  specFromRaw,
  TaskNotFoundError,
} from "@therapydrift/architecture";
import { computeTherapyDrift } from "./drift-scorer.js";
import { evaluateAutoActionPolicy } from "./auto-action-policy.js";
import { updateAutomationState } from "./automation-state.js";
import { buildRecoveryTask, formatLogSummary } from "./followup-writer.js";
import { recommend } from "./recommendations.js";

export const ExitCode = {
  ok: 0,
  fatal: 1,
  usage: 2,
  findings: 3,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export interface DriftCheckOptions {
  context: DriftCheckContext;
  taskId: ID;
  writeLog?: boolean;
  createFollowups?: boolean;
  now?: Date;
}

export interface DriftCheckOutcome {
  report: CheckReport;
  exitCode: ExitCodeValue;
  decision: AutoActionDecision | null;
  followupCreated: boolean;
  /** The automation history as persisted by this check, null when nothing was written. */
  state: AutomationStateFile | null;
}

export function noBlockReport(taskId: ID, taskTitle: string): UnevaluatedReport {
  return {
    taskId,
    taskTitle,
    score: "green",
    spec: null,
    telemetry: { note: "no therapydrift block" },
    findings: [],
    recommendations: [],
  };
}

export function invalidSpecReport(taskId: ID, taskTitle: string, error: string): UnevaluatedReport {
  const findings: UnevaluatedReport["findings"] = [
    {
      kind: "invalid_spec",
      severity: "warn",
      summary: "therapydrift block present but could not be parsed",
      details: { error },
    },
  ];
  return {
    taskId,
    taskTitle,
    score: "yellow",
    spec: null,
    telemetry: { parseError: error },
    findings,
    recommendations: recommend(findings, taskId),
  };
}

function writeLastReport(context: DriftCheckContext, report: CheckReport): void {
  if (!context.reports) return;
  try {
    context.reports.writeLastReport(report);
  } catch (error) {
    // last.json is best-effort output.
    console.warn(`therapydrift: could not write last report: ${String(error)}`);
  }
}

function parseSpec(block: string): TherapyDriftSpec {
  return specFromRaw(parseSpecBlock(block));
}

export async function runDriftCheck(options: DriftCheckOptions): Promise<DriftCheckOutcome> {
  const { context, taskId } = options;
  const now = options.now ?? new Date();

  const task = context.tasks.getTask(taskId);
  if (!task) throw new TaskNotFoundError(taskId);
  const title = task.title || taskId;

  const block = extractSpecBlock(task.description);
  if (block === null) {
    return {
      report: noBlockReport(taskId, title),
      exitCode: ExitCode.ok,
      decision: null,
      followupCreated: false,
      state: null,
    };
  }

  let spec: TherapyDriftSpec;
  try {
    spec = parseSpec(block);
  } catch (error) {
    if (!(error instanceof SpecParseError)) throw error;
    const report = invalidSpecReport(taskId, title, error.message);
    writeLastReport(context, report);
    context.telemetry?.emit({ type: "spec_invalid", taskId, data: { error: error.message } });
    if (options.writeLog) await context.tasks.appendLog(taskId, formatLogSummary(report));
    return {
      report,
      exitCode: ExitCode.findings,
      decision: null,
      followupCreated: false,
      state: null,
    };
  }

  const state = context.automation.read();
  const taskState = getTaskAutomationState(state, taskId);
  const drift: DriftReport = computeTherapyDrift({
    taskId,
    taskTitle: title,
    spec,
    task,
    tasks: context.tasks.listTasks(),
    previousLatestSignalTs: taskState.latestSignalTs ?? null,
  });

  const decision = evaluateAutoActionPolicy({
    spec,
    findings: drift.findings,
    telemetry: drift.telemetry,
    taskState,
    now,
  });
  const report: DriftReport = {
    ...drift,
    telemetry: { ...drift.telemetry, autoActionPolicy: decision },
  };

  writeLastReport(context, report);
  context.telemetry?.emit({
    type: "drift_check",
    taskId,
    data: {
      score: report.score,
      findingKinds: report.findings.map((f) => f.kind),
      driftSignalCount: report.telemetry.driftSignalCount,
      newSignalCount: report.telemetry.newSignalCount,
      ignoredSelfSignals: report.telemetry.ignoredSelfSignals,
      openDriftFollowups: report.telemetry.openDriftFollowups,
    },
  });
  context.telemetry?.emit({
    type: "auto_action_decided",
    taskId,
    data: {
      allowed: decision.allowAutoAction,
      reason: decision.reason,
      recentActionCount1h: decision.recentActionCount1h,
      circuitBreakerOpen: decision.circuitBreakerOpen,
    },
  });

  if (options.writeLog) {
    await context.tasks.appendLog(taskId, formatLogSummary(report));
  }

  let actionCreated = false;
  let followupCreated = false;
  if (options.createFollowups && decision.allowAutoAction && report.findings.length > 0) {
    const draft = buildRecoveryTask(report, formatSpecFence(block));
    followupCreated = await context.tasks.ensureTask(draft);
    // Counted even when the task already existed: the action fired.
    actionCreated = true;
    context.telemetry?.emit({
      type: "followup_created",
      taskId,
      data: { followupId: draft.id, created: followupCreated },
    });
  }

  const nextState = updateAutomationState({
    state,
    taskId,
    telemetry: report.telemetry,
    decision,
    actionCreated,
    now,
  });
  context.automation.write(nextState);

  return {
    report,
    exitCode: report.findings.length > 0 ? ExitCode.findings : ExitCode.ok,
    decision,
    followupCreated,
    state: nextState,
  };
}

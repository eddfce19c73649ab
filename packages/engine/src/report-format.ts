import type { AutoActionDecision, AutomationTaskState, CheckReport, ID } from "@therapydrift/architecture";

export function formatReportText(report: CheckReport): string[] {
  const lines = [`${report.taskId}: ${report.taskTitle}`, `score: ${report.score}`];

  if (report.findings.length === 0) {
    lines.push("findings: none");
  } else {
    lines.push("findings:");
    for (const f of report.findings) {
      lines.push(`- [${f.severity}] ${f.kind}: ${f.summary}`);
    }
  }

  if (report.recommendations.length > 0) {
    lines.push("recommendations:");
    for (const r of report.recommendations) {
      lines.push(`- [${r.priority}] ${r.action}`);
    }
  }
  return lines;
}

export function formatDecisionText(decision: AutoActionDecision, followupCreated: boolean): string[] {
  const verdict = decision.allowAutoAction ? "allowed" : "denied";
  const lines = [`auto-action: ${verdict} (${decision.reason})`];
  if (followupCreated) lines.push("recovery task created");
  return lines;
}

export function formatStateText(taskId: ID, state: AutomationTaskState): string[] {
  const timestamps = state.autoActionTimestamps ?? [];
  const followups = state.openFollowupIds ?? [];
  return [
    `${taskId}:`,
    `  last check: ${state.lastCheckTs ?? "never"}`,
    `  latest signal: ${state.latestSignalTs ?? "none"}`,
    `  drift signals: ${state.driftSignalCount ?? 0}`,
    `  open follow-ups: ${followups.length > 0 ? followups.join(", ") : "none"}`,
    `  auto-actions (24h / total): ${timestamps.length} / ${state.autoActionTotal ?? 0}`,
    `  circuit breaker: ${state.circuitBreakerOpen ? "open" : "closed"}`,
  ];
}

/**
 * followup-writer.ts - Log summaries and the recovery task draft
 */

import type { CheckReport, Finding, TaskDraft } from "@therapydrift/architecture";
import { therapyTaskId } from "./recommendations.js";

export const LOG_PREFIX = "Therapydrift:";
export const RECOVERY_TAGS = ["drift", "therapy"] as const;

const FALLBACK_ACTION = "Re-synchronize intent, scope, and open drift follow-up tasks.";

function sortedKinds(findings: readonly Finding[]): string[] {
  return [...new Set(findings.map((f) => f.kind))].sort();
}

/**
 * One-line summary appended to the task log. It starts with LOG_PREFIX, which
 * the default ignore prefixes exclude from the next check's signal count.
 */
export function formatLogSummary(report: CheckReport): string {
  if (report.findings.length === 0) return `${LOG_PREFIX} OK (no findings)`;

  let message = `${LOG_PREFIX} ${report.score} (${sortedKinds(report.findings).join(", ")})`;
  const nextAction = report.recommendations[0]?.action.trim();
  if (nextAction) message += ` | next: ${nextAction}`;
  return message;
}

export interface ContractBlockOptions {
  mode: "explore" | "core" | "hardening";
  objective: string;
  touch: string[];
}

/** A `wg-contract` block scoping the recovery task for the agent that picks it up. */
export function formatContractBlock(options: ContractBlockOptions): string {
  const touch = options.touch.map((path) => JSON.stringify(path)).join(", ");
  return [
    "```wg-contract",
    "schema = 1",
    `mode = ${JSON.stringify(options.mode)}`,
    `objective = ${JSON.stringify(options.objective)}`,
    "non_goals = []",
    `touch = [${touch}]`,
    "acceptance = []",
    "auto_followups = false",
    "```",
  ].join("\n");
}

export function buildRecoveryTask(report: CheckReport, specFence: string): TaskDraft {
  const taskId = report.taskId;
  const title = `therapy: ${report.taskTitle || taskId}`;

  const actionLines = report.recommendations
    .map((r) => r.action.trim())
    .filter(Boolean)
    .map((action) => `- ${action}`);
  const actions = actionLines.length > 0 ? actionLines.join("\n") : `- ${FALLBACK_ACTION}`;

  const description = [
    "Run a self-healing cycle for persistent drift signals.",
    "",
    "Context:",
    `- Origin task: ${taskId}`,
    `- Findings: ${sortedKinds(report.findings).join(", ")}`,
    "",
    "Recommended actions:",
    actions,
    "",
    formatContractBlock({ mode: "explore", objective: title, touch: [] }),
    "",
    specFence.trim(),
    "",
  ].join("\n");

  return {
    id: therapyTaskId(taskId),
    title,
    description,
    blockedBy: [taskId],
    tags: [...RECOVERY_TAGS],
  };
}

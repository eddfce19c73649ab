import type { Finding, FindingKind, ID, Recommendation } from "@therapydrift/architecture";

export function therapyTaskId(taskId: ID): ID {
  return `drift-therapy-${taskId}`;
}

function recommendationFor(kind: FindingKind, taskId: ID): Recommendation {
  switch (kind) {
    case "repeated_drift_signals":
      return {
        priority: "high",
        action: "Run a self-healing cycle: tighten touch scope and split hardening work",
        rationale: "Repeated drift signals indicate intent is not staying synchronized with execution.",
      };
    case "unresolved_drift_followups":
      return {
        priority: "high",
        action: "Resolve or re-scope open drift follow-up tasks before adding new scope",
        rationale: "Stacking unresolved follow-ups compounds execution drift over time.",
      };
    case "missing_recovery_plan":
      return {
        priority: "high",
        action: `Create and complete ${therapyTaskId(taskId)} to consolidate remediation`,
        rationale: "A dedicated recovery lane prevents drift fixes from bloating the current task.",
      };
    case "unsupported_schema":
      return {
        priority: "high",
        action: "Set therapydrift schema = 1",
        rationale: "Only schema v1 is currently supported.",
      };
    case "invalid_spec":
      return {
        priority: "high",
        action: "Fix the therapydrift TOML block so it parses",
        rationale: "Therapydrift can only guide self-healing when it can read the configuration.",
      };
  }
}

/** One recommendation per finding, de-duplicated by action in first-seen order. */
export function recommend(findings: readonly Finding[], taskId: ID): Recommendation[] {
  const seen = new Set<string>();
  const out: Recommendation[] = [];
  for (const finding of findings) {
    const rec = recommendationFor(finding.kind, taskId);
    if (seen.has(rec.action)) continue;
    seen.add(rec.action);
    out.push(rec);
  }
  return out;
}

export type ID = string;
export type ISODateTime = string;

export type FindingKind =
  | "repeated_drift_signals"
  | "unresolved_drift_followups"
  | "missing_recovery_plan"
  | "unsupported_schema"
  | "invalid_spec";
export type FindingSeverity = "warn" | "error";
export type DriftScore = "green" | "yellow" | "red";
export type RecommendationPriority = "high" | "medium" | "low";

// ─── Workgraph tasks ─────────────────────────────────────────────────────────

export interface TaskLogEntry {
  message: string;
  timestamp?: ISODateTime;
  actor?: string;
}

export interface TaskRecord {
  id: ID;
  title: string;
  /** Free-form; the drift checks only look at open, in-progress and done. */
  status: string;
  description: string;
  log: TaskLogEntry[];
  blockedBy: ID[];
  tags: string[];
}

export type TaskMap = Record<ID, TaskRecord>;

/** Input for creating a follow-up or recovery task. */
export interface TaskDraft {
  id: ID;
  title: string;
  description: string;
  blockedBy: ID[];
  tags: string[];
}

// ─── Drift spec ──────────────────────────────────────────────────────────────

export interface TherapyDriftSpec {
  schema: number;
  minSignalCount: number;
  followupPrefixes: string[];
  requireRecoveryPlan: boolean;
  ignoreSignalPrefixes: string[];
  cooldownSeconds: number;
  maxAutoActionsPerHour: number;
  minNewSignals: number;
  circuitBreakerAfter: number;
}

// ─── Findings and reports ────────────────────────────────────────────────────

export interface Finding {
  kind: FindingKind;
  severity: FindingSeverity;
  summary: string;
  details?: Record<string, unknown>;
}

export interface Recommendation {
  priority: RecommendationPriority;
  action: string;
  rationale: string;
}

export interface DriftSignal {
  message: string;
  /** Normalized ISO timestamp, null when the log entry had none or it did not parse. */
  timestamp: ISODateTime | null;
}

export interface DriftTelemetry {
  driftSignalCount: number;
  newSignalCount: number;
  ignoredSelfSignals: number;
  openDriftFollowups: number;
  openFollowupIds: ID[];
  latestSignalTs: ISODateTime | null;
  therapyTaskExists: boolean;
  autoActionPolicy?: AutoActionDecision;
}

export interface DriftReport {
  taskId: ID;
  taskTitle: string;
  score: DriftScore;
  spec: TherapyDriftSpec;
  telemetry: DriftTelemetry;
  findings: Finding[];
  recommendations: Recommendation[];
}

/** Report for tasks without a usable spec block (absent or unparseable). */
export interface UnevaluatedReport {
  taskId: ID;
  taskTitle: string;
  score: DriftScore;
  spec: null;
  telemetry: { note: string } | { parseError: string };
  findings: Finding[];
  recommendations: Recommendation[];
}

export type CheckReport = DriftReport | UnevaluatedReport;

// ─── Auto-action policy ──────────────────────────────────────────────────────

export type AutoActionReason =
  | "no_actionable_findings"
  | "circuit_breaker_open"
  | "hourly_budget_disabled"
  | "hourly_budget_exhausted"
  | "cooldown_active"
  | "no_new_evidence"
  | "allowed";

export interface AutoActionDecision {
  allowAutoAction: boolean;
  reason: AutoActionReason;
  hasActionableFindings: boolean;
  newSignalCount: number;
  openFollowupsChanged: boolean;
  recentActionCount1h: number;
  cooldownActive: boolean;
  circuitBreakerOpen: boolean;
  lastActionTs: ISODateTime | null;
}

// ─── Persisted automation history ────────────────────────────────────────────

export interface AutomationTaskState {
  lastCheckTs?: ISODateTime;
  latestSignalTs?: ISODateTime;
  driftSignalCount?: number;
  openFollowupIds?: ID[];
  /** Raw stored timestamps; unparseable entries are tolerated and dropped on read. */
  autoActionTimestamps?: string[];
  autoActionTotal?: number;
  circuitBreakerOpen?: boolean;
}

export interface AutomationStateFile {
  version: 1;
  tasks: Record<ID, AutomationTaskState>;
}

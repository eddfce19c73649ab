/**
 * @therapydrift/engine
 *
 * Drift detection for workgraph tasks and the loop-safety policy that gates
 * self-healing auto-actions. The CLI entry point lives in cli.ts.
 */

export { DRIFT_SIGNAL_PREFIXES, extractDriftSignals, isDriftSignal } from "./signal-extractor.js";
export type { SignalExtraction } from "./signal-extractor.js";
export { findOpenFollowups, MAX_TRACKED_FOLLOWUPS } from "./followup-tracker.js";
export type { OpenFollowups } from "./followup-tracker.js";
export { recommend, therapyTaskId } from "./recommendations.js";
export { computeTherapyDrift, scoreFindings, SUPPORTED_SCHEMA } from "./drift-scorer.js";
export type { DriftInput } from "./drift-scorer.js";
export {
  ACTIONABLE_KINDS,
  collectPolicyFacts,
  decideReason,
  DENY_RULES,
  evaluateAutoActionPolicy,
} from "./auto-action-policy.js";
export type { DenyRule, PolicyFacts, PolicyInput } from "./auto-action-policy.js";
export { updateAutomationState } from "./automation-state.js";
export type { StateUpdateInput } from "./automation-state.js";
export {
  buildRecoveryTask,
  formatContractBlock,
  formatLogSummary,
  LOG_PREFIX,
  RECOVERY_TAGS,
} from "./followup-writer.js";
export type { ContractBlockOptions } from "./followup-writer.js";
export { ExitCode, invalidSpecReport, noBlockReport, runDriftCheck } from "./check-runner.js";
export type { DriftCheckOptions, DriftCheckOutcome, ExitCodeValue } from "./check-runner.js";
export { formatDecisionText, formatReportText, formatStateText } from "./report-format.js";

import type {
  AutoActionDecision,
  AutomationStateFile,
  AutomationTaskState,
  DriftTelemetry,
  ID,
} from "@therapydrift/architecture";
import { toEpochMs } from "@therapydrift/architecture";

const ACTION_RETENTION_MS = 24 * 3_600_000;

export interface StateUpdateInput {
  state: AutomationStateFile;
  taskId: ID;
  telemetry: Pick<DriftTelemetry, "latestSignalTs" | "driftSignalCount" | "openFollowupIds">;
  decision: Pick<AutoActionDecision, "circuitBreakerOpen">;
  actionCreated: boolean;
  now: Date;
}

function newerSignalTs(previous: string | undefined, current: string | null): string | undefined {
  if (!current) return previous;
  const currentMs = toEpochMs(current);
  if (currentMs === null) return previous;
  const previousMs = toEpochMs(previous);
  if (previousMs !== null && previousMs >= currentMs) return previous;
  return current;
}

/**
 * Fold one evaluation into a task's automation history. Returns a new state
 * file; the input is left untouched. Callers must persist the result before
 * the next evaluation for cooldown, budget and breaker to hold.
 */
export function updateAutomationState(input: StateUpdateInput): AutomationStateFile {
  const { state, taskId, telemetry, decision, actionCreated, now } = input;
  const prior: AutomationTaskState = state.tasks[taskId] ?? {};
  const nowMs = now.getTime();
  const nowIso = now.toISOString();

  const kept = (prior.autoActionTimestamps ?? []).filter((raw) => {
    const ms = toEpochMs(raw);
    return ms !== null && ms >= nowMs - ACTION_RETENTION_MS;
  });
  const priorTotal = prior.autoActionTotal ?? 0;

  const next: AutomationTaskState = {
    ...prior,
    lastCheckTs: nowIso,
    driftSignalCount: telemetry.driftSignalCount ?? 0,
    openFollowupIds: [...(telemetry.openFollowupIds ?? [])],
    autoActionTimestamps: actionCreated ? [...kept, nowIso] : kept,
    autoActionTotal: actionCreated ? priorTotal + 1 : priorTotal,
    circuitBreakerOpen: decision.circuitBreakerOpen,
  };

  const latestSignalTs = newerSignalTs(prior.latestSignalTs, telemetry.latestSignalTs);
  if (latestSignalTs) next.latestSignalTs = latestSignalTs;

  return {
    version: 1,
    tasks: { ...state.tasks, [taskId]: next },
  };
}

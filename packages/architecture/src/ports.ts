import type {
  AutomationStateFile,
  CheckReport,
  ID,
  TaskDraft,
  TaskMap,
  TaskRecord,
} from "./domain.js";
import type { EmittableTelemetryEvent } from "./telemetry.js";

export interface TaskStore {
  getTask(id: ID): TaskRecord | null;
  listTasks(): TaskMap;
}

/** Creates remediation tasks. Only called when the auto-action policy allows. */
export interface ActionSink {
  /** Returns false when a task with the draft's id already exists. */
  ensureTask(draft: TaskDraft): Promise<boolean>;
}

export interface LogSink {
  appendLog(taskId: ID, message: string): Promise<void>;
}

/**
 * Per-task automation history. Read before the policy runs, written after the
 * state update. Concurrent writers race; the last write wins.
 */
export interface AutomationStateStore {
  read(): AutomationStateFile;
  write(state: AutomationStateFile): void;
}

export interface ReportSink {
  writeLastReport(report: CheckReport): void;
}

export interface TelemetrySink {
  emit(event: EmittableTelemetryEvent): void;
}

export type WorkgraphTasks = TaskStore & ActionSink & LogSink;

export interface DriftCheckContext {
  tasks: WorkgraphTasks;
  automation: AutomationStateStore;
  reports?: ReportSink;
  telemetry?: TelemetrySink;
}

/**
 * helpers.ts - Shared test factories and in-memory ports
 */

import type {
  AutomationStateFile,
  AutomationStateStore,
  CheckReport,
  DriftCheckContext,
  EmittableTelemetryEvent,
  ID,
  ReportSink,
  TaskDraft,
  TaskLogEntry,
  TaskMap,
  TaskRecord,
  TelemetrySink,
  TherapyDriftSpec,
  WorkgraphTasks,
} from "@therapydrift/architecture";
import { DEFAULT_DRIFT_SPEC, emptyAutomationState } from "@therapydrift/architecture";

export const NOW = new Date("2026-03-01T12:00:00.000Z");

export function minutesBefore(minutes: number, from: Date = NOW): string {
  return new Date(from.getTime() - minutes * 60_000).toISOString();
}

export function makeSpec(overrides: Partial<TherapyDriftSpec> = {}): TherapyDriftSpec {
  return { ...DEFAULT_DRIFT_SPEC, ...overrides };
}

export function makeTask(overrides: Partial<TaskRecord> & { id: ID }): TaskRecord {
  return {
    title: `Task ${overrides.id}`,
    status: "open",
    description: "",
    log: [],
    blockedBy: [],
    tags: [],
    ...overrides,
  };
}

export function signal(message: string, timestamp?: string): TaskLogEntry {
  return timestamp === undefined ? { message } : { message, timestamp };
}

export function taskMap(...tasks: TaskRecord[]): TaskMap {
  const map: TaskMap = {};
  for (const task of tasks) map[task.id] = task;
  return map;
}

export function specDescription(body: string, intro = "Ship the onboarding flow."): string {
  return `${intro}\n\n\`\`\`therapydrift\n${body}\n\`\`\`\n`;
}

// ─── In-memory ports ─────────────────────────────────────────────────────────

export class InMemoryWorkgraph implements WorkgraphTasks {
  readonly tasks: TaskMap;
  readonly created: TaskDraft[] = [];
  readonly logged: { taskId: ID; message: string }[] = [];

  constructor(tasks: TaskRecord[], private readonly clock: () => Date = () => NOW) {
    this.tasks = taskMap(...tasks);
  }

  getTask(id: ID): TaskRecord | null {
    return this.tasks[id] ?? null;
  }

  listTasks(): TaskMap {
    return { ...this.tasks };
  }

  async appendLog(taskId: ID, message: string): Promise<void> {
    const task = this.tasks[taskId];
    if (!task) throw new Error(`no task ${taskId}`);
    task.log.push({ message, timestamp: this.clock().toISOString(), actor: "therapydrift" });
    this.logged.push({ taskId, message });
  }

  async ensureTask(draft: TaskDraft): Promise<boolean> {
    this.created.push(draft);
    if (this.tasks[draft.id]) return false;
    this.tasks[draft.id] = {
      id: draft.id,
      title: draft.title,
      status: "open",
      description: draft.description,
      log: [],
      blockedBy: [...draft.blockedBy],
      tags: [...draft.tags],
    };
    return true;
  }
}

export class InMemoryAutomationStore implements AutomationStateStore, ReportSink {
  state: AutomationStateFile;
  writes = 0;
  lastReport: CheckReport | null = null;

  constructor(initial: AutomationStateFile = emptyAutomationState()) {
    this.state = initial;
  }

  read(): AutomationStateFile {
    return this.state;
  }

  write(state: AutomationStateFile): void {
    this.state = state;
    this.writes++;
  }

  writeLastReport(report: CheckReport): void {
    this.lastReport = report;
  }
}

export class RecordingTelemetry implements TelemetrySink {
  readonly events: EmittableTelemetryEvent[] = [];

  emit(event: EmittableTelemetryEvent): void {
    this.events.push(event);
  }

  types(): string[] {
    return this.events.map((e) => e.type);
  }
}

export interface TestHarness {
  context: DriftCheckContext;
  workgraph: InMemoryWorkgraph;
  automation: InMemoryAutomationStore;
  telemetry: RecordingTelemetry;
}

export function makeHarness(tasks: TaskRecord[], state?: AutomationStateFile): TestHarness {
  const workgraph = new InMemoryWorkgraph(tasks);
  const automation = new InMemoryAutomationStore(state);
  const telemetry = new RecordingTelemetry();
  return {
    context: { tasks: workgraph, automation, reports: automation, telemetry },
    workgraph,
    automation,
    telemetry,
  };
}

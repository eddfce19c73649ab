/**
 * local-adapter.ts
 *
 * Implements TherapydriftMcpApi against a workgraph directory on the local
 * filesystem, with the same stores the CLI uses.
 */

import type {
  DriftCheckContext,
  DriftCheckRequest,
  DriftCheckResponse,
  DriftStateRequest,
  DriftStateResponse,
  TherapydriftMcpApi,
} from "@therapydrift/architecture";
import {
  FileAutomationStateStore,
  getTaskAutomationState,
  JsonlTelemetrySink,
  stateDir,
  TaskNotFoundError,
  WorkgraphTaskStore,
} from "@therapydrift/architecture";
import { runDriftCheck } from "@therapydrift/engine";

export class LocalDriftAdapter implements TherapydriftMcpApi {
  private readonly tasks: WorkgraphTaskStore;
  private readonly automation: FileAutomationStateStore;

  constructor(
    readonly wgDir: string,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.tasks = new WorkgraphTaskStore(wgDir, clock);
    this.automation = new FileAutomationStateStore(wgDir);
  }

  private context(): DriftCheckContext {
    return {
      tasks: this.tasks,
      automation: this.automation,
      reports: this.automation,
      telemetry: new JsonlTelemetrySink(stateDir(this.wgDir)),
    };
  }

  // ─── drift_check ─────────────────────────────────────────────────────────

  async driftCheck(request: DriftCheckRequest): Promise<DriftCheckResponse | null> {
    try {
      const outcome = await runDriftCheck({
        context: this.context(),
        taskId: request.taskId,
        writeLog: request.writeLog ?? false,
        createFollowups: request.createFollowups ?? false,
        now: this.clock(),
      });
      return {
        report: outcome.report,
        exitCode: outcome.exitCode,
        followupCreated: outcome.followupCreated,
      };
    } catch (error) {
      if (error instanceof TaskNotFoundError) return null;
      throw error;
    }
  }

  // ─── drift_state ─────────────────────────────────────────────────────────

  async driftState(request: DriftStateRequest): Promise<DriftStateResponse | null> {
    if (!this.tasks.getTask(request.taskId)) return null;
    return {
      taskId: request.taskId,
      state: getTaskAutomationState(this.automation.read(), request.taskId),
    };
  }
}

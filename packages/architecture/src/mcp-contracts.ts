import type { AutomationTaskState, CheckReport, ID } from "./domain.js";

export const THERAPYDRIFT_MCP_TOOLS = ["drift_check", "drift_state"] as const;

export type TherapydriftMcpTool = (typeof THERAPYDRIFT_MCP_TOOLS)[number];

export interface DriftCheckRequest {
  taskId: ID;
  writeLog?: boolean;
  createFollowups?: boolean;
}

export interface DriftCheckResponse {
  report: CheckReport;
  exitCode: number;
  followupCreated: boolean;
}

export interface DriftStateRequest {
  taskId: ID;
}

export interface DriftStateResponse {
  taskId: ID;
  state: AutomationTaskState;
}

// Task lookups that fail resolve to null; the server turns that into isError.
export interface TherapydriftMcpApi {
  driftCheck(request: DriftCheckRequest): Promise<DriftCheckResponse | null>;
  driftState(request: DriftStateRequest): Promise<DriftStateResponse | null>;
}

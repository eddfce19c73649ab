/**
 * server.ts
 *
 * MCP protocol handler. Registers the drift tools with zod input schemas and
 * routes calls to a TherapydriftMcpApi implementation.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { TherapydriftMcpApi } from "@therapydrift/architecture";

const taskIdSchema = z
  .string()
  .min(1)
  .max(200)
  .refine((value) => !value.includes("\n") && !value.includes("\0"), {
    message: "Invalid task identifier",
  });

function taskNotFound(taskId: string) {
  return {
    content: [
      {
        type: "text" as const,
        text: JSON.stringify({ error: "task not found", taskId }),
      },
    ],
    isError: true,
  };
}

export function createServer(api: TherapydriftMcpApi): McpServer {
  const server = new McpServer({
    name: "therapydrift",
    version: "0.1.0",
  });

  // ─── drift_check ─────────────────────────────────────────────────────────

  server.tool(
    "drift_check",
    "Check a workgraph task for persistent drift and, when the loop-safety policy allows, create its recovery task",
    {
      taskId: taskIdSchema.describe("Workgraph task id"),
      writeLog: z
        .boolean()
        .optional()
        .describe("Append a one-line summary to the task log"),
      createFollowups: z
        .boolean()
        .optional()
        .describe("Create the drift-therapy-<id> recovery task when allowed"),
    },
    async (args) => {
      const result = await api.driftCheck({
        taskId: args.taskId,
        writeLog: args.writeLog,
        createFollowups: args.createFollowups,
      });
      if (!result) return taskNotFound(args.taskId);
      return {
        content: [{ type: "text" as const, text: JSON.stringify(result) }],
      };
    },
  );

  // ─── drift_state ─────────────────────────────────────────────────────────

  server.tool(
    "drift_state",
    "Show the stored auto-action history for a workgraph task",
    {
      taskId: taskIdSchema.describe("Workgraph task id"),
    },
    async (args) => {
      const result = await api.driftState({ taskId: args.taskId });
      if (!result) return taskNotFound(args.taskId);
      return {
        content: [{ type: "text" as const, text: JSON.stringify(result) }],
      };
    },
  );

  return server;
}

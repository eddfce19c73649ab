#!/usr/bin/env node
/**
 * therapydrift CLI
 *
 * Usage:
 *   therapydrift [--dir <path>] [--json] wg check --task <id> [--write-log] [--create-followups]
 *   therapydrift [--dir <path>] [--json] wg state --task <id>
 *
 * Options:
 *   --dir <path>          Workgraph directory (default: nearest .workgraph/ upwards)
 *   --json                Print the report or state as JSON
 *   --task <id>           Task to check
 *   --write-log           Append a one-line summary to the task log
 *   --create-followups    Create the drift-therapy-<id> recovery task when the policy allows
 *
 * Exit codes: 0 no findings, 3 findings, 2 usage error, 1 failure (including an
 * unknown task or a missing workgraph).
 */

import {
  FileAutomationStateStore,
  findWorkgraphDir,
  getTaskAutomationState,
  JsonlTelemetrySink,
  stateDir,
  TaskNotFoundError,
  WorkgraphNotFoundError,
  WorkgraphTaskStore,
} from "@therapydrift/architecture";
import { ExitCode, runDriftCheck } from "./check-runner.js";
import type { ExitCodeValue } from "./check-runner.js";
import { formatDecisionText, formatReportText, formatStateText } from "./report-format.js";

// ─── CLI argument parsing ─────────────────────────────────────────────────────

export type CliCommand =
  | {
      kind: "check";
      dir?: string;
      json: boolean;
      taskId: string;
      writeLog: boolean;
      createFollowups: boolean;
    }
  | { kind: "state"; dir?: string; json: boolean; taskId: string };

export type ParsedCli = { ok: true; command: CliCommand } | { ok: false; error: string };

export const USAGE = [
  "usage: therapydrift [--dir <path>] [--json] wg check --task <id> [--write-log] [--create-followups]",
  "       therapydrift [--dir <path>] [--json] wg state --task <id>",
].join("\n");

export function parseCliArgs(args: readonly string[]): ParsedCli {
  let dir: string | undefined;
  let json = false;
  let taskId: string | undefined;
  let writeLog = false;
  let createFollowups = false;
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--dir") {
      const value = args[i + 1];
      if (!value) return { ok: false, error: "--dir requires a path" };
      dir = value;
      i++;
    } else if (arg === "--task") {
      const value = args[i + 1];
      if (!value) return { ok: false, error: "--task requires an id" };
      taskId = value;
      i++;
    } else if (arg === "--json") {
      json = true;
    } else if (arg === "--write-log") {
      writeLog = true;
    } else if (arg === "--create-followups") {
      createFollowups = true;
    } else if (arg.startsWith("--")) {
      return { ok: false, error: `unknown option: ${arg}` };
    } else {
      positional.push(arg);
    }
  }

  const [group, action, ...rest] = positional;
  if (group !== "wg") return { ok: false, error: "expected command: wg check | wg state" };
  if (rest.length > 0) return { ok: false, error: `unexpected argument: ${rest[0]}` };
  if (!taskId) return { ok: false, error: "--task is required" };

  if (action === "check") {
    return { ok: true, command: { kind: "check", dir, json, taskId, writeLog, createFollowups } };
  }
  if (action === "state") {
    if (writeLog || createFollowups) {
      return { ok: false, error: "--write-log and --create-followups only apply to wg check" };
    }
    return { ok: true, command: { kind: "state", dir, json, taskId } };
  }
  return { ok: false, error: `unknown wg command: ${action ?? "(none)"}` };
}

// ─── Commands ────────────────────────────────────────────────────────────────

async function runCheck(command: Extract<CliCommand, { kind: "check" }>): Promise<ExitCodeValue> {
  const wgDir = findWorkgraphDir(command.dir);
  const automation = new FileAutomationStateStore(wgDir);
  const outcome = await runDriftCheck({
    context: {
      tasks: new WorkgraphTaskStore(wgDir),
      automation,
      reports: automation,
      telemetry: new JsonlTelemetrySink(stateDir(wgDir)),
    },
    taskId: command.taskId,
    writeLog: command.writeLog,
    createFollowups: command.createFollowups,
  });

  if (command.json) {
    console.log(JSON.stringify(outcome.report, null, 2));
  } else {
    for (const line of formatReportText(outcome.report)) console.log(line);
    if (outcome.decision) {
      for (const line of formatDecisionText(outcome.decision, outcome.followupCreated)) {
        console.log(line);
      }
    }
  }
  return outcome.exitCode;
}

function runState(command: Extract<CliCommand, { kind: "state" }>): ExitCodeValue {
  const wgDir = findWorkgraphDir(command.dir);
  const tasks = new WorkgraphTaskStore(wgDir);
  if (!tasks.getTask(command.taskId)) throw new TaskNotFoundError(command.taskId);

  const state = getTaskAutomationState(new FileAutomationStateStore(wgDir).read(), command.taskId);
  if (command.json) {
    console.log(JSON.stringify({ taskId: command.taskId, state }, null, 2));
  } else {
    for (const line of formatStateText(command.taskId, state)) console.log(line);
  }
  return ExitCode.ok;
}

/** Runs one CLI invocation and returns its exit code. `args` excludes node and the script path. */
export async function main(args: readonly string[]): Promise<ExitCodeValue> {
  const parsed = parseCliArgs(args);
  if (!parsed.ok) {
    console.error(`therapydrift: ${parsed.error}`);
    console.error(USAGE);
    return ExitCode.usage;
  }

  try {
    return parsed.command.kind === "check"
      ? await runCheck(parsed.command)
      : runState(parsed.command);
  } catch (error) {
    if (error instanceof TaskNotFoundError || error instanceof WorkgraphNotFoundError) {
      console.error(`therapydrift: ${error.message}`);
      return ExitCode.fatal;
    }
    throw error;
  }
}

// ─── Main ─────────────────────────────────────────────────────────────────────

const isDirectExecution = process.argv[1]?.endsWith("cli.js") ||
  process.argv[1]?.endsWith("cli.ts");

if (isDirectExecution) {
  void main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error("therapydrift failed", error);
      process.exitCode = ExitCode.fatal;
    });
}

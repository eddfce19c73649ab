/**
 * task-store.ts - Workgraph task store backed by .workgraph/graph.jsonl
 *
 * One JSON object per line. Lines with `kind: "task"` are tasks; every other
 * line (other node kinds, blank or unreadable lines) is carried through
 * rewrites untouched. Writes happen under graph.lock and land atomically.
 */

import { existsSync, readFileSync, statSync } from "fs";
import { dirname, join, resolve } from "path";
import type { ID, TaskDraft, TaskLogEntry, TaskMap, TaskRecord } from "./domain.js";
import { WorkgraphNotFoundError } from "./errors.js";
import { withFileLock, writeFileAtomic } from "./file-lock.js";
import type { WorkgraphTasks } from "./ports.js";

export const WORKGRAPH_DIR = ".workgraph";
export const LOG_ACTOR = "therapydrift";

export function graphPath(wgDir: string): string {
  return join(wgDir, "graph.jsonl");
}

export function graphLockPath(wgDir: string): string {
  return join(wgDir, "graph.lock");
}

/**
 * Resolve the workgraph directory. An explicit path may point at the project
 * or at the .workgraph directory itself; without one, walk up from `cwd`.
 */
export function findWorkgraphDir(explicit?: string, cwd: string = process.cwd()): string {
  if (explicit) {
    const abs = resolve(cwd, explicit);
    if (abs.endsWith(WORKGRAPH_DIR) && isDirectory(abs)) return abs;
    const nested = join(abs, WORKGRAPH_DIR);
    if (isDirectory(nested)) return nested;
    throw new WorkgraphNotFoundError(abs);
  }

  let current = resolve(cwd);
  for (;;) {
    const candidate = join(current, WORKGRAPH_DIR);
    if (isDirectory(candidate)) return candidate;
    const parent = dirname(current);
    if (parent === current) throw new WorkgraphNotFoundError(resolve(cwd));
    current = parent;
  }
}

function isDirectory(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

// ─── Normalization ───────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function asObject(value: unknown): Record<string, unknown> | null {
  return isRecord(value) ? value : null;
}

function asString(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

function asStringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.map(asString).filter(Boolean);
}

export function normalizeLogEntries(value: unknown): TaskLogEntry[] {
  if (!Array.isArray(value)) return [];
  const entries: TaskLogEntry[] = [];
  for (const item of value) {
    const raw = asObject(item);
    if (!raw) continue;
    const entry: TaskLogEntry = { message: asString(raw.message) };
    const timestamp = asString(raw.timestamp);
    if (timestamp) entry.timestamp = timestamp;
    const actor = asString(raw.actor);
    if (actor) entry.actor = actor;
    entries.push(entry);
  }
  return entries;
}

export function normalizeTaskRecord(value: unknown): TaskRecord | null {
  const raw = asObject(value);
  if (!raw) return null;
  if (raw.kind !== undefined && raw.kind !== "task") return null;
  const id = asString(raw.id);
  if (!id) return null;

  return {
    id,
    title: asString(raw.title) || id,
    status: asString(raw.status),
    description: asString(raw.description),
    log: normalizeLogEntries(raw.log),
    blockedBy: asStringList(raw.blocked_by),
    tags: asStringList(raw.tags),
  };
}

// ─── Reading ─────────────────────────────────────────────────────────────────

interface GraphLine {
  text: string;
  node: Record<string, unknown> | null;
}

function readGraphLines(wgDir: string): GraphLine[] {
  const path = graphPath(wgDir);
  if (!existsSync(path)) return [];

  const content = readFileSync(path, "utf-8");
  return content
    .split("\n")
    .filter((text) => text.trim().length > 0)
    .map((text) => {
      try {
        return { text, node: asObject(JSON.parse(text)) };
      } catch {
        return { text, node: null };
      }
    });
}

export function loadTasks(wgDir: string): TaskMap {
  const tasks: TaskMap = {};
  for (const line of readGraphLines(wgDir)) {
    if (!line.node || line.node.kind !== "task") continue;
    const task = normalizeTaskRecord(line.node);
    if (task) tasks[task.id] = task;
  }
  return tasks;
}

// Lines are written back from `text`; a caller that changes `node` re-serializes it.
function writeGraphLines(wgDir: string, lines: GraphLine[]): void {
  const body = lines.map((line) => line.text).join("\n");
  writeFileAtomic(graphPath(wgDir), body.length > 0 ? `${body}\n` : "");
}

function findTaskLine(lines: GraphLine[], id: ID): GraphLine | undefined {
  return lines.find((line) => line.node?.kind === "task" && asString(line.node.id) === id);
}

// ─── Store ───────────────────────────────────────────────────────────────────

export class WorkgraphTaskStore implements WorkgraphTasks {
  constructor(
    readonly wgDir: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  getTask(id: ID): TaskRecord | null {
    return this.listTasks()[id] ?? null;
  }

  listTasks(): TaskMap {
    return loadTasks(this.wgDir);
  }

  async appendLog(taskId: ID, message: string): Promise<void> {
    await withFileLock(graphLockPath(this.wgDir), () => {
      const lines = readGraphLines(this.wgDir);
      const line = findTaskLine(lines, taskId);
      if (!line?.node) {
        throw new Error(`Cannot append log: task not found: ${taskId}`);
      }
      const log = Array.isArray(line.node.log) ? line.node.log : [];
      log.push({ timestamp: this.clock().toISOString(), actor: LOG_ACTOR, message });
      line.node.log = log;
      line.text = JSON.stringify(line.node);
      writeGraphLines(this.wgDir, lines);
    });
  }

  async ensureTask(draft: TaskDraft): Promise<boolean> {
    return withFileLock(graphLockPath(this.wgDir), () => {
      const lines = readGraphLines(this.wgDir);
      if (findTaskLine(lines, draft.id)) return false;

      const node: Record<string, unknown> = {
        kind: "task",
        id: draft.id,
        title: draft.title,
        description: draft.description,
        status: "open",
        blocked_by: [...draft.blockedBy],
        tags: [...draft.tags],
        log: [],
        created_at: this.clock().toISOString(),
      };
      lines.push({ text: JSON.stringify(node), node });
      writeGraphLines(this.wgDir, lines);
      return true;
    });
  }
}
